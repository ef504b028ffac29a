import { Controller, Get, Query, Logger } from '@nestjs/common';
import { DecayAuditService } from '../services/decay-audit.service';
import { DateWindowService } from '../services/date-window.service';
import { ReportFormatterService } from '../services/report-formatter.service';
import { AuditQueryParams, toAuditRequest } from './audit-query';

@Controller('decay')
export class DecayController {
  private readonly logger = new Logger(DecayController.name);

  constructor(
    private readonly decayAuditService: DecayAuditService,
    private readonly dateWindowService: DateWindowService,
    private readonly reportFormatter: ReportFormatterService
  ) {}

  /**
   * GET /api/decay/windows
   * Recent and comparison periods for today (or ?today=YYYY-MM-DD)
   */
  @Get('windows')
  getWindows(@Query('today') today?: string) {
    const reference = today ? DateWindowService.parseDate(today) : new Date();

    return {
      success: true,
      data: this.dateWindowService.calculate(reference),
    };
  }

  /**
   * GET /api/decay/audit
   * Run a content decay audit for one Search Console property
   */
  @Get('audit')
  async audit(@Query() params: AuditQueryParams) {
    const request = toAuditRequest(params);

    this.logger.log(`Running decay audit for ${request.siteUrl}`);

    const result = await this.decayAuditService.runAudit(request);

    return {
      success: true,
      data: {
        ...result,
        table: this.reportFormatter.toTableRows(result.report),
      },
    };
  }
}
