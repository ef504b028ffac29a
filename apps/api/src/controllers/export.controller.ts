import { Controller, Get, Query, Res, Logger } from '@nestjs/common';
import { Response } from 'express';
import { DecayAuditService } from '../services/decay-audit.service';
import { ReportFormatterService } from '../services/report-formatter.service';
import { AuditQueryParams, toAuditRequest } from './audit-query';

@Controller('export')
export class ExportController {
  private readonly logger = new Logger(ExportController.name);

  constructor(
    private readonly decayAuditService: DecayAuditService,
    private readonly reportFormatter: ReportFormatterService
  ) {}

  /**
   * GET /api/export/csv
   * Export decayed URLs as CSV
   */
  @Get('csv')
  async exportCsv(@Query() params: AuditQueryParams, @Res() res: Response) {
    const request = toAuditRequest(params);

    this.logger.log(`Exporting CSV for ${request.siteUrl}`);

    const result = await this.decayAuditService.runAudit(request);
    const filename = this.reportFormatter.exportFilename(
      result.siteUrl,
      new Date(result.generatedAt),
      'csv'
    );

    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
    res.send(this.reportFormatter.toCsv(result.report));
  }

  /**
   * GET /api/export/excel
   * Export the audit as an Excel workbook
   */
  @Get('excel')
  async exportExcel(@Query() params: AuditQueryParams, @Res() res: Response) {
    const request = toAuditRequest(params);

    this.logger.log(`Exporting Excel for ${request.siteUrl}`);

    const result = await this.decayAuditService.runAudit(request);
    const filename = this.reportFormatter.exportFilename(
      result.siteUrl,
      new Date(result.generatedAt),
      'xlsx'
    );

    res.setHeader(
      'Content-Type',
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
    );
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
    res.send(this.reportFormatter.toWorkbook(result));
  }

  /**
   * GET /api/export/json
   * Export the raw audit result as JSON
   */
  @Get('json')
  async exportJson(@Query() params: AuditQueryParams) {
    const request = toAuditRequest(params);

    const result = await this.decayAuditService.runAudit(request);

    return {
      success: true,
      data: result,
    };
  }
}
