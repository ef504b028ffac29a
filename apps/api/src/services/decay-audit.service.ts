import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AuditNotice,
  DecayAuditRequest,
  DecayAuditResult,
  DecayRecord,
  MetricSet,
} from '@decay-auditor/shared-types';
import { v4 as uuidv4 } from 'uuid';
import { DateWindowService } from './date-window.service';
import { DecayEngineService } from './decay-engine.service';
import { METRIC_FETCH_ADAPTER, MetricFetchAdapter } from './metric-fetch-adapter';
import { ConfigurationError, FetchError, FetchWindow, describeError } from '../errors';
import { environment } from '../environments/environment';

type WindowFetch = {
  rows: MetricSet;
  failed: boolean;
};

@Injectable()
export class DecayAuditService {
  private readonly logger = new Logger(DecayAuditService.name);

  constructor(
    private readonly dateWindowService: DateWindowService,
    private readonly decayEngine: DecayEngineService,
    @Inject(METRIC_FETCH_ADAPTER)
    private readonly metricFetchAdapter: MetricFetchAdapter
  ) {}

  /**
   * Run one audit: compute windows, fetch both windows concurrently,
   * then join, filter and rank.
   */
  async runAudit(request: DecayAuditRequest): Promise<DecayAuditResult> {
    const siteUrl = request.siteUrl.trim();
    if (!siteUrl) {
      throw new ConfigurationError('siteUrl is required');
    }

    // Validate everything before issuing any fetch
    const windows = this.dateWindowService.calculate(
      request.today,
      request.windowConfig
    );
    const weights = this.decayEngine.resolveWeights(request.weights);
    const thresholds = this.decayEngine.resolveThresholds(request.thresholds);
    const allowPartial =
      request.allowPartialResults ?? environment.decay.allowPartialResults;

    this.logger.log(
      `Auditing ${siteUrl}: ${windows.recent.startDate}-${windows.recent.endDate} ` +
        `vs ${windows.comparison.startDate}-${windows.comparison.endDate}`
    );

    const [recentOutcome, pastOutcome] = await Promise.allSettled([
      this.metricFetchAdapter.fetch(siteUrl, windows.recent),
      this.metricFetchAdapter.fetch(siteUrl, windows.comparison),
    ]);

    const recent = this.settle(recentOutcome, siteUrl, 'recent', allowPartial);
    const past = this.settle(pastOutcome, siteUrl, 'past', allowPartial);

    const records = this.decayEngine.join(recent.rows, past.rows, weights);
    const report = this.decayEngine.filterAndRank(records, thresholds);
    const totals = this.decayEngine.summarize(records);

    const notices = this.collectNotices(recent, past, records);
    if (report.records.length === 0) {
      notices.push({
        code: 'NO_DECAY_DETECTED',
        message:
          `No URLs lost at least ${thresholds.minClickLoss} clicks ` +
          `and ${thresholds.minPctDecline}% of their clicks`,
      });
    }

    this.logger.log(
      `Audit complete for ${siteUrl}: ${totals.urlsAnalyzed} URLs analyzed, ` +
        `${report.summary.totalUrls} decayed, ${report.summary.totalClicksLost} clicks lost`
    );

    return {
      id: uuidv4(),
      siteUrl,
      generatedAt: new Date().toISOString(),
      windows,
      weights,
      totals,
      report,
      partial: {
        recentFailed: recent.failed,
        pastFailed: past.failed,
      },
      notices,
    };
  }

  /**
   * A failed fetch aborts the run unless partial results were requested,
   * in which case that window is treated as empty.
   */
  private settle(
    outcome: PromiseSettledResult<MetricSet>,
    siteUrl: string,
    window: FetchWindow,
    allowPartial: boolean
  ): WindowFetch {
    if (outcome.status === 'fulfilled') {
      return { rows: outcome.value, failed: false };
    }

    const error =
      outcome.reason instanceof FetchError
        ? outcome.reason.forWindow(window)
        : new FetchError(describeError(outcome.reason), siteUrl, window, {
            cause: outcome.reason,
          });

    if (!allowPartial) {
      throw error;
    }

    this.logger.warn(
      `Continuing with an empty ${window} window for ${siteUrl}: ${error.message}`
    );
    return { rows: [], failed: true };
  }

  private collectNotices(
    recent: WindowFetch,
    past: WindowFetch,
    records: ReadonlyArray<DecayRecord>
  ): AuditNotice[] {
    const notices: AuditNotice[] = [];

    for (const [label, fetched] of [
      ['recent', recent],
      ['past', past],
    ] as const) {
      if (fetched.failed) {
        notices.push({
          code: 'PARTIAL_RESULT',
          message: `The ${label} window could not be fetched and was treated as empty`,
        });
      }
    }

    if (recent.rows.length === 0 && past.rows.length === 0) {
      notices.push({
        code: 'EMPTY_RESULT',
        message: 'No data available for either period',
      });
    } else if (records.every((r) => r.isNew || r.isGone)) {
      notices.push({
        code: 'NO_URL_OVERLAP',
        message: 'No URL appears in both periods',
      });
    }

    return notices;
  }
}
