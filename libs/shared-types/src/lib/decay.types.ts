/**
 * Content Decay Types
 */

import { DateRange } from './search-analytics.types';

/**
 * Window arithmetic settings, all in whole days
 */
export type DateWindowConfig = {
  reportLagDays: number; // Search Console reporting delay
  windowLengthDays: number;
  yoyOffsetDays: number;
  comparisonLagAdjustmentDays: number; // Moves the comparison end later
};

export type AuditWindows = {
  recent: DateRange;
  comparison: DateRange;
};

export type DecayScoreWeights = {
  clickWeight: number;
  positionWeight: number;
};

export type DecayThresholds = {
  minClickLoss: number; // Absolute clicks
  minPctDecline: number; // Percent, e.g. 20 for a 20% drop
};

/**
 * One URL compared across the recent and past windows.
 * Metrics for a side the URL is missing from are zero; a position of 0 means "no data".
 */
export type DecayRecord = {
  url: string;
  clicksRecent: number;
  clicksPast: number;
  impressionsRecent: number;
  impressionsPast: number;
  positionRecent: number;
  positionPast: number;
  clickDelta: number;
  clickPctChange: number;
  impressionDelta: number;
  impressionPctChange: number;
  positionDelta: number; // Positive = rank worsened
  decayScore: number;
  isNew: boolean; // Only in the recent window
  isGone: boolean; // Only in the past window
};

export type DecayReportSummary = {
  totalUrls: number;
  totalClicksLost: number; // Sum of clickDelta, so zero or negative
  meanPositionDelta: number;
};

export type DecayReport = Readonly<{
  records: ReadonlyArray<Readonly<DecayRecord>>;
  summary: Readonly<DecayReportSummary>;
  thresholds: Readonly<DecayThresholds>;
}>;

/**
 * Whole-site figures over every joined URL, not only the decayed ones
 */
export type SiteTotals = {
  urlsAnalyzed: number;
  newUrls: number;
  goneUrls: number;
  clicks: {
    recent: number;
    past: number;
    change: number;
    changePercent: number;
  };
};

export type AuditNoticeCode =
  | 'EMPTY_RESULT'
  | 'NO_URL_OVERLAP'
  | 'PARTIAL_RESULT'
  | 'NO_DECAY_DETECTED';

/**
 * Informational state attached to a successful audit
 */
export type AuditNotice = {
  code: AuditNoticeCode;
  message: string;
};

export type DecayAuditRequest = {
  siteUrl: string;
  today?: Date;
  thresholds?: Partial<DecayThresholds>;
  weights?: Partial<DecayScoreWeights>;
  windowConfig?: Partial<DateWindowConfig>;
  allowPartialResults?: boolean;
};

export type DecayAuditResult = {
  id: string;
  siteUrl: string;
  generatedAt: string;
  windows: AuditWindows;
  weights: Readonly<DecayScoreWeights>;
  totals: SiteTotals;
  report: DecayReport;
  partial: {
    recentFailed: boolean;
    pastFailed: boolean;
  };
  notices: AuditNotice[];
};

/**
 * Presentation row for tables and CSV export
 */
export type DecayTableRow = {
  'URL': string;
  'Current Clicks': number;
  'Previous Clicks': number;
  'Click Change': number;
  'Click Change %': string;
  'Current Impressions': number;
  'Previous Impressions': number;
  'Impression Change %': string;
  'Position Change': string;
  'Decay Score': string;
};
