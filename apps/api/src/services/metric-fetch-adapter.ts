import { DateRange, MetricSet } from '@decay-auditor/shared-types';

export const METRIC_FETCH_ADAPTER = Symbol('METRIC_FETCH_ADAPTER');

/**
 * Source of per-URL metrics for a site and date range.
 * Implementations reject with FetchError and never substitute placeholder data.
 */
export interface MetricFetchAdapter {
  fetch(siteUrl: string, dateRange: DateRange): Promise<MetricSet>;
}
