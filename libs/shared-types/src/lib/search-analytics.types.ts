/**
 * Google Search Console Analytics Types
 */

export type SearchAnalyticsQuery = {
  startDate: string; // YYYY-MM-DD
  endDate: string; // YYYY-MM-DD
  dimensions?: SearchDimension[];
  rowLimit?: number;
  startRow?: number;
};

export type SearchDimension = 'query' | 'page' | 'country' | 'device' | 'date';

/**
 * One page's aggregated metrics for a single date window
 */
export type MetricRow = {
  url: string;
  clicks: number;
  impressions: number;
  ctr: number;
  position: number; // Average rank, lower is better
};

/**
 * Per-URL snapshot for one (site, date range) pair. URLs are unique, order is not guaranteed.
 */
export type MetricSet = ReadonlyArray<MetricRow>;

/**
 * Inclusive calendar date range
 */
export type DateRange = {
  startDate: string;
  endDate: string;
};

export type SitePermissionLevel =
  | 'siteOwner'
  | 'siteFullUser'
  | 'siteRestrictedUser'
  | 'siteUnverifiedUser';

/**
 * Verified Search Console property
 */
export type Site = {
  siteUrl: string;
  permissionLevel: SitePermissionLevel;
};
