/**
 * Runtime configuration, read once from process.env (populated by dotenv in main.ts)
 */

export function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export function readBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

export function readList(name: string, fallback: string[] = []): string[] {
  const raw = process.env[name];
  if (!raw) return fallback;
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export const environment = {
  production: process.env['NODE_ENV'] === 'production',
  port: readNumber('PORT', 3000),

  // Google Search Console Configuration
  google: {
    credentialsPath:
      process.env['GOOGLE_APPLICATION_CREDENTIALS'] ||
      'service-account-credentials.json',
    // Property used when a request names none
    siteUrl: process.env['SEARCH_CONSOLE_SITE_URL'] || '',
    // Optional "page contains" filters, e.g. /blog/
    pageFilters: readList('PAGE_FILTERS'),
    rowLimit: 25000, // API maximum per request
  },

  // Recent window vs. the same window one year earlier
  dateWindows: {
    reportLagDays: readNumber('REPORT_LAG_DAYS', 1),
    windowLengthDays: readNumber('WINDOW_LENGTH_DAYS', 90),
    yoyOffsetDays: readNumber('YOY_OFFSET_DAYS', 365),
    comparisonLagAdjustmentDays: readNumber('COMPARISON_LAG_ADJUSTMENT_DAYS', 0),
  },

  // Decay scoring and report thresholds
  decay: {
    weights: {
      clickWeight: readNumber('DECAY_CLICK_WEIGHT', 0.7),
      positionWeight: readNumber('DECAY_POSITION_WEIGHT', 0.3),
    },
    thresholds: {
      minClickLoss: readNumber('MIN_CLICK_LOSS', 0),
      minPctDecline: readNumber('MIN_PCT_DECLINE', 20),
    },
    allowPartialResults: readBoolean('ALLOW_PARTIAL_RESULTS', false),
  },

  // Cache Settings (in seconds)
  cache: {
    analyticsTtl: readNumber('ANALYTICS_CACHE_TTL', 3600),
    sitesTtl: readNumber('SITES_CACHE_TTL', 600),
  },

  // CORS
  frontendUrl: process.env['FRONTEND_URL'] || 'http://localhost:4200',
};
