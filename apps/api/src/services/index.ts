export * from './cache.service';
export * from './date-window.service';
export * from './decay-engine.service';
export * from './decay-audit.service';
export * from './metric-fetch-adapter';
export * from './report-formatter.service';
export * from './search-console.service';
