export * from './decay.controller';
export * from './export.controller';
export * from './sites.controller';
