export * from './lib/call-record.interface';
export * from './lib/schema.interface';
export * from './lib/team.interface';
export * from './lib/filter.interface';
export * from './lib/aggregation.interface';
export * from './lib/ingestion.interface';
export * from './lib/analytics.interface';
export * from './lib/preset.interface';
