export * from './types';
export * from './analytics-store';
export * from './report-builder';
export * from './analytics-aggregator';
