export * from './counters.js';
export * from './kpis.js';
export * from './status.js';
export * from './thresholds.js';
export * from './queries.js';
