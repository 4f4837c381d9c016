/**
 * Shared contracts for netkpi services
 *
 * Counter columns, KPI names, status tiers, thresholds and API query shapes.
 * Services import these from @netkpi/shared-contracts instead of defining local duplicates.
 */

export * from './common/index.js';

export * from './kpi/index.js';
