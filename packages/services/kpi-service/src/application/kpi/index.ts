export { safeRatio, safeRatios } from './ratio';
export {
  calculateKpis,
  withKpis,
  availability,
  accessibility,
  retainabilityTechnical,
  retainabilityUser,
} from './KpiCalculator';
export {
  sumCounters,
  aggregateBy,
  daily,
  bySite,
  byCluster,
  clusterTotals,
  networkDaily,
  networkTotal,
  filterRecords,
  bySiteDay,
  bySiteDayWithName,
} from './Aggregator';
export {
  ClusterPartition,
  type ClusterOverlap,
  type ClusterPartitionOptions,
  type PartitionReport,
} from './ClusterPartition';
export { classify, createStatusClassifier, type StatusClassifier } from './StatusClassifier';
export {
  SiteDirectory,
  DEFAULT_UNNAMED_SITE_LABEL,
  type MapPoint,
  type SiteCoordinates,
} from './SiteDirectory';
export { toCounterRecords, toSiteRecords, parseRecordDate, type UntypedRow } from './CounterRecordMapper';
