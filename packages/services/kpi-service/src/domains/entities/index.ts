export * from './SiteId';
export * from './CounterRecord';
export * from './SiteRecord';
export * from './ClusterDefinition';
export * from './AggregateRow';
