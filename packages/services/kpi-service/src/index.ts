export { createApp } from './app';
export * from './application/kpi';
export * from './application/services';
export { KpiError, KpiErrorCode } from './application/errors';
export * from './domains/entities';
export type { ICounterStoreRepository } from './domains/repositories/ICounterStoreRepository';
export {
  createServiceRegistry,
  getServiceRegistry,
  setServiceRegistry,
  resetServiceRegistry,
  type KpiServiceRegistry,
} from './infrastructure/ServiceFactory';
export { DrizzleCounterStoreRepository } from './infrastructure/database/DrizzleCounterStoreRepository';
export { InMemoryCounterStoreRepository } from './infrastructure/repositories/InMemoryCounterStoreRepository';
export { loadKpiConfig, type KpiServiceConfig } from './config/kpi-config';
