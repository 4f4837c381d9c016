/**
 * kpi-service - Service Factory (Composition Root)
 * Creates and manages all service dependencies using the registry pattern.
 */

import { isProduction } from '@netkpi/platform-core';
import type { ICounterStoreRepository } from '../domains/repositories/ICounterStoreRepository';
import { ClusterPartition, createStatusClassifier, type StatusClassifier } from '../application/kpi';
import { CounterSnapshotStore, KpiReportService } from '../application/services';
import { KpiError } from '../application/errors';
import { loadKpiConfig, type KpiServiceConfig } from '../config/kpi-config';
import { getLogger } from '../config/service-urls';
import { getDatabase, isDatabaseConfigured } from './database/DatabaseConnectionFactory';
import { DrizzleCounterStoreRepository } from './database/DrizzleCounterStoreRepository';
import { InMemoryCounterStoreRepository } from './repositories/InMemoryCounterStoreRepository';

const logger = getLogger('kpi-service:service-factory');

export interface KpiServiceRegistry {
  config: KpiServiceConfig;
  repository: ICounterStoreRepository;
  snapshots: CounterSnapshotStore;
  partition: ClusterPartition;
  classifier: StatusClassifier;
  reports: KpiReportService;
}

export interface ServiceRegistryOverrides {
  config?: KpiServiceConfig;
  repository?: ICounterStoreRepository;
}

let registry: KpiServiceRegistry | null = null;

export function getServiceRegistry(): KpiServiceRegistry {
  if (!registry) {
    registry = createServiceRegistry();
  }
  return registry;
}

export function setServiceRegistry(custom: KpiServiceRegistry): void {
  registry = custom;
  logger.info('Service registry overridden (test mode)');
}

export function resetServiceRegistry(): void {
  registry = null;
}

function createRepository(config: KpiServiceConfig): ICounterStoreRepository {
  if (isDatabaseConfigured()) {
    logger.info('Using PostgreSQL counter store', { counterTable: config.counterTable, siteTable: config.siteTable });
    return new DrizzleCounterStoreRepository(getDatabase(), {
      counterTable: config.counterTable,
      siteTable: config.siteTable,
    });
  }

  if (isProduction()) {
    throw KpiError.counterStoreUnavailable('KPI_DATABASE_URL or DATABASE_URL is required in production');
  }

  logger.warn('No database configured, using an empty in-memory counter store');
  return new InMemoryCounterStoreRepository();
}

export function createServiceRegistry(overrides: ServiceRegistryOverrides = {}): KpiServiceRegistry {
  const config = overrides.config ?? loadKpiConfig();
  const repository = overrides.repository ?? createRepository(config);

  const partition = new ClusterPartition(config.clusterDefinition, { strict: config.clusterPartitionStrict });
  const classifier = createStatusClassifier(config.thresholds);
  const snapshots = new CounterSnapshotStore(repository);
  const reports = new KpiReportService(snapshots, {
    partition,
    classifier,
    thresholds: config.thresholds,
    unnamedSiteLabel: config.unnamedSiteLabel,
  });

  return { config, repository, snapshots, partition, classifier, reports };
}
