/**
 * kpi-service configuration, read once from the environment at startup
 */

import { readFileSync } from 'fs';
import { getConfig, getFirstConfig, type EnvVarConfig } from '@netkpi/platform-core';
import { DEFAULT_KPI_THRESHOLDS, resolveKpiThresholds, type KpiThresholds } from '@netkpi/shared-contracts';
import { ClusterDefinitionSchema, type ClusterDefinition } from '../domains/entities';
import { DEFAULT_UNNAMED_SITE_LABEL } from '../application/kpi/SiteDirectory';
import defaultClusters from './clusters.json';

export const DEFAULT_PORT = 3020;

export interface KpiServiceConfig {
  port: number;
  counterTable: string;
  siteTable: string;
  unnamedSiteLabel: string;
  clusterPartitionStrict: boolean;
  thresholds: KpiThresholds;
  clusterDefinition: ClusterDefinition;
}

export const KPI_ENV_VARS: EnvVarConfig[] = [
  { name: 'KPI_DATABASE_URL', required: false, description: 'Counter store connection string', sensitive: true },
  { name: 'DATABASE_URL', required: false, description: 'Fallback connection string', sensitive: true },
  { name: 'KPI_THRESHOLDS', required: false, description: 'JSON override of the classification thresholds' },
  { name: 'CLUSTER_DEFINITION_PATH', required: false, description: 'JSON file replacing the built-in clusters' },
];

export function parseClusterDefinition(input: unknown): ClusterDefinition {
  return ClusterDefinitionSchema.parse(input);
}

export const DEFAULT_CLUSTER_DEFINITION: ClusterDefinition = parseClusterDefinition(defaultClusters);

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`not a TCP port: ${value}`);
  }
  return port;
}

export function loadKpiConfig(): KpiServiceConfig {
  const portValue = getFirstConfig('PORT', 'KPI_SERVICE_PORT');

  return {
    port: portValue === undefined ? DEFAULT_PORT : parsePort(portValue),
    counterTable: getConfig('KPI_COUNTER_TABLE', 'kpi_data'),
    siteTable: getConfig('KPI_SITE_TABLE', 'site_data'),
    unnamedSiteLabel: getConfig('UNNAMED_SITE_LABEL', DEFAULT_UNNAMED_SITE_LABEL),
    clusterPartitionStrict: getConfig('CLUSTER_PARTITION_STRICT', false),
    thresholds: getConfig('KPI_THRESHOLDS', DEFAULT_KPI_THRESHOLDS, value => resolveKpiThresholds(JSON.parse(value))),
    clusterDefinition: getConfig('CLUSTER_DEFINITION_PATH', DEFAULT_CLUSTER_DEFINITION, path =>
      parseClusterDefinition(JSON.parse(readFileSync(path, 'utf8')))
    ),
  };
}
