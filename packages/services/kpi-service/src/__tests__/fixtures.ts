import { DEFAULT_KPI_THRESHOLDS, type CounterTotals } from '@netkpi/shared-contracts';
import { createMockCounterTotals } from '@netkpi/test-utils';
import { toSiteId, type RawCounterRecord, type SiteRecord } from '../domains/entities';
import { DEFAULT_CLUSTER_DEFINITION, type KpiServiceConfig } from '../config/kpi-config';

export function counterRecord(
  date: string,
  site: string | number,
  counters: Partial<CounterTotals> = {}
): RawCounterRecord {
  return {
    date,
    time: null,
    siteId: toSiteId(site),
    sector: null,
    counters: createMockCounterTotals(counters),
  };
}

export function siteRecord(
  site: string | number,
  name: string,
  latitude: number | null = 9.9,
  longitude: number | null = -84.1
): SiteRecord {
  return { siteId: toSiteId(site), name, latitude, longitude };
}

export const TEST_CONFIG: KpiServiceConfig = {
  port: 0,
  counterTable: 'kpi_data',
  siteTable: 'site_data',
  unnamedSiteLabel: 'Sin Nombre Site',
  clusterPartitionStrict: false,
  thresholds: DEFAULT_KPI_THRESHOLDS,
  clusterDefinition: DEFAULT_CLUSTER_DEFINITION,
};

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
