/**
 * Aggregation over raw counter records.
 *
 * Counters are summed per group and the KPIs are derived once from the sums;
 * KPI values are never averaged across rows.
 */

import {
  OPTIONAL_COUNTERS,
  REQUIRED_COUNTERS,
  ZERO_COUNTER_TOTALS,
  type CounterTotals,
  type OptionalCounter,
  type RequiredCounter,
} from '@netkpi/shared-contracts';
import {
  siteNumber,
  type AggregateRow,
  type ClusterDayGroup,
  type ClusterGroup,
  type CounterRow,
  type DateGroup,
  type DateSiteGroup,
  type GroupKey,
  type NoGroup,
  type RawCounterRecord,
  type RecordFilter,
  type SiteDayGroup,
  type SiteGroup,
} from '../../domains/entities';
import { getLogger } from '../../config/service-urls';
import { withKpis } from './KpiCalculator';
import type { ClusterPartition } from './ClusterPartition';

const logger = getLogger('kpi-service:aggregator');

type CounterAccumulator = Record<RequiredCounter, number> & Partial<Record<OptionalCounter, number>>;

export function sumCounters(rows: readonly CounterRow[]): CounterTotals {
  const totals: CounterAccumulator = { ...ZERO_COUNTER_TOTALS };

  for (const { counters } of rows) {
    for (const name of REQUIRED_COUNTERS) {
      totals[name] += counters[name];
    }
    for (const name of OPTIONAL_COUNTERS) {
      const value = counters[name];
      if (value !== undefined) {
        totals[name] = (totals[name] ?? 0) + value;
      }
    }
  }

  return totals;
}

function compareGroups(a: GroupKey, b: GroupKey): number {
  for (const [key, value] of Object.entries(a)) {
    const order = value.localeCompare(b[key] ?? '', undefined, { numeric: true });
    if (order !== 0) return order;
  }
  return 0;
}

/**
 * Group rows by a key selector, sum counters per group and derive KPIs from the sums.
 * Groups are ordered by their key values, numeric text compared as numbers.
 */
export function aggregateBy<R extends CounterRow, G extends GroupKey>(
  rows: readonly R[],
  groupOf: (row: R) => G
): AggregateRow<G>[] {
  const groups = new Map<string, { group: G; members: R[] }>();

  for (const row of rows) {
    const group = groupOf(row);
    const key = JSON.stringify(Object.entries(group));
    const entry = groups.get(key);
    if (entry) {
      entry.members.push(row);
    } else {
      groups.set(key, { group, members: [row] });
    }
  }

  const summed = [...groups.values()]
    .sort((a, b) => compareGroups(a.group, b.group))
    .map(({ group, members }) => ({ group, rowCount: members.length, counters: sumCounters(members) }));
  return withKpis(summed);
}

export const bySiteDay = (record: RawCounterRecord): DateSiteGroup => ({
  date: record.date,
  siteId: record.siteId,
});

export const bySiteDayWithName = (record: RawCounterRecord & { readonly siteName: string }): SiteDayGroup => ({
  date: record.date,
  siteId: record.siteId,
  siteName: record.siteName,
});

/**
 * Daily aggregates, per site and date unless another grouping is given
 */
export function daily(records: readonly RawCounterRecord[]): AggregateRow<DateSiteGroup>[];
export function daily<R extends RawCounterRecord, G extends GroupKey>(
  records: readonly R[],
  groupOf: (record: R) => G
): AggregateRow<G>[];
export function daily<R extends RawCounterRecord, G extends GroupKey>(
  records: readonly R[],
  groupOf?: (record: R) => G
): AggregateRow<GroupKey>[] {
  return groupOf ? aggregateBy(records, groupOf) : aggregateBy(records, bySiteDay);
}

/**
 * Period totals per site over whatever range the records cover
 */
export function bySite(records: readonly RawCounterRecord[]): AggregateRow<SiteGroup>[] {
  return aggregateBy(records, (record): SiteGroup => ({ siteId: record.siteId }));
}

function recordsPerCluster(
  records: readonly RawCounterRecord[],
  partition: ClusterPartition,
  clusters: readonly string[]
): Array<{ cluster: string; members: RawCounterRecord[] }> {
  const result: Array<{ cluster: string; members: RawCounterRecord[] }> = [];

  for (const cluster of clusters) {
    const siteNumbers = new Set(partition.members(cluster));
    const members = records.filter(record => {
      const id = siteNumber(record.siteId);
      return id !== null && siteNumbers.has(id);
    });

    if (members.length === 0) {
      logger.debug('Cluster has no records in selection', { cluster });
      continue;
    }
    result.push({ cluster, members });
  }

  return result;
}

/**
 * Daily aggregates per cluster, in definition order. Clusters without
 * records are left out.
 */
export function byCluster(
  records: readonly RawCounterRecord[],
  partition: ClusterPartition,
  clusters: readonly string[] = partition.names()
): AggregateRow<ClusterDayGroup>[] {
  return recordsPerCluster(records, partition, clusters).flatMap(({ cluster, members }) =>
    aggregateBy(members, (record): ClusterDayGroup => ({ cluster, date: record.date }))
  );
}

export function clusterTotals(
  records: readonly RawCounterRecord[],
  partition: ClusterPartition,
  clusters: readonly string[] = partition.names()
): AggregateRow<ClusterGroup>[] {
  return recordsPerCluster(records, partition, clusters).flatMap(({ cluster, members }) =>
    aggregateBy(members, (): ClusterGroup => ({ cluster }))
  );
}

export function networkDaily(records: readonly RawCounterRecord[]): AggregateRow<DateGroup>[] {
  return aggregateBy(records, (record): DateGroup => ({ date: record.date }));
}

/**
 * Single aggregate over every record; null when there is nothing to aggregate
 */
export function networkTotal(records: readonly RawCounterRecord[]): AggregateRow<NoGroup> | null {
  if (records.length === 0) return null;
  const [total] = aggregateBy(records, (): NoGroup => ({}));
  return total ?? null;
}

/**
 * Inclusive date range and site selection. An empty `siteIds` list selects nothing.
 */
export function filterRecords<R extends RawCounterRecord>(records: readonly R[], filter: RecordFilter): R[] {
  const sites = filter.siteIds ? new Set<string>(filter.siteIds) : null;

  return records.filter(
    record =>
      (!filter.from || record.date >= filter.from) &&
      (!filter.to || record.date <= filter.to) &&
      (!sites || sites.has(record.siteId))
  );
}
