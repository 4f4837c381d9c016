import type { CounterTotals, KpiName, KpiStatus, KpiValues } from '@netkpi/shared-contracts';
import type { IsoDate } from './CounterRecord';
import type { SiteId } from './SiteId';

/**
 * Grouping key of an aggregate. Key values are strings so groups sort and
 * serialize uniformly.
 */
export type GroupKey = Readonly<Record<string, string>>;

export type NoGroup = Readonly<Record<never, string>>;
export type DateGroup = { readonly date: IsoDate };
export type SiteGroup = { readonly siteId: SiteId };
export type DateSiteGroup = { readonly date: IsoDate; readonly siteId: SiteId };
export type SiteDayGroup = { readonly date: IsoDate; readonly siteId: SiteId; readonly siteName: string };
export type ClusterGroup = { readonly cluster: string };
export type ClusterDayGroup = { readonly cluster: string; readonly date: IsoDate };

export interface CounterRow {
  readonly counters: CounterTotals;
}

/**
 * Summed counters of a group plus the KPIs derived from those sums
 */
export interface AggregateRow<G extends GroupKey = GroupKey> extends CounterRow {
  readonly group: G;
  readonly rowCount: number;
  readonly kpis: KpiValues;
}

export type ClassifiedRow<R> = R & {
  readonly kpi: KpiName;
  readonly value: number;
  readonly status: KpiStatus;
};
