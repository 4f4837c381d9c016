/**
 * Report queries behind the HTTP API: filter the snapshot, aggregate, classify.
 * Aggregates are recomputed on every call.
 */

import {
  KPI_LABELS,
  KPI_STATUS_COLORS,
  KPI_STATUS_LABELS_ES,
  KPI_STATUS_ORDER,
  type KpiName,
  type KpiStatus,
  type KpiThreshold,
  type KpiThresholds,
} from '@netkpi/shared-contracts';
import {
  toSiteId,
  type AggregateRow,
  type ClassifiedRow,
  type ClusterDayGroup,
  type ClusterGroup,
  type DateGroup,
  type IsoDate,
  type NoGroup,
  type RawCounterRecord,
  type RecordFilter,
  type SiteDayGroup,
  type SiteGroup,
  type SiteId,
} from '../../domains/entities';
import {
  ClusterPartition,
  SiteDirectory,
  byCluster,
  bySite,
  bySiteDayWithName,
  clusterTotals,
  daily,
  filterRecords,
  networkDaily,
  networkTotal,
  type MapPoint,
  type PartitionReport,
  type StatusClassifier,
} from '../kpi';
import { getLogger } from '../../config/service-urls';
import type { CounterSnapshotStore } from './CounterSnapshotStore';

const logger = getLogger('kpi-service:report-service');

export interface ReportSelection {
  from?: IsoDate;
  to?: IsoDate;
  /** Site ids as given by the caller */
  sites?: readonly string[];
  siteNames?: readonly string[];
}

export type NamedSiteRow = AggregateRow<SiteGroup> & { readonly siteName: string };
export type StatusedRow<R extends AggregateRow> = R & { readonly status: Record<KpiName, KpiStatus> };

export interface OverviewReport {
  range: { from: IsoDate | null; to: IsoDate | null };
  total: StatusedRow<AggregateRow<NoGroup>> | null;
  daily: StatusedRow<AggregateRow<DateGroup>>[];
  sites: StatusedRow<NamedSiteRow>[];
}

export interface SiteMapReport {
  kpi: KpiName;
  /** Clusters the map is limited to; empty for the whole network */
  clusters: string[];
  thresholds: KpiThreshold;
  sites: ClassifiedRow<NamedSiteRow>[];
  points: MapPoint[];
}

export interface ClusterReport {
  clusters: string[];
  daily: StatusedRow<AggregateRow<ClusterDayGroup>>[];
  totals: StatusedRow<AggregateRow<ClusterGroup>>[];
}

export interface ThresholdsReport {
  thresholds: KpiThresholds;
  statusOrder: readonly KpiStatus[];
  colors: Readonly<Record<KpiStatus, string>>;
  labels: Readonly<Record<KpiStatus, string>>;
  kpiLabels: Readonly<Record<KpiName, string>>;
}

export interface ClustersReport {
  clusters: Array<{ name: string; siteIds: number[] }>;
  validation: PartitionReport;
}

export interface ReloadResult {
  records: number;
  sites: number;
  loadedAt: string;
}

interface Selection {
  records: RawCounterRecord[];
  directory: SiteDirectory;
  siteIds?: SiteId[];
}

export interface KpiReportServiceOptions {
  partition: ClusterPartition;
  classifier: StatusClassifier;
  thresholds: KpiThresholds;
  unnamedSiteLabel?: string;
}

export class KpiReportService {
  constructor(
    private readonly snapshots: CounterSnapshotStore,
    private readonly options: KpiReportServiceOptions
  ) {}

  async getOverview(selection: ReportSelection = {}): Promise<OverviewReport> {
    const { records, directory } = await this.select(selection);
    const total = networkTotal(records);
    const sites = bySite(records).map(row => ({ ...row, siteName: directory.nameOf(row.group.siteId) }));

    return {
      range: rangeOf(records),
      total: total ? this.withStatus(total) : null,
      daily: networkDaily(records).map(row => this.withStatus(row)),
      sites: sites.map(row => this.withStatus(row)),
    };
  }

  async getSiteDaily(selection: ReportSelection = {}): Promise<StatusedRow<AggregateRow<SiteDayGroup>>[]> {
    const { records, directory } = await this.select(selection);
    return daily(directory.join(records), bySiteDayWithName).map(row => this.withStatus(row));
  }

  /**
   * Per-site totals over the period, classified for one KPI. Given clusters, only
   * their member sites are mapped.
   */
  async getSiteMap(
    selection: ReportSelection = {},
    kpi: KpiName = 'availability',
    clusters?: readonly string[]
  ): Promise<SiteMapReport> {
    const names = this.clusterNames(clusters);
    const { records, directory, siteIds } = await this.select(selection, this.membersOf(names));
    const totals = bySite(records);
    const named = totals.map(row => ({ ...row, siteName: directory.nameOf(row.group.siteId) }));

    return {
      kpi,
      clusters: names,
      thresholds: this.options.classifier.thresholdsFor(kpi),
      sites: this.options.classifier.classifyRows(named, kpi),
      points: directory.mapPoints(totals, kpi, this.options.classifier, siteIds),
    };
  }

  async getClusterReport(selection: ReportSelection = {}, clusters?: readonly string[]): Promise<ClusterReport> {
    const { partition } = this.options;
    const requested = this.clusterNames(clusters);
    const names = requested.length > 0 ? requested : partition.names();

    const { records } = await this.select(selection);
    return {
      clusters: names,
      daily: byCluster(records, partition, names).map(row => this.withStatus(row)),
      totals: clusterTotals(records, partition, names).map(row => this.withStatus(row)),
    };
  }

  getThresholds(): ThresholdsReport {
    return {
      thresholds: this.options.thresholds,
      statusOrder: KPI_STATUS_ORDER,
      colors: KPI_STATUS_COLORS,
      labels: KPI_STATUS_LABELS_ES,
      kpiLabels: KPI_LABELS,
    };
  }

  getClusters(): ClustersReport {
    const { partition } = this.options;
    return {
      clusters: partition.definition().map(cluster => ({ name: cluster.name, siteIds: [...cluster.siteIds] })),
      validation: partition.validate(),
    };
  }

  async reload(): Promise<ReloadResult> {
    const snapshot = await this.snapshots.reload();
    logger.info('Counter snapshot reloaded on request', {
      records: snapshot.records.length,
      sites: snapshot.sites.length,
    });
    return {
      records: snapshot.records.length,
      sites: snapshot.sites.length,
      loadedAt: snapshot.loadedAt.toISOString(),
    };
  }

  private withStatus<R extends AggregateRow>(row: R): StatusedRow<R> {
    return { ...row, status: this.options.classifier.classifyAll(row.kpis) };
  }

  /**
   * Requested cluster names, first occurrence kept. Unknown names fail before any
   * data is read.
   */
  private clusterNames(clusters: readonly string[] = []): string[] {
    const names = [...new Set(clusters)];
    names.forEach(name => this.options.partition.members(name));
    return names;
  }

  private membersOf(names: readonly string[]): SiteId[] | undefined {
    if (names.length === 0) return undefined;
    const members = new Set(names.flatMap(name => this.options.partition.members(name)));
    return [...members].map(id => toSiteId(id));
  }

  private async select(selection: ReportSelection, within?: readonly SiteId[]): Promise<Selection> {
    const snapshot = await this.snapshots.getSnapshot();
    const directory = new SiteDirectory(snapshot.sites, this.options.unnamedSiteLabel);

    let siteIds: SiteId[] | undefined;
    if (selection.sites || selection.siteNames) {
      const ids = new Set<SiteId>([
        ...(selection.sites ?? []).map(site => toSiteId(site)),
        ...directory.idsForNames(selection.siteNames ?? []),
      ]);
      siteIds = [...ids];
    }
    if (within) {
      const allowed = new Set<SiteId>(within);
      siteIds = siteIds ? siteIds.filter(id => allowed.has(id)) : [...within];
    }

    const filter: RecordFilter = { from: selection.from, to: selection.to, siteIds };
    return { records: filterRecords(snapshot.records, filter), directory, siteIds };
  }
}

function rangeOf(records: readonly RawCounterRecord[]): { from: IsoDate | null; to: IsoDate | null } {
  let from: IsoDate | null = null;
  let to: IsoDate | null = null;
  for (const { date } of records) {
    if (from === null || date < from) from = date;
    if (to === null || date > to) to = date;
  }
  return { from, to };
}
