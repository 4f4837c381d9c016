import type { KpiName, KpiStatus } from '@netkpi/shared-contracts';
import type { AggregateRow, SiteGroup, SiteId, SiteRecord } from '../../domains/entities';
import { getLogger } from '../../config/service-urls';
import type { StatusClassifier } from './StatusClassifier';

const logger = getLogger('kpi-service:site-directory');

export const DEFAULT_UNNAMED_SITE_LABEL = 'Sin Nombre Site';

export interface SiteCoordinates {
  latitude: number;
  longitude: number;
}

export interface MapPoint extends SiteCoordinates {
  siteId: SiteId;
  siteName: string;
  /** Null when the site has no records in the selection */
  value: number | null;
  status: KpiStatus | null;
}

/**
 * Lookup over the site table. Counter records whose site is not listed keep a
 * placeholder name and have no coordinates.
 */
export class SiteDirectory {
  private readonly sites = new Map<string, SiteRecord>();

  constructor(
    sites: readonly SiteRecord[],
    private readonly unnamedSiteLabel: string = DEFAULT_UNNAMED_SITE_LABEL
  ) {
    const duplicates: string[] = [];
    for (const site of sites) {
      if (this.sites.has(site.siteId)) {
        duplicates.push(site.siteId);
        continue;
      }
      this.sites.set(site.siteId, site);
    }
    if (duplicates.length > 0) {
      logger.warn('Duplicate site ids in site table, keeping first entry', { siteIds: duplicates });
    }
  }

  get size(): number {
    return this.sites.size;
  }

  has(siteId: SiteId): boolean {
    return this.sites.has(siteId);
  }

  nameOf(siteId: SiteId): string {
    return this.sites.get(siteId)?.name || this.unnamedSiteLabel;
  }

  coordinatesOf(siteId: SiteId): SiteCoordinates | null {
    const site = this.sites.get(siteId);
    if (!site || site.latitude === null || site.longitude === null) return null;
    return { latitude: site.latitude, longitude: site.longitude };
  }

  join<R extends { readonly siteId: SiteId }>(records: readonly R[]): Array<R & { readonly siteName: string }> {
    const unjoinable = new Set<string>();
    const joined = records.map(record => {
      if (!this.sites.has(record.siteId)) unjoinable.add(record.siteId);
      return { ...record, siteName: this.nameOf(record.siteId) };
    });

    if (unjoinable.size > 0) {
      logger.warn('Counter records reference sites missing from the site table', {
        siteIds: [...unjoinable],
        placeholder: this.unnamedSiteLabel,
      });
    }
    return joined;
  }

  /**
   * Ids of the sites carrying any of the given names; unknown names match nothing
   */
  idsForNames(names: readonly string[]): SiteId[] {
    const wanted = new Set(names);
    return [...this.sites.values()].filter(site => wanted.has(site.name)).map(site => site.siteId);
  }

  /**
   * Site totals placed on the map. Sites without coordinates are left out;
   * listed sites without records keep a null value and status.
   */
  mapPoints(
    rows: readonly AggregateRow<SiteGroup>[],
    kpi: KpiName,
    classifier: StatusClassifier,
    siteIds?: readonly SiteId[]
  ): MapPoint[] {
    const rowsBySite = new Map(rows.map(row => [row.group.siteId, row]));
    const selected = siteIds ? new Set<string>(siteIds) : null;
    const points: MapPoint[] = [];

    for (const site of this.sites.values()) {
      if (selected && !selected.has(site.siteId)) continue;
      const coordinates = this.coordinatesOf(site.siteId);
      if (!coordinates) continue;

      const row = rowsBySite.get(site.siteId);
      const value = row ? row.kpis[kpi] : null;
      points.push({
        siteId: site.siteId,
        siteName: this.nameOf(site.siteId),
        ...coordinates,
        value,
        status: value === null ? null : classifier.classify(kpi, value),
      });
    }

    return points;
  }
}
