/**
 * Named groups of site numbers used for cluster reports.
 *
 * The definition is declarative: by default overlaps and gaps are only logged.
 * In strict mode they fail construction.
 */

import { ClusterDefinitionSchema, siteNumber, type ClusterDefinition, type SiteId } from '../../domains/entities';
import { getLogger } from '../../config/service-urls';
import { KpiError } from '../errors';

const logger = getLogger('kpi-service:cluster-partition');

export interface ClusterOverlap {
  siteId: number;
  clusters: string[];
}

export interface PartitionReport {
  overlaps: ClusterOverlap[];
  /** Ids of the universe that belong to no cluster */
  gaps: number[];
  /** Member ids outside the universe */
  outsideUniverse: number[];
}

export interface ClusterPartitionOptions {
  strict?: boolean;
  /** Expected site numbers; defaults to the range spanned by the members */
  universe?: readonly number[];
}

function range(from: number, to: number): number[] {
  return Array.from({ length: Math.max(0, to - from + 1) }, (_, i) => from + i);
}

export class ClusterPartition {
  private readonly clusters: ReadonlyMap<string, readonly number[]>;

  constructor(definition: ClusterDefinition, options: ClusterPartitionOptions = {}) {
    this.clusters = new Map(definition.map(cluster => [cluster.name, [...cluster.siteIds]]));

    const report = this.validate(options.universe);
    if (report.overlaps.length > 0) {
      const ids = report.overlaps.map(overlap => overlap.siteId);
      if (options.strict) throw KpiError.clusterOverlap(ids);
      logger.warn('Sites assigned to more than one cluster', { overlaps: report.overlaps });
    }
    if (report.gaps.length > 0) {
      if (options.strict) throw KpiError.clusterGap(report.gaps);
      logger.warn('Sites without a cluster', { siteIds: report.gaps });
    }
    if (report.outsideUniverse.length > 0) {
      logger.warn('Cluster members outside the known sites', { siteIds: report.outsideUniverse });
    }
  }

  /**
   * Parse an untyped definition (clusters.json or a configured file)
   */
  static fromJson(input: unknown, options: ClusterPartitionOptions = {}): ClusterPartition {
    const parsed = ClusterDefinitionSchema.safeParse(input);
    if (!parsed.success) {
      throw KpiError.invalidInput(`cluster definition: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    }
    return new ClusterPartition(parsed.data, options);
  }

  names(): string[] {
    return [...this.clusters.keys()];
  }

  members(name: string): readonly number[] {
    const members = this.clusters.get(name);
    if (!members) throw KpiError.unknownCluster(name, this.names());
    return members;
  }

  includes(name: string, siteId: SiteId | number): boolean {
    const id = typeof siteId === 'number' ? siteId : siteNumber(siteId);
    return id !== null && this.members(name).includes(id);
  }

  clustersOf(siteId: SiteId | number): string[] {
    const id = typeof siteId === 'number' ? siteId : siteNumber(siteId);
    if (id === null) return [];
    return this.names().filter(name => this.members(name).includes(id));
  }

  definition(): ClusterDefinition {
    return [...this.clusters].map(([name, siteIds]) => ({ name, siteIds: [...siteIds] }));
  }

  validate(universe?: readonly number[]): PartitionReport {
    const owners = new Map<number, string[]>();
    for (const [name, siteIds] of this.clusters) {
      for (const id of new Set(siteIds)) {
        owners.set(id, [...(owners.get(id) ?? []), name]);
      }
    }

    const assigned = [...owners.keys()].sort((a, b) => a - b);
    const expected = universe
      ? [...new Set(universe)].sort((a, b) => a - b)
      : assigned.length > 0
        ? range(assigned[0], assigned[assigned.length - 1])
        : [];
    const expectedSet = new Set(expected);

    return {
      overlaps: assigned
        .map(siteId => ({ siteId, clusters: owners.get(siteId) ?? [] }))
        .filter(overlap => overlap.clusters.length > 1),
      gaps: expected.filter(id => !owners.has(id)),
      outsideUniverse: universe ? assigned.filter(id => !expectedSet.has(id)) : [],
    };
  }
}
