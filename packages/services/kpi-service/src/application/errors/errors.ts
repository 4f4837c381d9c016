import { DomainErrorCode, createDomainServiceError } from '@netkpi/platform-core';

const KpiDomainCodes = {
  MISSING_COLUMN: 'MISSING_COLUMN',
  INVALID_COUNTER_DATA: 'INVALID_COUNTER_DATA',
  UNKNOWN_CLUSTER: 'UNKNOWN_CLUSTER',
  INVALID_SITE_ID: 'INVALID_SITE_ID',
  INVALID_INPUT: 'INVALID_INPUT',
  CLUSTER_OVERLAP: 'CLUSTER_OVERLAP',
  CLUSTER_GAP: 'CLUSTER_GAP',
  COUNTER_STORE_UNAVAILABLE: 'COUNTER_STORE_UNAVAILABLE',
} as const;

export const KpiErrorCode = { ...DomainErrorCode, ...KpiDomainCodes } as const;
export type KpiErrorCodeType = (typeof KpiErrorCode)[keyof typeof KpiErrorCode];

const KpiErrorBase = createDomainServiceError('Kpi', KpiErrorCode);

export class KpiError extends KpiErrorBase {
  static missingColumn(columns: readonly string[], table: string) {
    return new KpiError(
      `Missing required column(s) in ${table}: ${columns.join(', ')}`,
      500,
      KpiErrorCode.MISSING_COLUMN,
      undefined,
      { table, columns: [...columns] }
    );
  }

  static invalidCounterData(reason: string, table: string, details?: Record<string, unknown>) {
    return new KpiError(`Invalid data in ${table}: ${reason}`, 500, KpiErrorCode.INVALID_COUNTER_DATA, undefined, {
      table,
      ...details,
    });
  }

  static unknownCluster(name: string, known: readonly string[]) {
    return new KpiError(`Unknown cluster: ${name}`, 404, KpiErrorCode.UNKNOWN_CLUSTER, undefined, {
      cluster: name,
      known: [...known],
    });
  }

  static invalidSiteId(value: unknown) {
    return new KpiError(`Invalid site id: ${String(value)}`, 400, KpiErrorCode.INVALID_SITE_ID);
  }

  static invalidInput(reason: string) {
    return new KpiError(`Invalid input: ${reason}`, 400, KpiErrorCode.INVALID_INPUT);
  }

  static clusterOverlap(siteIds: readonly number[]) {
    return new KpiError(
      `Cluster definition assigns site(s) to more than one cluster: ${siteIds.join(', ')}`,
      500,
      KpiErrorCode.CLUSTER_OVERLAP,
      undefined,
      { siteIds: [...siteIds] }
    );
  }

  static clusterGap(siteIds: readonly number[]) {
    return new KpiError(
      `Cluster definition leaves site(s) without a cluster: ${siteIds.join(', ')}`,
      500,
      KpiErrorCode.CLUSTER_GAP,
      undefined,
      { siteIds: [...siteIds] }
    );
  }

  static counterStoreUnavailable(reason: string, cause?: Error) {
    return new KpiError(`Counter store unavailable: ${reason}`, 503, KpiErrorCode.COUNTER_STORE_UNAVAILABLE, cause);
  }
}
