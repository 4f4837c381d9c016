import {
  DEFAULT_KPI_THRESHOLDS,
  KPI_STATUS,
  type KpiName,
  type KpiStatus,
  type KpiThreshold,
  type KpiThresholds,
  type KpiValues,
} from '@netkpi/shared-contracts';
import type { ClassifiedRow } from '../../domains/entities';

/**
 * Red is checked first: a value below `red` is Red even when it also reaches `green`.
 * NaN falls through both checks and is Yellow.
 */
export function classify(value: number, threshold: KpiThreshold): KpiStatus {
  if (value < threshold.red) return KPI_STATUS.RED;
  if (value >= threshold.green) return KPI_STATUS.GREEN;
  return KPI_STATUS.YELLOW;
}

export interface StatusClassifier {
  classify(kpi: KpiName, value: number): KpiStatus;
  classifyAll(values: KpiValues): Record<KpiName, KpiStatus>;
  classifyRows<R extends { readonly kpis: KpiValues }>(rows: readonly R[], kpi: KpiName): ClassifiedRow<R>[];
  thresholdsFor(kpi: KpiName): KpiThreshold;
}

export function createStatusClassifier(thresholds: KpiThresholds = DEFAULT_KPI_THRESHOLDS): StatusClassifier {
  const classifyKpi = (kpi: KpiName, value: number) => classify(value, thresholds[kpi]);

  return {
    classify: classifyKpi,

    classifyAll: values => ({
      availability: classifyKpi('availability', values.availability),
      accessibility: classifyKpi('accessibility', values.accessibility),
      retainabilityTechnical: classifyKpi('retainabilityTechnical', values.retainabilityTechnical),
      retainabilityUser: classifyKpi('retainabilityUser', values.retainabilityUser),
      retainabilityAverage: classifyKpi('retainabilityAverage', values.retainabilityAverage),
    }),

    classifyRows: (rows, kpi) =>
      rows.map(row => {
        const value = row.kpis[kpi];
        return { ...row, kpi, value, status: classifyKpi(kpi, value) };
      }),

    thresholdsFor: kpi => thresholds[kpi],
  };
}
