import { z } from 'zod';
import type { KpiName } from './kpis.js';

/**
 * Classification bounds for one KPI.
 * Values below `red` are Red, values at or above `green` are Green, everything else Yellow.
 * `green >= red` is expected but not enforced.
 */
export const KpiThresholdSchema = z.object({
  green: z.number().finite(),
  red: z.number().finite(),
});
export type KpiThreshold = z.infer<typeof KpiThresholdSchema>;

export const KpiThresholdsSchema = z.object({
  availability: KpiThresholdSchema,
  accessibility: KpiThresholdSchema,
  retainabilityTechnical: KpiThresholdSchema,
  retainabilityUser: KpiThresholdSchema,
  retainabilityAverage: KpiThresholdSchema,
});
export type KpiThresholds = Readonly<Record<KpiName, KpiThreshold>>;

export const KpiThresholdsOverrideSchema = KpiThresholdsSchema.partial();
export type KpiThresholdsOverride = z.infer<typeof KpiThresholdsOverrideSchema>;

export const DEFAULT_KPI_THRESHOLDS: KpiThresholds = Object.freeze({
  availability: { green: 99.0, red: 90 },
  accessibility: { green: 99.2, red: 90 },
  retainabilityTechnical: { green: 99.0, red: 90 },
  retainabilityUser: { green: 98.8, red: 90 },
  retainabilityAverage: { green: 98.9, red: 90 },
});

/**
 * Merge a partial threshold table over the defaults.
 * Throws a ZodError when the override is malformed.
 */
export function resolveKpiThresholds(override: unknown, base: KpiThresholds = DEFAULT_KPI_THRESHOLDS): KpiThresholds {
  const parsed = KpiThresholdsOverrideSchema.parse(override ?? {});
  return Object.freeze({ ...base, ...parsed });
}
