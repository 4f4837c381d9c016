import { z } from 'zod';

export const KPI_NAMES = [
  'availability',
  'accessibility',
  'retainabilityTechnical',
  'retainabilityUser',
  'retainabilityAverage',
] as const;

export const KpiNameSchema = z.enum(KPI_NAMES);
export type KpiName = z.infer<typeof KpiNameSchema>;

/** KPI percentages, nominally within [0, 100] and never clamped */
export type KpiValues = Readonly<Record<KpiName, number>>;

export const KPI_LABELS: Readonly<Record<KpiName, string>> = {
  availability: 'Availability',
  accessibility: 'Accessibility',
  retainabilityTechnical: 'Retainability (technical)',
  retainabilityUser: 'Retainability (user)',
  retainabilityAverage: 'Retainability (average)',
};
