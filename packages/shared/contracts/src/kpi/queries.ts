import { z } from 'zod';
import { KpiNameSchema } from './kpis.js';

const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date formatted as YYYY-MM-DD')
  .refine(value => {
    const date = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
  }, 'Invalid calendar date');

/** Comma-separated query parameter, e.g. `?sites=7,12` */
const CsvListSchema = z
  .string()
  .transform(value =>
    value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  );

export const KpiQuerySchema = z
  .object({
    from: IsoDateSchema.optional(),
    to: IsoDateSchema.optional(),
    sites: CsvListSchema.optional(),
    siteNames: CsvListSchema.optional(),
    clusters: CsvListSchema.optional(),
    kpi: KpiNameSchema.optional(),
  })
  .refine(query => !query.from || !query.to || query.from <= query.to, {
    message: '`from` must not be after `to`',
    path: ['from'],
  });

export type KpiQuery = z.infer<typeof KpiQuerySchema>;
