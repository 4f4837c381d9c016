/**
 * Ingestion boundary between the loader's tables and the engine.
 *
 * Rows arrive untyped (database driver or spreadsheet export); they are checked
 * for the required columns, counters are coerced to numbers and site ids are
 * canonicalised.
 */

import { z } from 'zod';
import {
  COUNTER_KEY_COLUMNS,
  OPTIONAL_COUNTERS,
  REQUIRED_COUNTERS,
  SITE_COLUMNS,
  ZERO_COUNTER_TOTALS,
  type OptionalCounter,
  type RequiredCounter,
} from '@netkpi/shared-contracts';
import { toSiteId, type IsoDate, type RawCounterRecord, type SiteId, type SiteRecord } from '../../domains/entities';
import { getLogger } from '../../config/service-urls';
import { KpiError } from '../errors';

const logger = getLogger('kpi-service:counter-record-mapper');

export type UntypedRow = Readonly<Record<string, unknown>>;

const UntypedRowsSchema = z.array(z.record(z.unknown()));

const CounterValueSchema = z.preprocess(value => {
  if (value === null || value === undefined || value === '') return 0;
  if (typeof value === 'string' || typeof value === 'bigint') return Number(value);
  return value;
}, z.number().finite());

const CoordinateSchema = z.preprocess(
  value => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number().finite()
);

const DAY_FIRST_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s.*)?$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T\s].*)?$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function calendarDate(year: number, month: number, day: number): IsoDate | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * `dd/mm/yyyy` (optionally followed by a time), ISO `yyyy-mm-dd`, or a Date.
 * Anything else is null.
 */
export function parseRecordDate(value: unknown): IsoDate | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return calendarDate(value.getFullYear(), value.getMonth() + 1, value.getDate());
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  const dayFirst = DAY_FIRST_DATE.exec(text);
  if (dayFirst) {
    return calendarDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }
  const iso = ISO_DATE.exec(text);
  if (iso) {
    return calendarDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }
  return null;
}

function optionalText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const text = value instanceof Date ? value.toISOString().slice(11, 19) : String(value).trim();
  return text === '' ? null : text;
}

function parseRows(rows: unknown, table: string): UntypedRow[] {
  const parsed = UntypedRowsSchema.safeParse(rows);
  if (!parsed.success) {
    throw KpiError.invalidCounterData('rows must be objects', table);
  }
  return parsed.data;
}

function columnsOf(rows: readonly UntypedRow[]): Set<string> {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return columns;
}

function readCounter(row: UntypedRow, name: string, rowIndex: number, table: string): number {
  const parsed = CounterValueSchema.safeParse(row[name]);
  if (!parsed.success) {
    throw KpiError.invalidCounterData(`row ${rowIndex}: ${name} is not numeric (${String(row[name])})`, table, {
      row: rowIndex,
      column: name,
    });
  }
  return parsed.data;
}

function tryToSiteId(value: unknown): SiteId | null {
  if (value === null || value === undefined) return null;
  try {
    return toSiteId(value);
  } catch (error) {
    logger.debug('Unusable site id', { value: String(value), error: error instanceof Error ? error.message : error });
    return null;
  }
}

/**
 * Raw counter rows to records. Fails with MISSING_COLUMN when a key column or a
 * required counter is absent; null counters count as 0; rows with an unparseable
 * date or site id are dropped.
 */
export function toCounterRecords(rows: unknown, table = 'kpi_data'): RawCounterRecord[] {
  const untyped = parseRows(rows, table);
  if (untyped.length === 0) return [];

  const columns = columnsOf(untyped);
  const missing = [COUNTER_KEY_COLUMNS.date, COUNTER_KEY_COLUMNS.siteId, ...REQUIRED_COUNTERS].filter(
    column => !columns.has(column)
  );
  if (missing.length > 0) throw KpiError.missingColumn(missing, table);

  const optionalPresent = OPTIONAL_COUNTERS.filter(name => columns.has(name));
  const records: RawCounterRecord[] = [];
  let dropped = 0;

  untyped.forEach((row, index) => {
    const date = parseRecordDate(row[COUNTER_KEY_COLUMNS.date]);
    const siteId = tryToSiteId(row[COUNTER_KEY_COLUMNS.siteId]);
    if (!date || !siteId) {
      dropped++;
      return;
    }

    const counters: Record<RequiredCounter, number> & Partial<Record<OptionalCounter, number>> = {
      ...ZERO_COUNTER_TOTALS,
    };
    for (const name of REQUIRED_COUNTERS) counters[name] = readCounter(row, name, index, table);
    for (const name of optionalPresent) counters[name] = readCounter(row, name, index, table);

    records.push({
      date,
      time: optionalText(row[COUNTER_KEY_COLUMNS.time]),
      siteId,
      sector: optionalText(row[COUNTER_KEY_COLUMNS.sector]),
      counters: Object.freeze(counters),
    });
  });

  if (dropped > 0) {
    logger.debug('Dropped counter rows without a usable date or site id', { table, dropped, kept: records.length });
  }
  return records;
}

function readCoordinate(value: unknown): number | null {
  const parsed = CoordinateSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/**
 * Site table rows to records. `ID` is accepted in place of `Site_id`;
 * non-numeric coordinates become null.
 */
export function toSiteRecords(rows: unknown, table = 'site_data'): SiteRecord[] {
  const untyped = parseRows(rows, table);
  if (untyped.length === 0) return [];

  const columns = columnsOf(untyped);
  const idColumn = columns.has(SITE_COLUMNS.siteId)
    ? SITE_COLUMNS.siteId
    : columns.has(SITE_COLUMNS.siteIdAlias)
      ? SITE_COLUMNS.siteIdAlias
      : null;

  const missing = [
    ...(idColumn ? [] : [SITE_COLUMNS.siteId]),
    ...(columns.has(SITE_COLUMNS.name) ? [] : [SITE_COLUMNS.name]),
  ];
  if (!idColumn || missing.length > 0) throw KpiError.missingColumn(missing, table);

  const sites: SiteRecord[] = [];
  for (const row of untyped) {
    const siteId = tryToSiteId(row[idColumn]);
    if (!siteId) {
      logger.warn('Skipping site row without a usable id', { table, value: String(row[idColumn]) });
      continue;
    }
    sites.push({
      siteId,
      name: optionalText(row[SITE_COLUMNS.name]) ?? '',
      latitude: readCoordinate(row[SITE_COLUMNS.latitude]),
      longitude: readCoordinate(row[SITE_COLUMNS.longitude]),
    });
  }
  return sites;
}
