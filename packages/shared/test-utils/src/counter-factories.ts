import { ZERO_COUNTER_TOTALS, type CounterTotals } from '@netkpi/shared-contracts';

/**
 * Counter totals with every required counter at zero, then the overrides applied
 */
export function createMockCounterTotals(overrides: Partial<CounterTotals> = {}): CounterTotals {
  return { ...ZERO_COUNTER_TOTALS, ...overrides };
}

/**
 * An untyped counter row as the loader writes it to `kpi_data`
 */
export function createMockCounterRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    Date: '01/01/2024',
    Hora: '00:00',
    'Site Id': 12,
    Sector: 'A',
    ...ZERO_COUNTER_TOTALS,
    ...overrides,
  };
}

/**
 * An untyped site directory row as the loader writes it to `site_data`
 */
export function createMockSiteRow(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    Site_id: 12,
    Nombre: 'Test Site',
    Latitud: 9.93,
    Longitud: -84.08,
    ...overrides,
  };
}
