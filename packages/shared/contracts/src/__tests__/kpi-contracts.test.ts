/**
 * Unit tests for the KPI contracts: counter lists, thresholds and query parsing
 */

import { describe, it, expect } from 'vitest';
import {
  REQUIRED_COUNTERS,
  OPTIONAL_COUNTERS,
  RRC_SETUP_REQUEST_COUNTERS,
  ZERO_COUNTER_TOTALS,
  DEFAULT_KPI_THRESHOLDS,
  resolveKpiThresholds,
  KpiQuerySchema,
  KPI_STATUS_ORDER,
  KPI_STATUS_LABELS_ES,
} from '../kpi/index.js';

describe('counter contracts', () => {
  it('should list 22 distinct required counters', () => {
    expect(REQUIRED_COUNTERS).toHaveLength(22);
    expect(new Set(REQUIRED_COUNTERS).size).toBe(22);
  });

  it('should start zero totals from exactly the required counters', () => {
    expect(Object.keys(ZERO_COUNTER_TOTALS).sort()).toEqual([...REQUIRED_COUNTERS].sort());
    expect(Object.values(ZERO_COUNTER_TOTALS).every(value => value === 0)).toBe(true);
  });

  it('should include every setup request cause among the required counters', () => {
    expect(RRC_SETUP_REQUEST_COUNTERS).toHaveLength(10);
    for (const counter of RRC_SETUP_REQUEST_COUNTERS) {
      expect(REQUIRED_COUNTERS).toContain(counter);
    }
  });

  it('should keep optional counters out of the required set', () => {
    for (const counter of OPTIONAL_COUNTERS) {
      expect(REQUIRED_COUNTERS).not.toContain(counter);
    }
  });
});

describe('thresholds', () => {
  it('should ship the default bounds per KPI', () => {
    expect(DEFAULT_KPI_THRESHOLDS.availability).toEqual({ green: 99.0, red: 90 });
    expect(DEFAULT_KPI_THRESHOLDS.accessibility).toEqual({ green: 99.2, red: 90 });
    expect(DEFAULT_KPI_THRESHOLDS.retainabilityAverage).toEqual({ green: 98.9, red: 90 });
    expect(DEFAULT_KPI_THRESHOLDS.retainabilityTechnical).toEqual({ green: 99.0, red: 90 });
    expect(DEFAULT_KPI_THRESHOLDS.retainabilityUser).toEqual({ green: 98.8, red: 90 });
  });

  it('should merge a partial override over the defaults', () => {
    const thresholds = resolveKpiThresholds({ availability: { green: 97, red: 85 } });

    expect(thresholds.availability).toEqual({ green: 97, red: 85 });
    expect(thresholds.accessibility).toEqual(DEFAULT_KPI_THRESHOLDS.accessibility);
  });

  it('should return the defaults when no override is given', () => {
    expect(resolveKpiThresholds(undefined)).toEqual(DEFAULT_KPI_THRESHOLDS);
  });

  it('should reject a malformed override', () => {
    expect(() => resolveKpiThresholds({ availability: { green: 'high', red: 90 } })).toThrow();
  });
});

describe('KpiQuerySchema', () => {
  it('should split comma-separated lists', () => {
    const query = KpiQuerySchema.parse({ sites: '7, 12,,', clusters: 'Alajuela' });

    expect(query.sites).toEqual(['7', '12']);
    expect(query.clusters).toEqual(['Alajuela']);
  });

  it('should accept an inclusive date range', () => {
    const result = KpiQuerySchema.safeParse({ from: '2024-01-01', to: '2024-01-01' });

    expect(result.success).toBe(true);
  });

  it('should reject a range whose start is after its end', () => {
    const result = KpiQuerySchema.safeParse({ from: '2024-01-02', to: '2024-01-01' });

    expect(result.success).toBe(false);
  });

  it('should reject dates in other formats', () => {
    expect(KpiQuerySchema.safeParse({ from: '01/01/2024' }).success).toBe(false);
  });

  it('should reject days that do not exist in the calendar', () => {
    expect(KpiQuerySchema.safeParse({ from: '2024-02-31' }).success).toBe(false);
    expect(KpiQuerySchema.safeParse({ to: '2023-02-29' }).success).toBe(false);
    expect(KpiQuerySchema.safeParse({ from: '2024-02-29' }).success).toBe(true);
  });

  it('should reject an unknown KPI name', () => {
    expect(KpiQuerySchema.safeParse({ kpi: 'throughput' }).success).toBe(false);
    expect(KpiQuerySchema.safeParse({ kpi: 'availability' }).success).toBe(true);
  });
});

describe('status contracts', () => {
  it('should order categories red first', () => {
    expect(KPI_STATUS_ORDER).toEqual(['Red', 'Yellow', 'Green']);
    expect(KPI_STATUS_LABELS_ES.Yellow).toBe('Amarillo');
  });
});
