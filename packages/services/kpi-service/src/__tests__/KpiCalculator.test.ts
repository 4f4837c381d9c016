import { describe, it, expect } from 'vitest';
import { createMockCounterTotals } from '@netkpi/test-utils';
import {
  accessibility,
  availability,
  calculateKpis,
  retainabilityTechnical,
  retainabilityUser,
  withKpis,
} from '../application/kpi/KpiCalculator';

describe('KpiCalculator', () => {
  describe('availability', () => {
    it('should be the sample share of the denominator', () => {
      expect(availability(createMockCounterTotals({ SAMPLES_CELL_AVAIL: 950, DENOM_CELL_AVAIL: 1000 }))).toBe(95);
    });

    it('should be 0 without a denominator', () => {
      expect(availability(createMockCounterTotals({ SAMPLES_CELL_AVAIL: 10 }))).toBe(0);
    });
  });

  describe('accessibility', () => {
    it('should multiply the four setup stages', () => {
      const counters = createMockCounterTotals({
        NRRCC_RRC_STPREQ_MO_DATA: 60,
        NRRCC_RRC_STPREQ_MO_SIGNALLING: 30,
        NRRCC_RRC_STPREQ_MT_ACCESS: 10,
        NRRCC_RRC_STPSUCC_TOT: 90,
        REESTAB_ACC_FALLBACK: 5,
        NRRCC_RRC_RESUME_FALLBACK_SUCC: 5,
        NNGCC_INIT_UE_MSG_SENT: 80,
        NNGCC_UE_LOGICAL_CONN_ESTAB: 80,
        NNGCC_UE_CTXT_STP_REQ_RECD: 80,
        NNGCC_UE_CTXT_STP_RESP_SENT: 60,
      });

      // 0.9 * 0.8 * 1 * 0.75
      expect(accessibility(counters)).toBeCloseTo(54, 10);
    });

    it('should be 0 when any stage has no attempts', () => {
      const counters = createMockCounterTotals({
        NRRCC_RRC_STPREQ_MO_DATA: 100,
        NRRCC_RRC_STPSUCC_TOT: 100,
        NNGCC_INIT_UE_MSG_SENT: 100,
        NNGCC_UE_LOGICAL_CONN_ESTAB: 100,
      });

      expect(accessibility(counters)).toBe(0);
    });
  });

  describe('retainability', () => {
    const counters = createMockCounterTotals({
      NG_FLOW_REL: 1000,
      NG_FLOW_REL_NORMAL: 980,
      NG_FLOW_REL_AMF_UE_LOST: 10,
    });

    it('should count every non-normal release as technical loss', () => {
      expect(retainabilityTechnical(counters)).toBeCloseTo(98, 10);
    });

    it('should exclude UE-lost releases from user loss', () => {
      expect(retainabilityUser(counters)).toBeCloseTo(99, 10);
    });

    it('should be 0 when there are no releases', () => {
      const none = createMockCounterTotals();
      expect(retainabilityTechnical(none)).toBe(0);
      expect(retainabilityUser(none)).toBe(0);
    });

    it('should be 0 when normal releases exist without a release total', () => {
      expect(retainabilityTechnical(createMockCounterTotals({ NG_FLOW_REL_NORMAL: 5 }))).toBe(0);
    });

    it('should not clamp values above 100', () => {
      const odd = createMockCounterTotals({ NG_FLOW_REL: 100, NG_FLOW_REL_NORMAL: 120 });
      expect(retainabilityTechnical(odd)).toBeCloseTo(120, 10);
    });
  });

  describe('calculateKpis', () => {
    it('should average technical and user retainability', () => {
      const kpis = calculateKpis(
        createMockCounterTotals({ NG_FLOW_REL: 400, NG_FLOW_REL_NORMAL: 370, NG_FLOW_REL_AMF_UE_LOST: 20 })
      );

      expect(kpis.retainabilityAverage).toBe((kpis.retainabilityTechnical + kpis.retainabilityUser) / 2);
    });

    it('should report retainability 0 when NG_FLOW_REL is 0', () => {
      const kpis = calculateKpis(createMockCounterTotals({ SAMPLES_CELL_AVAIL: 5, DENOM_CELL_AVAIL: 10 }));

      expect(kpis).toEqual({
        availability: 50,
        accessibility: 0,
        retainabilityTechnical: 0,
        retainabilityUser: 0,
        retainabilityAverage: 0,
      });
    });
  });

  describe('withKpis', () => {
    it('should attach KPIs and keep the other fields', () => {
      const rows = withKpis([
        { label: 'a', counters: createMockCounterTotals({ SAMPLES_CELL_AVAIL: 1, DENOM_CELL_AVAIL: 4 }) },
      ]);

      expect(rows).toHaveLength(1);
      expect(rows[0].label).toBe('a');
      expect(rows[0].kpis.availability).toBe(25);
    });
  });
});
