/**
 * Composite KPI formulas.
 *
 * Every KPI is derived from counter sums; callers aggregate first and call
 * {@link calculateKpis} once per group. Values are percentages and are not clamped.
 */

import { RRC_SETUP_REQUEST_COUNTERS, type CounterTotals, type KpiValues } from '@netkpi/shared-contracts';
import type { CounterRow } from '../../domains/entities';
import { safeRatio } from './ratio';

export function availability(c: CounterTotals): number {
  return 100 * safeRatio(c.SAMPLES_CELL_AVAIL, c.DENOM_CELL_AVAIL);
}

/**
 * Product of the four setup stages: RRC, NG initial UE message,
 * logical connection and UE context setup
 */
export function accessibility(c: CounterTotals): number {
  const rrcRequests = RRC_SETUP_REQUEST_COUNTERS.reduce((sum, name) => sum + c[name], 0);

  const rrcSetup = safeRatio(c.NRRCC_RRC_STPSUCC_TOT, rrcRequests);
  const initialUeMessage = safeRatio(
    c.NNGCC_INIT_UE_MSG_SENT,
    c.NRRCC_RRC_STPSUCC_TOT + c.REESTAB_ACC_FALLBACK + c.NRRCC_RRC_RESUME_FALLBACK_SUCC
  );
  const logicalConnection = safeRatio(c.NNGCC_UE_LOGICAL_CONN_ESTAB, c.NNGCC_INIT_UE_MSG_SENT);
  const contextSetup = safeRatio(c.NNGCC_UE_CTXT_STP_RESP_SENT, c.NNGCC_UE_CTXT_STP_REQ_RECD);

  return 100 * rrcSetup * initialUeMessage * logicalConnection * contextSetup;
}

// NG_FLOW_REL = 0 reports 0
function retainability(abnormalReleases: number, totalReleases: number): number {
  const value = 100 - 100 * (abnormalReleases / totalReleases);
  return Number.isFinite(value) ? value : 0;
}

export function retainabilityTechnical(c: CounterTotals): number {
  return retainability(c.NG_FLOW_REL - c.NG_FLOW_REL_NORMAL, c.NG_FLOW_REL);
}

export function retainabilityUser(c: CounterTotals): number {
  return retainability(c.NG_FLOW_REL - c.NG_FLOW_REL_NORMAL - c.NG_FLOW_REL_AMF_UE_LOST, c.NG_FLOW_REL);
}

export function calculateKpis(counters: CounterTotals): KpiValues {
  const technical = retainabilityTechnical(counters);
  const user = retainabilityUser(counters);

  return {
    availability: availability(counters),
    accessibility: accessibility(counters),
    retainabilityTechnical: technical,
    retainabilityUser: user,
    retainabilityAverage: (technical + user) / 2,
  };
}

export function withKpis<R extends CounterRow>(rows: readonly R[]): Array<R & { readonly kpis: KpiValues }> {
  return rows.map(row => ({ ...row, kpis: calculateKpis(row.counters) }));
}
