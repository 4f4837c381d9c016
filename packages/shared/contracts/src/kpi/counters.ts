/**
 * Counter column contracts
 *
 * Raw per-interval counters exported by the network management system, keyed by the
 * vendor column names. Every aggregation sums exactly the required set; the optional
 * set is summed when a load carries it and is never read by a KPI formula.
 */

export const RRC_SETUP_REQUEST_COUNTERS = [
  'NRRCC_RRC_STPREQ_MO_SIGNALLING',
  'NRRCC_RRC_STPREQ_MO_DATA',
  'NRRCC_RRC_STPREQ_MT_ACCESS',
  'NRRCC_RRC_STPREQ_EMERGENCY',
  'NRRCC_RRC_STPREQ_HIPRIO_ACCESS',
  'NRRCC_RRC_STPREQ_MO_VOICECALL',
  'NRRCC_RRC_STPREQ_MO_SMS',
  'NRRCC_RRC_STPREQ_MPS',
  'NRRCC_RRC_STPREQ_MCS',
  'NRRCC_RRC_STPREQ_MO_VIDEOCAL',
] as const;

export const REQUIRED_COUNTERS = [
  'DENOM_CELL_AVAIL',
  'SAMPLES_CELL_AVAIL',
  'NG_FLOW_REL_AMF_UE_LOST',
  'NG_FLOW_REL_NORMAL',
  'NG_FLOW_REL',
  'REESTAB_ACC_FALLBACK',
  ...RRC_SETUP_REQUEST_COUNTERS,
  'NRRCC_RRC_STPSUCC_TOT',
  'NRRCC_RRC_RESUME_FALLBACK_SUCC',
  'NNGCC_INIT_UE_MSG_SENT',
  'NNGCC_UE_LOGICAL_CONN_ESTAB',
  'NNGCC_UE_CTXT_STP_REQ_RECD',
  'NNGCC_UE_CTXT_STP_RESP_SENT',
] as const;

export const OPTIONAL_COUNTERS = ['NG_FLOW_REL_AMF_OTHER', 'NG_FLOW_REL_AMF_OTHER_5QI1'] as const;

export type RrcSetupRequestCounter = (typeof RRC_SETUP_REQUEST_COUNTERS)[number];
export type RequiredCounter = (typeof REQUIRED_COUNTERS)[number];
export type OptionalCounter = (typeof OPTIONAL_COUNTERS)[number];
export type CounterName = RequiredCounter | OptionalCounter;

/** Summed (or single-interval) counter values; optional counters appear only when loaded */
export type CounterTotals = Readonly<Record<RequiredCounter, number>> &
  Readonly<Partial<Record<OptionalCounter, number>>>;

export const ZERO_COUNTER_TOTALS: Readonly<Record<RequiredCounter, number>> = Object.freeze({
  DENOM_CELL_AVAIL: 0,
  SAMPLES_CELL_AVAIL: 0,
  NG_FLOW_REL_AMF_UE_LOST: 0,
  NG_FLOW_REL_NORMAL: 0,
  NG_FLOW_REL: 0,
  REESTAB_ACC_FALLBACK: 0,
  NRRCC_RRC_STPREQ_MO_SIGNALLING: 0,
  NRRCC_RRC_STPREQ_MO_DATA: 0,
  NRRCC_RRC_STPREQ_MT_ACCESS: 0,
  NRRCC_RRC_STPREQ_EMERGENCY: 0,
  NRRCC_RRC_STPREQ_HIPRIO_ACCESS: 0,
  NRRCC_RRC_STPREQ_MO_VOICECALL: 0,
  NRRCC_RRC_STPREQ_MO_SMS: 0,
  NRRCC_RRC_STPREQ_MPS: 0,
  NRRCC_RRC_STPREQ_MCS: 0,
  NRRCC_RRC_STPREQ_MO_VIDEOCAL: 0,
  NRRCC_RRC_STPSUCC_TOT: 0,
  NRRCC_RRC_RESUME_FALLBACK_SUCC: 0,
  NNGCC_INIT_UE_MSG_SENT: 0,
  NNGCC_UE_LOGICAL_CONN_ESTAB: 0,
  NNGCC_UE_CTXT_STP_REQ_RECD: 0,
  NNGCC_UE_CTXT_STP_RESP_SENT: 0,
});

/** Identifying columns of the raw counter table */
export const COUNTER_KEY_COLUMNS = {
  date: 'Date',
  time: 'Hora',
  siteId: 'Site Id',
  sector: 'Sector',
} as const;

/** Columns of the site directory table; `ID` is accepted in place of `Site_id` */
export const SITE_COLUMNS = {
  siteId: 'Site_id',
  siteIdAlias: 'ID',
  name: 'Nombre',
  latitude: 'Latitud',
  longitude: 'Longitud',
} as const;
