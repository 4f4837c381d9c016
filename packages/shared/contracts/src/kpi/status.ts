export const KPI_STATUS = {
  RED: 'Red',
  YELLOW: 'Yellow',
  GREEN: 'Green',
} as const;

export type KpiStatus = (typeof KPI_STATUS)[keyof typeof KPI_STATUS];

/** Category order for legends and stacked charts */
export const KPI_STATUS_ORDER: readonly KpiStatus[] = [KPI_STATUS.RED, KPI_STATUS.YELLOW, KPI_STATUS.GREEN];

export const KPI_STATUS_COLORS: Readonly<Record<KpiStatus, string>> = {
  Red: '#FF0000',
  Yellow: '#FFFF00',
  Green: '#00FF00',
};

/** Display labels used by the dashboards */
export const KPI_STATUS_LABELS_ES: Readonly<Record<KpiStatus, string>> = {
  Red: 'Rojo',
  Yellow: 'Amarillo',
  Green: 'Verde',
};
