import type { CounterTotals } from '@netkpi/shared-contracts';
import type { SiteId } from './SiteId';

/** ISO calendar date, `YYYY-MM-DD` */
export type IsoDate = string;

export interface RawCounterRecord {
  readonly date: IsoDate;
  readonly time: string | null;
  readonly siteId: SiteId;
  readonly sector: string | null;
  readonly counters: CounterTotals;
}

export interface RecordFilter {
  from?: IsoDate;
  to?: IsoDate;
  siteIds?: readonly SiteId[];
}
