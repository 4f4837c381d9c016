import type { RawCounterRecord, SiteRecord } from '../entities';

export interface ICounterStoreRepository {
  loadCounters(): Promise<RawCounterRecord[]>;
  loadSites(): Promise<SiteRecord[]>;
}
