import type { RawCounterRecord, SiteRecord } from '../../domains/entities';
import type { ICounterStoreRepository } from '../../domains/repositories/ICounterStoreRepository';

/**
 * Counter store held in memory; used when no database is configured outside
 * production, and by tests
 */
export class InMemoryCounterStoreRepository implements ICounterStoreRepository {
  constructor(
    private records: RawCounterRecord[] = [],
    private sites: SiteRecord[] = []
  ) {}

  async loadCounters(): Promise<RawCounterRecord[]> {
    return [...this.records];
  }

  async loadSites(): Promise<SiteRecord[]> {
    return [...this.sites];
  }

  replace(records: RawCounterRecord[], sites: SiteRecord[] = this.sites): void {
    this.records = records;
    this.sites = sites;
  }
}
