/**
 * Read-only snapshot of the counter and site tables, loaded once per process.
 * Concurrent callers share a single in-flight load.
 */

import { createTimer, errorMessage, serializeError } from '@netkpi/platform-core';
import type { RawCounterRecord, SiteRecord } from '../../domains/entities';
import type { ICounterStoreRepository } from '../../domains/repositories/ICounterStoreRepository';
import { getLogger } from '../../config/service-urls';
import { KpiError } from '../errors';

const logger = getLogger('kpi-service:counter-snapshot-store');

export interface CounterSnapshot {
  readonly records: readonly RawCounterRecord[];
  readonly sites: readonly SiteRecord[];
  readonly loadedAt: Date;
}

export type SnapshotState = 'empty' | 'loading' | 'ready' | 'failed';

export interface SnapshotStatus {
  state: SnapshotState;
  loadedAt?: string;
  records?: number;
  sites?: number;
  error?: string;
}

export class CounterSnapshotStore {
  private snapshot: CounterSnapshot | null = null;
  private inFlight: Promise<CounterSnapshot> | null = null;
  private lastError: Error | null = null;

  constructor(private readonly repository: ICounterStoreRepository) {}

  async getSnapshot(): Promise<CounterSnapshot> {
    return this.snapshot ?? this.load();
  }

  /**
   * Replace the snapshot with a fresh read. The previous snapshot keeps
   * serving if the read fails.
   */
  reload(): Promise<CounterSnapshot> {
    return this.load();
  }

  status(): SnapshotStatus {
    if (this.inFlight) return { state: 'loading' };
    if (this.snapshot) {
      return {
        state: 'ready',
        loadedAt: this.snapshot.loadedAt.toISOString(),
        records: this.snapshot.records.length,
        sites: this.snapshot.sites.length,
      };
    }
    if (this.lastError) return { state: 'failed', error: this.lastError.message };
    return { state: 'empty' };
  }

  private load(): Promise<CounterSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.read().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async read(): Promise<CounterSnapshot> {
    const elapsed = createTimer(logger, 'counter snapshot load');
    try {
      const [records, sites] = await Promise.all([this.repository.loadCounters(), this.repository.loadSites()]);
      const snapshot: CounterSnapshot = { records, sites, loadedAt: new Date() };
      this.snapshot = snapshot;
      this.lastError = null;
      logger.info('Counter snapshot loaded', { records: records.length, sites: sites.length, durationMs: elapsed() });
      return snapshot;
    } catch (error) {
      const failure =
        error instanceof KpiError
          ? error
          : KpiError.counterStoreUnavailable(errorMessage(error), error instanceof Error ? error : undefined);
      this.lastError = failure;
      logger.error('Counter snapshot load failed', { error: serializeError(error) });
      throw failure;
    }
  }
}
