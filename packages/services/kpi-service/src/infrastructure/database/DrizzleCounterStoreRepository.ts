/**
 * DrizzleCounterStoreRepository
 * Reads the loader's counter and site tables in full; rows go through the
 * record mapper before reaching the engine.
 */

import { sql } from 'drizzle-orm';
import { errorMessage } from '@netkpi/platform-core';
import type { RawCounterRecord, SiteRecord } from '../../domains/entities';
import type { ICounterStoreRepository } from '../../domains/repositories/ICounterStoreRepository';
import { toCounterRecords, toSiteRecords } from '../../application/kpi';
import { KpiError } from '../../application/errors';
import { getLogger } from '../../config/service-urls';
import type { SqlExecutor } from './DatabaseConnectionFactory';

const logger = getLogger('kpi-service:drizzle-counter-store-repository');

export interface CounterStoreTables {
  counterTable: string;
  siteTable: string;
}

export class DrizzleCounterStoreRepository implements ICounterStoreRepository {
  constructor(
    private readonly db: SqlExecutor,
    private readonly tables: CounterStoreTables = { counterTable: 'kpi_data', siteTable: 'site_data' }
  ) {}

  async loadCounters(): Promise<RawCounterRecord[]> {
    const rows = await this.readTable(this.tables.counterTable, 'loadCounters');
    return toCounterRecords(rows, this.tables.counterTable);
  }

  async loadSites(): Promise<SiteRecord[]> {
    const rows = await this.readTable(this.tables.siteTable, 'loadSites');
    return toSiteRecords(rows, this.tables.siteTable);
  }

  private async readTable(table: string, operation: string): Promise<Record<string, unknown>[]> {
    try {
      const result = await this.db.execute(sql`select * from ${sql.identifier(table)}`);
      logger.debug('Table read', { operation, table, rows: result.rows.length });
      return result.rows;
    } catch (error) {
      logger.error('Failed to read table', { operation, table, error: errorMessage(error) });
      throw KpiError.counterStoreUnavailable(
        `failed to read ${table}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}
