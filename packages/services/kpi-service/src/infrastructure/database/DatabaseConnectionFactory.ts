/**
 * kpi-service Database Connection Factory
 *
 * Uses the DatabaseConnectionFactory from platform-core with kpi-service configuration.
 */

import type { SQL } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  createDatabaseConnectionFactory,
  hasDatabaseUrl,
  type DatabaseConnectionFactoryInstance,
} from '@netkpi/platform-core';
import { SERVICE_NAME } from '../../config/service-urls';

/**
 * Loader tables are read by name with raw SQL, since both table names are
 * configurable; no drizzle table schema is registered
 */
export type DatabaseConnection = NodePgDatabase;

export const DATABASE_URL_ENV_VARS = ['KPI_DATABASE_URL', 'DATABASE_URL'] as const;

/**
 * The part of a drizzle database the repositories use for raw reads
 */
export interface SqlExecutor {
  execute(query: SQL): PromiseLike<{ rows: Record<string, unknown>[] }>;
}

let factory: DatabaseConnectionFactoryInstance | null = null;

function getFactory(): DatabaseConnectionFactoryInstance {
  if (!factory) {
    factory = createDatabaseConnectionFactory({
      serviceName: SERVICE_NAME,
      envVarName: DATABASE_URL_ENV_VARS[0],
      fallbackEnvVar: DATABASE_URL_ENV_VARS[1],
    });
  }
  return factory;
}

export function isDatabaseConfigured(): boolean {
  return hasDatabaseUrl(...DATABASE_URL_ENV_VARS);
}

export function getDatabase(): DatabaseConnection {
  return getFactory().getDatabase();
}

export async function closeDatabase(): Promise<void> {
  if (!factory) return;
  await factory.close();
  factory = null;
}
