/**
 * Centralized Database Connection Factory
 *
 * Consistent PostgreSQL connection management for every service.
 * Each service creates its own factory instance with service-specific configuration.
 *
 * @example
 * import { createDatabaseConnectionFactory } from '@netkpi/platform-core';
 *
 * const { getDatabase } = createDatabaseConnectionFactory({
 *   serviceName: 'kpi-service',
 *   envVarName: 'KPI_DATABASE_URL',
 * });
 */

import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { createLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import { DomainError, DomainErrorCode, ErrorHandlerManager } from '../error-handling/errors.js';
import { getConfig } from '../config/environment-config.js';

export type SQLConnection = Pool;

export interface DatabaseConfig {
  serviceName: string;
  envVarName?: string;
  fallbackEnvVar?: string;
}

export interface DatabaseConnectionFactoryInstance {
  getDatabase: () => NodePgDatabase;
  close: () => Promise<void>;
}

const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '::1']);

export function getSslConfig(connStr: string): false | { rejectUnauthorized: boolean } {
  if (process.env.DATABASE_SSL === 'false') {
    return false;
  }
  if (!URL.canParse(connStr)) {
    return { rejectUnauthorized: false };
  }
  const url = new URL(connStr);
  if (LOCAL_HOSTS.has(url.hostname) || url.searchParams.get('sslmode') === 'disable') {
    return false;
  }
  return { rejectUnauthorized: false };
}

export function appendStatementTimeout(connStr: string, statementTimeoutMs: number): string {
  if (connStr.includes('statement_timeout=')) {
    return connStr;
  }
  return connStr + (connStr.includes('?') ? '&' : '?') + `statement_timeout=${statementTimeoutMs}`;
}

class DatabaseConnectionFactoryClass {
  private sqlConnection: SQLConnection | null = null;
  private dbConnection: NodePgDatabase | null = null;
  private readonly envVarName: string;
  private readonly fallbackEnvVar: string;
  private readonly logger;

  constructor(private readonly config: DatabaseConfig) {
    this.envVarName = config.envVarName || 'DATABASE_URL';
    this.fallbackEnvVar = config.fallbackEnvVar || 'DATABASE_URL';
    this.logger = createLogger(`${config.serviceName}-database`);
  }

  private getConnectionString(): string {
    const { serviceName } = this.config;
    const connectionString = process.env[this.envVarName] || process.env[this.fallbackEnvVar];

    if (!connectionString) {
      this.logger.error('Database URL not configured', {
        serviceName,
        requiredEnvVar: `${this.envVarName} or ${this.fallbackEnvVar}`,
      });
      throw new DomainError(
        `${this.envVarName} or ${this.fallbackEnvVar} environment variable is required for ${serviceName}`,
        503,
        undefined,
        DomainErrorCode.SERVICE_UNAVAILABLE
      );
    }

    return appendStatementTimeout(connectionString, getConfig('STATEMENT_TIMEOUT_MS', 30000));
  }

  private createPool(connStr: string): Pool {
    const pool = new Pool({
      connectionString: connStr,
      max: getConfig('DATABASE_POOL_MAX', process.env.NODE_ENV === 'production' ? 20 : 5),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      ssl: getSslConfig(connStr),
    });
    pool.on('error', error => {
      this.logger.error('Idle database client error', {
        serviceName: this.config.serviceName,
        error: serializeError(error),
      });
    });
    return pool;
  }

  public getSQLConnection(): SQLConnection {
    if (!this.sqlConnection) {
      this.sqlConnection = this.createPool(this.getConnectionString());
      this.logger.debug('SQL connection pool established', { serviceName: this.config.serviceName });
    }
    return this.sqlConnection;
  }

  public getDatabase(): NodePgDatabase {
    if (!this.dbConnection) {
      this.dbConnection = drizzle(this.getSQLConnection());
      this.logger.debug('Drizzle database connection established');
    }
    return this.dbConnection;
  }

  public async close(): Promise<void> {
    const pool = this.sqlConnection;
    this.sqlConnection = null;
    this.dbConnection = null;
    if (!pool) return;

    this.logger.info('Closing database connections', { serviceName: this.config.serviceName });
    await pool.end();
  }
}

export function createDatabaseConnectionFactory(config: DatabaseConfig): DatabaseConnectionFactoryInstance {
  const instance = new DatabaseConnectionFactoryClass(config);
  const close = () => instance.close();

  ErrorHandlerManager.getInstance().registerShutdownHook(close);

  return {
    getDatabase: () => instance.getDatabase(),
    close,
  };
}
