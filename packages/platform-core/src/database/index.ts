/**
 * Database Module
 *
 * Centralized database connection management for all services.
 */

export {
  createDatabaseConnectionFactory,
  getSslConfig,
  appendStatementTimeout,
  type DatabaseConfig,
  type DatabaseConnectionFactoryInstance,
  type SQLConnection,
} from './DatabaseConnectionFactory.js';
