/**
 * Database Configuration Utilities
 */

import { getFirstConfig } from './environment-config.js';

/**
 * Whether any of the variables carries a connection string, service-specific names first
 */
export function hasDatabaseUrl(...envVarNames: string[]): boolean {
  return getFirstConfig(...(envVarNames.length > 0 ? envVarNames : ['DATABASE_URL'])) !== undefined;
}
