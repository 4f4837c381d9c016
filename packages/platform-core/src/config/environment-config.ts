/**
 * Environment Configuration Utilities
 *
 * Environment variable validation and typed lookups with defaults.
 */

import { getLogger } from '../logging/logger.js';
import { DomainError, errorMessage } from '../error-handling/errors.js';

const logger = getLogger('environment-config');

export interface EnvVarConfig {
  name: string;
  required: boolean;
  description: string;
  sensitive?: boolean;
}

/**
 * Validate environment using structured configuration
 */
export function validateEnvironmentConfig(configs: EnvVarConfig[]): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const config of configs) {
    const value = process.env[config.name];

    if (config.required && !value) {
      errors.push(`Missing required: ${config.name} - ${config.description}`);
    } else if (!config.required && !value) {
      warnings.push(`Optional not set: ${config.name} - ${config.description}`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Fail fast at service startup: throws in production, logs in development.
 */
export function failFastValidation(serviceName: string, configs: EnvVarConfig[]): void {
  const result = validateEnvironmentConfig(configs);

  if (result.warnings.length > 0) {
    logger.debug('Optional env vars not configured', { serviceName, warnings: result.warnings });
  }

  if (result.valid) return;

  if (isProduction() || process.env.STRICT_ENV_VALIDATION === 'true') {
    throw new DomainError(
      `Environment validation failed for ${serviceName}:\n${result.errors.map(e => `  - ${e}`).join('\n')}`,
      500
    );
  }

  logger.warn('Development mode - missing env vars (would fail in production)', {
    serviceName,
    missing: result.errors,
  });
}

/**
 * Check if running in production environment
 */
export function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

/**
 * First non-empty value among several environment variables
 */
export function getFirstConfig(...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = process.env[key];
    if (value !== undefined && value !== '') return value;
  }
  return undefined;
}

/**
 * Get configuration with type safety and defaults.
 * A custom parser that throws turns into a startup error naming the variable.
 */
export function getConfig(key: string, defaultValue: string): string;
export function getConfig(key: string, defaultValue: number): number;
export function getConfig(key: string, defaultValue: boolean): boolean;
export function getConfig<T>(key: string, defaultValue: T, parser: (value: string) => T): T;
export function getConfig(
  key: string,
  defaultValue: unknown,
  parser?: (value: string) => unknown
): unknown {
  const value = process.env[key];

  if (value === undefined || value === '') {
    return defaultValue;
  }

  if (parser) {
    try {
      return parser(value);
    } catch (error) {
      throw new DomainError(
        `Invalid value for environment variable ${key}: ${errorMessage(error)}`,
        500,
        error instanceof Error ? error : undefined
      );
    }
  }

  if (typeof defaultValue === 'boolean') {
    return value.toLowerCase() === 'true';
  }

  if (typeof defaultValue === 'number') {
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  return value;
}
