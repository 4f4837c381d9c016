import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getConfig, getFirstConfig, validateEnvironmentConfig } from '../config/environment-config';
import { hasDatabaseUrl } from '../config/database-config';

const KEYS = ['TEST_STRING', 'TEST_NUMBER', 'TEST_FLAG', 'TEST_JSON', 'TEST_PRIMARY_URL', 'TEST_FALLBACK_URL'];

describe('environment config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      if (saved[key] === undefined) delete process.env[key];
      else process.env[key] = saved[key];
    }
  });

  it('should fall back to defaults when unset', () => {
    expect(getConfig('TEST_STRING', 'kpi_data')).toBe('kpi_data');
    expect(getConfig('TEST_NUMBER', 3020)).toBe(3020);
    expect(getConfig('TEST_FLAG', false)).toBe(false);
  });

  it('should parse numbers and booleans by the default type', () => {
    process.env.TEST_NUMBER = '8080';
    process.env.TEST_FLAG = 'TRUE';

    expect(getConfig('TEST_NUMBER', 3020)).toBe(8080);
    expect(getConfig('TEST_FLAG', false)).toBe(true);
  });

  it('should keep the default for unparseable numbers', () => {
    process.env.TEST_NUMBER = 'many';
    expect(getConfig('TEST_NUMBER', 5)).toBe(5);
  });

  it('should run a custom parser', () => {
    process.env.TEST_JSON = '{"a":1}';
    expect(getConfig('TEST_JSON', {}, value => JSON.parse(value))).toEqual({ a: 1 });
  });

  it('should name the variable when a custom parser fails', () => {
    process.env.TEST_JSON = '{not json';

    expect(() => getConfig('TEST_JSON', {}, value => JSON.parse(value))).toThrow(
      /Invalid value for environment variable TEST_JSON/
    );
  });

  it('should prefer the first configured variable', () => {
    process.env.TEST_FALLBACK_URL = 'postgres://fallback';
    expect(getFirstConfig('TEST_PRIMARY_URL', 'TEST_FALLBACK_URL')).toBe('postgres://fallback');

    process.env.TEST_PRIMARY_URL = 'postgres://primary';
    expect(getFirstConfig('TEST_PRIMARY_URL', 'TEST_FALLBACK_URL')).toBe('postgres://primary');
  });

  it('should detect a configured database url', () => {
    expect(hasDatabaseUrl('TEST_PRIMARY_URL', 'TEST_FALLBACK_URL')).toBe(false);

    process.env.TEST_FALLBACK_URL = 'postgres://fallback';
    expect(hasDatabaseUrl('TEST_PRIMARY_URL', 'TEST_FALLBACK_URL')).toBe(true);
  });

  it('should report missing required and optional variables', () => {
    const result = validateEnvironmentConfig([
      { name: 'TEST_PRIMARY_URL', required: true, description: 'primary' },
      { name: 'TEST_STRING', required: false, description: 'optional' },
    ]);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['Missing required: TEST_PRIMARY_URL - primary']);
    expect(result.warnings).toEqual(['Optional not set: TEST_STRING - optional']);
  });
});
