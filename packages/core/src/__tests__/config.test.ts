import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../core/config';
import type { StrataConfig } from '../core/config';

const minimalConfig: StrataConfig = {
  Database: {
    Server: 'localhost',
    Database: 'testdb',
    User: 'sa',
    Password: 'test-secret',
  },
};

describe('resolveConfig', () => {
  it('applies the default ledger location', () => {
    const resolved = resolveConfig(minimalConfig);
    expect(resolved.Ledger).toEqual({ Schema: 'strata', Table: 'migrations' });
  });

  it('applies empty migration defaults', () => {
    const resolved = resolveConfig(minimalConfig);
    expect(resolved.Migrations).toEqual({ SchemaDirectory: null, Environment: null });
  });

  it('enables the batch lock by default', () => {
    const resolved = resolveConfig(minimalConfig);
    expect(resolved.Concurrency).toEqual({
      UseAdvisoryLock: true,
      LockResource: 'strata:strata.migrations',
      LockTimeoutMS: 60000,
    });
  });

  it('derives the lock resource from a custom ledger location', () => {
    const resolved = resolveConfig({ ...minimalConfig, Ledger: { Schema: 'ops', Table: 'schema_log' } });
    expect(resolved.Concurrency.LockResource).toBe('strata:ops.schema_log');
  });

  it('preserves user-specified values', () => {
    const config: StrataConfig = {
      ...minimalConfig,
      Ledger: { Schema: 'ops', Table: 'schema_log' },
      Migrations: { Locations: ['/custom/path'], SchemaDirectory: './schema', Environment: 'staging' },
      Concurrency: { UseAdvisoryLock: false, LockResource: 'deploy', LockTimeoutMS: 1000 },
    };
    const resolved = resolveConfig(config);
    expect(resolved.Ledger).toEqual({ Schema: 'ops', Table: 'schema_log' });
    expect(resolved.Migrations).toEqual({
      SchemaDirectory: './schema',
      Environment: 'staging',
    });
    expect(resolved.Concurrency).toEqual({ UseAdvisoryLock: false, LockResource: 'deploy', LockTimeoutMS: 1000 });
  });

  it('preserves Database config as-is', () => {
    const resolved = resolveConfig(minimalConfig);
    expect(resolved.Database).toBe(minimalConfig.Database);
  });
});
