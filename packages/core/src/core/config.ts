/**
 * @module core/config
 * Strata configuration types and defaults.
 */

import type { DatabaseConfig } from '../db/types';

/**
 * Complete configuration for a Strata migration run.
 */
export interface StrataConfig {
  /** SQL Server connection settings */
  Database: DatabaseConfig;

  /** Where applied migrations are recorded */
  Ledger?: LedgerConfig;

  /** Migration discovery and schema-first bootstrap settings */
  Migrations?: MigrationConfig;

  /** How concurrent migration runs are serialized */
  Concurrency?: ConcurrencyConfig;
}

/**
 * Location of the ledger table.
 */
export interface LedgerConfig {
  /**
   * Schema holding the ledger table.
   * Defaults to `'strata'`.
   */
  Schema?: string;

  /**
   * Name of the ledger table.
   * Defaults to `'migrations'`.
   */
  Table?: string;
}

/**
 * Configuration for migration discovery.
 */
export interface MigrationConfig {
  /**
   * Filesystem paths scanned recursively for `.sql` migration files.
   * Read when building a `SqlFileMigrationSource` (the CLI does this);
   * `Migrator` takes its source as a constructor argument and ignores it.
   * Code-defined migrations are registered separately and need no location.
   *
   * @example `['./migrations']`
   */
  Locations?: string[];

  /**
   * Directory holding schema-first bootstrap files (`schema.sql`,
   * `schema.{environment}.sql`). Bootstrap is disabled when unset.
   */
  SchemaDirectory?: string;

  /**
   * Selects `schema.{Environment}.sql` over `schema.sql`.
   */
  Environment?: string;
}

/**
 * Cross-process serialization of migration batches.
 */
export interface ConcurrencyConfig {
  /**
   * Hold an exclusive application lock for the whole batch.
   * Defaults to true. When false, concurrent runs rely on the ledger's
   * primary key alone and a losing insert is reported as already applied.
   */
  UseAdvisoryLock?: boolean;

  /**
   * Name of the application lock.
   * Defaults to `'strata:{schema}.{table}'`.
   */
  LockResource?: string;

  /**
   * How long to wait for the lock, in milliseconds.
   * Defaults to 60000.
   */
  LockTimeoutMS?: number;
}

/**
 * Configuration with every default applied.
 */
export interface ResolvedStrataConfig {
  Database: DatabaseConfig;
  Ledger: Required<LedgerConfig>;
  Migrations: {
    SchemaDirectory: string | null;
    Environment: string | null;
  };
  Concurrency: Required<ConcurrencyConfig>;
}

export const DEFAULT_LEDGER_SCHEMA = 'strata';
export const DEFAULT_LEDGER_TABLE = 'migrations';
export const DEFAULT_LOCK_TIMEOUT_MS = 60_000;

/**
 * Merges user-provided config with sensible defaults.
 * @param config - Partial configuration provided by the user
 * @returns Complete configuration with all defaults applied
 */
export function resolveConfig(config: StrataConfig): ResolvedStrataConfig {
  const schema = config.Ledger?.Schema ?? DEFAULT_LEDGER_SCHEMA;
  const table = config.Ledger?.Table ?? DEFAULT_LEDGER_TABLE;

  return {
    Database: config.Database,
    Ledger: {
      Schema: schema,
      Table: table,
    },
    Migrations: {
      SchemaDirectory: config.Migrations?.SchemaDirectory ?? null,
      Environment: config.Migrations?.Environment ?? null,
    },
    Concurrency: {
      UseAdvisoryLock: config.Concurrency?.UseAdvisoryLock ?? true,
      LockResource: config.Concurrency?.LockResource ?? `strata:${schema}.${table}`,
      LockTimeoutMS: config.Concurrency?.LockTimeoutMS ?? DEFAULT_LOCK_TIMEOUT_MS,
    },
  };
}
