/**
 * @module @strata/core
 *
 * Strata: ordered, transactional schema migrations for SQL Server.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Migrator, SqlFileMigrationSource } from '@strata/core';
 *
 * const migrator = new Migrator(
 *   {
 *     Database: {
 *       Server: 'localhost',
 *       Database: 'my_app',
 *       User: 'sa',
 *       Password: 'test-secret',
 *     },
 *     Migrations: { Locations: ['./migrations'] },
 *   },
 *   new SqlFileMigrationSource(['./migrations'])
 * );
 *
 * const result = await migrator.MigrateToLatest();
 * console.log(`Applied ${result.MigrationsApplied} migrations`);
 *
 * await migrator.Close();
 * ```
 *
 * @packageDocumentation
 */

// ─── Main API ────────────────────────────────────────────────────────
export { Migrator } from './core/migrator';
export type {
  MigrateResult,
  MigrationExecutionResult,
  MigrationOutcome,
  MigratorCallbacks,
  MigratorDependencies,
} from './core/migrator';
export { PlanMigrations, ValidateMigrations, BuildStatusReport } from './core/planner';
export type { MigrationPlan } from './core/planner';

// ─── Configuration ───────────────────────────────────────────────────
export type {
  StrataConfig,
  ResolvedStrataConfig,
  LedgerConfig,
  MigrationConfig,
  ConcurrencyConfig,
} from './core/config';
export {
  resolveConfig,
  DEFAULT_LEDGER_SCHEMA,
  DEFAULT_LEDGER_TABLE,
  DEFAULT_LOCK_TIMEOUT_MS,
} from './core/config';

// ─── Database ────────────────────────────────────────────────────────
export type {
  DatabaseConfig,
  DatabaseConnectionOptions,
  DatabaseProvider,
  DbExecutionContext,
  TransactionScope,
  AdvisoryLock,
  SqlParameters,
} from './db/types';
export { ConnectionManager } from './db/connection';
export { MssqlDatabaseProvider } from './db/mssql-provider';
export { InitializeDatabaseDefaults, IsDatabaseDefaultsInitialized } from './db/defaults';
export {
  GetSqlErrorNumber,
  IsUniqueViolation,
  SQL_UNIQUE_CONSTRAINT_VIOLATION,
  SQL_UNIQUE_INDEX_VIOLATION,
} from './db/sql-errors';

// ─── Migrations ──────────────────────────────────────────────────────
export type { DbMigration, MigrationSource, MigrationState, MigrationStatus } from './migration/types';
export { Migration, DefineMigration } from './migration/migration';
export type { MigrationDefinition } from './migration/migration';
export { MigrationRegistry, CompositeMigrationSource } from './migration/registry';
export type { MigrationClass, MigrationRegistration } from './migration/registry';
export {
  ParseMigrationIdentity,
  IsValidMigrationName,
  FormatMigrationName,
  IdentifierFromDate,
  ValidateMigrationIdentity,
} from './migration/identity';
export type { MigrationIdentity } from './migration/identity';
export { SqlFileMigration, SqlFileMigrationSource } from './migration/sql-file-source';
export type { DiscoveryWarningCallback } from './migration/sql-file-source';
export { SplitSqlBatches } from './migration/sql-splitter';
export type { SqlBatch } from './migration/sql-splitter';

// ─── Schema-first bootstrap ──────────────────────────────────────────
export { ParseSchemaFileVersion, FindSchemaFile, ReadSchemaFile } from './schema/schema-file';
export type { SchemaFile } from './schema/schema-file';

// ─── Ledger ──────────────────────────────────────────────────────────
export { LedgerTable, QualifiedLedgerName, QuoteIdentifier, QuoteLiteral } from './ledger/ledger-table';
export type { ExecutedMigrationEntry, LedgerStore } from './ledger/types';

// ─── Errors ──────────────────────────────────────────────────────────
export {
  StrataError,
  MigrationDiscoveryError,
  MigrationIdentityError,
  DuplicateMigrationError,
  MigrationExecutionError,
  MigrationCancelledError,
  TransactionError,
  LockError,
  ConnectionError,
  SchemaFileError,
  toError,
} from './core/errors';
