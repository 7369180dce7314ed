/**
 * @module core/migrator
 * Main orchestrator for Strata migration operations.
 *
 * The `Migrator` class is the primary public API for programmatic usage.
 * It reconciles the discovered migrations against the ledger and applies
 * the pending ones, one transaction per migration.
 *
 * @example
 * ```typescript
 * import { Migrator, MigrationRegistry } from '@strata/core';
 *
 * const registry = new MigrationRegistry().RegisterAll([_202310191050_AddUsersTable]);
 * const migrator = new Migrator({
 *   Database: { Server: 'localhost', Database: 'app', User: 'sa', Password: 'test-secret' },
 * }, registry);
 *
 * const result = await migrator.MigrateToLatest();
 * console.log(`Applied ${result.MigrationsApplied} migrations`);
 *
 * await migrator.Close();
 * ```
 */

import { StrataConfig, ResolvedStrataConfig, resolveConfig } from './config';
import { BuildStatusReport, PlanMigrations, ValidateMigrations } from './planner';
import { MigrationCancelledError, MigrationExecutionError, SchemaFileError, toError } from './errors';
import type { AdvisoryLock, DatabaseProvider, DbExecutionContext, TransactionScope } from '../db/types';
import { MssqlDatabaseProvider } from '../db/mssql-provider';
import { IsUniqueViolation } from '../db/sql-errors';
import { LedgerTable } from '../ledger/ledger-table';
import type { ExecutedMigrationEntry, LedgerStore } from '../ledger/types';
import type { DbMigration, MigrationSource, MigrationStatus } from '../migration/types';
import { SplitSqlBatches } from '../migration/sql-splitter';
import { FindSchemaFile, ReadSchemaFile, SchemaFile } from '../schema/schema-file';

/**
 * How a migration's attempt ended.
 *
 * - `applied`: upgrade action and ledger entry committed together
 * - `already-applied`: another process recorded the identifier first; rolled back, not an error
 * - `failed`: rolled back; the batch stopped here
 * - `cancelled`: the abort signal fired; rolled back
 */
export type MigrationOutcome = 'applied' | 'already-applied' | 'failed' | 'cancelled';

/**
 * Result of executing a single migration.
 */
export interface MigrationExecutionResult {
  Migration: DbMigration;
  Outcome: MigrationOutcome;

  /** True for `applied` and `already-applied` */
  Success: boolean;

  /** Execution time in milliseconds */
  ExecutionTimeMS: number;

  /** Timestamp written to the ledger, when the migration was applied */
  ExecutedAt?: Date;

  /** Set for `failed` and `cancelled` */
  Error?: Error;
}

/**
 * Result of a `MigrateToLatest()`, `MigrateTo()` or `RunSingle()` operation.
 */
export interface MigrateResult {
  /** Whether every pending migration committed (or was already applied concurrently) */
  Success: boolean;

  /** Number of migrations this run applied */
  MigrationsApplied: number;

  /** Number of pending migrations another process applied first */
  MigrationsSkipped: number;

  /** One entry per migration attempted, in execution order */
  Details: MigrationExecutionResult[];

  /** Pending migrations after the failure point, never started */
  NotAttempted: DbMigration[];

  /** The error that stopped the run */
  Error?: Error;

  /** Error message if the run failed */
  ErrorMessage?: string;

  /** Total execution time in milliseconds */
  TotalExecutionTimeMS: number;

  /** Highest identifier known to be recorded after the run, null when none */
  CurrentIdentifier: number | null;

  /** Errors thrown by progress callbacks; they never change the outcome */
  CallbackErrors: Error[];
}

/**
 * Callback interface for observing migration progress.
 */
export interface MigratorCallbacks {
  /** Called when a migration's transaction is about to begin */
  OnMigrationStart?: (migration: DbMigration) => void;

  /** Called when a migration finishes, whatever the outcome */
  OnMigrationEnd?: (result: MigrationExecutionResult) => void;

  /** Called for informational log messages */
  OnLog?: (message: string) => void;
}

/**
 * Collaborators that default to the SQL Server implementations.
 */
export interface MigratorDependencies {
  Provider?: DatabaseProvider;
  Ledger?: LedgerStore;
}

/**
 * The Strata migration engine.
 *
 * - `MigrateToLatest()`: apply every pending migration
 * - `MigrateTo()`: apply pending migrations up to an identifier
 * - `RunSingle()`: apply one migration outside the batch sequence
 * - `RetrieveAlreadyExecuted()` / `Info()` / `IsDatabaseEmpty()`: reporting
 */
export class Migrator {
  private readonly config: ResolvedStrataConfig;
  private readonly source: MigrationSource;
  private readonly provider: DatabaseProvider;
  private readonly ledger: LedgerStore;
  private callbacks: MigratorCallbacks = {};
  private callbackErrors: Error[] = [];

  constructor(config: StrataConfig, source: MigrationSource, dependencies: MigratorDependencies = {}) {
    this.config = resolveConfig(config);
    this.source = source;
    this.provider = dependencies.Provider ?? new MssqlDatabaseProvider(this.config.Database);
    this.ledger = dependencies.Ledger ?? new LedgerTable(this.config.Ledger.Schema, this.config.Ledger.Table);
  }

  /**
   * Registers callbacks for observing migration progress.
   * Returns `this` for chaining.
   *
   * @example
   * ```typescript
   * migrator
   *   .OnProgress({
   *     OnLog: (msg) => console.log(msg),
   *     OnMigrationEnd: (r) => console.log(`${r.Migration.Identifier}: ${r.Outcome}`),
   *   })
   *   .MigrateToLatest();
   * ```
   */
  OnProgress(callbacks: MigratorCallbacks): this {
    this.callbacks = callbacks;
    return this;
  }

  /**
   * Applies all pending migrations, ascending by identifier.
   *
   * The workflow:
   * 1. Discover migrations and validate their identities
   * 2. Connect, and take the batch lock when enabled
   * 3. Bootstrap from a schema file if the database is empty, otherwise
   *    ensure the ledger table exists
   * 4. Read the applied set and compute the pending list
   * 5. Run each pending migration in its own transaction, recording it
   *    in the ledger inside that transaction; stop at the first failure
   *
   * Never throws; failures are reported on the result.
   */
  async MigrateToLatest(signal?: AbortSignal): Promise<MigrateResult> {
    return this.runBatch(undefined, signal);
  }

  /**
   * Like {@link MigrateToLatest}, but only migrations with an identifier
   * at or below `targetIdentifier` are considered.
   */
  async MigrateTo(targetIdentifier: number, signal?: AbortSignal): Promise<MigrateResult> {
    return this.runBatch(targetIdentifier, signal);
  }

  /**
   * Applies exactly one migration under the same transactional contract
   * as a batch. No lock is taken and the schema-first bootstrap is skipped.
   */
  async RunSingle(migration: DbMigration, signal?: AbortSignal): Promise<MigrateResult> {
    const startTime = Date.now();

    try {
      throwIfCancelled(signal);
      ValidateMigrations([migration]);
      await this.provider.Connect();
      await this.ledger.EnsureSchema(this.provider.Context(signal));

      const result = await this.executeMigration(migration, signal);
      return this.buildResult(startTime, [result], [], result.Error, result.Success ? migration.Identifier : null);
    } catch (err) {
      return this.buildResult(startTime, [], [migration], toError(err), null);
    }
  }

  /**
   * Returns every ledger entry, ordered by identifier. Empty when the
   * ledger table does not exist yet.
   */
  async RetrieveAlreadyExecuted(signal?: AbortSignal): Promise<ExecutedMigrationEntry[]> {
    throwIfCancelled(signal);
    await this.provider.Connect();
    const db = this.provider.Context(signal);

    if (!(await this.ledger.Exists(db))) {
      return [];
    }
    return this.ledger.GetAllEntries(db);
  }

  /**
   * True when the ledger table is absent or has no rows.
   */
  async IsDatabaseEmpty(signal?: AbortSignal): Promise<boolean> {
    throwIfCancelled(signal);
    await this.provider.Connect();
    return this.isDatabaseEmpty(this.provider.Context(signal));
  }

  /**
   * Returns the state of every discovered or recorded migration.
   */
  async Info(signal?: AbortSignal): Promise<MigrationStatus[]> {
    const discovered = ValidateMigrations(await this.source.Discover());
    const entries = await this.RetrieveAlreadyExecuted(signal);
    return BuildStatusReport(discovered, entries);
  }

  /**
   * Closes the database connection.
   * Should be called when done with the Migrator instance.
   */
  async Close(): Promise<void> {
    await this.provider.Close();
  }

  // ─── Private Methods ──────────────────────────────────────────────

  private async runBatch(targetIdentifier: number | undefined, signal?: AbortSignal): Promise<MigrateResult> {
    const startTime = Date.now();
    const details: MigrationExecutionResult[] = [];
    let pending: DbMigration[] = [];
    let notAttempted: DbMigration[] = [];
    let applied = new Set<number>();
    let lock: AdvisoryLock | null = null;
    let stopError: Error | undefined;

    try {
      throwIfCancelled(signal);

      // Identity problems surface before the database is touched
      const discovered = ValidateMigrations(await this.source.Discover());
      this.log(`Discovered ${discovered.length} migration(s)`);

      await this.provider.Connect();

      if (this.config.Concurrency.UseAdvisoryLock) {
        lock = await this.provider.AcquireLock(
          this.config.Concurrency.LockResource,
          this.config.Concurrency.LockTimeoutMS
        );
        this.log(`Acquired migration lock "${this.config.Concurrency.LockResource}"`);
      }

      const db = this.provider.Context(signal);
      const schemaFile = await this.findApplicableSchemaFile(db, targetIdentifier);
      if (schemaFile) {
        await this.applySchemaFile(schemaFile, discovered, signal);
      } else {
        await this.ledger.EnsureSchema(db);
      }

      applied = await this.ledger.GetAppliedIdentifiers(db);
      pending = PlanMigrations(discovered, applied, targetIdentifier).Pending;

      if (pending.length === 0) {
        this.log('Schema is up to date. No migrations to apply.');
      } else {
        this.log(`${pending.length} migration(s) pending`);
      }

      for (let i = 0; i < pending.length; i++) {
        if (signal?.aborted) {
          stopError = new MigrationCancelledError();
          notAttempted = pending.slice(i);
          break;
        }

        const result = await this.executeMigration(pending[i], signal);
        details.push(result);

        if (!result.Success) {
          stopError = result.Error;
          notAttempted = pending.slice(i + 1);
          break;
        }
      }
    } catch (err) {
      stopError = toError(err);
      notAttempted = pending.slice(details.length);
    } finally {
      if (lock) {
        await this.releaseLock(lock);
      }
    }

    if (stopError && notAttempted.length > 0) {
      this.log(`${notAttempted.length} migration(s) not attempted`);
    }

    const recorded = [...applied, ...details.filter((d) => d.Success).map((d) => d.Migration.Identifier)];
    const currentIdentifier = recorded.length > 0 ? Math.max(...recorded) : null;

    return this.buildResult(startTime, details, notAttempted, stopError, currentIdentifier);
  }

  /**
   * Runs one migration in its own transaction. Never throws.
   */
  private async executeMigration(migration: DbMigration, signal?: AbortSignal): Promise<MigrationExecutionResult> {
    const startTime = Date.now();
    this.notify(() => this.callbacks.OnMigrationStart?.(migration));

    let scope: TransactionScope;
    try {
      scope = await this.provider.BeginTransaction(signal);
    } catch (err) {
      return this.finishMigration({
        Migration: migration,
        Outcome: 'failed',
        Success: false,
        ExecutionTimeMS: Date.now() - startTime,
        Error: new MigrationExecutionError(migration, err),
      });
    }

    let recording = false;
    let executedAt: Date | undefined;
    try {
      await migration.Up(scope, signal);
      throwIfCancelled(signal, migration);

      executedAt = new Date();
      recording = true;
      await this.ledger.RecordExecution(scope, {
        Identifier: migration.Identifier,
        Name: migration.Name,
        ExecutedAt: executedAt,
      });
      recording = false;
      throwIfCancelled(signal, migration);

      await scope.Commit();
    } catch (err) {
      const rollbackError = await this.rollback(scope, migration);
      const executionTimeMS = Date.now() - startTime;

      if (recording && IsUniqueViolation(err)) {
        return this.finishMigration({
          Migration: migration,
          Outcome: 'already-applied',
          Success: true,
          ExecutionTimeMS: executionTimeMS,
        });
      }

      if (err instanceof MigrationCancelledError || signal?.aborted) {
        return this.finishMigration({
          Migration: migration,
          Outcome: 'cancelled',
          Success: false,
          ExecutionTimeMS: executionTimeMS,
          Error: new MigrationCancelledError(migration),
        });
      }

      return this.finishMigration({
        Migration: migration,
        Outcome: 'failed',
        Success: false,
        ExecutionTimeMS: executionTimeMS,
        Error: new MigrationExecutionError(migration, err, rollbackError),
      });
    }

    return this.finishMigration({
      Migration: migration,
      Outcome: 'applied',
      Success: true,
      ExecutionTimeMS: Date.now() - startTime,
      ExecutedAt: executedAt,
    });
  }

  private finishMigration(result: MigrationExecutionResult): MigrationExecutionResult {
    const { Migration: migration } = result;

    switch (result.Outcome) {
      case 'applied':
        this.log(`Applied ${migration.Identifier}: ${migration.Name} (${result.ExecutionTimeMS}ms)`);
        break;
      case 'already-applied':
        this.log(`Skipped ${migration.Identifier}: ${migration.Name} (already applied by another process)`);
        break;
      case 'cancelled':
        this.log(`Cancelled ${migration.Identifier}: ${migration.Name}; transaction rolled back`);
        break;
      case 'failed':
        this.log(`Migration FAILED: ${migration.Identifier}: ${migration.Name}; transaction rolled back`);
        break;
    }

    this.notify(() => this.callbacks.OnMigrationEnd?.(result));
    return result;
  }

  /**
   * Rolls back a failed migration's transaction. A rollback failure is
   * logged and returned so it can be attached to the execution error.
   */
  private async rollback(scope: TransactionScope, migration: DbMigration): Promise<Error | undefined> {
    try {
      await scope.Rollback();
      return undefined;
    } catch (err) {
      const rollbackError = toError(err);
      this.log(`Warning: rollback of ${migration.Identifier} failed: ${rollbackError.message}`);
      return rollbackError;
    }
  }

  private async releaseLock(lock: AdvisoryLock): Promise<void> {
    try {
      await lock.Release();
    } catch (err) {
      this.log(`Warning: could not release migration lock: ${toError(err).message}`);
    }
  }

  private async isDatabaseEmpty(db: DbExecutionContext): Promise<boolean> {
    if (!(await this.ledger.Exists(db))) {
      return true;
    }
    return (await this.ledger.CountEntries(db)) === 0;
  }

  /**
   * Returns the schema file to bootstrap from, or null when bootstrap
   * does not apply: no schema directory or file, a non-empty database,
   * or a schema version above the target.
   */
  private async findApplicableSchemaFile(
    db: DbExecutionContext,
    targetIdentifier: number | undefined
  ): Promise<SchemaFile | null> {
    const directory = this.config.Migrations.SchemaDirectory;
    if (!directory) {
      return null;
    }

    const filePath = await FindSchemaFile(directory, this.config.Migrations.Environment ?? undefined);
    if (!filePath || !(await this.isDatabaseEmpty(db))) {
      return null;
    }

    const schemaFile = await ReadSchemaFile(filePath);
    if (targetIdentifier !== undefined && schemaFile.Version && schemaFile.Version.Identifier > targetIdentifier) {
      this.log(
        `Schema file ${filePath} is at ${schemaFile.Version.Identifier}, above target ${targetIdentifier}; not applying it`
      );
      return null;
    }

    return schemaFile;
  }

  /**
   * Applies a schema file, creates the ledger, and records the file's
   * version, all in one transaction. Discovered migrations below that
   * version are recorded too: the schema already contains their effects.
   *
   * @throws SchemaFileError if any step fails; nothing is kept
   */
  private async applySchemaFile(
    schemaFile: SchemaFile,
    discovered: DbMigration[],
    signal?: AbortSignal
  ): Promise<void> {
    this.log(`Database is empty; applying schema file ${schemaFile.FilePath}`);

    const scope = await this.provider.BeginTransaction(signal);
    try {
      for (const batch of SplitSqlBatches(schemaFile.Content)) {
        for (let run = 0; run < batch.Repeat; run++) {
          await scope.ExecuteBatch(batch.Text);
        }
      }

      await this.ledger.EnsureSchema(scope);

      const version = schemaFile.Version;
      if (version) {
        const executedAt = new Date();
        const covered = discovered.filter((m) => m.Identifier < version.Identifier);
        for (const migration of covered) {
          await this.ledger.RecordExecution(scope, {
            Identifier: migration.Identifier,
            Name: migration.Name,
            ExecutedAt: executedAt,
          });
        }
        await this.ledger.RecordExecution(scope, {
          Identifier: version.Identifier,
          Name: version.Name,
          ExecutedAt: executedAt,
        });
      }

      await scope.Commit();
    } catch (err) {
      const rollbackError = await this.rollbackSchema(scope);
      throw new SchemaFileError(
        schemaFile.FilePath,
        `Failed to apply schema file ${schemaFile.FilePath}: ${toError(err).message}` +
          (rollbackError ? ` (rollback also failed: ${rollbackError.message})` : ''),
        err
      );
    }

    this.log(
      schemaFile.Version
        ? `Schema applied at ${schemaFile.Version.Identifier}: ${schemaFile.Version.Name}`
        : 'Schema applied (no migration version recorded)'
    );
  }

  private async rollbackSchema(scope: TransactionScope): Promise<Error | undefined> {
    try {
      await scope.Rollback();
      return undefined;
    } catch (err) {
      return toError(err);
    }
  }

  private buildResult(
    startTime: number,
    details: MigrationExecutionResult[],
    notAttempted: DbMigration[],
    error: Error | undefined,
    currentIdentifier: number | null
  ): MigrateResult {
    return {
      Success: error === undefined,
      MigrationsApplied: details.filter((d) => d.Outcome === 'applied').length,
      MigrationsSkipped: details.filter((d) => d.Outcome === 'already-applied').length,
      Details: details,
      NotAttempted: notAttempted,
      Error: error,
      ErrorMessage: error?.message,
      TotalExecutionTimeMS: Date.now() - startTime,
      CurrentIdentifier: currentIdentifier,
      CallbackErrors: this.takeCallbackErrors(),
    };
  }

  private log(message: string): void {
    this.notify(() => this.callbacks.OnLog?.(message));
  }

  /**
   * Invokes a progress callback. A throwing callback is collected for the
   * result instead of interrupting the migration it reports on.
   */
  private notify(invoke: () => void): void {
    try {
      invoke();
    } catch (err) {
      this.callbackErrors.push(toError(err));
    }
  }

  private takeCallbackErrors(): Error[] {
    const errors = this.callbackErrors;
    this.callbackErrors = [];
    return errors;
  }
}

/**
 * @throws MigrationCancelledError when the signal has fired
 */
function throwIfCancelled(signal: AbortSignal | undefined, migration?: DbMigration): void {
  if (signal?.aborted) {
    throw new MigrationCancelledError(migration);
  }
}
