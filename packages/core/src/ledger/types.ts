/**
 * @module ledger/types
 * Type definitions for the migration ledger.
 */

import type { DbExecutionContext } from '../db/types';

/**
 * A single row of the ledger table: one successfully applied migration.
 * The ledger is a set keyed by `Identifier`; rows are never updated.
 */
export interface ExecutedMigrationEntry {
  Identifier: number;

  /** Name of the migration at the time it was executed (informational) */
  Name: string;

  /** UTC instant the migration's transaction committed its ledger row */
  ExecutedAt: Date;
}

/**
 * Persistent record of applied migrations.
 *
 * Every method runs against the execution context it is given, so reads
 * inside a transaction see that transaction's own writes.
 */
export interface LedgerStore {
  /** The fully qualified table name, e.g. `[strata].[migrations]` */
  readonly QualifiedName: string;

  /**
   * Creates the schema and table if missing. Safe under concurrent
   * invocation by several processes.
   */
  EnsureSchema(db: DbExecutionContext): Promise<void>;

  /** True when the ledger table exists. */
  Exists(db: DbExecutionContext): Promise<boolean>;

  /** Identifiers of every recorded migration. */
  GetAppliedIdentifiers(db: DbExecutionContext): Promise<Set<number>>;

  /** Every ledger row, ordered by identifier. */
  GetAllEntries(db: DbExecutionContext): Promise<ExecutedMigrationEntry[]>;

  /** Number of ledger rows. */
  CountEntries(db: DbExecutionContext): Promise<number>;

  /**
   * Appends one entry. Rejects with a uniqueness violation, never
   * overwrites, when the identifier is already recorded.
   */
  RecordExecution(db: DbExecutionContext, entry: ExecutedMigrationEntry): Promise<void>;
}
