/**
 * @module migration/types
 * Type definitions for migration definitions, sources and status reporting.
 */

import type { DbExecutionContext } from '../db/types';

/**
 * A single schema change.
 *
 * Instances are constructed once per process run and never persisted as
 * objects; only `Identifier`, `Name` and the execution time reach the ledger.
 */
export interface DbMigration {
  /**
   * Ordering key, unique among all migrations ever shipped.
   * By convention a `YYYYMMDDHHmm` timestamp, e.g. `202310191050`.
   */
  readonly Identifier: number;

  /** Human-readable name, used for display and ledger readability */
  readonly Name: string;

  /**
   * Applies the change. Runs inside the migration's transaction; everything
   * executed through `db` is rolled back if this rejects.
   */
  Up(db: DbExecutionContext, signal?: AbortSignal): Promise<void>;
}

/**
 * Enumerates the migrations visible to the running process.
 * No ordering or filtering guarantees; the runner handles both.
 */
export interface MigrationSource {
  Discover(): Promise<DbMigration[]>;
}

/**
 * The state of a migration relative to the database.
 */
export type MigrationState =
  | 'PENDING'   // Discovered but not yet recorded in the ledger
  | 'APPLIED'   // Recorded in the ledger
  | 'MISSING';  // Recorded in the ledger but no longer discovered

/**
 * Combined view of a migration's definition and ledger state.
 * Used by `Info()` and the `info` command.
 */
export interface MigrationStatus {
  Identifier: number;
  Name: string;
  State: MigrationState;

  /** When the migration was applied, if ever */
  ExecutedAt: Date | null;
}
