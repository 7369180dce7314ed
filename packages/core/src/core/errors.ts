/**
 * @module core/errors
 * Error hierarchy for Strata migration operations.
 */

import type { DbMigration } from '../migration/types';

/**
 * Base error class for all Strata errors.
 * Carries a machine-readable code so callers can branch without parsing messages.
 */
export class StrataError extends Error {
  /** Machine-readable error code */
  readonly Code: string;

  constructor(code: string, message: string, cause?: unknown) {
    super(message);
    this.name = 'StrataError';
    this.Code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * A migration definition could not be instantiated (e.g., its constructor threw).
 * Fatal for the whole batch: raised before any migration executes.
 */
export class MigrationDiscoveryError extends StrataError {
  /** Name of the definition that failed, as far as it could be determined */
  readonly Definition: string;

  constructor(definition: string, cause?: unknown) {
    super(
      'MIGRATION_DISCOVERY_FAILED',
      `Could not instantiate migration "${definition}": ${describeCause(cause)}`,
      cause
    );
    this.name = 'MigrationDiscoveryError';
    this.Definition = definition;
  }
}

/**
 * A migration's identifier or name could not be derived or is invalid.
 */
export class MigrationIdentityError extends StrataError {
  /** The declared name (class name, file name) the identity was derived from */
  readonly DeclaredName: string;

  constructor(declaredName: string, message: string, code: string = 'MIGRATION_IDENTITY_INVALID') {
    super(code, message);
    this.name = 'MigrationIdentityError';
    this.DeclaredName = declaredName;
  }
}

/**
 * Two discovered migrations share an identifier.
 */
export class DuplicateMigrationError extends MigrationIdentityError {
  readonly Identifier: number;

  /** Names of every migration carrying the duplicated identifier */
  readonly Names: string[];

  constructor(identifier: number, names: string[]) {
    super(
      names.join(', '),
      `Duplicate migration identifier ${identifier}: ${names.map((n) => `"${n}"`).join(', ')}. ` +
        `Every migration must have a unique identifier.`,
      'MIGRATION_IDENTIFIER_DUPLICATE'
    );
    this.name = 'DuplicateMigrationError';
    this.Identifier = identifier;
    this.Names = names;
  }
}

/**
 * The upgrade action of a migration failed, or its transaction could not commit.
 * The migration's transaction was rolled back.
 */
export class MigrationExecutionError extends StrataError {
  readonly Identifier: number;
  readonly MigrationName: string;

  /** Set when rolling back the failed transaction also failed */
  readonly RollbackError?: Error;

  constructor(migration: Pick<DbMigration, 'Identifier' | 'Name'>, cause: unknown, rollbackError?: Error) {
    super(
      'MIGRATION_EXECUTION_FAILED',
      `Error while executing migration ${migration.Identifier}: ${migration.Name}. ${describeCause(cause)}`,
      cause
    );
    this.name = 'MigrationExecutionError';
    this.Identifier = migration.Identifier;
    this.MigrationName = migration.Name;
    this.RollbackError = rollbackError;
  }
}

/**
 * The batch was cancelled through its abort signal.
 * When raised for a specific migration, that migration's transaction was rolled back.
 */
export class MigrationCancelledError extends StrataError {
  /** Identifier of the migration in flight when cancellation was observed, if any */
  readonly Identifier: number | null;

  constructor(migration?: Pick<DbMigration, 'Identifier' | 'Name'>) {
    super(
      'MIGRATION_CANCELLED',
      migration
        ? `Migration ${migration.Identifier}: ${migration.Name} was cancelled and rolled back.`
        : 'Migration run was cancelled before the next migration started.'
    );
    this.name = 'MigrationCancelledError';
    this.Identifier = migration?.Identifier ?? null;
  }
}

/**
 * A transaction failed to begin, commit or roll back outside of a migration body.
 */
export class TransactionError extends StrataError {
  constructor(message: string, cause?: unknown) {
    super('TRANSACTION_FAILED', message, cause);
    this.name = 'TransactionError';
  }
}

/**
 * The batch-wide advisory lock could not be acquired.
 */
export class LockError extends StrataError {
  readonly Resource: string;

  constructor(resource: string, message: string, cause?: unknown) {
    super('LOCK_NOT_ACQUIRED', message, cause);
    this.name = 'LockError';
    this.Resource = resource;
  }
}

/**
 * The connection to SQL Server could not be established.
 */
export class ConnectionError extends StrataError {
  constructor(message: string, cause?: unknown) {
    super('CONNECTION_FAILED', message, cause);
    this.name = 'ConnectionError';
  }
}

/**
 * A schema bootstrap file could not be read or applied.
 */
export class SchemaFileError extends StrataError {
  readonly FilePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super('SCHEMA_FILE_FAILED', message, cause);
    this.name = 'SchemaFileError';
    this.FilePath = filePath;
  }
}

/**
 * Normalizes an unknown thrown value into an `Error`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function describeCause(cause: unknown): string {
  if (cause === undefined) {
    return '';
  }
  return cause instanceof Error ? cause.message : String(cause);
}
