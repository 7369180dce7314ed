/**
 * @module db/types
 * Connection configuration and the execution contracts the runner depends on.
 */

/**
 * Configuration for connecting to a SQL Server instance.
 * Maps directly to the `mssql` package connection options with
 * sensible defaults for migration workloads.
 */
export interface DatabaseConfig {
  /** SQL Server hostname or IP address */
  Server: string;

  /** SQL Server port. Defaults to 1433 */
  Port?: number;

  /** Database name to connect to */
  Database: string;

  /** SQL Server login username */
  User: string;

  /** SQL Server login password */
  Password: string;

  /** Additional connection options */
  Options?: DatabaseConnectionOptions;
}

/**
 * Extended connection options for fine-tuning SQL Server connectivity.
 */
export interface DatabaseConnectionOptions {
  /** Whether to encrypt the connection. Defaults to false */
  Encrypt?: boolean;

  /** Whether to trust self-signed certificates. Defaults to true */
  TrustServerCertificate?: boolean;

  /** Request timeout in milliseconds. Defaults to 300000 (5 minutes) */
  RequestTimeout?: number;

  /** Connection timeout in milliseconds. Defaults to 30000 (30 seconds) */
  ConnectionTimeout?: number;
}

/**
 * Named query parameters. Referenced in SQL as `@name`.
 */
export type SqlParameters = Record<string, unknown>;

/**
 * Executes SQL against the database, either in auto-commit mode or
 * inside a transaction (see {@link TransactionScope}).
 */
export interface DbExecutionContext {
  /**
   * Executes a statement and returns the total number of rows affected.
   */
  ExecuteNonQuery(sql: string, parameters?: SqlParameters): Promise<number>;

  /**
   * Executes a query and returns the first column of the first row,
   * or `null` when the query returns no rows.
   */
  ExecuteScalar<T>(sql: string, parameters?: SqlParameters): Promise<T | null>;

  /**
   * Executes a query and returns every row of the first result set.
   */
  Query<T extends object>(sql: string, parameters?: SqlParameters): Promise<T[]>;

  /**
   * Sends a raw, unparameterized batch. Used for DDL scripts.
   */
  ExecuteBatch(sql: string): Promise<void>;
}

/**
 * An open transaction. Exclusively owned by one in-flight migration.
 */
export interface TransactionScope extends DbExecutionContext {
  Commit(): Promise<void>;
  Rollback(): Promise<void>;
}

/**
 * A held database-level lock.
 */
export interface AdvisoryLock {
  Release(): Promise<void>;
}

/**
 * Supplies execution contexts, transactions and locks to the runner.
 */
export interface DatabaseProvider {
  /** Opens the underlying connection. Safe to call repeatedly. */
  Connect(): Promise<void>;

  /** Returns an auto-commit execution context. */
  Context(signal?: AbortSignal): DbExecutionContext;

  /** Opens a new transaction. */
  BeginTransaction(signal?: AbortSignal): Promise<TransactionScope>;

  /**
   * Acquires an exclusive, named lock that serializes cooperating processes.
   * Rejects when the lock cannot be obtained within `timeoutMS`.
   */
  AcquireLock(resource: string, timeoutMS: number): Promise<AdvisoryLock>;

  /** Releases all connections. Safe to call repeatedly. */
  Close(): Promise<void>;
}
