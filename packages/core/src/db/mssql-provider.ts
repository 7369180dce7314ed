/**
 * @module db/mssql-provider
 * `DatabaseProvider` implementation backed by the `mssql` driver.
 *
 * Every request is created against either the pool (auto-commit) or an
 * open `sql.Transaction`. When an abort signal is supplied, aborting it
 * cancels the request currently in flight; the server then rolls the
 * statement back and the caller rolls back the transaction.
 */

import * as sql from 'mssql';
import { ConnectionManager } from './connection';
import type {
  AdvisoryLock,
  DatabaseConfig,
  DatabaseProvider,
  DbExecutionContext,
  SqlParameters,
  TransactionScope,
} from './types';
import { LockError, MigrationCancelledError, TransactionError } from '../core/errors';

/**
 * Return codes of `sp_getapplock` below zero mean the lock was not granted.
 */
const APPLOCK_FAILURES: Record<number, string> = {
  [-1]: 'timed out',
  [-2]: 'was cancelled',
  [-3]: 'was chosen as a deadlock victim',
  [-999]: 'failed with a parameter or call error',
};

/**
 * Executes SQL through `mssql` requests produced by a request factory.
 */
class MssqlExecutionContext implements DbExecutionContext {
  constructor(
    private readonly createRequest: () => sql.Request,
    private readonly signal?: AbortSignal
  ) {}

  async ExecuteNonQuery(sqlText: string, parameters?: SqlParameters): Promise<number> {
    const result = await this.send(parameters, (request) => request.query(sqlText));
    return result.rowsAffected.reduce((total, count) => total + count, 0);
  }

  async ExecuteScalar<T>(sqlText: string, parameters?: SqlParameters): Promise<T | null> {
    const result = await this.send(parameters, (request) =>
      request.query<Record<string, T>>(sqlText)
    );
    const firstRow = result.recordset?.[0];
    if (!firstRow) {
      return null;
    }
    const values = Object.values(firstRow);
    return values.length > 0 ? values[0] : null;
  }

  async Query<T extends object>(sqlText: string, parameters?: SqlParameters): Promise<T[]> {
    const result = await this.send(parameters, (request) => request.query<T>(sqlText));
    return result.recordset ? [...result.recordset] : [];
  }

  async ExecuteBatch(sqlText: string): Promise<void> {
    await this.send(undefined, (request) => request.batch(sqlText));
  }

  /**
   * Binds parameters, wires cancellation, and runs one request.
   */
  private async send<T>(
    parameters: SqlParameters | undefined,
    execute: (request: sql.Request) => Promise<T>
  ): Promise<T> {
    if (this.signal?.aborted) {
      throw new MigrationCancelledError();
    }

    const request = this.createRequest();
    for (const [name, value] of Object.entries(parameters ?? {})) {
      request.input(name, value);
    }

    const onAbort = (): void => {
      request.cancel();
    };
    this.signal?.addEventListener('abort', onAbort, { once: true });
    try {
      return await execute(request);
    } finally {
      this.signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * An open `sql.Transaction` exposed as a {@link TransactionScope}.
 */
class MssqlTransactionScope extends MssqlExecutionContext implements TransactionScope {
  constructor(private readonly transaction: sql.Transaction, signal?: AbortSignal) {
    super(() => new sql.Request(transaction), signal);
  }

  async Commit(): Promise<void> {
    await this.transaction.commit();
  }

  async Rollback(): Promise<void> {
    await this.transaction.rollback();
  }
}

/**
 * Provides execution contexts, transactions and application locks
 * over a single-connection SQL Server pool.
 */
export class MssqlDatabaseProvider implements DatabaseProvider {
  private readonly connectionManager: ConnectionManager;

  constructor(config: DatabaseConfig) {
    this.connectionManager = new ConnectionManager(config);
  }

  async Connect(): Promise<void> {
    await this.connectionManager.Connect();
  }

  Context(signal?: AbortSignal): DbExecutionContext {
    const pool = this.connectionManager.GetPool();
    return new MssqlExecutionContext(() => new sql.Request(pool), signal);
  }

  async BeginTransaction(signal?: AbortSignal): Promise<TransactionScope> {
    const transaction = new sql.Transaction(this.connectionManager.GetPool());
    try {
      await transaction.begin(sql.ISOLATION_LEVEL.READ_COMMITTED);
    } catch (err) {
      throw new TransactionError('Failed to begin transaction', err);
    }
    return new MssqlTransactionScope(transaction, signal);
  }

  /**
   * Takes a session-owned exclusive application lock (`sp_getapplock`).
   * The lock lives on the pool's single connection until released.
   */
  async AcquireLock(resource: string, timeoutMS: number): Promise<AdvisoryLock> {
    const pool = this.connectionManager.GetPool();
    const request = new sql.Request(pool);
    request.input('resource', sql.NVarChar(255), resource);
    request.input('timeout', sql.Int, timeoutMS);

    const result = await request.query<{ result: number }>(`
      DECLARE @result INT;
      EXEC @result = sp_getapplock
        @Resource = @resource,
        @LockMode = 'Exclusive',
        @LockOwner = 'Session',
        @LockTimeout = @timeout;
      SELECT @result AS result;
    `);

    const code = result.recordset[0]?.result ?? -999;
    if (code < 0) {
      const reason = APPLOCK_FAILURES[code] ?? `returned ${code}`;
      throw new LockError(resource, `Could not acquire migration lock "${resource}": request ${reason}`);
    }

    return {
      Release: async () => {
        const releaseRequest = new sql.Request(pool);
        releaseRequest.input('resource', sql.NVarChar(255), resource);
        await releaseRequest.query(`
          EXEC sp_releaseapplock @Resource = @resource, @LockOwner = 'Session';
        `);
      },
    };
  }

  async Close(): Promise<void> {
    await this.connectionManager.Disconnect();
  }
}
