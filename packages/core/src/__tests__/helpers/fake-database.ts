import type {
  AdvisoryLock,
  DatabaseProvider,
  DbExecutionContext,
  SqlParameters,
  TransactionScope,
} from '../../db/types';
import type { ExecutedMigrationEntry, LedgerStore } from '../../ledger/types';
import { MigrationCancelledError } from '../../core/errors';
import { SQL_UNIQUE_CONSTRAINT_VIOLATION } from '../../db/sql-errors';

/**
 * Shaped like the `RequestError` mssql raises for a duplicate key.
 */
export class FakeUniqueViolation extends Error {
  readonly number = SQL_UNIQUE_CONSTRAINT_VIOLATION;

  constructor(identifier: number) {
    super(`Violation of PRIMARY KEY constraint 'migrations_pk'. The duplicate key value is (${identifier}).`);
    this.name = 'RequestError';
  }
}

/**
 * A promise that can be settled from outside.
 */
export class Deferred<T = void> {
  readonly Promise: Promise<T>;
  private resolveFn: (value: T) => void = () => undefined;

  constructor() {
    this.Promise = new Promise<T>((resolve) => {
      this.resolveFn = resolve;
    });
  }

  Resolve(value: T): void {
    this.resolveFn(value);
  }
}

/**
 * In-process stand-in for one SQL Server database shared by any number
 * of providers (i.e. processes).
 *
 * Statements executed outside a transaction are committed immediately;
 * inside one they are staged until commit. Ledger inserts take a key
 * lock like a primary key does: a second insert of the same identifier
 * waits for the holder to finish, then fails if the holder committed.
 */
export class FakeDatabase {
  /** Committed statements, in commit order */
  readonly Committed: string[] = [];
  readonly LedgerRows = new Map<number, ExecutedMigrationEntry>();
  LedgerExists = false;

  readonly Transactions: FakeTransaction[] = [];
  readonly Locks = new FakeLockTable();

  /** Statements matching this predicate throw */
  FailStatement: ((sql: string) => boolean) | null = null;
  FailCommit = false;
  FailRollback = false;
  FailBegin = false;

  readonly keyLocks = new Map<number, FakeTransaction>();

  execute(sql: string): void {
    if (this.FailStatement?.(sql)) {
      throw new Error(`Statement failed: ${sql}`);
    }
  }

  get LedgerIdentifiers(): number[] {
    return [...this.LedgerRows.keys()].sort((a, b) => a - b);
  }

  CountCommitted(sql: string): number {
    return this.Committed.filter((statement) => statement === sql).length;
  }
}

class FakeContext implements DbExecutionContext {
  constructor(
    protected readonly database: FakeDatabase,
    protected readonly signal?: AbortSignal
  ) {}

  async ExecuteNonQuery(sql: string, _parameters?: SqlParameters): Promise<number> {
    await this.run(sql);
    return 1;
  }

  async ExecuteScalar<T>(sql: string, _parameters?: SqlParameters): Promise<T | null> {
    await this.run(sql);
    return null;
  }

  async Query<T extends object>(sql: string, _parameters?: SqlParameters): Promise<T[]> {
    await this.run(sql);
    return [];
  }

  async ExecuteBatch(sql: string): Promise<void> {
    await this.run(sql);
  }

  protected async run(sql: string): Promise<void> {
    await Promise.resolve();
    if (this.signal?.aborted) {
      throw new MigrationCancelledError();
    }
    this.database.execute(sql);
    this.record(sql);
  }

  protected record(sql: string): void {
    this.database.Committed.push(sql);
  }
}

export class FakeTransaction extends FakeContext implements TransactionScope {
  State: 'open' | 'committed' | 'rolled-back' = 'open';
  readonly Staged: string[] = [];
  readonly StagedLedger: ExecutedMigrationEntry[] = [];
  private readonly finished = new Deferred();

  async Commit(): Promise<void> {
    await Promise.resolve();
    if (this.database.FailCommit) {
      throw new Error('Commit failed: connection reset');
    }
    this.database.Committed.push(...this.Staged);
    for (const entry of this.StagedLedger) {
      this.database.LedgerRows.set(entry.Identifier, entry);
    }
    this.finish('committed');
  }

  async Rollback(): Promise<void> {
    await Promise.resolve();
    if (this.database.FailRollback) {
      throw new Error('Rollback failed: connection reset');
    }
    this.finish('rolled-back');
  }

  /**
   * Inserts a ledger row under this transaction.
   */
  async InsertLedgerRow(entry: ExecutedMigrationEntry): Promise<void> {
    await Promise.resolve();
    for (;;) {
      const holder = this.database.keyLocks.get(entry.Identifier);
      if (!holder || holder === this) {
        break;
      }
      await holder.finished.Promise;
    }

    if (this.database.LedgerRows.has(entry.Identifier) || this.StagedLedger.some((e) => e.Identifier === entry.Identifier)) {
      throw new FakeUniqueViolation(entry.Identifier);
    }

    this.database.keyLocks.set(entry.Identifier, this);
    this.StagedLedger.push(entry);
  }

  protected record(sql: string): void {
    this.Staged.push(sql);
  }

  private finish(state: 'committed' | 'rolled-back'): void {
    this.State = state;
    for (const [identifier, holder] of this.database.keyLocks) {
      if (holder === this) {
        this.database.keyLocks.delete(identifier);
      }
    }
    this.finished.Resolve();
  }
}

/**
 * Exclusive named locks, granted in request order.
 */
export class FakeLockTable {
  readonly Held = new Set<string>();
  readonly Acquired: string[] = [];
  FailWith: Error | null = null;
  private readonly tails = new Map<string, Promise<void>>();

  async Acquire(resource: string): Promise<AdvisoryLock> {
    if (this.FailWith) {
      throw this.FailWith;
    }

    const previous = this.tails.get(resource) ?? Promise.resolve();
    const current = new Deferred();
    this.tails.set(resource, previous.then(() => current.Promise));

    await previous;
    this.Held.add(resource);
    this.Acquired.push(resource);

    return {
      Release: async () => {
        this.Held.delete(resource);
        current.Resolve();
      },
    };
  }
}

/**
 * One "process" connected to a {@link FakeDatabase}.
 */
export class FakeDatabaseProvider implements DatabaseProvider {
  Connected = false;
  ConnectCalls = 0;
  LockTimeouts: number[] = [];

  constructor(readonly Database: FakeDatabase) {}

  async Connect(): Promise<void> {
    this.ConnectCalls++;
    this.Connected = true;
  }

  Context(signal?: AbortSignal): DbExecutionContext {
    return new FakeContext(this.Database, signal);
  }

  async BeginTransaction(signal?: AbortSignal): Promise<TransactionScope> {
    await Promise.resolve();
    if (this.Database.FailBegin) {
      throw new Error('Cannot begin transaction');
    }
    const transaction = new FakeTransaction(this.Database, signal);
    this.Database.Transactions.push(transaction);
    return transaction;
  }

  async AcquireLock(resource: string, timeoutMS: number): Promise<AdvisoryLock> {
    this.LockTimeouts.push(timeoutMS);
    return this.Database.Locks.Acquire(resource);
  }

  async Close(): Promise<void> {
    this.Connected = false;
  }
}

/**
 * {@link LedgerStore} over a {@link FakeDatabase}. Reads made through a
 * transaction see that transaction's own inserts.
 */
export class InMemoryLedger implements LedgerStore {
  readonly QualifiedName = '[strata].[migrations]';
  EnsureSchemaCalls = 0;

  constructor(private readonly database: FakeDatabase) {}

  async EnsureSchema(_db: DbExecutionContext): Promise<void> {
    await Promise.resolve();
    this.EnsureSchemaCalls++;
    this.database.LedgerExists = true;
  }

  async Exists(_db: DbExecutionContext): Promise<boolean> {
    return this.database.LedgerExists;
  }

  async GetAppliedIdentifiers(db: DbExecutionContext): Promise<Set<number>> {
    const identifiers = new Set(this.database.LedgerRows.keys());
    if (db instanceof FakeTransaction) {
      db.StagedLedger.forEach((entry) => identifiers.add(entry.Identifier));
    }
    return identifiers;
  }

  async GetAllEntries(_db: DbExecutionContext): Promise<ExecutedMigrationEntry[]> {
    return [...this.database.LedgerRows.values()].sort((a, b) => a.Identifier - b.Identifier);
  }

  async CountEntries(_db: DbExecutionContext): Promise<number> {
    return this.database.LedgerRows.size;
  }

  async RecordExecution(db: DbExecutionContext, entry: ExecutedMigrationEntry): Promise<void> {
    if (db instanceof FakeTransaction) {
      await db.InsertLedgerRow(entry);
      return;
    }
    if (this.database.LedgerRows.has(entry.Identifier)) {
      throw new FakeUniqueViolation(entry.Identifier);
    }
    this.database.LedgerRows.set(entry.Identifier, entry);
  }
}
