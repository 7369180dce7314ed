/**
 * @module ledger/ledger-table
 * Manages the ledger table: creating it if it doesn't exist, reading the
 * applied set, and appending entries.
 *
 * Table layout:
 *
 * | column        | type           |                |
 * |---------------|----------------|----------------|
 * | `identifier`  | BIGINT         | primary key    |
 * | `name`        | NVARCHAR(400)  |                |
 * | `executed_at` | DATETIMEOFFSET | UTC            |
 *
 * The primary key on `identifier` is what turns a concurrent double
 * application into a uniqueness violation on the losing insert.
 */

import type { DbExecutionContext } from '../db/types';
import { StrataError } from '../core/errors';
import type { ExecutedMigrationEntry, LedgerStore } from './types';

/** "There is already an object named ... in the database." */
const SQL_OBJECT_ALREADY_EXISTS = 2714;

interface LedgerRow {
  identifier: string | number;
  name: string;
  executed_at: Date;
}

/**
 * SQL Server implementation of {@link LedgerStore}.
 */
export class LedgerTable implements LedgerStore {
  private readonly schema: string;
  private readonly tableName: string;

  /**
   * @param schema - Schema name (e.g., "strata")
   * @param tableName - Ledger table name (e.g., "migrations")
   */
  constructor(schema: string, tableName: string) {
    this.schema = schema;
    this.tableName = tableName;
  }

  /**
   * The fully qualified table name: `[schema].[tableName]`.
   */
  get QualifiedName(): string {
    return QualifiedLedgerName(this.schema, this.tableName);
  }

  /**
   * Creates the schema and ledger table when they are absent.
   *
   * SQL Server has no `CREATE SCHEMA IF NOT EXISTS`, so each CREATE runs
   * inside TRY/CATCH and a concurrent creator's "already exists" error
   * (2714) is treated as success. Any other error propagates.
   */
  async EnsureSchema(db: DbExecutionContext): Promise<void> {
    const createSchema = `CREATE SCHEMA ${QuoteIdentifier(this.schema)}`;

    await db.ExecuteBatch(`
      BEGIN TRY
        IF SCHEMA_ID(${QuoteLiteral(this.schema)}) IS NULL
          EXEC(${QuoteLiteral(createSchema)});
      END TRY
      BEGIN CATCH
        IF ERROR_NUMBER() <> ${SQL_OBJECT_ALREADY_EXISTS} THROW;
      END CATCH;
    `);

    await db.ExecuteBatch(`
      BEGIN TRY
        IF OBJECT_ID(${QuoteLiteral(this.QualifiedName)}, N'U') IS NULL
          CREATE TABLE ${this.QualifiedName} (
            [identifier]   BIGINT          NOT NULL,
            [name]         NVARCHAR(400)   NOT NULL,
            [executed_at]  DATETIMEOFFSET  NOT NULL,
            CONSTRAINT ${QuoteIdentifier(`${this.tableName}_pk`)} PRIMARY KEY ([identifier])
          );
      END TRY
      BEGIN CATCH
        IF ERROR_NUMBER() <> ${SQL_OBJECT_ALREADY_EXISTS} THROW;
      END CATCH;
    `);
  }

  async Exists(db: DbExecutionContext): Promise<boolean> {
    const present = await db.ExecuteScalar<number>(
      `SELECT CASE WHEN OBJECT_ID(@qualifiedName, N'U') IS NULL THEN 0 ELSE 1 END AS present`,
      { qualifiedName: this.QualifiedName }
    );
    return present === 1;
  }

  async GetAppliedIdentifiers(db: DbExecutionContext): Promise<Set<number>> {
    const rows = await db.Query<Pick<LedgerRow, 'identifier'>>(
      `SELECT [identifier] FROM ${this.QualifiedName}`
    );
    return new Set(rows.map((row) => toIdentifier(row.identifier)));
  }

  async GetAllEntries(db: DbExecutionContext): Promise<ExecutedMigrationEntry[]> {
    const rows = await db.Query<LedgerRow>(
      `SELECT [identifier], [name], [executed_at] FROM ${this.QualifiedName} ORDER BY [identifier]`
    );
    return rows.map((row) => ({
      Identifier: toIdentifier(row.identifier),
      Name: row.name,
      ExecutedAt: row.executed_at,
    }));
  }

  async CountEntries(db: DbExecutionContext): Promise<number> {
    const count = await db.ExecuteScalar<number>(
      `SELECT COUNT(*) AS total FROM ${this.QualifiedName}`
    );
    return count ?? 0;
  }

  async RecordExecution(db: DbExecutionContext, entry: ExecutedMigrationEntry): Promise<void> {
    await db.ExecuteNonQuery(
      `INSERT INTO ${this.QualifiedName} ([identifier], [name], [executed_at])
       VALUES (@identifier, @name, @executedAt)`,
      {
        identifier: entry.Identifier,
        name: entry.Name,
        executedAt: entry.ExecutedAt,
      }
    );
  }
}

/**
 * Derives the qualified ledger table name, `[schema].[table]`.
 */
export function QualifiedLedgerName(schema: string, table: string): string {
  return `${QuoteIdentifier(schema)}.${QuoteIdentifier(table)}`;
}

/**
 * Brackets a SQL Server identifier, escaping embedded `]`.
 */
export function QuoteIdentifier(name: string): string {
  return `[${name.replace(/]/g, ']]')}]`;
}

/**
 * Renders an `N'...'` string literal, escaping embedded quotes.
 */
export function QuoteLiteral(value: string): string {
  return `N'${value.replace(/'/g, "''")}'`;
}

/**
 * BIGINT columns arrive from `mssql` as strings; identifiers must fit
 * in a safe JS integer.
 */
function toIdentifier(value: string | number): number {
  const identifier = typeof value === 'number' ? value : Number(value);
  if (!Number.isSafeInteger(identifier)) {
    throw new StrataError(
      'LEDGER_INVALID_IDENTIFIER',
      `Ledger contains an identifier that is not a safe integer: ${value}`
    );
  }
  return identifier;
}
