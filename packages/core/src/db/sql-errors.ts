/**
 * @module db/sql-errors
 * Classification of SQL Server errors raised through `mssql`.
 */

/** Violation of PRIMARY KEY or UNIQUE constraint */
export const SQL_UNIQUE_CONSTRAINT_VIOLATION = 2627;

/** Cannot insert duplicate key row in object with unique index */
export const SQL_UNIQUE_INDEX_VIOLATION = 2601;

/**
 * Returns the SQL Server error number carried by an error, if any.
 * `mssql` exposes it as `number` on `RequestError`, and the driver-level
 * error is sometimes only reachable through `originalError`.
 */
export function GetSqlErrorNumber(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) {
    return null;
  }

  if ('number' in err && typeof err.number === 'number') {
    return err.number;
  }

  if ('originalError' in err) {
    return GetSqlErrorNumber(err.originalError);
  }

  return null;
}

/**
 * True when the error is a uniqueness violation (duplicate key).
 */
export function IsUniqueViolation(err: unknown): boolean {
  const errorNumber = GetSqlErrorNumber(err);
  return errorNumber === SQL_UNIQUE_CONSTRAINT_VIOLATION || errorNumber === SQL_UNIQUE_INDEX_VIOLATION;
}
