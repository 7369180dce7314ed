/**
 * @module db/defaults
 * One-time, process-wide configuration of the `mssql` driver.
 */

import * as sql from 'mssql';

let initialized = false;

/**
 * Registers the driver's default JS → SQL type mappings used for
 * untyped query parameters. Runs once per process; later calls are no-ops.
 *
 * - `Date` parameters are sent as `DATETIMEOFFSET` so UTC instants keep
 *   their offset instead of being truncated to `DATETIME` precision.
 *
 * @returns true when this call performed the initialization
 */
export function InitializeDatabaseDefaults(): boolean {
  if (initialized) {
    return false;
  }

  sql.map.register(Date, sql.DateTimeOffset);

  initialized = true;
  return true;
}

/**
 * Whether {@link InitializeDatabaseDefaults} has run in this process.
 */
export function IsDatabaseDefaultsInitialized(): boolean {
  return initialized;
}
