/**
 * @module commands/info
 * Implementation of the `strata info` CLI command.
 */

import { Migrator } from '@strata/core';
import type { StrataConfig } from '@strata/core';
import { PrintInfoTable, LogInfo, LogError, LogWarning } from '../formatting';
import { CreateMigrationSource } from './migrate';

/**
 * Executes the info command: displays migration status.
 *
 * @param config - Loaded Strata configuration
 */
export async function RunInfo(config: StrataConfig): Promise<boolean> {
  const migrator = new Migrator(config, CreateMigrationSource(config));

  try {
    LogInfo(`Database: ${config.Database.Server}:${config.Database.Port ?? 1433}/${config.Database.Database}`);
    console.log();

    const statuses = await migrator.Info();
    PrintInfoTable(statuses);

    const pending = statuses.filter((s) => s.State === 'PENDING');
    if (pending.length > 0) {
      LogInfo(`${pending.length} pending migration(s)`);
    } else {
      LogInfo('Schema is up to date');
    }

    const missing = statuses.filter((s) => s.State === 'MISSING');
    if (missing.length > 0) {
      LogWarning(`${missing.length} applied migration(s) no longer found on disk`);
    }

    console.log();
    return true;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  } finally {
    await migrator.Close();
  }
}
