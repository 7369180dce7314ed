/**
 * @module commands/migrate
 * Implementation of the `strata migrate latest` and `strata migrate to` CLI commands.
 */

import { Migrator, SqlFileMigrationSource } from '@strata/core';
import type { MigrationSource, StrataConfig } from '@strata/core';
import {
  LogMigrationStart,
  LogMigrationEnd,
  LogInfo,
  LogWarning,
  PrintMigrateSummary,
} from '../formatting';

export interface MigrateCommandOptions {
  /** Apply only migrations at or below this identifier */
  Target?: number;

  /** Suppress per-migration output */
  Quiet?: boolean;
}

/**
 * The migrations the CLI can see: SQL files under the configured locations.
 */
export function CreateMigrationSource(config: StrataConfig): MigrationSource {
  return new SqlFileMigrationSource(config.Migrations?.Locations ?? [], LogWarning);
}

/**
 * Executes the migrate command: applies pending migrations.
 * Ctrl+C cancels the run; the migration in flight is rolled back.
 *
 * @param config - Loaded Strata configuration
 * @returns Whether the run succeeded
 */
export async function RunMigrate(config: StrataConfig, options: MigrateCommandOptions = {}): Promise<boolean> {
  const migrator = new Migrator(config, CreateMigrationSource(config));

  if (!options.Quiet) {
    migrator.OnProgress({
      OnMigrationStart: LogMigrationStart,
      OnMigrationEnd: LogMigrationEnd,
      OnLog: LogInfo,
    });
  } else {
    migrator.OnProgress({
      OnLog: LogInfo,
    });
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    LogWarning('Interrupted; rolling back the migration in flight...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    LogInfo(`Database: ${config.Database.Server}:${config.Database.Port ?? 1433}/${config.Database.Database}`);
    LogInfo(`Locations: ${(config.Migrations?.Locations ?? []).join(', ')}`);
    if (options.Target !== undefined) {
      LogInfo(`Target: ${options.Target}`);
    }
    console.log();

    const result = options.Target === undefined
      ? await migrator.MigrateToLatest(controller.signal)
      : await migrator.MigrateTo(options.Target, controller.signal);

    PrintMigrateSummary(result);
    return result.Success;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    await migrator.Close();
  }
}
