/**
 * @module @strata/cli
 *
 * CLI package for Strata migrations.
 * This module exports the config loader and command implementations
 * for programmatic use of the CLI functionality.
 *
 * @packageDocumentation
 */

export { LoadConfig, LoadMigrationLocations, CONFIG_FILE_NAMES } from './config-loader';
export type { CLIOptions } from './config-loader';
export { RunMigrate, CreateMigrationSource } from './commands/migrate';
export type { MigrateCommandOptions } from './commands/migrate';
export { RunInfo } from './commands/info';
export { RunCreate, CreateMigrationFile } from './commands/create';
export type { CreateMigrationOptions, MigrationFileFormat } from './commands/create';
export { RunInit, WriteStarterConfig } from './commands/init';
