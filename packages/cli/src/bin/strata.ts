#!/usr/bin/env node
/**
 * @module bin/strata
 * CLI entry point for Strata.
 *
 * Usage:
 *   strata migrate latest [options]
 *   strata migrate to <identifier> [options]
 *   strata info [options]
 *   strata migration create <name> [--format sql|ts]
 *   strata init
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { LoadConfig, LoadMigrationLocations } from '../config-loader';
import type { CLIOptions } from '../config-loader';
import { PrintBanner, LogError } from '../formatting';
import { RunMigrate } from '../commands/migrate';
import { RunInfo } from '../commands/info';
import { RunCreate } from '../commands/create';
import type { MigrationFileFormat } from '../commands/create';
import { RunInit } from '../commands/init';

/**
 * Flags as commander parses them (camelCase).
 */
interface SharedFlags {
  server?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  locations?: string;
  schema?: string;
  table?: string;
  schemaDir?: string;
  environment?: string;
  trustServerCertificate?: boolean;
  lock?: boolean;
  config?: string;
  quiet?: boolean;
}

interface CreateFlags {
  locations?: string;
  config?: string;
  format: MigrationFileFormat;
}

const program = new Command();

program
  .name('strata')
  .description('Strata · ordered, transactional schema migrations for SQL Server')
  .version('0.1.0');

// ─── Shared Options ─────────────────────────────────────────────────

function addSharedOptions(cmd: Command): Command {
  return cmd
    .option('-s, --server <host>', 'SQL Server hostname')
    .option('-p, --port <port>', 'SQL Server port', parseInteger)
    .option('-d, --database <name>', 'Database name')
    .option('-u, --user <user>', 'Database user')
    .option('-P, --password <password>', 'Database password')
    .option('-l, --locations <paths>', 'Migration locations (comma-separated)')
    .option('--schema <schema>', 'Ledger schema name')
    .option('--table <table>', 'Ledger table name')
    .option('--schema-dir <path>', 'Directory with schema-first bootstrap files')
    .option('-e, --environment <name>', 'Environment selecting schema.{environment}.sql')
    .option('--trust-server-certificate', 'Trust self-signed certificates')
    .option('--no-lock', 'Run without the batch lock')
    .option('--config <path>', 'Path to config file')
    .option('-q, --quiet', 'Suppress per-migration output, show summary only');
}

// ─── Commands ───────────────────────────────────────────────────────

const migrate = program
  .command('migrate')
  .description('Apply pending migrations to the database');

addSharedOptions(
  migrate
    .command('latest')
    .description('Apply every pending migration')
).action(async (flags: SharedFlags) => {
  PrintBanner();
  const success = await run(() => RunMigrate(LoadConfig(mapOptions(flags)), { Quiet: flags.quiet ?? false }));
  process.exit(success ? 0 : 1);
});

addSharedOptions(
  migrate
    .command('to')
    .argument('<identifier>', 'Highest migration identifier to apply', parseInteger)
    .description('Apply pending migrations up to and including an identifier')
).action(async (identifier: number, flags: SharedFlags) => {
  PrintBanner();
  const success = await run(() =>
    RunMigrate(LoadConfig(mapOptions(flags)), { Target: identifier, Quiet: flags.quiet ?? false })
  );
  process.exit(success ? 0 : 1);
});

addSharedOptions(
  program
    .command('info')
    .description('Show migration status')
).action(async (flags: SharedFlags) => {
  PrintBanner();
  const success = await run(() => RunInfo(LoadConfig(mapOptions(flags))));
  process.exit(success ? 0 : 1);
});

program
  .command('migration')
  .description('Work with migration files')
  .command('create')
  .argument('<name>', 'Migration name, e.g. AddUsersTable')
  .description('Create a new migration file named after the current UTC time')
  .addOption(new Option('-f, --format <format>', 'File format').choices(['sql', 'ts']).default('sql'))
  .option('-l, --locations <paths>', 'Migration locations (comma-separated); the file goes into the first')
  .option('--config <path>', 'Path to config file')
  .action(async (name: string, flags: CreateFlags) => {
    const success = await run(async () =>
      RunCreate(LoadMigrationLocations({ Locations: flags.locations, Config: flags.config }), name, flags.format)
    );
    process.exit(success ? 0 : 1);
  });

program
  .command('init')
  .description('Write a starter strata.json in the current directory')
  .action(() => {
    process.exit(RunInit() ? 0 : 1);
  });

// ─── Helpers ────────────────────────────────────────────────────────

/**
 * Runs a command, reporting configuration and other unexpected errors.
 */
async function run(command: () => Promise<boolean> | boolean): Promise<boolean> {
  try {
    return await command();
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  }
}

/**
 * Maps commander flags to CLIOptions.
 */
function mapOptions(flags: SharedFlags): CLIOptions {
  return {
    Server: flags.server,
    Port: flags.port,
    Database: flags.database,
    User: flags.user,
    Password: flags.password,
    Locations: flags.locations,
    Schema: flags.schema,
    Table: flags.table,
    SchemaDirectory: flags.schemaDir,
    Environment: flags.environment,
    TrustServerCertificate: flags.trustServerCertificate,
    UseAdvisoryLock: flags.lock === false ? false : undefined,
    Config: flags.config,
  };
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

// Run
program.parseAsync().catch((err: unknown) => {
  LogError(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
