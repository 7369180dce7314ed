/**
 * @module commands/init
 * Implementation of the `strata init` CLI command.
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_LEDGER_SCHEMA, DEFAULT_LEDGER_TABLE, DEFAULT_LOCK_TIMEOUT_MS, StrataError } from '@strata/core';
import { CONFIG_FILE_NAMES } from '../config-loader';
import { LogError, LogInfo, LogSuccess } from '../formatting';

/**
 * Starter configuration. No password: it comes from STRATA_PASSWORD or `.env`.
 */
const STARTER_CONFIG = {
  database: {
    server: 'localhost',
    port: 1433,
    database: 'my_app',
    user: 'sa',
  },
  ledger: {
    schema: DEFAULT_LEDGER_SCHEMA,
    table: DEFAULT_LEDGER_TABLE,
  },
  migrations: {
    locations: ['./migrations'],
  },
  concurrency: {
    useAdvisoryLock: true,
    lockTimeoutMS: DEFAULT_LOCK_TIMEOUT_MS,
  },
};

/**
 * Writes `strata.json` and creates the `migrations` directory.
 *
 * @returns The path of the config file
 * @throws StrataError when a config file already exists
 */
export function WriteStarterConfig(cwd: string): string {
  const existing = CONFIG_FILE_NAMES.map((name) => path.join(cwd, name)).find((p) => fs.existsSync(p));
  if (existing) {
    throw new StrataError('CONFIG_EXISTS', `Config file already exists: ${existing}`);
  }

  const configPath = path.join(cwd, CONFIG_FILE_NAMES[0]);
  fs.writeFileSync(configPath, JSON.stringify(STARTER_CONFIG, null, 2) + '\n');
  fs.mkdirSync(path.join(cwd, 'migrations'), { recursive: true });
  return configPath;
}

/**
 * Executes the init command.
 */
export function RunInit(cwd: string = process.cwd()): boolean {
  try {
    const configPath = WriteStarterConfig(cwd);
    LogSuccess(`Created ${configPath}`);
    LogInfo('Set STRATA_PASSWORD (or add it to .env) before running migrations.');
    console.log();
    return true;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  }
}
