/**
 * @module config-loader
 * Loads Strata configuration from files and environment variables.
 *
 * Configuration is loaded in order of precedence (highest first):
 * 1. CLI flags (passed directly)
 * 2. Environment variables
 * 3. Config file (strata.json or strata.config.json)
 * 4. .env file (via dotenv)
 * 5. Built-in defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { StrataError } from '@strata/core';
import type { StrataConfig } from '@strata/core';

/**
 * Configuration file names searched in order.
 */
export const CONFIG_FILE_NAMES = ['strata.json', 'strata.config.json'];

/**
 * CLI options that can override config file settings.
 */
export interface CLIOptions {
  /** Database server hostname */
  Server?: string;

  /** Database server port */
  Port?: number;

  /** Database name */
  Database?: string;

  /** Database user */
  User?: string;

  /** Database password */
  Password?: string;

  /** Migration locations (comma-separated paths) */
  Locations?: string;

  /** Ledger schema name */
  Schema?: string;

  /** Ledger table name */
  Table?: string;

  /** Directory holding schema-first bootstrap files */
  SchemaDirectory?: string;

  /** Selects schema.{environment}.sql */
  Environment?: string;

  /** Trust server certificate */
  TrustServerCertificate?: boolean;

  /** Set to false to run without the batch lock */
  UseAdvisoryLock?: boolean;

  /** Path to config file */
  Config?: string;
}

/**
 * The shape of a config file once its keys are normalized. Every field is optional.
 */
interface FileConfig {
  Database?: {
    Server?: string;
    Port?: number;
    Database?: string;
    User?: string;
    Password?: string;
    Options?: {
      Encrypt?: boolean;
      TrustServerCertificate?: boolean;
      RequestTimeout?: number;
      ConnectionTimeout?: number;
    };
  };
  Ledger?: { Schema?: string; Table?: string };
  Migrations?: { Locations?: string[]; SchemaDirectory?: string; Environment?: string };
  Concurrency?: { UseAdvisoryLock?: boolean; LockResource?: string; LockTimeoutMS?: number };
}

type Environment = Record<string, string | undefined>;

/**
 * Loads and merges configuration from all sources.
 *
 * @param cliOptions - Options passed via CLI flags
 * @param cwd - Working directory for config file, `.env` and relative path resolution
 * @param env - Environment variables, `process.env` by default
 * @returns Merged StrataConfig
 * @throws StrataError if required configuration is missing or malformed
 */
export function LoadConfig(
  cliOptions: CLIOptions,
  cwd: string = process.cwd(),
  env: Environment = process.env
): StrataConfig {
  const fileConfig = loadConfigFile(cliOptions.Config, cwd);
  const dotenvValues = loadDotenv(cwd);

  // Merge: CLI > env > file > .env > defaults
  const setting = (name: string, fromCli: string | undefined, fromFile: string | undefined): string | undefined =>
    fromCli ?? env[name] ?? fromFile ?? dotenvValues[name];

  const db = fileConfig.Database;

  const server = setting('STRATA_SERVER', cliOptions.Server, db?.Server) ?? 'localhost';
  const database = setting('STRATA_DATABASE', cliOptions.Database, db?.Database);
  const user = setting('STRATA_USER', cliOptions.User, db?.User);
  const password = setting('STRATA_PASSWORD', cliOptions.Password, db?.Password);

  const portSetting = cliOptions.Port ?? env.STRATA_PORT ?? db?.Port ?? dotenvValues.STRATA_PORT;
  const port = portSetting === undefined ? 1433 : parsePort(portSetting);

  if (!database) {
    throw missingSetting('Database name', '--database', 'STRATA_DATABASE');
  }
  if (!user) {
    throw missingSetting('Database user', '--user', 'STRATA_USER');
  }
  if (!password) {
    throw missingSetting('Database password', '--password', 'STRATA_PASSWORD');
  }

  const schemaDirectory = cliOptions.SchemaDirectory ?? fileConfig.Migrations?.SchemaDirectory;
  const environment = setting('STRATA_ENVIRONMENT', cliOptions.Environment, fileConfig.Migrations?.Environment);

  return {
    Database: {
      Server: server,
      Port: port,
      Database: database,
      User: user,
      Password: password,
      Options: {
        TrustServerCertificate: cliOptions.TrustServerCertificate
          ?? db?.Options?.TrustServerCertificate
          ?? true,
        Encrypt: db?.Options?.Encrypt ?? false,
        RequestTimeout: db?.Options?.RequestTimeout ?? 300_000,
        ConnectionTimeout: db?.Options?.ConnectionTimeout ?? 30_000,
      },
    },
    Ledger: {
      Schema: setting('STRATA_SCHEMA', cliOptions.Schema, fileConfig.Ledger?.Schema),
      Table: cliOptions.Table ?? fileConfig.Ledger?.Table,
    },
    Migrations: {
      Locations: resolveLocations(cliOptions, fileConfig, cwd),
      SchemaDirectory: schemaDirectory === undefined ? undefined : path.resolve(cwd, schemaDirectory),
      Environment: environment,
    },
    Concurrency: {
      UseAdvisoryLock: cliOptions.UseAdvisoryLock ?? fileConfig.Concurrency?.UseAdvisoryLock,
      LockResource: fileConfig.Concurrency?.LockResource,
      LockTimeoutMS: fileConfig.Concurrency?.LockTimeoutMS,
    },
  };
}

/**
 * Resolves only the migration locations, for commands that never
 * connect and so need no credentials.
 */
export function LoadMigrationLocations(cliOptions: CLIOptions, cwd: string = process.cwd()): string[] {
  return resolveLocations(cliOptions, loadConfigFile(cliOptions.Config, cwd), cwd);
}

function resolveLocations(cliOptions: CLIOptions, fileConfig: FileConfig, cwd: string): string[] {
  const locations = cliOptions.Locations
    ? cliOptions.Locations.split(',').map((l) => l.trim()).filter((l) => l.length > 0)
    : fileConfig.Migrations?.Locations ?? ['./migrations'];
  return locations.map((l) => path.resolve(cwd, l));
}

/**
 * Searches for and loads a config file. Returns an empty config when none exists.
 */
function loadConfigFile(explicitPath: string | undefined, cwd: string): FileConfig {
  if (explicitPath) {
    const fullPath = path.resolve(cwd, explicitPath);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
    throw new StrataError('CONFIG_NOT_FOUND', `Config file not found: ${fullPath}`);
  }

  for (const name of CONFIG_FILE_NAMES) {
    const fullPath = path.join(cwd, name);
    if (fs.existsSync(fullPath)) {
      return loadFile(fullPath);
    }
  }

  return {};
}

/**
 * Reads `.env` without touching `process.env`, so that real environment
 * variables and the config file both take precedence over it.
 */
function loadDotenv(cwd: string): Environment {
  const envPath = path.join(cwd, '.env');
  return fs.existsSync(envPath) ? dotenv.parse(fs.readFileSync(envPath)) : {};
}

/**
 * Loads a single JSON config file.
 */
function loadFile(filePath: string): FileConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new StrataError(
      'CONFIG_INVALID',
      `Could not parse config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      err
    );
  }
  return toFileConfig(normalizeConfigKeys(raw), filePath);
}

/**
 * Known config key mappings from camelCase to PascalCase.
 * Supports both casings in JSON config files.
 */
const KEY_MAP: Record<string, string> = {
  database: 'Database',
  server: 'Server',
  port: 'Port',
  user: 'User',
  password: 'Password',
  options: 'Options',
  encrypt: 'Encrypt',
  trustServerCertificate: 'TrustServerCertificate',
  requestTimeout: 'RequestTimeout',
  connectionTimeout: 'ConnectionTimeout',
  ledger: 'Ledger',
  schema: 'Schema',
  table: 'Table',
  migrations: 'Migrations',
  locations: 'Locations',
  schemaDirectory: 'SchemaDirectory',
  environment: 'Environment',
  concurrency: 'Concurrency',
  useAdvisoryLock: 'UseAdvisoryLock',
  lockResource: 'LockResource',
  lockTimeoutMS: 'LockTimeoutMS',
  lockTimeoutMs: 'LockTimeoutMS',
};

/**
 * Recursively normalizes config object keys from camelCase to PascalCase.
 * Keys already in PascalCase are left unchanged. Unknown keys are preserved as-is.
 */
export function normalizeConfigKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(normalizeConfigKeys);
  }
  if (!isRecord(value)) {
    return value;
  }
  const normalized: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    normalized[KEY_MAP[key] ?? key] = normalizeConfigKeys(child);
  }
  return normalized;
}

/**
 * Picks the known settings out of a normalized config file, checking each type.
 */
function toFileConfig(raw: unknown, filePath: string): FileConfig {
  if (!isRecord(raw)) {
    throw new StrataError('CONFIG_INVALID', `Config file ${filePath} must contain a JSON object`);
  }

  const reader = new SectionReader(filePath);
  const database = reader.Section(raw, 'Database');
  const options = database ? reader.Section(database, 'Options') : undefined;
  const ledger = reader.Section(raw, 'Ledger');
  const migrations = reader.Section(raw, 'Migrations');
  const concurrency = reader.Section(raw, 'Concurrency');

  return {
    Database: database && {
      Server: reader.String(database, 'Server'),
      Port: reader.Number(database, 'Port'),
      Database: reader.String(database, 'Database'),
      User: reader.String(database, 'User'),
      Password: reader.String(database, 'Password'),
      Options: options && {
        Encrypt: reader.Boolean(options, 'Encrypt'),
        TrustServerCertificate: reader.Boolean(options, 'TrustServerCertificate'),
        RequestTimeout: reader.Number(options, 'RequestTimeout'),
        ConnectionTimeout: reader.Number(options, 'ConnectionTimeout'),
      },
    },
    Ledger: ledger && {
      Schema: reader.String(ledger, 'Schema'),
      Table: reader.String(ledger, 'Table'),
    },
    Migrations: migrations && {
      Locations: reader.StringArray(migrations, 'Locations'),
      SchemaDirectory: reader.String(migrations, 'SchemaDirectory'),
      Environment: reader.String(migrations, 'Environment'),
    },
    Concurrency: concurrency && {
      UseAdvisoryLock: reader.Boolean(concurrency, 'UseAdvisoryLock'),
      LockResource: reader.String(concurrency, 'LockResource'),
      LockTimeoutMS: reader.Number(concurrency, 'LockTimeoutMS'),
    },
  };
}

/**
 * Typed accessors over a parsed config object. A present value of the
 * wrong type is an error; an absent one is `undefined`.
 */
class SectionReader {
  constructor(private readonly filePath: string) {}

  Section(obj: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) throw this.invalid(key, 'an object');
    return value;
  }

  String(obj: Record<string, unknown>, key: string): string | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') throw this.invalid(key, 'a string');
    return value;
  }

  Number(obj: Record<string, unknown>, key: string): number | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value)) throw this.invalid(key, 'a number');
    return value;
  }

  Boolean(obj: Record<string, unknown>, key: string): boolean | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') throw this.invalid(key, 'true or false');
    return value;
  }

  StringArray(obj: Record<string, unknown>, key: string): string[] | undefined {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      throw this.invalid(key, 'an array of strings');
    }
    return value;
  }

  private invalid(key: string, expected: string): StrataError {
    return new StrataError('CONFIG_INVALID', `Config file ${this.filePath}: "${key}" must be ${expected}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parsePort(value: string | number): number {
  const port = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new StrataError('CONFIG_INVALID', `Invalid port: ${value}`);
  }
  return port;
}

function missingSetting(label: string, flag: string, variable: string): StrataError {
  return new StrataError(
    'CONFIG_MISSING',
    `${label} is required. Set via ${flag}, ${variable} env var, or config file.`
  );
}
