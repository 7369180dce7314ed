/**
 * @module commands/create
 * Implementation of the `strata migration create` CLI command.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FormatMigrationName, IdentifierFromDate, StrataError } from '@strata/core';
import { LogError, LogInfo, LogSuccess } from '../formatting';

export type MigrationFileFormat = 'sql' | 'ts';

export interface CreateMigrationOptions {
  /** Migration name; letters, digits and underscores, starting with a letter */
  Name: string;
  Format: MigrationFileFormat;

  /** Directory the file is written to; created when missing */
  Directory: string;

  /** Clock used for the identifier. Defaults to now. */
  Now?: Date;
}

const MIGRATION_NAME = /^[A-Za-z][A-Za-z0-9_]*$/;

/**
 * Writes a new migration file named `_{identifier}_{name}.{format}`, the
 * identifier being the current UTC time as `YYYYMMDDHHmm`.
 *
 * @returns The path of the new file
 * @throws StrataError for an invalid name or when the file already exists
 */
export function CreateMigrationFile(options: CreateMigrationOptions): string {
  if (!MIGRATION_NAME.test(options.Name)) {
    throw new StrataError(
      'MIGRATION_NAME_INVALID',
      `Invalid migration name "${options.Name}". Use letters, digits and underscores, starting with a letter.`
    );
  }

  const now = options.Now ?? new Date();
  const identifier = IdentifierFromDate(now);
  const declaredName = FormatMigrationName(identifier, options.Name);
  const directory = path.resolve(options.Directory);
  const filePath = path.join(directory, `${declaredName}.${options.Format}`);

  if (fs.existsSync(filePath)) {
    throw new StrataError('MIGRATION_FILE_EXISTS', `Migration file already exists: ${filePath}`);
  }

  const content = options.Format === 'sql'
    ? sqlTemplate(identifier, options.Name, now)
    : typeScriptTemplate(declaredName);

  fs.mkdirSync(directory, { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

/**
 * Executes the create command.
 *
 * @param locations - Configured migration locations; the file goes into the first
 */
export function RunCreate(locations: string[], name: string, format: MigrationFileFormat): boolean {
  try {
    const filePath = CreateMigrationFile({
      Name: name,
      Format: format,
      Directory: locations[0] ?? './migrations',
    });
    LogSuccess(`Created ${filePath}`);
    if (format === 'ts') {
      LogInfo(`Register ${path.basename(filePath, '.ts')} in your application's MigrationRegistry.`);
    }
    console.log();
    return true;
  } catch (err) {
    LogError(err instanceof Error ? err.message : String(err));
    return false;
  }
}

function sqlTemplate(identifier: number, name: string, now: Date): string {
  return [
    `-- Migration ${identifier}: ${name}`,
    `-- Created ${now.toISOString()}`,
    '--',
    '-- Runs in one transaction together with its ledger entry.',
    '-- Separate batches with GO on a line of its own.',
    '',
    '',
  ].join('\n');
}

function typeScriptTemplate(declaredName: string): string {
  return [
    "import { Migration } from '@strata/core';",
    "import type { DbExecutionContext } from '@strata/core';",
    '',
    `export class ${declaredName} extends Migration {`,
    '  async Up(db: DbExecutionContext): Promise<void> {',
    "    await db.ExecuteBatch('');",
    '  }',
    '}',
    '',
  ].join('\n');
}
