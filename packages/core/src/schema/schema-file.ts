/**
 * @module schema/schema-file
 * Locates and reads schema-first bootstrap files.
 *
 * A schema file is a full dump of the database schema at some migration.
 * Applying it to an empty database replaces replaying every migration up
 * to that point. Its header names the migration it corresponds to:
 *
 * ```sql
 * --
 * -- SQL Server database schema
 * -- Migration version: 202310191050 (AddUsersTable)
 * --
 * ```
 *
 * `-- Migration version: (none)` means the dump predates every migration.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SchemaFileError, toError } from '../core/errors';
import type { MigrationIdentity } from '../migration/identity';

const VERSION_HEADER = /^\s*--\s*Migration version:\s*(\d+)\s*\(\s*(.*?)\s*\)\s*$/im;

const DEFAULT_SCHEMA_FILE = 'schema.sql';

/**
 * A schema file and what its header says about it.
 */
export interface SchemaFile {
  FilePath: string;
  Content: string;

  /** The migration the schema corresponds to, or null when the header names none */
  Version: MigrationIdentity | null;
}

/**
 * Extracts the migration version from a schema file's header.
 * Returns null when there is no header, the header reads `(none)`, or
 * the identifier is not a number.
 *
 * @example
 * ```typescript
 * ParseSchemaFileVersion('-- Migration version: 202310191050 (AddUsersTable)');
 * // { Identifier: 202310191050, Name: 'AddUsersTable' }
 * ```
 */
export function ParseSchemaFileVersion(content: string): MigrationIdentity | null {
  const match = VERSION_HEADER.exec(content);
  if (!match) {
    return null;
  }

  const identifier = Number(match[1]);
  if (!Number.isSafeInteger(identifier) || match[2].length === 0) {
    return null;
  }

  return { Identifier: identifier, Name: match[2] };
}

/**
 * Finds the schema file to bootstrap from. File names compare
 * case-insensitively.
 *
 * - With an environment: `schema.{environment}.sql`, else `schema.sql`.
 * - Without: `schema.sql`, else the first `schema.*.sql` in name order.
 *
 * @returns The absolute path, or null when the directory holds no schema file
 */
export async function FindSchemaFile(directory: string, environment?: string): Promise<string | null> {
  const root = path.resolve(directory);
  if (!fs.existsSync(root)) {
    return null;
  }

  const entries = await fs.promises.readdir(root, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  const byName = (wanted: string): string | undefined =>
    files.find((name) => name.toLowerCase() === wanted);

  const candidates: Array<string | undefined> = [];
  if (environment && environment.trim().length > 0) {
    candidates.push(byName(`schema.${environment.trim().toLowerCase()}.sql`), byName(DEFAULT_SCHEMA_FILE));
  } else {
    candidates.push(
      byName(DEFAULT_SCHEMA_FILE),
      files.find((name) => {
        const lower = name.toLowerCase();
        return lower.startsWith('schema.') && lower.endsWith('.sql');
      })
    );
  }

  const found = candidates.find((name): name is string => name !== undefined);
  return found ? path.join(root, found) : null;
}

/**
 * Reads a schema file and parses its header.
 *
 * @throws SchemaFileError if the file cannot be read
 */
export async function ReadSchemaFile(filePath: string): Promise<SchemaFile> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new SchemaFileError(filePath, `Could not read schema file ${filePath}: ${toError(err).message}`, err);
  }

  return {
    FilePath: filePath,
    Content: content,
    Version: ParseSchemaFileVersion(content),
  };
}
