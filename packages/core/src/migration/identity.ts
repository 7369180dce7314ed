/**
 * @module migration/identity
 * Derives a migration's identifier and name from its declared name.
 *
 * The convention is `_{identifier}_{name}`, where the identifier is a
 * 12-digit `YYYYMMDDHHmm` timestamp:
 *
 * - `_202310191050_AddUsersTable` → `202310191050`, `AddUsersTable`
 * - `202310191050_Add_Users_Table` → `202310191050`, `Add_Users_Table`
 *
 * The leading underscore is optional so the same rule covers class names
 * (which cannot start with a digit) and file names.
 */

import { MigrationIdentityError } from '../core/errors';

/**
 * Groups:
 *  1. 12-digit identifier
 *  2. Name (everything after the separating underscore; may contain underscores)
 */
const MIGRATION_NAME_PATTERN = /^_?(\d{12})_(.+)$/;

/**
 * Identity derived from a declared name.
 */
export interface MigrationIdentity {
  Identifier: number;
  Name: string;
}

/**
 * Parses `_{identifier}_{name}` into its parts.
 *
 * @param declaredName - Class name or file name without extension
 * @throws MigrationIdentityError when the name does not follow the convention
 *
 * @example
 * ```typescript
 * ParseMigrationIdentity('_202310191050_AddUsersTable');
 * // { Identifier: 202310191050, Name: 'AddUsersTable' }
 * ```
 */
export function ParseMigrationIdentity(declaredName: string): MigrationIdentity {
  const match = declaredName.match(MIGRATION_NAME_PATTERN);

  if (!match) {
    throw new MigrationIdentityError(
      declaredName,
      `Migration name "${declaredName}" does not match the expected format ` +
        `"_{identifier}_{name}" (e.g. "_202310191050_AddUsersTable").`
    );
  }

  return {
    Identifier: Number(match[1]),
    Name: match[2],
  };
}

/**
 * True when the name follows the `_{identifier}_{name}` convention.
 */
export function IsValidMigrationName(declaredName: string): boolean {
  return MIGRATION_NAME_PATTERN.test(declaredName);
}

/**
 * Builds the conventional declared name, `_{identifier}_{name}`.
 */
export function FormatMigrationName(identifier: number, name: string): string {
  return `_${identifier}_${name}`;
}

/**
 * Formats a date as a `YYYYMMDDHHmm` identifier, in UTC.
 */
export function IdentifierFromDate(date: Date): number {
  const pad = (value: number): string => value.toString().padStart(2, '0');
  return Number(
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
      `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}`
  );
}

/**
 * Checks an identity regardless of where it came from (explicit fields
 * or a parsed name).
 *
 * @param source - Description of the definition, used in error messages
 * @throws MigrationIdentityError when the identifier is not a positive
 * safe integer or the name is empty
 */
export function ValidateMigrationIdentity(identity: { Identifier: unknown; Name: unknown }, source: string): MigrationIdentity {
  const { Identifier, Name } = identity;

  if (typeof Identifier !== 'number' || !Number.isSafeInteger(Identifier) || Identifier <= 0) {
    throw new MigrationIdentityError(
      source,
      `Migration "${source}" has an invalid identifier (${String(Identifier)}). ` +
        `Identifiers must be positive integers, e.g. 202310191050.`
    );
  }

  if (typeof Name !== 'string' || Name.trim().length === 0) {
    throw new MigrationIdentityError(source, `Migration ${Identifier} ("${source}") has an empty name.`);
  }

  return { Identifier, Name };
}
