/**
 * @module migration/migration
 * Ways to author a migration: subclass {@link Migration} or call {@link DefineMigration}.
 *
 * @example
 * ```typescript
 * export class _202310191050_AddUsersTable extends Migration {
 *   async Up(db: DbExecutionContext): Promise<void> {
 *     await db.ExecuteNonQuery('CREATE TABLE [dbo].[Users] ([Id] INT NOT NULL PRIMARY KEY)');
 *   }
 * }
 *
 * export const addRoles = DefineMigration({
 *   Identifier: 202310201200,
 *   Name: 'AddRoles',
 *   Up: (db) => db.ExecuteBatch('CREATE TABLE [dbo].[Roles] ([Id] INT NOT NULL PRIMARY KEY)'),
 * });
 * ```
 */

import type { DbExecutionContext } from '../db/types';
import type { DbMigration } from './types';
import { MigrationIdentity, ParseMigrationIdentity, ValidateMigrationIdentity } from './identity';
import { MigrationIdentityError } from '../core/errors';

/**
 * Base class whose identity is parsed from the subclass name
 * (`_{identifier}_{name}`). Override `DeclaredName`, or `Identifier`
 * and `Name` directly, when the class name cannot carry it.
 */
export abstract class Migration implements DbMigration {
  private identity: MigrationIdentity | null = null;

  /**
   * The name the identity is parsed from. Defaults to the class name.
   */
  protected get DeclaredName(): string {
    return this.constructor.name;
  }

  get Identifier(): number {
    return this.resolveIdentity().Identifier;
  }

  get Name(): string {
    return this.resolveIdentity().Name;
  }

  abstract Up(db: DbExecutionContext, signal?: AbortSignal): Promise<void>;

  private resolveIdentity(): MigrationIdentity {
    if (this.identity === null) {
      this.identity = ParseMigrationIdentity(this.DeclaredName);
    }
    return this.identity;
  }
}

/**
 * Options for {@link DefineMigration}. Either supply `Identifier` and
 * `Name`, or a `DeclaredName` following the `_{identifier}_{name}` convention.
 */
export interface MigrationDefinition {
  Identifier?: number;
  Name?: string;
  DeclaredName?: string;
  Up: (db: DbExecutionContext, signal?: AbortSignal) => Promise<void>;
}

/**
 * Creates a migration from a plain definition object.
 *
 * @throws MigrationIdentityError when neither explicit fields nor a
 * parseable `DeclaredName` provide a valid identity
 */
export function DefineMigration(definition: MigrationDefinition): DbMigration {
  const parsed = definition.DeclaredName !== undefined
    ? ParseMigrationIdentity(definition.DeclaredName)
    : null;

  const identifier = definition.Identifier ?? parsed?.Identifier;
  const name = definition.Name ?? parsed?.Name;
  const source = definition.DeclaredName ?? definition.Name ?? String(definition.Identifier ?? '(anonymous)');

  if (identifier === undefined || name === undefined) {
    throw new MigrationIdentityError(
      source,
      `Migration "${source}" needs either Identifier and Name, or a DeclaredName like "_202310191050_AddUsersTable".`
    );
  }

  const identity = ValidateMigrationIdentity({ Identifier: identifier, Name: name }, source);

  return {
    Identifier: identity.Identifier,
    Name: identity.Name,
    Up: definition.Up,
  };
}
