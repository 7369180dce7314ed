/**
 * @module migration/registry
 * Explicit registration of migrations in code.
 *
 * Migrations are listed, not scanned for: the registry is populated by
 * the host application (or a generated index module) and `Discover()`
 * returns the same set on every call.
 */

import type { DbMigration, MigrationSource } from './types';
import { MigrationDiscoveryError } from '../core/errors';

/**
 * A migration class with a zero-argument constructor.
 */
export type MigrationClass = new () => DbMigration;

/**
 * Anything that can be registered: a ready instance or a class to instantiate.
 */
export type MigrationRegistration = DbMigration | MigrationClass;

/**
 * Holds registered migrations and instantiates classes on discovery.
 *
 * @example
 * ```typescript
 * const registry = new MigrationRegistry()
 *   .Register(_202310191050_AddUsersTable)
 *   .Register(addRoles);
 *
 * const migrator = new Migrator(config, registry);
 * ```
 */
export class MigrationRegistry implements MigrationSource {
  private readonly registrations: MigrationRegistration[] = [];

  /**
   * Adds one migration. Returns `this` for chaining.
   */
  Register(registration: MigrationRegistration): this {
    this.registrations.push(registration);
    return this;
  }

  /**
   * Adds several migrations. Returns `this` for chaining.
   */
  RegisterAll(registrations: Iterable<MigrationRegistration>): this {
    for (const registration of registrations) {
      this.Register(registration);
    }
    return this;
  }

  get Count(): number {
    return this.registrations.length;
  }

  /**
   * Returns one instance per registration, in registration order.
   *
   * @throws MigrationDiscoveryError if a class cannot be instantiated
   */
  async Discover(): Promise<DbMigration[]> {
    return this.registrations.map((registration) => {
      if (typeof registration !== 'function') {
        return registration;
      }

      try {
        return new registration();
      } catch (err) {
        throw new MigrationDiscoveryError(registration.name || '(anonymous class)', err);
      }
    });
  }
}

/**
 * Combines several sources into one. Discovery runs each source in turn.
 */
export class CompositeMigrationSource implements MigrationSource {
  private readonly sources: MigrationSource[];

  constructor(sources: MigrationSource[]) {
    this.sources = sources;
  }

  async Discover(): Promise<DbMigration[]> {
    const discovered: DbMigration[] = [];
    for (const source of this.sources) {
      discovered.push(...(await source.Discover()));
    }
    return discovered;
  }
}
