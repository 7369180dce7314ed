import { describe, it, expect } from 'vitest';
import { CompositeMigrationSource, MigrationRegistry } from '../migration/registry';
import { DefineMigration, Migration } from '../migration/migration';
import { MigrationDiscoveryError } from '../core/errors';
import type { DbMigration } from '../migration/types';

class _202310191050_AddUsersTable extends Migration {
  async Up(): Promise<void> {
    return undefined;
  }
}

const addRoles = DefineMigration({
  Identifier: 202310201200,
  Name: 'AddRoles',
  Up: async () => undefined,
});

describe('MigrationRegistry', () => {
  it('instantiates classes and passes instances through, in registration order', async () => {
    const registry = new MigrationRegistry().Register(addRoles).Register(_202310191050_AddUsersTable);

    const discovered = await registry.Discover();

    expect(registry.Count).toBe(2);
    expect(discovered[0]).toBe(addRoles);
    expect(discovered[1]).toBeInstanceOf(_202310191050_AddUsersTable);
    expect(discovered.map((m) => m.Identifier)).toEqual([202310201200, 202310191050]);
  });

  it('returns fresh class instances on every discovery', async () => {
    const registry = new MigrationRegistry().RegisterAll([_202310191050_AddUsersTable]);

    const [first] = await registry.Discover();
    const [second] = await registry.Discover();

    expect(first).not.toBe(second);
    expect(first.Identifier).toBe(second.Identifier);
  });

  it('is empty until something is registered', async () => {
    expect(await new MigrationRegistry().Discover()).toEqual([]);
  });

  it('wraps a throwing constructor in a discovery error', async () => {
    class _202310220900_NeedsConfig extends Migration {
      constructor() {
        super();
        throw new Error('DATA_DIR is not set');
      }

      async Up(): Promise<void> {
        return undefined;
      }
    }

    const registry = new MigrationRegistry().Register(_202310220900_NeedsConfig);

    await expect(registry.Discover()).rejects.toThrow(MigrationDiscoveryError);
    await expect(registry.Discover()).rejects.toThrow(
      'Could not instantiate migration "_202310220900_NeedsConfig": DATA_DIR is not set'
    );
  });
});

describe('CompositeMigrationSource', () => {
  it('concatenates its sources in order', async () => {
    const extra: DbMigration = { Identifier: 100, Name: 'Seed', Up: async () => undefined };
    const source = new CompositeMigrationSource([
      new MigrationRegistry().Register(addRoles),
      { Discover: async () => [extra] },
    ]);

    expect(await source.Discover()).toEqual([addRoles, extra]);
  });
});
