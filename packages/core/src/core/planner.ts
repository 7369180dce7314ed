/**
 * @module core/planner
 * Decides which migrations a run executes, by comparing the discovered
 * migrations against the ledger.
 *
 * - Every migration must have a valid identity, and identifiers must be unique.
 * - Migrations already recorded in the ledger are skipped.
 * - A target identifier excludes every migration above it.
 * - Pending migrations are ordered ascending by identifier.
 *
 * Everything here is pure; the runner supplies the inputs.
 */

import type { DbMigration, MigrationStatus } from '../migration/types';
import { ValidateMigrationIdentity } from '../migration/identity';
import type { ExecutedMigrationEntry } from '../ledger/types';
import { DuplicateMigrationError } from './errors';

/**
 * Result of planning a run.
 */
export interface MigrationPlan {
  /** Migrations to execute, ascending by identifier */
  Pending: DbMigration[];

  /** Discovered migrations (within the target) already recorded in the ledger */
  AlreadyApplied: DbMigration[];
}

/**
 * Checks every migration's identity and rejects duplicate identifiers.
 * Returns the migrations sorted ascending by identifier.
 *
 * @throws MigrationIdentityError for an invalid identifier or empty name
 * @throws DuplicateMigrationError when two migrations share an identifier
 */
export function ValidateMigrations(migrations: DbMigration[]): DbMigration[] {
  const byIdentifier = new Map<number, DbMigration[]>();

  for (const migration of migrations) {
    const identity = ValidateMigrationIdentity(
      { Identifier: migration.Identifier, Name: migration.Name },
      describeMigration(migration)
    );
    const group = byIdentifier.get(identity.Identifier) ?? [];
    group.push(migration);
    byIdentifier.set(identity.Identifier, group);
  }

  for (const [identifier, group] of byIdentifier) {
    if (group.length > 1) {
      throw new DuplicateMigrationError(identifier, group.map((m) => m.Name));
    }
  }

  return [...migrations].sort((a, b) => a.Identifier - b.Identifier);
}

/**
 * Computes the pending set.
 *
 * @param discovered - Every migration the source returned, in any order
 * @param applied - Identifiers recorded in the ledger
 * @param targetIdentifier - When given, only migrations at or below it are considered
 * @throws MigrationIdentityError / DuplicateMigrationError, see {@link ValidateMigrations}
 *
 * @example
 * ```typescript
 * const plan = PlanMigrations([m300, m100, m200], new Set([100]));
 * // plan.Pending → [m200, m300]
 * ```
 */
export function PlanMigrations(
  discovered: DbMigration[],
  applied: ReadonlySet<number>,
  targetIdentifier?: number
): MigrationPlan {
  const ordered = ValidateMigrations(discovered).filter(
    (m) => targetIdentifier === undefined || m.Identifier <= targetIdentifier
  );

  return {
    Pending: ordered.filter((m) => !applied.has(m.Identifier)),
    AlreadyApplied: ordered.filter((m) => applied.has(m.Identifier)),
  };
}

/**
 * Combines discovered migrations and ledger rows into one status list,
 * ordered by identifier. Ledger rows with no discovered counterpart are
 * reported as `MISSING`.
 */
export function BuildStatusReport(
  discovered: DbMigration[],
  entries: ExecutedMigrationEntry[]
): MigrationStatus[] {
  const entriesById = new Map(entries.map((e) => [e.Identifier, e]));
  const discoveredIds = new Set(discovered.map((m) => m.Identifier));

  const report = discovered.map((migration): MigrationStatus => {
    const entry = entriesById.get(migration.Identifier);
    return {
      Identifier: migration.Identifier,
      Name: migration.Name,
      State: entry ? 'APPLIED' : 'PENDING',
      ExecutedAt: entry?.ExecutedAt ?? null,
    };
  });

  for (const entry of entries) {
    if (!discoveredIds.has(entry.Identifier)) {
      report.push({
        Identifier: entry.Identifier,
        Name: entry.Name,
        State: 'MISSING',
        ExecutedAt: entry.ExecutedAt,
      });
    }
  }

  return report.sort((a, b) => a.Identifier - b.Identifier);
}

function describeMigration(migration: DbMigration): string {
  const name = typeof migration.Name === 'string' && migration.Name.length > 0 ? migration.Name : migration.constructor.name;
  return `${String(migration.Identifier)} ${name}`.trim();
}
