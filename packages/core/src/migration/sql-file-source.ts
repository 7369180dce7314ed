/**
 * @module migration/sql-file-source
 * Discovers migrations stored as `.sql` files.
 *
 * A file named `_202310191050_AddUsersTable.sql` becomes migration
 * `202310191050` / `AddUsersTable`. Its upgrade action splits the script
 * on `GO` lines and sends each batch through the migration's
 * transaction, so the whole file commits or rolls back as one unit.
 *
 * Files whose name starts with `_` or a digit are meant to be migrations
 * and must parse; any other `.sql` file (helpers, snippets) is skipped
 * with a warning.
 */

import * as fs from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import type { DbExecutionContext } from '../db/types';
import { MigrationCancelledError } from '../core/errors';
import type { DbMigration, MigrationSource } from './types';
import { ParseMigrationIdentity } from './identity';
import { SplitSqlBatches } from './sql-splitter';

/**
 * Callback for non-fatal discovery issues.
 */
export type DiscoveryWarningCallback = (message: string) => void;

const MIGRATION_FILE_PREFIX = /^[_\d]/;

/**
 * A migration backed by one SQL file. The script is read when the
 * migration runs, not when it is discovered.
 */
export class SqlFileMigration implements DbMigration {
  readonly Identifier: number;
  readonly Name: string;
  readonly FilePath: string;

  constructor(filePath: string) {
    const identity = ParseMigrationIdentity(path.basename(filePath, path.extname(filePath)));
    this.Identifier = identity.Identifier;
    this.Name = identity.Name;
    this.FilePath = filePath;
  }

  async Up(db: DbExecutionContext, signal?: AbortSignal): Promise<void> {
    const script = await fs.promises.readFile(this.FilePath, 'utf-8');

    for (const batch of SplitSqlBatches(script)) {
      for (let run = 0; run < batch.Repeat; run++) {
        if (signal?.aborted) {
          throw new MigrationCancelledError(this);
        }
        await db.ExecuteBatch(batch.Text);
      }
    }
  }
}

/**
 * Scans directories (recursively) for SQL migration files.
 *
 * @example
 * ```typescript
 * const source = new SqlFileMigrationSource(['./migrations'], (w) => console.warn(w));
 * const migrations = await source.Discover();
 * ```
 */
export class SqlFileMigrationSource implements MigrationSource {
  private readonly locations: string[];
  private readonly onWarning?: DiscoveryWarningCallback;

  constructor(locations: string[], onWarning?: DiscoveryWarningCallback) {
    this.locations = locations;
    this.onWarning = onWarning;
  }

  /**
   * Returns one migration per migration file, ordered by path so repeated
   * calls return the same sequence.
   *
   * @throws MigrationIdentityError for a file that looks like a migration
   * but whose name does not parse
   */
  async Discover(): Promise<DbMigration[]> {
    const migrations: DbMigration[] = [];

    for (const location of this.locations) {
      const root = path.resolve(location);

      if (!fs.existsSync(root)) {
        this.onWarning?.(`Migration location does not exist: ${root}`);
        continue;
      }

      const files = await fg('**/*.sql', { cwd: root, absolute: true, onlyFiles: true });
      files.sort();

      for (const filePath of files) {
        const fileName = path.basename(filePath);
        if (!MIGRATION_FILE_PREFIX.test(fileName)) {
          this.onWarning?.(`Skipping ${filePath}: not named like a migration (_{identifier}_{name}.sql)`);
          continue;
        }
        migrations.push(new SqlFileMigration(filePath));
      }
    }

    return migrations;
  }
}
