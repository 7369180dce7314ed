/**
 * @module formatting
 * Console output formatting for the Strata CLI.
 * Provides colored, structured output for migration status and progress.
 */

import chalk from 'chalk';
import type { DbMigration, MigrateResult, MigrationExecutionResult, MigrationState, MigrationStatus } from '@strata/core';

/**
 * Prints the Strata banner to the console.
 */
export function PrintBanner(): void {
  console.log(chalk.cyan.bold('\n  Strata') + chalk.gray(' · ordered, transactional schema migrations'));
  console.log(chalk.gray('  ─────────────────────────────────────────\n'));
}

/**
 * Formats a migration status table for the `info` command.
 */
export function PrintInfoTable(statuses: MigrationStatus[]): void {
  if (statuses.length === 0) {
    console.log(chalk.yellow('  No migrations found.'));
    return;
  }

  console.log(
    chalk.gray('  ') +
      padRight('Identifier', 16) +
      padRight('Name', 50) +
      padRight('State', 12) +
      'Executed at'
  );
  console.log(chalk.gray('  ' + '─'.repeat(104)));

  for (const status of statuses) {
    const stateColor = getStateColor(status.State);

    console.log(
      '  ' +
        padRight(String(status.Identifier), 16) +
        padRight(truncate(status.Name, 48), 50) +
        stateColor(padRight(status.State, 12)) +
        chalk.gray(status.ExecutedAt?.toISOString() ?? '')
    );
  }
  console.log();
}

/**
 * Logs a migration execution start.
 */
export function LogMigrationStart(migration: DbMigration): void {
  console.log(chalk.gray('  ') + chalk.white(`Migrating to ${migration.Identifier}: ${migration.Name}...`));
}

/**
 * Logs the error of a migration that did not apply. Successful outcomes
 * are already reported through the engine's log messages.
 */
export function LogMigrationEnd(result: MigrationExecutionResult): void {
  if (!result.Success && result.Error) {
    console.log(chalk.red(`    ${result.Error.message}`));
  }
}

/**
 * Logs an informational message.
 */
export function LogInfo(message: string): void {
  console.log(chalk.gray('  ') + message);
}

/**
 * Logs a non-fatal warning.
 */
export function LogWarning(message: string): void {
  console.log(chalk.yellow('  ' + message));
}

/**
 * Logs a success summary.
 */
export function LogSuccess(message: string): void {
  console.log(chalk.green('\n  ' + message));
}

/**
 * Logs an error message.
 */
export function LogError(message: string): void {
  console.log(chalk.red('\n  ERROR: ' + message));
}

/**
 * Prints a summary banner after a migrate operation.
 */
export function PrintMigrateSummary(result: MigrateResult): void {
  console.log();
  console.log(chalk.gray('  ' + '─'.repeat(50)));

  if (result.Success) {
    const skipped = result.MigrationsSkipped > 0 ? `, ${result.MigrationsSkipped} already applied elsewhere` : '';
    console.log(
      chalk.green.bold('  SUCCESS') +
      chalk.gray(` · ${result.MigrationsApplied} migration(s) applied${skipped} in ${formatElapsed(result.TotalExecutionTimeMS)}`)
    );
  } else {
    console.log(
      chalk.red.bold('  FAILED') +
      chalk.gray(` · ${result.MigrationsApplied} migration(s) applied before failure`)
    );
    if (result.ErrorMessage) {
      console.log(chalk.red(`  ${result.ErrorMessage}`));
    }
    if (result.NotAttempted.length > 0) {
      console.log(chalk.gray(`  Not attempted: ${result.NotAttempted.map((m) => m.Identifier).join(', ')}`));
    }
  }

  if (result.CurrentIdentifier !== null) {
    console.log(chalk.gray(`  Current identifier: `) + chalk.white(String(result.CurrentIdentifier)));
  }

  for (const err of result.CallbackErrors) {
    console.log(chalk.yellow(`  Progress output failed: ${err.message}`));
  }

  console.log(chalk.gray('  ' + '─'.repeat(50)));
  console.log();
}

/**
 * Formats elapsed time in a human-readable way.
 */
export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

/**
 * Returns a chalk color function for a migration state.
 */
function getStateColor(state: MigrationState): chalk.Chalk {
  switch (state) {
    case 'APPLIED':
      return chalk.green;
    case 'PENDING':
      return chalk.yellow;
    case 'MISSING':
      return chalk.red;
  }
}

/**
 * Right-pads a string to a given width.
 */
function padRight(str: string, width: number): string {
  return str.length >= width ? str : str + ' '.repeat(width - str.length);
}

/**
 * Truncates a string to a maximum length, appending '...' if needed.
 */
function truncate(str: string, maxLen: number): string {
  return str.length <= maxLen ? str : str.substring(0, maxLen - 3) + '...';
}
