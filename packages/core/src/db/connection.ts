/**
 * @module db/connection
 * SQL Server connection pool management.
 *
 * Uses a single-connection pool: every request, transaction and the
 * session-owned advisory lock share one underlying connection, and
 * migrations execute strictly one at a time.
 */

import * as sql from 'mssql';
import type { DatabaseConfig } from './types';
import { ConnectionError, toError } from '../core/errors';
import { InitializeDatabaseDefaults } from './defaults';

/**
 * Manages the SQL Server connection pool used for migration execution.
 */
export class ConnectionManager {
  private pool: sql.ConnectionPool | null = null;
  private readonly config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Opens the connection pool. Must be called before executing any SQL.
   * Subsequent calls are no-ops while connected.
   *
   * @throws ConnectionError if the server cannot be reached
   */
  async Connect(): Promise<void> {
    if (this.pool?.connected) {
      return;
    }

    InitializeDatabaseDefaults();

    const pool = new sql.ConnectionPool(this.buildPoolConfig());
    try {
      await pool.connect();
    } catch (err) {
      throw new ConnectionError(
        `Could not connect to ${this.config.Server}:${this.config.Port ?? 1433}/${this.config.Database}: ${toError(err).message}`,
        err
      );
    }
    this.pool = pool;
  }

  /**
   * Returns the active connection pool.
   * @throws Error if the pool has not been connected yet.
   */
  GetPool(): sql.ConnectionPool {
    if (!this.pool?.connected) {
      throw new Error(
        'Connection pool is not connected. Call Connect() before accessing the pool.'
      );
    }
    return this.pool;
  }

  /**
   * Closes the connection pool. Safe to call multiple times.
   */
  async Disconnect(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.close();
    }
  }

  private buildPoolConfig(): sql.config {
    return {
      server: this.config.Server,
      port: this.config.Port ?? 1433,
      user: this.config.User,
      password: this.config.Password,
      database: this.config.Database,
      options: {
        encrypt: this.config.Options?.Encrypt ?? false,
        trustServerCertificate: this.config.Options?.TrustServerCertificate ?? true,
        enableArithAbort: true,
      },
      pool: {
        max: 1,
        min: 1,
      },
      requestTimeout: this.config.Options?.RequestTimeout ?? 300_000,
      connectionTimeout: this.config.Options?.ConnectionTimeout ?? 30_000,
    };
  }
}
