import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LoadConfig, LoadMigrationLocations, normalizeConfigKeys } from '../config-loader';

let dir: string;

const credentials = {
  STRATA_DATABASE: 'app_db',
  STRATA_USER: 'sa',
  STRATA_PASSWORD: 'test-secret',
};

function writeJson(name: string, value: unknown): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, JSON.stringify(value));
  return filePath;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'strata-config-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('LoadConfig', () => {
  it('applies defaults around the required settings', () => {
    const config = LoadConfig({}, dir, credentials);

    expect(config.Database).toEqual({
      Server: 'localhost',
      Port: 1433,
      Database: 'app_db',
      User: 'sa',
      Password: 'test-secret',
      Options: {
        TrustServerCertificate: true,
        Encrypt: false,
        RequestTimeout: 300000,
        ConnectionTimeout: 30000,
      },
    });
    expect(config.Migrations).toEqual({
      Locations: [path.join(dir, 'migrations')],
      SchemaDirectory: undefined,
      Environment: undefined,
    });
    expect(config.Ledger).toEqual({ Schema: undefined, Table: undefined });
  });

  it('prefers CLI flags over environment variables over the config file', () => {
    writeJson('strata.json', { database: { server: 'file-host', database: 'file_db' } });
    const env = { ...credentials, STRATA_SERVER: 'env-host' };

    expect(LoadConfig({ Server: 'cli-host' }, dir, env).Database.Server).toBe('cli-host');
    expect(LoadConfig({}, dir, env).Database.Server).toBe('env-host');
    expect(LoadConfig({}, dir, env).Database.Database).toBe('app_db');
    expect(LoadConfig({}, dir, { STRATA_USER: 'sa', STRATA_PASSWORD: 'test-secret' }).Database.Database).toBe('file_db');
  });

  it('uses .env below the config file', () => {
    writeJson('strata.json', { database: { database: 'file_db' } });
    fs.writeFileSync(path.join(dir, '.env'), 'STRATA_DATABASE=dotenv_db\nSTRATA_USER=dotenv_user\nSTRATA_PASSWORD=test-secret\n');

    const config = LoadConfig({}, dir, {});

    expect(config.Database.Database).toBe('file_db');
    expect(config.Database.User).toBe('dotenv_user');
    expect(config.Database.Password).toBe('test-secret');
  });

  it('reads PascalCase config files and resolves paths against the working directory', () => {
    writeJson('strata.config.json', {
      Database: { Port: 1500, Options: { Encrypt: true } },
      Ledger: { Schema: 'ops', Table: 'schema_log' },
      Migrations: { Locations: ['db/migrations'], SchemaDirectory: 'db/schema', Environment: 'staging' },
      Concurrency: { UseAdvisoryLock: false, LockTimeoutMS: 5000 },
    });

    const config = LoadConfig({}, dir, credentials);

    expect(config.Database.Port).toBe(1500);
    expect(config.Database.Options?.Encrypt).toBe(true);
    expect(config.Ledger).toEqual({ Schema: 'ops', Table: 'schema_log' });
    expect(config.Migrations).toEqual({
      Locations: [path.join(dir, 'db/migrations')],
      SchemaDirectory: path.join(dir, 'db/schema'),
      Environment: 'staging',
    });
    expect(config.Concurrency).toEqual({ UseAdvisoryLock: false, LockResource: undefined, LockTimeoutMS: 5000 });
  });

  it('lets flags override file settings for the ledger and lock', () => {
    writeJson('strata.json', { ledger: { schema: 'ops' }, concurrency: { useAdvisoryLock: true } });

    const config = LoadConfig({ Schema: 'audit', UseAdvisoryLock: false, Locations: 'a, b' }, dir, credentials);

    expect(config.Ledger?.Schema).toBe('audit');
    expect(config.Concurrency?.UseAdvisoryLock).toBe(false);
    expect(config.Migrations?.Locations).toEqual([path.join(dir, 'a'), path.join(dir, 'b')]);
  });

  it('reads the port and environment from environment variables', () => {
    const config = LoadConfig({}, dir, { ...credentials, STRATA_PORT: '1444', STRATA_ENVIRONMENT: 'local' });

    expect(config.Database.Port).toBe(1444);
    expect(config.Migrations?.Environment).toBe('local');
  });

  it('requires a database name', () => {
    expect(() => LoadConfig({}, dir, { STRATA_USER: 'sa', STRATA_PASSWORD: 'test-secret' })).toThrow(
      'Database name is required. Set via --database, STRATA_DATABASE env var, or config file.'
    );
  });

  it('requires a password', () => {
    expect(() => LoadConfig({}, dir, { STRATA_DATABASE: 'app_db', STRATA_USER: 'sa' })).toThrow(
      'Database password is required. Set via --password, STRATA_PASSWORD env var, or config file.'
    );
  });

  it('rejects an invalid port', () => {
    expect(() => LoadConfig({}, dir, { ...credentials, STRATA_PORT: 'abc' })).toThrow('Invalid port: abc');
  });

  it('rejects a missing explicit config file', () => {
    expect(() => LoadConfig({ Config: 'missing.json' }, dir, credentials)).toThrow(
      `Config file not found: ${path.join(dir, 'missing.json')}`
    );
  });

  it('rejects settings of the wrong type', () => {
    const filePath = writeJson('strata.json', { database: { port: '1433' } });

    expect(() => LoadConfig({}, dir, credentials)).toThrow(`Config file ${filePath}: "Port" must be a number`);
  });

  it('rejects malformed JSON', () => {
    fs.writeFileSync(path.join(dir, 'strata.json'), '{ "database": ');

    expect(() => LoadConfig({}, dir, credentials)).toThrow(`Could not parse config file ${path.join(dir, 'strata.json')}`);
  });
});

describe('LoadMigrationLocations', () => {
  it('needs no credentials', () => {
    writeJson('strata.json', { migrations: { locations: ['sql'] } });

    expect(LoadMigrationLocations({}, dir)).toEqual([path.join(dir, 'sql')]);
  });
});

describe('normalizeConfigKeys', () => {
  it('maps known camelCase keys recursively and keeps the rest', () => {
    expect(
      normalizeConfigKeys({
        database: { server: 'db', custom: 1 },
        migrations: { locations: ['a'] },
        Ledger: { table: 't' },
      })
    ).toEqual({
      Database: { Server: 'db', custom: 1 },
      Migrations: { Locations: ['a'] },
      Ledger: { Table: 't' },
    });
  });
});
