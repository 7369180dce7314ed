import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FindSchemaFile, ParseSchemaFileVersion, ReadSchemaFile } from '../schema/schema-file';
import { SchemaFileError } from '../core/errors';

describe('ParseSchemaFileVersion', () => {
  it('reads the version from the header', () => {
    const content = '--\n-- SQL Server database schema\n-- Migration version: 202310191050 (AddUsersTable)\n--\n';
    expect(ParseSchemaFileVersion(content)).toEqual({ Identifier: 202310191050, Name: 'AddUsersTable' });
  });

  it('trims the name and keeps inner spaces', () => {
    expect(ParseSchemaFileVersion('--Migration version:  42 (  Add users table  )')).toEqual({
      Identifier: 42,
      Name: 'Add users table',
    });
  });

  it('returns null for (none)', () => {
    expect(ParseSchemaFileVersion('-- Migration version: (none)')).toBeNull();
  });

  it('returns null without a header', () => {
    expect(ParseSchemaFileVersion('CREATE TABLE [dbo].[Users] ([Id] INT);')).toBeNull();
  });

  it('returns null for an empty name', () => {
    expect(ParseSchemaFileVersion('-- Migration version: 42 ()')).toBeNull();
  });
});

describe('schema files on disk', () => {
  let dir: string;

  const touch = (name: string, content: string = 'SELECT 1;'): void => {
    fs.writeFileSync(path.join(dir, name), content);
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'strata-schema-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('FindSchemaFile', () => {
    it('returns null for a missing directory', async () => {
      expect(await FindSchemaFile(path.join(dir, 'missing'))).toBeNull();
    });

    it('returns null when there is no schema file', async () => {
      touch('seed.sql');
      expect(await FindSchemaFile(dir)).toBeNull();
    });

    it('prefers schema.sql without an environment', async () => {
      touch('schema.local.sql');
      touch('schema.sql');
      expect(await FindSchemaFile(dir)).toBe(path.join(dir, 'schema.sql'));
    });

    it('falls back to the first environment file without an environment', async () => {
      touch('schema.staging.sql');
      touch('schema.local.sql');
      expect(await FindSchemaFile(dir)).toBe(path.join(dir, 'schema.local.sql'));
    });

    it('prefers the environment file, matching case-insensitively', async () => {
      touch('schema.sql');
      touch('Schema.Local.sql');
      expect(await FindSchemaFile(dir, 'LOCAL')).toBe(path.join(dir, 'Schema.Local.sql'));
    });

    it('falls back to schema.sql when the environment has no file', async () => {
      touch('schema.sql');
      touch('schema.local.sql');
      expect(await FindSchemaFile(dir, 'production')).toBe(path.join(dir, 'schema.sql'));
    });
  });

  describe('ReadSchemaFile', () => {
    it('reads content and version', async () => {
      touch('schema.sql', '-- Migration version: 100 (AddUsers)\nCREATE TABLE [dbo].[Users] ([Id] INT);');
      const filePath = path.join(dir, 'schema.sql');

      const schemaFile = await ReadSchemaFile(filePath);

      expect(schemaFile.FilePath).toBe(filePath);
      expect(schemaFile.Content).toBe('-- Migration version: 100 (AddUsers)\nCREATE TABLE [dbo].[Users] ([Id] INT);');
      expect(schemaFile.Version).toEqual({ Identifier: 100, Name: 'AddUsers' });
    });

    it('wraps a read failure', async () => {
      await expect(ReadSchemaFile(path.join(dir, 'schema.sql'))).rejects.toThrow(SchemaFileError);
    });
  });
});
