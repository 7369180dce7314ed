import { describe, it, expect } from 'vitest';
import { SplitSqlBatches } from '../migration/sql-splitter';

describe('SplitSqlBatches', () => {
  it('splits on GO separators', () => {
    const batches = SplitSqlBatches('SELECT 1;\nGO\nSELECT 2;\nGO');
    expect(batches).toEqual([
      { Text: 'SELECT 1;', Repeat: 1, Line: 1 },
      { Text: 'SELECT 2;', Repeat: 1, Line: 3 },
    ]);
  });

  it('handles case-insensitive GO', () => {
    const batches = SplitSqlBatches('SELECT 1;\ngo\nSELECT 2;\nGo\nSELECT 3;\nGO');
    expect(batches.map((b) => b.Text)).toEqual(['SELECT 1;', 'SELECT 2;', 'SELECT 3;']);
  });

  it('handles GO with surrounding whitespace and a trailing comment', () => {
    const batches = SplitSqlBatches('SELECT 1;\n  GO  \nSELECT 2;\nGO -- end');
    expect(batches.map((b) => b.Text)).toEqual(['SELECT 1;', 'SELECT 2;']);
  });

  it('reads the repeat count of GO n', () => {
    const batches = SplitSqlBatches('INSERT INTO [T] VALUES (1);\nGO 5');
    expect(batches).toEqual([{ Text: 'INSERT INTO [T] VALUES (1);', Repeat: 5, Line: 1 }]);
  });

  it('returns a single batch when no GO is present', () => {
    expect(SplitSqlBatches('SELECT 1;\nSELECT 2;')).toEqual([{ Text: 'SELECT 1;\nSELECT 2;', Repeat: 1, Line: 1 }]);
  });

  it('does not treat GO inside a longer word as a separator', () => {
    expect(SplitSqlBatches('SELECT GOTO;\nGO').map((b) => b.Text)).toEqual(['SELECT GOTO;']);
  });

  it('splits CRLF scripts', () => {
    expect(SplitSqlBatches('SELECT 1;\r\nGO\r\nSELECT 2;').map((b) => b.Text)).toEqual(['SELECT 1;', 'SELECT 2;']);
  });

  it('drops empty and whitespace-only batches', () => {
    expect(SplitSqlBatches('')).toEqual([]);
    expect(SplitSqlBatches('  \n  \nGO\nSELECT 1;\nGO\nGO')).toEqual([{ Text: 'SELECT 1;', Repeat: 1, Line: 4 }]);
  });

  it('reports the line of the first non-blank line of each batch', () => {
    const batches = SplitSqlBatches('SELECT 1;\nGO\n\nSELECT 2;\nSELECT 3;\nGO');
    expect(batches.map((b) => b.Line)).toEqual([1, 4]);
  });

  it('ignores GO inside a block comment', () => {
    const script = '/*\nGO\n*/\nSELECT 1;';
    expect(SplitSqlBatches(script)).toEqual([{ Text: script, Repeat: 1, Line: 1 }]);
  });

  it('ignores comment markers inside strings and line comments', () => {
    const batches = SplitSqlBatches("SELECT '/*';\nGO\nSELECT 2; -- /* not a block\nGO\nSELECT 3;");
    expect(batches.map((b) => b.Text)).toEqual(["SELECT '/*';", 'SELECT 2; -- /* not a block', 'SELECT 3;']);
  });

  it('ignores GO inside a multi-line string literal', () => {
    const insert = "INSERT INTO [T] VALUES (N'first\nGO\nlast');";
    const batches = SplitSqlBatches(`${insert}\nGO\nSELECT 1;`);
    expect(batches).toEqual([
      { Text: insert, Repeat: 1, Line: 1 },
      { Text: 'SELECT 1;', Repeat: 1, Line: 5 },
    ]);
  });

  it('keeps splitting after a string with escaped quotes spans lines', () => {
    const batches = SplitSqlBatches("SELECT 'it''s\nGO';\nGO\nSELECT 2;");
    expect(batches.map((b) => b.Text)).toEqual(["SELECT 'it''s\nGO';", 'SELECT 2;']);
  });
});
