import { describe, it, expect } from 'vitest';
import { GetSqlErrorNumber, IsUniqueViolation } from '../db/sql-errors';

describe('GetSqlErrorNumber', () => {
  it('reads the number of a request error', () => {
    expect(GetSqlErrorNumber({ number: 2627, message: 'Violation of PRIMARY KEY constraint' })).toBe(2627);
  });

  it('falls back to the original driver error', () => {
    expect(GetSqlErrorNumber({ originalError: { number: 1205 } })).toBe(1205);
  });

  it('returns null for errors without a number', () => {
    expect(GetSqlErrorNumber(new Error('boom'))).toBeNull();
    expect(GetSqlErrorNumber('boom')).toBeNull();
    expect(GetSqlErrorNumber(null)).toBeNull();
    expect(GetSqlErrorNumber({ number: '2627' })).toBeNull();
  });
});

describe('IsUniqueViolation', () => {
  it('recognizes primary key and unique index violations', () => {
    expect(IsUniqueViolation({ number: 2627 })).toBe(true);
    expect(IsUniqueViolation({ number: 2601 })).toBe(true);
  });

  it('rejects other errors', () => {
    expect(IsUniqueViolation({ number: 547 })).toBe(false);
    expect(IsUniqueViolation(new Error('duplicate key'))).toBe(false);
  });
});
