import { describe, it, expect } from 'vitest';
import { isForeignKeyViolation, isUniqueViolation } from '../../../src/models/db';

function driverError(code: unknown): Error {
  return Object.assign(new Error('constraint failed'), { code });
}

describe('constraint violation detection', () => {
  it('recognizes unique violations from both drivers', () => {
    expect(isUniqueViolation(driverError('23505'))).toBe(true);
    expect(isUniqueViolation(driverError('SQLITE_CONSTRAINT_UNIQUE'))).toBe(true);
    expect(isUniqueViolation(driverError('SQLITE_CONSTRAINT_PRIMARYKEY'))).toBe(true);
    expect(isUniqueViolation(driverError('23503'))).toBe(false);
  });

  it('recognizes foreign key violations from both drivers', () => {
    expect(isForeignKeyViolation(driverError('23503'))).toBe(true);
    expect(isForeignKeyViolation(driverError('SQLITE_CONSTRAINT_FOREIGNKEY'))).toBe(true);
    expect(isForeignKeyViolation(driverError('23505'))).toBe(false);
  });

  it('ignores values without a string code', () => {
    expect(isUniqueViolation(new Error('plain'))).toBe(false);
    expect(isUniqueViolation(driverError(23505))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
    expect(isForeignKeyViolation('23503')).toBe(false);
  });
});
