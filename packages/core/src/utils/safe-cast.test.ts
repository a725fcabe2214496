import { describe, it, expect } from 'vitest';
import { safeString, safeNumber, safeRecord } from './safe-cast.js';

describe('safeString', () => {
  it('should return the value when it is a string', () => {
    expect(safeString('Symptom')).toBe('Symptom');
    expect(safeString('', 'fallback')).toBe('');
  });

  it('should return the fallback for non-strings', () => {
    expect(safeString(null, 'unlabelled')).toBe('unlabelled');
    expect(safeString(7, 'unlabelled')).toBe('unlabelled');
  });

  it('should throw without a fallback', () => {
    expect(() => safeString(null)).toThrow('Expected string, got null');
    expect(() => safeString(['a'])).toThrow('Expected string, got array');
  });
});

describe('safeNumber', () => {
  it('should return finite numbers', () => {
    expect(safeNumber(42)).toBe(42);
    expect(safeNumber(0, 5)).toBe(0);
  });

  it('should parse numeric strings', () => {
    expect(safeNumber('9007199254740993')).toBe(9007199254740992);
    expect(safeNumber(' 12 ')).toBe(12);
  });

  it('should return the fallback for non-numeric values', () => {
    expect(safeNumber(Number.NaN, 0)).toBe(0);
    expect(safeNumber(Number.POSITIVE_INFINITY, 0)).toBe(0);
    expect(safeNumber('', 0)).toBe(0);
    expect(safeNumber('twelve', 0)).toBe(0);
    expect(safeNumber(undefined, 0)).toBe(0);
  });

  it('should throw without a fallback', () => {
    expect(() => safeNumber(undefined)).toThrow('Expected number, got undefined');
  });
});

describe('safeRecord', () => {
  it('should return plain objects unchanged', () => {
    const value = { topN: 8 };
    expect(safeRecord(value)).toBe(value);
  });

  it('should return the fallback for arrays, null and scalars', () => {
    const fallback = {};
    expect(safeRecord([], fallback)).toBe(fallback);
    expect(safeRecord(null, fallback)).toBe(fallback);
    expect(safeRecord('graph', fallback)).toBe(fallback);
  });

  it('should throw without a fallback', () => {
    expect(() => safeRecord([])).toThrow('Expected record (object), got array');
  });
});
