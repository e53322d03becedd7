import { describe, it, expect } from 'vitest';
import { daysFrom, fromFiletime, parseTimestamp, toIso } from '../../src/utils/time.js';

// 2024-01-01T00:00:00Z as Windows FILETIME
const JAN_2024_FILETIME = '133485408000000000';

describe('time helpers', () => {
  it('converts FILETIME ticks', () => {
    expect(fromFiletime(JAN_2024_FILETIME)?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(fromFiletime(0)).toBeNull();
    expect(fromFiletime('9223372036854775807')).toBeNull();
    expect(fromFiletime('not-a-number')).toBeNull();
  });

  it('parses long digit strings as FILETIME and short ones as epoch ms', () => {
    expect(toIso(JAN_2024_FILETIME)).toBe('2024-01-01T00:00:00.000Z');
    expect(toIso('1704067200000')).toBe('2024-01-01T00:00:00.000Z');
    expect(toIso(1704067200000)).toBe('2024-01-01T00:00:00.000Z');
  });

  it('treats zone-less ISO timestamps as UTC', () => {
    expect(toIso('2024-03-01 12:00:00')).toBe('2024-03-01T12:00:00.000Z');
    expect(toIso('2024-03-01T12:00:00+02:00')).toBe('2024-03-01T10:00:00.000Z');
  });

  it('returns null for blank or unparseable input', () => {
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp('garbage')).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp({})).toBeNull();
  });

  it('adds days', () => {
    expect(daysFrom(new Date('2024-01-01T00:00:00Z'), -1).toISOString()).toBe('2023-12-31T00:00:00.000Z');
  });
});
