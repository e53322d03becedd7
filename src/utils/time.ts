export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// 100ns intervals between 1601-01-01 and 1970-01-01
const FILETIME_EPOCH_OFFSET = 116_444_736_000_000_000n;

export function daysFrom(now: Date, days: number): Date {
  return new Date(now.getTime() + days * MS_PER_DAY);
}

/**
 * Convert a Windows FILETIME (100ns ticks since 1601) to a Date.
 * Zero and the "never" sentinel (0x7FFFFFFFFFFFFFFF) yield null.
 */
export function fromFiletime(ticks: string | number | bigint): Date | null {
  let value: bigint;
  try {
    value = BigInt(ticks);
  } catch {
    return null;
  }
  if (value <= 0n || value >= 0x7fffffffffffffffn) return null;
  const ms = (value - FILETIME_EPOCH_OFFSET) / 10_000n;
  return new Date(Number(ms));
}

/**
 * Best-effort timestamp parse. Accepts Date, ISO-8601 strings (a missing zone
 * means UTC), epoch milliseconds, and FILETIME values (all-digit strings or
 * numbers above 10^15).
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    if (value > 1e15) return fromFiletime(BigInt(Math.trunc(value)));
    return new Date(value);
  }
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (trimmed === '') return null;
  if (/^\d+$/.test(trimmed)) {
    return trimmed.length > 15 ? fromFiletime(trimmed) : new Date(Number(trimmed));
  }
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(trimmed);
  const isoLike = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/.test(trimmed);
  const ms = Date.parse(isoLike && !hasZone ? `${trimmed.replace(' ', 'T')}Z` : trimmed);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export function toIso(value: unknown): string | null {
  const d = parseTimestamp(value);
  return d ? d.toISOString() : null;
}
