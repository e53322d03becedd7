import { z } from 'zod';
import type { RiskFactor } from '../core/types.js';
import type { Row } from '../db/client.js';
import { RepositoryError } from './errors.js';

export function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw new RepositoryError(`Column ${column} is not text`);
  return value;
}

export function textOrNull(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') throw new RepositoryError(`Column ${column} is not text`);
  return value;
}

export function int(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') throw new RepositoryError(`Column ${column} is not numeric`);
  return value;
}

export function toDate(value: string): Date {
  return new Date(value);
}

export function toDateOrNull(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

export function parseJsonObject(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return { ...parsed };
  }
  return {};
}

const riskFactorsSchema = z.array(z.object({ factor: z.string(), points: z.number() }));

export function parseRiskFactors(text: string): RiskFactor[] {
  const parsed = riskFactorsSchema.safeParse(JSON.parse(text));
  return parsed.success ? parsed.data : [];
}

export function clampLimit(limit: number | undefined, fallback = 50, max = 500): number {
  if (limit === undefined || !Number.isFinite(limit) || limit < 1) return fallback;
  return Math.min(max, Math.floor(limit));
}

export function clampOffset(offset: number | undefined): number {
  if (offset === undefined || !Number.isFinite(offset) || offset < 0) return 0;
  return Math.floor(offset);
}
