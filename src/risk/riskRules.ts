import type { IdentityAttributes, IdentityType } from '../core/types.js';
import { daysFrom, parseTimestamp } from '../utils/time.js';

export interface RiskContext {
  identityType: IdentityType;
  owner: string | null;
  linkedSystem: string | null;
  attributes: IdentityAttributes;
  now: Date;
}

export interface RiskRule {
  factor: string;
  points: number;
  /** Within a group only the first matching rule (table order) applies. */
  exclusiveGroup?: string;
  when(ctx: RiskContext): boolean;
}

function blank(value: string | null): boolean {
  return value === null || value.trim() === '';
}

function notAfter(ctx: RiskContext): Date | null {
  return ctx.identityType === 'cert' ? parseTimestamp(ctx.attributes.not_after) : null;
}

function expiresBefore(ctx: RiskContext, days: number): boolean {
  const expiry = notAfter(ctx);
  return expiry !== null && expiry.getTime() < daysFrom(ctx.now, days).getTime();
}

function hasSan(attributes: IdentityAttributes): boolean {
  const san = attributes.san;
  return Array.isArray(san) ? san.length > 0 : typeof san === 'string' && san.trim() !== '';
}

export const DEFAULT_RISK_RULES: readonly RiskRule[] = [
  { factor: 'no_owner', points: 25, when: (ctx) => blank(ctx.owner) },
  { factor: 'no_linked_system', points: 15, when: (ctx) => blank(ctx.linkedSystem) },
  { factor: 'cert_expired', points: 40, exclusiveGroup: 'expiry', when: (ctx) => expiresBefore(ctx, 0) },
  { factor: 'cert_expiring_30d', points: 30, exclusiveGroup: 'expiry', when: (ctx) => expiresBefore(ctx, 30) },
  { factor: 'cert_expiring_90d', points: 15, exclusiveGroup: 'expiry', when: (ctx) => expiresBefore(ctx, 90) },
  {
    factor: 'cert_missing_san',
    points: 10,
    when: (ctx) => ctx.identityType === 'cert' && !hasSan(ctx.attributes),
  },
  {
    // never set or unparseable counts as stale
    factor: 'password_stale',
    points: 20,
    when: (ctx) => {
      if (ctx.identityType !== 'svc_acct') return false;
      const lastSet = parseTimestamp(ctx.attributes.password_last_set);
      return lastSet === null || lastSet.getTime() < daysFrom(ctx.now, -365).getTime();
    },
  },
  {
    factor: 'account_disabled',
    points: 10,
    when: (ctx) => ctx.identityType === 'svc_acct' && ctx.attributes.enabled === false,
  },
];
