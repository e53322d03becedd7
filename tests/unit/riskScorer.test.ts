import { describe, it, expect } from 'vitest';
import { RiskScorer, defaultRiskScorer } from '../../src/risk/riskScorer.js';
import type { RiskContext } from '../../src/risk/riskRules.js';
import { daysFrom } from '../../src/utils/time.js';

const now = new Date('2026-01-01T00:00:00Z');

function ctx(partial: Partial<RiskContext>): RiskContext {
  return { identityType: 'svc_acct', owner: null, linkedSystem: null, attributes: {}, now, ...partial };
}

describe('RiskScorer', () => {
  it('scores a newly discovered stale service account at 60', () => {
    const result = defaultRiskScorer.score(
      ctx({ attributes: { password_last_set: daysFrom(now, -400).toISOString(), enabled: true } }),
    );
    expect(result).toEqual({
      score: 60,
      factors: [
        { factor: 'no_owner', points: 25 },
        { factor: 'no_linked_system', points: 15 },
        { factor: 'password_stale', points: 20 },
      ],
    });
  });

  it('treats a missing password timestamp as stale', () => {
    expect(defaultRiskScorer.score(ctx({ owner: 'alice', linkedSystem: 'db01' })).factors).toEqual([
      { factor: 'password_stale', points: 20 },
    ]);
  });

  it('flags disabled accounts and counts blank owners as missing', () => {
    const result = defaultRiskScorer.score(
      ctx({
        owner: '  ',
        linkedSystem: 'db01',
        attributes: { password_last_set: daysFrom(now, -10).toISOString(), enabled: false },
      }),
    );
    expect(result.score).toBe(35);
    expect(result.factors.map((f) => f.factor)).toEqual(['no_owner', 'account_disabled']);
  });

  it('applies only the most severe expiry tier', () => {
    const result = defaultRiskScorer.score(
      ctx({
        identityType: 'cert',
        attributes: { not_after: daysFrom(now, 20).toISOString(), san: ['web01.test.local'] },
      }),
    );
    expect(result.score).toBe(70);
    expect(result.factors.map((f) => f.factor)).toEqual(['no_owner', 'no_linked_system', 'cert_expiring_30d']);
  });

  it('scores an expired certificate without SAN', () => {
    const result = defaultRiskScorer.score(
      ctx({ identityType: 'cert', attributes: { not_after: daysFrom(now, -1).toISOString() } }),
    );
    expect(result.score).toBe(90);
    expect(result.factors.map((f) => f.factor)).toEqual([
      'no_owner',
      'no_linked_system',
      'cert_expired',
      'cert_missing_san',
    ]);
  });

  it('moves between tiers as time passes', () => {
    const attributes = { not_after: daysFrom(now, 60).toISOString(), san: ['a.test.local'] };
    const base = { identityType: 'cert' as const, owner: 'pki-team', linkedSystem: 'web', attributes };
    expect(defaultRiskScorer.score(ctx(base)).factors).toEqual([{ factor: 'cert_expiring_90d', points: 15 }]);
    expect(defaultRiskScorer.score(ctx({ ...base, now: daysFrom(now, 40) })).factors).toEqual([
      { factor: 'cert_expiring_30d', points: 30 },
    ]);
  });

  it('caps the score at 100', () => {
    const scorer = new RiskScorer([
      { factor: 'a', points: 80, when: () => true },
      { factor: 'b', points: 50, when: () => true },
    ]);
    expect(scorer.score(ctx({})).score).toBe(100);
  });
});
