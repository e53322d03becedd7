import type { RiskFactor } from '../core/types.js';
import { DEFAULT_RISK_RULES, type RiskContext, type RiskRule } from './riskRules.js';

export const MAX_RISK_SCORE = 100;

export interface RiskAssessment {
  score: number;
  factors: RiskFactor[];
}

export class RiskScorer {
  constructor(private readonly rules: readonly RiskRule[] = DEFAULT_RISK_RULES) {}

  score(ctx: RiskContext): RiskAssessment {
    const factors: RiskFactor[] = [];
    const matchedGroups = new Set<string>();
    for (const rule of this.rules) {
      if (rule.exclusiveGroup && matchedGroups.has(rule.exclusiveGroup)) continue;
      if (!rule.when(ctx)) continue;
      if (rule.exclusiveGroup) matchedGroups.add(rule.exclusiveGroup);
      factors.push({ factor: rule.factor, points: rule.points });
    }
    const total = factors.reduce((sum, f) => sum + f.points, 0);
    return { score: Math.min(MAX_RISK_SCORE, Math.max(0, total)), factors };
  }
}

export const defaultRiskScorer = new RiskScorer();
