/**
 * COA Scoring Types
 * =================
 *
 * WEIGHTS (LOCKED v1):
 * --------------------
 * mission / combat alignment 40%: missionAlignment 0.22, combatPower 0.13, constraintFit 0.05
 * threat response 20%
 * environment fit 12%: environmentFit 0.07, mobility 0.05
 * resources 15%, assets 13%
 */

import type { BaseFactor, FactorScores } from '../../contracts/score.contract.js';

export const DEFAULT_FACTOR_WEIGHTS: FactorScores = {
  missionAlignment: 0.22,
  combatPower: 0.13,
  constraintFit: 0.05,
  threatResponse: 0.2,
  environmentFit: 0.07,
  mobility: 0.05,
  resources: 0.15,
  assets: 0.13,
};

export const FACTOR_FALLBACK = 0.5;
export const NEUTRAL_ASSET_SCORE = 0.5;

export const FACTOR_LABELS: Record<BaseFactor, string> = {
  missionAlignment: 'mission alignment',
  combatPower: 'combat power',
  constraintFit: 'constraint fit',
  threatResponse: 'threat response',
  environmentFit: 'environment fit',
  mobility: 'mobility',
  resources: 'resource availability',
  assets: 'asset availability',
};

// ═══════════════════════════════════════════════════════════════
// EXPLAINABILITY
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_THRESHOLD = 0.5;

export const FACTOR_THRESHOLDS: Partial<Record<BaseFactor, number>> = {
  threatResponse: 0.6,
  missionAlignment: 0.6,
};

/** strength ≥ threshold + margin, weakness ≤ threshold − margin */
export const EXPLAIN_MARGIN = 0.1;

export const RESOURCE_SHORTFALL_BELOW = 0.3;
export const ENVIRONMENT_UNFAVORABLE_BELOW = 0.4;

export const CONFIDENCE_SHARES = {
  dataCompleteness: 0.4,
  spread: 0.3,
  contextCompleteness: 0.3,
} as const;

export const COMPARISON_CLOSE_GAP = 0.05;
export const COMPARISON_CLEAR_GAP = 0.15;

// ═══════════════════════════════════════════════════════════════
// INTERNAL RESULTS
// ═══════════════════════════════════════════════════════════════

export interface FactorResult {
  score: number;
  /** true when the score is a fallback constant for missing data */
  fallback: boolean;
  warnings: string[];
}

export type FactorResults = Record<BaseFactor, FactorResult>;

export interface Explanation {
  strengths: string[];
  weaknesses: string[];
  confidence: number;
}
