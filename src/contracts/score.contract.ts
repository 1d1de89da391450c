/**
 * Score Contract
 * ==============
 *
 * Output records of the scoring pipeline.
 *
 * INVARIANTS:
 * - every score and total ∈ [0, 1]
 * - excluded === true ⇒ excludeReason !== null
 * - factors / baseTotal are never rewritten after scoring; rule and
 *   METT-C effects show up in ruleAdjustment, mettc and total only
 */

import type { CoaType } from './coa.contract.js';

// ═══════════════════════════════════════════════════════════════
// FACTORS
// ═══════════════════════════════════════════════════════════════

export const BASE_FACTORS = [
  'missionAlignment',
  'combatPower',
  'constraintFit',
  'threatResponse',
  'environmentFit',
  'mobility',
  'resources',
  'assets',
] as const;

export type BaseFactor = (typeof BASE_FACTORS)[number];

export type FactorScores = Record<BaseFactor, number>;

export const METTC_DIMENSIONS = ['mission', 'enemy', 'terrain', 'troops', 'civilian', 'time'] as const;

export type MettCDimension = (typeof METTC_DIMENSIONS)[number];

export type MettCWeights = Record<MettCDimension, number>;

export interface MettCScore extends Record<MettCDimension, number> {
  total: number;
  weights: MettCWeights;
  warnings: string[];
}

// ═══════════════════════════════════════════════════════════════
// BREAKDOWN
// ═══════════════════════════════════════════════════════════════

export type ExcludeReason = 'civilian_protection_below_threshold' | 'time_constraint_violated';

export interface ScoreBreakdown {
  coaId: string;
  coaType: CoaType;

  factors: FactorScores;
  contributions: FactorScores;       // factor × weight
  baseTotal: number;

  ruleAdjustment: number;
  appliedRule: string | null;

  mettc: MettCScore | null;
  mettcBlended: boolean;

  total: number;

  excluded: boolean;
  excludeReason: ExcludeReason | null;
  mettCFilterBypassed: boolean;
  bypassedReason: ExcludeReason | null;

  strengths: string[];
  weaknesses: string[];
  confidence: number;

  warnings: string[];
}

// ═══════════════════════════════════════════════════════════════
// PIPELINE OUTPUT
// ═══════════════════════════════════════════════════════════════

export type PipelineState = 'Generated' | 'Pass1Scored' | 'Pass2Filtered' | 'Ranked';

export interface RankedCoa {
  coaId: string;
  rank: number | null;               // null for excluded candidates
  totalScore: number;
  breakdown: ScoreBreakdown;
  excluded: boolean;
  excludeReason: ExcludeReason | null;
  warnings: string[];
}

export interface AlternativeComparison {
  top: Array<{
    rank: number;
    coaId: string;
    total: number;
    strengths: string[];
    weaknesses: string[];
    confidence: number;
  }>;
  scoreRange: { min: number; max: number; avg: number };
  recommendations: string[];
}

export interface DecisionResult {
  runId: string;
  state: PipelineState;
  snapshotVersion: number;
  ranked: RankedCoa[];
  comparison: AlternativeComparison;
  warnings: string[];
}
