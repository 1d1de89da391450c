/**
 * METT-C Types
 * ============
 *
 * FORMULAS (LOCKED v1):
 * ---------------------
 * mission  = |purposeTags ∩ objectiveTags| / |objectiveTags|
 * enemy    = threatLevel × (0.6 + 0.4 × powerFactor)
 * terrain  = clamp(0.5 + 0.15·compatible − 0.15·incompatible)
 * troops   = resource match score
 * civilian = Π (1 − protectionPriority × densityFactor) over impacted areas
 * time     = min over applicable duration constraints
 * total    = Σ dimension × weight (weights normalized)
 */

import type { MettCWeights } from '../../contracts/score.contract.js';

export const DEFAULT_METTC_WEIGHTS: MettCWeights = {
  mission: 1 / 6,
  enemy: 1 / 6,
  terrain: 1 / 6,
  troops: 1 / 6,
  civilian: 1 / 6,
  time: 1 / 6,
};

export const METTC_FALLBACKS = {
  mission: 0.5,
  powerFactor: 0.5,
  civilian: 1.0,
  time: 1.0,
} as const;

export const ENEMY_BASE_SHARE = 0.6;
export const ENEMY_POWER_SHARE = 0.4;

/** densityFactor = DENSITY_BASE + DENSITY_SHARE × min(1, density / DENSITY_SATURATION) */
export const DENSITY_BASE = 0.9;
export const DENSITY_SHARE = 0.1;
export const DENSITY_SATURATION = 1000;

export interface DimensionResult {
  score: number;
  warnings: string[];
}
