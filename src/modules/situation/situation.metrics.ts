/**
 * Situation Metrics
 * =================
 *
 * Derived scalars shared by the scorer, the METT-C evaluator and the
 * rule engine. All functions are pure.
 */

import type { Coa, SituationContext } from '../../contracts/coa.contract.js';
import { DataGapError, toWarning } from '../../common/errors.js';
import { clamp01, tagSet } from '../../common/math.js';

export const TERRAIN_BASE = 0.5;
export const TERRAIN_TAG_STEP = 0.15;

export interface CombatPowerTotals {
  friendly: number;
  enemy: number;
}

/**
 * Sum combat power over all axes; null when no axis data exists
 */
export function combatPowerTotals(context: SituationContext): CombatPowerTotals | null {
  if (context.axisStates.length === 0) return null;

  let friendly = 0;
  let enemy = 0;
  for (const axis of context.axisStates) {
    friendly += axis.friendlyCombatPower;
    enemy += axis.enemyCombatPower;
  }
  return { friendly, enemy };
}

/**
 * friendly / enemy; null when unknown or when no enemy power is reported
 */
export function forceRatio(context: SituationContext): number | null {
  const totals = combatPowerTotals(context);
  if (!totals || totals.enemy <= 0) return null;
  return totals.friendly / totals.enemy;
}

/**
 * Mean mobility over axes that report it; null when none do
 */
export function averageMobility(context: SituationContext): number | null {
  const values = context.axisStates
    .map((axis) => axis.mobility)
    .filter((value): value is number => value !== undefined);
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export interface TerrainFit {
  score: number;
  compatibleHits: number;
  incompatibleHits: number;
  warnings: string[];
}

/**
 * base 0.5, +0.15 per compatible tag present, -0.15 per incompatible tag present
 */
export function terrainFit(coa: Coa, context: SituationContext): TerrainFit {
  const present = tagSet(context.terrainTags);
  if (present.size === 0) {
    return {
      score: TERRAIN_BASE,
      compatibleHits: 0,
      incompatibleHits: 0,
      warnings: [toWarning(new DataGapError('terrain tags missing', TERRAIN_BASE))],
    };
  }

  let compatibleHits = 0;
  for (const tag of tagSet(coa.environmentFit.compatible)) {
    if (present.has(tag)) compatibleHits++;
  }

  let incompatibleHits = 0;
  for (const tag of tagSet(coa.environmentFit.incompatible)) {
    if (present.has(tag)) incompatibleHits++;
  }

  return {
    score: clamp01(TERRAIN_BASE + TERRAIN_TAG_STEP * compatibleHits - TERRAIN_TAG_STEP * incompatibleHits),
    compatibleHits,
    incompatibleHits,
    warnings: [],
  };
}
