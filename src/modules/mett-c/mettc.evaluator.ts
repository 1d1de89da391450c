/**
 * METT-C Evaluator
 * ================
 *
 * Six independent sub-scores for one COA in one situation, each ∈ [0, 1].
 * A missing input never fails: the dimension takes its fallback and
 * records a DATA_GAP warning.
 */

import { constraintAppliesTo, type Coa, type SituationContext } from '../../contracts/coa.contract.js';
import {
  METTC_DIMENSIONS,
  type MettCScore,
  type MettCWeights,
} from '../../contracts/score.contract.js';
import { DataGapError, toWarning } from '../../common/errors.js';
import { componentLogger, type Logger } from '../../common/logger.js';
import { clamp01, normalizeWeights, round4, tagSet } from '../../common/math.js';
import { ResourcePriorityParser } from '../resources/resource.parser.js';
import { combatPowerTotals, terrainFit } from '../situation/situation.metrics.js';
import {
  DEFAULT_METTC_WEIGHTS,
  DENSITY_BASE,
  DENSITY_SATURATION,
  DENSITY_SHARE,
  ENEMY_BASE_SHARE,
  ENEMY_POWER_SHARE,
  METTC_FALLBACKS,
  type DimensionResult,
} from './mettc.types.js';

export interface MettCEvaluatorOptions {
  weights?: Partial<MettCWeights>;
  logger?: Logger;
}

export class MettCEvaluator {
  private readonly weights: MettCWeights;
  private readonly logger: Logger;

  constructor(
    private readonly parser: ResourcePriorityParser,
    options: MettCEvaluatorOptions = {}
  ) {
    this.weights = normalizeWeights({ ...DEFAULT_METTC_WEIGHTS, ...options.weights });
    this.logger = options.logger ?? componentLogger('MettCEvaluator');
  }

  evaluate(coa: Coa, context: SituationContext): MettCScore {
    const dims = {
      mission: missionScore(coa, context),
      enemy: enemyScore(context),
      terrain: terrainScore(coa, context),
      troops: this.troopsScore(coa, context),
      civilian: civilianScore(coa, context),
      time: timeScore(coa, context),
    };

    let total = 0;
    const warnings: string[] = [];
    for (const dim of METTC_DIMENSIONS) {
      total += dims[dim].score * this.weights[dim];
      warnings.push(...dims[dim].warnings);
    }

    const result: MettCScore = {
      mission: round4(dims.mission.score),
      enemy: round4(dims.enemy.score),
      terrain: round4(dims.terrain.score),
      troops: round4(dims.troops.score),
      civilian: round4(dims.civilian.score),
      time: round4(dims.time.score),
      total: round4(clamp01(total)),
      weights: { ...this.weights },
      warnings,
    };

    this.logger.debug(
      { coaId: coa.id, total: result.total, civilian: result.civilian, time: result.time },
      '[MettCEvaluator] evaluated'
    );

    return result;
  }

  private troopsScore(coa: Coa, context: SituationContext): DimensionResult {
    const match = this.parser.match(coa.requiredResources, context.availableResources);
    return { score: clamp01(match.score), warnings: match.warnings };
  }
}

// ═══════════════════════════════════════════════════════════════
// DIMENSIONS
// ═══════════════════════════════════════════════════════════════

export function missionScore(coa: Coa, context: SituationContext): DimensionResult {
  const objectives = tagSet(context.mission.objectiveTags);
  if (objectives.size === 0) {
    return {
      score: METTC_FALLBACKS.mission,
      warnings: [toWarning(new DataGapError('mission objective tags missing', METTC_FALLBACKS.mission))],
    };
  }

  const purposes = tagSet(coa.purposeTags);
  let hits = 0;
  for (const tag of objectives) {
    if (purposes.has(tag)) hits++;
  }
  return { score: clamp01(hits / objectives.size), warnings: [] };
}

export function enemyScore(context: SituationContext): DimensionResult {
  const totals = combatPowerTotals(context);
  const warnings: string[] = [];

  let powerFactor: number;
  if (!totals) {
    powerFactor = METTC_FALLBACKS.powerFactor;
    warnings.push(toWarning(new DataGapError('axis combat power missing', METTC_FALLBACKS.powerFactor)));
  } else if (totals.enemy <= 0) {
    powerFactor = 1;
  } else {
    powerFactor = Math.min(1, totals.friendly / totals.enemy);
  }

  return {
    score: clamp01(context.threatLevel * (ENEMY_BASE_SHARE + ENEMY_POWER_SHARE * powerFactor)),
    warnings,
  };
}

export function terrainScore(coa: Coa, context: SituationContext): DimensionResult {
  const fit = terrainFit(coa, context);
  return { score: fit.score, warnings: fit.warnings };
}

export function civilianScore(coa: Coa, context: SituationContext): DimensionResult {
  if (context.civilianAreas.length === 0) {
    return {
      score: METTC_FALLBACKS.civilian,
      warnings: [toWarning(new DataGapError('civilian area data missing', METTC_FALLBACKS.civilian))],
    };
  }

  let score = 1;
  for (const area of context.civilianAreas) {
    if (!intersects(area.cellIds, coa.impactTerrainCellIds)) continue;
    const densityFactor =
      DENSITY_BASE + DENSITY_SHARE * Math.min(1, Math.max(0, area.populationDensity) / DENSITY_SATURATION);
    score *= 1 - clamp01(area.protectionPriority) * densityFactor;
  }
  return { score: clamp01(score), warnings: [] };
}

export function timeScore(coa: Coa, context: SituationContext): DimensionResult {
  let score: number = METTC_FALLBACKS.time;
  const duration = coa.estimatedDurationHours;

  for (const constraint of context.constraints) {
    const max = constraint.maxDurationHours;
    if (max === undefined || !constraintAppliesTo(constraint, coa)) continue;

    let constraintScore: number;
    if (duration <= max) {
      constraintScore = 1;
    } else if (constraint.timeCritical || max <= 0) {
      constraintScore = 0;
    } else {
      constraintScore = 1 - Math.min(1, (duration - max) / max);
    }
    score = Math.min(score, constraintScore);
  }

  return { score: clamp01(score), warnings: [] };
}

function intersects(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  for (const item of small) {
    if (large.has(item)) return true;
  }
  return false;
}
