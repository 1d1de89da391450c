/**
 * COA Scorer
 * ==========
 *
 * Base factors → weighted total → explainability.
 *
 * RULES (LOCKED v1):
 * - Every factor ∈ [0, 1]; missing data takes a fallback and a warning
 * - baseTotal = Σ factor × weight (weights normalized to 1)
 * - total starts at baseTotal; only rule adjustment and the METT-C blend change it
 * - factors / baseTotal are never rewritten
 *
 * METT-C BLEND:
 * total = clamp((1 − w) × total + w × mettc.total), w = blendWeight (default 0.3)
 */

import { constraintAppliesTo, type Coa, type SituationContext } from '../../contracts/coa.contract.js';
import {
  BASE_FACTORS,
  type BaseFactor,
  type FactorScores,
  type MettCScore,
  type ScoreBreakdown,
} from '../../contracts/score.contract.js';
import { DataGapError, toWarning } from '../../common/errors.js';
import { componentLogger, type Logger } from '../../common/logger.js';
import { clamp01, normalizeWeights, round4 } from '../../common/math.js';
import { env } from '../../config/env.js';
import type { MettCEvaluator } from '../mett-c/mettc.evaluator.js';
import type { RelevanceMapper } from '../relevance/relevance.mapper.js';
import { asRequiredAssets, type ResourcePriorityParser } from '../resources/resource.parser.js';
import { averageMobility, combatPowerTotals, terrainFit } from '../situation/situation.metrics.js';
import { explain } from './coa.explain.js';
import type { MissionAlignmentTable } from './mission-alignment.js';
import {
  DEFAULT_FACTOR_WEIGHTS,
  FACTOR_FALLBACK,
  NEUTRAL_ASSET_SCORE,
  type FactorResult,
  type FactorResults,
} from './scoring.types.js';

export interface CoaScorerDeps {
  relevance: RelevanceMapper;
  parser: ResourcePriorityParser;
  alignment: MissionAlignmentTable;
}

export interface CoaScorerOptions {
  weights?: Partial<FactorScores>;
  neutralAssetScore?: number;
  blendWeight?: number;
  logger?: Logger;
}

export class CoaScorer {
  private readonly weights: FactorScores;
  private readonly neutralAssetScore: number;
  private readonly blendWeight: number;
  private readonly logger: Logger;

  constructor(private readonly deps: CoaScorerDeps, options: CoaScorerOptions = {}) {
    this.weights = normalizeWeights({ ...DEFAULT_FACTOR_WEIGHTS, ...options.weights });
    this.neutralAssetScore = clamp01(options.neutralAssetScore ?? NEUTRAL_ASSET_SCORE);
    this.blendWeight = clamp01(options.blendWeight ?? env.METTC_BLEND_WEIGHT);
    this.logger = options.logger ?? componentLogger('CoaScorer');
  }

  getWeights(): FactorScores {
    return { ...this.weights };
  }

  getBlendWeight(): number {
    return this.blendWeight;
  }

  // ═══════════════════════════════════════════════════════════════
  // SCORING
  // ═══════════════════════════════════════════════════════════════

  score(coa: Coa, context: SituationContext): ScoreBreakdown {
    const results: FactorResults = {
      missionAlignment: this.missionAlignment(coa, context),
      combatPower: combatPower(coa, context),
      constraintFit: constraintFit(coa, context),
      threatResponse: this.threatResponse(coa, context),
      environmentFit: environmentFit(coa, context),
      mobility: mobility(coa, context),
      resources: this.resources(coa, context),
      assets: this.assets(coa, context),
    };

    const factorScore = (factor: BaseFactor) => clamp01(results[factor].score);
    const factors = mapFactors((factor) => round4(factorScore(factor)));
    const contributions = mapFactors((factor) => round4(factorScore(factor) * this.weights[factor]));

    const warnings: string[] = [...coa.parseWarnings];
    let sum = 0;
    for (const factor of BASE_FACTORS) {
      sum += factorScore(factor) * this.weights[factor];
      warnings.push(...results[factor].warnings);
    }
    const baseTotal = round4(clamp01(sum));

    const explanation = explain(results, context);

    this.logger.debug({ coaId: coa.id, baseTotal }, '[CoaScorer] scored');

    return {
      coaId: coa.id,
      coaType: coa.type,
      factors,
      contributions,
      baseTotal,
      ruleAdjustment: 0,
      appliedRule: null,
      mettc: null,
      mettcBlended: false,
      total: baseTotal,
      excluded: false,
      excludeReason: null,
      mettCFilterBypassed: false,
      bypassedReason: null,
      strengths: explanation.strengths,
      weaknesses: explanation.weaknesses,
      confidence: explanation.confidence,
      warnings,
    };
  }

  scoreWithMettC(coa: Coa, context: SituationContext, evaluator: MettCEvaluator): ScoreBreakdown {
    return this.attachMettC(this.score(coa, context), evaluator.evaluate(coa, context));
  }

  /**
   * Attach a METT-C result; blend it into total unless blend=false
   */
  attachMettC(breakdown: ScoreBreakdown, mettc: MettCScore, blend = true): ScoreBreakdown {
    const total = blend ? blendTotal(breakdown.total, mettc.total, this.blendWeight) : breakdown.total;
    return {
      ...breakdown,
      mettc,
      mettcBlended: blend,
      total,
      warnings: [...breakdown.warnings, ...mettc.warnings],
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // TABLE-BACKED FACTORS
  // ═══════════════════════════════════════════════════════════════

  private missionAlignment(coa: Coa, context: SituationContext): FactorResult {
    return this.deps.alignment.alignment(context.mission.missionType, coa.type);
  }

  private threatResponse(coa: Coa, context: SituationContext): FactorResult {
    const result = this.deps.relevance.relevance(coa.type, context.dominantThreatType, {
      coaId: coa.id,
      threatId: context.threatId,
    });
    return { score: result.score, fallback: !result.matched, warnings: result.warnings };
  }

  private resources(coa: Coa, context: SituationContext): FactorResult {
    const match = this.deps.parser.match(coa.requiredResources, context.availableResources);
    return { score: match.score, fallback: match.warnings.length > 0, warnings: match.warnings };
  }

  private assets(coa: Coa, context: SituationContext): FactorResult {
    if (coa.requiredAssets.length === 0) {
      return { score: this.neutralAssetScore, fallback: false, warnings: [] };
    }
    const match = this.deps.parser.match(asRequiredAssets(coa.requiredAssets), context.availableResources);
    return { score: match.score, fallback: match.warnings.length > 0, warnings: match.warnings };
  }
}

// ═══════════════════════════════════════════════════════════════
// SITUATION FACTORS
// ═══════════════════════════════════════════════════════════════

export function combatPower(coa: Coa, context: SituationContext): FactorResult {
  if (coa.requiredForceRatio <= 0) {
    return { score: 1, fallback: false, warnings: [] };
  }

  const totals = combatPowerTotals(context);
  if (!totals) {
    return gap('force ratio data missing');
  }
  if (totals.enemy <= 0) {
    return { score: 1, fallback: false, warnings: [] };
  }

  const ratio = totals.friendly / totals.enemy;
  return { score: Math.min(1, ratio / coa.requiredForceRatio), fallback: false, warnings: [] };
}

export function constraintFit(coa: Coa, context: SituationContext): FactorResult {
  let applicable = 0;
  let satisfied = 0;
  for (const constraint of context.constraints) {
    if (constraint.maxDurationHours === undefined || !constraintAppliesTo(constraint, coa)) continue;
    applicable++;
    if (coa.estimatedDurationHours <= constraint.maxDurationHours) satisfied++;
  }

  return { score: applicable === 0 ? 1 : satisfied / applicable, fallback: false, warnings: [] };
}

export function environmentFit(coa: Coa, context: SituationContext): FactorResult {
  const fit = terrainFit(coa, context);
  return { score: fit.score, fallback: fit.warnings.length > 0, warnings: fit.warnings };
}

export function mobility(coa: Coa, context: SituationContext): FactorResult {
  const available = averageMobility(context);
  if (available === null) {
    return gap('axis mobility data missing');
  }

  const demand = coa.mobilityDemand;
  const score = demand <= available ? 1 : clamp01(1 - (demand - available));
  return { score, fallback: false, warnings: [] };
}

export function blendTotal(total: number, mettcTotal: number, weight: number): number {
  return round4(clamp01((1 - weight) * total + weight * mettcTotal));
}

function mapFactors(fn: (factor: BaseFactor) => number): FactorScores {
  return {
    missionAlignment: fn('missionAlignment'),
    combatPower: fn('combatPower'),
    constraintFit: fn('constraintFit'),
    threatResponse: fn('threatResponse'),
    environmentFit: fn('environmentFit'),
    mobility: fn('mobility'),
    resources: fn('resources'),
    assets: fn('assets'),
  };
}

function gap(message: string): FactorResult {
  return {
    score: FACTOR_FALLBACK,
    fallback: true,
    warnings: [toWarning(new DataGapError(message, FACTOR_FALLBACK))],
  };
}
