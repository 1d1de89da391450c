/**
 * COA Explainability
 * ==================
 *
 * Strengths / weaknesses and a confidence value from the base factors.
 *
 * FORMULA (LOCKED v1):
 * confidence = 0.4 × dataCompleteness + 0.3 × spreadScore + 0.3 × contextCompleteness
 *
 * spreadScore: factor range in [0.2, 0.8] → 1.0, below → 0.7, above → 0.8
 */

import type { SituationContext } from '../../contracts/coa.contract.js';
import { BASE_FACTORS } from '../../contracts/score.contract.js';
import { round4 } from '../../common/math.js';
import {
  CONFIDENCE_SHARES,
  DEFAULT_THRESHOLD,
  ENVIRONMENT_UNFAVORABLE_BELOW,
  EXPLAIN_MARGIN,
  FACTOR_LABELS,
  FACTOR_THRESHOLDS,
  RESOURCE_SHORTFALL_BELOW,
  type Explanation,
  type FactorResults,
} from './scoring.types.js';

export function explain(results: FactorResults, context: SituationContext): Explanation {
  const strengths: string[] = [];
  const weaknesses: string[] = [];

  for (const factor of BASE_FACTORS) {
    const score = results[factor].score;
    const threshold = FACTOR_THRESHOLDS[factor] ?? DEFAULT_THRESHOLD;
    const label = `${FACTOR_LABELS[factor]} (${score.toFixed(2)})`;

    if (score >= threshold + EXPLAIN_MARGIN) {
      strengths.push(`strong ${label}`);
    } else if (score <= threshold - EXPLAIN_MARGIN) {
      weaknesses.push(`weak ${label}`);
    }
  }

  if (results.resources.score < RESOURCE_SHORTFALL_BELOW) {
    weaknesses.push('critical resource shortfall');
  }
  if (results.environmentFit.score < ENVIRONMENT_UNFAVORABLE_BELOW) {
    weaknesses.push('unfavorable terrain and environment');
  }

  return { strengths, weaknesses, confidence: confidence(results, context) };
}

export function confidence(results: FactorResults, context: SituationContext): number {
  const measured = BASE_FACTORS.filter((factor) => !results[factor].fallback).length;
  const dataCompleteness = measured / BASE_FACTORS.length;

  const scores = BASE_FACTORS.map((factor) => results[factor].score);
  const spread = spreadScore(Math.max(...scores) - Math.min(...scores));

  const present = [
    Boolean(context.mission.missionType?.trim()),
    context.dominantThreatType.trim() !== '',
    context.axisStates.length > 0,
    context.availableResources.length > 0,
  ].filter(Boolean).length;
  const contextCompleteness = present / 4;

  return round4(
    CONFIDENCE_SHARES.dataCompleteness * dataCompleteness +
      CONFIDENCE_SHARES.spread * spread +
      CONFIDENCE_SHARES.contextCompleteness * contextCompleteness
  );
}

export function spreadScore(range: number): number {
  if (range < 0.2) return 0.7;
  if (range > 0.8) return 0.8;
  return 1.0;
}
