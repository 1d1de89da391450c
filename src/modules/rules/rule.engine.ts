/**
 * Rule Engine
 * ===========
 *
 * Declarative condition → COA type recommendation.
 *
 * RULES (LOCKED v1):
 * - Rules ordered by ascending priority (lower = stronger), file order on ties
 * - First matching rule wins
 * - Comparison on an unknown fact is false
 * - applyScoring: +ruleBonus to the recommended type, -rulePenalty to the rest
 * - No match / no rules → list returned unchanged, with a warning
 */

import type { SituationContext } from '../../contracts/coa.contract.js';
import type { ScoreBreakdown } from '../../contracts/score.contract.js';
import { loadJsonFile, type LoadOutcome } from '../../common/json-file.js';
import { componentLogger, type Logger } from '../../common/logger.js';
import { clamp01, round4 } from '../../common/math.js';
import { forceRatio } from '../situation/situation.metrics.js';
import { compileRuleFile } from './rule.compiler.js';
import {
  EMPTY_RULE_SET,
  RuleFileSchema,
  type Comparison,
  type RuleFile,
  type ConditionExpr,
  type RuleFacts,
  type RuleRecommendation,
  type RuleSet,
  type RuleWeights,
} from './rule.types.js';

export interface RuleScoringOutcome {
  breakdowns: ScoreBreakdown[];
  recommendation: RuleRecommendation | null;
  warnings: string[];
}

export class RuleEngine {
  constructor(
    private readonly ruleSet: RuleSet,
    private readonly logger: Logger = componentLogger('RuleEngine')
  ) {}

  get size(): number {
    return this.ruleSet.rules.length;
  }

  get version(): string {
    return this.ruleSet.version;
  }

  get weights(): RuleWeights {
    return { ...this.ruleSet.weights };
  }

  // ═══════════════════════════════════════════════════════════════
  // EVALUATION
  // ═══════════════════════════════════════════════════════════════

  evaluate(context: SituationContext): RuleRecommendation | null {
    return this.evaluateFacts(deriveRuleFacts(context));
  }

  evaluateFacts(facts: RuleFacts): RuleRecommendation | null {
    for (const rule of this.ruleSet.rules) {
      if (evaluateCondition(rule.condition, facts)) {
        return {
          recommendedCoaType: rule.action.coaType,
          priority: rule.action.priority,
          ruleName: rule.name,
        };
      }
    }
    return null;
  }

  // ═══════════════════════════════════════════════════════════════
  // SCORE ADJUSTMENT
  // ═══════════════════════════════════════════════════════════════

  applyScoring(breakdowns: readonly ScoreBreakdown[], context: SituationContext): RuleScoringOutcome {
    if (this.ruleSet.rules.length === 0) {
      return {
        breakdowns: [...breakdowns],
        recommendation: null,
        warnings: ['rule engine: no rules loaded, scores left unadjusted'],
      };
    }

    const recommendation = this.evaluate(context);
    if (!recommendation) {
      return {
        breakdowns: [...breakdowns],
        recommendation: null,
        warnings: ['rule engine: no rule matched, scores left unadjusted'],
      };
    }

    const { ruleBonus, rulePenalty } = this.ruleSet.weights;
    const adjusted = breakdowns.map((b) => {
      const delta = b.coaType === recommendation.recommendedCoaType ? ruleBonus : -rulePenalty;
      return {
        ...b,
        ruleAdjustment: delta,
        appliedRule: recommendation.ruleName,
        total: round4(clamp01(b.total + delta)),
      };
    });

    this.logger.info(
      {
        rule: recommendation.ruleName,
        coaType: recommendation.recommendedCoaType,
        affected: adjusted.length,
      },
      '[RuleEngine] rule applied'
    );

    return { breakdowns: adjusted, recommendation, warnings: [] };
  }
}

// ═══════════════════════════════════════════════════════════════
// FACTS & CONDITIONS
// ═══════════════════════════════════════════════════════════════

export function deriveRuleFacts(context: SituationContext): RuleFacts {
  const facts: RuleFacts = {
    threatLevel: context.threatLevel,
    civilianAreaCount: context.civilianAreas.length,
    maxCivilianProtection: context.civilianAreas.reduce((max, area) => Math.max(max, area.protectionPriority), 0),
    availableResourceCount: context.availableResources.length,
    timeCritical: context.constraints.some((c) => c.timeCritical) ? 1 : 0,
  };

  const ratio = forceRatio(context);
  if (ratio !== null) facts.forceRatio = ratio;

  if (context.mission.priority !== undefined) facts.missionPriority = context.mission.priority;

  const limits = context.constraints
    .map((c) => c.maxDurationHours)
    .filter((hours): hours is number => hours !== undefined);
  if (limits.length > 0) facts.minMaxDurationHours = Math.min(...limits);

  return facts;
}

function compare(term: Comparison, facts: RuleFacts): boolean {
  const value = facts[term.field];
  if (value === undefined) return false;

  switch (term.op) {
    case '>':
      return value > term.value;
    case '>=':
      return value >= term.value;
    case '<':
      return value < term.value;
    case '<=':
      return value <= term.value;
    case '==':
      return value === term.value;
  }
}

export function evaluateCondition(expr: ConditionExpr, facts: RuleFacts): boolean {
  switch (expr.kind) {
    case 'compare':
      return compare(expr, facts);
    case 'and':
      return expr.terms.every((term) => compare(term, facts));
    case 'or':
      return expr.terms.some((term) => compare(term, facts));
  }
}

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

const EMPTY_RULE_FILE: RuleFile = { version: 'empty', rules: [], weights: {} };

/**
 * Load and compile a rule file. Failures degrade to an empty rule set.
 */
export function loadRuleSet(filePath: string): LoadOutcome<RuleSet> {
  const file = loadJsonFile(filePath, RuleFileSchema, EMPTY_RULE_FILE, 'rule file');
  if (file.source === 'fallback') {
    return { value: EMPTY_RULE_SET, source: 'fallback', warnings: file.warnings };
  }

  const ruleSet = compileRuleFile(file.value, 'rule file');
  return { value: ruleSet, source: 'file', warnings: [...ruleSet.warnings] };
}
