/**
 * Rule Engine Types
 * =================
 *
 * Rule file → zod-validated definitions → compiled expressions.
 * Compiled rules are immutable; a reload compiles a new RuleSet.
 */

import { z } from 'zod';
import type { CoaType } from '../../contracts/coa.contract.js';

// ═══════════════════════════════════════════════════════════════
// FACTS
// ═══════════════════════════════════════════════════════════════

export const RULE_FIELDS = [
  'threatLevel',
  'forceRatio',
  'missionPriority',
  'civilianAreaCount',
  'maxCivilianProtection',
  'availableResourceCount',
  'timeCritical',
  'minMaxDurationHours',
] as const;

export type RuleField = (typeof RULE_FIELDS)[number];

/** Scalar facts derived from a SituationContext; absent = unknown */
export type RuleFacts = Partial<Record<RuleField, number>>;

/** snake_case names used by older rule files */
export const RULE_FIELD_ALIASES: Record<string, RuleField> = {
  threat_level: 'threatLevel',
  force_ratio: 'forceRatio',
  mission_priority: 'missionPriority',
  civilian_area_count: 'civilianAreaCount',
  max_civilian_protection: 'maxCivilianProtection',
  available_resource_count: 'availableResourceCount',
  time_critical: 'timeCritical',
  min_max_duration_hours: 'minMaxDurationHours',
};

// ═══════════════════════════════════════════════════════════════
// COMPILED EXPRESSIONS
// ═══════════════════════════════════════════════════════════════

export type ComparisonOp = '>' | '>=' | '<' | '<=' | '==';

export interface Comparison {
  kind: 'compare';
  field: RuleField;
  op: ComparisonOp;
  value: number;
}

export interface Compound {
  kind: 'and' | 'or';
  terms: Comparison[];
}

export type ConditionExpr = Comparison | Compound;

export interface RuleAction {
  coaType: CoaType;
  priority: number;
}

export interface CompiledRule {
  name: string;
  condition: ConditionExpr;
  action: RuleAction;
  /** Position in the file, used to keep equal priorities stable */
  order: number;
}

export interface RuleWeights {
  ruleBonus: number;
  rulePenalty: number;
}

export const DEFAULT_RULE_WEIGHTS: RuleWeights = {
  ruleBonus: 0.1,
  rulePenalty: 0.05,
};

export interface RuleSet {
  version: string;
  rules: readonly CompiledRule[];
  weights: RuleWeights;
  warnings: readonly string[];
}

export const EMPTY_RULE_SET: RuleSet = {
  version: 'empty',
  rules: [],
  weights: DEFAULT_RULE_WEIGHTS,
  warnings: [],
};

// ═══════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════

export interface RuleRecommendation {
  recommendedCoaType: CoaType;
  priority: number;
  ruleName: string;
}

// ═══════════════════════════════════════════════════════════════
// FILE SCHEMA
// ═══════════════════════════════════════════════════════════════

export const RuleConditionSchema = z.union([
  z.string().min(1),
  z.record(z.string(), z.union([z.string().min(1), z.number()])),
]);

export const RuleDefinitionSchema = z.object({
  name: z.string().min(1),
  condition: RuleConditionSchema,
  action: z.object({
    coaType: z.string().min(1),
    priority: z.number().int(),
  }),
});

export type RuleDefinition = z.infer<typeof RuleDefinitionSchema>;

// rules stay unknown here so one bad entry only drops itself
export const RuleFileSchema = z.object({
  version: z.string().default('v1'),
  rules: z.array(z.unknown()),
  weights: z
    .object({
      ruleBonus: z.number().min(0).max(1).optional(),
      rulePenalty: z.number().min(0).max(1).optional(),
    })
    .passthrough()
    .default({}),
});

export type RuleFile = z.infer<typeof RuleFileSchema>;
