/**
 * Rule Compiler
 * =============
 *
 * Turns rule definitions into typed expressions once, at load time.
 *
 * Accepted condition forms:
 *   "threatLevel > 0.7"
 *   "threatLevel > 0.4 and threatLevel <= 0.7"
 *   { "threatLevel": "> 0.4 and <= 0.7", "timeCritical": 1 }   (keys AND-ed)
 *
 * A single connective per condition; "and" and "or" cannot be mixed.
 */

import { isCoaType } from '../../contracts/coa.contract.js';
import { ConfigurationError, toWarning } from '../../common/errors.js';
import {
  DEFAULT_RULE_WEIGHTS,
  RULE_FIELDS,
  RULE_FIELD_ALIASES,
  RuleDefinitionSchema,
  type CompiledRule,
  type Comparison,
  type ComparisonOp,
  type ConditionExpr,
  type RuleDefinition,
  type RuleField,
  type RuleFile,
  type RuleSet,
} from './rule.types.js';

const COMPARISON_PATTERN = /^\s*([A-Za-z_][A-Za-z0-9_]*)?\s*(>=|<=|==|>|<)\s*(-?\d+(?:\.\d+)?)\s*$/;
const CONNECTIVE_PATTERN = /\s+(and|or)\s+/i;

export class RuleCompileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuleCompileError';
  }
}

// ═══════════════════════════════════════════════════════════════
// CONDITIONS
// ═══════════════════════════════════════════════════════════════

function isRuleField(name: string): name is RuleField {
  return (RULE_FIELDS as readonly string[]).includes(name);
}

export function resolveField(name: string): RuleField {
  if (isRuleField(name)) return name;

  const alias = RULE_FIELD_ALIASES[name];
  if (alias) return alias;
  throw new RuleCompileError(`unknown field "${name}"`);
}

function parseComparison(text: string, impliedField?: RuleField): Comparison {
  const match = COMPARISON_PATTERN.exec(text);
  if (!match) {
    throw new RuleCompileError(`cannot parse comparison "${text.trim()}"`);
  }

  const [, fieldName, op, literal] = match;
  let field: RuleField;
  if (fieldName) {
    field = resolveField(fieldName);
  } else if (impliedField) {
    field = impliedField;
  } else {
    throw new RuleCompileError(`comparison "${text.trim()}" names no field`);
  }

  return { kind: 'compare', field, op: toOp(op), value: Number(literal) };
}

function toOp(op: string): ComparisonOp {
  switch (op) {
    case '>':
    case '>=':
    case '<':
    case '<=':
    case '==':
      return op;
    default:
      throw new RuleCompileError(`unsupported operator "${op}"`);
  }
}

/**
 * Parse "a op x [and|or b op y ...]" into a flat expression
 */
export function parseConditionString(text: string, impliedField?: RuleField): ConditionExpr {
  const parts = text.split(CONNECTIVE_PATTERN);
  // split with a capture group alternates: term, connective, term, ...
  if (parts.length === 1) {
    return parseComparison(parts[0], impliedField);
  }

  const connectives = new Set<string>();
  const terms: Comparison[] = [];
  for (let i = 0; i < parts.length; i++) {
    if (i % 2 === 1) {
      connectives.add(parts[i].toLowerCase());
    } else {
      terms.push(parseComparison(parts[i], impliedField));
    }
  }

  if (connectives.size > 1) {
    throw new RuleCompileError(`mixed and/or in "${text}" (grouping is not supported)`);
  }

  return { kind: connectives.has('or') ? 'or' : 'and', terms };
}

export function compileCondition(condition: RuleDefinition['condition']): ConditionExpr {
  if (typeof condition === 'string') {
    return parseConditionString(condition);
  }

  const entries = Object.entries(condition);
  if (entries.length === 0) {
    throw new RuleCompileError('empty condition map');
  }

  const exprs: ConditionExpr[] = entries.map(([fieldName, value]) => {
    const field = resolveField(fieldName);
    if (typeof value === 'number') {
      return { kind: 'compare', field, op: '==', value };
    }
    return parseConditionString(value, field);
  });

  if (exprs.length === 1) return exprs[0];

  // several keys → one flat AND
  const terms: Comparison[] = [];
  for (const expr of exprs) {
    if (expr.kind === 'compare') {
      terms.push(expr);
    } else if (expr.kind === 'and') {
      terms.push(...expr.terms);
    } else {
      throw new RuleCompileError('an "or" condition cannot be combined with other fields');
    }
  }
  return { kind: 'and', terms };
}

// ═══════════════════════════════════════════════════════════════
// RULE SET
// ═══════════════════════════════════════════════════════════════

export function compileRuleFile(file: RuleFile, source = 'rule file'): RuleSet {
  const warnings: string[] = [];
  const compiled: CompiledRule[] = [];

  file.rules.forEach((entry, order) => {
    const parsed = RuleDefinitionSchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      warnings.push(
        toWarning(
          new ConfigurationError(source, `rule #${order + 1} dropped (${issue.path.join('.')}: ${issue.message})`)
        )
      );
      return;
    }

    const def = parsed.data;
    try {
      compiled.push(compileRule(def, order));
    } catch (err) {
      if (!(err instanceof RuleCompileError)) throw err;
      warnings.push(toWarning(new ConfigurationError(source, `rule "${def.name}" dropped (${err.message})`)));
    }
  });

  compiled.sort((a, b) => a.action.priority - b.action.priority || a.order - b.order);

  return {
    version: file.version,
    rules: Object.freeze(compiled),
    weights: {
      ruleBonus: file.weights.ruleBonus ?? DEFAULT_RULE_WEIGHTS.ruleBonus,
      rulePenalty: file.weights.rulePenalty ?? DEFAULT_RULE_WEIGHTS.rulePenalty,
    },
    warnings,
  };
}

function compileRule(def: RuleDefinition, order: number): CompiledRule {
  const coaType = def.action.coaType;
  if (!isCoaType(coaType)) {
    throw new RuleCompileError(`unknown COA type "${coaType}"`);
  }

  return {
    name: def.name,
    condition: compileCondition(def.condition),
    action: { coaType, priority: def.action.priority },
    order,
  };
}
