export * from './rule.types.js';
export { RuleCompileError, compileCondition, compileRuleFile, parseConditionString, resolveField } from './rule.compiler.js';
export { RuleEngine, deriveRuleFacts, evaluateCondition, loadRuleSet, type RuleScoringOutcome } from './rule.engine.js';
