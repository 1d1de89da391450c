import { describe, it, expect } from 'vitest';
import {
  RuleCompileError,
  compileCondition,
  compileRuleFile,
  parseConditionString,
} from '../rule.compiler.js';

describe('Rule Compiler', () => {
  describe('conditions', () => {
    it('should compile a single comparison', () => {
      expect(parseConditionString('threatLevel > 0.7')).toEqual({
        kind: 'compare',
        field: 'threatLevel',
        op: '>',
        value: 0.7,
      });
    });

    it('should compile two comparisons joined by and', () => {
      expect(parseConditionString('threatLevel > 0.4 and threatLevel <= 0.7')).toEqual({
        kind: 'and',
        terms: [
          { kind: 'compare', field: 'threatLevel', op: '>', value: 0.4 },
          { kind: 'compare', field: 'threatLevel', op: '<=', value: 0.7 },
        ],
      });
    });

    it('should compile an or condition and snake_case field names', () => {
      expect(parseConditionString('force_ratio >= 2 OR threat_level < 0.2')).toEqual({
        kind: 'or',
        terms: [
          { kind: 'compare', field: 'forceRatio', op: '>=', value: 2 },
          { kind: 'compare', field: 'threatLevel', op: '<', value: 0.2 },
        ],
      });
    });

    it('should imply the key as field in the map form', () => {
      expect(compileCondition({ threatLevel: '> 0.4 and <= 0.7' })).toEqual({
        kind: 'and',
        terms: [
          { kind: 'compare', field: 'threatLevel', op: '>', value: 0.4 },
          { kind: 'compare', field: 'threatLevel', op: '<=', value: 0.7 },
        ],
      });
    });

    it('should AND several map keys and treat numbers as equality', () => {
      expect(compileCondition({ timeCritical: 1, threatLevel: '> 0.5' })).toEqual({
        kind: 'and',
        terms: [
          { kind: 'compare', field: 'timeCritical', op: '==', value: 1 },
          { kind: 'compare', field: 'threatLevel', op: '>', value: 0.5 },
        ],
      });
    });

    it('should reject mixed connectives, unknown fields and non-numeric literals', () => {
      expect(() => parseConditionString('threatLevel > 0.1 and forceRatio > 1 or timeCritical == 1')).toThrow(
        RuleCompileError
      );
      expect(() => parseConditionString('altitude > 100')).toThrow('unknown field "altitude"');
      expect(() => parseConditionString('threatLevel > high')).toThrow(
        'cannot parse comparison "threatLevel > high"'
      );
      expect(() => compileCondition({ threatLevel: '> 0.1 or < 0.05', forceRatio: '> 1' })).toThrow(
        RuleCompileError
      );
    });
  });

  describe('compileRuleFile', () => {
    it('should drop invalid rules with a warning and keep the rest', () => {
      const ruleSet = compileRuleFile({
        version: 'v2',
        rules: [
          { name: 'Good', condition: 'threatLevel > 0.7', action: { coaType: 'Defense', priority: 1 } },
          { name: 'NoAction', condition: 'threatLevel > 0.7' },
          { name: 'BadField', condition: 'altitude > 3', action: { coaType: 'Defense', priority: 1 } },
          { name: 'BadType', condition: 'threatLevel > 0.1', action: { coaType: 'Retreat', priority: 1 } },
        ],
        weights: {},
      });

      expect(ruleSet.version).toBe('v2');
      expect(ruleSet.rules.map((r) => r.name)).toEqual(['Good']);
      expect(ruleSet.warnings).toHaveLength(3);
      expect(ruleSet.warnings[0]).toMatch(/^\[CONFIGURATION_ERROR\] rule file: rule #2 dropped \(action: /);
      expect(ruleSet.warnings[1]).toBe(
        '[CONFIGURATION_ERROR] rule file: rule "BadField" dropped (unknown field "altitude")'
      );
      expect(ruleSet.warnings[2]).toBe(
        '[CONFIGURATION_ERROR] rule file: rule "BadType" dropped (unknown COA type "Retreat")'
      );
    });

    it('should order rules by priority, keeping file order on ties', () => {
      const ruleSet = compileRuleFile({
        version: 'v1',
        rules: [
          { name: 'C', condition: 'threatLevel > 0', action: { coaType: 'Maneuver', priority: 3 } },
          { name: 'A1', condition: 'threatLevel > 0', action: { coaType: 'Defense', priority: 1 } },
          { name: 'A2', condition: 'threatLevel > 0', action: { coaType: 'Offensive', priority: 1 } },
        ],
        weights: {},
      });

      expect(ruleSet.rules.map((r) => r.name)).toEqual(['A1', 'A2', 'C']);
    });

    it('should fill missing weights with defaults', () => {
      const ruleSet = compileRuleFile({ version: 'v1', rules: [], weights: { ruleBonus: 0.2 } });

      expect(ruleSet.weights).toEqual({ ruleBonus: 0.2, rulePenalty: 0.05 });
    });
  });
});
