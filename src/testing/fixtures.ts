/**
 * Test fixtures shared by module tests
 */

import type { Coa, SituationContext } from '../contracts/coa.contract.js';
import type { ScoreBreakdown } from '../contracts/score.contract.js';
import { resolveFromRoot } from '../config/paths.js';
import { loadRelevanceTable } from '../modules/relevance/relevance.mapper.js';
import { compileRuleFile } from '../modules/rules/rule.compiler.js';
import type { RuleFile } from '../modules/rules/rule.types.js';
import { loadAlignmentTable } from '../modules/scoring/mission-alignment.js';
import { createSnapshot, type ScoringSnapshot, type SnapshotOptions } from '../modules/pipeline/scoring.snapshot.js';

export function makeCoa(overrides: Partial<Coa> = {}): Coa {
  return {
    id: 'COA-1',
    type: 'Defense',
    name: 'Test COA',
    description: '',
    requiredResources: [],
    requiredAssets: [],
    impactTerrainCellIds: new Set<string>(),
    estimatedDurationHours: 10,
    purposeTags: [],
    environmentFit: { compatible: [], incompatible: [] },
    requiredForceRatio: 1,
    mobilityDemand: 0.5,
    parseWarnings: [],
    ...overrides,
  };
}

export function makeSituation(overrides: Partial<SituationContext> = {}): SituationContext {
  return {
    situationId: 'SIT-1',
    threatLevel: 0.5,
    dominantThreatType: 'FrontalAttack',
    mission: { missionId: 'M-1', missionType: 'Defense', objectiveTags: [] },
    axisStates: [],
    terrainTags: [],
    availableResources: [],
    constraints: [],
    civilianAreas: [],
    ...overrides,
  };
}

export function makeBreakdown(overrides: Partial<ScoreBreakdown> = {}): ScoreBreakdown {
  const factors = {
    missionAlignment: 0.5,
    combatPower: 0.5,
    constraintFit: 0.5,
    threatResponse: 0.5,
    environmentFit: 0.5,
    mobility: 0.5,
    resources: 0.5,
    assets: 0.5,
  };
  return {
    coaId: 'COA-1',
    coaType: 'Defense',
    factors,
    contributions: { ...factors },
    baseTotal: 0.5,
    ruleAdjustment: 0,
    appliedRule: null,
    mettc: null,
    mettcBlended: false,
    total: 0.5,
    excluded: false,
    excludeReason: null,
    mettCFilterBypassed: false,
    bypassedReason: null,
    strengths: [],
    weaknesses: [],
    confidence: 1,
    warnings: [],
    ...overrides,
  };
}

export const HIGH_THREAT_RULES: RuleFile = {
  version: 'test',
  rules: [
    {
      name: 'HighThreatDefense',
      condition: 'threatLevel > 0.7',
      action: { coaType: 'Defense', priority: 1 },
    },
  ],
  weights: {},
};

/**
 * Snapshot over the bundled relevance / alignment tables and the given rules
 */
export function bundledSnapshot(rules: RuleFile = HIGH_THREAT_RULES, options: SnapshotOptions = {}): ScoringSnapshot {
  const relevance = loadRelevanceTable(resolveFromRoot('data', 'relevance.table.json'));
  const alignment = loadAlignmentTable(resolveFromRoot('data', 'mission-alignment.json'));
  return createSnapshot(
    { relevance: relevance.value, alignment: alignment.value, rules: compileRuleFile(rules) },
    1,
    options
  );
}
