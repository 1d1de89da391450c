import { describe, it, expect } from 'vitest';
import type { CivilianArea, Constraint } from '../../../contracts/coa.contract.js';
import { makeCoa, makeSituation } from '../../../testing/fixtures.js';
import { ResourcePriorityParser } from '../../resources/resource.parser.js';
import {
  MettCEvaluator,
  civilianScore,
  enemyScore,
  missionScore,
  terrainScore,
  timeScore,
} from '../mettc.evaluator.js';

function area(id: string, protectionPriority: number, populationDensity: number, cells: string[]): CivilianArea {
  return { id, protectionPriority, populationDensity, cellIds: new Set(cells) };
}

function limit(maxDurationHours: number, timeCritical: boolean, scope = 'global'): Constraint {
  return { id: `T-${maxDurationHours}`, scope, timeCritical, maxDurationHours };
}

describe('METT-C dimensions', () => {
  describe('mission', () => {
    it('should measure objective coverage by purpose tags', () => {
      const result = missionScore(
        makeCoa({ purposeTags: ['hold', 'PROTECT'] }),
        makeSituation({
          mission: { missionId: 'M', objectiveTags: [' Hold ', 'delay', 'protect'] },
        })
      );

      expect(result.score).toBeCloseTo(2 / 3, 6);
      expect(result.warnings).toEqual([]);
    });

    it('should fall back to 0.5 without objective tags', () => {
      const result = missionScore(makeCoa({ purposeTags: ['hold'] }), makeSituation());

      expect(result.score).toBe(0.5);
      expect(result.warnings).toEqual(['[DATA_GAP] mission objective tags missing -> fallback 0.5']);
    });
  });

  describe('enemy', () => {
    it('should scale threat by relative combat power', () => {
      const result = enemyScore(
        makeSituation({
          threatLevel: 0.8,
          axisStates: [{ axisId: 'A', friendlyCombatPower: 50, enemyCombatPower: 100 }],
        })
      );

      expect(result.score).toBeCloseTo(0.64, 6);
    });

    it('should use full power factor when no enemy power is reported', () => {
      const result = enemyScore(
        makeSituation({
          threatLevel: 0.8,
          axisStates: [{ axisId: 'A', friendlyCombatPower: 50, enemyCombatPower: 0 }],
        })
      );

      expect(result.score).toBeCloseTo(0.8, 6);
    });

    it('should assume a neutral power factor without axis data', () => {
      const result = enemyScore(makeSituation({ threatLevel: 0.8 }));

      expect(result.score).toBeCloseTo(0.64, 6);
      expect(result.warnings).toEqual(['[DATA_GAP] axis combat power missing -> fallback 0.5']);
    });
  });

  describe('terrain', () => {
    it('should add compatible tags and subtract incompatible ones', () => {
      const coa = makeCoa({ environmentFit: { compatible: ['mountain'], incompatible: ['Forest', 'urban'] } });
      const situation = makeSituation({ terrainTags: ['Mountain', 'forest'] });

      expect(terrainScore(coa, situation).score).toBeCloseTo(0.5, 6);
    });

    it('should reward several compatible tags', () => {
      const coa = makeCoa({ environmentFit: { compatible: ['mountain', 'forest'], incompatible: [] } });

      expect(terrainScore(coa, makeSituation({ terrainTags: ['mountain', 'forest'] })).score).toBeCloseTo(0.8, 6);
    });

    it('should fall back to 0.5 without terrain tags', () => {
      const result = terrainScore(makeCoa(), makeSituation());

      expect(result.score).toBe(0.5);
      expect(result.warnings).toEqual(['[DATA_GAP] terrain tags missing -> fallback 0.5']);
    });
  });

  describe('civilian', () => {
    it('should push a COA in a high-priority area below 0.3', () => {
      const result = civilianScore(
        makeCoa({ impactTerrainCellIds: new Set(['C1', 'C2']) }),
        makeSituation({ civilianAreas: [area('CIV', 0.8, 500, ['C2'])] })
      );

      // density factor 0.95
      expect(result.score).toBeCloseTo(0.24, 6);
      expect(result.score).toBeLessThan(0.3);
    });

    it('should multiply the effect of every impacted area', () => {
      const result = civilianScore(
        makeCoa({ impactTerrainCellIds: new Set(['A', 'B']) }),
        makeSituation({ civilianAreas: [area('X', 0.5, 0, ['A']), area('Y', 0.5, 0, ['B']), area('Z', 1, 0, ['Q'])] })
      );

      expect(result.score).toBeCloseTo(0.3025, 6);
    });

    it('should score 1.0 when no area is impacted', () => {
      const result = civilianScore(
        makeCoa({ impactTerrainCellIds: new Set(['A']) }),
        makeSituation({ civilianAreas: [area('X', 0.9, 2000, ['B'])] })
      );

      expect(result).toEqual({ score: 1, warnings: [] });
    });

    it('should score 1.0 with a warning when there is no civilian data', () => {
      const result = civilianScore(makeCoa(), makeSituation());

      expect(result.score).toBe(1);
      expect(result.warnings).toEqual(['[DATA_GAP] civilian area data missing -> fallback 1']);
    });
  });

  describe('time', () => {
    it('should zero a COA that overruns a time-critical limit', () => {
      const result = timeScore(
        makeCoa({ estimatedDurationHours: 30 }),
        makeSituation({ constraints: [limit(20, true)] })
      );

      expect(result.score).toBe(0);
    });

    it('should degrade by the overrun ratio otherwise', () => {
      const coa = makeCoa({ estimatedDurationHours: 30 });

      expect(timeScore(coa, makeSituation({ constraints: [limit(20, false)] })).score).toBeCloseTo(0.5, 6);
      expect(timeScore(makeCoa({ estimatedDurationHours: 50 }), makeSituation({ constraints: [limit(20, false)] })).score).toBe(0);
    });

    it('should take the minimum across applicable constraints', () => {
      const coa = makeCoa({ id: 'COA-7', type: 'Defense', estimatedDurationHours: 30 });
      const situation = makeSituation({
        constraints: [limit(40, false), limit(25, false, 'COA-7'), limit(10, true, 'Offensive')],
      });

      expect(timeScore(coa, situation).score).toBeCloseTo(0.8, 6);
    });

    it('should score 1.0 without duration constraints', () => {
      const situation = makeSituation({ constraints: [{ id: 'T', scope: 'global', timeCritical: true }] });

      expect(timeScore(makeCoa({ estimatedDurationHours: 99 }), situation).score).toBe(1);
    });
  });
});

describe('MettCEvaluator', () => {
  const evaluator = new MettCEvaluator(new ResourcePriorityParser());

  it('should combine six dimensions with equal weights', () => {
    const result = evaluator.evaluate(makeCoa(), makeSituation({ threatLevel: 0.5 }));

    expect(result.mission).toBe(0.5);
    expect(result.enemy).toBe(0.4);
    expect(result.terrain).toBe(0.5);
    expect(result.troops).toBe(1);
    expect(result.civilian).toBe(1);
    expect(result.time).toBe(1);
    expect(result.total).toBeCloseTo(4.4 / 6, 3);
    expect(result.weights.mission).toBeCloseTo(1 / 6, 6);
    expect(result.warnings).toEqual([
      '[DATA_GAP] mission objective tags missing -> fallback 0.5',
      '[DATA_GAP] axis combat power missing -> fallback 0.5',
      '[DATA_GAP] terrain tags missing -> fallback 0.5',
      '[DATA_GAP] civilian area data missing -> fallback 1',
    ]);
  });

  it('should score troops through resource matching', () => {
    const coa = makeCoa({ requiredResources: [{ resource: 'Tank', tier: 'Required', weight: 1 }] });

    expect(evaluator.evaluate(coa, makeSituation()).troops).toBe(0.2);
    expect(
      evaluator.evaluate(coa, makeSituation({ availableResources: [{ name: 'tank', status: 'available' }] })).troops
    ).toBe(1);
  });

  it('should normalize custom weights', () => {
    const civilianOnly = new MettCEvaluator(new ResourcePriorityParser(), {
      weights: { mission: 0, enemy: 0, terrain: 0, troops: 0, time: 0, civilian: 2 },
    });
    const result = civilianOnly.evaluate(
      makeCoa({ impactTerrainCellIds: new Set(['A']) }),
      makeSituation({ civilianAreas: [area('X', 0.5, 0, ['A'])] })
    );

    expect(result.weights.civilian).toBe(1);
    expect(result.total).toBeCloseTo(0.55, 6);
  });
});
