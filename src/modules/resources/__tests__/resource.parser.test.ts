import { describe, it, expect } from 'vitest';
import type { AvailableResource, ResourceRequirement } from '../../../contracts/coa.contract.js';
import { ResourcePriorityParser, asRequiredAssets, normalizeResourceName } from '../resource.parser.js';

describe('ResourcePriorityParser', () => {
  describe('parse', () => {
    it('should parse Korean tier labels into weighted requirements', () => {
      const parser = new ResourcePriorityParser();
      const result = parser.parse('포병대대(필수), 공격헬기(권장)');

      expect(result.requirements).toEqual([
        { resource: '포병대대', tier: 'Required', weight: 1.0 },
        { resource: '공격헬기', tier: 'Recommended', weight: 0.6 },
      ]);
      expect(result.warnings).toEqual([]);
    });

    it('should accept English tier labels case-insensitively', () => {
      const parser = new ResourcePriorityParser();
      const result = parser.parse('Tank Company (MANDATORY), Recon Drone(Choice), EW Team(suggested)');

      expect(result.requirements).toEqual([
        { resource: 'Tank Company', tier: 'Required', weight: 1.0 },
        { resource: 'Recon Drone', tier: 'Optional', weight: 0.3 },
        { resource: 'EW Team', tier: 'Recommended', weight: 0.6 },
      ]);
    });

    it('should skip malformed tokens with a warning each', () => {
      const parser = new ResourcePriorityParser();
      const result = parser.parse('포병대대, 공격헬기(unknown), 정찰드론(선택)');

      expect(result.requirements).toEqual([{ resource: '정찰드론', tier: 'Optional', weight: 0.3 }]);
      expect(result.warnings).toEqual([
        '[PARSE_WARNING] missing priority tier: "포병대대"',
        '[PARSE_WARNING] unknown priority tier: "공격헬기(unknown)"',
      ]);
    });

    it('should return an empty list without warnings for blank input', () => {
      const parser = new ResourcePriorityParser();

      for (const raw of ['', '   ', null, undefined]) {
        expect(parser.parse(raw)).toEqual({ requirements: [], warnings: [] });
      }
    });

    it('should memoize results and hand out independent copies', () => {
      const parser = new ResourcePriorityParser({ cacheSize: 8 });
      const first = parser.parse('포병대대(필수)');
      first.requirements[0].weight = 0;

      const second = parser.parse('포병대대(필수)');

      expect(second.requirements[0].weight).toBe(1.0);
      expect(parser.cacheStats().hits).toBe(1);
      expect(parser.cacheStats().misses).toBe(1);
    });
  });

  describe('match', () => {
    const parser = new ResourcePriorityParser();
    const required: ResourceRequirement[] = [
      { resource: 'Artillery Battalion', tier: 'Required', weight: 1.0 },
      { resource: 'Attack-Helicopter', tier: 'Recommended', weight: 0.6 },
      { resource: 'Recon Drone', tier: 'Optional', weight: 0.3 },
    ];

    it('should score 1.0 when nothing is required', () => {
      expect(parser.match([], [{ name: 'x', status: 'available' }]).score).toBe(1.0);
    });

    it('should fall back to 0.2 when resource data is unknown', () => {
      const result = parser.match(required, []);

      expect(result.score).toBe(0.2);
      expect(result.warnings).toEqual(['[DATA_GAP] resource data unknown -> fallback 0.2']);
      expect(result.missingRequired).toEqual(['Artillery Battalion']);
    });

    it('should weight matches by tier', () => {
      const available: AvailableResource[] = [
        { name: 'artillery_battalion', quantity: 3, status: 'available' },
        { name: 'Attack Helicopter', status: 'maintenance' },
      ];
      const result = parser.match(required, available);

      expect(result.score).toBeCloseTo(1.0 / 1.9, 6);
      expect(result.matched.map((m) => m.resource)).toEqual(['Artillery Battalion']);
      expect(result.missing).toEqual([
        { resource: 'Attack-Helicopter', tier: 'Recommended', reason: 'not_available' },
        { resource: 'Recon Drone', tier: 'Optional', reason: 'not_listed' },
      ]);
      expect(result.missingRequired).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    it('should match on containment in either direction', () => {
      const result = parser.match(
        [{ resource: '포병', tier: 'Required', weight: 1.0 }],
        [{ name: '포병대대', status: 'available' }]
      );

      expect(result.score).toBe(1);
      expect(result.matched[0].matchedName).toBe('포병대대');
    });

    it('should not count an entry with zero quantity', () => {
      const result = parser.match(
        [{ resource: 'Tank', tier: 'Required', weight: 1.0 }],
        [{ name: 'Tank', quantity: 0, status: 'available' }]
      );

      expect(result.score).toBe(0);
      expect(result.missingRequired).toEqual(['Tank']);
    });

    it('should expose the ratio through matchScore', () => {
      const available: AvailableResource[] = [{ name: 'Recon Drone', status: 'available' }];
      expect(parser.matchScore(required, available)).toBeCloseTo(0.3 / 1.9, 6);
    });

    it('should weight by tier even when a requirement carries another weight', () => {
      const result = parser.match(
        [{ resource: 'Artillery', tier: 'Required', weight: 0 }],
        [{ name: 'Tank', quantity: 1, status: 'available' }]
      );

      expect(result.score).toBe(0);
      expect(result.missingRequired).toEqual(['Artillery']);
    });
  });

  describe('helpers', () => {
    it('should count requirements per tier', () => {
      const parser = new ResourcePriorityParser();
      const { requirements } = parser.parse('a(필수), b(필수), c(선택)');

      expect(parser.tierBreakdown(requirements)).toEqual({ Required: 2, Recommended: 0, Optional: 1 });
    });

    it('should normalize names and lift assets to required tier', () => {
      expect(normalizeResourceName(' Attack-Heli_Copter ')).toBe('attackhelicopter');
      expect(asRequiredAssets(['K9'])).toEqual([{ resource: 'K9', tier: 'Required', weight: 1.0 }]);
    });
  });
});
