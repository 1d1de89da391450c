import { describe, it, expect } from 'vitest';
import { resolveFromRoot } from '../../../config/paths.js';
import { MissionAlignmentTable, loadAlignmentTable } from '../mission-alignment.js';

describe('MissionAlignmentTable', () => {
  const outcome = loadAlignmentTable(resolveFromRoot('data', 'mission-alignment.json'));
  const table = new MissionAlignmentTable(outcome.value);

  it('should load the bundled matrix', () => {
    expect(outcome.source).toBe('file');
    expect(table.size).toBe(8);
  });

  it('should look up mission × COA alignment', () => {
    expect(table.alignment('Defense', 'Defense')).toEqual({ score: 1, fallback: false, warnings: [] });
    expect(table.alignment('Defense', 'Offensive').score).toBe(0.2);
    expect(table.alignment('Defense', 'Deterrence').score).toBe(0.9);
  });

  it('should resolve aliases and casing', () => {
    expect(table.alignment('방어', 'Defense').score).toBe(1);
    expect(table.alignment('  defense ', 'offensive').score).toBe(0.2);
  });

  it('should fall back to 0.5 for a missing or unknown mission type', () => {
    expect(table.alignment(undefined, 'Defense')).toEqual({
      score: 0.5,
      fallback: true,
      warnings: ['[DATA_GAP] mission type missing -> fallback 0.5'],
    });
    expect(table.alignment('Patrol', 'Defense').warnings).toEqual([
      '[DATA_GAP] unmapped mission alignment (Patrol × Defense) -> fallback 0.5',
    ]);
  });
});
