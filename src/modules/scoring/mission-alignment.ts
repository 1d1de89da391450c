/**
 * Mission Alignment Table
 * =======================
 *
 * missionType × coaType → alignment ∈ [0, 1]
 *
 * Mission types resolve through the alias map (e.g. 방어 → Defense) and
 * are compared case-insensitively. Unknown or missing → 0.5 with a warning.
 */

import { z } from 'zod';
import { DataGapError, toWarning } from '../../common/errors.js';
import { loadJsonFile, type LoadOutcome } from '../../common/json-file.js';

export const ALIGNMENT_FALLBACK = 0.5;

export const AlignmentFileSchema = z.object({
  version: z.string().default('v1'),
  matrix: z.record(z.string(), z.record(z.string(), z.number().min(0).max(1))),
  missionAliases: z.record(z.string(), z.string()).default({}),
});

export type AlignmentFile = z.infer<typeof AlignmentFileSchema>;

export const EMPTY_ALIGNMENT_FILE: AlignmentFile = {
  version: 'empty',
  matrix: {},
  missionAliases: {},
};

export interface AlignmentResult {
  score: number;
  fallback: boolean;
  warnings: string[];
}

export class MissionAlignmentTable {
  private readonly rows: ReadonlyMap<string, ReadonlyMap<string, number>>;
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(file: AlignmentFile) {
    const rows = new Map<string, ReadonlyMap<string, number>>();
    for (const [missionType, scores] of Object.entries(file.matrix)) {
      const row = new Map<string, number>();
      for (const [coaType, score] of Object.entries(scores)) {
        row.set(coaType.toLowerCase(), score);
      }
      rows.set(missionType.toLowerCase(), row);
    }
    this.rows = rows;

    const aliases = new Map<string, string>();
    for (const [alias, canonical] of Object.entries(file.missionAliases)) {
      aliases.set(alias.trim().toLowerCase(), canonical.toLowerCase());
    }
    this.aliases = aliases;
  }

  get size(): number {
    return this.rows.size;
  }

  alignment(missionType: string | undefined, coaType: string): AlignmentResult {
    if (missionType === undefined || missionType.trim() === '') {
      return fallback('mission type missing');
    }

    const key = missionType.trim().toLowerCase();
    const row = this.rows.get(this.aliases.get(key) ?? key);
    const score = row?.get(coaType.toLowerCase());
    if (score === undefined) {
      return fallback(`unmapped mission alignment (${missionType} × ${coaType})`);
    }

    return { score, fallback: false, warnings: [] };
  }
}

function fallback(message: string): AlignmentResult {
  return {
    score: ALIGNMENT_FALLBACK,
    fallback: true,
    warnings: [toWarning(new DataGapError(message, ALIGNMENT_FALLBACK))],
  };
}

export function loadAlignmentTable(filePath: string): LoadOutcome<AlignmentFile> {
  return loadJsonFile(filePath, AlignmentFileSchema, EMPTY_ALIGNMENT_FILE, 'mission alignment table');
}
