/**
 * Relevance Mapper
 * ================
 *
 * Exact-match lookup of COA type × threat type compatibility.
 *
 * RULES:
 * - A critical mapping for the exact (coaId, threatId) pair wins over the type table
 * - Threat type is first normalized through the alias table
 * - COA type comparison is case-insensitive
 * - Unmapped pair → 0.5 plus a warning, never an exception
 *
 * The lookup index is built once in the constructor and frozen.
 */

import { DataGapError, toWarning } from '../../common/errors.js';
import { loadJsonFile, type LoadOutcome } from '../../common/json-file.js';
import { componentLogger, type Logger } from '../../common/logger.js';
import {
  EMPTY_RELEVANCE_TABLE,
  RELEVANCE_FALLBACK,
  RelevanceTableSchema,
  type RelevanceIds,
  type RelevanceResult,
  type RelevanceStats,
  type RelevanceTable,
} from './relevance.types.js';

export class RelevanceMapper {
  private readonly index: ReadonlyMap<string, number>;
  private readonly critical: ReadonlyMap<string, number>;
  private readonly aliases: ReadonlyMap<string, string>;
  private readonly statsSnapshot: RelevanceStats;

  constructor(table: RelevanceTable, private readonly logger: Logger = componentLogger('RelevanceMapper')) {
    const index = new Map<string, number>();
    for (const row of table.rows) {
      const key = pairKey(row.coaType, row.threatType);
      // first row wins for duplicate pairs
      if (!index.has(key)) index.set(key, row.baseRelevance);
    }
    this.index = index;

    const critical = new Map<string, number>();
    for (const mapping of table.criticalMappings) {
      const key = idKey(mapping.coaId, mapping.threatId);
      if (!critical.has(key)) critical.set(key, mapping.relevance);
    }
    this.critical = critical;

    const aliases = new Map<string, string>();
    for (const [alias, canonical] of Object.entries(table.threatAliases)) {
      aliases.set(alias.trim().toLowerCase(), canonical);
    }
    for (const row of table.rows) {
      const lower = row.threatType.trim().toLowerCase();
      if (!aliases.has(lower)) aliases.set(lower, row.threatType.trim());
    }
    this.aliases = aliases;

    this.statsSnapshot = Object.freeze(computeStats(table));
  }

  /**
   * Map a raw threat type (name, alias or code) to the table's threat type
   */
  normalizeThreatType(threatType: string): string {
    const key = threatType.trim();
    return this.aliases.get(key.toLowerCase()) ?? key;
  }

  relevance(coaType: string, threatType: string, ids?: RelevanceIds): RelevanceResult {
    const normalized = this.normalizeThreatType(threatType);

    if (ids?.threatId !== undefined) {
      const override = this.critical.get(idKey(ids.coaId, ids.threatId));
      if (override !== undefined) {
        this.logger.debug({ ...ids, score: override }, '[RelevanceMapper] critical mapping hit');
        return { score: override, source: 'critical', threatType: normalized, matched: true, warnings: [] };
      }
    }

    const score = this.index.get(pairKey(coaType, normalized));

    if (score !== undefined) {
      return { score, source: 'table', threatType: normalized, matched: true, warnings: [] };
    }

    this.logger.debug({ coaType, threatType, normalized }, '[RelevanceMapper] unmapped pair');
    return {
      score: RELEVANCE_FALLBACK,
      source: 'fallback',
      threatType: normalized,
      matched: false,
      warnings: [
        toWarning(new DataGapError(`unmapped relevance pair (${coaType} × ${threatType})`, RELEVANCE_FALLBACK)),
      ],
    };
  }

  stats(): RelevanceStats {
    return this.statsSnapshot;
  }
}

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

export function loadRelevanceTable(filePath: string): LoadOutcome<RelevanceTable> {
  return loadJsonFile(filePath, RelevanceTableSchema, EMPTY_RELEVANCE_TABLE, 'relevance table');
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function pairKey(coaType: string, threatType: string): string {
  return `${coaType.trim().toLowerCase()}|${threatType.trim()}`;
}

function idKey(coaId: string, threatId: string): string {
  return `${coaId.trim()}|${threatId.trim()}`;
}

function computeStats(table: RelevanceTable): RelevanceStats {
  if (table.rows.length === 0) {
    return {
      totalMappings: 0,
      criticalMappings: table.criticalMappings.length,
      avgRelevance: 0,
      minRelevance: 0,
      maxRelevance: 0,
      coaTypes: [],
      threatTypes: [],
    };
  }

  const values = table.rows.map((row) => row.baseRelevance);
  const sum = values.reduce((acc, v) => acc + v, 0);

  return {
    totalMappings: table.rows.length,
    criticalMappings: table.criticalMappings.length,
    avgRelevance: sum / values.length,
    minRelevance: Math.min(...values),
    maxRelevance: Math.max(...values),
    coaTypes: [...new Set(table.rows.map((row) => row.coaType))],
    threatTypes: [...new Set(table.rows.map((row) => row.threatType))],
  };
}
