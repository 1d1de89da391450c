/**
 * Scoring Snapshot
 * ================
 *
 * One immutable set of loaded tables, compiled rules and the engines
 * built over them.
 *
 * RULES:
 * - A snapshot is frozen once built and never mutated
 * - reload() builds the next snapshot completely, then swaps the reference
 * - A run holds the snapshot it started with
 * - Load failures degrade to empty tables; they surface as snapshot warnings
 */

import type { MettCWeights } from '../../contracts/score.contract.js';
import { componentLogger, type Logger } from '../../common/logger.js';
import { env } from '../../config/env.js';
import { MettCEvaluator } from '../mett-c/mettc.evaluator.js';
import { RelevanceMapper, loadRelevanceTable } from '../relevance/relevance.mapper.js';
import type { RelevanceTable } from '../relevance/relevance.types.js';
import { ResourcePriorityParser } from '../resources/resource.parser.js';
import { RuleEngine, loadRuleSet } from '../rules/rule.engine.js';
import type { RuleSet } from '../rules/rule.types.js';
import { CoaScorer, type CoaScorerOptions } from '../scoring/coa.scorer.js';
import {
  MissionAlignmentTable,
  loadAlignmentTable,
  type AlignmentFile,
} from '../scoring/mission-alignment.js';

export interface ScoringSnapshot {
  readonly version: number;
  readonly loadedAt: string;
  readonly parser: ResourcePriorityParser;
  readonly relevance: RelevanceMapper;
  readonly alignment: MissionAlignmentTable;
  readonly rules: RuleEngine;
  readonly scorer: CoaScorer;
  readonly mettc: MettCEvaluator;
  readonly warnings: readonly string[];
}

export interface SnapshotProvider {
  current(): ScoringSnapshot;
}

export interface SnapshotTables {
  relevance: RelevanceTable;
  alignment: AlignmentFile;
  rules: RuleSet;
}

export interface SnapshotOptions {
  parseCacheSize?: number;
  scorer?: Omit<CoaScorerOptions, 'logger'>;
  mettcWeights?: Partial<MettCWeights>;
  logger?: Logger;
}

export interface SnapshotSources {
  rulesPath: string;
  relevancePath: string;
  alignmentPath: string;
}

// ═══════════════════════════════════════════════════════════════
// BUILD
// ═══════════════════════════════════════════════════════════════

/**
 * Assemble a frozen snapshot from already loaded tables
 */
export function createSnapshot(
  tables: SnapshotTables,
  version: number,
  options: SnapshotOptions = {},
  warnings: readonly string[] = []
): ScoringSnapshot {
  const logger = options.logger;
  const parser = new ResourcePriorityParser({
    cacheSize: options.parseCacheSize ?? env.PARSE_CACHE_SIZE,
    logger,
  });
  const relevance = new RelevanceMapper(tables.relevance, logger);
  const alignment = new MissionAlignmentTable(tables.alignment);

  return Object.freeze({
    version,
    loadedAt: new Date().toISOString(),
    parser,
    relevance,
    alignment,
    rules: new RuleEngine(tables.rules, logger),
    scorer: new CoaScorer({ relevance, parser, alignment }, { ...options.scorer, logger }),
    mettc: new MettCEvaluator(parser, { weights: options.mettcWeights, logger }),
    warnings: Object.freeze([...warnings]),
  });
}

export function loadSnapshot(
  sources: SnapshotSources,
  version: number,
  options: SnapshotOptions = {}
): ScoringSnapshot {
  const relevance = loadRelevanceTable(sources.relevancePath);
  const alignment = loadAlignmentTable(sources.alignmentPath);
  const rules = loadRuleSet(sources.rulesPath);

  return createSnapshot(
    { relevance: relevance.value, alignment: alignment.value, rules: rules.value },
    version,
    options,
    [...relevance.warnings, ...alignment.warnings, ...rules.warnings]
  );
}

// ═══════════════════════════════════════════════════════════════
// STORE
// ═══════════════════════════════════════════════════════════════

export interface SnapshotStoreOptions extends SnapshotOptions {
  sources?: Partial<SnapshotSources>;
}

export class ScoringSnapshotStore implements SnapshotProvider {
  private readonly sources: SnapshotSources;
  private readonly options: SnapshotOptions;
  private readonly logger: Logger;
  private snapshot: ScoringSnapshot;

  constructor(options: SnapshotStoreOptions = {}) {
    const { sources, ...snapshotOptions } = options;
    this.sources = {
      rulesPath: sources?.rulesPath ?? env.RULES_PATH,
      relevancePath: sources?.relevancePath ?? env.RELEVANCE_PATH,
      alignmentPath: sources?.alignmentPath ?? env.ALIGNMENT_PATH,
    };
    this.options = snapshotOptions;
    this.logger = options.logger ?? componentLogger('ScoringSnapshotStore');
    this.snapshot = this.build(1);
  }

  current(): ScoringSnapshot {
    return this.snapshot;
  }

  /**
   * Re-read every source and swap in the new snapshot
   */
  reload(): ScoringSnapshot {
    const next = this.build(this.snapshot.version + 1);
    this.snapshot = next;
    return next;
  }

  private build(version: number): ScoringSnapshot {
    const snapshot = loadSnapshot(this.sources, version, this.options);

    this.logger.info(
      {
        version,
        rules: snapshot.rules.size,
        relevancePairs: snapshot.relevance.stats().totalMappings,
        missionTypes: snapshot.alignment.size,
        warnings: snapshot.warnings.length,
      },
      '[ScoringSnapshotStore] snapshot loaded'
    );
    for (const warning of snapshot.warnings) {
      this.logger.warn({ version }, `[ScoringSnapshotStore] ${warning}`);
    }

    return snapshot;
  }
}
