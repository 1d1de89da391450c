/**
 * Decision Pipeline
 * =================
 *
 * Two-pass COA ranking over one scoring snapshot.
 *
 * STATES: Generated → Pass1Scored → Pass2Filtered → Ranked
 *
 * PASS 1: base score every candidate, apply rules, sort
 * PASS 2: METT-C on the top-K, exclude, blend survivors, re-sort
 *
 * RULES (LOCKED v1):
 * - Sort: total desc, COA id asc
 * - Exclusion: civilian < threshold first, then time == 0
 * - Excluded candidates keep their Pass-1 total
 * - All top-K excluded → best Pass-1 candidate restored (mettCFilterBypassed)
 * - Output: survivors, lower Pass-1 candidates, excluded (rank null)
 */

import { v4 as uuidv4 } from 'uuid';
import type { Coa, DecisionInput } from '../../contracts/coa.contract.js';
import { parseDecisionInput } from '../../contracts/decision.input.contract.js';
import type {
  DecisionResult,
  ExcludeReason,
  MettCScore,
  PipelineState,
  RankedCoa,
  ScoreBreakdown,
} from '../../contracts/score.contract.js';
import { componentLogger, type Logger } from '../../common/logger.js';
import { env } from '../../config/env.js';
import { byTotalThenId, compareAlternatives } from '../scoring/coa.comparison.js';
import type { ScoringSnapshot, SnapshotProvider } from './scoring.snapshot.js';

export interface DecisionPipelineOptions {
  topK?: number;
  civilianThreshold?: number;
  logger?: Logger;
}

const NEXT_STATE: Record<PipelineState, PipelineState | null> = {
  Generated: 'Pass1Scored',
  Pass1Scored: 'Pass2Filtered',
  Pass2Filtered: 'Ranked',
  Ranked: null,
};

export class PipelineStateError extends Error {
  constructor(from: PipelineState, to: PipelineState) {
    super(`Illegal pipeline transition ${from} → ${to}`);
    this.name = 'PipelineStateError';
  }
}

/**
 * Tracks the state of one run; any out-of-order transition throws
 */
export class PipelineRun {
  private current: PipelineState = 'Generated';

  constructor(public readonly runId: string) {}

  get state(): PipelineState {
    return this.current;
  }

  advance(to: PipelineState): void {
    if (NEXT_STATE[this.current] !== to) {
      throw new PipelineStateError(this.current, to);
    }
    this.current = to;
  }
}

interface Pass2Outcome {
  survivors: ScoreBreakdown[];
  excluded: ScoreBreakdown[];
  warnings: string[];
}

export class DecisionPipeline {
  private readonly topK: number;
  private readonly civilianThreshold: number;
  private readonly logger: Logger;

  constructor(private readonly snapshots: SnapshotProvider, options: DecisionPipelineOptions = {}) {
    this.topK = Math.max(1, Math.floor(options.topK ?? env.PASS2_TOP_K));
    this.civilianThreshold = options.civilianThreshold ?? env.CIVILIAN_THRESHOLD;
    this.logger = options.logger ?? componentLogger('DecisionPipeline');
  }

  /**
   * Validate a raw record at the boundary, then run it
   */
  runRecord(raw: unknown): DecisionResult {
    const snapshot = this.snapshots.current();
    return this.runWith(snapshot, parseDecisionInput(raw, snapshot.parser));
  }

  run(input: DecisionInput): DecisionResult {
    return this.runWith(this.snapshots.current(), input);
  }

  // ═══════════════════════════════════════════════════════════════
  // RUN
  // ═══════════════════════════════════════════════════════════════

  private runWith(snapshot: ScoringSnapshot, input: DecisionInput): DecisionResult {
    const run = new PipelineRun(uuidv4());
    const warnings: string[] = [...snapshot.warnings];
    const { candidates, situation } = input;

    this.logger.info(
      { runId: run.runId, snapshotVersion: snapshot.version, candidates: candidates.length },
      '[DecisionPipeline] run started'
    );

    if (candidates.length === 0) {
      warnings.push('no candidates supplied, nothing to rank');
      run.advance('Pass1Scored');
      run.advance('Pass2Filtered');
      run.advance('Ranked');
      return {
        runId: run.runId,
        state: run.state,
        snapshotVersion: snapshot.version,
        ranked: [],
        comparison: compareAlternatives([]),
        warnings,
      };
    }

    // ═══════════════════════════════════════════════════════════
    // PASS 1
    // ═══════════════════════════════════════════════════════════

    const scored = candidates.map((coa) => snapshot.scorer.score(coa, situation));
    const ruled = snapshot.rules.applyScoring(scored, situation);
    warnings.push(...ruled.warnings);
    const pass1 = [...ruled.breakdowns].sort(byTotalThenId);
    run.advance('Pass1Scored');

    // ═══════════════════════════════════════════════════════════
    // PASS 2
    // ═══════════════════════════════════════════════════════════

    const byId = new Map<string, Coa>(candidates.map((coa) => [coa.id, coa]));
    const top = pass1.slice(0, this.topK);
    const rest = pass1.slice(this.topK);
    const pass2 = this.filter(snapshot, top, byId, input);
    warnings.push(...pass2.warnings);
    run.advance('Pass2Filtered');

    // ═══════════════════════════════════════════════════════════
    // RANK
    // ═══════════════════════════════════════════════════════════

    const ranked = this.assemble(pass2.survivors, rest, pass2.excluded);
    run.advance('Ranked');

    this.logger.info(
      {
        runId: run.runId,
        leader: ranked[0]?.coaId ?? null,
        excluded: pass2.excluded.length,
        rule: ruled.recommendation?.ruleName ?? null,
      },
      '[DecisionPipeline] run completed'
    );

    return {
      runId: run.runId,
      state: run.state,
      snapshotVersion: snapshot.version,
      ranked,
      comparison: compareAlternatives(pass2.survivors, 3, rest.length),
      warnings,
    };
  }

  private filter(
    snapshot: ScoringSnapshot,
    top: readonly ScoreBreakdown[],
    byId: ReadonlyMap<string, Coa>,
    input: DecisionInput
  ): Pass2Outcome {
    const evaluated: Array<{ breakdown: ScoreBreakdown; mettc: MettCScore; reason: ExcludeReason | null }> = [];

    for (const breakdown of top) {
      const coa = byId.get(breakdown.coaId);
      if (!coa) {
        throw new Error(`Pipeline lost candidate ${breakdown.coaId}`);
      }
      const mettc = snapshot.mettc.evaluate(coa, input.situation);
      evaluated.push({ breakdown, mettc, reason: this.exclusionReason(mettc) });
    }

    const survivors: ScoreBreakdown[] = [];
    const excluded: ScoreBreakdown[] = [];
    for (const { breakdown, mettc, reason } of evaluated) {
      if (reason) {
        excluded.push({
          ...snapshot.scorer.attachMettC(breakdown, mettc, false),
          excluded: true,
          excludeReason: reason,
        });
      } else {
        survivors.push(snapshot.scorer.attachMettC(breakdown, mettc));
      }
    }

    const warnings: string[] = [];
    if (survivors.length === 0 && evaluated.length > 0) {
      // best Pass-1 candidate comes back, blended like a survivor
      const best = evaluated[0];
      survivors.push({
        ...snapshot.scorer.attachMettC(best.breakdown, best.mettc),
        mettCFilterBypassed: true,
        bypassedReason: best.reason,
      });
      excluded.shift();
      warnings.push(
        `all top-${top.length} candidates excluded by METT-C filter; ${best.breakdown.coaId} restored (${best.reason})`
      );
      this.logger.warn({ coaId: best.breakdown.coaId, reason: best.reason }, '[DecisionPipeline] filter bypassed');
    }

    survivors.sort(byTotalThenId);
    return { survivors, excluded, warnings };
  }

  private exclusionReason(mettc: MettCScore): ExcludeReason | null {
    if (mettc.civilian < this.civilianThreshold) return 'civilian_protection_below_threshold';
    if (mettc.time === 0) return 'time_constraint_violated';
    return null;
  }

  private assemble(
    survivors: readonly ScoreBreakdown[],
    rest: readonly ScoreBreakdown[],
    excluded: readonly ScoreBreakdown[]
  ): RankedCoa[] {
    let rank = 0;
    const toRanked = (breakdown: ScoreBreakdown): RankedCoa => ({
      coaId: breakdown.coaId,
      rank: breakdown.excluded ? null : ++rank,
      totalScore: breakdown.total,
      breakdown,
      excluded: breakdown.excluded,
      excludeReason: breakdown.excludeReason,
      warnings: breakdown.warnings,
    });

    return [...survivors, ...rest, ...excluded].map(toRanked);
  }
}
