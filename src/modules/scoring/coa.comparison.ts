/**
 * Alternative Comparison
 * ======================
 *
 * Side-by-side summary of the best alternatives and a few plain-text
 * recommendations for the reviewer.
 *
 * `unreviewed` counts ranked candidates left out of the comparison because
 * they never went through METT-C review; their Pass-1 totals are not
 * comparable with blended ones.
 */

import type { AlternativeComparison, ScoreBreakdown } from '../../contracts/score.contract.js';
import { round4 } from '../../common/math.js';
import { COMPARISON_CLEAR_GAP, COMPARISON_CLOSE_GAP } from './scoring.types.js';

/**
 * total descending, then COA id ascending (code-unit order)
 */
export function byTotalThenId(
  a: Pick<ScoreBreakdown, 'coaId' | 'total'>,
  b: Pick<ScoreBreakdown, 'coaId' | 'total'>
): number {
  if (a.total !== b.total) return b.total - a.total;
  if (a.coaId < b.coaId) return -1;
  if (a.coaId > b.coaId) return 1;
  return 0;
}

export function compareAlternatives(
  breakdowns: readonly ScoreBreakdown[],
  topN = 3,
  unreviewed = 0
): AlternativeComparison {
  if (breakdowns.length === 0) {
    return {
      top: [],
      scoreRange: { min: 0, max: 0, avg: 0 },
      recommendations: ['no alternatives to compare'],
    };
  }

  const sorted = [...breakdowns].sort(byTotalThenId);
  const top = sorted.slice(0, Math.max(1, topN)).map((b, i) => ({
    rank: i + 1,
    coaId: b.coaId,
    total: b.total,
    strengths: b.strengths,
    weaknesses: b.weaknesses,
    confidence: b.confidence,
  }));

  const totals = sorted.map((b) => b.total);
  const scoreRange = {
    min: round4(Math.min(...totals)),
    max: round4(Math.max(...totals)),
    avg: round4(totals.reduce((sum, t) => sum + t, 0) / totals.length),
  };

  return { top, scoreRange, recommendations: recommend(top, sorted.length, unreviewed) };
}

function recommend(top: AlternativeComparison['top'], count: number, unreviewed: number): string[] {
  const recommendations: string[] = [];
  const [first, second] = top;

  if (count === 1 && unreviewed > 0) {
    recommendations.push(
      `${first.coaId} is the only METT-C reviewed alternative (${unreviewed} more ranked on Pass-1 score)`
    );
  } else if (count === 1) {
    recommendations.push(`${first.coaId} is the only alternative`);
  } else if (second) {
    const gap = round4(first.total - second.total);
    if (gap < COMPARISON_CLOSE_GAP) {
      recommendations.push(
        `close call between ${first.coaId} and ${second.coaId} (gap ${gap.toFixed(2)}), review both`
      );
    } else if (gap > COMPARISON_CLEAR_GAP) {
      recommendations.push(`${first.coaId} is the clear leader (gap ${gap.toFixed(2)})`);
    }
  }

  for (const entry of top.slice(0, 2)) {
    if (entry.strengths.length > 0) {
      recommendations.push(`${entry.coaId} strengths: ${entry.strengths.slice(0, 2).join('; ')}`);
    }
    if (entry.weaknesses.length > 0) {
      recommendations.push(`${entry.coaId} watch: ${entry.weaknesses.slice(0, 2).join('; ')}`);
    }
  }

  return recommendations;
}
