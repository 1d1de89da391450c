/**
 * Resource Priority Parser
 * ========================
 *
 * Grammar: comma-separated "name(tier)" tokens, e.g.
 *   "포병대대(필수), 공격헬기(권장), 정찰드론(선택)"
 *
 * RULES:
 * - Tier labels are matched case-insensitively (Korean or English)
 * - A token without parentheses or with an unknown tier is skipped
 * - parse() never throws; it returns every valid token
 * - match() ratio = Σ matched weight / Σ required weight, weights taken from the tier
 */

import type {
  AvailableResource,
  PriorityTier,
  ResourceRequirement,
} from '../../contracts/coa.contract.js';
import { DataGapError, ParseWarning, toWarning } from '../../common/errors.js';
import { LruCache } from '../../common/lru-cache.js';
import { componentLogger, type Logger } from '../../common/logger.js';
import {
  TIER_LABELS,
  TIER_WEIGHTS,
  UNKNOWN_RESOURCE_FALLBACK,
  type MatchedResource,
  type MissingResource,
  type ParseResult,
  type ResourceMatch,
  type TierBreakdown,
} from './resource.types.js';

const TOKEN_PATTERN = /^(.+?)\s*\((.+?)\)\s*$/;

export interface ResourceParserOptions {
  cacheSize?: number;
  logger?: Logger;
}

export class ResourcePriorityParser {
  private readonly cache: LruCache<ParseResult>;
  private readonly logger: Logger;

  constructor(options: ResourceParserOptions = {}) {
    this.cache = new LruCache<ParseResult>(options.cacheSize ?? 512);
    this.logger = options.logger ?? componentLogger('ResourcePriorityParser');
  }

  // ═══════════════════════════════════════════════════════════════
  // PARSING
  // ═══════════════════════════════════════════════════════════════

  /**
   * Parse a raw priority string. Results are memoized; callers get copies.
   */
  parse(raw: string | null | undefined): ParseResult {
    if (raw === null || raw === undefined || raw.trim() === '') {
      return { requirements: [], warnings: [] };
    }

    const result = this.cache.getOrCompute(raw, () => this.parseUncached(raw));
    return {
      requirements: result.requirements.map((req) => ({ ...req })),
      warnings: [...result.warnings],
    };
  }

  private parseUncached(raw: string): ParseResult {
    const requirements: ResourceRequirement[] = [];
    const warnings: string[] = [];

    for (const part of raw.split(',')) {
      const token = part.trim();
      if (!token) continue;

      const match = TOKEN_PATTERN.exec(token);
      if (!match) {
        warnings.push(toWarning(new ParseWarning(token, 'missing priority tier')));
        continue;
      }

      const resource = match[1].trim();
      const tier = resolveTier(match[2]);
      if (!tier) {
        warnings.push(toWarning(new ParseWarning(token, 'unknown priority tier')));
        continue;
      }
      if (!resource) {
        warnings.push(toWarning(new ParseWarning(token, 'empty resource name')));
        continue;
      }

      requirements.push({ resource, tier, weight: TIER_WEIGHTS[tier] });
    }

    if (warnings.length > 0) {
      this.logger.debug({ raw, skipped: warnings.length }, '[ResourcePriorityParser] tokens skipped');
    }

    return { requirements, warnings };
  }

  // ═══════════════════════════════════════════════════════════════
  // MATCHING
  // ═══════════════════════════════════════════════════════════════

  match(
    required: readonly ResourceRequirement[],
    available: readonly AvailableResource[]
  ): ResourceMatch {
    if (required.length === 0) {
      return { score: 1.0, matched: [], missing: [], missingRequired: [], warnings: [] };
    }

    if (available.length === 0) {
      return {
        score: UNKNOWN_RESOURCE_FALLBACK,
        matched: [],
        missing: required.map((req) => ({ resource: req.resource, tier: req.tier, reason: 'not_listed' })),
        missingRequired: required.filter((req) => req.tier === 'Required').map((req) => req.resource),
        warnings: [
          toWarning(new DataGapError('resource data unknown', UNKNOWN_RESOURCE_FALLBACK)),
        ],
      };
    }

    const pool = available.map((res) => ({ res, key: normalizeResourceName(res.name) }));

    let totalWeight = 0;
    let matchedWeight = 0;
    const matched: MatchedResource[] = [];
    const missing: MissingResource[] = [];

    for (const req of required) {
      const weight = TIER_WEIGHTS[req.tier];
      totalWeight += weight;
      const reqKey = normalizeResourceName(req.resource);

      const candidates = pool.filter((entry) => namesMatch(reqKey, entry.key));
      if (candidates.length === 0) {
        missing.push({ resource: req.resource, tier: req.tier, reason: 'not_listed' });
        continue;
      }

      const usable = candidates.find((entry) => isUsable(entry.res));
      if (!usable) {
        missing.push({ resource: req.resource, tier: req.tier, reason: 'not_available' });
        continue;
      }

      matchedWeight += weight;
      matched.push({
        resource: req.resource,
        tier: req.tier,
        matchedName: usable.res.name,
        quantity: usable.res.quantity,
      });
    }

    const score = totalWeight > 0 ? matchedWeight / totalWeight : 1.0;

    return {
      score,
      matched,
      missing,
      missingRequired: missing.filter((m) => m.tier === 'Required').map((m) => m.resource),
      warnings: [],
    };
  }

  matchScore(
    required: readonly ResourceRequirement[],
    available: readonly AvailableResource[]
  ): number {
    return this.match(required, available).score;
  }

  tierBreakdown(required: readonly ResourceRequirement[]): TierBreakdown {
    const breakdown: TierBreakdown = { Required: 0, Recommended: 0, Optional: 0 };
    for (const req of required) {
      breakdown[req.tier]++;
    }
    return breakdown;
  }

  cacheStats() {
    return this.cache.stats();
  }
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function resolveTier(label: string): PriorityTier | null {
  return TIER_LABELS[label.trim().toLowerCase()] ?? null;
}

export function normalizeResourceName(name: string): string {
  return name.toLowerCase().replace(/[\s\-_]/g, '');
}

function namesMatch(required: string, available: string): boolean {
  if (!required || !available) return false;
  return required === available || available.includes(required) || required.includes(available);
}

function isUsable(res: AvailableResource): boolean {
  if (res.status !== 'available') return false;
  return res.quantity === undefined || res.quantity > 0;
}

export function asRequiredAssets(assets: readonly string[]): ResourceRequirement[] {
  return assets.map((resource) => ({ resource, tier: 'Required', weight: TIER_WEIGHTS.Required }));
}
