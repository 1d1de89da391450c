import type { PriorityTier, ResourceRequirement } from '../../contracts/coa.contract.js';

// ═══════════════════════════════════════════════════════════════
// TIER TABLE (LOCKED v1)
// ═══════════════════════════════════════════════════════════════

export const TIER_WEIGHTS: Record<PriorityTier, number> = {
  Required: 1.0,
  Recommended: 0.6,
  Optional: 0.3,
};

export const TIER_LABELS: Record<string, PriorityTier> = {
  '필수': 'Required',
  required: 'Required',
  mandatory: 'Required',
  must: 'Required',
  '권장': 'Recommended',
  recommended: 'Recommended',
  suggested: 'Recommended',
  '선택': 'Optional',
  optional: 'Optional',
  choice: 'Optional',
};

/** Score used when requirements exist but no resource data was supplied */
export const UNKNOWN_RESOURCE_FALLBACK = 0.2;

// ═══════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════

export interface ParseResult {
  requirements: ResourceRequirement[];
  warnings: string[];
}

export interface MatchedResource {
  resource: string;
  tier: PriorityTier;
  matchedName: string;
  quantity?: number;
}

export interface MissingResource {
  resource: string;
  tier: PriorityTier;
  reason: 'not_listed' | 'not_available';
}

export interface ResourceMatch {
  score: number;
  matched: MatchedResource[];
  missing: MissingResource[];
  missingRequired: string[];
  warnings: string[];
}

export type TierBreakdown = Record<PriorityTier, number>;
