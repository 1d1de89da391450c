export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Scale weights so they sum to 1. Negative entries count as 0;
 * an all-zero map is returned unchanged.
 */
export function normalizeWeights<K extends string>(weights: Record<K, number>): Record<K, number> {
  const keys = Object.keys(weights) as K[];
  const total = keys.reduce((sum, key) => sum + Math.max(0, weights[key]), 0);
  if (total <= 0) return { ...weights };

  const normalized = { ...weights };
  for (const key of keys) {
    normalized[key] = Math.max(0, weights[key]) / total;
  }
  return normalized;
}

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

export function tagSet(tags: readonly string[]): Set<string> {
  const out = new Set<string>();
  for (const tag of tags) {
    const normalized = normalizeTag(tag);
    if (normalized) out.add(normalized);
  }
  return out;
}
