/**
 * Relevance Table Types
 * =====================
 *
 * (coaType, threatType) → baseRelevance ∈ [0, 1]
 * (coaId, threatId) → relevance ∈ [0, 1], checked before the type table
 */

import { z } from 'zod';

export const RELEVANCE_FALLBACK = 0.5;

export const RelevanceRowSchema = z.object({
  coaType: z.string().min(1),
  threatType: z.string().min(1),
  baseRelevance: z.number().min(0).max(1),
  description: z.string().default(''),
});

export const CriticalMappingSchema = z.object({
  coaId: z.string().min(1),
  threatId: z.string().min(1),
  relevance: z.number().min(0).max(1),
  description: z.string().default(''),
});

export const RelevanceTableSchema = z.object({
  version: z.string().default('v1'),
  rows: z.array(RelevanceRowSchema),
  criticalMappings: z.array(CriticalMappingSchema).default([]),
  threatAliases: z.record(z.string(), z.string()).default({}),
});

export type RelevanceRow = z.infer<typeof RelevanceRowSchema>;
export type CriticalMapping = z.infer<typeof CriticalMappingSchema>;
export type RelevanceTable = z.infer<typeof RelevanceTableSchema>;

export const EMPTY_RELEVANCE_TABLE: RelevanceTable = {
  version: 'empty',
  rows: [],
  criticalMappings: [],
  threatAliases: {},
};

export type RelevanceSource = 'critical' | 'table' | 'fallback';

/** Specific COA and threat ids for a critical-mapping lookup */
export interface RelevanceIds {
  coaId: string;
  threatId?: string;
}

export interface RelevanceResult {
  score: number;
  source: RelevanceSource;
  /** Threat type after alias normalization */
  threatType: string;
  matched: boolean;
  warnings: string[];
}

export interface RelevanceStats {
  totalMappings: number;
  criticalMappings: number;
  avgRelevance: number;
  minRelevance: number;
  maxRelevance: number;
  coaTypes: string[];
  threatTypes: string[];
}
