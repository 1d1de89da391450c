/**
 * Environment configuration
 *
 * Values come from process.env (optionally seeded from .env) and are
 * validated once at import time.
 */

import 'dotenv/config';
import { z } from 'zod';
import { resolveFromRoot } from './paths.js';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional(),

  COA_RULES_PATH: z.string().min(1).optional(),
  COA_RELEVANCE_PATH: z.string().min(1).optional(),
  COA_ALIGNMENT_PATH: z.string().min(1).optional(),

  COA_PASS2_TOP_K: z.coerce.number().int().positive().default(3),
  COA_CIVILIAN_THRESHOLD: z.coerce.number().min(0).max(1).default(0.3),
  COA_METTC_BLEND_WEIGHT: z.coerce.number().min(0).max(1).default(0.3),
  COA_PARSE_CACHE_SIZE: z.coerce.number().int().positive().default(512),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
  throw new Error(`Invalid environment configuration: ${issues}`);
}

const raw = parsed.data;

export const env = {
  NODE_ENV: raw.NODE_ENV,
  LOG_LEVEL: raw.LOG_LEVEL ?? (raw.NODE_ENV === 'test' ? 'silent' : 'info'),

  RULES_PATH: raw.COA_RULES_PATH ?? resolveFromRoot('config', 'rules.default.json'),
  RELEVANCE_PATH: raw.COA_RELEVANCE_PATH ?? resolveFromRoot('data', 'relevance.table.json'),
  ALIGNMENT_PATH: raw.COA_ALIGNMENT_PATH ?? resolveFromRoot('data', 'mission-alignment.json'),

  PASS2_TOP_K: raw.COA_PASS2_TOP_K,
  CIVILIAN_THRESHOLD: raw.COA_CIVILIAN_THRESHOLD,
  METTC_BLEND_WEIGHT: raw.COA_METTC_BLEND_WEIGHT,
  PARSE_CACHE_SIZE: raw.COA_PARSE_CACHE_SIZE,
} as const;

export type Env = typeof env;
