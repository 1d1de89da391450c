/**
 * JSON file loading with fallback
 *
 * A missing, unreadable or invalid file never throws: the caller gets the
 * fallback value and a ConfigurationError warning instead.
 */

import fs from 'node:fs';
import type { ZodType, ZodTypeDef } from 'zod';
import { ConfigurationError, describeError, toWarning } from './errors.js';

export interface LoadOutcome<T> {
  value: T;
  source: 'file' | 'fallback';
  warnings: string[];
}

export function loadJsonFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  fallback: T,
  label: string
): LoadOutcome<T> {
  const fail = (message: string): LoadOutcome<T> => ({
    value: fallback,
    source: 'fallback',
    warnings: [toWarning(new ConfigurationError(label, message))],
  });

  if (!fs.existsSync(filePath)) {
    return fail(`file not found (${filePath})`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    return fail(`unreadable JSON (${describeError(err)})`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    return fail(`schema mismatch (${issues})`);
  }

  return { value: parsed.data, source: 'file', warnings: [] };
}
