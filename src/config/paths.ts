import path from 'node:path';
import { fileURLToPath } from 'node:url';

// src/config (or dist/config) -> package root
const PACKAGE_ROOT = fileURLToPath(new URL('../../', import.meta.url));

export function resolveFromRoot(...segments: string[]): string {
  return path.join(PACKAGE_ROOT, ...segments);
}
