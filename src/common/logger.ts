/**
 * Logger
 * ======
 *
 * Components take a Logger through their options so tests and hosts can
 * inject their own. The default is a pino root logger.
 */

import { pino } from 'pino';
import { env } from '../config/env.js';

export interface Logger {
  info: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
  error: (obj: Record<string, unknown>, msg: string) => void;
  debug: (obj: Record<string, unknown>, msg: string) => void;
}

export const rootLogger = pino({
  name: 'coa-engine',
  level: env.LOG_LEVEL,
});

export function componentLogger(component: string): Logger {
  return rootLogger.child({ component });
}
