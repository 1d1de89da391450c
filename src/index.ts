/**
 * COA Decision Engine
 * ===================
 *
 * Usage:
 *   const store = new ScoringSnapshotStore();
 *   const pipeline = new DecisionPipeline(store);
 *   const result = pipeline.runRecord(record);
 */

export * from './contracts/coa.contract.js';
export * from './contracts/score.contract.js';
export * from './contracts/decision.input.contract.js';

export * from './common/errors.js';
export { componentLogger, rootLogger, type Logger } from './common/logger.js';
export { env, type Env } from './config/env.js';

export * from './modules/relevance/index.js';
export * from './modules/resources/index.js';
export * from './modules/rules/index.js';
export * from './modules/mett-c/index.js';
export * from './modules/scoring/index.js';
export * from './modules/pipeline/index.js';
