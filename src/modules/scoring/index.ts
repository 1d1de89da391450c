export * from './scoring.types.js';
export {
  CoaScorer,
  blendTotal,
  combatPower,
  constraintFit,
  environmentFit,
  mobility,
  type CoaScorerDeps,
  type CoaScorerOptions,
} from './coa.scorer.js';
export { confidence, explain, spreadScore } from './coa.explain.js';
export { byTotalThenId, compareAlternatives } from './coa.comparison.js';
export {
  ALIGNMENT_FALLBACK,
  AlignmentFileSchema,
  EMPTY_ALIGNMENT_FILE,
  MissionAlignmentTable,
  loadAlignmentTable,
  type AlignmentFile,
  type AlignmentResult,
} from './mission-alignment.js';
