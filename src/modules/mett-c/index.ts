export * from './mettc.types.js';
export {
  MettCEvaluator,
  civilianScore,
  enemyScore,
  missionScore,
  terrainScore,
  timeScore,
  type MettCEvaluatorOptions,
} from './mettc.evaluator.js';
