export {
  DecisionPipeline,
  PipelineRun,
  PipelineStateError,
  type DecisionPipelineOptions,
} from './decision.pipeline.js';
export {
  ScoringSnapshotStore,
  createSnapshot,
  loadSnapshot,
  type ScoringSnapshot,
  type SnapshotOptions,
  type SnapshotProvider,
  type SnapshotSources,
  type SnapshotStoreOptions,
  type SnapshotTables,
} from './scoring.snapshot.js';
