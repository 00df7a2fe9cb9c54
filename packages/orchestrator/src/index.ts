export { Gate, type Permit } from './gates.js';
export { AsyncQueue } from './events.js';
export {
  applyTransition,
  assertTransition,
  canTransition,
  isFinalState,
  isTransferState,
} from './job-model.js';
export {
  StatusAggregator,
  type AggregatorListener,
  type AggregatorSnapshot,
} from './aggregator.js';
export {
  StagePipeline,
  type EmbedMetadata,
  type StageContext,
  type StageName,
  type StageSettings,
} from './stages.js';
export {
  DEFAULT_TRANSFER_CONCURRENCY,
  WorkerPool,
  type WorkerHandlers,
  type WorkerPoolOptions,
} from './worker-pool.js';
export {
  DEFAULT_STAGE_SETTINGS,
  defaultWorkDir,
  runConversion,
  type RunDependencies,
  type RunOptions,
} from './run.js';
export {
  createPipeline,
  loadEnvFiles,
  resolveConfigPaths,
  type CreatePipelineOptions,
  type LoadEnvOptions,
  type LoadEnvSummary,
  type NarratorPipeline,
  type PlanFlags,
  type ResolveConfigPathsOptions,
  type ResolvedConfigPaths,
  type RunFlags,
  type RunHooks,
} from './pipeline.js';
export {
  createMetricsRecorder,
  metricKey,
  noopLogger,
  noopMetrics,
  type MetricsSnapshot,
} from './observability.js';
export type {
  PipelineLogEvent,
  PipelineLogger,
  PipelineLogLevel,
  PipelineMetrics,
} from './observability.js';
export { formatDuration, formatPlan, formatRunSummary } from './summary.js';
