import { randomUUID } from 'node:crypto';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import type {
  EnvironmentProvider,
  FinalJobState,
  Job,
  JobEvent,
  LibraryMode,
  MetadataProvider,
  RemoteExecutionClient,
  RunSummary,
  TransferClient,
} from '@cloud-narrator/contracts';
import { FINAL_JOB_STATES } from '@cloud-narrator/contracts';
import { embedAudiobookMetadata } from '@cloud-narrator/audio-metadata';
import { planRun, type ExclusionSet, type LanguageMap } from '@cloud-narrator/library-planner';
import { DEFAULT_GIT_BRANCH, DEFAULT_GIT_REPO } from '@cloud-narrator/remote-host';
import type { Logger } from '@cloud-narrator/shared-infrastructure';
import { getLogger } from '@cloud-narrator/shared-infrastructure';

import { StatusAggregator, type AggregatorListener } from './aggregator.js';
import { AsyncQueue } from './events.js';
import { applyTransition } from './job-model.js';
import {
  type PipelineLogger,
  type PipelineMetrics,
  noopLogger,
  noopMetrics,
} from './observability.js';
import { StagePipeline, type EmbedMetadata, type StageSettings } from './stages.js';
import { DEFAULT_TRANSFER_CONCURRENCY, WorkerPool } from './worker-pool.js';

export const DEFAULT_STAGE_SETTINGS: Omit<StageSettings, 'workDir'> = {
  transferTimeoutMs: 30 * 60_000,
  conversionTimeoutMs: 60 * 60_000,
  commandTimeoutMs: 60_000,
  transferRetries: 2,
  conversionRetries: 2,
  retryDelayMs: 15_000,
  maxRetryDelayMs: 5 * 60_000,
};

export function defaultWorkDir(): string {
  return join(tmpdir(), 'narrator-work');
}

export interface RunOptions {
  libraryRoot: string;
  audiobooksRoot: string;
  mode: LibraryMode;
  languages?: LanguageMap;
  exclusions?: ExclusionSet;
  repo?: string;
  branch?: string;
  forceRebuild?: boolean;
  transferConcurrency?: number;
  maxInFlight?: number;
  workDir?: string;
  settings?: Partial<Omit<StageSettings, 'workDir'>>;
  runId?: string;
  signal?: AbortSignal;
  onEvent?: AggregatorListener;
}

export interface RunDependencies {
  environment: EnvironmentProvider;
  transfer: TransferClient;
  execution: RemoteExecutionClient;
  metadata?: MetadataProvider | null;
  embedMetadata?: EmbedMetadata;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
  log?: Logger;
}

/**
 * One full run: plan the library, prepare the host if anything is left to do, push the
 * queued Jobs through the pool and fold every event into a RunSummary. Only
 * configuration, planning and environment failures reject; per-Job failures end up in
 * the summary.
 */
export async function runConversion(
  options: RunOptions,
  dependencies: RunDependencies,
): Promise<RunSummary> {
  const runId = options.runId ?? randomUUID();
  const startedAt = new Date();
  const signal = options.signal ?? new AbortController().signal;
  const logger = dependencies.logger ?? noopLogger;
  const metrics = dependencies.metrics ?? noopMetrics;
  const log = (dependencies.log ?? getLogger()).child({ runId });

  logger.log({
    level: 'info',
    message: 'run.start',
    runId,
    stage: 'run',
    detail: { libraryRoot: options.libraryRoot, audiobooksRoot: options.audiobooksRoot },
  });

  const plan = await planRun({
    libraryRoot: options.libraryRoot,
    audiobooksRoot: options.audiobooksRoot,
    mode: options.mode,
    languages: options.languages,
    exclusions: options.exclusions,
  });
  log.info('Library planned', {
    total: plan.jobs.length,
    queued: plan.queued.length,
    skipped: plan.skipped.length,
  });

  const aggregator = new StatusAggregator(
    plan.jobs.map((job) => job.relativeKey),
    runId,
    startedAt,
  );
  const events = new AsyncQueue<JobEvent>();
  const consuming = aggregator.consume(events, options.onEvent);
  const publish = (event: JobEvent) => events.push(event);

  for (const warning of plan.warnings) {
    publish({ type: 'warning', ...warning, at: Date.now() });
  }
  for (const job of plan.jobs) {
    publish({ type: 'state', relativeKey: job.relativeKey, state: job.state, at: Date.now() });
  }

  const transferConcurrency = options.transferConcurrency ?? DEFAULT_TRANSFER_CONCURRENCY;
  const pool = new WorkerPool({ transferConcurrency, maxInFlight: options.maxInFlight });
  const abortJob = (job: Job) =>
    publish(applyTransition(job, 'aborted', 'Run cancelled before the job started'));

  try {
    if (plan.queued.length > 0 && signal.aborted) {
      plan.queued.forEach(abortJob);
    } else if (plan.queued.length > 0) {
      const endpoint = await dependencies.environment.ensureReady({
        repo: options.repo ?? DEFAULT_GIT_REPO,
        branch: options.branch ?? DEFAULT_GIT_BRANCH,
        forceRebuild: options.forceRebuild ?? false,
      });
      logger.log({
        level: 'info',
        message: 'run.environment.ready',
        runId,
        stage: 'environment',
        detail: { host: endpoint.host, image: endpoint.image },
      });

      const settings: StageSettings = {
        ...DEFAULT_STAGE_SETTINGS,
        ...options.settings,
        workDir: resolve(options.workDir ?? defaultWorkDir()),
      };
      const embedMetadata: EmbedMetadata =
        dependencies.embedMetadata ?? ((filePath, metadata) => embedAudiobookMetadata(filePath, metadata));

      await pool.drain(
        plan.queued,
        {
          process: (job) =>
            new StagePipeline(job, {
              runId,
              endpoint,
              transfer: dependencies.transfer,
              execution: dependencies.execution,
              metadata: dependencies.metadata ?? null,
              embedMetadata,
              transferGate: pool.transferGate,
              conversionGate: pool.conversionGate,
              settings,
              signal,
              publish,
              logger,
              metrics,
              log,
            }).run(),
          reject: abortJob,
        },
        signal,
      );
    }
  } finally {
    events.close();
    await consuming;
  }

  const summary = aggregator.finalize(signal.aborted);
  recordJobMetrics(metrics, summary.counts);
  logger.log({
    level: summary.cancelled ? 'warn' : 'info',
    message: summary.cancelled ? 'run.cancelled' : 'run.complete',
    runId,
    stage: 'run',
    detail: { counts: summary.counts, durationMs: summary.durationMs },
  });
  return summary;
}

function recordJobMetrics(metrics: PipelineMetrics, counts: Record<FinalJobState, number>): void {
  for (const state of FINAL_JOB_STATES) {
    if (counts[state] > 0) metrics.increment(`narrator.job.${state}`, counts[state]);
  }
}
