import { copyFile, mkdir, rename, rm } from 'node:fs/promises';
import { basename, dirname, join, posix } from 'node:path';

import type {
  CoverImage,
  FinalJobState,
  Job,
  JobEvent,
  JobState,
  MetadataProvider,
  RemoteEndpoint,
  RemoteExecutionClient,
  TransferClient,
} from '@cloud-narrator/contracts';
import {
  CancelledError,
  PipelineError,
  describeError,
  isRetryableError,
} from '@cloud-narrator/contracts';
import type { AudiobookMetadata } from '@cloud-narrator/audio-metadata';
import { audiobookTitle } from '@cloud-narrator/library-planner';
import { remoteStagingFor, stagedInputKey, type RemoteStaging } from '@cloud-narrator/remote-host';
import type { Logger } from '@cloud-narrator/shared-infrastructure';
import { withRetry } from '@cloud-narrator/shared-infrastructure';

import type { Gate } from './gates.js';
import { applyTransition, canTransition, isFinalState } from './job-model.js';
import type { PipelineLogger, PipelineMetrics } from './observability.js';

export type StageName = 'upload' | 'convert' | 'download' | 'postprocess';

export interface StageSettings {
  workDir: string;
  transferTimeoutMs: number;
  conversionTimeoutMs: number;
  /** Budget for short remote commands such as staging cleanup. */
  commandTimeoutMs: number;
  transferRetries: number;
  conversionRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs?: number;
}

export type EmbedMetadata = (filePath: string, metadata: AudiobookMetadata) => Promise<void>;

export interface StageContext {
  runId: string;
  endpoint: RemoteEndpoint;
  transfer: TransferClient;
  execution: RemoteExecutionClient;
  metadata: MetadataProvider | null;
  embedMetadata: EmbedMetadata;
  transferGate: Gate;
  conversionGate: Gate;
  settings: StageSettings;
  signal: AbortSignal;
  publish: (event: JobEvent) => void;
  logger: PipelineLogger;
  metrics: PipelineMetrics;
  log: Logger;
}

interface GatedStep<T> {
  stage: StageName;
  gate: Gate;
  retries: number;
  /** State to re-enter from `queued` before queueing on the gate again. */
  waiting?: JobState;
  active: JobState;
  done: JobState;
  work: () => Promise<T>;
}

/**
 * Drives one Job through upload, convert, download and postprocess. Permits are held
 * only while a stage's remote operation runs; retries re-enter `queued` with the permit
 * released. Cancellation is honoured before upload, conversion and download.
 */
export class StagePipeline {
  private readonly staging: RemoteStaging;
  private readonly localDir: string;
  private readonly log: Logger;
  private readonly stageStartTimes = new Map<StageName, number>();
  private touchedRemote = false;

  constructor(
    private readonly job: Job,
    private readonly ctx: StageContext,
  ) {
    this.staging = remoteStagingFor(ctx.endpoint.stagingRoot, job.relativeKey);
    this.localDir = join(ctx.settings.workDir, this.staging.slug);
    this.log = ctx.log.child({ jobKey: job.relativeKey, runId: ctx.runId });
  }

  async run(): Promise<FinalJobState> {
    try {
      this.checkpoint();
      const remoteInput = await this.upload();
      this.checkpoint();
      const artifact = await this.convert(remoteInput);
      this.checkpoint();
      const downloaded = await this.download(artifact);
      // past this point the Job finishes even if the run is cancelled
      await this.postProcess(downloaded);
      this.transition('completed');
    } catch (error: unknown) {
      this.settle(error);
    } finally {
      await this.cleanup();
    }

    if (!isFinalState(this.job.state)) {
      throw new Error(`Job ${this.job.relativeKey} ended in non-final state ${this.job.state}`);
    }
    return this.job.state;
  }

  private async upload(): Promise<string> {
    const remoteKey = stagedInputKey(this.staging, this.job.sourcePath);
    await this.gated({
      stage: 'upload',
      gate: this.ctx.transferGate,
      retries: this.ctx.settings.transferRetries,
      active: 'uploading',
      done: 'awaiting-conversion',
      work: () => {
        this.touchedRemote = true;
        return this.ctx.transfer.upload(this.job.sourcePath, remoteKey, {
          timeoutMs: this.ctx.settings.transferTimeoutMs,
        });
      },
    });
    return remoteKey;
  }

  private convert(remoteKey: string): Promise<string> {
    return this.gated({
      stage: 'convert',
      gate: this.ctx.conversionGate,
      retries: this.ctx.settings.conversionRetries,
      waiting: 'awaiting-conversion',
      active: 'converting',
      done: 'awaiting-download',
      work: () =>
        this.ctx.execution.convert(
          {
            remoteKey,
            languageCode: this.job.languageCode,
            outputKey: this.staging.outputDir,
          },
          { timeoutMs: this.ctx.settings.conversionTimeoutMs },
        ),
    });
  }

  private async download(artifactKey: string): Promise<string> {
    const localPath = join(this.localDir, posix.basename(artifactKey));
    await this.gated({
      stage: 'download',
      gate: this.ctx.transferGate,
      retries: this.ctx.settings.transferRetries,
      waiting: 'awaiting-download',
      active: 'downloading',
      done: 'post-processing',
      work: () =>
        this.ctx.transfer.download(artifactKey, localPath, {
          timeoutMs: this.ctx.settings.transferTimeoutMs,
        }),
    });
    return localPath;
  }

  private async postProcess(downloaded: string): Promise<void> {
    this.stageStart('postprocess');
    try {
      const title = audiobookTitle(this.job.name);
      const renamed = join(this.localDir, `${title}.m4b`);
      if (downloaded !== renamed) await rename(downloaded, renamed);
      await this.tag(renamed, title);
      await this.publishOutput(renamed);
      this.stageSuccess('postprocess', { outputPath: this.job.outputPath });
    } catch (error: unknown) {
      this.stageFailed('postprocess', error);
      throw error;
    }
  }

  private async tag(filePath: string, title: string): Promise<void> {
    let cover: CoverImage | undefined;
    if (this.ctx.metadata) {
      try {
        cover = await this.ctx.metadata.lookupCover({ title: this.job.name });
      } catch (error: unknown) {
        this.warn(`Cover lookup failed: ${describeError(error)}`);
      }
    }

    const metadata: AudiobookMetadata = cover ? { title, cover } : { title };
    try {
      await this.ctx.embedMetadata(filePath, metadata);
    } catch (error: unknown) {
      this.warn(`Metadata not embedded: ${describeError(error)}`);
    }
  }

  /** `outputPath` only ever appears complete: copy to a hidden sibling, then rename. */
  private async publishOutput(filePath: string): Promise<void> {
    const target = this.job.outputPath;
    const partial = join(dirname(target), `.${basename(target)}.partial`);
    let partialWritten = false;
    try {
      await mkdir(dirname(target), { recursive: true });
      partialWritten = true;
      await copyFile(filePath, partial);
      await rename(partial, target);
    } catch (error: unknown) {
      if (partialWritten) await rm(partial, { force: true });
      throw new PipelineError(`Could not write ${target}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private async gated<T>(step: GatedStep<T>): Promise<T> {
    this.stageStart(step.stage);
    try {
      const value = await withRetry(
        (attempt) => {
          if (step.waiting && this.job.state === 'queued') this.transition(step.waiting);
          return step.gate.withPermit(async () => {
            this.transition(step.active);
            try {
              const result = await step.work();
              this.transition(step.done);
              return result;
            } catch (error: unknown) {
              const reason = describeError(error);
              const retrying = attempt <= step.retries && isRetryableError(error);
              this.transition(retrying ? 'queued' : 'failed', reason);
              throw error;
            }
          }, this.ctx.signal);
        },
        {
          label: `${step.stage} ${this.job.relativeKey}`,
          retries: step.retries,
          initialDelayMs: this.ctx.settings.retryDelayMs,
          maxDelayMs: this.ctx.settings.maxRetryDelayMs,
          signal: this.ctx.signal,
          onRetry: ({ attempt, delayMs, error }) => {
            this.ctx.logger.log({
              level: 'warn',
              message: `stage.${step.stage}.retry`,
              runId: this.ctx.runId,
              stage: step.stage,
              detail: { jobKey: this.job.relativeKey, attempt, delayMs, error: describeError(error) },
            });
            this.ctx.metrics.increment('narrator.stage.retry', 1, { stage: step.stage });
          },
        },
      );
      this.stageSuccess(step.stage);
      return value;
    } catch (error: unknown) {
      this.stageFailed(step.stage, error);
      throw error;
    }
  }

  private checkpoint(): void {
    if (this.ctx.signal.aborted) {
      throw new CancelledError(`Cancelled before ${this.nextStageLabel()}`);
    }
  }

  private nextStageLabel(): string {
    switch (this.job.state) {
      case 'queued':
        return 'upload';
      case 'awaiting-conversion':
        return 'conversion';
      default:
        return 'download';
    }
  }

  private settle(error: unknown): void {
    const reason = describeError(error);
    if (this.job.state === 'failed') return;
    if (error instanceof CancelledError && canTransition(this.job.state, 'aborted')) {
      this.transition('aborted', reason);
      return;
    }
    this.log.debug('Job failed', {
      state: this.job.state,
      error: error instanceof Error ? error.stack : reason,
    });
    this.transition('failed', reason);
  }

  private async cleanup(): Promise<void> {
    if (this.touchedRemote) {
      try {
        await this.ctx.transfer.remove(this.staging.root, {
          timeoutMs: this.ctx.settings.commandTimeoutMs,
        });
      } catch (error: unknown) {
        this.warn(`Remote staging ${this.staging.root} not removed: ${describeError(error)}`);
      }
    }
    try {
      await rm(this.localDir, { recursive: true, force: true });
    } catch (error: unknown) {
      this.warn(`Work directory ${this.localDir} not removed: ${describeError(error)}`);
    }
  }

  private transition(next: JobState, reason?: string): void {
    this.ctx.publish(applyTransition(this.job, next, reason));
  }

  private warn(message: string): void {
    this.log.warn(message);
    this.ctx.publish({ type: 'warning', relativeKey: this.job.relativeKey, message, at: Date.now() });
  }

  private stageStart(stage: StageName): void {
    this.stageStartTimes.set(stage, Date.now());
    this.ctx.logger.log({
      level: 'info',
      message: `stage.${stage}.start`,
      runId: this.ctx.runId,
      stage,
      detail: { jobKey: this.job.relativeKey },
    });
  }

  private stageSuccess(stage: StageName, detail: Record<string, unknown> = {}): void {
    const durationMs = this.stageDuration(stage);
    this.ctx.logger.log({
      level: 'info',
      message: `stage.${stage}.success`,
      runId: this.ctx.runId,
      stage,
      detail: { jobKey: this.job.relativeKey, durationMs, ...detail },
    });
    this.ctx.metrics.timing('narrator.stage.duration_ms', durationMs, { stage, status: 'success' });
  }

  private stageFailed(stage: StageName, error: unknown): void {
    const durationMs = this.stageDuration(stage);
    const cancelled = error instanceof CancelledError;
    this.ctx.logger.log({
      level: cancelled ? 'warn' : 'error',
      message: `stage.${stage}.failed`,
      runId: this.ctx.runId,
      stage,
      detail: { jobKey: this.job.relativeKey, durationMs, cancelled, error: describeError(error) },
    });
    this.ctx.metrics.timing('narrator.stage.duration_ms', durationMs, {
      stage,
      status: cancelled ? 'cancelled' : 'failed',
    });
  }

  private stageDuration(stage: StageName): number {
    const startedAt = this.stageStartTimes.get(stage);
    this.stageStartTimes.delete(stage);
    return startedAt === undefined ? 0 : Math.max(Date.now() - startedAt, 0);
  }
}
