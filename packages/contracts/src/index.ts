export type JobState =
  | 'discovered'
  | 'skipped'
  | 'queued'
  | 'uploading'
  | 'awaiting-conversion'
  | 'converting'
  | 'awaiting-download'
  | 'downloading'
  | 'post-processing'
  | 'completed'
  | 'failed'
  | 'aborted';

export type FinalJobState = Extract<JobState, 'skipped' | 'completed' | 'failed' | 'aborted'>;

export const FINAL_JOB_STATES: readonly FinalJobState[] = ['skipped', 'completed', 'failed', 'aborted'];

export type LibraryMode =
  | { kind: 'multilingual' }
  | { kind: 'monolingual'; languageCode: string };

export interface Job {
  /** Absolute path of the chosen ebook file. */
  sourcePath: string;
  /** Book directory relative to the library root, always `/`-separated. */
  relativeKey: string;
  /** Base name of the book directory. */
  name: string;
  languageCode: string;
  outputPath: string;
  state: JobState;
  failureReason?: string;
}

export interface JobFailure {
  relativeKey: string;
  reason: string;
}

export interface RunWarning {
  relativeKey?: string;
  message: string;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  total: number;
  counts: Record<FinalJobState, number>;
  failures: JobFailure[];
  aborted: string[];
  warnings: RunWarning[];
  peakConcurrency: {
    converting: number;
    transferring: number;
  };
  cancelled: boolean;
}

export type JobEvent =
  | {
      type: 'state';
      relativeKey: string;
      state: JobState;
      reason?: string;
      at: number;
    }
  | {
      type: 'warning';
      relativeKey?: string;
      message: string;
      at: number;
    };

export * from './collaborators.js';
export * from './errors.js';
