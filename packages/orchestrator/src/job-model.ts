import type { FinalJobState, Job, JobEvent, JobState } from '@cloud-narrator/contracts';
import { FINAL_JOB_STATES } from '@cloud-narrator/contracts';

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  discovered: ['skipped', 'queued'],
  skipped: [],
  // `queued` is also the re-entry point of a bounded retry
  queued: ['uploading', 'awaiting-conversion', 'awaiting-download', 'failed', 'aborted'],
  uploading: ['awaiting-conversion', 'queued', 'failed'],
  'awaiting-conversion': ['converting', 'failed', 'aborted'],
  converting: ['awaiting-download', 'queued', 'failed'],
  'awaiting-download': ['downloading', 'failed', 'aborted'],
  downloading: ['post-processing', 'queued', 'failed'],
  'post-processing': ['completed', 'failed'],
  completed: [],
  failed: [],
  aborted: [],
};

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: JobState, to: JobState): void {
  if (!canTransition(from, to)) {
    throw new Error(`Invalid job state transition: ${from} -> ${to}`);
  }
}

/** Move `job` to `next` and describe the change as an event for the aggregator. */
export function applyTransition(job: Job, next: JobState, reason?: string): JobEvent {
  assertTransition(job.state, next);
  job.state = next;
  if (next === 'failed') job.failureReason = reason ?? 'unknown error';
  return reason === undefined
    ? { type: 'state', relativeKey: job.relativeKey, state: next, at: Date.now() }
    : { type: 'state', relativeKey: job.relativeKey, state: next, reason, at: Date.now() };
}

export function isFinalState(state: JobState): state is FinalJobState {
  return FINAL_JOB_STATES.some((final) => final === state);
}

export function isTransferState(state: JobState): boolean {
  return state === 'uploading' || state === 'downloading';
}
