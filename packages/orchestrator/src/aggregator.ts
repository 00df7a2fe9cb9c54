import type {
  FinalJobState,
  JobEvent,
  JobFailure,
  JobState,
  RunSummary,
  RunWarning,
} from '@cloud-narrator/contracts';

import { isFinalState, isTransferState } from './job-model.js';

export interface AggregatorSnapshot {
  total: number;
  states: Partial<Record<JobState, number>>;
  converting: number;
  transferring: number;
  finished: number;
}

export type AggregatorListener = (event: JobEvent, snapshot: AggregatorSnapshot) => void;

/**
 * Sole owner of run status. Workers only publish events; this folds them into the
 * current state of every Job and, at the end, a RunSummary.
 */
export class StatusAggregator {
  private readonly states = new Map<string, JobState>();
  private readonly reasons = new Map<string, string>();
  private readonly warnings: RunWarning[] = [];
  private converting = 0;
  private transferring = 0;
  private peakConverting = 0;
  private peakTransferring = 0;

  constructor(
    relativeKeys: readonly string[],
    private readonly runId: string,
    private readonly startedAt: Date = new Date(),
  ) {
    for (const key of relativeKeys) this.states.set(key, 'discovered');
  }

  apply(event: JobEvent): void {
    if (event.type === 'warning') {
      this.warnings.push(
        event.relativeKey === undefined
          ? { message: event.message }
          : { relativeKey: event.relativeKey, message: event.message },
      );
      return;
    }

    const previous = this.states.get(event.relativeKey) ?? 'discovered';
    if (previous === 'converting') this.converting -= 1;
    if (isTransferState(previous)) this.transferring -= 1;

    this.states.set(event.relativeKey, event.state);
    if (event.state === 'converting') this.converting += 1;
    if (isTransferState(event.state)) this.transferring += 1;
    if (event.state === 'failed') {
      this.reasons.set(event.relativeKey, event.reason ?? 'unknown error');
    }

    this.peakConverting = Math.max(this.peakConverting, this.converting);
    this.peakTransferring = Math.max(this.peakTransferring, this.transferring);
  }

  async consume(events: AsyncIterable<JobEvent>, listener?: AggregatorListener): Promise<void> {
    for await (const event of events) {
      this.apply(event);
      listener?.(event, this.snapshot());
    }
  }

  stateOf(relativeKey: string): JobState | undefined {
    return this.states.get(relativeKey);
  }

  snapshot(): AggregatorSnapshot {
    const states: Partial<Record<JobState, number>> = {};
    let finished = 0;
    for (const state of this.states.values()) {
      states[state] = (states[state] ?? 0) + 1;
      if (isFinalState(state)) finished += 1;
    }
    return {
      total: this.states.size,
      states,
      converting: this.converting,
      transferring: this.transferring,
      finished,
    };
  }

  finalize(cancelled: boolean, finishedAt: Date = new Date()): RunSummary {
    const counts: Record<FinalJobState, number> = { skipped: 0, completed: 0, failed: 0, aborted: 0 };
    const failures: JobFailure[] = [];
    const aborted: string[] = [];

    for (const [relativeKey, state] of this.states) {
      let final: FinalJobState;
      if (isFinalState(state)) {
        final = state;
      } else {
        // only reachable if a worker died mid-job
        final = cancelled ? 'aborted' : 'failed';
        if (final === 'failed') this.reasons.set(relativeKey, `Job stopped while ${state}`);
      }
      counts[final] += 1;
      if (final === 'failed') {
        failures.push({ relativeKey, reason: this.reasons.get(relativeKey) ?? 'unknown error' });
      } else if (final === 'aborted') {
        aborted.push(relativeKey);
      }
    }

    return {
      runId: this.runId,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(finishedAt.getTime() - this.startedAt.getTime(), 0),
      total: this.states.size,
      counts,
      failures,
      aborted,
      warnings: [...this.warnings],
      peakConcurrency: {
        converting: this.peakConverting,
        transferring: this.peakTransferring,
      },
      cancelled,
    };
  }
}
