import type { Job } from '@cloud-narrator/contracts';

import { Gate } from './gates.js';

export const DEFAULT_TRANSFER_CONCURRENCY = 10;

export interface WorkerPoolOptions {
  /** Capacity of the transfer gate (T). */
  transferConcurrency?: number;
  /** Jobs held by workers at once; defaults to T + 1. */
  maxInFlight?: number;
}

export interface WorkerHandlers {
  process: (job: Job) => Promise<unknown>;
  /** Called for every Job that is not admitted because the run was cancelled. */
  reject: (job: Job) => void;
}

/**
 * A fixed set of workers pulling Jobs in planning order. The pool owns both gates so
 * that every Job of a run competes for the same transfer slots and conversion mutex.
 */
export class WorkerPool {
  readonly transferGate: Gate;
  readonly conversionGate: Gate;
  readonly maxInFlight: number;

  constructor(options: WorkerPoolOptions = {}) {
    const transferConcurrency = options.transferConcurrency ?? DEFAULT_TRANSFER_CONCURRENCY;
    this.transferGate = new Gate('transfer slot', transferConcurrency);
    this.conversionGate = new Gate('conversion mutex', 1);
    this.maxInFlight = options.maxInFlight ?? transferConcurrency + 1;
    if (!Number.isInteger(this.maxInFlight) || this.maxInFlight < 1) {
      throw new RangeError(`maxInFlight must be a positive integer, got ${this.maxInFlight}`);
    }
  }

  async drain(jobs: readonly Job[], handlers: WorkerHandlers, signal: AbortSignal): Promise<void> {
    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (cursor < jobs.length) {
        const job = jobs[cursor];
        cursor += 1;
        if (!job) continue;
        if (signal.aborted) {
          handlers.reject(job);
          continue;
        }
        await handlers.process(job);
      }
    };

    const count = Math.min(this.maxInFlight, jobs.length);
    const results = await Promise.allSettled(Array.from({ length: count }, () => worker()));
    for (const result of results) {
      if (result.status === 'rejected') throw result.reason;
    }
  }
}
