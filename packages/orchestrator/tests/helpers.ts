import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, posix } from 'node:path';
import { type Mock, vi } from 'vitest';

import type {
  ConvertRequest,
  EnvironmentProvider,
  JobEvent,
  JobState,
  RemoteEndpoint,
  RemoteExecutionClient,
  TransferClient,
} from '@cloud-narrator/contracts';
import { createLogger } from '@cloud-narrator/shared-infrastructure';

import type { RunDependencies } from '../src/run.js';

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const endpoint: RemoteEndpoint = {
  host: 'alice@narrator-vm',
  remoteHome: '/home/alice',
  stagingRoot: '/home/alice/narrator-staging',
  image: 'ebook-converter-custom:test',
};

export const silentLog = createLogger({ level: 'silent' });

export async function writeBooks(root: string, files: string[]): Promise<void> {
  for (const file of files) {
    const full = join(root, file);
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, `ebook:${file}`);
  }
}

type Failure = Error | undefined;

/** Counts concurrent calls so tests can assert the transfer bound. */
export class FakeTransfer implements TransferClient {
  active = 0;
  peak = 0;
  readonly uploads: string[] = [];
  readonly uploadKeys: string[] = [];
  readonly downloads: string[] = [];
  readonly removed: string[] = [];
  private readonly attempts = new Map<string, number>();
  private readonly downloadAttempts = new Map<string, number>();

  constructor(
    private readonly options: {
      latencyMs?: number;
      /** Decide the outcome of an upload attempt (1-based) for a local file. */
      uploadFailure?: (localPath: string, attempt: number) => Failure;
      /** Decide the outcome of a download attempt (1-based) for a remote artifact. */
      downloadFailure?: (remoteKey: string, attempt: number) => Failure;
      onUpload?: (localPath: string) => void;
    } = {},
  ) {}

  async upload(localPath: string, remoteKey: string): Promise<void> {
    this.uploads.push(localPath);
    this.uploadKeys.push(remoteKey);
    const attempt = (this.attempts.get(localPath) ?? 0) + 1;
    this.attempts.set(localPath, attempt);
    await this.track(async () => {
      this.options.onUpload?.(localPath);
      const failure = this.options.uploadFailure?.(localPath, attempt);
      if (failure) throw failure;
    });
  }

  async download(remoteKey: string, localPath: string): Promise<void> {
    this.downloads.push(remoteKey);
    const attempt = (this.downloadAttempts.get(remoteKey) ?? 0) + 1;
    this.downloadAttempts.set(remoteKey, attempt);
    await this.track(async () => {
      const failure = this.options.downloadFailure?.(remoteKey, attempt);
      if (failure) throw failure;
      await mkdir(dirname(localPath), { recursive: true });
      await writeFile(localPath, `audio:${posix.basename(remoteKey)}`);
    });
  }

  async remove(remoteKey: string): Promise<void> {
    this.removed.push(remoteKey);
  }

  private async track(work: () => Promise<void>): Promise<void> {
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    try {
      await sleep(this.options.latencyMs ?? 5);
      await work();
    } finally {
      this.active -= 1;
    }
  }
}

export class FakeExecution implements RemoteExecutionClient {
  active = 0;
  peak = 0;
  readonly calls: ConvertRequest[] = [];
  private readonly attempts = new Map<string, number>();

  constructor(
    private readonly options: {
      latencyMs?: number | ((request: ConvertRequest, attempt: number) => number);
      failure?: (request: ConvertRequest, attempt: number) => Failure;
      /** Runs once the conversion work is done, before the result is returned. */
      onConverted?: (request: ConvertRequest) => void;
    } = {},
  ) {}

  async convert(request: ConvertRequest): Promise<string> {
    this.calls.push(request);
    const attempt = (this.attempts.get(request.remoteKey) ?? 0) + 1;
    this.attempts.set(request.remoteKey, attempt);
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    try {
      const { latencyMs = 5 } = this.options;
      await sleep(typeof latencyMs === 'number' ? latencyMs : latencyMs(request, attempt));
      const failure = this.options.failure?.(request, attempt);
      if (failure) throw failure;
      this.options.onConverted?.(request);
      return posix.join(request.outputKey, 'run-1', 'book.m4b');
    } finally {
      this.active -= 1;
    }
  }

  /** Ebook file names in call order. */
  get order(): string[] {
    return this.calls.map((call) => posix.basename(call.remoteKey));
  }
}

export function fakeEnvironment(): { ensureReady: Mock<EnvironmentProvider['ensureReady']> } {
  return { ensureReady: vi.fn<EnvironmentProvider['ensureReady']>(async () => endpoint) };
}

export function fakeDependencies(overrides: Partial<RunDependencies> = {}): RunDependencies {
  return {
    environment: fakeEnvironment(),
    transfer: new FakeTransfer(),
    execution: new FakeExecution(),
    metadata: null,
    embedMetadata: vi.fn(async () => undefined),
    log: silentLog,
    ...overrides,
  };
}

/**
 * Replays events the way the aggregator sees them and records the largest number of
 * Jobs seen at once in each group of states.
 */
export function stateTracker() {
  const states = new Map<string, JobState>();
  const peaks = { converting: 0, transferring: 0 };
  const history = new Map<string, JobState[]>();
  const onEvent = (event: JobEvent) => {
    if (event.type !== 'state') return;
    states.set(event.relativeKey, event.state);
    history.set(event.relativeKey, [...(history.get(event.relativeKey) ?? []), event.state]);
    const current = [...states.values()];
    peaks.converting = Math.max(peaks.converting, current.filter((s) => s === 'converting').length);
    peaks.transferring = Math.max(
      peaks.transferring,
      current.filter((s) => s === 'uploading' || s === 'downloading').length,
    );
  };
  return { onEvent, peaks, history };
}
