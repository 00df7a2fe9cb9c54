import { vi } from 'vitest';

import type { CommandResult, CommandRunner } from '@cloud-narrator/shared-infrastructure';

import type { HostConfig } from '../src/config.js';

export const hostConfig: HostConfig = {
  projectId: 'test-project',
  zone: 'us-central1-a',
  instanceName: 'narrator-vm',
  remoteUser: 'alice',
  remoteHome: '/home/alice',
};

export function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    code: 0,
    signal: null,
    stdout: '',
    stderr: '',
    timedOut: false,
    durationMs: 5,
    ...overrides,
  };
}

export function fakeRunner(...results: CommandResult[]) {
  const queue = [...results];
  return vi.fn<CommandRunner>(async () => queue.shift() ?? result());
}
