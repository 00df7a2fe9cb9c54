import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { RunSummary } from '@cloud-narrator/contracts';

const summary = (overrides: Partial<RunSummary> = {}): RunSummary => ({
  runId: 'run-cli',
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:00:01.000Z',
  durationMs: 1000,
  total: 2,
  counts: { skipped: 1, completed: 1, failed: 0, aborted: 0 },
  failures: [],
  aborted: [],
  warnings: [],
  peakConcurrency: { converting: 1, transferring: 1 },
  cancelled: false,
  ...overrides,
});

const pipelineMock = {
  configPaths: {
    configRoot: 'configs',
    languageMapPath: 'configs/language-map.json',
    vitsLanguagesPath: 'configs/vits-languages.json',
  },
  plan: vi.fn(),
  run: vi.fn(),
};

const createPipeline = vi.fn(() => pipelineMock);
const loadEnvFiles = vi.fn(() => ({
  values: {},
  loadedFiles: [],
  missingFiles: [],
  assignedKeys: [],
  overriddenKeys: [],
}));

vi.mock('../src/index.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../src/index.js')>()),
  createPipeline,
  loadEnvFiles,
}));

const importCli = async (): Promise<void> => {
  await import('../bin/cli.js');
};

const lastJson = (spy: { mock: { calls: unknown[][] } }): Record<string, unknown> => {
  const output = spy.mock.calls.at(-1)?.[0];
  if (typeof output !== 'string') throw new Error('expected JSON output');
  const parsed: unknown = JSON.parse(output);
  if (typeof parsed !== 'object' || parsed === null) throw new Error('expected an object');
  return { ...parsed };
};

describe('cli (commander parsing)', () => {
  const originalArgv = [...process.argv];

  beforeEach(() => {
    vi.resetModules();
    createPipeline.mockClear();
    loadEnvFiles.mockClear();
    pipelineMock.plan.mockReset();
    pipelineMock.run.mockReset();
    process.argv = [...originalArgv];
    process.exitCode = undefined;
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('parses run flags and forwards them to pipeline.run', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.argv = [
      'node',
      'narrator',
      '/library',
      '/audiobooks',
      '--monolingual',
      'eng',
      '--force-docker-image-rebuild',
      '--num-threads',
      '4',
      '--max-in-flight',
      '6',
      '--git-branch',
      'dev',
      '--work-dir',
      '/tmp/narrator-work',
      '--host-config',
      'gcp.json',
      '--config-dir',
      'my-configs',
      '--json',
    ];
    pipelineMock.run.mockResolvedValue(summary());

    await importCli();

    expect(loadEnvFiles).toHaveBeenCalledWith(
      expect.objectContaining({ assignToProcess: true, override: false }),
    );
    expect(createPipeline).toHaveBeenCalledWith(
      expect.objectContaining({ configDir: 'my-configs', hostConfigPath: 'gcp.json' }),
    );
    expect(pipelineMock.run).toHaveBeenCalledWith(
      {
        ebooksDir: '/library',
        audiobooksDir: '/audiobooks',
        monolingual: 'eng',
        excludeFile: undefined,
        forceRebuild: true,
        numThreads: 4,
        maxInFlight: 6,
        gitRepo: undefined,
        gitBranch: 'dev',
        workDir: '/tmp/narrator-work',
      },
      { signal: expect.any(AbortSignal), onEvent: expect.any(Function) },
    );
    expect(process.exitCode).toBe(0);

    const output = lastJson(logSpy);
    expect(output.result).toMatchObject({ command: 'run', summary: { runId: 'run-cli' } });
  });

  it('accepts an explicit run subcommand and prints the summary', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.argv = ['node', 'narrator', 'run', '/library', '/audiobooks'];
    pipelineMock.run.mockResolvedValue(summary());

    await importCli();

    expect(pipelineMock.run).toHaveBeenCalledWith(
      expect.objectContaining({ ebooksDir: '/library', audiobooksDir: '/audiobooks', forceRebuild: false }),
      expect.any(Object),
    );
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('Run finished in 1.0s'));
    expect(process.exitCode).toBe(0);
  });

  it('exits with 130 when the run was cancelled by an interrupt', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const listenersBefore = process.listenerCount('SIGINT');
    process.argv = ['node', 'narrator', '/library', '/audiobooks', '--json'];
    let signalAborted = false;
    pipelineMock.run.mockImplementation(async (_flags: unknown, hooks: { signal: AbortSignal }) => {
      process.emit('SIGINT', 'SIGINT');
      signalAborted = hooks.signal.aborted;
      return summary({ cancelled: true });
    });

    await importCli();

    expect(signalAborted).toBe(true);
    expect(process.exitCode).toBe(130);
    expect(process.listenerCount('SIGINT')).toBe(listenersBefore);
  });

  it('rejects a non-positive thread count', async () => {
    process.argv = ['node', 'narrator', '/library', '/audiobooks', '--num-threads', '0'];

    await importCli();

    expect(pipelineMock.run).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('rejects a malformed language code', async () => {
    process.argv = ['node', 'narrator', '/library', '/audiobooks', '--monolingual', 'English'];

    await importCli();

    expect(pipelineMock.run).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('requires both directories', async () => {
    process.argv = ['node', 'narrator', '/library'];

    await importCli();

    expect(createPipeline).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('reports a fatal error with exit code 1', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.argv = ['node', 'narrator', '/library', '/audiobooks', '--json'];
    const { ConfigurationError } = await import('@cloud-narrator/contracts');
    pipelineMock.run.mockRejectedValue(new ConfigurationError('No remote host configured.'));

    await importCli();

    expect(process.exitCode).toBe(1);
    expect(lastJson(logSpy).result).toEqual({
      command: 'run',
      error: { message: 'No remote host configured.', name: 'ConfigurationError', fatal: true },
    });
  });

  it('flags an unexpected error apart from configuration problems', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.argv = ['node', 'narrator', '/library', '/audiobooks', '--json'];
    pipelineMock.run.mockRejectedValue(new TypeError('boom'));

    await importCli();

    expect(process.exitCode).toBe(1);
    const output = lastJson(logSpy);
    expect(output.result).toEqual({
      command: 'run',
      error: { message: 'boom', name: 'TypeError', fatal: false },
    });
    expect(output.events).toEqual([
      expect.objectContaining({ level: 'info', message: 'Planning library' }),
      expect.objectContaining({
        level: 'error',
        message: 'Unexpected error: boom',
        details: { name: 'TypeError' },
      }),
    ]);
  });

  it('parses plan flags and lists the plan', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    process.argv = [
      'node',
      'narrator',
      'plan',
      '/library',
      '/audiobooks',
      '--exclude-file',
      'skip.txt',
      '--json',
    ];
    const queued = {
      sourcePath: '/library/A/a.epub',
      relativeKey: 'A',
      name: 'A',
      languageCode: 'eng',
      outputPath: '/audiobooks/A TTS/A TTS.m4b',
      state: 'queued',
    };
    pipelineMock.plan.mockResolvedValue({
      jobs: [queued],
      queued: [queued],
      skipped: [],
      warnings: [{ message: 'Unreadable directory skipped: /library/C' }],
    });

    await importCli();

    expect(pipelineMock.plan).toHaveBeenCalledWith({
      ebooksDir: '/library',
      audiobooksDir: '/audiobooks',
      monolingual: undefined,
      excludeFile: 'skip.txt',
    });
    expect(pipelineMock.run).not.toHaveBeenCalled();
    expect(lastJson(logSpy).result).toEqual({
      command: 'plan',
      queued: [{ relativeKey: 'A', languageCode: 'eng', outputPath: '/audiobooks/A TTS/A TTS.m4b' }],
      skipped: [],
      warnings: [{ message: 'Unreadable directory skipped: /library/C' }],
    });
    expect(process.exitCode).toBe(0);
  });
});
