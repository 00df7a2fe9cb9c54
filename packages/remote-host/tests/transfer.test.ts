import { mkdtempSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { TransferError } from '@cloud-narrator/contracts';

import { GcloudCli } from '../src/gcloud.js';
import { GcloudTransferClient } from '../src/transfer.js';
import { fakeRunner, hostConfig, result } from './helpers.js';

const scope = ['--zone', 'us-central1-a', '--project', 'test-project'];

describe('GcloudTransferClient', () => {
  let tmp: string;
  let ebook: string;

  beforeEach(() => {
    tmp = mkdtempSync(join(tmpdir(), 'narrator-transfer-'));
    ebook = join(tmp, 'book.epub');
    writeFileSync(ebook, 'ebook');
  });

  afterEach(() => {
    rmSync(tmp, { recursive: true, force: true });
  });

  it('creates the remote directory and copies the file', async () => {
    const runner = fakeRunner();
    const client = new GcloudTransferClient(
      new GcloudCli({ config: hostConfig, runner, gcloudPath: 'gcloud' }),
    );

    await client.upload(ebook, '/home/alice/narrator-staging/Book-0a1b2c3d/input/book.epub', {
      timeoutMs: 1_000,
    });

    expect(runner).toHaveBeenCalledTimes(2);
    expect(runner.mock.calls[0]?.[1]).toEqual([
      'compute',
      'ssh',
      'alice@narrator-vm',
      ...scope,
      '--',
      'mkdir -p /home/alice/narrator-staging/Book-0a1b2c3d/input',
    ]);
    expect(runner.mock.calls[1]?.[1]).toEqual([
      'compute',
      'scp',
      ...scope,
      '--recurse',
      ebook,
      'alice@narrator-vm:/home/alice/narrator-staging/Book-0a1b2c3d/input/book.epub',
    ]);
    expect(runner.mock.calls[1]?.[2]).toMatchObject({ timeoutMs: 1_000 });
  });

  it('does not retry a missing local file', async () => {
    const runner = fakeRunner();
    const client = new GcloudTransferClient(new GcloudCli({ config: hostConfig, runner }));

    const error = await client
      .upload(join(tmp, 'missing.epub'), '/home/alice/x/input/missing.epub', { timeoutMs: 1_000 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransferError);
    expect(error).toMatchObject({ retryable: false });
    expect(runner).not.toHaveBeenCalled();
  });

  it('reports a failed copy as a retryable TransferError', async () => {
    const runner = fakeRunner(result(), result({ code: 1, stderr: 'Connection reset by peer' }));
    const client = new GcloudTransferClient(new GcloudCli({ config: hostConfig, runner }));

    const error = await client
      .upload(ebook, '/home/alice/x/input/book.epub', { timeoutMs: 1_000 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransferError);
    expect(error).toMatchObject({ retryable: true });
    expect(String(error)).toContain('Connection reset by peer');
  });

  it('treats a timed out copy as retryable', async () => {
    const runner = fakeRunner(result({ code: null, signal: 'SIGTERM', timedOut: true }));
    const client = new GcloudTransferClient(new GcloudCli({ config: hostConfig, runner }));

    const error = await client
      .download('/home/alice/x/output/book.m4b', join(tmp, 'out', 'book.m4b'), { timeoutMs: 10 })
      .catch((err: unknown) => err);

    expect(error).toMatchObject({ retryable: true });
    expect(String(error)).toContain('timed out');
  });

  it('reports a missing gcloud binary as non-retryable', async () => {
    const runner = fakeRunner();
    runner.mockRejectedValueOnce(Object.assign(new Error('spawn gcloud ENOENT'), { code: 'ENOENT' }));
    const client = new GcloudTransferClient(new GcloudCli({ config: hostConfig, runner }));

    await expect(client.remove('/home/alice/x', { timeoutMs: 1_000 })).rejects.toMatchObject({
      retryable: false,
    });
  });

  it('downloads into a freshly created local directory', async () => {
    const runner = fakeRunner();
    const client = new GcloudTransferClient(new GcloudCli({ config: hostConfig, runner }));
    const local = join(tmp, 'work', 'Book', 'book.m4b');

    await client.download('/home/alice/x/output/book.m4b', local, { timeoutMs: 1_000 });

    expect(statSync(join(tmp, 'work', 'Book')).isDirectory()).toBe(true);
    expect(runner.mock.calls[0]?.[1]).toEqual([
      'compute',
      'scp',
      ...scope,
      '--recurse',
      'alice@narrator-vm:/home/alice/x/output/book.m4b',
      local,
    ]);
  });

  it('quotes remote paths with spaces', async () => {
    const runner = fakeRunner();
    const client = new GcloudTransferClient(new GcloudCli({ config: hostConfig, runner }));

    await client.remove("/home/alice/narrator-staging/Tom's Book", { timeoutMs: 1_000 });

    expect(runner.mock.calls[0]?.[1]).toEqual([
      'compute',
      'ssh',
      'alice@narrator-vm',
      ...scope,
      '--',
      `rm -rf '/home/alice/narrator-staging/Tom'\\''s Book'`,
    ]);
  });

  it('uploads a spaced file name under its staged key', async () => {
    const spaced = join(tmp, "Tom's Book.epub");
    writeFileSync(spaced, 'ebook');
    const runner = fakeRunner();
    const client = new GcloudTransferClient(new GcloudCli({ config: hostConfig, runner }));

    await client.upload(spaced, '/home/alice/narrator-staging/Tom_s_Book-0a1b2c3d/input/Tom_s_Book-0a1b2c3d.epub', {
      timeoutMs: 1_000,
    });

    expect(runner.mock.calls[1]?.[1]).toEqual([
      'compute',
      'scp',
      ...scope,
      '--recurse',
      spaced,
      'alice@narrator-vm:/home/alice/narrator-staging/Tom_s_Book-0a1b2c3d/input/Tom_s_Book-0a1b2c3d.epub',
    ]);
  });

  it('refuses remote paths the remote shell would split', async () => {
    const runner = fakeRunner();
    const client = new GcloudTransferClient(new GcloudCli({ config: hostConfig, runner }));

    await expect(
      client.upload(ebook, '/home/alice/narrator-staging/x/input/My Book.epub', { timeoutMs: 1_000 }),
    ).rejects.toMatchObject({ name: 'TransferError', retryable: false });
    await expect(
      client.download("/home/alice/narrator-staging/x/output/Tom's Book.m4b", join(tmp, 'out.m4b'), {
        timeoutMs: 1_000,
      }),
    ).rejects.toMatchObject({ name: 'TransferError', retryable: false });
    expect(runner).not.toHaveBeenCalled();
  });
});
