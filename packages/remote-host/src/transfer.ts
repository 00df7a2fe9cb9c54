import { mkdir, stat } from 'node:fs/promises';
import { dirname, posix } from 'node:path';

import type { RemoteCallOptions, TransferClient } from '@cloud-narrator/contracts';
import { TransferError, describeError } from '@cloud-narrator/contracts';
import { describeCommandFailure } from '@cloud-narrator/shared-infrastructure';

import { GcloudCli, succeeded } from './gcloud.js';
import { shellJoin } from './shell.js';
import { isRemoteSafePath } from './staging.js';

/**
 * The remote side of `scp` goes through the remote user's shell unquoted, so only
 * plain staging paths are accepted.
 */
function assertScpSafe(remoteKey: string): void {
  if (!isRemoteSafePath(remoteKey)) {
    throw new TransferError(`Remote path ${remoteKey} is not safe to pass to scp`, {
      retryable: false,
    });
  }
}

/** Upload/download over `gcloud compute scp`. Every call carries its own timeout. */
export class GcloudTransferClient implements TransferClient {
  constructor(private readonly cli: GcloudCli) {}

  async upload(localPath: string, remoteKey: string, options: RemoteCallOptions): Promise<void> {
    assertScpSafe(remoteKey);
    try {
      const info = await stat(localPath);
      if (!info.isFile()) {
        throw new TransferError(`${localPath} is not a file`, { retryable: false });
      }
    } catch (error: unknown) {
      if (error instanceof TransferError) throw error;
      throw new TransferError(`Local file ${localPath} is not readable`, {
        cause: error,
        retryable: false,
      });
    }

    const remoteDir = posix.dirname(remoteKey);
    const mkdirResult = await this.invoke('mkdir', () =>
      this.cli.ssh(shellJoin(['mkdir', '-p', remoteDir]), { ...options, label: 'mkdir' }),
    );
    if (!succeeded(mkdirResult)) {
      throw new TransferError(describeCommandFailure(`mkdir ${remoteDir}`, mkdirResult));
    }

    const result = await this.invoke('upload', () =>
      this.cli.scp([localPath], this.cli.remote(remoteKey), { ...options, label: 'upload' }),
    );
    if (!succeeded(result)) {
      throw new TransferError(describeCommandFailure(`upload of ${localPath}`, result));
    }
  }

  async download(remoteKey: string, localPath: string, options: RemoteCallOptions): Promise<void> {
    assertScpSafe(remoteKey);
    await mkdir(dirname(localPath), { recursive: true });
    const result = await this.invoke('download', () =>
      this.cli.scp([this.cli.remote(remoteKey)], localPath, { ...options, label: 'download' }),
    );
    if (!succeeded(result)) {
      throw new TransferError(describeCommandFailure(`download of ${remoteKey}`, result));
    }
  }

  async remove(remoteKey: string, options: RemoteCallOptions): Promise<void> {
    const result = await this.invoke('remove', () =>
      this.cli.ssh(shellJoin(['rm', '-rf', remoteKey]), { ...options, label: 'cleanup' }),
    );
    if (!succeeded(result)) {
      throw new TransferError(describeCommandFailure(`removal of ${remoteKey}`, result));
    }
  }

  private async invoke<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error: unknown) {
      // the runner only rejects when gcloud cannot be started at all
      throw new TransferError(`Cannot run gcloud for ${operation}: ${describeError(error)}`, {
        cause: error,
        retryable: false,
      });
    }
  }
}
