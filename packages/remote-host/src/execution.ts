import { posix } from 'node:path';

import type {
  ConversionErrorKind,
  ConvertRequest,
  RemoteCallOptions,
  RemoteExecutionClient,
} from '@cloud-narrator/contracts';
import { ConversionError, describeError } from '@cloud-narrator/contracts';
import type { CommandResult, Logger } from '@cloud-narrator/shared-infrastructure';
import { describeCommandFailure, getLogger } from '@cloud-narrator/shared-infrastructure';

import { GcloudCli, succeeded } from './gcloud.js';
import { shellJoin, shellQuote } from './shell.js';
import { isRemoteSafePath, remoteSafeName } from './staging.js';

/** timeout(1), docker daemon, SIGKILL, ssh connection failure */
export const TRANSIENT_EXIT_CODES: ReadonlySet<number> = new Set([124, 125, 137, 255]);

/** Time `timeout` gives the docker client between SIGTERM and SIGKILL. */
const KILL_AFTER = '30s';
const CLEANUP_TIMEOUT_MS = 60_000;

const TRANSIENT_OUTPUT = [/CUDA out of memory/i, /resource busy/i, /resource temporarily unavailable/i];

export type TtsEngine = 'vits' | 'fairseq';

export interface GcloudExecutionClientOptions {
  image: string;
  remoteHome: string;
  /** Language codes served by a VITS model; every other code uses fairseq. */
  vitsLanguages: ReadonlySet<string>;
  /** Passed to the converter as `--num_workers`. */
  numWorkers: number;
  /** Added to the remote timeout before the local process is killed. */
  localGraceMs?: number;
  logger?: Logger;
}

/** One container name per staging directory, so a leftover run can be found and removed. */
export function converterContainerName(request: Pick<ConvertRequest, 'outputKey'>): string {
  const stagingDir = posix.basename(posix.dirname(request.outputKey));
  return `narrator-${remoteSafeName(stagingDir)}`;
}

export function selectTtsEngine(languageCode: string, vitsLanguages: ReadonlySet<string>): TtsEngine {
  return vitsLanguages.has(languageCode) ? 'vits' : 'fairseq';
}

export function classifyConversionFailure(result: CommandResult): ConversionErrorKind {
  if (result.timedOut) return 'transient';
  if (result.code !== null && TRANSIENT_EXIT_CODES.has(result.code)) return 'transient';
  // killed by a signal without our timeout firing
  if (result.code === null) return 'transient';
  const output = `${result.stderr}\n${result.stdout}`;
  if (TRANSIENT_OUTPUT.some((pattern) => pattern.test(output))) return 'transient';
  return 'unprocessable';
}

/** Runs the containerised converter over `gcloud compute ssh`. */
export class GcloudExecutionClient implements RemoteExecutionClient {
  private readonly localGraceMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly cli: GcloudCli,
    private readonly options: GcloudExecutionClientOptions,
  ) {
    this.localGraceMs = options.localGraceMs ?? 60_000;
    this.logger = options.logger ?? getLogger().child({ component: 'converter' });
  }

  buildDockerCommand(request: ConvertRequest): string[] {
    const inputDir = posix.dirname(request.remoteKey);
    const fileName = posix.basename(request.remoteKey);
    return [
      'docker',
      'run',
      '--rm',
      // the converter runs as PID 1 and would ignore the SIGTERM forwarded on timeout
      '--init',
      '--name',
      converterContainerName(request),
      '--gpus',
      'all',
      '-v',
      `${inputDir}:/app/input`,
      '-v',
      `${request.outputKey}:/app/output`,
      '-v',
      `${posix.join(this.options.remoteHome, 'models')}:/app/models`,
      this.options.image,
      '--headless',
      '--device',
      'gpu',
      '--ebook',
      `/app/input/${fileName}`,
      '--output_dir',
      '/app/output',
      '--language',
      request.languageCode,
      '--output_format',
      'm4b',
      '--tts_engine',
      selectTtsEngine(request.languageCode, this.options.vitsLanguages),
      '--num_workers',
      String(this.options.numWorkers),
    ];
  }

  buildRemoteCommand(request: ConvertRequest, timeoutMs: number): string {
    const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    const steps = [
      shellJoin(['rm', '-rf', request.outputKey]),
      shellJoin(['mkdir', '-p', request.outputKey]),
      `timeout -k ${KILL_AFTER} ${seconds}s ${shellJoin(this.buildDockerCommand(request))}`,
    ].join(' && ');
    // a container left over from an interrupted attempt must not share the GPU
    return `${removeContainerCommand(request)}; ${steps}`;
  }

  async convert(request: ConvertRequest, options: RemoteCallOptions): Promise<string> {
    const command = this.buildRemoteCommand(request, options.timeoutMs);
    const result = await this.call(() =>
      this.cli.ssh(command, { timeoutMs: options.timeoutMs + this.localGraceMs, label: 'convert' }),
    );
    if (!succeeded(result)) {
      const kind = classifyConversionFailure(result);
      if (kind === 'transient') await this.removeContainer(request);
      throw new ConversionError(describeCommandFailure('conversion', result), kind);
    }

    const listing = await this.call(() =>
      this.cli.ssh(
        `find ${shellQuote(request.outputKey)} -maxdepth 2 -type f -name '*.m4b' | sort | head -n 1`,
        { timeoutMs: 60_000, label: 'find-output' },
      ),
    );
    if (!succeeded(listing)) {
      throw new ConversionError(describeCommandFailure('listing converter output', listing), 'transient');
    }
    const artifact = listing.stdout.trim().split('\n')[0]?.trim();
    if (!artifact) {
      throw new ConversionError('Converter finished without producing an .m4b file', 'unprocessable');
    }
    return isRemoteSafePath(artifact) ? artifact : this.renameArtifact(artifact, request);
  }

  /** Move an output named after the book to a name scp can fetch unquoted. */
  private async renameArtifact(artifact: string, request: ConvertRequest): Promise<string> {
    const target = posix.join(request.outputKey, remoteSafeName(posix.basename(artifact)));
    const moved = await this.call(() =>
      this.cli.ssh(shellJoin(['mv', '-f', '--', artifact, target]), {
        timeoutMs: CLEANUP_TIMEOUT_MS,
        label: 'rename-output',
      }),
    );
    if (!succeeded(moved)) {
      throw new ConversionError(describeCommandFailure('renaming converter output', moved), 'transient');
    }
    return target;
  }

  private async removeContainer(request: ConvertRequest): Promise<void> {
    const name = converterContainerName(request);
    try {
      const removed = await this.cli.ssh(removeContainerCommand(request), {
        timeoutMs: CLEANUP_TIMEOUT_MS,
        label: 'remove-container',
      });
      if (!succeeded(removed)) {
        this.logger.warn('Converter container not removed', { container: name, code: removed.code });
      }
    } catch (error: unknown) {
      this.logger.warn('Converter container not removed', { container: name, error: describeError(error) });
    }
  }

  private async call(run: () => Promise<CommandResult>): Promise<CommandResult> {
    try {
      return await run();
    } catch (error: unknown) {
      throw new ConversionError(`Cannot run gcloud: ${describeError(error)}`, 'transient', {
        cause: error,
      });
    }
  }
}

function removeContainerCommand(request: Pick<ConvertRequest, 'outputKey'>): string {
  return `${shellJoin(['docker', 'rm', '-f', converterContainerName(request)])} >/dev/null 2>&1`;
}
