import { access } from 'node:fs/promises';
import { dirname, join, posix } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { EnsureReadyOptions, EnvironmentProvider, RemoteEndpoint } from '@cloud-narrator/contracts';
import { EnvironmentError, describeError } from '@cloud-narrator/contracts';
import type { CommandResult, Logger } from '@cloud-narrator/shared-infrastructure';
import { describeCommandFailure, getLogger } from '@cloud-narrator/shared-infrastructure';

import { GcloudCli, succeeded } from './gcloud.js';
import { shellJoin } from './shell.js';
import { stagingRootFor } from './staging.js';

export const DEFAULT_GIT_REPO = 'https://github.com/ryantimjohn/ebook2audiobook.git';
export const DEFAULT_GIT_BRANCH = 'main';

const SETUP_SCRIPT_NAME = 'setup_remote.sh';

export const DEFAULT_SETUP_SCRIPT = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  'scripts',
  SETUP_SCRIPT_NAME,
);

/** `https://github.com/owner/repo.git` -> `owner-repo` */
export function repoNameFor(repo: string): string {
  return repo.replace('https://github.com/', '').replace(/\.git$/, '').replaceAll('/', '-');
}

export function imageTagFor(repo: string, branch: string): string {
  return `ebook-converter-custom:${repoNameFor(repo)}-${branch}`;
}

export interface GcloudEnvironmentProviderOptions {
  setupScriptPath?: string;
  setupTimeoutMs?: number;
  commandTimeoutMs?: number;
  logger?: Logger;
}

/** Uploads and runs the setup script that clones the converter and builds its image. */
export class GcloudEnvironmentProvider implements EnvironmentProvider {
  private readonly setupScriptPath: string;
  private readonly setupTimeoutMs: number;
  private readonly commandTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly cli: GcloudCli,
    options: GcloudEnvironmentProviderOptions = {},
  ) {
    this.setupScriptPath = options.setupScriptPath ?? DEFAULT_SETUP_SCRIPT;
    this.setupTimeoutMs = options.setupTimeoutMs ?? 45 * 60_000;
    this.commandTimeoutMs = options.commandTimeoutMs ?? 60_000;
    this.logger = options.logger ?? getLogger().child({ component: 'environment' });
  }

  async ensureReady(options: EnsureReadyOptions): Promise<RemoteEndpoint> {
    try {
      await access(this.setupScriptPath);
    } catch (error: unknown) {
      throw new EnvironmentError(`Setup script ${this.setupScriptPath} not found`, { cause: error });
    }

    const { remoteHome } = this.cli.config;
    const remoteScript = posix.join(remoteHome, SETUP_SCRIPT_NAME);
    const repoName = repoNameFor(options.repo);

    this.logger.info('Uploading setup script', { remoteScript });
    await this.step('upload setup script', () =>
      this.cli.scp([this.setupScriptPath], this.cli.remote(remoteScript), {
        timeoutMs: this.commandTimeoutMs,
        label: 'setup-upload',
      }),
    );

    await this.step('make setup script executable', () =>
      this.cli.ssh(shellJoin(['chmod', '+x', remoteScript]), {
        timeoutMs: this.commandTimeoutMs,
        label: 'setup-chmod',
      }),
    );

    this.logger.info('Running remote setup', { repo: options.repo, branch: options.branch });
    await this.step('run setup script', () =>
      this.cli.ssh(
        shellJoin([
          'bash',
          remoteScript,
          options.repo,
          options.branch,
          repoName,
          String(options.forceRebuild),
        ]),
        { timeoutMs: this.setupTimeoutMs, label: 'setup' },
      ),
    );

    return {
      host: this.cli.host,
      remoteHome,
      stagingRoot: stagingRootFor(remoteHome),
      image: imageTagFor(options.repo, options.branch),
    };
  }

  private async step(label: string, run: () => Promise<CommandResult>): Promise<void> {
    let result: CommandResult;
    try {
      result = await run();
    } catch (error: unknown) {
      throw new EnvironmentError(`Remote setup failed (${label}): ${describeError(error)}`, {
        cause: error,
      });
    }
    if (!succeeded(result)) {
      throw new EnvironmentError(
        `Remote setup failed: ${describeCommandFailure(label, result)}`,
      );
    }
  }
}
