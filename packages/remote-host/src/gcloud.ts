import type { CommandResult, CommandRunner, Logger } from '@cloud-narrator/shared-infrastructure';
import { getLogger, runCommand } from '@cloud-narrator/shared-infrastructure';

import type { HostConfig } from './config.js';

export interface GcloudCliOptions {
  config: HostConfig;
  /** Defaults to GCLOUD_PATH, then `gcloud` on PATH. */
  gcloudPath?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

export interface GcloudCallOptions {
  timeoutMs: number;
  /** Mirror output lines to the debug log with this label. */
  label?: string;
}

/** Thin wrapper over `gcloud compute scp|ssh` against one instance. */
export class GcloudCli {
  readonly config: HostConfig;
  private readonly gcloudPath: string;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(options: GcloudCliOptions) {
    this.config = options.config;
    this.gcloudPath = options.gcloudPath ?? process.env.GCLOUD_PATH ?? 'gcloud';
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? getLogger().child({ component: 'gcloud' });
  }

  get host(): string {
    return `${this.config.remoteUser}@${this.config.instanceName}`;
  }

  remote(path: string): string {
    return `${this.host}:${path}`;
  }

  scp(sources: string[], destination: string, options: GcloudCallOptions): Promise<CommandResult> {
    return this.run(
      ['compute', 'scp', ...this.scopeArgs(), '--recurse', ...sources, destination],
      options,
    );
  }

  ssh(command: string, options: GcloudCallOptions): Promise<CommandResult> {
    return this.run(['compute', 'ssh', this.host, ...this.scopeArgs(), '--', command], options);
  }

  private scopeArgs(): string[] {
    const args = ['--zone', this.config.zone];
    if (this.config.projectId) args.push('--project', this.config.projectId);
    return args;
  }

  private async run(args: string[], options: GcloudCallOptions): Promise<CommandResult> {
    const label = options.label ?? args[1] ?? 'gcloud';
    this.logger.debug('Executing gcloud command', { label, args });
    const result = await this.runner(this.gcloudPath, args, {
      timeoutMs: options.timeoutMs,
      onLine: (stream, line) => this.logger.debug(line, { label, stream }),
    });
    this.logger.debug('gcloud command finished', {
      label,
      code: result.code,
      timedOut: result.timedOut,
      durationMs: result.durationMs,
    });
    return result;
  }
}

export function succeeded(result: CommandResult): boolean {
  return !result.timedOut && result.code === 0;
}
