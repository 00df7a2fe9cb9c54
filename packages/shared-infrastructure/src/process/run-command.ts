import { spawn } from 'node:child_process';

export type CommandResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  durationMs: number;
};

export type RunCommandOptions = {
  timeoutMs?: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Called for every complete output line, e.g. to mirror remote logs. */
  onLine?: (stream: 'stdout' | 'stderr', line: string) => void;
  /** Time between SIGTERM and SIGKILL once the timeout fires. */
  killGraceMs?: number;
  /** Characters of each stream kept in the result; older output is dropped. */
  maxOutputChars?: number;
};

export const DEFAULT_MAX_OUTPUT_CHARS = 64_000;

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

/**
 * Spawn a command and collect its output. Resolves for any exit code; rejects only
 * when the binary cannot be started.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const startedAt = Date.now();

  return new Promise<CommandResult>((resolvePromise, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: process.platform === 'win32',
    });

    const maxOutputChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
    const output = { stdout: '', stderr: '' };
    let timedOut = false;
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    const pending = { stdout: '', stderr: '' };

    const emitLines = (stream: 'stdout' | 'stderr', chunk: string, flush = false) => {
      if (!options.onLine) return;
      pending[stream] += chunk;
      const lines = pending[stream].split(/\r?\n/);
      pending[stream] = flush ? '' : (lines.pop() ?? '');
      for (const line of lines) {
        if (line.length > 0) options.onLine(stream, line);
      }
    };

    const collect = (stream: 'stdout' | 'stderr', text: string) => {
      const combined = output[stream] + text;
      output[stream] = combined.length > maxOutputChars ? combined.slice(-maxOutputChars) : combined;
      emitLines(stream, text);
    };

    // decode as streams so multi-byte characters split across chunks survive
    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');
    proc.stdout?.on('data', (text: string) => collect('stdout', text));
    proc.stderr?.on('data', (text: string) => collect('stderr', text));

    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            proc.kill('SIGTERM');
            killTimer = setTimeout(() => proc.kill('SIGKILL'), options.killGraceMs ?? 5_000);
            killTimer.unref?.();
          }, options.timeoutMs)
        : null;

    const clearTimers = () => {
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
    };

    proc.on('error', (error) => {
      clearTimers();
      reject(error);
    });
    proc.on('close', (code, signal) => {
      clearTimers();
      emitLines('stdout', '', true);
      emitLines('stderr', '', true);
      resolvePromise({
        code,
        signal,
        stdout: output.stdout,
        stderr: output.stderr,
        timedOut,
        durationMs: Date.now() - startedAt,
      });
    });
  });
};

/** Render a failed command result for error messages, trimming long output. */
export function describeCommandFailure(label: string, result: CommandResult, maxChars = 2_000): string {
  const status = result.timedOut
    ? `${label} timed out after ${result.durationMs}ms`
    : `${label} exited with code ${result.code ?? result.signal ?? 'unknown'}`;
  const parts = [status];
  const trimmedStdout = tail(result.stdout.trim(), maxChars);
  const trimmedStderr = tail(result.stderr.trim(), maxChars);
  if (trimmedStdout) parts.push(`stdout:\n${trimmedStdout}`);
  if (trimmedStderr) parts.push(`stderr:\n${trimmedStderr}`);
  return parts.join('\n\n');
}

function tail(text: string, maxChars: number): string {
  return text.length > maxChars ? `…${text.slice(-maxChars)}` : text;
}
