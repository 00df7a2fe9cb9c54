import { platform } from 'node:os';
import { delimiter, join } from 'node:path';

import { FfmpegNotFoundError, MetadataError, describeError } from '@cloud-narrator/contracts';
import type { CommandResult, CommandRunner } from '@cloud-narrator/shared-infrastructure';
import { describeCommandFailure, runCommand } from '@cloud-narrator/shared-infrastructure';

const BINARY_CANDIDATES = platform() === 'win32' ? ['ffmpeg.exe', 'ffmpeg'] : ['ffmpeg'];

let cachedBinary: string | null = null;

async function canSpawn(command: string, runner: CommandRunner): Promise<boolean> {
  try {
    const result = await runner(command, ['-version'], { timeoutMs: 10_000 });
    return result.code === 0;
  } catch {
    return false;
  }
}

function pathCandidates(): string[] {
  const dirs = (process.env.PATH ?? '').split(delimiter).filter(Boolean);
  const candidates = dirs.flatMap((dir) => BINARY_CANDIDATES.map((name) => join(dir, name)));
  // bare command as a last resort when spawn resolves PATH differently
  return candidates.concat(BINARY_CANDIDATES);
}

export async function resolveFfmpegPath(
  explicit?: string,
  runner: CommandRunner = runCommand,
): Promise<string> {
  const preferred = explicit ?? process.env.FFMPEG_PATH;
  if (preferred && (await canSpawn(preferred, runner))) {
    cachedBinary = preferred;
    return preferred;
  }

  if (cachedBinary && (await canSpawn(cachedBinary, runner))) {
    return cachedBinary;
  }

  for (const candidate of pathCandidates()) {
    if (await canSpawn(candidate, runner)) {
      cachedBinary = candidate;
      return candidate;
    }
  }

  throw new FfmpegNotFoundError(
    [
      'FFmpeg is required to embed audiobook metadata but no executable was found.',
      'Install FFmpeg and make sure it is on your PATH, or set FFMPEG_PATH.',
    ].join('\n'),
  );
}

export function resetFfmpegPathCache(): void {
  cachedBinary = null;
}

export interface FfmpegOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
  timeoutMs?: number;
}

/** Run ffmpeg; rejects with MetadataError on a non-zero exit. */
export async function runFfmpeg(
  args: string[],
  label = 'ffmpeg',
  options: FfmpegOptions = {},
): Promise<void> {
  const runner = options.runner ?? runCommand;
  const bin = await resolveFfmpegPath(options.ffmpegPath, runner);
  let result: CommandResult;
  try {
    result = await runner(bin, args, { timeoutMs: options.timeoutMs ?? 10 * 60_000 });
  } catch (error: unknown) {
    throw new MetadataError(`${label} could not start: ${describeError(error)}`, { cause: error });
  }
  if (result.timedOut || result.code !== 0) {
    throw new MetadataError(describeCommandFailure(label, result));
  }
}
