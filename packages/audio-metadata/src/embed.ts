import { randomBytes } from 'node:crypto';
import { rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import type { CoverImage } from '@cloud-narrator/contracts';

import { runFfmpeg, type FfmpegOptions } from './ffmpeg.js';
import { extensionFor } from './image.js';

export interface AudiobookMetadata {
  title: string;
  author?: string;
  album?: string;
  cover?: CoverImage;
}

export function buildMetadataArgs(
  inputPath: string,
  outputPath: string,
  metadata: AudiobookMetadata,
  coverPath?: string,
): string[] {
  const args = ['-y', '-i', inputPath];
  if (coverPath) {
    args.push('-i', coverPath, '-map', '0:a', '-map', '1:v', '-c', 'copy', '-disposition:v:0', 'attached_pic');
  } else {
    args.push('-map', '0', '-c', 'copy');
  }

  const tags: Array<[string, string | undefined]> = [
    ['title', metadata.title],
    ['album', metadata.album ?? metadata.title],
    ['artist', metadata.author],
    ['album_artist', metadata.author],
    ['genre', 'Audiobook'],
  ];
  for (const [key, value] of tags) {
    const trimmed = value?.trim();
    if (trimmed) args.push('-metadata', `${key}=${trimmed}`);
  }

  args.push('-f', 'mp4', outputPath);
  return args;
}

/**
 * Rewrite the audio file with title/author tags and an optional cover. The tagged copy is
 * written next to the original and renamed over it, so the original is never left half
 * written.
 */
export async function embedAudiobookMetadata(
  filePath: string,
  metadata: AudiobookMetadata,
  options: FfmpegOptions = {},
): Promise<void> {
  const dir = dirname(filePath);
  const token = randomBytes(4).toString('hex');
  const tempOutput = join(dir, `.${basename(filePath)}.${token}.tagged`);
  const coverPath = metadata.cover
    ? join(dir, `.cover-${token}${extensionFor(metadata.cover.mimeType)}`)
    : undefined;

  try {
    if (coverPath && metadata.cover) {
      await writeFile(coverPath, metadata.cover.data);
    }
    await runFfmpeg(
      buildMetadataArgs(filePath, tempOutput, metadata, coverPath),
      'ffmpeg-embed-metadata',
      options,
    );
    await rename(tempOutput, filePath);
  } finally {
    await rm(tempOutput, { force: true });
    if (coverPath) await rm(coverPath, { force: true });
  }
}
