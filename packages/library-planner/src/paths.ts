import { join, posix } from 'node:path';

/**
 * Canonical form of a library-relative path: `/`-separated, no leading `./`,
 * no empty or `.` segments, no trailing slash.
 */
export function normalizeRelativeKey(input: string): string {
  return input
    .replaceAll('\\', '/')
    .split('/')
    .filter((segment) => segment.length > 0 && segment !== '.')
    .join('/');
}

export function bookNameOf(relativeKey: string): string {
  return posix.basename(relativeKey);
}

/** `<audiobooks_root>/<dirname(key)>/<name> TTS/<name> TTS.m4b` */
export function resolveOutputPath(audiobooksRoot: string, relativeKey: string): string {
  const key = normalizeRelativeKey(relativeKey);
  const name = bookNameOf(key);
  const parent = posix.dirname(key);
  const title = audiobookTitle(name);
  const segments = parent === '.' ? [] : parent.split('/');
  return join(audiobooksRoot, ...segments, title, `${title}.m4b`);
}

export function audiobookTitle(bookName: string): string {
  return `${bookName} TTS`;
}
