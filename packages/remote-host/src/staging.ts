import { createHash } from 'node:crypto';
import { extname, posix } from 'node:path';

export const STAGING_DIR_NAME = 'narrator-staging';

export interface RemoteStaging {
  slug: string;
  root: string;
  inputDir: string;
  outputDir: string;
}

/**
 * Per-Job staging directories under `stagingRoot`. The slug keeps the key readable
 * and adds a short hash so that keys that sanitize alike stay distinct.
 */
export function remoteStagingFor(stagingRoot: string, relativeKey: string): RemoteStaging {
  const slug = stagingSlug(relativeKey);
  const root = posix.join(stagingRoot, slug);
  return {
    slug,
    root,
    inputDir: posix.join(root, 'input'),
    outputDir: posix.join(root, 'output'),
  };
}

const UNSAFE_NAME_CHARS = /[^A-Za-z0-9._-]+/g;

/** True when `path` needs no quoting on the remote side of `scp`. */
export function isRemoteSafePath(path: string): boolean {
  return /^[A-Za-z0-9._/-]+$/.test(path);
}

/** Replace every run of characters outside `[A-Za-z0-9._-]` with `_`. */
export function remoteSafeName(name: string): string {
  return name.replace(UNSAFE_NAME_CHARS, '_');
}

/**
 * Remote key the ebook is uploaded to: the staging slug plus the original extension,
 * so neither scp nor the converter ever sees the book's own file name.
 */
export function stagedInputKey(staging: RemoteStaging, sourcePath: string): string {
  return posix.join(staging.inputDir, `${staging.slug}${remoteSafeName(extname(sourcePath))}`);
}

export function stagingSlug(relativeKey: string): string {
  const readable = remoteSafeName(relativeKey)
    .replace(/^[_.]+|_+$/g, '')
    .slice(0, 60);
  const hash = createHash('sha1').update(relativeKey).digest('hex').slice(0, 8);
  return readable ? `${readable}-${hash}` : hash;
}

export function stagingRootFor(remoteHome: string): string {
  return posix.join(remoteHome, STAGING_DIR_NAME);
}
