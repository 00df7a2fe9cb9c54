import { extname } from 'node:path';

/** Recognised ebook extensions, most preferred first. */
export const EBOOK_FORMAT_PRIORITY = [
  '.epub',
  '.azw3',
  '.azw',
  '.kpf',
  '.mobi',
  '.fb2',
  '.txt',
  '.pdf',
] as const;

export type EbookExtension = (typeof EBOOK_FORMAT_PRIORITY)[number];

export function ebookPriority(fileName: string): number {
  const ext = extname(fileName).toLowerCase();
  return EBOOK_FORMAT_PRIORITY.findIndex((candidate) => candidate === ext);
}

export function isEbookFile(fileName: string): boolean {
  return !fileName.startsWith('.') && ebookPriority(fileName) !== -1;
}

export interface EbookChoice {
  chosen: string;
  ignored: string[];
}

/**
 * Pick the ebook to convert from a directory listing: lowest format priority wins,
 * ties broken by file name.
 */
export function chooseEbook(fileNames: readonly string[]): EbookChoice | null {
  const ranked = fileNames
    .filter(isEbookFile)
    .map((name) => ({ name, priority: ebookPriority(name) }))
    .sort((a, b) => a.priority - b.priority || compareNames(a.name, b.name));

  const [first, ...rest] = ranked;
  if (!first) return null;
  return { chosen: first.name, ignored: rest.map((entry) => entry.name) };
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
