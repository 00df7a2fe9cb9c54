import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import { z } from 'zod';

import { ConfigurationError } from '@cloud-narrator/contracts';

import { normalizeRelativeKey } from './paths.js';

const ExclusionFileSchema = z.array(z.string());

/**
 * Immutable set of excluded library directories. A key is excluded when it, or any
 * of its ancestor directories, is in the set.
 */
export class ExclusionSet {
  private readonly entries: ReadonlySet<string>;

  constructor(entries: Iterable<string> = []) {
    const normalized = new Set<string>();
    for (const entry of entries) {
      const key = normalizeRelativeKey(entry);
      if (key) normalized.add(key);
    }
    this.entries = normalized;
  }

  static empty(): ExclusionSet {
    return new ExclusionSet();
  }

  get size(): number {
    return this.entries.size;
  }

  has(relativeKey: string): boolean {
    const segments = normalizeRelativeKey(relativeKey).split('/');
    for (let i = 1; i <= segments.length; i++) {
      if (this.entries.has(segments.slice(0, i).join('/'))) return true;
    }
    return false;
  }

  values(): string[] {
    return [...this.entries];
  }
}

/**
 * Load exclusions from a JSON array, or from a text file with one path per line
 * (`#` starts a comment).
 */
export async function loadExclusionSet(filePath: string): Promise<ExclusionSet> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read exclusion file ${filePath}`, { cause: error });
  }

  if (extname(filePath).toLowerCase() === '.json') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      throw new ConfigurationError(`Exclusion file ${filePath} is not valid JSON`, { cause: error });
    }
    const result = ExclusionFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigurationError(
        `Exclusion file ${filePath} must be an array of relative paths`,
        { cause: result.error },
      );
    }
    return new ExclusionSet(result.data);
  }

  const lines = raw
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, '').trim())
    .filter((line) => line.length > 0);
  return new ExclusionSet(lines);
}
