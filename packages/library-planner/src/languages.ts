import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { ConfigurationError } from '@cloud-narrator/contracts';

const LANGUAGE_CODE = /^[a-z]{3}$/;

const LanguageCodeSchema = z.string().regex(LANGUAGE_CODE, 'expected a 3-letter lowercase code');
const LanguageMapSchema = z.record(z.string(), LanguageCodeSchema);
const LanguageCodeListSchema = z.array(LanguageCodeSchema);

/** Lower-cased language directory name -> 3-letter language code. */
export class LanguageMap {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(entries: Record<string, string> = {}) {
    const map = new Map<string, string>();
    for (const [dirName, code] of Object.entries(entries)) {
      map.set(dirName.toLowerCase(), code);
    }
    this.entries = map;
  }

  lookup(directoryName: string): string | undefined {
    return this.entries.get(directoryName.toLowerCase());
  }

  get size(): number {
    return this.entries.size;
  }
}

export function isLanguageCode(value: string): boolean {
  return LANGUAGE_CODE.test(value);
}

export function assertLanguageCode(value: string): string {
  if (!isLanguageCode(value)) {
    throw new ConfigurationError(
      `Invalid language code "${value}": expected three lowercase letters (e.g. "eng")`,
    );
  }
  return value;
}

async function readJson(filePath: string, label: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read ${label} ${filePath}`, { cause: error });
  }
  try {
    return JSON.parse(raw);
  } catch (error: unknown) {
    throw new ConfigurationError(`${label} ${filePath} is not valid JSON`, { cause: error });
  }
}

export async function loadLanguageMap(filePath: string): Promise<LanguageMap> {
  const result = LanguageMapSchema.safeParse(await readJson(filePath, 'language map'));
  if (!result.success) {
    throw new ConfigurationError(`Invalid language map ${filePath}: ${result.error.message}`, {
      cause: result.error,
    });
  }
  return new LanguageMap(result.data);
}

/** Read a JSON array of language codes, such as the list of codes with a VITS model. */
export async function loadLanguageCodeSet(filePath: string): Promise<ReadonlySet<string>> {
  const result = LanguageCodeListSchema.safeParse(await readJson(filePath, 'language list'));
  if (!result.success) {
    throw new ConfigurationError(`Invalid language list ${filePath}: ${result.error.message}`, {
      cause: result.error,
    });
  }
  return new Set(result.data);
}
