import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { Job, LibraryMode, RunWarning } from '@cloud-narrator/contracts';
import { PlanningError, describeError } from '@cloud-narrator/contracts';

import { ExclusionSet } from './exclusions.js';
import { chooseEbook, compareNames } from './formats.js';
import { LanguageMap, assertLanguageCode } from './languages.js';
import { bookNameOf, resolveOutputPath } from './paths.js';

export interface ScanOptions {
  libraryRoot: string;
  audiobooksRoot: string;
  mode: LibraryMode;
  languages?: LanguageMap;
  exclusions?: ExclusionSet;
}

export interface ScanResult {
  jobs: Job[];
  warnings: RunWarning[];
}

interface WalkContext {
  audiobooksRoot: string;
  exclusions: ExclusionSet;
  jobs: Job[];
  warnings: RunWarning[];
}

/**
 * Walk the library and produce one Job per book directory, in sorted walk order.
 * A directory holding a recognised ebook is a book and is not descended into.
 */
export async function scanLibrary(options: ScanOptions): Promise<ScanResult> {
  const libraryRoot = resolve(options.libraryRoot);
  const exclusions = options.exclusions ?? ExclusionSet.empty();
  const languages = options.languages ?? new LanguageMap();

  await assertDirectory(libraryRoot);

  const ctx: WalkContext = {
    audiobooksRoot: resolve(options.audiobooksRoot),
    exclusions,
    jobs: [],
    warnings: [],
  };

  if (options.mode.kind === 'monolingual') {
    const code = assertLanguageCode(options.mode.languageCode);
    await walkBooks(ctx, libraryRoot, '', code, await listEntries(libraryRoot));
  } else {
    for (const entry of await listEntries(libraryRoot)) {
      if (!isVisibleDirectory(entry)) continue;
      const key = entry.name;
      // exclusions are checked before any language lookup
      if (exclusions.has(key)) continue;

      const code = languages.lookup(entry.name);
      if (!code) {
        ctx.warnings.push({
          relativeKey: key,
          message: `No language mapping for directory "${entry.name}"; its books are skipped`,
        });
        continue;
      }
      const languageDir = join(libraryRoot, entry.name);
      const children = await tryListEntries(ctx, languageDir, key);
      if (children) await walkBooks(ctx, languageDir, key, code, children);
    }
  }

  assertUnique(ctx.jobs);
  return { jobs: ctx.jobs, warnings: ctx.warnings };
}

async function walkBooks(
  ctx: WalkContext,
  dirPath: string,
  dirKey: string,
  languageCode: string,
  entries: Dirent[],
): Promise<void> {
  for (const entry of entries) {
    if (!isVisibleDirectory(entry)) continue;
    const key = dirKey ? `${dirKey}/${entry.name}` : entry.name;
    if (ctx.exclusions.has(key)) continue;

    const childPath = join(dirPath, entry.name);
    const children = await tryListEntries(ctx, childPath, key);
    if (!children) continue;

    const choice = chooseEbook(children.filter((child) => child.isFile()).map((child) => child.name));
    if (!choice) {
      await walkBooks(ctx, childPath, key, languageCode, children);
      continue;
    }

    if (choice.ignored.length > 0) {
      ctx.warnings.push({
        relativeKey: key,
        message: `Using ${choice.chosen}; ignoring extra ebooks: ${choice.ignored.join(', ')}`,
      });
    }

    ctx.jobs.push({
      sourcePath: join(childPath, choice.chosen),
      relativeKey: key,
      name: bookNameOf(key),
      languageCode,
      outputPath: resolveOutputPath(ctx.audiobooksRoot, key),
      state: 'discovered',
    });
  }
}

function isVisibleDirectory(entry: Dirent): boolean {
  return entry.isDirectory() && !entry.name.startsWith('.');
}

async function assertDirectory(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isDirectory()) {
      throw new PlanningError(`Library root ${path} is not a directory`);
    }
  } catch (error: unknown) {
    if (error instanceof PlanningError) throw error;
    throw new PlanningError(`Library root ${path} is not readable`, { cause: error });
  }
}

async function listEntries(dirPath: string): Promise<Dirent[]> {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries.sort((a, b) => compareNames(a.name, b.name));
  } catch (error: unknown) {
    throw new PlanningError(`Cannot list ${dirPath}`, { cause: error });
  }
}

async function tryListEntries(
  ctx: WalkContext,
  dirPath: string,
  key: string,
): Promise<Dirent[] | null> {
  try {
    return await listEntries(dirPath);
  } catch (error: unknown) {
    ctx.warnings.push({
      relativeKey: key,
      message: `Unreadable directory skipped: ${describeError(error)}`,
    });
    return null;
  }
}

function assertUnique(jobs: readonly Job[]): void {
  const keys = new Map<string, string>();
  const outputs = new Map<string, string>();
  for (const job of jobs) {
    const keyId = job.relativeKey.toLowerCase();
    const previousKey = keys.get(keyId);
    if (previousKey !== undefined) {
      throw new PlanningError(
        `Duplicate book directories "${previousKey}" and "${job.relativeKey}"`,
      );
    }
    keys.set(keyId, job.relativeKey);

    const outputId = job.outputPath.toLowerCase();
    const previousOutput = outputs.get(outputId);
    if (previousOutput !== undefined) {
      throw new PlanningError(
        `Books "${previousOutput}" and "${job.relativeKey}" map to the same output ${job.outputPath}`,
      );
    }
    outputs.set(outputId, job.relativeKey);
  }
}
