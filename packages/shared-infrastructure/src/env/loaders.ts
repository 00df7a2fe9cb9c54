/**
 * Environment loading for the narrator CLI and its packages.
 * `.env` files never override variables already present in the process.
 */
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parse } from 'dotenv';

import { ConfigurationError } from '@cloud-narrator/contracts';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

export interface LoadEnvSummary {
  values: Record<string, string>;
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
  overriddenKeys: string[];
}

/**
 * Load `.env` style files in order. Earlier files win unless `override` is set.
 * The summary lists keys only, never values.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): LoadEnvSummary {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = (options.files && options.files.length > 0 ? options.files : ['.env']).map(
    (file) => (isAbsolute(file) ? file : resolve(cwd, file)),
  );
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const values: Record<string, string> = {};
  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];
  const assignedKeys = new Set<string>();
  const overriddenKeys = new Set<string>();

  for (const file of files) {
    if (!existsSync(file)) {
      missingFiles.push(file);
      continue;
    }
    loadedFiles.push(file);
    const parsed = parse(readFileSync(file, 'utf8'));

    for (const [key, value] of Object.entries(parsed)) {
      if (override || values[key] === undefined) {
        values[key] = value;
      }
      if (!assignToProcess) continue;

      const alreadySet = process.env[key] !== undefined;
      if (alreadySet && !override) continue;
      if (alreadySet) {
        overriddenKeys.add(key);
      } else {
        assignedKeys.add(key);
      }
      process.env[key] = value;
    }
  }

  return {
    values,
    loadedFiles,
    missingFiles,
    assignedKeys: [...assignedKeys],
    overriddenKeys: [...overriddenKeys],
  };
}

export interface ReadIntOptions {
  /** Smallest accepted value (default 0). */
  min?: number;
}

/** Unset or blank means `fallback`; anything else must parse as an integer >= `min`. */
export function readInt(name: string, fallback: number, options: ReadIntOptions = {}): number {
  const raw = readString(name);
  if (raw === undefined) return fallback;
  const min = options.min ?? 0;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

export function readString(name: string, fallback?: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : fallback;
}
