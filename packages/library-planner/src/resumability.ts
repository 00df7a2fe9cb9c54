import { access } from 'node:fs/promises';

import type { Job } from '@cloud-narrator/contracts';
import { PlanningError } from '@cloud-narrator/contracts';

/**
 * True when the file exists. Size and content are not checked: an existing output,
 * even an empty one, counts as complete.
 */
export async function outputExists(outputPath: string): Promise<boolean> {
  try {
    await access(outputPath);
    return true;
  } catch (error: unknown) {
    if (isMissing(error)) return false;
    throw new PlanningError(`Cannot check output ${outputPath}`, { cause: error });
  }
}

export interface FilterResult {
  queued: Job[];
  skipped: Job[];
}

/** Mark each discovered Job `skipped` or `queued`. Never writes to the filesystem. */
export async function filterCompleted(jobs: readonly Job[]): Promise<FilterResult> {
  const queued: Job[] = [];
  const skipped: Job[] = [];
  for (const job of jobs) {
    if (await outputExists(job.outputPath)) {
      skipped.push({ ...job, state: 'skipped' });
    } else {
      queued.push({ ...job, state: 'queued' });
    }
  }
  return { queued, skipped };
}

function isMissing(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}
