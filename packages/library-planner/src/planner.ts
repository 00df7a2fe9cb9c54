import type { Job, RunWarning } from '@cloud-narrator/contracts';

import { filterCompleted } from './resumability.js';
import { scanLibrary, type ScanOptions } from './scanner.js';

export interface RunPlan {
  /** Every discovered Job, in walk order, already marked `queued` or `skipped`. */
  jobs: Job[];
  queued: Job[];
  skipped: Job[];
  warnings: RunWarning[];
}

export async function planRun(options: ScanOptions): Promise<RunPlan> {
  const { jobs, warnings } = await scanLibrary(options);
  const { queued, skipped } = await filterCompleted(jobs);
  const byKey = new Map<string, Job>([...queued, ...skipped].map((job) => [job.relativeKey, job]));
  const ordered = jobs.flatMap((job) => {
    const marked = byKey.get(job.relativeKey);
    return marked ? [marked] : [];
  });
  return { jobs: ordered, queued, skipped, warnings };
}
