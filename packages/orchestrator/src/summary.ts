import pc from 'picocolors';

import type { RunSummary, RunWarning } from '@cloud-narrator/contracts';
import type { RunPlan } from '@cloud-narrator/library-planner';

export type Colors = ReturnType<typeof pc.createColors>;

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return hours > 0 ? `${hours}h ${minutes}m ${seconds}s` : `${minutes}m ${seconds}s`;
}

function formatWarning(warning: RunWarning): string {
  return warning.relativeKey ? `${warning.relativeKey}: ${warning.message}` : warning.message;
}

export function formatRunSummary(summary: RunSummary, colors: Colors = pc): string[] {
  const { counts } = summary;
  const headline = summary.cancelled
    ? colors.yellow(`Run cancelled after ${formatDuration(summary.durationMs)}`)
    : colors.bold(`Run finished in ${formatDuration(summary.durationMs)}`);

  const lines = [
    headline,
    `  ${colors.green(`completed ${counts.completed}`)}  skipped ${counts.skipped}  ${colors.red(
      `failed ${counts.failed}`,
    )}  ${colors.yellow(`aborted ${counts.aborted}`)}  (of ${summary.total})`,
    colors.dim(
      `  peak concurrency: converting ${summary.peakConcurrency.converting}, transferring ${summary.peakConcurrency.transferring}`,
    ),
  ];

  if (summary.failures.length > 0) {
    lines.push(colors.red('Failed:'));
    for (const failure of summary.failures) {
      lines.push(`  - ${failure.relativeKey}: ${failure.reason}`);
    }
  }
  if (summary.aborted.length > 0) {
    lines.push(colors.yellow('Aborted:'));
    for (const key of summary.aborted) lines.push(`  - ${key}`);
  }
  if (summary.warnings.length > 0) {
    lines.push(colors.yellow('Warnings:'));
    for (const warning of summary.warnings) lines.push(`  - ${formatWarning(warning)}`);
  }
  return lines;
}

export function formatPlan(plan: RunPlan, colors: Colors = pc): string[] {
  const lines = [
    colors.bold(
      `Planned ${plan.jobs.length} book(s): ${plan.queued.length} queued, ${plan.skipped.length} already converted`,
    ),
  ];
  if (plan.queued.length > 0) {
    lines.push(colors.cyan('Queued:'));
    for (const job of plan.queued) {
      lines.push(`  - ${job.relativeKey} [${job.languageCode}] -> ${job.outputPath}`);
    }
  }
  if (plan.skipped.length > 0) {
    lines.push(colors.dim('Skipped:'));
    for (const job of plan.skipped) lines.push(`  - ${job.relativeKey}`);
  }
  if (plan.warnings.length > 0) {
    lines.push(colors.yellow('Warnings:'));
    for (const warning of plan.warnings) lines.push(`  - ${formatWarning(warning)}`);
  }
  return lines;
}
