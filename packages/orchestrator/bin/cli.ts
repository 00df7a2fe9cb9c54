#!/usr/bin/env node
import { Command, CommanderError, InvalidOptionArgumentError } from 'commander';
import { existsSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, resolve } from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';
import ora, { type Ora } from 'ora';
import pc from 'picocolors';

import type { JobEvent } from '@cloud-narrator/contracts';
import { describeError, isFatalError } from '@cloud-narrator/contracts';
import { isLanguageCode } from '@cloud-narrator/library-planner';
import { createLogger, getLogger, setLogger } from '@cloud-narrator/shared-infrastructure';

import type { AggregatorSnapshot } from '../src/aggregator.js';
import {
  type PipelineLogger,
  type PlanFlags,
  type RunFlags,
  createMetricsRecorder,
  createPipeline,
  loadEnvFiles,
} from '../src/index.js';
import { createConsoleLogger } from '../src/logger.js';
import { formatPlan, formatRunSummary } from '../src/summary.js';

const EXIT_CANCELLED = 130;

const moduleDir = dirname(fileURLToPath(import.meta.url));
const repoEnvPath = resolve(moduleDir, '../../../.env');
const envFiles = ['.env'];
if (existsSync(repoEnvPath)) {
  envFiles.push(repoEnvPath);
}
loadEnvFiles({ files: envFiles, cwd: process.cwd(), assignToProcess: true, override: false });

// infrastructure logs stay quiet on the terminal unless asked for or written to a file
setLogger(
  createLogger({
    level: process.env.LOG_LEVEL ?? (process.env.NARRATOR_LOG_FILE ? 'info' : 'warn'),
  }),
);

const rawArgs = process.argv.slice(2);
const jsonOutput = rawArgs.includes('--json');
const command = rawArgs[0] === 'run' || rawArgs[0] === 'plan' ? rawArgs[0] : undefined;
const logger = createConsoleLogger({ json: jsonOutput });
const metrics = createMetricsRecorder();

const readVersion = (): string => {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../package.json');
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
};

const parsePositiveInt = (value: string, label: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidOptionArgumentError(`${label} must be a positive integer.`);
  }
  return parsed;
};

const parseLanguageCode = (value: string): string => {
  if (!isLanguageCode(value)) {
    throw new InvalidOptionArgumentError(
      `Language code must be three lowercase letters (e.g. "eng"), got "${value}".`,
    );
  }
  return value;
};

/** Returns null when Commander already reported the problem (or printed help). */
const parseWithCommander = async (program: Command, args: string[]): Promise<Command | null> => {
  program.exitOverride();
  try {
    return await program.parseAsync(['node', 'narrator', ...args], { from: 'node' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return null;
    }
    throw error;
  }
};

const libraryCommand = (name: string, description: string): Command =>
  new Command(name)
    .description(description)
    .argument('<ebooks_dir>', 'Library root holding one directory per book')
    .argument('<audiobooks_dir>', 'Root the .m4b files are written under')
    .allowExcessArguments(false)
    .option(
      '--monolingual <code>',
      'Treat the library as one language (three-letter code)',
      parseLanguageCode,
    )
    .option('--exclude-file <path>', 'Relative paths to leave out (JSON array or one per line)')
    .option('--config-dir <dir>', 'Directory holding language-map.json and friends')
    .option('--json', 'Emit one JSON document instead of console output');

type LibraryOptions = {
  monolingual?: string;
  excludeFile?: string;
  configDir?: string;
};

type RunCommandOptions = LibraryOptions & {
  forceDockerImageRebuild?: boolean;
  numThreads?: number;
  maxInFlight?: number;
  gitRepo?: string;
  gitBranch?: string;
  hostConfig?: string;
  workDir?: string;
};

const positionalDirs = (parsed: Command): { ebooksDir: string; audiobooksDir: string } => {
  const [ebooksDir, audiobooksDir] = parsed.args;
  if (!ebooksDir || !audiobooksDir) {
    throw new InvalidOptionArgumentError('Both <ebooks_dir> and <audiobooks_dir> are required.');
  }
  return { ebooksDir, audiobooksDir };
};

const pipelineLogger: PipelineLogger = {
  log(event) {
    const { level, message, detail, runId, stage } = event;
    // the spinner surfaces per-stage progress on a terminal
    if (!jsonOutput && message.startsWith('stage.')) return;

    const payload: Record<string, unknown> = {};
    if (runId) payload.runId = runId;
    if (stage) payload.stage = stage;
    if (detail && Object.keys(detail).length > 0) payload.detail = detail;

    if (level === 'error') logger.error(message, payload);
    else if (level === 'warn') logger.warn(message, payload);
    else logger.step(message, payload);
  },
};

const installInterruptHandlers = (controller: AbortController, spinner: Ora | null): (() => void) => {
  let interrupts = 0;
  const handler = (signal: NodeJS.Signals) => {
    interrupts += 1;
    if (interrupts > 1) {
      console.error(pc.red(`Received ${signal} again, exiting immediately.`));
      process.exit(EXIT_CANCELLED);
    }
    spinner?.clear();
    logger.warn(
      `Received ${signal}: finishing in-flight stages, no new books will start. Press Ctrl+C again to force exit.`,
    );
    controller.abort();
  };
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
};

const progressText = (snapshot: AggregatorSnapshot): string =>
  `${snapshot.finished}/${snapshot.total} books settled · converting ${snapshot.converting} · transferring ${snapshot.transferring}`;

const reportJobEvent = (event: JobEvent): void => {
  if (event.type === 'warning') {
    logger.warn(event.message, event.relativeKey ? { book: event.relativeKey } : undefined);
    return;
  }
  if (event.state === 'completed') logger.success(`Converted ${event.relativeKey}`);
  if (event.state === 'failed') {
    logger.error(`Failed ${event.relativeKey}`, { reason: event.reason ?? 'unknown error' });
  }
};

async function handleRun(args: string[]): Promise<void> {
  const program = libraryCommand('run', 'Convert every book that has no audiobook yet')
    .option('--force-docker-image-rebuild', 'Rebuild the converter image on the host')
    .option('--num-threads <n>', 'Concurrent transfers (and converter workers)', (value) =>
      parsePositiveInt(value, 'Number of threads'),
    )
    .option('--max-in-flight <n>', 'Books held by workers at once (default threads + 1)', (value) =>
      parsePositiveInt(value, 'Max in flight'),
    )
    .option('--git-repo <url>', 'Converter repository cloned on the host')
    .option('--git-branch <name>', 'Converter branch')
    .option('--host-config <file>', 'gcp_config.json describing the remote host')
    .option('--work-dir <dir>', 'Local directory for downloads in progress');

  const parsed = await parseWithCommander(program, args);
  if (!parsed) return;
  const opts = parsed.opts<RunCommandOptions>();
  const flags: RunFlags = {
    ...positionalDirs(parsed),
    monolingual: opts.monolingual,
    excludeFile: opts.excludeFile,
    forceRebuild: Boolean(opts.forceDockerImageRebuild),
    numThreads: opts.numThreads,
    maxInFlight: opts.maxInFlight,
    gitRepo: opts.gitRepo,
    gitBranch: opts.gitBranch,
    workDir: opts.workDir,
  };

  const pipeline = createPipeline({
    configDir: opts.configDir,
    hostConfigPath: opts.hostConfig,
    logger: pipelineLogger,
    metrics,
  });

  const useFancy = !jsonOutput && Boolean(process.stdout.isTTY);
  const spinner = useFancy ? ora({ spinner: 'dots', color: 'cyan' }) : null;
  const controller = new AbortController();
  const removeHandlers = installInterruptHandlers(controller, spinner);

  try {
    logger.info('Planning library', { ebooks: flags.ebooksDir, audiobooks: flags.audiobooksDir });
    spinner?.start('Preparing run');
    const summary = await pipeline.run(flags, {
      signal: controller.signal,
      onEvent: (event, snapshot) => {
        if (spinner?.isSpinning) spinner.clear();
        reportJobEvent(event);
        if (spinner) spinner.text = progressText(snapshot);
        if (spinner?.isSpinning) spinner.render();
      },
    });
    if (spinner?.isSpinning) spinner.stop();

    if (jsonOutput) {
      logger.flush({ command: 'run', summary, metrics: metrics.snapshot() });
    } else {
      for (const line of formatRunSummary(summary)) console.log(line);
    }
    process.exitCode = summary.cancelled ? EXIT_CANCELLED : 0;
  } finally {
    if (spinner?.isSpinning) spinner.stop();
    removeHandlers();
  }
}

async function handlePlan(args: string[]): Promise<void> {
  const parsed = await parseWithCommander(
    libraryCommand('plan', 'List the books a run would convert or skip, without contacting the host'),
    args,
  );
  if (!parsed) return;
  const opts = parsed.opts<LibraryOptions>();
  const flags: PlanFlags = {
    ...positionalDirs(parsed),
    monolingual: opts.monolingual,
    excludeFile: opts.excludeFile,
  };

  const pipeline = createPipeline({ configDir: opts.configDir, logger: pipelineLogger, metrics });
  const plan = await pipeline.plan(flags);

  if (jsonOutput) {
    logger.flush({
      command: 'plan',
      queued: plan.queued.map(({ relativeKey, languageCode, outputPath }) => ({
        relativeKey,
        languageCode,
        outputPath,
      })),
      skipped: plan.skipped.map((job) => job.relativeKey),
      warnings: plan.warnings,
    });
  } else {
    for (const line of formatPlan(plan)) console.log(line);
  }
  process.exitCode = 0;
}

async function main(): Promise<void> {
  try {
    if (command === 'plan') {
      await handlePlan(rawArgs.slice(1));
      return;
    }
    await handleRun(command ? rawArgs.slice(1) : rawArgs);
  } catch (error: unknown) {
    const message = describeError(error);
    const name = error instanceof Error ? error.name : 'Error';
    const fatal = isFatalError(error);
    if (!fatal) {
      // configuration, planning and environment errors are expected; anything else is a bug
      getLogger().debug('Unexpected error', {
        name,
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
    logger.error(fatal ? message : `Unexpected error: ${message}`, { name });
    logger.flush({ command: command ?? 'run', error: { message, name, fatal } });
    process.exitCode = 1;
  }
}

if (rawArgs.includes('--version') || rawArgs.includes('-v')) {
  console.log(readVersion());
} else {
  await main();
}
