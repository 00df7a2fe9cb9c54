import { existsSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LibraryMode, RunSummary } from '@cloud-narrator/contracts';
import { ConfigurationError } from '@cloud-narrator/contracts';
import { createCoverProviderFromEnv, embedAudiobookMetadata } from '@cloud-narrator/audio-metadata';
import {
  ExclusionSet,
  loadExclusionSet,
  loadLanguageCodeSet,
  loadLanguageMap,
  planRun,
  type RunPlan,
} from '@cloud-narrator/library-planner';
import {
  DEFAULT_GIT_BRANCH,
  DEFAULT_GIT_REPO,
  GcloudCli,
  GcloudEnvironmentProvider,
  GcloudExecutionClient,
  GcloudTransferClient,
  imageTagFor,
  loadHostConfig,
} from '@cloud-narrator/remote-host';
import { getLogger, readInt, readString } from '@cloud-narrator/shared-infrastructure';

import type { AggregatorListener } from './aggregator.js';
import {
  type PipelineLogger,
  type PipelineMetrics,
  noopLogger,
  noopMetrics,
} from './observability.js';
import { DEFAULT_STAGE_SETTINGS, defaultWorkDir, runConversion, type RunDependencies } from './run.js';
import { DEFAULT_TRANSFER_CONCURRENCY } from './worker-pool.js';

const LANGUAGE_MAP_FILE = 'language-map.json';
const VITS_LANGUAGES_FILE = 'vits-languages.json';
const EXCLUSIONS_FILE = 'exclusions.json';
const HOST_CONFIG_FILE = 'gcp_config.json';

export interface ResolveConfigPathsOptions {
  cwd?: string;
  configDir?: string;
  hostConfigPath?: string;
}

export interface ResolvedConfigPaths {
  configRoot: string;
  languageMapPath: string;
  vitsLanguagesPath: string;
  exclusionsPath?: string;
  hostConfigPath?: string;
}

export function resolveConfigPaths(options: ResolveConfigPathsOptions = {}): ResolvedConfigPaths {
  const cwd = resolve(options.cwd ?? process.cwd());
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const repoConfigs = resolve(moduleDir, '../../../configs');
  const candidateConfigDirs = [
    options.configDir,
    process.env.NARRATOR_CONFIG_DIR,
    join(cwd, 'configs'),
    repoConfigs,
  ]
    .filter((dir): dir is string => Boolean(dir))
    .map((dir) => resolvePath(dir, cwd));

  const languageMapPath = findFirstExistingPath(
    candidateConfigDirs.map((dir) => join(dir, LANGUAGE_MAP_FILE)),
  );
  if (!languageMapPath) {
    throw new ConfigurationError(
      `Unable to locate ${LANGUAGE_MAP_FILE}. Checked: ${candidateConfigDirs
        .map((dir) => join(dir, LANGUAGE_MAP_FILE))
        .join(', ')}`,
    );
  }

  const configRoot = dirname(languageMapPath);
  const vitsLanguagesPath = join(configRoot, VITS_LANGUAGES_FILE);
  if (!existsSync(vitsLanguagesPath)) {
    throw new ConfigurationError(`${VITS_LANGUAGES_FILE} not found next to ${languageMapPath}`);
  }

  const exclusionsPath = join(configRoot, EXCLUSIONS_FILE);
  return {
    configRoot,
    languageMapPath,
    vitsLanguagesPath,
    exclusionsPath: existsSync(exclusionsPath) ? exclusionsPath : undefined,
    hostConfigPath: resolveHostConfigPath(options.hostConfigPath, cwd),
  };
}

function resolveHostConfigPath(explicit: string | undefined, cwd: string): string | undefined {
  const requested = explicit ?? process.env.NARRATOR_HOST_CONFIG;
  if (requested) {
    const path = resolvePath(requested, cwd);
    if (!existsSync(path)) {
      throw new ConfigurationError(`Host config ${path} does not exist`);
    }
    return path;
  }
  return findFirstExistingPath([join(cwd, HOST_CONFIG_FILE)]);
}

export interface PlanFlags {
  ebooksDir: string;
  audiobooksDir: string;
  /** Three-letter code; absent means a multilingual library. */
  monolingual?: string;
  excludeFile?: string;
}

export interface RunFlags extends PlanFlags {
  forceRebuild?: boolean;
  numThreads?: number;
  maxInFlight?: number;
  gitRepo?: string;
  gitBranch?: string;
  workDir?: string;
}

export interface RunHooks {
  signal?: AbortSignal;
  onEvent?: AggregatorListener;
  runId?: string;
}

export type CreatePipelineOptions = ResolveConfigPathsOptions & {
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
  /** Replaces the gcloud-backed collaborators. */
  dependencies?: Partial<RunDependencies>;
};

export interface NarratorPipeline {
  configPaths: ResolvedConfigPaths;
  logger: PipelineLogger;
  metrics: PipelineMetrics;
  plan(flags: PlanFlags): Promise<RunPlan>;
  run(flags: RunFlags, hooks?: RunHooks): Promise<RunSummary>;
}

export function createPipeline(options: CreatePipelineOptions = {}): NarratorPipeline {
  const cwd = resolve(options.cwd ?? process.cwd());
  const configPaths = resolveConfigPaths(options);
  const logger = options.logger ?? noopLogger;
  const metrics = options.metrics ?? noopMetrics;

  const libraryInputs = async (flags: PlanFlags) => {
    const mode: LibraryMode = flags.monolingual
      ? { kind: 'monolingual', languageCode: flags.monolingual }
      : { kind: 'multilingual' };
    const languages =
      mode.kind === 'multilingual' ? await loadLanguageMap(configPaths.languageMapPath) : undefined;
    const exclusionsPath = flags.excludeFile
      ? resolvePath(flags.excludeFile, cwd)
      : configPaths.exclusionsPath;
    const exclusions = exclusionsPath ? await loadExclusionSet(exclusionsPath) : ExclusionSet.empty();
    return {
      libraryRoot: resolvePath(flags.ebooksDir, cwd),
      audiobooksRoot: resolvePath(flags.audiobooksDir, cwd),
      mode,
      languages,
      exclusions,
    };
  };

  return {
    configPaths,
    logger,
    metrics,
    async plan(flags) {
      return planRun(await libraryInputs(flags));
    },
    async run(flags, hooks = {}) {
      const inputs = await libraryInputs(flags);
      const transferConcurrency = flags.numThreads ?? DEFAULT_TRANSFER_CONCURRENCY;
      const repo = flags.gitRepo ?? DEFAULT_GIT_REPO;
      const branch = flags.gitBranch ?? DEFAULT_GIT_BRANCH;
      const dependencies = await resolveDependencies(options.dependencies ?? {}, {
        configPaths,
        image: imageTagFor(repo, branch),
        numWorkers: transferConcurrency,
        commandTimeoutMs: readInt(
          'NARRATOR_COMMAND_TIMEOUT_MS',
          DEFAULT_STAGE_SETTINGS.commandTimeoutMs,
          { min: 1 },
        ),
      });

      return runConversion(
        {
          ...inputs,
          repo,
          branch,
          forceRebuild: flags.forceRebuild ?? false,
          transferConcurrency,
          maxInFlight: flags.maxInFlight,
          workDir: resolvePath(
            flags.workDir ?? readString('NARRATOR_WORK_DIR') ?? defaultWorkDir(),
            cwd,
          ),
          settings: {
            transferTimeoutMs: readInt(
              'NARRATOR_TRANSFER_TIMEOUT_MS',
              DEFAULT_STAGE_SETTINGS.transferTimeoutMs,
              { min: 1 },
            ),
            conversionTimeoutMs: readInt(
              'NARRATOR_CONVERSION_TIMEOUT_MS',
              DEFAULT_STAGE_SETTINGS.conversionTimeoutMs,
              { min: 1 },
            ),
            commandTimeoutMs: readInt(
              'NARRATOR_COMMAND_TIMEOUT_MS',
              DEFAULT_STAGE_SETTINGS.commandTimeoutMs,
              { min: 1 },
            ),
            retryDelayMs: readInt('NARRATOR_RETRY_DELAY_MS', DEFAULT_STAGE_SETTINGS.retryDelayMs),
          },
          runId: hooks.runId,
          signal: hooks.signal,
          onEvent: hooks.onEvent,
        },
        { ...dependencies, logger, metrics },
      );
    },
  };
}

interface GcloudWiring {
  configPaths: ResolvedConfigPaths;
  image: string;
  numWorkers: number;
  commandTimeoutMs: number;
}

async function resolveDependencies(
  provided: Partial<RunDependencies>,
  wiring: GcloudWiring,
): Promise<RunDependencies> {
  const metadata = provided.metadata === undefined ? createCoverProviderFromEnv() : provided.metadata;
  const embedMetadata =
    provided.embedMetadata ?? ((filePath, tags) => embedAudiobookMetadata(filePath, tags));

  if (provided.environment && provided.transfer && provided.execution) {
    return {
      ...provided,
      environment: provided.environment,
      transfer: provided.transfer,
      execution: provided.execution,
      metadata,
      embedMetadata,
    };
  }

  if (!wiring.configPaths.hostConfigPath) {
    throw new ConfigurationError(
      `No remote host configured. Pass --host-config, set NARRATOR_HOST_CONFIG, or create ${HOST_CONFIG_FILE} in the working directory.`,
    );
  }
  const config = await loadHostConfig(wiring.configPaths.hostConfigPath);
  const cli = new GcloudCli({ config, logger: getLogger().child({ component: 'gcloud' }) });
  const vitsLanguages = await loadLanguageCodeSet(wiring.configPaths.vitsLanguagesPath);

  return {
    ...provided,
    environment:
      provided.environment ??
      new GcloudEnvironmentProvider(cli, { commandTimeoutMs: wiring.commandTimeoutMs }),
    transfer: provided.transfer ?? new GcloudTransferClient(cli),
    execution:
      provided.execution ??
      new GcloudExecutionClient(cli, {
        image: wiring.image,
        remoteHome: config.remoteHome,
        vitsLanguages,
        numWorkers: wiring.numWorkers,
      }),
    metadata,
    embedMetadata,
  };
}

function findFirstExistingPath(paths: string[]): string | undefined {
  for (const path of paths) {
    if (path && existsSync(path)) {
      return path;
    }
  }
  return undefined;
}

function resolvePath(input: string, base: string): string {
  return isAbsolute(input) ? input : resolve(base, input);
}

export {
  type LoadEnvOptions,
  type LoadEnvSummary,
  loadEnvFiles,
} from '@cloud-narrator/shared-infrastructure';
