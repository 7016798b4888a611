import chalk from 'chalk';
import { resolveSearchConfig, type SearchConfig } from '../browser/config.js';
import { EDGE_PROCESS_NAMES } from '../browser/constants.js';
import type { SessionLauncher } from '../browser/types.js';
import type { CancelToken } from '../cancel.js';
import type { UserConfig } from '../config.js';
import {
  CancelledError,
  categorizeError,
  ConfigurationError,
  describeError,
  describeErrorCategory,
  InvalidSelectionError,
  isErrorLogged,
  markErrorLogged,
} from '../errors.js';
import type { SearchLogger } from '../logger.js';
import {
  acquireWorkingProfile,
  releaseWorkingProfile,
  type LockResolverDeps,
  type WorkingProfile,
} from '../profiles/lockResolver.js';
import type { LockInspector, ProcessTerminator } from '../profiles/processes.js';
import { listProfileCandidates, resolveProfileRoot, selectProfileByIndex, type PlatformEnv, type ProfileDescriptor } from '../profiles/registry.js';
import type { QueryPool } from '../queries/pool.js';
import { loadQueryPool, resolveQueriesPath } from '../queries/source.js';
import { ProgressReporter, type RunSummary } from '../report/reporter.js';
import { SessionDriver } from '../session/driver.js';
import type { SessionOutcome } from '../session/types.js';
import type { CliOptions } from './options.js';
import type { OperatorPrompter } from './prompts.js';

export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  cancelled: 130,
} as const;

/** Defaults ← config file ← environment ← command-line flags. */
export function buildSearchConfig(userConfig: UserConfig | undefined, options: CliOptions, env: NodeJS.ProcessEnv = process.env): SearchConfig {
  const config = resolveSearchConfig(userConfig, env);
  return {
    ...config,
    edgePath: options.edgePath ?? config.edgePath,
    headless: options.headless ?? config.headless,
    maxAttempts: options.maxAttempts ?? config.maxAttempts,
    waitForLogin: options.waitForLogin ?? config.waitForLogin,
    loginTimeoutMs: options.loginTimeout ?? config.loginTimeoutMs,
    policy: options.policy ?? config.policy,
    autoTerminate: options.autoTerminate ?? config.autoTerminate,
    keepWorkingCopy: options.keepWorkingCopy ?? config.keepWorkingCopy,
    queriesFile: options.queries ?? config.queriesFile,
    profileRoot: options.profileRoot ?? config.profileRoot,
    logFile: options.logFile ?? config.logFile,
  };
}

export interface RunSearchDeps {
  logger: SearchLogger;
  prompter: OperatorPrompter;
  token: CancelToken;
  launcher: SessionLauncher;
  lockInspector: LockInspector | null;
  terminator: ProcessTerminator;
  revealDirectory?: (directory: string) => void;
  platform?: string;
  platformEnv?: PlatformEnv;
  cwd?: string;
  /** Overrides for tests: working-dir creation, copy fs, sleeps. */
  resolverOverrides?: Partial<Pick<LockResolverDeps, 'createWorkingDir' | 'copyFs' | 'pathExists' | 'sleep'>>;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RunSearchResult {
  exitCode: number;
  outcome: SessionOutcome;
  summary: RunSummary;
  workingProfile: WorkingProfile;
}

export async function loadPoolWithStats(config: SearchConfig, logger: SearchLogger, cwd?: string): Promise<QueryPool> {
  const queriesPath = resolveQueriesPath({ explicitPath: config.queriesFile, cwd });
  const pool = await loadQueryPool(queriesPath);
  const stats = pool.stats();
  logger(`Loaded ${stats.total} queries (${stats.unique} unique) from ${queriesPath}`);
  if (stats.duplicateCount > 0) {
    logger.warn(`${stats.duplicateCount} queries appear more than once:`);
    for (const duplicate of stats.duplicates) {
      logger.warn(`  "${duplicate.query}" appears ${duplicate.count} times`);
    }
    if (stats.duplicateCount > stats.duplicates.length) {
      logger.warn(`  ...and ${stats.duplicateCount - stats.duplicates.length} more`);
    }
  }
  if (pool.size === 0) {
    throw new ConfigurationError(`No queries found in ${queriesPath}`, { path: queriesPath });
  }
  return pool;
}

async function chooseProfile(
  candidates: readonly ProfileDescriptor[],
  requested: string | undefined,
  prompter: OperatorPrompter,
  logger: SearchLogger,
): Promise<ProfileDescriptor> {
  if (requested !== undefined) {
    try {
      return selectProfileByIndex(candidates, requested);
    } catch (error) {
      if (!(error instanceof InvalidSelectionError)) {
        throw error;
      }
      logger.warn(`${describeErrorCategory('invalid-selection')}: ${error.message}`);
    }
  }
  return prompter.chooseProfile(candidates);
}

function exitCodeFor(outcome: SessionOutcome): number {
  if (outcome.status === 'completed') {
    return EXIT_CODES.ok;
  }
  return outcome.reason === 'cancelled' ? EXIT_CODES.cancelled : EXIT_CODES.failure;
}

/** The whole run: queries → profile → working copy → searches → cleanup. */
export async function runSearchCommand(options: CliOptions, userConfig: UserConfig | undefined, deps: RunSearchDeps): Promise<RunSearchResult> {
  const { logger, prompter, token } = deps;
  const config = buildSearchConfig(userConfig, options);
  const pool = await loadPoolWithStats(config, logger, deps.cwd);

  const rootDir = config.profileRoot ?? resolveProfileRoot(deps.platform ?? process.platform, deps.platformEnv);
  logger.debug(`Edge user data root: ${rootDir}`);
  const candidates = await listProfileCandidates(rootDir);
  const profile = await chooseProfile(candidates, options.profile, prompter, logger);
  token.throwIfCancelled();
  const searchCount = options.count ?? (await prompter.askSearchCount());
  const policy = options.policy ?? (await prompter.choosePolicy(config.policy));
  logger(`Profile: ${chalk.bold(profile.name)} | searches: ${searchCount} | copy: ${policy}`);

  const workingProfile = await acquireWorkingProfile(profile, policy, {
    logger,
    prompter,
    token,
    revealDirectory: deps.revealDirectory,
    lockInspector: deps.lockInspector,
    terminator: deps.terminator,
    browserProcessNames: EDGE_PROCESS_NAMES,
    autoTerminate: config.autoTerminate,
    lockReleaseDelayMs: config.lockReleaseDelayMs,
    ...deps.resolverOverrides,
  });

  const reporter = new ProgressReporter(logger);
  const driver = new SessionDriver(config, {
    launcher: deps.launcher,
    logger,
    token,
    sleep: deps.sleep,
    random: deps.random,
    onEvent: (event) => reporter.handle(event),
  });
  try {
    const outcome = await driver.run(workingProfile.workingDir, pool, searchCount);
    return { exitCode: exitCodeFor(outcome), outcome, summary: reporter.summary(), workingProfile };
  } finally {
    try {
      await releaseWorkingProfile(workingProfile, {
        logger,
        keepWorkingCopy: config.keepWorkingCopy,
        copyFs: deps.resolverOverrides?.copyFs,
      });
    } catch (error) {
      logger.warn(`Could not remove working copy ${workingProfile.workingDir}: ${describeError(error)}`);
    }
  }
}

/** Prints a categorized one-line message (stack only when verbose) and picks the exit code. */
export function reportFatalError(error: unknown, logger: SearchLogger): number {
  if (error instanceof CancelledError) {
    logger.warn(error.message);
    return EXIT_CODES.cancelled;
  }
  if (error instanceof Error && isErrorLogged(error)) {
    return EXIT_CODES.failure;
  }
  const category = categorizeError(error);
  logger.error(`✖ ${describeErrorCategory(category)}: ${describeError(error)}`);
  if (error instanceof Error) {
    if (logger.verbose && error.stack) {
      logger.debug(error.stack);
    }
    markErrorLogged(error);
  }
  return EXIT_CODES.failure;
}
