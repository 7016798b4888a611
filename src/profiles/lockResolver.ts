import { mkdtemp, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { delay } from '../browser/utils.js';
import { CancelToken } from '../cancel.js';
import type { CopyPolicy } from '../config.js';
import { CancelledError, describeError, describeErrorCategory, LockUnresolvedError } from '../errors.js';
import type { SearchLogger } from '../logger.js';
import { copyProfileTree, nodeCopyFileSystem, type CopyFailure, type CopyFileSystem, type CopyStats } from './copyTree.js';
import { matchesBrowserProcess, type LockHolder, type LockInspector, type ProcessTerminator, type TerminationResult } from './processes.js';
import { workingCopyPathFor, type ProfileDescriptor } from './registry.js';

export type { CopyPolicy };

export interface WorkingProfile {
  sourceProfile: ProfileDescriptor;
  workingDir: string;
  policy: CopyPolicy;
  ready: boolean;
  /** True when this run copied the profile (false when an existing copy was reused). */
  copied: boolean;
}

export type LockReportReason =
  | 'copy-failed'
  | 'no-inspector'
  | 'inspector-failed'
  | 'no-holders'
  | 'foreign-holders'
  | 'auto-terminate-disabled'
  | 'termination-failed';

export interface LockReport {
  reason: LockReportReason;
  filePath: string;
  detail: string;
  holders: LockHolder[];
  terminationFailures: TerminationResult[];
}

export interface ManualCopyRequest {
  sourceDir: string;
  expectedDir: string;
  attempt: number;
}

export interface LockPrompter {
  confirmManualCopy(request: ManualCopyRequest): Promise<'copied' | 'cancel'>;
  acknowledgeLock(report: LockReport): Promise<'retry' | 'abort'>;
}

export type ResolverStateName = 'copying' | 'inspecting' | 'terminating' | 'awaiting-operator' | 'ready';

type AutomaticState =
  | { name: 'copying' }
  | { name: 'inspecting'; failure: CopyFailure }
  | { name: 'terminating'; failure: CopyFailure; holders: LockHolder[] }
  | { name: 'awaiting-operator'; report: LockReport }
  | { name: 'ready'; stats: CopyStats };

type PendingState = Exclude<AutomaticState, { name: 'ready' }>;

export interface LockResolverDeps {
  logger: SearchLogger;
  prompter: LockPrompter;
  token?: CancelToken;
  revealDirectory?: (directory: string) => void;
  lockInspector?: LockInspector | null;
  terminator?: ProcessTerminator | null;
  copyFs?: CopyFileSystem;
  pathExists?: (target: string) => Promise<boolean>;
  createWorkingDir?: () => Promise<string>;
  browserProcessNames?: readonly string[];
  autoTerminate?: boolean;
  lockReleaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onStateChange?: (state: ResolverStateName) => void;
}

async function directoryExists(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

function createTempWorkingDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'edge-autosearch-'));
}

function describeHolders(holders: readonly LockHolder[]): string {
  return holders.map((holder) => `${holder.name || 'unknown'} (pid ${holder.pid})`).join(', ');
}

/**
 * Produces a ready working copy of `descriptor`. Rejects with LockUnresolvedError when the
 * operator gives up on a lock and CancelledError when the token fires; in both cases no
 * partial automatic copy is left behind.
 */
export async function acquireWorkingProfile(
  descriptor: ProfileDescriptor,
  policy: CopyPolicy,
  deps: LockResolverDeps,
): Promise<WorkingProfile> {
  return policy === 'automatic' ? acquireAutomatically(descriptor, deps) : acquireWithOperator(descriptor, deps);
}

async function acquireWithOperator(descriptor: ProfileDescriptor, deps: LockResolverDeps): Promise<WorkingProfile> {
  const { logger, prompter } = deps;
  const token = deps.token ?? new CancelToken();
  const exists = deps.pathExists ?? directoryExists;
  const workingDir = workingCopyPathFor(descriptor);
  const ready = (): WorkingProfile => ({
    sourceProfile: descriptor,
    workingDir,
    policy: 'operator-assisted',
    ready: true,
    copied: false,
  });

  token.throwIfCancelled();
  if (await exists(workingDir)) {
    logger(`Using existing working copy ${workingDir}`);
    return ready();
  }

  logger(`Close Edge, then copy "${descriptor.name}" to "${path.basename(workingDir)}" in ${descriptor.rootDir}.`);
  deps.revealDirectory?.(descriptor.rootDir);
  for (let attempt = 1; ; attempt++) {
    token.throwIfCancelled();
    const answer = await token.race(
      prompter.confirmManualCopy({ sourceDir: descriptor.path, expectedDir: workingDir, attempt }),
    );
    if (answer === 'cancel') {
      throw new CancelledError('Cancelled while waiting for the profile copy');
    }
    if (await exists(workingDir)) {
      logger(`Found working copy ${workingDir}`);
      return ready();
    }
    logger.warn(`${workingDir} does not exist yet.`);
  }
}

async function acquireAutomatically(descriptor: ProfileDescriptor, deps: LockResolverDeps): Promise<WorkingProfile> {
  const { logger } = deps;
  const token = deps.token ?? new CancelToken();
  const copyFs = deps.copyFs ?? nodeCopyFileSystem;
  const createWorkingDir = deps.createWorkingDir ?? createTempWorkingDir;
  token.throwIfCancelled();
  const workingDir = await createWorkingDir();
  logger(`Copying profile "${descriptor.name}" to ${workingDir}`);

  const context: AutomaticContext = { descriptor, workingDir, deps, token, copyFs };
  let state: PendingState = { name: 'copying' };
  let stats: CopyStats | null = null;
  try {
    while (stats === null) {
      token.throwIfCancelled();
      deps.onStateChange?.(state.name);
      const next = await advance(state, context);
      if (next.name === 'ready') {
        stats = next.stats;
      } else {
        state = next;
      }
    }
  } catch (error) {
    await removeQuietly(workingDir, copyFs, logger);
    throw error;
  }
  deps.onStateChange?.('ready');
  logger(`Profile copy complete (${stats.filesCopied} files, ${stats.skipped} lock/link entries skipped).`);
  return { sourceProfile: descriptor, workingDir, policy: 'automatic', ready: true, copied: true };
}

interface AutomaticContext {
  descriptor: ProfileDescriptor;
  workingDir: string;
  deps: LockResolverDeps;
  token: CancelToken;
  copyFs: CopyFileSystem;
}

async function advance(state: PendingState, context: AutomaticContext): Promise<AutomaticState> {
  switch (state.name) {
    case 'copying':
      return copyStep(context);
    case 'inspecting':
      return inspectStep(state.failure, context);
    case 'terminating':
      return terminateStep(state.failure, state.holders, context);
    case 'awaiting-operator':
      return awaitOperatorStep(state.report, context);
  }
}

async function copyStep({ descriptor, workingDir, token, copyFs, deps }: AutomaticContext): Promise<AutomaticState> {
  const result = await copyProfileTree(descriptor.path, workingDir, { fs: copyFs, token });
  if (result.ok) {
    return { name: 'ready', stats: result.value };
  }
  const failure = result.error;
  // Never keep a partial tree around while waiting on the lock.
  await removeQuietly(workingDir, copyFs, deps.logger);
  if (failure.kind === 'locked') {
    deps.logger.warn(`${describeErrorCategory('lock-contention')}: ${failure.filePath} (after ${failure.filesCopied} files)`);
    return { name: 'inspecting', failure };
  }
  deps.logger.error(`Copy failed at ${failure.filePath}: ${failure.detail}`);
  return { name: 'awaiting-operator', report: buildReport('copy-failed', failure) };
}

async function inspectStep(failure: CopyFailure, { deps, token }: AutomaticContext): Promise<AutomaticState> {
  const inspector = deps.lockInspector ?? null;
  if (!inspector) {
    deps.logger.debug('No lock-inspection tool available; asking the operator.');
    return { name: 'awaiting-operator', report: buildReport('no-inspector', failure) };
  }
  let holders: LockHolder[];
  try {
    holders = await token.race(inspector.findHolders(failure.filePath));
  } catch (error) {
    if (error instanceof CancelledError) {
      throw error;
    }
    deps.logger.warn(`${inspector.toolName} could not inspect ${failure.filePath}: ${describeError(error)}`);
    return { name: 'awaiting-operator', report: buildReport('inspector-failed', failure) };
  }
  if (holders.length === 0) {
    return { name: 'awaiting-operator', report: buildReport('no-holders', failure) };
  }
  deps.logger(`Held open by ${describeHolders(holders)}`);
  const browserNames = deps.browserProcessNames ?? [];
  if (!holders.every((holder) => matchesBrowserProcess(holder.name, browserNames))) {
    return { name: 'awaiting-operator', report: buildReport('foreign-holders', failure, holders) };
  }
  if (deps.autoTerminate === false || !deps.terminator) {
    return { name: 'awaiting-operator', report: buildReport('auto-terminate-disabled', failure, holders) };
  }
  return { name: 'terminating', failure, holders };
}

async function terminateStep(failure: CopyFailure, holders: LockHolder[], { deps }: AutomaticContext): Promise<AutomaticState> {
  const { logger, terminator } = deps;
  if (!terminator) {
    return { name: 'awaiting-operator', report: buildReport('auto-terminate-disabled', failure, holders) };
  }
  const results: TerminationResult[] = [];
  for (const holder of holders) {
    logger(`Terminating ${holder.name} (pid ${holder.pid})`);
    results.push(await terminator.terminate(holder.pid));
  }
  const failures = results.filter((result) => !result.ok);
  if (failures.length > 0) {
    return { name: 'awaiting-operator', report: buildReport('termination-failed', failure, holders, failures) };
  }
  const sleep = deps.sleep ?? delay;
  await sleep(deps.lockReleaseDelayMs ?? 1_000);
  logger('Lock holders terminated; copying again from scratch.');
  return { name: 'copying' };
}

async function awaitOperatorStep(report: LockReport, { deps, token }: AutomaticContext): Promise<AutomaticState> {
  const answer = await token.race(deps.prompter.acknowledgeLock(report));
  if (answer === 'abort') {
    throw new LockUnresolvedError(`Could not copy the profile: ${report.filePath} is locked (${report.detail})`, {
      filePath: report.filePath,
      reason: report.reason,
      holders: report.holders,
    });
  }
  deps.logger('Retrying the profile copy from scratch.');
  return { name: 'copying' };
}

function buildReport(
  reason: LockReportReason,
  failure: CopyFailure,
  holders: LockHolder[] = [],
  terminationFailures: TerminationResult[] = [],
): LockReport {
  return { reason, filePath: failure.filePath, detail: failure.detail, holders, terminationFailures };
}

async function removeQuietly(target: string, copyFs: CopyFileSystem, logger: SearchLogger): Promise<void> {
  try {
    await copyFs.rm(target);
  } catch (error) {
    logger.warn(`Could not remove partial copy ${target}: ${describeError(error)}`);
  }
}

export interface ReleaseOptions {
  logger: SearchLogger;
  keepWorkingCopy?: boolean;
  copyFs?: CopyFileSystem;
}

/** Deletes a temp copy made by the automatic policy; `-temp` copies belong to the operator and stay. */
export async function releaseWorkingProfile(working: WorkingProfile, { logger, keepWorkingCopy = false, copyFs = nodeCopyFileSystem }: ReleaseOptions): Promise<boolean> {
  if (working.policy !== 'automatic' || !working.copied) {
    return false;
  }
  if (keepWorkingCopy) {
    logger(`Keeping working copy at ${working.workingDir}`);
    return false;
  }
  await copyFs.rm(working.workingDir);
  logger.debug(`Removed working copy ${working.workingDir}`);
  return true;
}
