import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { EDGE_PROCESS_NAMES } from '../../src/browser/constants.js';
import { CancelToken } from '../../src/cancel.js';
import { CancelledError, LockUnresolvedError } from '../../src/errors.js';
import { nodeCopyFileSystem, type CopyFileSystem } from '../../src/profiles/copyTree.js';
import {
  acquireWorkingProfile,
  releaseWorkingProfile,
  type LockPrompter,
  type LockReport,
  type LockResolverDeps,
  type ResolverStateName,
} from '../../src/profiles/lockResolver.js';
import type { LockHolder, LockInspector, ProcessTerminator } from '../../src/profiles/processes.js';
import type { ProfileDescriptor } from '../../src/profiles/registry.js';
import { captureLogger } from '../helpers/logger.js';

let base: string;
let profile: ProfileDescriptor;
let cookies: string;

beforeEach(async () => {
  base = await fs.mkdtemp(path.join(os.tmpdir(), 'lock-resolver-'));
  const rootDir = path.join(base, 'User Data');
  profile = { rootDir, name: 'Profile 1', path: path.join(rootDir, 'Profile 1') };
  cookies = path.join(profile.path, 'Network', 'Cookies');
  await fs.mkdir(path.dirname(cookies), { recursive: true });
  await fs.writeFile(path.join(profile.path, 'Preferences'), '{}');
  await fs.writeFile(cookies, 'cookie-data');
  await fs.writeFile(path.join(profile.path, 'SingletonLock'), '');
});

afterEach(async () => {
  await fs.rm(base, { recursive: true, force: true });
});

function fakePrompter(overrides: Partial<LockPrompter> = {}): LockPrompter {
  return {
    confirmManualCopy: vi.fn<LockPrompter['confirmManualCopy']>(async () => 'copied'),
    acknowledgeLock: vi.fn<LockPrompter['acknowledgeLock']>(async () => 'abort'),
    ...overrides,
  };
}

/** Fails copying the cookie database `times` times with EBUSY, then behaves normally. */
function lockedCookies(times: number): CopyFileSystem {
  let remaining = times;
  return {
    ...nodeCopyFileSystem,
    copyFile: async (from, to) => {
      if (from === cookies && remaining > 0) {
        remaining -= 1;
        throw Object.assign(new Error(`EBUSY: resource busy or locked, copyfile '${from}' -> '${to}'`), { code: 'EBUSY' });
      }
      await nodeCopyFileSystem.copyFile(from, to);
    },
  };
}

function inspectorReturning(holders: LockHolder[]): LockInspector {
  return { toolName: 'lsof', findHolders: vi.fn(async () => holders) };
}

function automaticDeps(overrides: Partial<LockResolverDeps> = {}) {
  const captured = captureLogger();
  const states: ResolverStateName[] = [];
  const workingDir = path.join(base, 'work');
  const deps: LockResolverDeps = {
    logger: captured.logger,
    prompter: fakePrompter(),
    createWorkingDir: async () => {
      await fs.mkdir(workingDir, { recursive: true });
      return workingDir;
    },
    browserProcessNames: EDGE_PROCESS_NAMES,
    sleep: async () => undefined,
    onStateChange: (state) => states.push(state),
    ...overrides,
  };
  return { deps, states, workingDir, captured };
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.stat(target);
    return true;
  } catch {
    return false;
  }
}

describe('acquireWorkingProfile (automatic)', () => {
  test('copies an unlocked profile into a fresh directory', async () => {
    const { deps, states, workingDir, captured } = automaticDeps();

    const working = await acquireWorkingProfile(profile, 'automatic', deps);

    expect(working).toEqual({ sourceProfile: profile, workingDir, policy: 'automatic', ready: true, copied: true });
    expect(states).toEqual(['copying', 'ready']);
    expect(await fs.readFile(path.join(workingDir, 'Network', 'Cookies'), 'utf8')).toBe('cookie-data');
    expect(captured.messages('info')).toContain('Profile copy complete (2 files, 1 lock/link entries skipped).');
  });

  test('terminates Edge when it holds the locked file, then copies again', async () => {
    const terminator: ProcessTerminator = { terminate: vi.fn(async (pid: number) => ({ pid, ok: true as const })) };
    const sleep = vi.fn(async () => undefined);
    const { deps, states } = automaticDeps({
      copyFs: lockedCookies(1),
      lockInspector: inspectorReturning([{ pid: 4120, name: 'msedge' }]),
      terminator,
      lockReleaseDelayMs: 250,
      sleep,
    });

    const working = await acquireWorkingProfile(profile, 'automatic', deps);

    expect(working.ready).toBe(true);
    expect(states).toEqual(['copying', 'inspecting', 'terminating', 'copying', 'ready']);
    expect(terminator.terminate).toHaveBeenCalledWith(4120);
    expect(sleep).toHaveBeenCalledWith(250);
    expect(deps.prompter.acknowledgeLock).not.toHaveBeenCalled();
  });

  test('starts the retry from an empty working directory', async () => {
    const workingDir = path.join(base, 'work');
    const stale = path.join(workingDir, 'Leftover Cache');
    const rm = vi.fn(nodeCopyFileSystem.rm);
    const terminator: ProcessTerminator = {
      terminate: vi.fn(async (pid: number) => {
        // Between passes: a file lands in the copy and the source profile changes.
        await fs.mkdir(workingDir, { recursive: true });
        await fs.writeFile(stale, 'old');
        await fs.rm(path.join(profile.path, 'Preferences'));
        return { pid, ok: true as const };
      }),
    };
    const { deps } = automaticDeps({
      copyFs: { ...lockedCookies(1), rm },
      lockInspector: inspectorReturning([{ pid: 4120, name: 'msedge' }]),
      terminator,
    });

    const working = await acquireWorkingProfile(profile, 'automatic', deps);

    expect(working.ready).toBe(true);
    expect(rm.mock.calls.map(([target]) => target)).toEqual([workingDir, workingDir, workingDir]);
    expect(await exists(stale)).toBe(false);
    expect(await exists(path.join(workingDir, 'Preferences'))).toBe(false);
    expect(await fs.readFile(path.join(workingDir, 'Network', 'Cookies'), 'utf8')).toBe('cookie-data');
  });

  test('asks the operator when no process holds the file and removes the copy on abort', async () => {
    const prompter = fakePrompter();
    const { deps, states, workingDir } = automaticDeps({
      copyFs: lockedCookies(1),
      lockInspector: inspectorReturning([]),
      prompter,
    });

    await expect(acquireWorkingProfile(profile, 'automatic', deps)).rejects.toBeInstanceOf(LockUnresolvedError);

    expect(states).toEqual(['copying', 'inspecting', 'awaiting-operator']);
    const report = vi.mocked(prompter.acknowledgeLock).mock.calls[0]?.[0];
    expect(report?.reason).toBe('no-holders');
    expect(report?.filePath).toBe(cookies);
    expect(await exists(workingDir)).toBe(false);
  });

  test('leaves processes other than Edge to the operator and retries on request', async () => {
    const terminator: ProcessTerminator = { terminate: vi.fn(async (pid: number) => ({ pid, ok: true as const })) };
    const prompter = fakePrompter({ acknowledgeLock: vi.fn<LockPrompter['acknowledgeLock']>(async () => 'retry') });
    const { deps, states } = automaticDeps({
      copyFs: lockedCookies(1),
      lockInspector: inspectorReturning([
        { pid: 4120, name: 'msedge' },
        { pid: 918, name: 'backup-agent' },
      ]),
      terminator,
      prompter,
    });

    const working = await acquireWorkingProfile(profile, 'automatic', deps);

    expect(working.copied).toBe(true);
    expect(states).toEqual(['copying', 'inspecting', 'awaiting-operator', 'copying', 'ready']);
    expect(terminator.terminate).not.toHaveBeenCalled();
    const report = vi.mocked(prompter.acknowledgeLock).mock.calls[0]?.[0];
    expect(report?.reason).toBe('foreign-holders');
    expect(report?.holders).toHaveLength(2);
  });

  test.each<[string, Partial<LockResolverDeps>, LockReport['reason']]>([
    ['no inspector is installed', { lockInspector: null }, 'no-inspector'],
    [
      'the inspector fails',
      {
        lockInspector: {
          toolName: 'lsof',
          findHolders: async () => {
            throw new Error('lsof crashed');
          },
        },
      },
      'inspector-failed',
    ],
    [
      'automatic termination is off',
      { lockInspector: inspectorReturning([{ pid: 4120, name: 'msedge.exe' }]), autoTerminate: false, terminator: { terminate: async (pid) => ({ pid, ok: true }) } },
      'auto-terminate-disabled',
    ],
    [
      'termination fails',
      {
        lockInspector: inspectorReturning([{ pid: 4120, name: 'msedge' }]),
        terminator: { terminate: async (pid) => ({ pid, ok: false, error: 'Access is denied.' }) },
      },
      'termination-failed',
    ],
  ])('reports %s to the operator', async (_label, overrides, reason) => {
    const prompter = fakePrompter();
    const { deps } = automaticDeps({ copyFs: lockedCookies(1), prompter, ...overrides });

    await expect(acquireWorkingProfile(profile, 'automatic', deps)).rejects.toBeInstanceOf(LockUnresolvedError);

    const report = vi.mocked(prompter.acknowledgeLock).mock.calls[0]?.[0];
    expect(report?.reason).toBe(reason);
  });

  test('carries termination failures in the report', async () => {
    const prompter = fakePrompter();
    const { deps } = automaticDeps({
      copyFs: lockedCookies(1),
      prompter,
      lockInspector: inspectorReturning([{ pid: 4120, name: 'msedge' }]),
      terminator: { terminate: async (pid) => ({ pid, ok: false, error: 'Access is denied.' }) },
    });

    await expect(acquireWorkingProfile(profile, 'automatic', deps)).rejects.toThrow(`Could not copy the profile: ${cookies} is locked`);

    const report = vi.mocked(prompter.acknowledgeLock).mock.calls[0]?.[0];
    expect(report?.terminationFailures).toEqual([{ pid: 4120, ok: false, error: 'Access is denied.' }]);
  });

  test('cancelling while the operator decides removes the partial copy', async () => {
    const token = new CancelToken();
    const prompter = fakePrompter({
      acknowledgeLock: () => {
        token.cancel('Interrupted');
        return new Promise<'retry' | 'abort'>(() => undefined);
      },
    });
    const { deps, workingDir } = automaticDeps({ copyFs: lockedCookies(1), lockInspector: null, prompter, token });

    await expect(acquireWorkingProfile(profile, 'automatic', deps)).rejects.toBeInstanceOf(CancelledError);
    expect(await exists(workingDir)).toBe(false);
  });
});

describe('acquireWorkingProfile (operator-assisted)', () => {
  const tempDir = () => `${profile.path}-temp`;

  test('reuses an existing -temp copy without prompting', async () => {
    await fs.mkdir(tempDir());
    const prompter = fakePrompter();
    const { logger } = captureLogger();

    const working = await acquireWorkingProfile(profile, 'operator-assisted', { logger, prompter });

    expect(working).toEqual({ sourceProfile: profile, workingDir: tempDir(), policy: 'operator-assisted', ready: true, copied: false });
    expect(prompter.confirmManualCopy).not.toHaveBeenCalled();
  });

  test('opens the profile folder and re-asks until the copy exists', async () => {
    const revealDirectory = vi.fn();
    let calls = 0;
    const prompter = fakePrompter({
      confirmManualCopy: vi.fn<LockPrompter['confirmManualCopy']>(async () => {
        calls += 1;
        if (calls === 2) {
          await fs.mkdir(tempDir());
        }
        return 'copied';
      }),
    });
    const captured = captureLogger();

    const working = await acquireWorkingProfile(profile, 'operator-assisted', { logger: captured.logger, prompter, revealDirectory });

    expect(working.workingDir).toBe(tempDir());
    expect(revealDirectory).toHaveBeenCalledWith(profile.rootDir);
    expect(vi.mocked(prompter.confirmManualCopy).mock.calls.map(([request]) => request.attempt)).toEqual([1, 2]);
    expect(captured.messages('info')[0]).toBe(`Close Edge, then copy "Profile 1" to "Profile 1-temp" in ${profile.rootDir}.`);
    expect(captured.messages('warn')).toEqual([`${tempDir()} does not exist yet.`]);
  });

  test('stops when the operator cancels', async () => {
    const prompter = fakePrompter({ confirmManualCopy: async () => 'cancel' });
    const { logger } = captureLogger();
    await expect(acquireWorkingProfile(profile, 'operator-assisted', { logger, prompter })).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('releaseWorkingProfile', () => {
  test('removes automatic copies unless asked to keep them', async () => {
    const workingDir = path.join(base, 'work');
    await fs.mkdir(workingDir);
    const working = { sourceProfile: profile, workingDir, policy: 'automatic' as const, ready: true, copied: true };
    const captured = captureLogger();

    await expect(releaseWorkingProfile(working, { logger: captured.logger, keepWorkingCopy: true })).resolves.toBe(false);
    expect(await exists(workingDir)).toBe(true);
    expect(captured.messages('info')).toEqual([`Keeping working copy at ${workingDir}`]);

    await expect(releaseWorkingProfile(working, { logger: captured.logger })).resolves.toBe(true);
    expect(await exists(workingDir)).toBe(false);
  });

  test('never touches operator-made copies', async () => {
    await fs.mkdir(`${profile.path}-temp`);
    const working = {
      sourceProfile: profile,
      workingDir: `${profile.path}-temp`,
      policy: 'operator-assisted' as const,
      ready: true,
      copied: false,
    };
    const { logger } = captureLogger();
    await expect(releaseWorkingProfile(working, { logger })).resolves.toBe(false);
    expect(await exists(`${profile.path}-temp`)).toBe(true);
  });
});
