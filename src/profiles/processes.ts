import { execFile } from 'node:child_process';
import path from 'node:path';
import { promisify } from 'node:util';
import { delay } from '../browser/utils.js';

const execFileAsync = promisify(execFile);

export interface LockHolder {
  pid: number;
  name: string;
}

/** Optional capability: lists the processes holding a file open. */
export interface LockInspector {
  readonly toolName: string;
  findHolders(filePath: string): Promise<LockHolder[]>;
}

export type TerminationResult = { pid: number; ok: true } | { pid: number; ok: false; error: string };

export interface ProcessTerminator {
  terminate(pid: number): Promise<TerminationResult>;
}

export type ExecFileFn = (file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const defaultExec: ExecFileFn = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, { maxBuffer: 10 * 1024 * 1024, windowsHide: true });
  return { stdout: String(stdout ?? ''), stderr: String(stderr ?? '') };
};

/**
 * Parses `lsof -F pc` output: one `p<pid>` line per process followed by its `c<command>` line.
 */
export function parseLsofOutput(stdout: string): LockHolder[] {
  const holders: LockHolder[] = [];
  let current: LockHolder | null = null;
  for (const line of stdout.split(/\r?\n/u)) {
    if (line.startsWith('p')) {
      const pid = Number.parseInt(line.slice(1), 10);
      current = Number.isFinite(pid) ? { pid, name: '' } : null;
      if (current) {
        holders.push(current);
      }
    } else if (line.startsWith('c') && current) {
      current.name = line.slice(1);
    }
  }
  return dedupeHolders(holders);
}

/**
 * Parses Sysinternals `handle` output, e.g.
 * `msedge.exe         pid: 4120   type: File           2C4: C:\Users\me\...\Cookies`.
 */
export function parseHandleOutput(stdout: string): LockHolder[] {
  const holders: LockHolder[] = [];
  const pattern = /^\s*(\S.*?)\s+pid:\s*(\d+)\s/iu;
  for (const line of stdout.split(/\r?\n/u)) {
    const match = pattern.exec(line);
    if (match?.[1] && match[2]) {
      holders.push({ name: match[1].trim(), pid: Number.parseInt(match[2], 10) });
    }
  }
  return dedupeHolders(holders);
}

function dedupeHolders(holders: LockHolder[]): LockHolder[] {
  const seen = new Map<number, LockHolder>();
  for (const holder of holders) {
    if (!seen.has(holder.pid)) {
      seen.set(holder.pid, holder);
    }
  }
  return [...seen.values()];
}

function exitCodeOf(error: unknown): number | string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'number' || typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function createLsofInspector(exec: ExecFileFn = defaultExec, executable = 'lsof'): LockInspector {
  return {
    toolName: executable,
    async findHolders(filePath) {
      try {
        const { stdout } = await exec(executable, ['-F', 'pc', '--', filePath]);
        return parseLsofOutput(stdout);
      } catch (error) {
        // lsof exits 1 when nothing holds the file.
        if (exitCodeOf(error) === 1) {
          return [];
        }
        throw error;
      }
    },
  };
}

export function createHandleInspector(exec: ExecFileFn = defaultExec, executable = 'handle.exe'): LockInspector {
  return {
    toolName: executable,
    async findHolders(filePath) {
      const { stdout } = await exec(executable, ['-accepteula', '-nobanner', filePath]);
      return parseHandleOutput(stdout);
    },
  };
}

async function isOnPath(executable: string, platform: NodeJS.Platform, exec: ExecFileFn): Promise<boolean> {
  try {
    await exec(platform === 'win32' ? 'where' : 'which', [executable]);
    return true;
  } catch {
    return false;
  }
}

export interface DetectLockInspectorOptions {
  platform?: NodeJS.Platform;
  exec?: ExecFileFn;
  /** Explicit path to lsof / handle; skips PATH detection. */
  executable?: string | null;
}

/** Resolves the platform's lock-inspection tool, or null when none is installed. */
export async function detectLockInspector({
  platform = process.platform,
  exec = defaultExec,
  executable,
}: DetectLockInspectorOptions = {}): Promise<LockInspector | null> {
  if (platform === 'win32') {
    const candidates = executable ? [executable] : ['handle64.exe', 'handle.exe'];
    for (const candidate of candidates) {
      if (executable || (await isOnPath(candidate, platform, exec))) {
        return createHandleInspector(exec, candidate);
      }
    }
    return null;
  }
  const lsof = executable ?? 'lsof';
  if (executable || (await isOnPath(lsof, platform, exec))) {
    return createLsofInspector(exec, lsof);
  }
  return null;
}

export function isProcessAlive(pid: number): boolean {
  if (!Number.isFinite(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means "exists but no permission"; treat as alive.
    return exitCodeOf(error) === 'EPERM';
  }
}

export interface ProcessTerminatorOptions {
  platform?: NodeJS.Platform;
  exec?: ExecFileFn;
  kill?: (pid: number, signal: NodeJS.Signals) => void;
  isAlive?: (pid: number) => boolean;
  /** How long to wait for a process to exit before escalating / giving up. */
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export function createProcessTerminator({
  platform = process.platform,
  exec = defaultExec,
  kill = (pid, signal) => process.kill(pid, signal),
  isAlive = isProcessAlive,
  timeoutMs = 3_000,
  pollIntervalMs = 100,
}: ProcessTerminatorOptions = {}): ProcessTerminator {
  const waitForExit = async (pid: number): Promise<boolean> => {
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (!isAlive(pid)) {
        return true;
      }
      await delay(pollIntervalMs);
    }
    return !isAlive(pid);
  };

  return {
    async terminate(pid) {
      try {
        if (platform === 'win32') {
          await exec('taskkill', ['/F', '/PID', String(pid)]);
        } else {
          kill(pid, 'SIGTERM');
          if (!(await waitForExit(pid))) {
            kill(pid, 'SIGKILL');
          }
        }
      } catch (error) {
        if (!isAlive(pid)) {
          return { pid, ok: true };
        }
        const message = error instanceof Error ? error.message : String(error);
        return { pid, ok: false, error: message };
      }
      if (await waitForExit(pid)) {
        return { pid, ok: true };
      }
      return { pid, ok: false, error: `process ${pid} still running after ${timeoutMs}ms` };
    },
  };
}

/** Compares process names without case or a trailing `.exe`. */
export function matchesBrowserProcess(processName: string, browserNames: readonly string[]): boolean {
  const normalize = (value: string) => path.basename(value.trim().toLowerCase()).replace(/\.exe$/u, '');
  const candidate = normalize(processName);
  if (!candidate) {
    return false;
  }
  return browserNames.some((name) => normalize(name) === candidate);
}
