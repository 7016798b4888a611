import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import type { CancelToken } from '../cancel.js';
import { err, ok, type Result } from '../result.js';

/** The subset of node:fs/promises the copier touches; tests swap in failing variants. */
export interface CopyFileSystem {
  readdir(dir: string): Promise<Dirent[]>;
  mkdir(dir: string): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
  rm(target: string): Promise<void>;
}

export const nodeCopyFileSystem: CopyFileSystem = {
  readdir: (dir) => fs.readdir(dir, { withFileTypes: true }),
  mkdir: async (dir) => {
    await fs.mkdir(dir, { recursive: true });
  },
  copyFile: (source, destination) => fs.copyFile(source, destination),
  rm: (target) => fs.rm(target, { recursive: true, force: true }),
};

// Lock artefacts a running Edge writes beside its profile data.
const LOCK_ARTIFACT_NAMES = new Set(['singletonlock', 'singletonsocket', 'singletoncookie', 'lockfile']);
const LOCK_ARTIFACT_SUFFIXES = ['.lock', '.tmp'];

export function isLockArtifact(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return LOCK_ARTIFACT_NAMES.has(lower) || LOCK_ARTIFACT_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

export type CopyFailureKind = 'locked' | 'io';

export interface CopyFailure {
  kind: CopyFailureKind;
  /** Source file (or directory) the copy stopped on. */
  filePath: string;
  detail: string;
  filesCopied: number;
  cause: unknown;
}

export interface CopyStats {
  filesCopied: number;
  directoriesCreated: number;
  skipped: number;
}

const LOCK_ERROR_CODES = new Set(['EBUSY', 'ETXTBSY']);
const LOCK_MESSAGE_PATTERN = /being used by another process|sharing violation|resource busy or locked|WinError 32/i;

export function isFileInUseError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  if (code && LOCK_ERROR_CODES.has(code)) {
    return true;
  }
  const message = error instanceof Error ? error.message : '';
  return LOCK_MESSAGE_PATTERN.test(message);
}

/**
 * Pulls the offending file out of an fs error: the `path` field first, then the first
 * quoted path in the message (`EBUSY: resource busy or locked, copyfile 'a' -> 'b'`).
 */
export function extractLockedPath(error: unknown, fallback: string): string {
  if (error && typeof error === 'object' && 'path' in error && typeof error.path === 'string' && error.path) {
    return error.path;
  }
  const message = error instanceof Error ? error.message : String(error ?? '');
  const quoted = /'([^']+)'/u.exec(message);
  return quoted?.[1] ?? fallback;
}

export interface CopyProfileTreeOptions {
  fs?: CopyFileSystem;
  token?: CancelToken;
  onFileCopied?: (relativePath: string, filesCopied: number) => void;
}

/**
 * Copies `source` into a freshly emptied `destination`, file by file. Stops at the first
 * failing file; the caller decides whether to retry the whole copy.
 */
export async function copyProfileTree(
  source: string,
  destination: string,
  { fs: fileSystem = nodeCopyFileSystem, token, onFileCopied }: CopyProfileTreeOptions = {},
): Promise<Result<CopyStats, CopyFailure>> {
  const stats: CopyStats = { filesCopied: 0, directoriesCreated: 0, skipped: 0 };
  const fail = (filePath: string, error: unknown): Result<CopyStats, CopyFailure> =>
    err({
      kind: isFileInUseError(error) ? 'locked' : 'io',
      filePath: isFileInUseError(error) ? extractLockedPath(error, filePath) : filePath,
      detail: error instanceof Error ? error.message : String(error),
      filesCopied: stats.filesCopied,
      cause: error,
    });

  try {
    await fileSystem.rm(destination);
    await fileSystem.mkdir(destination);
  } catch (error) {
    return fail(destination, error);
  }

  const pending: string[] = [''];
  while (pending.length > 0) {
    const relativeDir = pending.shift() ?? '';
    const sourceDir = path.join(source, relativeDir);
    let entries: Dirent[];
    try {
      entries = await fileSystem.readdir(sourceDir);
    } catch (error) {
      return fail(sourceDir, error);
    }
    for (const entry of entries) {
      token?.throwIfCancelled();
      const relativePath = path.join(relativeDir, entry.name);
      const from = path.join(source, relativePath);
      const to = path.join(destination, relativePath);
      if (entry.isSymbolicLink() || isLockArtifact(entry.name)) {
        stats.skipped += 1;
        continue;
      }
      if (entry.isDirectory()) {
        try {
          await fileSystem.mkdir(to);
        } catch (error) {
          return fail(from, error);
        }
        stats.directoriesCreated += 1;
        pending.push(relativePath);
        continue;
      }
      if (!entry.isFile()) {
        stats.skipped += 1;
        continue;
      }
      try {
        await fileSystem.copyFile(from, to);
      } catch (error) {
        return fail(from, error);
      }
      stats.filesCopied += 1;
      onFileCopied?.(relativePath, stats.filesCopied);
    }
  }
  return ok(stats);
}
