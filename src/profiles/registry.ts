import os from 'node:os';
import path from 'node:path';
import { readdir, stat } from 'node:fs/promises';
import { ConfigurationError, InvalidSelectionError, NoProfilesFoundError } from '../errors.js';

export type SupportedPlatform = 'win32' | 'darwin' | 'linux';

export interface PlatformEnv {
  homeDir: string;
  localAppData?: string;
}

export interface ProfileDescriptor {
  rootDir: string;
  name: string;
  path: string;
}

export const WORKING_COPY_SUFFIX = '-temp';

const PROFILE_ROOTS: Record<SupportedPlatform, (env: PlatformEnv) => string> = {
  win32: (env) =>
    path.win32.join(env.localAppData ?? path.win32.join(env.homeDir, 'AppData', 'Local'), 'Microsoft', 'Edge', 'User Data'),
  darwin: (env) => path.posix.join(env.homeDir, 'Library', 'Application Support', 'Microsoft Edge'),
  linux: (env) => path.posix.join(env.homeDir, '.config', 'microsoft-edge'),
};

export function isSupportedPlatform(platform: string): platform is SupportedPlatform {
  return Object.prototype.hasOwnProperty.call(PROFILE_ROOTS, platform);
}

export function currentPlatformEnv(): PlatformEnv {
  return { homeDir: os.homedir(), localAppData: process.env.LOCALAPPDATA };
}

export function resolveProfileRoot(platform: string, env: PlatformEnv = currentPlatformEnv()): string {
  if (!isSupportedPlatform(platform)) {
    throw new ConfigurationError(`Unsupported platform "${platform}"; Edge profile discovery knows win32, darwin and linux.`, {
      platform,
    });
  }
  return PROFILE_ROOTS[platform](env);
}

export function isProfileDirectoryName(name: string): boolean {
  const lower = name.toLowerCase();
  if (lower.endsWith(WORKING_COPY_SUFFIX)) {
    return false;
  }
  return lower === 'default' || lower.startsWith('profile');
}

const naturalOrder = new Intl.Collator('en', { numeric: true, sensitivity: 'base' });

export async function listProfileCandidates(rootDir: string): Promise<ProfileDescriptor[]> {
  try {
    const info = await stat(rootDir);
    if (!info.isDirectory()) {
      throw new ConfigurationError(`Edge user data path is not a directory: ${rootDir}`, { code: 'profile-root-missing', rootDir });
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Edge user data directory not found: ${rootDir}`, { code: 'profile-root-missing', rootDir }, error);
  }
  const entries = await readdir(rootDir, { withFileTypes: true });
  const candidates = entries
    .filter((entry) => entry.isDirectory() && isProfileDirectoryName(entry.name))
    .map((entry) => ({ rootDir, name: entry.name, path: path.join(rootDir, entry.name) }))
    .sort((a, b) => naturalOrder.compare(a.name, b.name));
  if (candidates.length === 0) {
    throw new NoProfilesFoundError(rootDir);
  }
  return candidates;
}

/** 1-based; blank input selects the first profile. */
export function selectProfileByIndex(candidates: readonly ProfileDescriptor[], input: string | number | null | undefined): ProfileDescriptor {
  const raw = typeof input === 'number' ? String(input) : (input ?? '').trim();
  if (raw === '') {
    const first = candidates[0];
    if (!first) {
      throw new InvalidSelectionError('There are no profiles to select from.');
    }
    return first;
  }
  if (!/^\d+$/u.test(raw)) {
    throw new InvalidSelectionError(`"${raw}" is not a profile number.`, { input: raw });
  }
  const index = Number.parseInt(raw, 10);
  const selected = index >= 1 ? candidates[index - 1] : undefined;
  if (!selected) {
    throw new InvalidSelectionError(`Profile number must be between 1 and ${candidates.length}.`, { input: raw });
  }
  return selected;
}

export function workingCopyPathFor(profile: ProfileDescriptor): string {
  return `${profile.path}${WORKING_COPY_SUFFIX}`;
}
