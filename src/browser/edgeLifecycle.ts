import os from 'node:os';
import CDP from 'chrome-remote-interface';
import { launch, type LaunchedChrome } from 'chrome-launcher';
import { BrowserLaunchError, describeError } from '../errors.js';
import type { BrowserLogger, ChromeClient, LaunchSessionOptions } from './types.js';
import { EDGE_LAUNCH_FLAGS } from './constants.js';
import { resolveEdgeExecutablePath } from './edgePaths.js';

export type LaunchFn = typeof launch;

export async function launchEdge(
  options: LaunchSessionOptions,
  userDataDir: string,
  logger: BrowserLogger,
  launchImpl: LaunchFn = launch,
): Promise<LaunchedChrome> {
  const resolvedExecutable = resolveEdgeExecutablePath(options.edgePath);
  if (!resolvedExecutable.path) {
    throw new BrowserLaunchError(
      'Microsoft Edge was not found. Install Edge or point --edge-path (or EDGE_PATH) at its executable.',
      { userDataDir },
    );
  }
  const debugPort = options.debugPort ?? parseDebugPortEnv();
  const chromeFlags = buildEdgeFlags(options.headless);
  logger.debug(`Edge executable (${resolvedExecutable.source}): ${resolvedExecutable.path}`);
  let chrome: LaunchedChrome;
  try {
    chrome = await launchImpl({
      chromePath: resolvedExecutable.path,
      chromeFlags,
      userDataDir,
      handleSIGINT: false,
      port: debugPort ?? undefined,
    });
  } catch (error) {
    throw new BrowserLaunchError(
      `Failed to launch Edge: ${describeError(error)}`,
      { userDataDir, edgePath: resolvedExecutable.path },
      error,
    );
  }
  const pidLabel = typeof chrome.pid === 'number' ? ` (pid ${chrome.pid})` : '';
  logger(`Launched Edge${pidLabel} on port ${chrome.port}`);
  return chrome;
}

export async function connectToEdge(port: number, target: string, logger: BrowserLogger): Promise<ChromeClient> {
  const client = await CDP({ port, target });
  logger.debug(`Connected to DevTools target ${target}`);
  return client;
}

export function buildEdgeFlags(headless: boolean, platform: NodeJS.Platform = process.platform): string[] {
  const flags: string[] = [...EDGE_LAUNCH_FLAGS, '--lang=en-US'];

  if (platform !== 'win32' && !isWsl(platform)) {
    flags.push('--password-store=basic', '--use-mock-keychain');
  }

  if (headless) {
    flags.push('--headless=new');
  }

  return flags;
}

export function parseDebugPortEnv(raw: string | undefined = process.env.EDGE_AUTOSEARCH_DEBUG_PORT): number | null {
  if (!raw) return null;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0 || value > 65535) {
    return null;
  }
  return value;
}

function isWsl(platform: NodeJS.Platform): boolean {
  if (platform !== 'linux') {
    return false;
  }
  if (process.env.WSL_DISTRO_NAME) {
    return true;
  }
  return os.release().toLowerCase().includes('microsoft');
}
