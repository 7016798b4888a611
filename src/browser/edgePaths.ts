import { existsSync } from 'node:fs';
import path from 'node:path';

export type EdgeExecutableSource = 'explicit' | 'env' | 'installed' | 'none';

export interface EdgeExecutableLookup {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  exists?: (candidate: string) => boolean;
}

export function resolveEdgeExecutablePath(
  explicitPath?: string | null,
  { platform = process.platform, env = process.env, exists = existsSync }: EdgeExecutableLookup = {},
): {
  path?: string;
  source: EdgeExecutableSource;
} {
  if (explicitPath) {
    return { path: explicitPath, source: 'explicit' };
  }
  const envPath = env.EDGE_PATH;
  if (envPath) {
    return { path: envPath, source: 'env' };
  }
  const installed = edgePathsForPlatform(platform, env).find((candidate) => exists(candidate));
  if (installed) {
    return { path: installed, source: 'installed' };
  }
  return { path: undefined, source: 'none' };
}

export function edgePathsForPlatform(platform: NodeJS.Platform, env: NodeJS.ProcessEnv = process.env): string[] {
  switch (platform) {
    case 'darwin':
      return [
        '/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge',
        '/Applications/Microsoft Edge Beta.app/Contents/MacOS/Microsoft Edge Beta',
        '/Applications/Microsoft Edge Dev.app/Contents/MacOS/Microsoft Edge Dev',
      ];
    case 'win32':
      return [
        resolveWindowsPath(env['ProgramFiles(x86)']),
        resolveWindowsPath(env.ProgramFiles),
        resolveWindowsPath(env.LOCALAPPDATA),
      ].filter((candidate): candidate is string => Boolean(candidate));
    default:
      return [
        '/usr/bin/microsoft-edge',
        '/usr/bin/microsoft-edge-stable',
        '/usr/bin/microsoft-edge-beta',
        '/usr/bin/microsoft-edge-dev',
        '/opt/microsoft/msedge/msedge',
      ];
  }
}

function resolveWindowsPath(root?: string): string | null {
  if (!root) {
    return null;
  }
  return path.win32.join(root, 'Microsoft', 'Edge', 'Application', 'msedge.exe');
}
