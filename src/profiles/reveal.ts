import { spawn } from 'node:child_process';
import type { SearchLogger } from '../logger.js';

export type SpawnDetached = (command: string, args: string[], onError: (error: Error) => void) => void;

const defaultSpawn: SpawnDetached = (command, args, onError) => {
  const child = spawn(command, args, { detached: true, stdio: 'ignore', windowsHide: false });
  child.once('error', onError);
  child.unref();
};

export function revealCommandFor(platform: NodeJS.Platform, directory: string): { command: string; args: string[] } {
  switch (platform) {
    case 'win32':
      return { command: 'explorer', args: [directory] };
    case 'darwin':
      return { command: 'open', args: [directory] };
    default:
      return { command: 'xdg-open', args: [directory] };
  }
}

/** Opens `directory` in the desktop file manager. Failures are logged, never thrown. */
export function createDirectoryRevealer(
  logger: SearchLogger,
  { platform = process.platform, spawnDetached = defaultSpawn }: { platform?: NodeJS.Platform; spawnDetached?: SpawnDetached } = {},
): (directory: string) => void {
  return (directory) => {
    const { command, args } = revealCommandFor(platform, directory);
    const warn = (error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Could not open ${directory} (${message}); open it manually.`);
    };
    try {
      spawnDetached(command, args, warn);
      logger.debug(`Opened ${directory} with ${command}`);
    } catch (error) {
      warn(error);
    }
  };
}
