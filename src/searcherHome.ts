import os from 'node:os';
import path from 'node:path';

let homeDirOverride: string | null = null;

export function getSearcherHomeDir(): string {
  return homeDirOverride ?? process.env.EDGE_AUTOSEARCH_HOME_DIR ?? path.join(os.homedir(), '.edge-autosearch');
}

export function setSearcherHomeDirOverrideForTest(dir: string | null): void {
  homeDirOverride = dir;
}
