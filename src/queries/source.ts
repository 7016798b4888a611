import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError } from '../errors.js';
import { QueryPool } from './pool.js';

export const DEFAULT_QUERIES_FILENAME = 'queries.txt';

/** Walks up from this module to the package root, which works from both src/ and dist/src/. */
export function bundledQueriesPath(): string | null {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth++) {
    const candidate = path.join(dir, 'data', DEFAULT_QUERIES_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    dir = path.dirname(dir);
  }
  return null;
}

export interface ResolveQueriesPathOptions {
  explicitPath?: string | null;
  configuredPath?: string | null;
  cwd?: string;
}

export function resolveQueriesPath({ explicitPath, configuredPath, cwd = process.cwd() }: ResolveQueriesPathOptions): string {
  const requested = explicitPath ?? configuredPath;
  if (requested) {
    const resolved = path.resolve(cwd, requested);
    if (!existsSync(resolved)) {
      throw new ConfigurationError(`Queries file not found: ${resolved}`, { path: resolved });
    }
    return resolved;
  }
  const local = path.join(cwd, DEFAULT_QUERIES_FILENAME);
  if (existsSync(local)) {
    return local;
  }
  const bundled = bundledQueriesPath();
  if (bundled) {
    return bundled;
  }
  throw new ConfigurationError(`No ${DEFAULT_QUERIES_FILENAME} found in ${cwd} and no bundled query list is available.`);
}

export async function loadQueryLines(filePath: string): Promise<string[]> {
  try {
    const raw = await readFile(filePath, 'utf8');
    return raw.split(/\r?\n|\r/u);
  } catch (error) {
    throw new ConfigurationError(`Unable to read queries from ${filePath}`, { path: filePath }, error);
  }
}

export async function loadQueryPool(filePath: string): Promise<QueryPool> {
  return QueryPool.fromLines(await loadQueryLines(filePath));
}
