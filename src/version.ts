import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

let cachedVersion: string | null = null;

function readVersion(candidate: string): string | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
    if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  } catch {
    return null;
  }
  return null;
}

/** Version from the nearest package.json; works from both src/ and dist/src/. */
export function getCliVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  let dir = path.dirname(fileURLToPath(import.meta.url));
  for (let depth = 0; depth < 4; depth++) {
    const version = readVersion(path.join(dir, 'package.json'));
    if (version) {
      cachedVersion = version;
      return version;
    }
    dir = path.dirname(dir);
  }
  return '0.0.0-dev';
}
