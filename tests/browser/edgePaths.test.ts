import { describe, expect, test } from 'vitest';
import { edgePathsForPlatform, resolveEdgeExecutablePath } from '../../src/browser/edgePaths.js';

describe('resolveEdgeExecutablePath', () => {
  test('prefers an explicit path, then EDGE_PATH', () => {
    expect(resolveEdgeExecutablePath('/custom/msedge', { env: { EDGE_PATH: '/env/msedge' } })).toEqual({
      path: '/custom/msedge',
      source: 'explicit',
    });
    expect(resolveEdgeExecutablePath(null, { env: { EDGE_PATH: '/env/msedge' } })).toEqual({ path: '/env/msedge', source: 'env' });
  });

  test('falls back to the first installed channel', () => {
    const installed = new Set(['/usr/bin/microsoft-edge-beta', '/opt/microsoft/msedge/msedge']);
    expect(resolveEdgeExecutablePath(undefined, { platform: 'linux', env: {}, exists: (candidate) => installed.has(candidate) })).toEqual({
      path: '/usr/bin/microsoft-edge-beta',
      source: 'installed',
    });
  });

  test('reports none when Edge is not installed', () => {
    expect(resolveEdgeExecutablePath(undefined, { platform: 'darwin', env: {}, exists: () => false })).toEqual({
      path: undefined,
      source: 'none',
    });
  });
});

describe('edgePathsForPlatform', () => {
  test('builds Windows candidates from the program folders that are set', () => {
    expect(edgePathsForPlatform('win32', { ProgramFiles: 'C:\\Program Files', LOCALAPPDATA: 'C:\\Users\\tester\\AppData\\Local' })).toEqual([
      'C:\\Program Files\\Microsoft\\Edge\\Application\\msedge.exe',
      'C:\\Users\\tester\\AppData\\Local\\Microsoft\\Edge\\Application\\msedge.exe',
    ]);
  });

  test('lists the stable macOS app first', () => {
    expect(edgePathsForPlatform('darwin', {})[0]).toBe('/Applications/Microsoft Edge.app/Contents/MacOS/Microsoft Edge');
  });
});
