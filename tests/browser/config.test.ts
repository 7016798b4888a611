import { describe, expect, test } from 'vitest';
import { DEFAULT_SEARCH_CONFIG, resolveSearchConfig } from '../../src/browser/config.js';

describe('resolveSearchConfig', () => {
  test('returns defaults when nothing is configured', () => {
    expect(resolveSearchConfig(undefined, {})).toEqual(DEFAULT_SEARCH_CONFIG);
  });

  test('layers the config file over defaults', () => {
    const config = resolveSearchConfig({ maxAttempts: 5, policy: 'automatic', typingDelayMs: { minMs: 10, maxMs: 20 } }, {});
    expect(config.maxAttempts).toBe(5);
    expect(config.policy).toBe('automatic');
    expect(config.typingDelayMs).toEqual({ minMs: 10, maxMs: 20 });
    expect(config.navigationRetries).toBe(DEFAULT_SEARCH_CONFIG.navigationRetries);
  });

  test('lets environment variables win over the config file', () => {
    const config = resolveSearchConfig(
      { edgePath: '/config/msedge', debugPort: 9222 },
      { EDGE_PATH: '/env/msedge', EDGE_AUTOSEARCH_DEBUG_PORT: '9333' },
    );
    expect(config.edgePath).toBe('/env/msedge');
    expect(config.debugPort).toBe(9333);
  });

  test('ignores an invalid debug port in the environment', () => {
    expect(resolveSearchConfig({ debugPort: 9222 }, { EDGE_AUTOSEARCH_DEBUG_PORT: 'abc' }).debugPort).toBe(9222);
    expect(resolveSearchConfig(undefined, { EDGE_AUTOSEARCH_DEBUG_PORT: '70000' }).debugPort).toBeNull();
  });
});
