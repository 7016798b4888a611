import type { CopyPolicy, UserConfig } from '../config.js';
import { BING_URL, SEARCH_INPUT_SELECTOR, SIGN_IN_SELECTOR } from './constants.js';
import { parseDebugPortEnv } from './edgeLifecycle.js';
import type { DelayRange } from './utils.js';

export interface SearchConfig {
  searchUrl: string;
  inputSelector: string;
  signInSelector: string;
  edgePath: string | null;
  headless: boolean;
  debugPort: number | null;
  navigationTimeoutMs: number;
  /** Tries per navigation, including the first. */
  navigationRetries: number;
  navigationRetryDelayMs: number;
  inputTimeoutMs: number;
  networkIdleTimeoutMs: number;
  settleDelayMs: number;
  typingDelayMs: DelayRange;
  submitPauseMs: DelayRange;
  betweenSearchesMs: DelayRange;
  maxAttempts: number;
  restartBackoffMs: number;
  waitForLogin: boolean;
  loginTimeoutMs: number;
  loginPollIntervalMs: number;
  loginReminderIntervalMs: number;
  policy: CopyPolicy;
  autoTerminate: boolean;
  lockReleaseDelayMs: number;
  keepWorkingCopy: boolean;
  queriesFile: string | null;
  profileRoot: string | null;
  logFile: string | null;
  lockInspectorPath: string | null;
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  searchUrl: BING_URL,
  inputSelector: SEARCH_INPUT_SELECTOR,
  signInSelector: SIGN_IN_SELECTOR,
  edgePath: null,
  headless: false,
  debugPort: null,
  navigationTimeoutMs: 30_000,
  navigationRetries: 3,
  navigationRetryDelayMs: 2_000,
  inputTimeoutMs: 30_000,
  networkIdleTimeoutMs: 30_000,
  settleDelayMs: 3_000,
  typingDelayMs: { minMs: 20, maxMs: 80 },
  submitPauseMs: { minMs: 200, maxMs: 500 },
  betweenSearchesMs: { minMs: 1_000, maxMs: 3_000 },
  maxAttempts: 3,
  restartBackoffMs: 5_000,
  waitForLogin: false,
  loginTimeoutMs: 60_000,
  loginPollIntervalMs: 1_000,
  loginReminderIntervalMs: 10_000,
  policy: 'operator-assisted',
  autoTerminate: true,
  lockReleaseDelayMs: 1_000,
  keepWorkingCopy: false,
  queriesFile: null,
  profileRoot: null,
  logFile: null,
  lockInspectorPath: null,
};

/** Defaults, then the user config file, then `EDGE_PATH` / `EDGE_AUTOSEARCH_DEBUG_PORT`. */
export function resolveSearchConfig(config: UserConfig | undefined, env: NodeJS.ProcessEnv = process.env): SearchConfig {
  const debugPortEnv = parseDebugPortEnv(env.EDGE_AUTOSEARCH_DEBUG_PORT);
  const edgePathEnv = env.EDGE_PATH?.trim() || null;
  return {
    ...DEFAULT_SEARCH_CONFIG,
    searchUrl: config?.searchUrl ?? DEFAULT_SEARCH_CONFIG.searchUrl,
    inputSelector: config?.inputSelector ?? DEFAULT_SEARCH_CONFIG.inputSelector,
    signInSelector: config?.signInSelector ?? DEFAULT_SEARCH_CONFIG.signInSelector,
    headless: config?.headless ?? DEFAULT_SEARCH_CONFIG.headless,
    navigationTimeoutMs: config?.navigationTimeoutMs ?? DEFAULT_SEARCH_CONFIG.navigationTimeoutMs,
    navigationRetries: config?.navigationRetries ?? DEFAULT_SEARCH_CONFIG.navigationRetries,
    navigationRetryDelayMs: config?.navigationRetryDelayMs ?? DEFAULT_SEARCH_CONFIG.navigationRetryDelayMs,
    inputTimeoutMs: config?.inputTimeoutMs ?? DEFAULT_SEARCH_CONFIG.inputTimeoutMs,
    networkIdleTimeoutMs: config?.networkIdleTimeoutMs ?? DEFAULT_SEARCH_CONFIG.networkIdleTimeoutMs,
    settleDelayMs: config?.settleDelayMs ?? DEFAULT_SEARCH_CONFIG.settleDelayMs,
    typingDelayMs: config?.typingDelayMs ?? DEFAULT_SEARCH_CONFIG.typingDelayMs,
    submitPauseMs: config?.submitPauseMs ?? DEFAULT_SEARCH_CONFIG.submitPauseMs,
    betweenSearchesMs: config?.betweenSearchesMs ?? DEFAULT_SEARCH_CONFIG.betweenSearchesMs,
    maxAttempts: config?.maxAttempts ?? DEFAULT_SEARCH_CONFIG.maxAttempts,
    restartBackoffMs: config?.restartBackoffMs ?? DEFAULT_SEARCH_CONFIG.restartBackoffMs,
    waitForLogin: config?.waitForLogin ?? DEFAULT_SEARCH_CONFIG.waitForLogin,
    loginTimeoutMs: config?.loginTimeoutMs ?? DEFAULT_SEARCH_CONFIG.loginTimeoutMs,
    policy: config?.policy ?? DEFAULT_SEARCH_CONFIG.policy,
    autoTerminate: config?.autoTerminate ?? DEFAULT_SEARCH_CONFIG.autoTerminate,
    lockReleaseDelayMs: config?.lockReleaseDelayMs ?? DEFAULT_SEARCH_CONFIG.lockReleaseDelayMs,
    keepWorkingCopy: config?.keepWorkingCopy ?? DEFAULT_SEARCH_CONFIG.keepWorkingCopy,
    queriesFile: config?.queriesFile ?? DEFAULT_SEARCH_CONFIG.queriesFile,
    profileRoot: config?.profileRoot ?? DEFAULT_SEARCH_CONFIG.profileRoot,
    logFile: config?.logFile ?? DEFAULT_SEARCH_CONFIG.logFile,
    lockInspectorPath: config?.lockInspectorPath ?? DEFAULT_SEARCH_CONFIG.lockInspectorPath,
    edgePath: edgePathEnv ?? config?.edgePath ?? DEFAULT_SEARCH_CONFIG.edgePath,
    debugPort: debugPortEnv ?? config?.debugPort ?? DEFAULT_SEARCH_CONFIG.debugPort,
  };
}
