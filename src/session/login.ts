import type { SearchConfig } from '../browser/config.js';
import type { SearchPage } from '../browser/types.js';
import type { SearchStepDeps } from './search.js';
import { navigateWithRetries } from './search.js';

export type LoginWaitResult = 'already-signed-in' | 'signed-in' | 'timed-out';

export type LoginWaitSettings = Pick<
  SearchConfig,
  | 'searchUrl'
  | 'signInSelector'
  | 'navigationTimeoutMs'
  | 'navigationRetries'
  | 'navigationRetryDelayMs'
  | 'loginTimeoutMs'
  | 'loginPollIntervalMs'
  | 'loginReminderIntervalMs'
>;

export interface LoginWaitDeps extends Pick<SearchStepDeps, 'logger' | 'sleep' | 'token' | 'isSessionAlive'> {
  onProgress?: (status: 'waiting' | 'signed-in' | 'timed-out', elapsedMs: number) => void;
}

/**
 * Opens the search page once and, while the sign-in link is showing, gives the operator
 * `loginTimeoutMs` to sign in. Timing out is not an error; the run continues signed out.
 */
export async function waitForLogin(page: SearchPage, settings: LoginWaitSettings, deps: LoginWaitDeps): Promise<LoginWaitResult> {
  const { logger, sleep, token } = deps;
  await navigateWithRetries(page, settings, deps);
  const signIn = page.locate(settings.signInSelector);
  if (!(await signIn.isVisible())) {
    logger.debug('Already signed in; skipping login wait.');
    return 'already-signed-in';
  }

  const timeoutSeconds = Math.round(settings.loginTimeoutMs / 1000);
  logger(`Not signed in. Sign in to Bing in the Edge window; waiting up to ${timeoutSeconds}s.`);
  deps.onProgress?.('waiting', 0);
  const pollMs = Math.max(1, settings.loginPollIntervalMs);
  let elapsed = 0;
  let lastReminder = 0;
  while (elapsed < settings.loginTimeoutMs) {
    token.throwIfCancelled();
    await sleep(pollMs);
    elapsed += pollMs;
    if (!(await signIn.isVisible())) {
      logger('Sign-in detected; starting searches.');
      deps.onProgress?.('signed-in', elapsed);
      return 'signed-in';
    }
    if (elapsed - lastReminder >= settings.loginReminderIntervalMs && elapsed < settings.loginTimeoutMs) {
      lastReminder = elapsed;
      logger(`Still waiting for sign-in (${Math.round(elapsed / 1000)}s elapsed)...`);
      deps.onProgress?.('waiting', elapsed);
    }
  }
  logger.warn(`No sign-in after ${timeoutSeconds}s; continuing without signing in.`);
  deps.onProgress?.('timed-out', elapsed);
  return 'timed-out';
}
