import type { SearchConfig } from '../browser/config.js';
import type { SearchPage } from '../browser/types.js';
import { randomBetween, withRetries } from '../browser/utils.js';
import type { CancelToken } from '../cancel.js';
import { describeError, NavigationError } from '../errors.js';
import type { SearchLogger } from '../logger.js';
import { err, ok, type Result } from '../result.js';
import { classifyAutomationError } from './failures.js';
import type { SearchFailure } from './types.js';

export type SearchStepSettings = Pick<
  SearchConfig,
  | 'searchUrl'
  | 'inputSelector'
  | 'navigationTimeoutMs'
  | 'navigationRetries'
  | 'navigationRetryDelayMs'
  | 'inputTimeoutMs'
  | 'networkIdleTimeoutMs'
  | 'settleDelayMs'
  | 'typingDelayMs'
  | 'submitPauseMs'
>;

export interface SearchStepDeps {
  logger: SearchLogger;
  token: CancelToken;
  sleep: (ms: number) => Promise<void>;
  random?: () => number;
  isSessionAlive: () => boolean;
}

/** Loads the search page, retrying recoverable navigation errors with a fixed spacing. */
export async function navigateWithRetries(
  page: SearchPage,
  settings: Pick<SearchConfig, 'searchUrl' | 'navigationTimeoutMs' | 'navigationRetries' | 'navigationRetryDelayMs'>,
  deps: Pick<SearchStepDeps, 'logger' | 'sleep' | 'isSessionAlive' | 'token'>,
): Promise<void> {
  const tries = Math.max(1, settings.navigationRetries);
  await withRetries(
    async () => {
      deps.token.throwIfCancelled();
      await page.navigate(settings.searchUrl, settings.navigationTimeoutMs);
    },
    {
      retries: tries - 1,
      delayMs: settings.navigationRetryDelayMs,
      fixedDelay: true,
      sleep: deps.sleep,
      shouldRetry: (error) => error instanceof NavigationError && error.recoverable && deps.isSessionAlive(),
      onRetry: (attempt, error) =>
        deps.logger.warn(`Navigation attempt ${attempt}/${tries} failed (${describeError(error)}); retrying`),
    },
  );
}

/**
 * One search: navigate, clear the box, type the query keystroke by keystroke, submit,
 * then wait for network idle plus the settle delay. Never throws.
 */
export async function performSearch(
  page: SearchPage,
  query: string,
  settings: SearchStepSettings,
  deps: SearchStepDeps,
): Promise<Result<void, SearchFailure>> {
  try {
    await navigateWithRetries(page, settings, deps);
  } catch (error) {
    return err(classifyAutomationError(error, deps.isSessionAlive(), 'navigation'));
  }

  try {
    deps.token.throwIfCancelled();
    const input = page.locate(settings.inputSelector);
    await input.waitVisible(settings.inputTimeoutMs);
    await input.fill('');
    await input.type(query, settings.typingDelayMs);
    await deps.sleep(randomBetween(settings.submitPauseMs, deps.random));
    await input.pressEnter();
    await page.waitNetworkIdle(settings.networkIdleTimeoutMs);
    await deps.sleep(settings.settleDelayMs);
  } catch (error) {
    return err(classifyAutomationError(error, deps.isSessionAlive(), 'interaction'));
  }
  return ok(undefined);
}
