import type { SearchConfig } from '../browser/config.js';
import type { SearchPage, SearchSession, SessionLauncher } from '../browser/types.js';
import { delay, randomBetween } from '../browser/utils.js';
import { CancelToken } from '../cancel.js';
import { CancelledError, describeError, describeErrorCategory, SessionClosedError } from '../errors.js';
import type { SearchLogger } from '../logger.js';
import { cleanQueryForSearch, type QueryPool } from '../queries/pool.js';
import { classifyAutomationError } from './failures.js';
import { waitForLogin, type LoginWaitSettings } from './login.js';
import { performSearch, type SearchStepDeps, type SearchStepSettings } from './search.js';
import type {
  AbortReason,
  DriverState,
  QueryRecord,
  SessionAttempt,
  SessionEvent,
  SessionEventListener,
  SessionOutcome,
} from './types.js';

export type DriverSettings = SearchStepSettings &
  LoginWaitSettings &
  Pick<SearchConfig, 'maxAttempts' | 'restartBackoffMs' | 'betweenSearchesMs' | 'waitForLogin' | 'edgePath' | 'headless' | 'debugPort'>;

export interface SessionDriverDeps {
  launcher: SessionLauncher;
  logger: SearchLogger;
  token?: CancelToken;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onEvent?: SessionEventListener;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}

/**
 * Bounded-retry control loop: launch → run searches → completed, restarting on session
 * death until `maxAttempts` launches have been made.
 */
export class SessionDriver {
  private currentState: DriverState = 'idle';
  private readonly token: CancelToken;
  private readonly sleepImpl: (ms: number) => Promise<void>;

  constructor(
    private readonly settings: DriverSettings,
    private readonly deps: SessionDriverDeps,
  ) {
    this.token = deps.token ?? new CancelToken();
    this.sleepImpl = deps.sleep ?? delay;
  }

  get state(): DriverState {
    return this.currentState;
  }

  async run(workingDir: string, pool: QueryPool, searchCount: number): Promise<SessionOutcome> {
    const { logger } = this.deps;
    const maxAttempts = Math.max(1, this.settings.maxAttempts);
    const attempts: SessionAttempt[] = [];
    let attemptNumber = 0;

    const finish = (outcome: SessionOutcome): SessionOutcome => {
      this.transition(outcome.status, attemptNumber);
      this.emit({ type: 'run-finished', outcome, searchCount });
      return outcome;
    };
    const abort = (reason: AbortReason, error?: Error): SessionOutcome =>
      finish({ status: 'aborted', reason, attempts, error });

    for (;;) {
      attemptNumber += 1;
      const attempt = await this.runAttempt(attemptNumber, maxAttempts, workingDir, pool, searchCount);
      attempts.push(attempt);
      this.emit({ type: 'attempt-finished', attempt, maxAttempts });

      if (attempt.terminalOutcome === 'completed') {
        return finish({ status: 'completed', attempts });
      }
      if (attempt.terminalOutcome === 'fatal-failure') {
        return abort(attempt.error instanceof CancelledError ? 'cancelled' : 'fatal-failure', attempt.error);
      }
      if (attemptNumber >= maxAttempts) {
        logger.error(`Browser session failed ${attemptNumber} time(s); giving up.`);
        return abort('retry-budget-exhausted', attempt.error);
      }

      this.transition('restarting', attemptNumber);
      this.emit({ type: 'restart-scheduled', attemptNumber: attemptNumber + 1, backoffMs: this.settings.restartBackoffMs });
      try {
        await this.sleep(this.settings.restartBackoffMs);
      } catch (error) {
        return abort('cancelled', toError(error));
      }
    }
  }

  private async runAttempt(
    attemptNumber: number,
    maxAttempts: number,
    workingDir: string,
    pool: QueryPool,
    searchCount: number,
  ): Promise<SessionAttempt> {
    const { logger, launcher } = this.deps;
    const records: QueryRecord[] = [];
    const attemptResult = (terminalOutcome: SessionAttempt['terminalOutcome'], error?: unknown): SessionAttempt => ({
      attemptNumber,
      queriesPerformed: records,
      terminalOutcome,
      ...(error === undefined ? {} : { error: toError(error) }),
    });

    this.transition('launching', attemptNumber);
    this.emit({ type: 'attempt-started', attemptNumber, maxAttempts, searchCount });
    pool.reset();

    if (this.token.isCancelled) {
      return attemptResult('fatal-failure', new CancelledError());
    }

    let session: SearchSession;
    try {
      session = await launcher.launchPersistentSession(workingDir, {
        edgePath: this.settings.edgePath,
        headless: this.settings.headless,
        debugPort: this.settings.debugPort,
      });
    } catch (error) {
      logger.error(`${describeErrorCategory('launch')}: ${describeError(error)}`);
      return attemptResult('fatal-failure', error);
    }

    this.transition('running', attemptNumber);
    try {
      await this.runSearches(session, attemptNumber, pool, searchCount, records);
    } catch (error) {
      const failure = classifyAutomationError(error, session.isAlive());
      await this.closeQuietly(session);
      if (failure.kind === 'session-death') {
        logger.warn(`${describeErrorCategory('session-death')} during attempt ${attemptNumber}: ${failure.message}`);
        return attemptResult('retryable-failure', error);
      }
      if (failure.kind === 'cancelled') {
        logger.warn('Cancelled; closing Edge.');
        return attemptResult('fatal-failure', error);
      }
      logger.error(`${describeErrorCategory('unexpected')} during attempt ${attemptNumber}: ${failure.message}`);
      if (error instanceof Error && error.stack) {
        logger.debug(error.stack);
      }
      return attemptResult('fatal-failure', error);
    }

    try {
      await session.close();
    } catch (error) {
      logger.warn(`Edge did not close cleanly: ${describeError(error)}`);
    }
    return attemptResult('completed');
  }

  private async runSearches(
    session: SearchSession,
    attemptNumber: number,
    pool: QueryPool,
    searchCount: number,
    records: QueryRecord[],
  ): Promise<void> {
    const { logger } = this.deps;
    const stepDeps: SearchStepDeps = {
      logger,
      token: this.token,
      sleep: (ms) => this.sleep(ms),
      random: this.deps.random,
      isSessionAlive: () => session.isAlive(),
    };
    const existing = await session.pages();
    const page: SearchPage = existing[0] ?? (await session.newPage());

    if (this.settings.waitForLogin) {
      await this.waitForLoginBestEffort(page, stepDeps);
    }

    const record = (entry: QueryRecord) => {
      records.push(entry);
      this.emit({ type: 'query-finished', attemptNumber, record: entry, total: searchCount });
    };

    for (let index = 1; index <= searchCount; index++) {
      this.token.throwIfCancelled();
      const drawn = pool.draw(this.deps.random);
      if (drawn === undefined) {
        logger.warn(`Query list exhausted after ${index - 1} search(es); skipping the remaining ${searchCount - index + 1}.`);
        for (let skipped = index; skipped <= searchCount; skipped++) {
          record({ index: skipped, query: null, outcome: 'skipped-no-more-queries' });
        }
        break;
      }
      const query = cleanQueryForSearch(drawn);
      this.emit({ type: 'query-started', attemptNumber, index, total: searchCount, query });
      const result = await performSearch(page, query, this.settings, stepDeps);
      if (result.ok) {
        record({ index, query, outcome: 'success' });
      } else {
        const { kind, message, error } = result.error;
        if (kind === 'navigation') {
          logger.warn(`${describeErrorCategory('navigation')} for "${query}": ${message}`);
          record({ index, query, outcome: 'failed-navigation', detail: message });
        } else if (kind === 'interaction') {
          logger.warn(`${describeErrorCategory('interaction')} for "${query}": ${message}`);
          record({ index, query, outcome: 'failed-interaction', detail: message });
        } else if (kind === 'session-death') {
          throw error instanceof SessionClosedError ? error : new SessionClosedError(message, { query }, error);
        } else {
          throw error;
        }
      }
      if (index < searchCount && pool.remaining.length > 0) {
        await this.sleep(randomBetween(this.settings.betweenSearchesMs, this.deps.random));
      }
    }
  }

  private async waitForLoginBestEffort(page: SearchPage, stepDeps: SearchStepDeps): Promise<void> {
    try {
      await waitForLogin(page, this.settings, {
        ...stepDeps,
        onProgress: (status, elapsedMs) => this.emit({ type: 'login-wait', status, elapsedMs }),
      });
    } catch (error) {
      const failure = classifyAutomationError(error, stepDeps.isSessionAlive(), 'interaction');
      if (failure.kind !== 'navigation' && failure.kind !== 'interaction') {
        throw error;
      }
      this.deps.logger.warn(`Could not check sign-in state (${failure.message}); continuing.`);
    }
  }

  private async closeQuietly(session: SearchSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.deps.logger.debug(`Ignoring close failure on a failed session: ${describeError(error)}`);
    }
  }

  private sleep(ms: number): Promise<void> {
    return this.token.race(this.sleepImpl(ms));
  }

  private transition(state: DriverState, attemptNumber: number): void {
    this.currentState = state;
    this.emit({ type: 'state', state, attemptNumber });
  }

  private emit(event: SessionEvent): void {
    this.deps.onEvent?.(event);
  }
}
