import { describe, expect, test, vi } from 'vitest';
import { DEFAULT_SEARCH_CONFIG } from '../../src/browser/config.js';
import { CancelToken } from '../../src/cancel.js';
import { BrowserLaunchError, InteractionError, NavigationError, SessionClosedError } from '../../src/errors.js';
import { QueryPool } from '../../src/queries/pool.js';
import { SessionDriver, type SessionDriverDeps } from '../../src/session/driver.js';
import type { SessionEvent } from '../../src/session/types.js';
import { FakeLauncher, FakePage, FakeSession, noSleep } from '../helpers/fakeBrowser.js';
import { captureLogger } from '../helpers/logger.js';

const settings = { ...DEFAULT_SEARCH_CONFIG, maxAttempts: 3 };

function buildDriver(launcher: FakeLauncher, overrides: Partial<SessionDriverDeps> = {}, driverSettings = settings) {
  const captured = captureLogger();
  const events: SessionEvent[] = [];
  const driver = new SessionDriver(driverSettings, {
    launcher,
    logger: captured.logger,
    sleep: noSleep,
    random: () => 0,
    onEvent: (event) => events.push(event),
    ...overrides,
  });
  return { driver, events, captured };
}

/** A session that dies while typing `query`. */
function sessionDyingOn(query: string): FakeSession {
  const session: FakeSession = new FakeSession(
    new FakePage({
      type: (text) => {
        if (text === query) {
          session.crash();
          throw new SessionClosedError('Edge exited');
        }
      },
    }),
  );
  return session;
}

describe('SessionDriver', () => {
  test('runs every search with a distinct query in one session', async () => {
    const launcher = new FakeLauncher();
    const { driver } = buildDriver(launcher);

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['alpha', 'beta', 'gamma', 'delta']), 3);

    expect(outcome.status).toBe('completed');
    expect(driver.state).toBe('completed');
    expect(launcher.launches).toEqual([{ userDataDir: '/tmp/work', options: { edgePath: null, headless: false, debugPort: null } }]);
    const [session] = launcher.sessions;
    expect(session?.page.typed).toEqual(['alpha', 'beta', 'gamma']);
    expect(session?.closed).toBe(true);
    expect(outcome.attempts[0]?.queriesPerformed.map((record) => record.outcome)).toEqual(['success', 'success', 'success']);
  });

  test('opens a page when the browser starts without one', async () => {
    const launcher = new FakeLauncher(() => new FakeSession(new FakePage(), false));
    const { driver } = buildDriver(launcher);

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['alpha']), 1);

    expect(outcome.status).toBe('completed');
    expect(launcher.sessions[0]?.page.typed).toEqual(['alpha']);
  });

  test('skips the remaining slots once the query list runs dry', async () => {
    const launcher = new FakeLauncher();
    const sleep = vi.fn(noSleep);
    const { driver, captured } = buildDriver(launcher, { sleep });

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a', 'a', 'b']), 4);

    expect(outcome.status).toBe('completed');
    expect(outcome.attempts[0]?.queriesPerformed).toEqual([
      { index: 1, query: 'a', outcome: 'success' },
      { index: 2, query: 'b', outcome: 'success' },
      { index: 3, query: null, outcome: 'skipped-no-more-queries' },
      { index: 4, query: null, outcome: 'skipped-no-more-queries' },
    ]);
    expect(captured.messages('warn')).toContain('Query list exhausted after 2 search(es); skipping the remaining 2.');
    // per search: submit pause and settle; one pause between the two searches
    expect(sleep.mock.calls).toEqual([[200], [3000], [1000], [200], [3000]]);
  });

  test('announces each query before typing it', async () => {
    const launcher = new FakeLauncher();
    const { driver, events } = buildDriver(launcher);

    await driver.run('/tmp/work', QueryPool.fromLines(['what is "json5"']), 1);

    expect(launcher.sessions[0]?.page.typed).toEqual(['what is "json5']);
    expect(events.find((event) => event.type === 'query-started')).toEqual({
      type: 'query-started',
      attemptNumber: 1,
      index: 1,
      total: 1,
      query: 'what is "json5',
    });
  });

  test('restarts after the session dies and starts the query list over', async () => {
    const launcher = new FakeLauncher((launchNumber) => (launchNumber === 1 ? sessionDyingOn('b') : new FakeSession()));
    const { driver, events } = buildDriver(launcher);

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a', 'b', 'c']), 3);

    expect(outcome.status).toBe('completed');
    expect(outcome.attempts.map((attempt) => attempt.terminalOutcome)).toEqual(['retryable-failure', 'completed']);
    expect(outcome.attempts[0]?.queriesPerformed).toEqual([{ index: 1, query: 'a', outcome: 'success' }]);
    expect(launcher.sessions[1]?.page.typed).toEqual(['a', 'b', 'c']);
    expect(launcher.sessions[0]?.closed).toBe(true);
    expect(events).toContainEqual({ type: 'restart-scheduled', attemptNumber: 2, backoffMs: 5000 });
  });

  test('gives up after exactly maxAttempts launches', async () => {
    const launcher = new FakeLauncher(() => sessionDyingOn('a'));
    const { driver, events, captured } = buildDriver(launcher);

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a']), 2);

    expect(launcher.launches).toHaveLength(3);
    expect(outcome.status).toBe('aborted');
    if (outcome.status === 'aborted') {
      expect(outcome.reason).toBe('retry-budget-exhausted');
      expect(outcome.error).toBeInstanceOf(SessionClosedError);
    }
    expect(outcome.attempts).toHaveLength(3);
    expect(events.filter((event) => event.type === 'restart-scheduled')).toHaveLength(2);
    expect(driver.state).toBe('aborted');
    expect(captured.messages('error')).toContain('Browser session failed 3 time(s); giving up.');
  });

  test('honours a single-attempt budget', async () => {
    const launcher = new FakeLauncher(() => sessionDyingOn('a'));
    const { driver } = buildDriver(launcher, {}, { ...settings, maxAttempts: 1 });

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a']), 1);

    expect(launcher.launches).toHaveLength(1);
    expect(outcome.status).toBe('aborted');
  });

  test('skips a query whose search box fails without restarting', async () => {
    const launcher = new FakeLauncher(
      () =>
        new FakeSession(
          new FakePage({
            type: (text) => {
              if (text === 'b') {
                throw new InteractionError('search box detached');
              }
            },
          }),
        ),
    );
    const { driver } = buildDriver(launcher);

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a', 'b', 'c']), 3);

    expect(launcher.launches).toHaveLength(1);
    expect(outcome.status).toBe('completed');
    expect(outcome.attempts[0]?.queriesPerformed).toEqual([
      { index: 1, query: 'a', outcome: 'success' },
      { index: 2, query: 'b', outcome: 'failed-interaction', detail: 'search box detached' },
      { index: 3, query: 'c', outcome: 'success' },
    ]);
  });

  test('records navigation failures and moves to the next query', async () => {
    const launcher = new FakeLauncher(
      () =>
        new FakeSession(
          new FakePage({
            navigate: () => {
              throw new NavigationError('net::ERR_BLOCKED_BY_CLIENT', { recoverable: false });
            },
          }),
        ),
    );
    const { driver } = buildDriver(launcher);

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a', 'b']), 2);

    expect(outcome.status).toBe('completed');
    expect(outcome.attempts[0]?.queriesPerformed.map((record) => record.outcome)).toEqual(['failed-navigation', 'failed-navigation']);
  });

  test('skips a query whose page step fails with a raw protocol error', async () => {
    let idleWaits = 0;
    const launcher = new FakeLauncher(
      () =>
        new FakeSession(
          new FakePage({
            waitNetworkIdle: () => {
              idleWaits++;
              if (idleWaits === 1) {
                throw new Error('Execution context was destroyed.');
              }
            },
          }),
        ),
    );
    const { driver, captured } = buildDriver(launcher);

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a', 'b', 'c']), 3);

    expect(outcome.status).toBe('completed');
    expect(launcher.launches).toHaveLength(1);
    expect(outcome.attempts[0]?.queriesPerformed).toEqual([
      { index: 1, query: 'a', outcome: 'failed-interaction', detail: 'Execution context was destroyed.' },
      { index: 2, query: 'b', outcome: 'success' },
      { index: 3, query: 'c', outcome: 'success' },
    ]);
    expect(captured.messages('warn')).toContain('Search box interaction failed for "a": Execution context was destroyed.');
  });

  test('aborts without retrying when Edge cannot launch', async () => {
    const launcher = new FakeLauncher(() => new BrowserLaunchError('Microsoft Edge was not found.'));
    const { driver } = buildDriver(launcher);

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a']), 1);

    expect(launcher.launches).toHaveLength(1);
    expect(outcome.status).toBe('aborted');
    if (outcome.status === 'aborted') {
      expect(outcome.reason).toBe('fatal-failure');
    }
  });

  test('closes Edge and stops when cancelled mid-search', async () => {
    const token = new CancelToken();
    const launcher = new FakeLauncher(() => new FakeSession(new FakePage({ type: () => token.cancel() })));
    const { driver } = buildDriver(launcher, { token });

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a', 'b']), 2);

    expect(outcome.status).toBe('aborted');
    if (outcome.status === 'aborted') {
      expect(outcome.reason).toBe('cancelled');
    }
    expect(launcher.launches).toHaveLength(1);
    expect(launcher.sessions[0]?.closed).toBe(true);
  });

  test('stops during the restart back-off when cancelled', async () => {
    const token = new CancelToken();
    const launcher = new FakeLauncher(() => sessionDyingOn('a'));
    const sleep = async (ms: number) => {
      if (ms === settings.restartBackoffMs) {
        token.cancel();
      }
    };
    const { driver } = buildDriver(launcher, { token, sleep });

    const outcome = await driver.run('/tmp/work', QueryPool.fromLines(['a']), 1);

    expect(launcher.launches).toHaveLength(1);
    expect(outcome.status).toBe('aborted');
    if (outcome.status === 'aborted') {
      expect(outcome.reason).toBe('cancelled');
    }
  });

  test('waits for sign-in before the first search when asked', async () => {
    let checks = 0;
    const page = new FakePage({
      isVisible: () => {
        checks += 1;
        return checks === 1;
      },
    });
    const launcher = new FakeLauncher(() => new FakeSession(page));
    const { driver, events } = buildDriver(launcher, {}, { ...settings, waitForLogin: true });

    await driver.run('/tmp/work', QueryPool.fromLines(['a']), 1);

    expect(events.filter((event) => event.type === 'login-wait')).toEqual([
      { type: 'login-wait', status: 'waiting', elapsedMs: 0 },
      { type: 'login-wait', status: 'signed-in', elapsedMs: 1000 },
    ]);
    expect(page.typed).toEqual(['a']);
  });
});
