import CDP from 'chrome-remote-interface';
import type { LaunchedChrome } from 'chrome-launcher';
import { describeError, InteractionError, NavigationError, SessionClosedError } from '../errors.js';
import { UNRECOVERABLE_NET_ERRORS } from './constants.js';
import { connectToEdge, launchEdge, type LaunchFn } from './edgeLifecycle.js';
import type {
  BrowserLogger,
  ChromeClient,
  LaunchSessionOptions,
  SearchLocator,
  SearchPage,
  SearchSession,
  SessionLauncher,
} from './types.js';
import { delay, randomBetween, type DelayRange } from './utils.js';

const ENTER_KEY_EVENT = {
  key: 'Enter',
  code: 'Enter',
  windowsVirtualKeyCode: 13,
  nativeVirtualKeyCode: 13,
} as const;
const ENTER_KEY_TEXT = '\r';

const POLL_INTERVAL_MS = 100;
// Quiet window with no new resource entries before the page counts as network idle.
const NETWORK_IDLE_WINDOW_MS = 500;

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function isUnrecoverableNetError(errorText: string): boolean {
  return UNRECOVERABLE_NET_ERRORS.some((code) => errorText.includes(code));
}

class CdpSearchPage implements SearchPage {
  private closed = false;
  private readonly disconnected: Promise<never>;

  constructor(
    private readonly client: ChromeClient,
    private readonly logger: BrowserLogger,
  ) {
    this.disconnected = new Promise<never>((_, reject) => {
      client.on('disconnect', () => {
        this.closed = true;
        reject(new SessionClosedError('Edge tab closed before the run finished.'));
      });
    });
    // Keep the race promise from surfacing as unhandled when nothing is awaiting it.
    this.disconnected.catch(() => undefined);
  }

  async init(): Promise<void> {
    await Promise.all([this.client.Page.enable(), this.client.Runtime.enable()]);
  }

  /** Races `promise` against the tab disconnecting. */
  guard<T>(promise: Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new SessionClosedError('Edge tab is no longer connected.'));
    }
    return Promise.race([promise, this.disconnected]);
  }

  async evaluate(expression: string): Promise<unknown> {
    const { result, exceptionDetails } = await this.guard(
      this.client.Runtime.evaluate({ expression, returnByValue: true, awaitPromise: true }),
    );
    if (exceptionDetails) {
      throw new InteractionError(`Page script failed: ${exceptionDetails.text}`, { expression });
    }
    const value: unknown = result.value;
    return value;
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const started = Date.now();
    const response = await this.guard(
      withTimeout(
        this.client.Page.navigate({ url }),
        timeoutMs,
        () => new NavigationError(`Navigation to ${url} timed out after ${timeoutMs}ms`, { recoverable: true, details: { url } }),
      ),
    );
    if (response.errorText) {
      throw new NavigationError(`Navigation to ${url} failed: ${response.errorText}`, {
        recoverable: !isUnrecoverableNetError(response.errorText),
        details: { url, errorText: response.errorText },
      });
    }
    const remaining = Math.max(0, timeoutMs - (Date.now() - started));
    await this.pollUntil(
      "document.readyState === 'complete'",
      remaining,
      () => new NavigationError(`Page load of ${url} timed out after ${timeoutMs}ms`, { recoverable: true, details: { url } }),
    );
    this.logger.debug(`Loaded ${url}`);
  }

  locate(selector: string): SearchLocator {
    return new CdpSearchLocator(this, this.client, selector);
  }

  async waitNetworkIdle(timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    let lastCount = -1;
    let quietSince = Date.now();
    while (Date.now() < deadline) {
      const snapshot = await this.evaluate(
        "({ ready: document.readyState === 'complete', count: performance.getEntriesByType('resource').length })",
      );
      const count = readResourceCount(snapshot);
      if (count !== lastCount) {
        lastCount = count;
        quietSince = Date.now();
      } else if (count >= 0 && Date.now() - quietSince >= NETWORK_IDLE_WINDOW_MS) {
        return;
      }
      await delay(POLL_INTERVAL_MS);
    }
    throw new InteractionError(`Page did not reach network idle within ${timeoutMs}ms`);
  }

  async pollUntil(expression: string, timeoutMs: number, onTimeout: () => Error): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if ((await this.evaluate(`Boolean(${expression})`)) === true) {
        return;
      }
      if (Date.now() >= deadline) {
        throw onTimeout();
      }
      await delay(POLL_INTERVAL_MS);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client.close();
  }
}

function readResourceCount(snapshot: unknown): number {
  if (snapshot && typeof snapshot === 'object' && 'ready' in snapshot && 'count' in snapshot) {
    return snapshot.ready === true && typeof snapshot.count === 'number' ? snapshot.count : -1;
  }
  return -1;
}

class CdpSearchLocator implements SearchLocator {
  private readonly encodedSelector: string;

  constructor(
    private readonly page: CdpSearchPage,
    private readonly client: ChromeClient,
    private readonly selector: string,
  ) {
    this.encodedSelector = JSON.stringify(selector);
  }

  private visibilityExpression(): string {
    return `(() => {
      const el = document.querySelector(${this.encodedSelector});
      if (!el) return false;
      const style = window.getComputedStyle(el);
      if (style.visibility === 'hidden' || style.display === 'none') return false;
      const rect = el.getBoundingClientRect();
      return rect.width > 0 && rect.height > 0;
    })()`;
  }

  async waitVisible(timeoutMs: number): Promise<void> {
    await this.page.pollUntil(
      this.visibilityExpression(),
      timeoutMs,
      () => new InteractionError(`Element ${this.selector} not visible after ${timeoutMs}ms`, { selector: this.selector }),
    );
  }

  async isVisible(): Promise<boolean> {
    return (await this.page.evaluate(this.visibilityExpression())) === true;
  }

  async fill(text: string): Promise<void> {
    const filled = await this.page.evaluate(`(() => {
      const el = document.querySelector(${this.encodedSelector});
      if (!el || !('value' in el)) return false;
      el.focus();
      el.value = ${JSON.stringify(text)};
      el.dispatchEvent(new Event('input', { bubbles: true }));
      return true;
    })()`);
    if (filled !== true) {
      throw new InteractionError(`Element ${this.selector} is missing or not editable`, { selector: this.selector });
    }
  }

  async type(text: string, delays: DelayRange): Promise<void> {
    await this.focus();
    for (const char of text) {
      await this.page.guard(this.client.Input.insertText({ text: char }));
      await delay(randomBetween(delays));
    }
  }

  async pressEnter(): Promise<void> {
    await this.focus();
    await this.page.guard(
      this.client.Input.dispatchKeyEvent({
        type: 'keyDown',
        ...ENTER_KEY_EVENT,
        text: ENTER_KEY_TEXT,
        unmodifiedText: ENTER_KEY_TEXT,
      }),
    );
    await this.page.guard(
      this.client.Input.dispatchKeyEvent({
        type: 'keyUp',
        ...ENTER_KEY_EVENT,
      }),
    );
  }

  private async focus(): Promise<void> {
    const focused = await this.page.evaluate(`(() => {
      const el = document.querySelector(${this.encodedSelector});
      if (!el) return false;
      el.focus();
      return true;
    })()`);
    if (focused !== true) {
      throw new InteractionError(`Element ${this.selector} not found`, { selector: this.selector });
    }
  }
}

class CdpSearchSession implements SearchSession {
  private alive = true;
  private readonly openPages: CdpSearchPage[] = [];

  constructor(
    private readonly chrome: LaunchedChrome,
    private readonly logger: BrowserLogger,
  ) {
    chrome.process.once('exit', () => {
      this.alive = false;
      logger.debug(`Edge process ${chrome.pid} exited`);
    });
  }

  get pid(): number | undefined {
    return this.chrome.pid;
  }

  isAlive(): boolean {
    return this.alive;
  }

  async pages(): Promise<SearchPage[]> {
    this.assertAlive();
    const targets = await CDP.List({ port: this.chrome.port });
    const pages: SearchPage[] = [];
    for (const target of targets.filter((entry) => entry.type === 'page')) {
      pages.push(await this.attach(target.id));
    }
    return pages;
  }

  async newPage(): Promise<SearchPage> {
    this.assertAlive();
    const target = await CDP.New({ port: this.chrome.port, url: 'about:blank' });
    return this.attach(target.id);
  }

  async close(): Promise<void> {
    const pageCloses = this.openPages.splice(0).map((page) =>
      page.close().catch((error: unknown) => this.logger.debug(`Closing DevTools client failed: ${describeError(error)}`)),
    );
    await Promise.all(pageCloses);
    if (!this.alive) {
      return;
    }
    this.alive = false;
    await this.chrome.kill();
  }

  private async attach(targetId: string): Promise<CdpSearchPage> {
    let client: ChromeClient;
    try {
      client = await connectToEdge(this.chrome.port, targetId, this.logger);
    } catch (error) {
      if (!this.alive) {
        throw new SessionClosedError('Edge exited while attaching to a tab.', { targetId }, error);
      }
      throw error;
    }
    const page = new CdpSearchPage(client, this.logger);
    await page.init();
    this.openPages.push(page);
    return page;
  }

  private assertAlive(): void {
    if (!this.alive) {
      throw new SessionClosedError('Edge process is no longer running.', { pid: this.chrome.pid });
    }
  }
}

/** Launches Edge through chrome-launcher and drives it over chrome-remote-interface. */
export class CdpSessionLauncher implements SessionLauncher {
  constructor(
    private readonly logger: BrowserLogger,
    private readonly launchImpl?: LaunchFn,
  ) {}

  async launchPersistentSession(userDataDir: string, options: LaunchSessionOptions): Promise<SearchSession> {
    const chrome = await launchEdge(options, userDataDir, this.logger, this.launchImpl);
    return new CdpSearchSession(chrome, this.logger);
  }
}
