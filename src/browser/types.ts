import type CDP from 'chrome-remote-interface';
import type { SearchLogger } from '../logger.js';
import type { DelayRange } from './utils.js';

export type ChromeClient = Awaited<ReturnType<typeof CDP>>;
export type BrowserLogger = SearchLogger;

export interface SearchLocator {
  /** Rejects with InteractionError once `timeoutMs` passes without the element rendering. */
  waitVisible(timeoutMs: number): Promise<void>;
  isVisible(): Promise<boolean>;
  /** Replaces the element's value; `fill('')` clears it. */
  fill(text: string): Promise<void>;
  /** Types one character at a time with a random pause drawn from `delays` after each. */
  type(text: string, delays: DelayRange): Promise<void>;
  pressEnter(): Promise<void>;
}

export interface SearchPage {
  /** Rejects with NavigationError (recoverable or not) or SessionClosedError. */
  navigate(url: string, timeoutMs: number): Promise<void>;
  locate(selector: string): SearchLocator;
  waitNetworkIdle(timeoutMs: number): Promise<void>;
}

export interface SearchSession {
  readonly pid?: number;
  pages(): Promise<SearchPage[]>;
  newPage(): Promise<SearchPage>;
  isAlive(): boolean;
  close(): Promise<void>;
}

export interface LaunchSessionOptions {
  edgePath?: string | null;
  headless: boolean;
  debugPort?: number | null;
}

export interface SessionLauncher {
  /** Starts a browser bound to `userDataDir`; rejects with BrowserLaunchError. */
  launchPersistentSession(userDataDir: string, options: LaunchSessionOptions): Promise<SearchSession>;
}
