import type { SearcherError } from '../errors.js';

export type QueryOutcome = 'success' | 'skipped-no-more-queries' | 'failed-navigation' | 'failed-interaction';

export interface QueryRecord {
  /** 1-based slot within the attempt. */
  index: number;
  query: string | null;
  outcome: QueryOutcome;
  detail?: string;
}

export type AttemptOutcome = 'completed' | 'retryable-failure' | 'fatal-failure';

export interface SessionAttempt {
  attemptNumber: number;
  queriesPerformed: QueryRecord[];
  terminalOutcome: AttemptOutcome;
  error?: SearcherError | Error;
}

export type DriverState = 'idle' | 'launching' | 'running' | 'completed' | 'restarting' | 'aborted';

export type AbortReason = 'retry-budget-exhausted' | 'fatal-failure' | 'cancelled';

export type SessionOutcome =
  | { status: 'completed'; attempts: SessionAttempt[] }
  | { status: 'aborted'; reason: AbortReason; attempts: SessionAttempt[]; error?: Error };

export type SearchFailureKind = 'navigation' | 'interaction' | 'session-death' | 'cancelled' | 'unexpected';

export interface SearchFailure {
  kind: SearchFailureKind;
  message: string;
  error: unknown;
}

export type SessionEvent =
  | { type: 'state'; state: DriverState; attemptNumber: number }
  | { type: 'attempt-started'; attemptNumber: number; maxAttempts: number; searchCount: number }
  | { type: 'login-wait'; status: 'waiting' | 'signed-in' | 'timed-out'; elapsedMs: number }
  | { type: 'query-started'; attemptNumber: number; index: number; total: number; query: string }
  | { type: 'query-finished'; attemptNumber: number; record: QueryRecord; total: number }
  | { type: 'attempt-finished'; attempt: SessionAttempt; maxAttempts: number }
  | { type: 'restart-scheduled'; attemptNumber: number; backoffMs: number }
  | { type: 'run-finished'; outcome: SessionOutcome; searchCount: number };

export type SessionEventListener = (event: SessionEvent) => void;
