import { describeError, SearcherError } from '../errors.js';
import type { SearchFailure, SearchFailureKind } from './types.js';

// Messages chrome-remote-interface and chrome-launcher produce once the browser is gone.
const SESSION_DEATH_PATTERN = /websocket is not open|target closed|session closed|no target with given id|econnrefused|econnreset|socket hang up/i;

function kindFor(error: unknown, sessionAlive: boolean, fallback: SearchFailureKind): SearchFailureKind {
  if (error instanceof SearcherError) {
    switch (error.category) {
      case 'navigation':
        return 'navigation';
      case 'interaction':
        return 'interaction';
      case 'session-death':
        return 'session-death';
      case 'cancelled':
        return 'cancelled';
      default:
        return 'unexpected';
    }
  }
  if (!sessionAlive || SESSION_DEATH_PATTERN.test(describeError(error))) {
    return 'session-death';
  }
  return fallback;
}

/**
 * Maps a thrown automation error onto the driver's retry/skip/abort vocabulary.
 * Untyped errors (raw protocol rejections such as "Execution context was destroyed.")
 * take `fallback`, so the page step that raised them decides whether they skip the query.
 */
export function classifyAutomationError(
  error: unknown,
  sessionAlive = true,
  fallback: SearchFailureKind = 'unexpected',
): SearchFailure {
  const kind = kindFor(error, sessionAlive, fallback);
  // A timeout raced against a dead browser is still a dead browser.
  const resolved = !sessionAlive && (kind === 'navigation' || kind === 'interaction') ? 'session-death' : kind;
  return { kind: resolved, message: describeError(error), error };
}
