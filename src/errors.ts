export type ErrorCategory =
  | 'configuration'
  | 'no-profiles'
  | 'invalid-selection'
  | 'lock-contention'
  | 'lock-unresolved'
  | 'navigation'
  | 'interaction'
  | 'session-death'
  | 'launch'
  | 'cancelled'
  | 'unexpected';

export type ErrorDetails = Record<string, unknown>;

const CATEGORY_LABELS: Record<ErrorCategory, string> = {
  configuration: 'Configuration error',
  'no-profiles': 'No Edge profiles found',
  'invalid-selection': 'Invalid selection',
  'lock-contention': 'Profile file locked',
  'lock-unresolved': 'Profile lock unresolved',
  navigation: 'Navigation failed',
  interaction: 'Search box interaction failed',
  'session-death': 'Browser session lost',
  launch: 'Browser launch failed',
  cancelled: 'Cancelled',
  unexpected: 'Unexpected failure',
};

export function describeErrorCategory(category: ErrorCategory): string {
  return CATEGORY_LABELS[category];
}

export class SearcherError extends Error {
  readonly category: ErrorCategory;
  readonly details?: ErrorDetails;

  constructor(message: string, category: ErrorCategory, details?: ErrorDetails, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SearcherError';
    this.category = category;
    this.details = details;
  }
}

export class ConfigurationError extends SearcherError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, 'configuration', details, cause);
    this.name = 'ConfigurationError';
  }
}

export class NoProfilesFoundError extends SearcherError {
  constructor(rootDir: string) {
    super(`No Edge profiles found under ${rootDir}`, 'no-profiles', { rootDir });
    this.name = 'NoProfilesFoundError';
  }
}

export class InvalidSelectionError extends SearcherError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'invalid-selection', details);
    this.name = 'InvalidSelectionError';
  }
}

export class LockUnresolvedError extends SearcherError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, 'lock-unresolved', details, cause);
    this.name = 'LockUnresolvedError';
  }
}

export class NavigationError extends SearcherError {
  /** False for failures a retry cannot fix (blocked or malformed URLs). */
  readonly recoverable: boolean;

  constructor(message: string, { recoverable, details }: { recoverable: boolean; details?: ErrorDetails }, cause?: unknown) {
    super(message, 'navigation', details, cause);
    this.name = 'NavigationError';
    this.recoverable = recoverable;
  }
}

export class InteractionError extends SearcherError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, 'interaction', details, cause);
    this.name = 'InteractionError';
  }
}

export class SessionClosedError extends SearcherError {
  constructor(message = 'Browser session closed unexpectedly', details?: ErrorDetails, cause?: unknown) {
    super(message, 'session-death', details, cause);
    this.name = 'SessionClosedError';
  }
}

export class BrowserLaunchError extends SearcherError {
  constructor(message: string, details?: ErrorDetails, cause?: unknown) {
    super(message, 'launch', details, cause);
    this.name = 'BrowserLaunchError';
  }
}

export class CancelledError extends SearcherError {
  constructor(message = 'Run cancelled') {
    super(message, 'cancelled');
    this.name = 'CancelledError';
  }
}

export function categorizeError(error: unknown): ErrorCategory {
  return error instanceof SearcherError ? error.category : 'unexpected';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

const loggedErrors = new WeakSet<Error>();

export function markErrorLogged(error: Error): void {
  loggedErrors.add(error);
}

export function isErrorLogged(error: Error): boolean {
  return loggedErrors.has(error);
}
