import { InvalidArgumentError } from 'commander';
import type { CopyPolicy } from '../config.js';
import { parseDuration } from '../browser/utils.js';
import { InvalidSelectionError } from '../errors.js';

export const DEFAULT_SEARCH_COUNT = 5;

export interface CliOptions {
  profile?: string;
  count?: number;
  policy?: CopyPolicy;
  queries?: string;
  profileRoot?: string;
  edgePath?: string;
  headless?: boolean;
  maxAttempts?: number;
  waitForLogin?: boolean;
  loginTimeout?: number;
  autoTerminate?: boolean;
  keepWorkingCopy?: boolean;
  logFile?: string;
  verbose?: boolean;
}

export function parsePositiveIntOption(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/u.test(trimmed) || Number.parseInt(trimmed, 10) < 1) {
    throw new InvalidArgumentError('Value must be a positive integer.');
  }
  return Number.parseInt(trimmed, 10);
}

export function parsePolicyOption(value: string): CopyPolicy {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'operator' || normalized === 'operator-assisted' || normalized === 'manual') {
    return 'operator-assisted';
  }
  if (normalized === 'automatic' || normalized === 'auto') {
    return 'automatic';
  }
  throw new InvalidArgumentError('Policy must be "operator" or "automatic".');
}

export function parseDurationOption(value: string): number {
  const parsed = parseDuration(value, Number.NaN);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Duration must look like 500ms, 30s, 2m or 1h.');
  }
  return parsed;
}

/** Interactive count answer; blank keeps the default. */
export function parseSearchCountInput(input: string, fallback = DEFAULT_SEARCH_COUNT): number {
  const trimmed = input.trim();
  if (trimmed === '') {
    return fallback;
  }
  if (!/^\d+$/u.test(trimmed) || Number.parseInt(trimmed, 10) < 1) {
    throw new InvalidSelectionError('Enter a whole number of searches greater than zero.', { input: trimmed });
  }
  return Number.parseInt(trimmed, 10);
}
