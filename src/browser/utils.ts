export function parseDuration(input: string, fallback: number): number {
  if (!input) {
    return fallback;
  }
  const trimmed = input.trim();
  if (!trimmed) {
    return fallback;
  }
  const lowercase = trimmed.toLowerCase();
  if (/^[0-9]+$/.test(lowercase)) {
    return Number(lowercase);
  }
  const normalized = lowercase.replace(/\s+/g, '');
  const singleMatch = /^([0-9]+)(ms|s|m|h)$/i.exec(normalized);
  if (singleMatch && singleMatch[0].length === normalized.length) {
    const value = Number(singleMatch[1]);
    return convertUnit(value, singleMatch[2]);
  }
  const multiDuration = /([0-9]+)(ms|h|m|s)/g;
  let total = 0;
  let lastIndex = 0;
  let match: RegExpExecArray | null = multiDuration.exec(normalized);
  while (match !== null) {
    total += convertUnit(Number(match[1]), match[2]);
    lastIndex = multiDuration.lastIndex;
    match = multiDuration.exec(normalized);
  }
  if (total > 0 && lastIndex === normalized.length) {
    return total;
  }
  return fallback;
}

function convertUnit(value: number, unitRaw: string | undefined): number {
  const unit = unitRaw?.toLowerCase();
  switch (unit) {
    case 'ms':
      return value;
    case 's':
      return value * 1000;
    case 'm':
      return value * 60_000;
    case 'h':
      return value * 3_600_000;
    default:
      return value;
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Additional tries after the first one. */
  retries?: number;
  delayMs?: number;
  /** Fixed spacing between tries instead of the default linear backoff. */
  fixedDelay?: boolean;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
  sleep?: (ms: number) => Promise<void>;
}

export async function withRetries<T>(task: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, delayMs = 250, fixedDelay = false, shouldRetry = () => true, onRetry, sleep = delay } = options;
  let attempt = 0;
  while (attempt <= retries) {
    try {
      return await task();
    } catch (error) {
      if (attempt === retries || !shouldRetry(error)) {
        throw error;
      }
      attempt += 1;
      onRetry?.(attempt, error);
      await sleep(fixedDelay ? delayMs : delayMs * attempt);
    }
  }
  throw new Error('withRetries exhausted without result');
}

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

/** Uniform integer in `[minMs, maxMs]`. */
export function randomBetween({ minMs, maxMs }: DelayRange, random: () => number = Math.random): number {
  const low = Math.min(minMs, maxMs);
  const high = Math.max(minMs, maxMs);
  return low + Math.floor(random() * (high - low + 1));
}

/** Parses `"200-500ms"`, `"1s-3s"` or a single duration into a range. */
export function parseDelayRange(input: string, fallback: DelayRange): DelayRange {
  const trimmed = input.trim();
  if (!trimmed) {
    return fallback;
  }
  const parts = trimmed.split(/\s*-\s*/u);
  if (parts.length > 2) {
    return fallback;
  }
  const [rawLow = '', rawHigh = rawLow] = parts;
  const unit = /[a-z]+$/iu.exec(rawHigh)?.[0] ?? '';
  const low = parseDuration(/[a-z]$/iu.test(rawLow) ? rawLow : `${rawLow}${unit}`, Number.NaN);
  const high = parseDuration(rawHigh, Number.NaN);
  if (!Number.isFinite(low) || !Number.isFinite(high)) {
    return fallback;
  }
  return { minMs: Math.min(low, high), maxMs: Math.max(low, high) };
}
