import fs from 'node:fs/promises';
import path from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';
import { getSearcherHomeDir } from './searcherHome.js';
import { parseDelayRange, parseDuration, type DelayRange } from './browser/utils.js';
import { ConfigurationError, describeError } from './errors.js';

export type CopyPolicy = 'operator-assisted' | 'automatic';

const durationSchema = z.union([z.number().int().nonnegative(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') {
    return value;
  }
  const parsed = parseDuration(value, Number.NaN);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a duration (use ms, s, m or h)` });
    return z.NEVER;
  }
  return parsed;
});

const delayRangeSchema = z
  .union([
    z.number().int().nonnegative(),
    z.string(),
    z.object({ minMs: z.number().int().nonnegative(), maxMs: z.number().int().nonnegative() }),
  ])
  .transform((value, ctx): DelayRange => {
    if (typeof value === 'number') {
      return { minMs: value, maxMs: value };
    }
    if (typeof value === 'string') {
      const parsed = parseDelayRange(value, { minMs: Number.NaN, maxMs: Number.NaN });
      if (!Number.isFinite(parsed.minMs)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a delay range (e.g. "200-500ms")` });
        return z.NEVER;
      }
      return parsed;
    }
    return { minMs: Math.min(value.minMs, value.maxMs), maxMs: Math.max(value.minMs, value.maxMs) };
  });

export const policySchema = z
  .enum(['operator', 'operator-assisted', 'automatic'])
  .transform((value): CopyPolicy => (value === 'automatic' ? 'automatic' : 'operator-assisted'));

export const userConfigSchema = z
  .object({
    searchUrl: z.string().url().optional(),
    inputSelector: z.string().min(1).optional(),
    signInSelector: z.string().min(1).optional(),
    edgePath: z.string().min(1).nullable().optional(),
    headless: z.boolean().optional(),
    debugPort: z.number().int().min(1).max(65535).nullable().optional(),
    navigationTimeoutMs: durationSchema.optional(),
    navigationRetries: z.number().int().min(1).max(10).optional(),
    navigationRetryDelayMs: durationSchema.optional(),
    inputTimeoutMs: durationSchema.optional(),
    networkIdleTimeoutMs: durationSchema.optional(),
    settleDelayMs: durationSchema.optional(),
    typingDelayMs: delayRangeSchema.optional(),
    submitPauseMs: delayRangeSchema.optional(),
    betweenSearchesMs: delayRangeSchema.optional(),
    maxAttempts: z.number().int().min(1).max(20).optional(),
    restartBackoffMs: durationSchema.optional(),
    waitForLogin: z.boolean().optional(),
    loginTimeoutMs: durationSchema.optional(),
    policy: policySchema.optional(),
    autoTerminate: z.boolean().optional(),
    lockReleaseDelayMs: durationSchema.optional(),
    keepWorkingCopy: z.boolean().optional(),
    queriesFile: z.string().min(1).nullable().optional(),
    profileRoot: z.string().min(1).nullable().optional(),
    logFile: z.string().min(1).nullable().optional(),
    lockInspectorPath: z.string().min(1).nullable().optional(),
  })
  .strict();

export type UserConfigInput = z.input<typeof userConfigSchema>;
export type UserConfig = z.output<typeof userConfigSchema>;

function resolveConfigPath(): string {
  return path.join(getSearcherHomeDir(), 'config.json');
}

export interface LoadConfigResult {
  config: UserConfig;
  path: string;
  loaded: boolean;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function parseUserConfig(raw: string, source: string): UserConfig {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${source}: ${describeError(error)}`, { path: source }, error);
  }
  const result = userConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid config in ${source}: ${formatIssues(result.error)}`, {
      path: source,
      issues: result.error.issues,
    });
  }
  return result.data;
}

export async function loadUserConfig(): Promise<LoadConfigResult> {
  const CONFIG_PATH = resolveConfigPath();
  let raw: string;
  try {
    raw = await fs.readFile(CONFIG_PATH, 'utf8');
  } catch (error) {
    const code = error && typeof error === 'object' && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      return { config: {}, path: CONFIG_PATH, loaded: false };
    }
    throw new ConfigurationError(`Failed to read ${CONFIG_PATH}: ${describeError(error)}`, { path: CONFIG_PATH }, error);
  }
  return { config: parseUserConfig(raw, CONFIG_PATH), path: CONFIG_PATH, loaded: true };
}
