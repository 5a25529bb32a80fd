/**
 * Runtime configuration from environment variables
 *
 * Usage:
 *   import { config } from '@/lib/config';
 *   const timeout = config.playback.readyTimeoutMs;
 *
 * Tests and embedders that need a different environment call loadConfig()
 * directly instead of mutating process.env.
 */

import { z } from 'zod';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

/** Longest delay setTimeout honours; larger values fire immediately */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
  PLAYBACK_READY_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_DELAY_MS).default(8000),
  PLAYBACK_MIN_DURATION_SECONDS: z.coerce.number().nonnegative().default(0.01),
});

export interface AppConfig {
  logLevel: LogLevelName;
  isProd: boolean;
  playback: {
    /** Deadline for a prepare() attempt to reach ready */
    readyTimeoutMs: number;
    /** Durations at or below this are rejected */
    minDurationSeconds: number;
  };
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly keys: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Empty strings mean "unset" so `LOG_LEVEL= npm test` behaves like no override.
function stripEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(stripEmpty(env));
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigError(`Invalid environment configuration: ${keys.join(', ')}`, keys);
  }

  const isProd = parsed.data.NODE_ENV === 'production';
  return {
    logLevel: parsed.data.LOG_LEVEL ?? (isProd ? 'warn' : 'debug'),
    isProd,
    playback: {
      readyTimeoutMs: parsed.data.PLAYBACK_READY_TIMEOUT_MS,
      minDurationSeconds: parsed.data.PLAYBACK_MIN_DURATION_SECONDS,
    },
  };
}

export const config: AppConfig = loadConfig();
