/**
 * Settings loaded from the environment
 */

import { z } from 'zod';
import type { ZodError } from 'zod';
import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const settingsSchema = z.object({
  /** Minimum level written by the shared logger */
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  /** Decimal places kept of each array mantissa when hashing */
  hashMantissaDecimals: z.coerce.number().int().min(0).max(15).default(2),
});

export type Settings = z.infer<typeof settingsSchema>;

/** Environment variable names per setting */
export const SETTINGS_ENV = {
  logLevel: 'PIPEBOARD_LOG_LEVEL',
  hashMantissaDecimals: 'PIPEBOARD_HASH_DECIMALS',
} as const;

let current: Settings | null = null;

export function formatZodError(error: ZodError): string {
  const issues = error.issues ?? [];
  if (!issues.length) return error.message;
  return issues
    .map((issue) => {
      const path = issue.path?.length ? issue.path.map(String).join('.') : '';
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function readEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Parse settings from environment variables, unset ones take their defaults
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse({
    logLevel: readEnv(env, SETTINGS_ENV.logLevel),
    hashMantissaDecimals: readEnv(env, SETTINGS_ENV.hashMantissaDecimals),
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings: ${formatZodError(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function getSettings(): Settings {
  if (!current) {
    current = loadSettings();
  }
  return current;
}

/**
 * Override settings for this process (validated like the environment)
 */
export function configure(overrides: Partial<Settings>): Settings {
  const parsed = settingsSchema.safeParse({ ...getSettings(), ...overrides });
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings: ${formatZodError(parsed.error)}`, { cause: parsed.error });
  }
  current = parsed.data;
  return current;
}

/**
 * Drop cached settings so the next read goes back to the environment
 */
export function resetSettings(): void {
  current = null;
}
