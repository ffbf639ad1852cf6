// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';
export const DEFAULT_REDDIT_TIMEOUT_MS = 30000;

const required = () => z.string().trim().min(1, 'Must not be empty');

// Environment Schema (what the process reads)
const EnvSchema = z.object({
  REDDIT_CLIENT_ID: required(),
  REDDIT_CLIENT_SECRET: required(),
  REDDIT_USER_AGENT: required(),
  REDDIT_TIMEOUT_MS: z.coerce
    .number()
    .int('Must be a whole number of milliseconds')
    .positive('Must be a whole number of milliseconds')
    .optional(),
  GEMINI_API_KEY: required(),
  GEMINI_MODEL: z.string().trim().min(1).optional(),
  LOG_LEVEL: z
    .enum(['debug', 'info', 'warn', 'error'], {
      errorMap: () => ({ message: "LOG_LEVEL must be 'debug', 'info', 'warn', or 'error'" }),
    })
    .optional(),
  LOG_FORMAT: z
    .enum(['json', 'pretty'], {
      errorMap: () => ({ message: "LOG_FORMAT must be 'json' or 'pretty'" }),
    })
    .optional(),
});

// Complete Persona Configuration Schema
export const PersonaConfigSchema = EnvSchema.transform((env) => ({
  reddit: {
    clientId: env.REDDIT_CLIENT_ID,
    clientSecret: env.REDDIT_CLIENT_SECRET,
    userAgent: env.REDDIT_USER_AGENT,
    timeoutMs: env.REDDIT_TIMEOUT_MS ?? DEFAULT_REDDIT_TIMEOUT_MS,
  },
  gemini: {
    apiKey: env.GEMINI_API_KEY,
    model: env.GEMINI_MODEL ?? DEFAULT_GEMINI_MODEL,
  },
  logging: {
    level: env.LOG_LEVEL ?? 'info',
    format: env.LOG_FORMAT ?? 'json',
  },
}));

export type PersonaConfig = z.output<typeof PersonaConfigSchema>;
export type RedditCredentials = PersonaConfig['reddit'];
export type GeminiSettings = PersonaConfig['gemini'];

type EnvRecord = Record<string, string | undefined>;

/**
 * Validate the process environment and build the typed configuration
 *
 * @param env - Environment record, usually `process.env` after dotenv has loaded
 * @throws {ConfigError} Listing every missing or invalid variable
 */
export function loadConfig(env: EnvRecord = process.env): PersonaConfig {
  const result = validateConfigSafe(env);

  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.errors.join('; ')}`, {
      errors: result.errors,
    });
  }

  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  env: EnvRecord
): { success: true; data: PersonaConfig } | { success: false; errors: string[] } {
  const result = PersonaConfigSchema.safeParse(env);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
