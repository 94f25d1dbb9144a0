import { z } from 'zod';
import type { BasicAuthCredentials } from './auth.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  cloudflare: {
    apiToken: string;
    zoneId: string;
  };
  /** Present only when both username and password are configured */
  basicAuth?: BasicAuthCredentials;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Unset and empty environment variables are treated the same */
const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const required = z.preprocess(
  emptyToUndefined,
  z.string({ required_error: 'is required' })
);

const envSchema = z.object({
  PORT: z.preprocess(
    emptyToUndefined,
    z.coerce
      .number({ invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .min(0, 'must be between 0 and 65535')
      .max(65535, 'must be between 0 and 65535')
      .default(8080)
  ),
  HOST: z.preprocess(emptyToUndefined, z.string().default('0.0.0.0')),
  LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(LOG_LEVELS).default('info')),
  CLOUDFLARE_API_TOKEN: required,
  CLOUDFLARE_ZONE_ID: required,
  BASIC_AUTH_USERNAME: z.string().optional(),
  BASIC_AUTH_PASSWORD: z.string().optional(),
});

/**
 * Load configuration from environment variables.
 *
 * Throws `ConfigError` naming every invalid or missing variable.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join(', ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const username = vars.BASIC_AUTH_USERNAME ?? '';
  const password = vars.BASIC_AUTH_PASSWORD ?? '';

  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    cloudflare: {
      apiToken: vars.CLOUDFLARE_API_TOKEN,
      zoneId: vars.CLOUDFLARE_ZONE_ID,
    },
    basicAuth:
      username && password ? { username, password } : undefined,
  };
}
