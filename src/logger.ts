import { pino, type Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const SERVICE_NAME = 'dyndns-cloudflare-proxy';

export function createLogger(options: { level?: LogLevel } = {}): Logger {
  return pino({
    name: SERVICE_NAME,
    level: options.level ?? 'info',
  });
}
