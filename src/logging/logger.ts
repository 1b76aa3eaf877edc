import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export interface LogConfig {
  level?: string;
}

const REDACT_PATHS = [
  'client_secret',
  '*.client_secret',
  'password',
  '*.password',
  '*.token',
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'client_notification_token',
  '*.client_notification_token',
  '*.privateKey',
];

/**
 * Mask `secret=...`-style fragments inside free-form strings.
 */
export function redactSensitiveStrings(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/(PASSWORD|SECRET|TOKEN)=\S*/gi, '$1=***');
  }
  if (Array.isArray(value)) {
    return value.map(redactSensitiveStrings);
  }
  if (value && typeof value === 'object' && !(value instanceof Error)) {
    return redactRecord(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = redactSensitiveStrings(value);
  }
  return result;
}

function defaultLevel(): string {
  const level = process.env['LOG_LEVEL'];
  if (level) return level;
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

export function createLogger(config?: LogConfig): Logger {
  const options: LoggerOptions = {
    level: config?.level ?? defaultLevel(),
    base: { service: 'idp-core' },
    redact: { paths: REDACT_PATHS, censor: '***' },
    formatters: {
      log: redactRecord,
    },
  };

  return pino(options);
}

/** Root logger */
export let logger = createLogger();

export function configureLogger(config?: LogConfig): void {
  logger = createLogger(config);
}

/**
 * Child logger bound to a component name. Resolved per call so that
 * `configureLogger` takes effect everywhere.
 */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
