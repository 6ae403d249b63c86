import pino from 'pino';
import { getEnvironment } from '../config/environment';
import { APP_NAME } from '../config/constants';
import { getTransport } from './getTransport';

const SENSITIVE_KEYS = ['openai_api_token', 'authorization', 'api_key', 'apikey', 'token', 'secret', 'password'];

// pino's own redaction, for the places request headers usually end up
const REDACT_PATHS = ['headers.authorization', 'config.apiToken', 'apiToken'];

function isSensitive(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Masks secret-looking keys in log fields, one level of nesting deep.
 */
export function redactFields(fields: Record<string, unknown>, depth = 1): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (isSensitive(key)) {
      redacted[key] = '[REDACTED]';
    } else if (depth > 0 && isPlainObject(value)) {
      redacted[key] = redactFields(value, depth - 1);
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

function createLogger(): pino.Logger {
  const env = getEnvironment();
  const defaultLevel = env.NODE_ENV === 'development' ? 'debug' : 'info';

  return pino({
    name: APP_NAME,
    level: env.LOG_LEVEL ?? defaultLevel,
    transport: getTransport(),
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
    formatters: {
      log: fields => redactFields(fields),
    },
  });
}

let cachedLogger: pino.Logger | null = null;
export function getLogger(): pino.Logger {
  if (!cachedLogger) cachedLogger = createLogger();
  return cachedLogger;
}

export const logger: pino.Logger = new Proxy({} as pino.Logger, {
  get: (_target, prop: string | symbol) => {
    const real = getLogger();

    const value: unknown = Reflect.get(real, prop);
    if (typeof value === 'function') {
      return value.bind(real);
    }
    return value;
  },
});

export function createChildLogger(correlationId: string): pino.Logger {
  return getLogger().child({ correlationId });
}

export function generateCorrelationId(): string {
  return `sxs-${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
}

export async function withTiming<T>(
  log: pino.Logger,
  event: string,
  fn: () => Promise<T>,
  fields?: Record<string, unknown>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    log.info({ event, durationMs: Date.now() - start, status: 'ok', ...(fields ?? {}) });
    return result;
  } catch (error) {
    log.error({ event, durationMs: Date.now() - start, error, ...(fields ?? {}) }, 'failed');
    throw error;
  }
}
