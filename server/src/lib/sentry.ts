import * as Sentry from '@sentry/node';
import logger from './logger.js';

const SENSITIVE_KEY_PATTERN = /key|token|secret|authorization/i;

let enabled = false;

/**
 * Initializes error reporting when a DSN is configured. Without one every
 * helper in this module is a no-op.
 */
export function initSentry(dsn: string | null, environment: string): void {
  if (!dsn) {
    logger.info('SENTRY_DSN not set, error reporting disabled');
    return;
  }

  Sentry.init({
    dsn,
    environment,
    tracesSampleRate: 0.1,
    beforeBreadcrumb(breadcrumb) {
      const data = breadcrumb.data;
      if (data) {
        for (const key of Object.keys(data)) {
          if (SENSITIVE_KEY_PATTERN.test(key)) data[key] = '[REDACTED]';
        }
      }
      return breadcrumb;
    },
  });
  enabled = true;
  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  if (!enabled) return;
  Sentry.withScope((scope) => {
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        scope.setExtra(key, value);
      }
    }
    Sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Sentry flush failed');
  }
}
