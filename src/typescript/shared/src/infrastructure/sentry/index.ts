import * as Sentry from '@sentry/node';
import type { Logger } from 'winston';

export interface SentryConfig {
  dsn?: string;
  environment: string;
  release?: string;
  serverName?: string;
  tracesSampleRate?: number;
}

let initialized = false;
let enabled = false;

/**
 * Initialize Sentry for Cloud Functions.
 * Safe to call multiple times - will only initialize once.
 */
export function initSentry(config: SentryConfig, logger?: Logger): void {
  if (initialized) return;
  initialized = true;

  if (!config.dsn) {
    logger?.warn('Sentry DSN not configured - error tracking disabled');
    return;
  }

  try {
    const { dsn, environment, release, serverName } = config;

    Sentry.init({
      dsn,
      environment,
      release,
      serverName,
      tracesSampleRate: config.tracesSampleRate ?? (environment.includes('prod') ? 0.1 : 1.0),
      integrations: [
        Sentry.httpIntegration(),
        Sentry.nativeNodeFetchIntegration(),
        Sentry.onUncaughtExceptionIntegration(),
        Sentry.onUnhandledRejectionIntegration(),
        Sentry.contextLinesIntegration(),
      ],
      beforeSend(event) {
        // Strip credentials
        if (event.request?.headers) {
          delete event.request.headers['authorization'];
          delete event.request.headers['cookie'];
        }
        return event;
      },
    });
    enabled = true;

    logger?.info('Sentry initialized', {
      environment: config.environment,
      release: config.release,
    });
  } catch (error) {
    logger?.error('Failed to initialize Sentry', { error });
  }
}

/**
 * Capture an exception in Sentry with additional context.
 */
export function captureException(
  error: unknown,
  context?: Record<string, unknown>,
  logger?: Logger
): void {
  try {
    Sentry.withScope(scope => {
      if (context) {
        scope.setContext('additional', context);
      }
      Sentry.captureException(error);
    });
    logger?.debug('Exception captured in Sentry', { error: error instanceof Error ? error.message : String(error) });
  } catch (err) {
    logger?.error('Failed to capture exception in Sentry', { error: err });
  }
}

/**
 * Waits for queued events to be sent. Cloud Functions may freeze the
 * instance as soon as the invocation returns.
 */
export async function flushSentry(timeoutMs = 2000, logger?: Logger): Promise<void> {
  if (!enabled) return;
  try {
    const flushed = await Sentry.flush(timeoutMs);
    if (!flushed) {
      logger?.warn('Sentry flush timed out', { timeoutMs });
    }
  } catch (err) {
    logger?.error('Failed to flush Sentry', { error: err });
  }
}
