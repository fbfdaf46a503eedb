import * as Sentry from '@sentry/node';
import type { Logger } from 'winston';

export interface SentryConfig {
  dsn?: string;
  environment: string;
  release?: string;
  serverName?: string;
  tracesSampleRate?: number;
}

/**
 * Initialize Sentry for Cloud Functions. Call once per runtime.
 * @returns whether error reporting is enabled
 */
export function initSentry(config: SentryConfig, logger?: Logger): boolean {
  if (!config.dsn) {
    logger?.warn('Sentry DSN not configured - error tracking disabled');
    return false;
  }

  try {
    const { dsn, environment, release, serverName, tracesSampleRate } = config;

    Sentry.init({
      dsn,
      environment,
      release,
      serverName,
      tracesSampleRate: tracesSampleRate ?? 0.1,
      integrations: [
        Sentry.httpIntegration(),
        Sentry.nativeNodeFetchIntegration(),
        Sentry.onUncaughtExceptionIntegration(),
        Sentry.onUnhandledRejectionIntegration(),
        Sentry.contextLinesIntegration(),
      ],
      beforeSend(event) {
        // Filter out sensitive data
        if (event.request?.headers) {
          delete event.request.headers['authorization'];
          delete event.request.headers['cookie'];
        }
        return event;
      },
    });

    logger?.info('Sentry initialized', {
      environment: config.environment,
      release: config.release,
    });
    return true;
  } catch (error) {
    logger?.error('Failed to initialize Sentry', { error });
    return false;
  }
}

/**
 * Capture an exception in Sentry with additional context.
 */
export function captureException(
  error: Error,
  context?: Record<string, unknown>,
  logger?: Logger
): void {
  try {
    if (context) {
      Sentry.setContext('additional', context);
    }
    Sentry.captureException(error);
    logger?.debug('Exception captured in Sentry', { error: error.message });
  } catch (err) {
    logger?.error('Failed to capture exception in Sentry', { error: err });
  }
}

/**
 * Wait for queued events to be sent. Cloud Functions may freeze the instance
 * as soon as the response is written.
 */
export async function flushSentry(timeoutMs: number, logger?: Logger): Promise<void> {
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger?.warn('Failed to flush Sentry', { error: err });
  }
}

export { Sentry };
