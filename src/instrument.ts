import * as Sentry from '@sentry/node';
import type { FastifyBaseLogger } from 'fastify';

import { storageErrorKind } from './storage/errors.js';

export interface SentryOptions {
  dsn?: string;
  environment: string;
  tracesSampleRate?: number;
}

/** Error tracking stays off unless a DSN is configured. */
export function initSentry(options: SentryOptions, log: FastifyBaseLogger): void {
  if (!options.dsn) {
    log.info('Sentry DSN not configured, error tracking disabled');
    return;
  }

  Sentry.init({
    dsn: options.dsn,
    environment: options.environment,
    tracesSampleRate: options.tracesSampleRate ?? 0.1,
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  log.info({ environment: options.environment }, 'Sentry initialized');
}

/**
 * Send a 5xx to Sentry with the request it failed. Storage failures are
 * tagged with their kind so backend outages group together.
 */
export function reportServerError(error: Error, request: Record<string, unknown>): void {
  const kind = storageErrorKind(error) ?? storageErrorKind(error.cause);
  Sentry.captureException(error, {
    extra: { ...request, ...(kind && { storageKind: kind }) },
  });
}
