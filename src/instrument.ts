import * as Sentry from '@sentry/node';

import type { Config } from './config/index.js';

/**
 * Initialize Sentry when a DSN is configured; a no-op otherwise so local
 * runs need no Sentry project. Returns whether reporting is active.
 */
export function initSentry(sentry: Config['sentry']): boolean {
  if (!sentry) {
    return false;
  }

  Sentry.init({
    dsn: sentry.dsn,
    environment: sentry.environment,
    tracesSampleRate: sentry.tracesSampleRate,
    // Capture unhandled promise rejections
    integrations: [Sentry.onUnhandledRejectionIntegration()],
  });

  return true;
}

// Re-export Sentry for use in error handler
export { Sentry };
