import * as Sentry from '@sentry/node';
import logger from './logger';

/** Initialise Sentry when SENTRY_DSN is set. Returns whether it is active. */
export function initSentry(): boolean {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.info('SENTRY_DSN not set, Sentry disabled');
    return false;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV || 'development',
    release: process.env.npm_package_version || '1.0.0',
    tracesSampleRate: parseFloat(process.env.SENTRY_TRACES_SAMPLE_RATE || '0.1'),
  });

  logger.info('Sentry initialized');
  return true;
}

export { Sentry };
