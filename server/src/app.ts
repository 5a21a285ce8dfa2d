import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import logger from './utils/logger';
import { AppConfig } from './utils/config';
import { metricsMiddleware, registry, enableDefaultMetrics } from './utils/metrics';
import { Sentry } from './utils/sentry';
import { createSubmissionRouter, GENERIC_REJECTION, RateLimiter } from './routes/submissions';
import { mountSites } from './routes/sites';
import { SlidingWindowRateLimiter } from './services/rateLimiter';
import { TurnstileVerifier, Verifier } from './services/turnstileClient';
import { SmtpMailer, Mailer } from './services/mailer';
import { AppError } from './utils/errors';

export interface AppDeps {
  rateLimiter: RateLimiter;
  verifier: Verifier;
  mailer: Mailer;
  /** Attach Sentry's Express error handler. */
  sentry?: boolean;
}

/** Production collaborators built from configuration. */
export function createDeps(config: AppConfig): Omit<AppDeps, 'sentry'> {
  return {
    rateLimiter: new SlidingWindowRateLimiter({
      enabled: config.options.enableRateLimiting,
      limit: config.options.rateLimitMax,
      windowMs: config.options.rateLimitWindowMs,
    }),
    verifier: new TurnstileVerifier(config.cfTurnstile),
    mailer: new SmtpMailer(config.smtp),
  };
}

/** HTTP status for an error that escaped a route. */
export function errorStatus(err: unknown): number {
  if (err instanceof AppError) return err.status;
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    if (err.status >= 400 && err.status < 600) return err.status;
  }
  return 500;
}

/** Catch-all for unhandled route errors. The body stays generic. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = errorStatus(err);
  logger.error({ err, status, path: req.path }, 'Unhandled route error');
  if (!res.headersSent) {
    res.status(status).type('text/plain').send(GENERIC_REJECTION);
  }
}

export function createApp(config: AppConfig, deps: AppDeps): Express {
  const app = express();

  // Hosted sites ship their own CSP
  app.use(helmet({ contentSecurityPolicy: false }));

  if (config.options.enableMetrics) {
    enableDefaultMetrics();
    app.use(metricsMiddleware);
    app.get('/-/metrics', (_req, res, next) => {
      registry.metrics().then((body) => {
        res.set('Content-Type', registry.contentType);
        res.send(body);
      }, next);
    });
  }

  app.get('/-/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(
    createSubmissionRouter({
      path: config.options.ctaEndpoint,
      blockBotUserAgents: config.options.blockBotUserAgents,
      maxBodySize: config.options.maxBodySize,
      rateLimiter: deps.rateLimiter,
      verifier: deps.verifier,
      mailer: deps.mailer,
    }),
  );

  mountSites(app, config.locations);

  if (deps.sentry) {
    Sentry.setupExpressErrorHandler(app);
  }

  app.use(errorHandler);

  return app;
}
