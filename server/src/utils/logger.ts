import pino from 'pino';
import { LOG_LEVELS, LogLevel } from './config';

function resolveLevel(): LogLevel {
  const fromEnv = (process.env.LOG_LEVEL || '').toLowerCase();
  const match = LOG_LEVELS.find((l) => l === fromEnv);
  if (match) return match;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function buildTransport(level: LogLevel): pino.TransportMultiOptions {
  const targets: pino.TransportTargetOptions[] = [];

  // Stdout unless a log file is configured
  const destination = process.env.LOG_DESTINATION;
  targets.push({
    target: 'pino/file',
    options: destination ? { destination, append: true, mkdir: true } : { destination: 1 },
    level,
  });

  // Forward error+ logs to Sentry when DSN is configured
  if (process.env.SENTRY_DSN) {
    targets.push({
      target: 'pino-sentry-transport',
      options: { sentry: { dsn: process.env.SENTRY_DSN } },
      level: 'error',
    });
  }

  return { targets };
}

const level = resolveLevel();

// Pino does not allow custom level formatters with transport.targets,
// so records keep pino's numeric levels.
const logger = pino({
  level,
  transport: buildTransport(level),
  timestamp: pino.stdTimeFunctions.isoTime,
});

export default logger;
