import { config as loadEnv } from 'dotenv';
loadEnv();

import type { Express } from 'express';
import { loadConfig, describeTurnstile, AppConfig, LogConfig } from './utils/config';

const CONFIG_PATH = process.env.CONFIG_PATH || 'config.json';
const PORT = Number(process.env.PORT || 8080);
const HOST = process.env.HOST || '0.0.0.0';

function readConfig(): AppConfig {
  try {
    return loadConfig(CONFIG_PATH);
  } catch (err) {
    // Logging is not set up yet
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`config load failed: ${message}\n`);
    process.exit(1);
  }
}

/**
 * The logger reads its settings from the environment when first imported,
 * so the config file's log section is copied there beforehand. Variables
 * already set in the environment win.
 */
function applyLogConfig(log: LogConfig): void {
  if (!process.env.LOG_LEVEL) process.env.LOG_LEVEL = log.minLevel;
  if (!process.env.LOG_DESTINATION && log.destination) process.env.LOG_DESTINATION = log.destination;
}

async function main(): Promise<void> {
  const config = readConfig();
  applyLogConfig(config.log);

  // Lazy imports: everything below depends on the configured logger
  const { default: logger } = await import('./utils/logger');
  const { initSentry } = await import('./utils/sentry');
  const { createApp, createDeps } = await import('./app');

  process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal({ err: reason }, 'Unhandled promise rejection');
  });

  process.on('uncaughtException', (err: Error) => {
    logger.fatal({ err }, 'Uncaught exception');
    // Give time for logs to flush, then exit
    setTimeout(() => process.exit(1), 1000);
  });

  const sentry = initSentry();
  logger.info(describeTurnstile(config.cfTurnstile));
  logger.info(
    {
      ctaEndpoint: config.options.ctaEndpoint,
      rateLimiting: config.options.enableRateLimiting,
      blockBotUserAgents: config.options.blockBotUserAgents,
      maxBodySize: config.options.maxBodySize,
    },
    'submission endpoint configured',
  );

  let app: Express;
  try {
    app = createApp(config, { ...createDeps(config), sentry });
  } catch (err) {
    logger.fatal({ err }, 'Failed to mount routes');
    setTimeout(() => process.exit(1), 1000);
    return;
  }

  const server = app.listen(PORT, HOST, () => {
    logger.info({ host: HOST, port: PORT }, `listening on ${HOST}:${PORT}`);
  });
  server.on('error', (err) => {
    logger.fatal({ err }, 'server error');
    setTimeout(() => process.exit(1), 1000);
  });
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.stack || err.message : String(err);
  process.stderr.write(`startup failed: ${message}\n`);
  process.exit(1);
});
