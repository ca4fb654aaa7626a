/**
 * backend/src/index.ts
 *
 * WHY:
 * - Single entrypoint for the backend application.
 * - Keeps startup logic small: load config -> build app -> listen.
 * - Invalid configuration is fatal: log the offending variables, exit 1.
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { logger } from './shared/logger/logger';
import { ConfigError } from './shared/errors/infra-errors';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, close } = await buildApp(config);

  await app.listen({ port: config.port, host: '0.0.0.0' });

  logger.info('server.listening', {
    port: config.port,
    env: config.nodeEnv,
    service: config.serviceName,
  });

  const shutdown = async (signal: string) => {
    logger.info('server.shutdown', { signal });
    await close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('server.shutdown_failed', { signal, err });
        process.exit(1);
      });
    });
  }
}

void main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.error('server.invalid_config', { issues: err.issues });
  } else {
    logger.error('server.fatal_startup_error', { err });
  }
  process.exit(1);
});
