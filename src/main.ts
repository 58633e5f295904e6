import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import configuration, { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';
import { ExternalToolRunnerPort } from './application/ports/output/external-tool-runner.port';
import { EXTERNAL_TOOL_RUNNER_PORT } from './infrastructure/infrastructure.module';

/**
 * Headroom on top of the pool timeout for the HTTP server's own request
 * timeout, so a slow invocation is always ended by the pool (with a TIMEOUT
 * response) and not by the server.
 */
const REQUEST_TIMEOUT_HEADROOM_MS = 30_000;

/** Room for inline base64 media in data: URLs */
const BODY_LIMIT_BYTES = 64 * 1024 * 1024;

/**
 * Bootstrap the HTTP launcher: one worker pool, one Fastify server.
 */
async function bootstrap() {
  // Read ahead of the app: the server's own timeout depends on it
  const { timeoutMs } = configuration().workerPool;

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({
      requestTimeout: timeoutMs + REQUEST_TIMEOUT_HEADROOM_MS,
      bodyLimit: BODY_LIMIT_BYTES,
    }),
    { bufferLogs: true },
  );

  // Get services
  const configService = app.get(ConfigService<AppConfig>);
  const logger = await app.resolve(PinoLoggerService);

  // Use custom logger
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  const server = configService.getOrThrow('server', { infer: true });
  const workerPool = configService.getOrThrow('workerPool', { infer: true });
  const nodeEnv = configService.getOrThrow('nodeEnv', { infer: true });

  // Register shutdown handlers; closing the app drains the pool (onModuleDestroy)
  let shuttingDown = false;
  const shutdownHandler = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, draining in-flight invocations...');
    await app.close();
    logger.info('Application shut down gracefully');
    logger.flush();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdownHandler(signal).catch((error: Error) => {
      logger.error({ error: error.message, stack: error.stack }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  await app.listen(server.port, server.host);

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      address: `${server.host}:${server.port}`,
      workerCount: workerPool.workerCount,
      timeoutMs: workerPool.timeoutMs,
    },
    'Media tool service started',
  );

  const toolRunner = app.get<ExternalToolRunnerPort>(EXTERNAL_TOOL_RUNNER_PORT);
  const versions = await toolRunner.probeVersions();
  if (versions.ytDlp === null || versions.ffmpeg === null) {
    logger.warn({ ...versions }, 'External tools missing; invocations using them will fail');
  } else {
    logger.info({ ...versions }, 'External tools available');
  }
}

bootstrap().catch((error) => {
  console.error('Failed to start media tool service:', error);
  process.exit(1);
});
