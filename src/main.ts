import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the notifier (application context only, no HTTP server)
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const configService = app.get(ConfigService<AppConfig>);
  const logger = await app.resolve(PinoLoggerService);

  app.useLogger(logger);
  logger.setContext('Bootstrap');

  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const sqsConfig = configService.getOrThrow('sqs', { infer: true });
  const notifierConfig = configService.getOrThrow('notifier', { infer: true });

  let shuttingDown = false;
  const shutdownHandler = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, draining callback deliveries...');
    await app.close();
    logger.info('Notifier shut down gracefully');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdownHandler(signal).catch((error: unknown) => {
      logger.error(
        { signal, error: error instanceof Error ? error.message : String(error) },
        'Shutdown failed',
      );
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(
      { reason: reason instanceof Error ? reason.message : String(reason) },
      'Unhandled rejection',
    );
    process.exit(1);
  });

  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      concurrency: notifierConfig.concurrency,
      pendingCallbacksQueue: sqsConfig.pendingCallbacksUrl,
    },
    'Download notifier started',
  );
}

bootstrap().catch((error) => {
  console.error('Failed to start notifier:', error);
  process.exit(1);
});
