import { NestFactory } from '@nestjs/core';
import { Logger as PinoLogger } from 'nestjs-pino';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module.js';

async function bootstrap() {
  // No HTTP surface: the scanner runs as a standalone application context
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  // Replace default NestJS logger with nestjs-pino
  app.useLogger(app.get(PinoLogger));

  // SIGTERM/SIGINT drive EngineLifecycleService.onApplicationShutdown
  app.enableShutdownHooks();

  const logger = new Logger('Bootstrap');
  logger.log('Arbitrage scanner started');
}

void bootstrap();
