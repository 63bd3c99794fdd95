import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import winston from 'winston';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { APP_LOGGER } from './common/logger/logger';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn'],
  });
  const configService = app.get(ConfigService);
  const logger = app.get<winston.Logger>(APP_LOGGER);

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.enableCors({
    origin: configService.getOrThrow<AppConfig['corsOrigin']>('corsOrigin'),
    credentials: true,
  });

  app.setGlobalPrefix('api');
  app.enableShutdownHooks();

  const port = configService.getOrThrow<AppConfig['port']>('port');
  await app.listen(port);

  logger.info(`Scoring server running on http://localhost:${port}`, {
    strategy: configService.get<string>('scoring.strategy'),
  });
  logger.info(`WebSocket server ready on ws://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  console.error('Error during bootstrap:', error);
  process.exit(1);
});
