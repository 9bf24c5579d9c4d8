import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = configureApp(await NestFactory.create(AppModule));

  // Kafka producer disconnects and the pool drains on SIGTERM
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 2127);
  await app.listen(port);

  logger.log(`Insurance cost API is running on port ${port}`);
  logger.log(`Environment: ${configService.get<string>('NODE_ENV', 'not set')}`);
}

bootstrap().catch((error: Error) => {
  new Logger('Bootstrap').error(`Failed to start: ${error.message}`, error.stack);
  process.exit(1);
});
