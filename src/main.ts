import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  configureApp(app);

  // closes open live sockets and stops timers on SIGTERM
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>('PORT', 1422);
  await app.listen(port);
  logger.log(`Application is running on: http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  const err = error as Error;
  new Logger('Bootstrap').error(`Failed to start: ${err.message}`, err.stack);
  process.exit(1);
});
