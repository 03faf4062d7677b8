import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { loadEnv, logLevelsFor } from './config/env.validation';

async function bootstrap() {
  const config = loadEnv(process.env);
  const app = await NestFactory.create(AppModule.register(config), {
    logger: logLevelsFor(config.LOG_LEVEL),
  });
  configureApp(app, config);

  await app.listen(config.PORT, '0.0.0.0');
  const logger = new Logger('bootstrap');
  logger.log(`listening on :${config.PORT}${config.API_PREFIX}`);
}

void bootstrap();
