import { INestApplication, ValidationPipe } from '@nestjs/common';
import helmet from 'helmet';
import type { Env } from './config/env.validation';

/** HTTP-level wiring shared by the server and the end-to-end tests. */
export function configureApp(app: INestApplication, config: Env): void {
  const corsOrigins = config.CORS_ORIGIN === '*' ? true : config.CORS_ORIGIN.split(',').map((o) => o.trim()).filter(Boolean);
  app.enableCors({
    origin: corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    }),
  );

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );

  app.setGlobalPrefix(config.API_PREFIX.replace(/^\//, ''));
  app.enableShutdownHooks();
}
