import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { AppModule } from './app.module';
import { validateRequiredEnv } from './env.validation';

async function bootstrap() {
  // Fail-fast env validation for database and model configuration
  validateRequiredEnv();
  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );

  const originsRaw = process.env.WEB_ORIGIN || 'http://localhost:3000';
  const allowedOrigins = originsRaw.split(',').map((o) => o.trim()).filter(Boolean);
  app.enableCors({
    origin: (reqOrigin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      if (!reqOrigin) return callback(null, true); // non-browser
      if (allowedOrigins.includes(reqOrigin)) return callback(null, true);
      return callback(new Error('CORS origin not allowed'), false);
    },
  });

  const port = parseInt(process.env.PORT || '8501', 10);
  await app.listen(port);
  new Logger('Bootstrap').log(`API listening on http://localhost:${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
