import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe, VersioningType } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { NextFunction, Request, Response } from 'express';
import { AppModule } from './app.module';

const DEFAULT_ORIGINS = ['http://localhost:3000', 'http://localhost:3001'];

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('HTTP');

  // URI versioning: /v1/knowledge/*, /v1/information/*
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: '1',
  });

  app.use((req: Request, res: Response, next: NextFunction) => {
    const { method, originalUrl } = req;
    const start = Date.now();

    res.on('finish', () => {
      logger.log(`${method} ${originalUrl} ${res.statusCode} - ${Date.now() - start}ms`);
    });

    next();
  });

  // Internal service: only the listed front ends may call it from a browser
  const allowedOrigins = [
    ...DEFAULT_ORIGINS,
    ...(process.env.CORS_ORIGINS || '')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  ];

  app.enableCors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('CORS policy violation'));
      }
    },
    credentials: true,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Agricultural Knowledge Service')
    .setDescription(
      'Internal document search over agricultural knowledge (pesticides, crop protection, ' +
        'fertilizers, seeds, machinery) and a three-tier information hierarchy: ' +
        'farmer-specific, country-specific and global.',
    )
    .setVersion('1.0')
    .addTag('knowledge', 'Knowledge base search and indexing')
    .addTag('information', 'Information hierarchy and grounded answers')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT || 3002;
  await app.listen(port);

  Logger.log(`Agricultural Knowledge Service running on http://localhost:${port}`, 'Bootstrap');
  Logger.log(`Swagger API docs available at http://localhost:${port}/api`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start', error instanceof Error ? error.stack : String(error), 'Bootstrap');
  process.exit(1);
});
