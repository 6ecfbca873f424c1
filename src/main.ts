import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { UnprocessableEntityException, ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import * as helmet from 'helmet';
import { AppModule } from './app.module';
import { initializeSentry } from './config/sentry.config';
import { getServerConfig } from './config/server.config';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });

  const logger = app.get(WINSTON_MODULE_NEST_PROVIDER);
  app.useLogger(logger);

  const configService = app.get(ConfigService);
  initializeSentry(configService);
  const serverConfig = getServerConfig(configService);

  app.use(
    helmet.default({
      crossOriginEmbedderPolicy: false, // Swagger UI
    }),
  );

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      // Ошибки валидации тела и query отдаются как 422
      exceptionFactory: (errors) =>
        new UnprocessableEntityException({
          message: 'Validation failed',
          messages: errors.flatMap((error) => Object.values(error.constraints ?? {})),
        }),
    }),
  );

  app.enableCors({
    origin: serverConfig.corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Idempotency-Key', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id'],
  });

  app.setGlobalPrefix('api/v1');

  const config = new DocumentBuilder()
    .setTitle('Organization Directory API')
    .setDescription(
      `Справочник организаций, зданий и видов деятельности.

## Аутентификация

Эндпоинты /activities и /buildings требуют заголовок \`Authorization: Bearer <token>\`
со статическим токеном из AUTH_TOKEN. /organizations открыт.

## Идемпотентность

POST, PUT и PATCH с заголовком \`X-Idempotency-Key\` повторно возвращают
сохраненный ответ вместо повторного выполнения.

## Пагинация и сортировка

\`page\` (с 1), \`limit\` (1-100), \`sort=field:asc|desc\` (можно повторять).`,
    )
    .setVersion('1.0')
    .addBearerAuth()
    .addTag('Activities', 'Виды деятельности (дерево до 3 уровней)')
    .addTag('Buildings', 'Здания')
    .addTag('Organizations', 'Организации')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      persistAuthorization: true,
      tagsSorter: 'alpha',
    },
    customSiteTitle: 'Organization Directory API',
  });

  await app.listen(serverConfig.port);
  logger.log(`Application is running on: http://localhost:${serverConfig.port}`, 'Bootstrap');
  logger.log(`Swagger documentation: http://localhost:${serverConfig.port}/api/docs`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  console.error('Application failed to start', error);
  process.exit(1);
});
