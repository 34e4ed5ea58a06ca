import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { errorMessage } from './intake/intake.errors';
import { GlobalExceptionFilter } from './logging/global-exception.filter';
import { CORRELATION_ID_HEADER } from './logging/correlation.middleware';
import { StructuredLoggerService } from './logging/structured-logger.service';

async function bootstrap() {
  const bootstrapLogger = new StructuredLoggerService().setContext('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    // Buffer until the structured logger is installed
    bufferLogs: true,
  });

  const structuredLogger = await app.resolve(StructuredLoggerService);
  structuredLogger.setContext('NestApplication');
  app.useLogger(structuredLogger);

  const origins = (process.env.CORS_ORIGINS || 'http://localhost:4200')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  app.enableCors({
    origin: origins,
    methods: 'GET,HEAD,PUT,POST,DELETE,OPTIONS',
    credentials: true,
    exposedHeaders: [CORRELATION_ID_HEADER],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept', CORRELATION_ID_HEADER],
  });

  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
  }));

  app.useGlobalFilters(new GlobalExceptionFilter());

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('FormTalk')
      .setDescription('Conversational intake agent driven by form configurations')
      .setVersion('1.0')
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document);

  const port = process.env.PORT || 3000;
  await app.listen(port);

  bootstrapLogger.log(`FormTalk backend is running on: http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  const errorLogger = new StructuredLoggerService().setContext('Bootstrap');
  errorLogger.error('Failed to start application', error instanceof Error ? error.stack : errorMessage(error));
  process.exit(1);
});
