import { Module, Global, MiddlewareConsumer, NestModule } from '@nestjs/common';
import { StructuredLoggerService } from './structured-logger.service';
import { CorrelationMiddleware } from './correlation.middleware';

/**
 * LoggingModule
 *
 * Structured JSON logging and request correlation. Global, so the logger
 * can be injected anywhere. The exception filter is installed in main.ts.
 */
@Global()
@Module({
  providers: [StructuredLoggerService, CorrelationMiddleware],
  exports: [StructuredLoggerService, CorrelationMiddleware],
})
export class LoggingModule implements NestModule {
  /**
   * Apply correlation middleware to all routes
   */
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationMiddleware).forRoutes('*');
  }
}
