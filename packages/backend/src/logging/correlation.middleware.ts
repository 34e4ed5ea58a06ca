import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

/**
 * Header name for correlation ID
 */
export const CORRELATION_ID_HEADER = 'x-correlation-id';

/**
 * CorrelationMiddleware
 *
 * Attaches a correlation ID to every incoming request. Taken from the
 * x-correlation-id header when an upstream service set one, otherwise a
 * new UUID, which is written back to the request headers so handlers can
 * read it with `@Headers()`. Echoed in the response headers.
 */
@Injectable()
export class CorrelationMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const header = req.headers[CORRELATION_ID_HEADER];
    const correlationId = typeof header === 'string' && header ? header : uuid();

    Object.assign(req, { correlationId });
    req.headers[CORRELATION_ID_HEADER] = correlationId;
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    next();
  }
}

export function getCorrelationId(req: Request): string | undefined {
  return 'correlationId' in req && typeof req.correlationId === 'string' ? req.correlationId : undefined;
}
