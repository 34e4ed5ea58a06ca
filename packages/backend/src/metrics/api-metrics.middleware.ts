import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { MetricsService } from './metrics.service';

/**
 * Counts finished requests by method, route pattern and status code.
 * The route pattern (`/api/chat/:sessionId/state`) keeps label
 * cardinality bounded; unmatched requests are counted as `unmatched`.
 */
@Injectable()
export class ApiMetricsMiddleware implements NestMiddleware {
  constructor(private readonly metrics: MetricsService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    res.on('finish', () => {
      this.metrics.recordApiRequest(req.method, routePattern(req), res.statusCode);
    });
    next();
  }
}

export function routePattern(req: Pick<Request, 'baseUrl' | 'route'>): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.baseUrl}${route.path}`;
  }
  return 'unmatched';
}
