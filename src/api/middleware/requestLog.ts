import { Request, Response, NextFunction } from 'express';
import type { Logger } from '../../shared/logger';

interface RequestLogOptions {
  slowRequestMs: number;
  ignorePaths?: string[];
}

/**
 * API usage log: one entry per finished request with method, path, status,
 * duration and the authenticated user, if any.
 */
export function createRequestLogMiddleware(logger: Logger, options: RequestLogOptions) {
  const ignorePaths = options.ignorePaths ?? ['/health'];

  return (req: Request, res: Response, next: NextFunction): void => {
    if (ignorePaths.includes(req.path)) {
      next();
      return;
    }

    const startedAt = process.hrtime.bigint();

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      const entry = {
        method: req.method,
        path: req.originalUrl.split('?')[0],
        status: res.statusCode,
        durationMs: Math.round(durationMs * 100) / 100,
        userId: req.authContext?.sub ?? null,
        ip: req.ip,
        userAgent: req.get('user-agent') ?? null,
      };

      if (res.statusCode >= 500) {
        logger.error('Request failed', entry);
      } else if (durationMs >= options.slowRequestMs) {
        logger.warn('Slow request', entry);
      } else {
        logger.info('Request completed', entry);
      }
    });

    next();
  };
}
