import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiError, AuthorizationError } from '../../shared/errors';
import type { Logger } from '../../shared/logger';
import type { Decision } from '../../auth/accessControl';

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler by itself
export function route(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function enforce(decision: Decision): void {
  if (!decision.allowed) {
    throw new AuthorizationError(decision.reason);
  }
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}

// body-parser flags client faults it is safe to echo (413, 415) with `expose`
function exposedClientError(error: unknown): { status: number; message: string } | null {
  if (
    error instanceof Error &&
    'expose' in error &&
    error.expose === true &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return { status: error.status, message: error.message };
  }
  return null;
}

export function createErrorHandler(logger: Logger) {
  // Express recognises error handlers by arity, so `_next` must stay
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (error instanceof ApiError) {
      if (error.status >= 500) {
        logger.error('Dependency failure', { method: req.method, path: req.path, error: error.cause ?? error });
      }
      res.status(error.status).json(error.body());
      return;
    }

    if (isBodyParseError(error)) {
      res.status(400).json({ detail: 'Malformed JSON body.' });
      return;
    }

    const clientError = exposedClientError(error);
    if (clientError) {
      res.status(clientError.status).json({ detail: clientError.message });
      return;
    }

    logger.error('Unhandled error', { method: req.method, path: req.path, error });
    res.status(500).json({ detail: 'Internal server error.' });
  };
}
