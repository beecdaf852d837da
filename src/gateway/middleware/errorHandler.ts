import { ErrorRequestHandler, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { GatewayError, StoreUnavailableError, sendError } from '../../shared/errors';
import { Logger } from '../../shared/logger';

export const notFoundHandler: RequestHandler = (req, res) => {
  sendError(res, new GatewayError('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
};

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ZodError) {
      sendError(res, new GatewayError('VALIDATION_FAILED', 'Validation failed', err.issues));
      return;
    }

    // express.json() rejects unparseable bodies with a 400-type error
    if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
      sendError(res, new GatewayError('VALIDATION_FAILED', 'Request body is not valid JSON'));
      return;
    }

    if (err instanceof StoreUnavailableError) {
      logger.error({ err: err.cause, operation: err.operation, method: req.method, path: req.path }, 'Store unavailable');
      sendError(res, err);
      return;
    }

    if (err instanceof GatewayError) {
      if (err.status >= 500) {
        logger.error({ err, code: err.code, method: req.method, path: req.path }, 'Request failed');
      } else {
        logger.warn({ code: err.code, status: err.status, method: req.method, path: req.path }, 'Request failed');
      }
      sendError(res, err);
      return;
    }

    logger.error({ err, method: req.method, path: req.path }, 'Unhandled error');
    sendError(res, new GatewayError('INTERNAL_ERROR', 'Internal server error'));
  };
}
