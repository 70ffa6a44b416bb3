import type { ErrorRequestHandler, RequestHandler, Response } from 'express';
import { isMalformedBodyError, isPayloadTooLargeError } from '../src/utils/errorHandler';
import { logger } from '../src/utils/logger';

export function sendError(res: Response, status: number, error: string): void {
  res.status(status).json({ success: false, error });
}

export const notFoundHandler: RequestHandler = (req, res) => {
  sendError(res, 404, 'This endpoint does not exist.');
};

/**
 * Last middleware in the chain: oversized bodies become 413, unparseable JSON 400,
 * and anything else a generic 500 whose cause is only logged.
 */
export function createErrorHandler(maxUploadBytes: number): ErrorRequestHandler {
  const maxMb = Math.floor(maxUploadBytes / 1024 / 1024);

  return (error, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isPayloadTooLargeError(error)) {
      logger.warn('Rejected oversized request: %s %s', req.method, req.path);
      sendError(res, 413, `File too large. Maximum size is ${maxMb}MB.`);
      return;
    }
    if (isMalformedBodyError(error)) {
      sendError(res, 400, 'Bad request. Please check your input data and format.');
      return;
    }
    logger.error('Internal server error on %s %s:', req.method, req.path, error);
    sendError(res, 500, 'An internal server error occurred. Please try again later.');
  };
}
