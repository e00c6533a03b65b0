import type { ErrorRequestHandler } from 'express';
import { StatusCodes } from 'http-status-codes';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import type { ILogger } from '@keepsake/types';
import {
  DuplicateSlugError,
  KeepsakeError,
  NotFoundError,
  PageSaveError,
  ServiceUnavailableError,
  UnauthorizedError,
  UpstreamError
} from '../../lib/errors.js';

function statusFor(error: KeepsakeError): number {
  if (error instanceof NotFoundError) return StatusCodes.NOT_FOUND;
  if (error instanceof DuplicateSlugError) return StatusCodes.CONFLICT;
  if (error instanceof UnauthorizedError) return StatusCodes.UNAUTHORIZED;
  if (error instanceof UpstreamError) return StatusCodes.BAD_GATEWAY;
  if (error instanceof ServiceUnavailableError) return StatusCodes.SERVICE_UNAVAILABLE;
  if (error instanceof PageSaveError) return StatusCodes.INTERNAL_SERVER_ERROR;
  return StatusCodes.BAD_REQUEST;
}

export function createErrorHandler(logger: ILogger): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    let status: number = StatusCodes.INTERNAL_SERVER_ERROR;
    let code = 'INTERNAL_ERROR';
    let message = 'Internal server error';
    let details: unknown;

    if (error instanceof KeepsakeError) {
      status = statusFor(error);
      code = error.code;
      message = error.message;
      details = error.details;
    } else if (error instanceof ZodError) {
      status = StatusCodes.BAD_REQUEST;
      code = 'VALIDATION_ERROR';
      message = 'Invalid request payload';
      details = error.flatten();
    } else if (error instanceof MulterError) {
      status = error.code === 'LIMIT_FILE_SIZE' ? StatusCodes.REQUEST_TOO_LONG : StatusCodes.BAD_REQUEST;
      code = 'UPLOAD_REJECTED';
      message = error.message;
    }

    if (status >= 500) {
      logger.error({ error, requestId: req.id }, 'Unhandled error');
    } else {
      logger.warn({ error, requestId: req.id }, 'Handled error');
    }

    res.status(status).json({ success: false, error: message, code, details });
  };
}
