import { Request, Response, NextFunction } from 'express';
import httpStatus from 'http-status';
import { config } from '../../config/config';
import logger from '../utils/logger';
import { ApiError } from './ApiError';

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  let statusCode: number = httpStatus.INTERNAL_SERVER_ERROR;
  let message = String(httpStatus[httpStatus.INTERNAL_SERVER_ERROR]);

  if (err instanceof ApiError) {
    statusCode = err.statusCode;
    message = err.message;
  } else if (err instanceof Error && err.message) {
    message = err.message;
  }

  res.locals.errorMessage = message;

  const response = {
    code: statusCode,
    message,
    ...(config.nodeEnv === 'development' && err instanceof Error ? { stack: err.stack } : {}),
  };

  if (statusCode >= httpStatus.INTERNAL_SERVER_ERROR) {
    logger.error({ err, path: req.path }, 'Unhandled request error');
  }

  res.status(statusCode).send(response);
};
