import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { APIError, ErrorType } from '../../../shared/errors/ErrorClassifier';

const toAPIError = (err: unknown): APIError => {
  if (err instanceof APIError) return err;

  // express.json() 解析失敗會帶 status 400
  const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
    ? err.status
    : 500;
  const message = err instanceof Error ? err.message : 'Internal Server Error';
  const stack = err instanceof Error ? err.stack : undefined;

  return new APIError(
    status,
    status === 400 ? ErrorType.VALIDATION : ErrorType.UNKNOWN,
    status === 400 ? 'BAD_REQUEST' : 'INTERNAL_ERROR',
    message,
    process.env.NODE_ENV === 'development' ? { stack } : undefined
  );
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const apiError = toAPIError(err);

  logger.error('API Error', {
    type: apiError.errorType,
    code: apiError.errorCode,
    message: apiError.message,
    path: req.path,
    method: req.method,
    details: apiError.details
  });

  res.status(apiError.statusCode).json(apiError.toJSON());
};
