import { Request, Response, NextFunction } from 'express';

export interface AppError extends Error {
  statusCode?: number;
  isOperational?: boolean;
  code?: string;
  // set by body-parser on malformed request bodies
  expose?: boolean;
}

/**
 * Global error handler middleware
 * Operational errors carry a caller-safe message; anything else is reported
 * as a bare 500.
 */
export function errorHandler(
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
) {
  const statusCode = err.statusCode || 500;
  const operational = err.isOperational === true || err.expose === true;

  console.error('Error:', {
    name: err.name,
    message: err.message,
    statusCode,
    path: req.path,
    method: req.method,
    ...(!operational && { stack: err.stack }),
  });

  // Don't leak error details in production
  const response = {
    error: operational ? err.message : 'Internal Server Error',
    ...(operational && err.code ? { code: err.code } : {}),
    ...(process.env.NODE_ENV === 'development' && !operational && { stack: err.stack }),
  };

  res.status(statusCode).json(response);
}

/**
 * 404 handler
 */
export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    error: 'Not Found',
    path: req.path,
  });
}
