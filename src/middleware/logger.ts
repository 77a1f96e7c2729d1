import { Request, Response, NextFunction } from 'express';

/**
 * Logs one line per request once the response is sent.
 * Only the path is logged: OAuth callbacks carry codes and state tokens in the
 * query string.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();

  res.on('finish', () => {
    const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    console.log(`${req.method} ${req.path} ${res.statusCode} ${elapsedMs.toFixed(1)}ms`);
  });

  next();
}
