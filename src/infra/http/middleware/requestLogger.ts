import { Request, Response, NextFunction } from 'express';

/**
 * Prints `<METHOD> <path> <status> <ms>ms` once the response is sent.
 */
export function logRequest(req: Request, res: Response, next: NextFunction): void {
  const startedAt = process.hrtime.bigint();

  res.on('finish', () => {
    const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    console.log(`${req.method} ${req.originalUrl} ${res.statusCode} ${elapsedMs.toFixed(1)}ms`);
  });

  next();
}
