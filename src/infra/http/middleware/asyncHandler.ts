import type { NextFunction, Request, Response, RequestHandler } from 'express';
import type { SessionRequest } from './session.js';

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards rejections to next().
 */
export function asyncHandler(
  fn: (req: SessionRequest, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    void fn(req, res, next).catch(next);
  };
}
