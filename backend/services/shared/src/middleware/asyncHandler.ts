// backend/services/shared/src/middleware/asyncHandler.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";

export type AsyncRequestHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Express 4 ignores returned promises; route rejections into next(err) so
 * the problem funnel sees them.
 */
export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}
