import type { NextFunction, Request, RequestHandler, Response } from "express";

/** Express 4 does not forward rejected promises; this does. */
export function asyncRoute(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
