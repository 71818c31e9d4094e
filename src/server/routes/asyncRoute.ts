import type { NextFunction, Request, RequestHandler, Response } from "express";

/** Express 4 does not await handlers; forward rejections to the error middleware. */
export function asyncRoute(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}
