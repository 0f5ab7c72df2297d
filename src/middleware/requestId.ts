import type { NextFunction, Request, RequestHandler, Response } from "express";
import { v4 as uuidv4 } from "uuid";

// ids echoed back to clients and written to logs; anything else is replaced
const ACCEPTED_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export const requestIdMiddleware: RequestHandler = function (
  req: Request,
  res: Response,
  next: NextFunction,
) {
  const incoming = req.header("x-request-id");
  const requestId =
    incoming !== undefined && ACCEPTED_ID.test(incoming) ? incoming : uuidv4();

  req.headers["x-request-id"] = requestId;
  res.setHeader("x-request-id", requestId);
  req.requestId = requestId;

  next();
};
