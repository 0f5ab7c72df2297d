import { logger } from "@/utils/logger";
import type { Request, Response, NextFunction, RequestHandler } from "express";

export const requestLogger: RequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const start = process.hrtime.bigint();

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;

    const logLevel =
      res.statusCode >= 500 ? "error" : res.statusCode >= 400 ? "warn" : "info";

    logger.log(logLevel, "http_request", {
      requestId: req.requestId,
      route: req.route?.path ?? req.originalUrl,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs),
      contentType: req.get("content-type") ?? null,
      contentLength: req.get("content-length") ?? null,
      ip: req.ip,
    });
  });

  next();
};
