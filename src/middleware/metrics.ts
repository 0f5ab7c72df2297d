import type { NextFunction, Request, Response } from "express";
import { httpRequestCount, httpRequestDuration } from "@/metrics";

export const metricsMiddleware = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const stopTimer = httpRequestDuration.startTimer();

  res.on("finish", () => {
    // req.route is only set once a route matched
    const labels = {
      method: req.method,
      route: req.route?.path ?? "unmatched",
      status: String(res.statusCode),
    };

    httpRequestCount.inc(labels);
    stopTimer(labels);
  });

  next();
};
