import type { RequestHandler } from "express";
import cors, { type CorsOptions } from "cors";
import rateLimit from "express-rate-limit";
import slowDown from "express-slow-down";
import helmet from "helmet";
import config from "@/config";

const corsOptions: CorsOptions = {
  origin(
    origin: string | undefined,
    callback: (err: Error | null, allow?: boolean) => void,
  ) {
    // server-to-server calls and curl send no origin
    if (!origin) return callback(null, true);

    if (config.CORS_ORIGINS.includes(origin)) {
      return callback(null, true);
    }

    return callback(new Error("Not allowed by CORS"));
  },
  credentials: true,
  exposedHeaders: ["x-request-id"],
};

/** Headers, CORS and request throttling, in the order they must run. */
export function securityMiddleware(): RequestHandler[] {
  return [
    helmet(),
    cors(corsOptions),
    rateLimit({
      windowMs: 60 * 1000,
      limit: config.RATE_LIMIT_PER_MINUTE,
      standardHeaders: true,
      legacyHeaders: false,
    }),
    slowDown({
      windowMs: 60 * 1000,
      delayAfter: config.SLOW_DOWN_AFTER,
      delayMs: () => 500,
    }),
  ];
}
