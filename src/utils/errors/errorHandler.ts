import type { NextFunction, Request, Response } from "express";
import { AppError } from "@/utils/errors/AppError";
import { logger } from "@/utils/logger";
import type { ValidationDetails } from "@/types/validation";

export function errorHandler(
  err: Error | AppError,
  req: Request,
  res: Response,
  next: NextFunction,
) {
  if (res.headersSent) {
    return next(err);
  }

  let statusCode = 500;
  let message = "Something went wrong";
  let details: ValidationDetails | undefined = undefined;

  if (err instanceof AppError && err.isOperational) {
    statusCode = err.statusCode;
    message = err.message;
    details = err.details;
  } else {
    // programming errors keep their details out of the response
    logger.error("Unexpected error", {
      requestId: req.requestId,
      name: err.name,
      message: err.message,
      stack: err.stack,
      ...(err instanceof AppError && err.details ? { details: err.details } : {}),
    });
  }

  res.status(statusCode).json({
    status: "error",
    message,
    ...(details !== undefined ? { details } : {}),
  });
}
