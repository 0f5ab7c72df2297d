import type { ValidationDetails } from "@/types/validation";

export class AppError extends Error {
  public readonly statusCode: number;
  /** False for programming errors such as a bad binder configuration. */
  public readonly isOperational: boolean;
  public readonly details: ValidationDetails | undefined;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational = true,
    details?: ValidationDetails,
  ) {
    super(message);
    this.name = "AppError";
    this.isOperational = isOperational;
    this.statusCode = statusCode;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}
