import type { Request, RequestHandler, Response } from "express";
import { ConsumerRegistry, type Consumer, type RequestBinder } from "@/binding";
import { asynchHandler } from "@/middleware/asyncHandler";
import { bindingErrorCount } from "@/metrics";
import { AppError } from "@/utils/errors/AppError";

export type BoundHandler<D> = (
  bound: D,
  req: Request,
  res: Response,
) => Promise<void> | void;

export interface BindingRouteOptions {
  /** Body decoder; defaults to JSON and text/* consumers. */
  consumer?: Consumer;
}

const defaultConsumers = new ConsumerRegistry();

/**
 * Wraps a route handler so it receives a bound destination instead of raw
 * request input. The request stream is read by the binder, so express body
 * parsers must not run before it.
 *
 * Failed binds never reach the handler: every error is counted and the
 * request is rejected with a 400 whose details list one entry per
 * offending parameter.
 */
export function withBinding<D extends object>(
  binder: RequestBinder<D>,
  create: () => D,
  handler: BoundHandler<D>,
  options: BindingRouteOptions = {},
): RequestHandler {
  const consumer = options.consumer ?? defaultConsumers;

  return asynchHandler(async (req, res, next) => {
    const destination = create();
    const result = await binder.bind(
      { url: req.originalUrl, headers: req.headers, body: req },
      req.params,
      consumer,
      destination,
    );

    if (!result.isValid()) {
      for (const error of result.errors) {
        bindingErrorCount.inc({ kind: error.kind, location: error.in });
      }
      return next(
        new AppError("Request binding failed", 400, true, result.toValidationDetails()),
      );
    }

    await handler(destination, req, res);
  });
}
