import type { NextFunction, Request, Response } from "express";

/**
 * Counts requests that have started but not yet finished, so shutdown can
 * wait for them before closing the listener.
 */
export class InFlightTracker {
  private active = 0;

  get activeRequests(): number {
    return this.active;
  }

  readonly middleware = (_req: Request, res: Response, next: NextFunction): void => {
    this.active += 1;

    let finalized = false;
    const finalize = () => {
      if (finalized) return;
      finalized = true;
      this.active = Math.max(0, this.active - 1);
    };

    res.on("finish", finalize);
    res.on("close", finalize);
    next();
  };

  async drain({ timeoutMs = 25_000, pollMs = 100 } = {}): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (this.active > 0) {
      if (Date.now() > deadline) {
        throw new Error(
          `Timed out waiting for in-flight requests to drain (active=${this.active})`,
        );
      }
      await new Promise((r) => setTimeout(r, pollMs));
    }
  }
}

export const inFlight = new InFlightTracker();

/** Rejects new requests with 503 once `app.locals.isShuttingDown` is set. */
export function shutdownGate(req: Request, res: Response, next: NextFunction): void {
  if (!Boolean(req.app.locals.isShuttingDown)) return next();

  res.setHeader("Connection", "close");
  res.setHeader("Retry-After", "5");
  res.status(503).json({
    status: "error",
    message: "Server is shutting down",
  });
}
