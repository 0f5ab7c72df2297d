// config first: it loads .env before the logger reads LOG_LEVEL
import config from "@/config";
import app from "@/app";
import { collectProcessMetrics } from "@/metrics";
import { inFlight } from "@/middleware/gracefulShutdown";
import { logger } from "@/utils/logger";
import type { Server } from "http";
import type { Socket } from "net";

function main() {
  collectProcessMetrics();

  const server = app.listen(config.PORT, () => {
    logger.info(`Server running on port ${config.PORT}`);
  });

  attachGracefulShutdown(server);
}

function attachGracefulShutdown(server: Server) {
  const sockets = new Set<Socket>();
  server.on("connection", (socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
  });

  let shutdownStarted = false;
  const shutdownTimeoutMs = 30000;

  const startShutdown = async (signal: string) => {
    if (shutdownStarted) {
      logger.warn("Second shutdown signal received; forcing exit", {
        signal,
        activeRequests: inFlight.activeRequests,
      });
      for (const socket of sockets) socket.destroy();
      process.exit(1);
    }
    shutdownStarted = true;

    app.locals.isShuttingDown = true;
    logger.info("Graceful shutdown started", {
      signal,
      activeRequests: inFlight.activeRequests,
    });

    const forceTimer = setTimeout(() => {
      logger.error("Graceful shutdown timed out; forcing close", {
        activeRequests: inFlight.activeRequests,
      });
      for (const socket of sockets) socket.destroy();
      process.exit(1);
    }, shutdownTimeoutMs);
    forceTimer.unref();

    const serverClosePromise = new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) return reject(err);
        resolve();
      });
    });

    // keep-alive sockets close once their current response is written
    for (const socket of sockets) socket.end();

    try {
      await inFlight.drain({ timeoutMs: shutdownTimeoutMs - 5_000 });
    } catch (error) {
      logger.warn("Continuing shutdown after drain timeout", {
        error,
        activeRequests: inFlight.activeRequests,
      });
    }

    try {
      await Promise.race([
        serverClosePromise,
        new Promise<void>((r) => setTimeout(r, 2_000)),
      ]);
    } catch (error) {
      logger.warn("Server close reported an error", { error });
    }

    clearTimeout(forceTimer);
    logger.info("Graceful shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void startShutdown("SIGTERM"));
  process.on("SIGINT", () => void startShutdown("SIGINT"));
}

main();
