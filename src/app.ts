import express from "express";
import compression from "compression";
import { requestIdMiddleware } from "@/middleware/requestId";
import { inFlight, shutdownGate } from "@/middleware/gracefulShutdown";
import { securityMiddleware } from "@/middleware/security";
import { requestLogger } from "@/middleware/requestLogger";
import { metricsMiddleware } from "@/middleware/metrics";
import healthRoutes from "@/routes/health.route";
import petRoutes from "@/routes/pets.route";
import { errorHandler } from "@/utils/errors/errorHandler";

const app = express();

// int64 parameters bind to bigint, which JSON.stringify rejects
app.set("json replacer", (_key: string, value: unknown) =>
  typeof value === "bigint" ? value.toString() : value,
);
app.locals.isShuttingDown = false;

app.use(requestIdMiddleware);
app.use(shutdownGate);
app.use(metricsMiddleware);
app.use(inFlight.middleware);
app.use(securityMiddleware());
app.use(compression());

// no body parsers: bound routes read the request stream themselves
app.use(requestLogger);

app.use(healthRoutes);
app.use(petRoutes);

app.use(errorHandler);

export default app;
