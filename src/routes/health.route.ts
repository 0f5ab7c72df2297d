import { Router } from "express";
import { register } from "@/metrics";
import { inFlight } from "@/middleware/gracefulShutdown";

const router = Router();

router.get("/health", (_req, res) => {
  res.status(200).json({ status: "ok" });
});

router.get("/ready", (req, res) => {
  if (req.app.locals.isShuttingDown) {
    return res.status(503).json({ status: "not-ready", reason: "shutting down" });
  }
  res.status(200).json({ status: "ready", activeRequests: inFlight.activeRequests });
});

router.get(
  "/metrics",
  (req, res, next) => {
    const ip = req.ip ?? "";

    // scraped from inside the cluster only
    if (!ip.startsWith("10.") && ip !== "127.0.0.1" && ip !== "::1") {
      res.status(403).send("Forbidden");
      return;
    }
    next();
  },
  (_req, res, next) => {
    res.setHeader("Content-Type", register.contentType);
    register.metrics().then((body) => res.end(body), next);
  },
);

export default router;
