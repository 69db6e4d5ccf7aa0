import { Router } from "express";
import { ConfigManager } from "../config/config.manager";
import { ShDataSchemaCache } from "../services/schemaCache.service";
import logger from "../utils/logger";

const router = Router();

router.get("/health", (_req, res) => {
  const health = {
    status: "ok",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: process.env.NODE_ENV,
  };

  res.status(200).json(health);
});

router.get("/health/ready", (_req, res) => {
  const { extensions } = ConfigManager.getInstance().rendering;

  try {
    const schema = ShDataSchemaCache.getInstance().getSchema(extensions);
    res.status(200).json({
      status: "ready",
      checks: { schema: schema.name, timestamp: new Date().toISOString() },
    });
  } catch (err) {
    logger.error("Readiness check failed", {
      error: err instanceof Error ? err.message : String(err),
    });
    res.status(503).json({
      status: "not ready",
      checks: { schema: "error", timestamp: new Date().toISOString() },
    });
  }
});

router.get("/health/live", (_req, res) => {
  res.status(200).json({
    status: "alive",
    timestamp: new Date().toISOString(),
  });
});

export default router;
