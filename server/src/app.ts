import cors from "cors";
import crypto from "crypto";
import express from "express";
import type { NextFunction, Request, Response } from "express";

import type { AppConfig } from "./config.js";
import { logger } from "./logger.js";
import { rateLimit } from "./middleware/rateLimit.js";
import { createAuthRouter } from "./routes/auth.js";
import { createCardsRouter } from "./routes/cards.js";
import { createCommandsRouter } from "./routes/commands.js";
import { createLogsRouter } from "./routes/logs.js";
import { createSettingsRouter } from "./routes/settings.js";
import { createSlotsRouter } from "./routes/slots.js";
import type { CommandDispatcher } from "./services/commands.js";
import type { PricingStore } from "./services/pricing.js";
import type { ParkingStore } from "./store/types.js";

export type BrokerStatus = {
  readonly isConnected: boolean;
  readonly brokerUrl: string | null;
};

export type ApiDeps = {
  config: AppConfig;
  store: ParkingStore;
  pricing: PricingStore;
  commands: CommandDispatcher;
  broker: BrokerStatus;
};

type ReqWithId = Request & { requestId?: string };

export function createApp(deps: ApiDeps): express.Express {
  const { config, store, broker } = deps;
  const app = express();

  app.use((req: ReqWithId, res, next) => {
    const header = req.header("x-request-id") ?? "";
    const requestId = header.trim() || crypto.randomUUID();
    req.requestId = requestId;
    res.setHeader("x-request-id", requestId);
    next();
  });

  app.use((req: ReqWithId, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.info("http request", {
        requestId: req.requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        ms: Date.now() - startedAt,
        ip: req.ip,
      });
    });
    next();
  });

  app.use((_req, res, next) => {
    res.setHeader("x-content-type-options", "nosniff");
    res.setHeader("x-frame-options", "DENY");
    res.setHeader("referrer-policy", "no-referrer");
    next();
  });

  app.use(express.json({ limit: "1mb" }));

  app.use(
    cors({
      origin: config.corsOrigins.length ? config.corsOrigins : config.isProd ? false : true,
      credentials: config.corsOrigins.length > 0,
    })
  );

  app.use("/api", rateLimit({ windowMs: 60_000, max: 300, keyPrefix: "global" }));
  app.use("/api/auth/login", rateLimit({ windowMs: 60_000, max: 10, keyPrefix: "login" }));

  const health = async (_req: Request, res: Response) => {
    res.json({
      ok: true,
      status: "healthy",
      mqttConnected: broker.isConnected,
      dbConnected: store.isConnected(),
      version: config.version,
      appName: config.appName,
    });
  };

  app.get("/", async (_req, res) => {
    res.json({ ok: true, message: `${config.appName} API running. See /health`, mqttConnected: broker.isConnected });
  });
  app.get("/health", health);
  app.get("/api/health", health);

  app.use("/api/auth", createAuthRouter(deps));
  app.use("/api/cards", createCardsRouter(deps));
  app.use("/api/slots", createSlotsRouter(deps));
  app.use("/api/logs", createLogsRouter(deps));
  app.use("/api/settings", createSettingsRouter(deps));
  app.use("/api/commands", createCommandsRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  app.use((err: unknown, req: ReqWithId, res: Response, _next: NextFunction) => {
    const requestId = req.requestId;
    logger.error(err instanceof Error ? err.message : "Internal server error", {
      requestId,
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({ ok: false, error: "Internal server error", requestId });
  });

  return app;
}
