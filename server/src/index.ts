import dotenv from "dotenv";
import http from "http";
import mongoose from "mongoose";

import { createApp } from "./app.js";
import { loadConfig } from "./config.js";
import { attachLiveFeed, closeLiveFeed } from "./live/socket.js";
import { LiveHub } from "./live/hub.js";
import { errorFields, logger } from "./logger.js";
import { EventIngestionClient } from "./mqtt/ingestion.js";
import { ensureInitialData } from "./services/bootstrap.js";
import { CommandDispatcher } from "./services/commands.js";
import { PricingStore } from "./services/pricing.js";
import { MongoParkingStore } from "./store/mongo.js";

dotenv.config();

async function start(): Promise<void> {
  const config = loadConfig();
  logger.info("starting parking gate backend", { version: config.version });

  const store = new MongoParkingStore();
  const pricing = new PricingStore(store, config.pricing);

  mongoose.connection.on("connected", () => {
    ensureInitialData(store, pricing, config).catch((err) => logger.error("initial data setup failed", errorFields(err)));
  });

  const failFast = config.isProd;
  const mongoUri = config.mongoUri;

  let connecting = false;
  async function ensureMongoConnected(): Promise<void> {
    if (!mongoUri) return;
    if (mongoose.connection.readyState === 1) return;
    if (connecting) return;
    connecting = true;
    try {
      await mongoose.connect(mongoUri, { serverSelectionTimeoutMS: 10_000 });
      logger.info("mongodb connected");
    } catch (err) {
      logger.error("mongodb connect failed", errorFields(err));
      if (failFast) {
        throw err;
      }
      setTimeout(() => {
        ensureMongoConnected().catch((e) => logger.error("mongodb reconnect failed", errorFields(e)));
      }, config.mongoRetryMs);
    } finally {
      connecting = false;
    }
  }

  if (!mongoUri) {
    logger.warn("MONGODB_URI is not set, records will not be persisted");
  }
  await ensureMongoConnected();

  mongoose.connection.on("disconnected", () => {
    if (!failFast) {
      setTimeout(() => {
        ensureMongoConnected().catch((e) => logger.error("mongodb reconnect failed", errorFields(e)));
      }, config.mongoRetryMs);
    }
  });

  const ingestion = new EventIngestionClient({ store, pricing, config: config.mqtt });
  const commands = new CommandDispatcher(ingestion);
  const hub = new LiveHub();

  ingestion.addListener(async (topic, data) => {
    await hub.broadcast("mqtt_message", { topic, data });
  });
  ingestion.connect();

  const app = createApp({ config, store, pricing, commands, broker: ingestion });
  const server = http.createServer(app);
  const wss = attachLiveFeed(server, hub);

  server.listen(config.port, () => {
    logger.info(`parking gate backend listening on http://localhost:${config.port}`);
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info("shutting down", { signal });

    (async () => {
      await ingestion.stop();
      await closeLiveFeed(wss);
      const closed = new Promise<void>((resolve) => server.close(() => resolve()));
      server.closeAllConnections();
      await closed;
      await mongoose.disconnect();
    })()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error("shutdown failed", errorFields(err));
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((err) => {
  logger.error("startup failed", errorFields(err));
  process.exit(1);
});
