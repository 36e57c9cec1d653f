import crypto from "crypto";
import type { Server } from "http";
import { WebSocket, WebSocketServer, type RawData } from "ws";

import { errorFields, logger } from "../logger.js";
import { envelope, type LiveHub, type LiveSession } from "./hub.js";

export const LIVE_PATH = "/ws/realtime";

function socketSession(id: string, socket: WebSocket): LiveSession {
  return {
    id,
    send(data) {
      return new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new Error("socket is not open"));
          return;
        }
        socket.send(data, (err) => (err ? reject(err) : resolve()));
      });
    },
  };
}

export function attachLiveFeed(server: Server, hub: LiveHub): WebSocketServer {
  const wss = new WebSocketServer({ server, path: LIVE_PATH });

  wss.on("connection", (socket) => {
    const session = socketSession(crypto.randomUUID(), socket);
    hub.register(session);

    socket.on("message", (raw: RawData) => {
      if (raw.toString() !== "ping") return;
      session.send(JSON.stringify(envelope("pong", null))).catch((err) => {
        logger.warn("pong delivery failed", { sessionId: session.id, ...errorFields(err) });
      });
    });

    socket.on("close", () => hub.unregister(session.id));
    socket.on("error", (err) => {
      logger.warn("live socket error", { sessionId: session.id, ...errorFields(err) });
      hub.unregister(session.id);
    });
  });

  return wss;
}

/** Drops every connected viewer and stops accepting new ones. */
export function closeLiveFeed(wss: WebSocketServer): Promise<void> {
  for (const socket of wss.clients) {
    socket.terminate();
  }
  return new Promise<void>((resolve, reject) => {
    wss.close((err) => (err ? reject(err) : resolve()));
  });
}
