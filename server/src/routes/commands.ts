import express from "express";

import type { ApiDeps } from "../app.js";
import { requireAuth, requireRole } from "../middleware/auth.js";
import { gates } from "../services/commands.js";
import { asBoolean, asEnum, bodyOf } from "../utils/validate.js";

const UNAVAILABLE = "Failed to send command. MQTT connection might be down.";

export function createCommandsRouter(deps: ApiDeps): express.Router {
  const { store, commands, broker, config } = deps;
  const router = express.Router();

  router.get("/mqtt-status", async (_req, res) => {
    res.json({
      ok: true,
      connected: broker.isConnected,
      broker: broker.brokerUrl ?? "N/A",
      status: broker.isConnected ? "online" : "offline",
    });
  });

  router.use(requireAuth(store, config.jwtSecret));

  router.post("/open-barrier", async (req, res) => {
    const body = bodyOf(req.body);
    const gateR = asEnum(body.gate, gates, { field: "gate", required: true });
    if (!gateR.ok || gateR.value === undefined) {
      res.status(400).json({ ok: false, error: "Invalid gate. Use 'entrance' or 'exit'" });
      return;
    }

    if (!(await commands.openBarrier(gateR.value))) {
      res.status(503).json({ ok: false, error: UNAVAILABLE });
      return;
    }
    res.json({ ok: true, message: `Command sent to open ${gateR.value} barrier`, gate: gateR.value, status: "sent" });
  });

  router.post("/emergency", requireRole("admin"), async (req, res) => {
    const body = bodyOf(req.body);
    const enableR = asBoolean(body.enable, { field: "enable", required: true });
    if (!enableR.ok) {
      res.status(400).json({ ok: false, error: enableR.error });
      return;
    }

    if (!(await commands.setEmergencyMode(enableR.value))) {
      res.status(503).json({ ok: false, error: UNAVAILABLE });
      return;
    }
    res.json({
      ok: true,
      message: `Emergency mode ${enableR.value ? "enabled" : "disabled"}`,
      emergencyMode: enableR.value,
      status: "sent",
    });
  });

  router.post("/refresh-status", async (_req, res) => {
    if (!(await commands.requestStatus())) {
      res.status(503).json({ ok: false, error: UNAVAILABLE });
      return;
    }
    res.json({ ok: true, message: "Status refresh requested", status: "sent" });
  });

  router.post("/scan-mode", async (req, res) => {
    const body = bodyOf(req.body);
    const enableR = asBoolean(body.enable, { field: "enable" });
    if (!enableR.ok) {
      res.status(400).json({ ok: false, error: enableR.error });
      return;
    }
    const gateR = asEnum(body.gate, gates, { field: "gate" });
    if (!gateR.ok) {
      res.status(400).json({ ok: false, error: "Invalid gate. Use 'entrance' or 'exit'" });
      return;
    }

    const enable = enableR.value ?? true;
    const gate = gateR.value ?? "entrance";
    if (!(await commands.setScanMode(enable, gate))) {
      res.status(503).json({ ok: false, error: UNAVAILABLE });
      return;
    }
    res.json({
      ok: true,
      message: `Scan mode ${enable ? "activated" : "deactivated"} on ${gate} gate`,
      scanMode: enable,
      gate,
      status: "sent",
    });
  });

  return router;
}
