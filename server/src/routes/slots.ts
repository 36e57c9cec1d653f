import express from "express";

import type { ApiDeps } from "../app.js";
import { requireAuth } from "../middleware/auth.js";
import { asIntParam } from "../utils/validate.js";

export function createSlotsRouter(deps: ApiDeps): express.Router {
  const { store, config } = deps;
  const router = express.Router();

  router.use(requireAuth(store, config.jwtSecret));

  router.get("/", async (_req, res) => {
    const slots = await store.listSlots();
    res.json({ ok: true, slots });
  });

  router.get("/:id", async (req, res) => {
    const idR = asIntParam(req.params.id, { field: "id", min: 1 });
    if (!idR.ok || idR.value === undefined) {
      res.status(400).json({ ok: false, error: "Invalid id" });
      return;
    }

    const slot = await store.getSlot(idR.value);
    if (!slot) {
      res.status(404).json({ ok: false, error: "Slot not found" });
      return;
    }
    res.json({ ok: true, slot });
  });

  router.get("/:id/history", async (req, res) => {
    const idR = asIntParam(req.params.id, { field: "id", min: 1 });
    if (!idR.ok || idR.value === undefined) {
      res.status(400).json({ ok: false, error: "Invalid id" });
      return;
    }
    const limitR = asIntParam(req.query.limit, { field: "limit", min: 1 });
    if (!limitR.ok) {
      res.status(400).json({ ok: false, error: limitR.error });
      return;
    }

    const slot = await store.getSlot(idR.value);
    if (!slot) {
      res.status(404).json({ ok: false, error: "Slot not found" });
      return;
    }

    const history = await store.queryLogs({ slotId: slot.slotId, skip: 0, limit: Math.min(500, limitR.value ?? 20) });
    res.json({ ok: true, slotId: slot.slotId, currentStatus: slot.status, history });
  });

  return router;
}
