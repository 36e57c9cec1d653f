import express from "express";

import type { ApiDeps } from "../app.js";
import { requireAuth, requireRole } from "../middleware/auth.js";
import { asNumber, bodyOf } from "../utils/validate.js";

export function createSettingsRouter(deps: ApiDeps): express.Router {
  const { store, pricing, config } = deps;
  const router = express.Router();

  router.use(requireAuth(store, config.jwtSecret));

  router.get("/pricing", async (_req, res) => {
    res.json({ ok: true, pricing: await pricing.get() });
  });

  router.put("/pricing", requireRole("admin"), async (req, res) => {
    const body = bodyOf(req.body);

    const hourlyR = asNumber(body.hourlyRate, { field: "hourlyRate", min: 0 });
    if (!hourlyR.ok) {
      res.status(400).json({ ok: false, error: hourlyR.error });
      return;
    }
    const dailyR = asNumber(body.dailyMaxRate, { field: "dailyMaxRate", min: 0 });
    if (!dailyR.ok) {
      res.status(400).json({ ok: false, error: dailyR.error });
      return;
    }
    const graceR = asNumber(body.gracePeriodMinutes, { field: "gracePeriodMinutes", integer: true, min: 0 });
    if (!graceR.ok) {
      res.status(400).json({ ok: false, error: graceR.error });
      return;
    }

    const updated = await pricing.update({
      hourlyRate: hourlyR.value,
      dailyMaxRate: dailyR.value,
      gracePeriodMinutes: graceR.value,
    });
    res.json({ ok: true, pricing: updated });
  });

  return router;
}
