import express from "express";

import type { ApiDeps } from "../app.js";
import { requireAuth } from "../middleware/auth.js";
import { logActions } from "../models/EntryExitLog.js";
import type { LogFilter } from "../store/types.js";
import { getPagination } from "../utils/pagination.js";
import { asDay, asEnum, asIntParam, asString } from "../utils/validate.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export function createLogsRouter(deps: ApiDeps): express.Router {
  const { store, config } = deps;
  const router = express.Router();

  router.use(requireAuth(store, config.jwtSecret));

  router.get("/", async (req, res) => {
    const q = req.query;

    const cardUidR = asString(q.cardUid, { field: "cardUid", trim: true, upper: true, maxLen: 20 });
    if (!cardUidR.ok) {
      res.status(400).json({ ok: false, error: cardUidR.error });
      return;
    }
    const slotIdR = asIntParam(q.slotId, { field: "slotId", min: 0 });
    if (!slotIdR.ok) {
      res.status(400).json({ ok: false, error: slotIdR.error });
      return;
    }
    const actionR = asEnum(q.action, logActions, { field: "action" });
    if (!actionR.ok) {
      res.status(400).json({ ok: false, error: actionR.error });
      return;
    }
    const statusR = asString(q.status, { field: "status", trim: true, maxLen: 40 });
    if (!statusR.ok) {
      res.status(400).json({ ok: false, error: statusR.error });
      return;
    }
    const startR = asDay(q.startDate, { field: "startDate" });
    if (!startR.ok) {
      res.status(400).json({ ok: false, error: startR.error });
      return;
    }
    const endR = asDay(q.endDate, { field: "endDate" });
    if (!endR.ok) {
      res.status(400).json({ ok: false, error: endR.error });
      return;
    }

    const { page, limit, skip } = getPagination(q, { defaultLimit: 100, maxLimit: 1000 });
    const filter: LogFilter = { skip, limit };
    if (cardUidR.value) filter.cardUid = cardUidR.value;
    if (slotIdR.value !== undefined) filter.slotId = slotIdR.value;
    if (actionR.value) filter.action = actionR.value;
    if (statusR.value) filter.status = statusR.value;
    if (startR.value) filter.from = startR.value;
    if (endR.value) filter.to = new Date(endR.value.getTime() + DAY_MS);

    const logs = await store.queryLogs(filter);
    res.json({ ok: true, logs, page, limit });
  });

  router.get("/recent", async (req, res) => {
    const limitR = asIntParam(req.query.limit, { field: "limit", min: 1 });
    if (!limitR.ok) {
      res.status(400).json({ ok: false, error: limitR.error });
      return;
    }

    const logs = await store.queryLogs({ skip: 0, limit: Math.min(200, limitR.value ?? 20) });
    res.json({ ok: true, logs });
  });

  return router;
}
