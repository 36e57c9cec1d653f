import express from "express";

import type { ApiDeps } from "../app.js";
import { requireAuth } from "../middleware/auth.js";
import { accessLevels } from "../models/RfidCard.js";
import { syncWhitelist } from "../services/whitelist.js";
import type { NewRfidCard, RfidCardPatch } from "../store/types.js";
import { getPagination } from "../utils/pagination.js";
import { asBoolean, asBoolParam, asEnum, asIntParam, asString, bodyOf, type ValidationResult } from "../utils/validate.js";

const CARD_UID = /^[A-F0-9]{8,20}$/;
const EMAIL = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PHONE = /^\+?[0-9]{10,15}$/;
const PLATE = /^[A-Z0-9\s-]{2,20}$/;

function asEmail(raw: unknown): ValidationResult<string | null | undefined> {
  if (raw === undefined) return { ok: true, value: undefined };
  if (raw === null || raw === "") return { ok: true, value: null };
  return asString(raw, { field: "ownerEmail", trim: true, lower: true, maxLen: 100, pattern: EMAIL });
}

function asPhone(raw: unknown): ValidationResult<string | null | undefined> {
  if (raw === undefined) return { ok: true, value: undefined };
  if (raw === null || raw === "") return { ok: true, value: null };
  if (typeof raw !== "string") return { ok: false, error: "phone must be a string" };
  const cleaned = raw.replace(/[\s\-().]/g, "");
  if (!PHONE.test(cleaned)) return { ok: false, error: "phone must be 10-15 digits (optional + prefix)" };
  return { ok: true, value: cleaned };
}

function asPlate(raw: unknown): ValidationResult<string | null | undefined> {
  if (raw === undefined) return { ok: true, value: undefined };
  if (raw === null || raw === "") return { ok: true, value: null };
  if (typeof raw !== "string") return { ok: false, error: "vehiclePlate must be a string" };
  const cleaned = raw.split(/\s+/).filter(Boolean).join(" ").toUpperCase();
  if (!PLATE.test(cleaned)) return { ok: false, error: "vehiclePlate must be 2-20 alphanumeric characters" };
  return { ok: true, value: cleaned };
}

function parseCardPatch(body: Record<string, unknown>): ValidationResult<RfidCardPatch> {
  const ownerNameR = asString(body.ownerName, { field: "ownerName", trim: true, minLen: 1, maxLen: 100 });
  if (!ownerNameR.ok) return ownerNameR;
  const emailR = asEmail(body.ownerEmail);
  if (!emailR.ok) return emailR;
  const phoneR = asPhone(body.phone);
  if (!phoneR.ok) return phoneR;
  const plateR = asPlate(body.vehiclePlate);
  if (!plateR.ok) return plateR;
  const activeR = asBoolean(body.isActive, { field: "isActive" });
  if (!activeR.ok) return activeR;
  const levelR = asEnum(body.accessLevel, accessLevels, { field: "accessLevel" });
  if (!levelR.ok) return levelR;

  const patch: RfidCardPatch = {};
  if (ownerNameR.value !== undefined) patch.ownerName = ownerNameR.value;
  if (emailR.value !== undefined) patch.ownerEmail = emailR.value;
  if (phoneR.value !== undefined) patch.phone = phoneR.value;
  if (plateR.value !== undefined) patch.vehiclePlate = plateR.value;
  if (activeR.value !== undefined) patch.isActive = activeR.value;
  if (levelR.value !== undefined) patch.accessLevel = levelR.value;
  return { ok: true, value: patch };
}

export function createCardsRouter(deps: ApiDeps): express.Router {
  const { store, commands, config } = deps;
  const router = express.Router();

  router.use(requireAuth(store, config.jwtSecret));

  router.get("/", async (req, res) => {
    const activeR = asBoolParam(req.query.isActive, { field: "isActive" });
    if (!activeR.ok) {
      res.status(400).json({ ok: false, error: activeR.error });
      return;
    }
    const { page, limit, skip } = getPagination(req.query);

    const cards = await store.listCards({ isActive: activeR.value, skip, limit });
    res.json({ ok: true, cards, page, limit });
  });

  router.get("/recent-unknown", async (req, res) => {
    const limitR = asIntParam(req.query.limit, { field: "limit", min: 1 });
    if (!limitR.ok) {
      res.status(400).json({ ok: false, error: limitR.error });
      return;
    }

    const sightings = await store.recentUnknownCards(Math.min(100, limitR.value ?? 10));
    res.json({ ok: true, cards: sightings });
  });

  router.post("/sync", async (_req, res) => {
    const sent = await syncWhitelist(store, commands);
    if (!sent) {
      res.status(503).json({ ok: false, error: "Failed to sync cards. MQTT connection might be down." });
      return;
    }
    res.json({ ok: true, message: "Cards synchronized to gate controller" });
  });

  router.get("/:uid", async (req, res) => {
    const card = await store.getCard(req.params.uid.toUpperCase());
    if (!card) {
      res.status(404).json({ ok: false, error: "Card not found" });
      return;
    }
    res.json({ ok: true, card });
  });

  router.post("/", async (req, res) => {
    const body = bodyOf(req.body);

    const uidR = asString(body.cardUid, { field: "cardUid", required: true, trim: true, upper: true, pattern: CARD_UID });
    if (!uidR.ok) {
      res.status(400).json({ ok: false, error: "Card UID must be 8-20 hex characters (0-9, A-F)" });
      return;
    }
    const nameR = asString(body.ownerName, { field: "ownerName", required: true, trim: true, maxLen: 100 });
    if (!nameR.ok) {
      res.status(400).json({ ok: false, error: nameR.error });
      return;
    }
    const patchR = parseCardPatch(body);
    if (!patchR.ok) {
      res.status(400).json({ ok: false, error: patchR.error });
      return;
    }

    const existing = await store.getCard(uidR.value);
    if (existing) {
      res.status(409).json({ ok: false, error: "Card already registered" });
      return;
    }

    const patch = patchR.value;
    const input: NewRfidCard = {
      cardUid: uidR.value,
      ownerName: nameR.value,
      ownerEmail: patch.ownerEmail ?? null,
      phone: patch.phone ?? null,
      vehiclePlate: patch.vehiclePlate ?? null,
      isActive: patch.isActive ?? true,
      accessLevel: patch.accessLevel ?? "regular",
    };

    const card = await store.createCard(input);
    await syncWhitelist(store, commands);

    res.status(201).json({ ok: true, card });
  });

  router.patch("/:uid", async (req, res) => {
    const body = bodyOf(req.body);
    const patchR = parseCardPatch(body);
    if (!patchR.ok) {
      res.status(400).json({ ok: false, error: patchR.error });
      return;
    }

    const card = await store.updateCard(req.params.uid.toUpperCase(), patchR.value);
    if (!card) {
      res.status(404).json({ ok: false, error: "Card not found" });
      return;
    }

    await syncWhitelist(store, commands);
    res.json({ ok: true, card });
  });

  router.delete("/:uid", async (req, res) => {
    const card = await store.updateCard(req.params.uid.toUpperCase(), { isActive: false });
    if (!card) {
      res.status(404).json({ ok: false, error: "Card not found" });
      return;
    }

    await syncWhitelist(store, commands);
    res.json({ ok: true, message: "Card deactivated successfully" });
  });

  router.get("/:uid/history", async (req, res) => {
    const cardUid = req.params.uid.toUpperCase();
    const limitR = asIntParam(req.query.limit, { field: "limit", min: 1 });
    if (!limitR.ok) {
      res.status(400).json({ ok: false, error: limitR.error });
      return;
    }

    const card = await store.getCard(cardUid);
    if (!card) {
      res.status(404).json({ ok: false, error: "Card not found" });
      return;
    }

    const history = await store.queryLogs({ cardUid, skip: 0, limit: Math.min(500, limitR.value ?? 50) });
    res.json({ ok: true, cardUid, ownerName: card.ownerName, history });
  });

  return router;
}
