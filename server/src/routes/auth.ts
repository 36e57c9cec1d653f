import bcrypt from "bcryptjs";
import express from "express";

import type { ApiDeps } from "../app.js";
import { requireAuth, signAccessToken, type AuthRequest } from "../middleware/auth.js";
import { asBoolean, asString, bodyOf } from "../utils/validate.js";

const REMEMBER_ME_SECONDS = 7 * 24 * 60 * 60;

export function createAuthRouter(deps: ApiDeps): express.Router {
  const { store, config } = deps;
  const router = express.Router();

  router.get("/", async (_req, res) => {
    res.json({
      ok: true,
      endpoints: {
        login: "POST /api/auth/login",
        logout: "POST /api/auth/logout",
        me: "GET /api/auth/me (Bearer token)",
      },
    });
  });

  router.post("/login", async (req, res) => {
    const body = bodyOf(req.body);
    const usernameR = asString(body.username, { field: "username", required: true, trim: true });
    const passwordR = asString(body.password, { field: "password", required: true });
    const rememberR = asBoolean(body.rememberMe, { field: "rememberMe" });
    if (!usernameR.ok || !passwordR.ok) {
      res.status(400).json({ ok: false, error: "Missing required fields" });
      return;
    }
    if (!rememberR.ok) {
      res.status(400).json({ ok: false, error: rememberR.error });
      return;
    }

    const user = await store.findUserByUsername(usernameR.value);
    if (!user) {
      res.status(401).json({ ok: false, error: "Incorrect username or password" });
      return;
    }

    const ok = await bcrypt.compare(passwordR.value, user.passwordHash);
    if (!ok) {
      res.status(401).json({ ok: false, error: "Incorrect username or password" });
      return;
    }

    if (!user.isActive) {
      res.status(403).json({ ok: false, error: "User account is inactive" });
      return;
    }

    const expiresIn = rememberR.value ? REMEMBER_ME_SECONDS : config.accessTokenTtlMinutes * 60;
    const token = signAccessToken({ id: user.id, username: user.username, role: user.role }, config.jwtSecret, expiresIn);

    await store.recordLogin(user.id, new Date());

    res.json({
      ok: true,
      token,
      tokenType: "bearer",
      expiresIn,
      user: {
        id: user.id,
        username: user.username,
        email: user.email,
        role: user.role,
      },
    });
  });

  router.post("/logout", async (_req, res) => {
    res.json({ ok: true, message: "Logged out successfully" });
  });

  router.get("/me", requireAuth(store, config.jwtSecret), async (req: AuthRequest, res) => {
    const auth = req.auth;
    if (!auth) {
      res.status(401).json({ ok: false, error: "Unauthorized" });
      return;
    }

    const user = await store.findUserById(auth.id);
    if (!user) {
      res.status(404).json({ ok: false, error: "User not found" });
      return;
    }

    res.json({
      ok: true,
      user: {
        id: user.id,
        username: user.username,
        email: user.email,
        role: user.role,
        lastLogin: user.lastLogin,
      },
    });
  });

  return router;
}
