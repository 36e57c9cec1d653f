import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";

import { userRoles, type UserRole } from "../models/User.js";
import type { ParkingStore } from "../store/types.js";

export type AuthUser = {
  id: string;
  username: string;
  role: UserRole;
};

export type AuthRequest = Request & { auth?: AuthUser };

export function signAccessToken(payload: AuthUser, secret: string, expiresInSeconds: number): string {
  return jwt.sign(payload, secret, { expiresIn: expiresInSeconds });
}

export function requireAuth(store: ParkingStore, secret: string) {
  return async (req: AuthRequest, res: Response, next: NextFunction): Promise<void> => {
    const header = req.header("authorization") ?? "";
    const match = header.match(/^Bearer\s+(.+)$/i);
    const token = match?.[1];

    if (!token) {
      res.status(401).json({ ok: false, error: "Unauthorized" });
      return;
    }

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, secret);
    } catch {
      res.status(401).json({ ok: false, error: "Unauthorized" });
      return;
    }

    if (typeof decoded !== "object" || typeof decoded.id !== "string") {
      res.status(401).json({ ok: false, error: "Unauthorized" });
      return;
    }

    const user = await store.findUserById(decoded.id);
    if (!user || !user.isActive || !userRoles.includes(user.role)) {
      res.status(401).json({ ok: false, error: "Unauthorized" });
      return;
    }

    req.auth = { id: user.id, username: user.username, role: user.role };
    next();
  };
}

export function requireRole(...allowedRoles: UserRole[]) {
  return (req: AuthRequest, res: Response, next: NextFunction): void => {
    if (!req.auth) {
      res.status(401).json({ ok: false, error: "Unauthorized" });
      return;
    }

    if (!allowedRoles.includes(req.auth.role)) {
      res.status(403).json({ ok: false, error: "Forbidden" });
      return;
    }

    next();
  };
}
