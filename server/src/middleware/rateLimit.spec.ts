import express from "express";
import request from "supertest";

import { rateLimit, type RateBucket } from "./rateLimit.js";

describe("rateLimit", () => {
  let clock: number;
  let buckets: Map<string, RateBucket>;
  let app: express.Express;

  beforeEach(() => {
    clock = 0;
    buckets = new Map();
    app = express();
    app.set("trust proxy", true);
    app.use(rateLimit({ windowMs: 1000, max: 2, keyPrefix: "t", buckets, now: () => clock }));
    app.get("/", (_req, res) => {
      res.json({ ok: true });
    });
  });

  const hit = (ip: string) => request(app).get("/").set("X-Forwarded-For", ip);

  it("should answer 429 once the window's budget is spent", async () => {
    await hit("10.0.0.1").expect(200);
    const second = await hit("10.0.0.1").expect(200);
    expect(second.headers["x-ratelimit-remaining"]).toBe("0");

    await hit("10.0.0.1").expect(429, { ok: false, error: "Too many requests" });
  });

  it("should start a fresh window after expiry", async () => {
    await hit("10.0.0.1");
    await hit("10.0.0.1");
    clock = 1000;

    await hit("10.0.0.1").expect(200);
    expect(buckets.get("t:10.0.0.1")).toEqual({ count: 1, resetAtMs: 2000 });
  });

  it("should sweep buckets of clients whose window has passed", async () => {
    await hit("10.0.0.1");
    clock = 500;
    await hit("10.0.0.2");
    expect(buckets.size).toBe(2);

    clock = 1200;
    await hit("10.0.0.2");

    expect([...buckets.keys()]).toEqual(["t:10.0.0.2"]);
    expect(buckets.get("t:10.0.0.2")).toEqual({ count: 2, resetAtMs: 1500 });
  });
});
