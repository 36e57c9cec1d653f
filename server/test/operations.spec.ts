import request from "supertest";

import { TOPIC_ENTRY, TOPIC_EXIT } from "../src/mqtt/topics.js";
import { buildHarness, lastCommand, type Harness } from "./harness.js";

const T0 = 1_700_000_000; // 2023-11-14T22:13:20Z
const DAY = 86_400;

describe("operations API", () => {
  let h: Harness;
  let operator: string;
  let admin: string;

  beforeEach(async () => {
    h = await buildHarness();
    operator = `Bearer ${h.tokenFor("operator")}`;
    admin = `Bearer ${h.tokenFor("admin")}`;
  });

  const device = (topic: string, body: Record<string, unknown>) => h.ingestion.handleMessage(topic, JSON.stringify(body));

  describe("health", () => {
    it("GET /health - should report both connections", async () => {
      const res = await request(h.app).get("/health");

      expect(res.body).toEqual({
        ok: true,
        status: "healthy",
        mqttConnected: true,
        dbConnected: true,
        version: "1.0.0",
        appName: "Parking Gate Backend",
      });
      expect(res.headers["x-content-type-options"]).toBe("nosniff");
    });

    it("GET /api/health - should report a broker outage", async () => {
      h.transport.fireDisconnect();
      const res = await request(h.app).get("/api/health");
      expect(res.body.mqttConnected).toBe(false);
    });

    it("should answer unknown routes with a JSON 404", async () => {
      const res = await request(h.app).get("/api/nowhere");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ ok: false, error: "Not found" });
    });

    it("should turn an unexpected failure into a 500 with the request id", async () => {
      jest.spyOn(h.store, "listSlots").mockRejectedValue(new Error("db down"));

      const res = await request(h.app).get("/api/slots").set("Authorization", operator).set("x-request-id", "req-1");

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ ok: false, error: "Internal server error", requestId: "req-1" });
    });
  });

  describe("slots", () => {
    it("GET /api/slots - should list every slot in order", async () => {
      const res = await request(h.app).get("/api/slots").set("Authorization", operator);
      expect(res.body.slots.map((s: { slotId: number }) => s.slotId)).toEqual([1, 2, 3]);
    });

    it("GET /api/slots/:id - should validate the id", async () => {
      await request(h.app).get("/api/slots/abc").set("Authorization", operator).expect(400, { ok: false, error: "Invalid id" });
      await request(h.app).get("/api/slots/0").set("Authorization", operator).expect(400);
      await request(h.app).get("/api/slots/9").set("Authorization", operator).expect(404, { ok: false, error: "Slot not found" });
    });

    it("GET /api/slots/:id/history - should reflect device events", async () => {
      await device(TOPIC_ENTRY, { card_uid: "A1B2C3D4", slot_id: 2, status: "success", timestamp: T0 });

      const slot = await request(h.app).get("/api/slots/2").set("Authorization", operator);
      expect(slot.body.slot).toMatchObject({
        slotId: 2,
        status: "occupied",
        currentCardUid: "A1B2C3D4",
        entryTime: new Date(T0 * 1000).toISOString(),
      });

      const history = await request(h.app).get("/api/slots/2/history").set("Authorization", operator);
      expect(history.body).toMatchObject({ ok: true, slotId: 2, currentStatus: "occupied" });
      expect(history.body.history).toHaveLength(1);
    });
  });

  describe("logs", () => {
    beforeEach(async () => {
      await device(TOPIC_ENTRY, { card_uid: "A1B2C3D4", slot_id: 1, status: "success", timestamp: T0 });
      await device(TOPIC_EXIT, { card_uid: "A1B2C3D4", slot_id: 1, status: "success", timestamp: T0 + DAY });
      await device(TOPIC_ENTRY, { card_uid: "FFFF0001", status: "denied_unauthorized", timestamp: T0 + DAY + 60 });
    });

    it("GET /api/logs - should return newest first", async () => {
      const res = await request(h.app).get("/api/logs").set("Authorization", operator);
      expect(res.body.logs.map((l: { logId: number }) => l.logId)).toEqual([3, 2, 1]);
      expect(res.body).toMatchObject({ page: 1, limit: 100 });
    });

    it("GET /api/logs - should filter by card, action and status", async () => {
      const byCard = await request(h.app).get("/api/logs?cardUid=a1b2c3d4&action=exit").set("Authorization", operator);
      expect(byCard.body.logs).toHaveLength(1);
      expect(byCard.body.logs[0]).toMatchObject({ logId: 2, durationMinutes: 1440, feeAmount: 50 });

      const denied = await request(h.app).get("/api/logs?status=denied_unauthorized").set("Authorization", operator);
      expect(denied.body.logs.map((l: { cardUid: string }) => l.cardUid)).toEqual(["FFFF0001"]);
    });

    it("GET /api/logs - should treat the end date as inclusive", async () => {
      const first = await request(h.app)
        .get("/api/logs?startDate=2023-11-14&endDate=2023-11-14")
        .set("Authorization", operator);
      expect(first.body.logs.map((l: { logId: number }) => l.logId)).toEqual([1]);

      const second = await request(h.app).get("/api/logs?startDate=2023-11-15").set("Authorization", operator);
      expect(second.body.logs.map((l: { logId: number }) => l.logId)).toEqual([3, 2]);
    });

    it("GET /api/logs - should reject bad filters", async () => {
      const action = await request(h.app).get("/api/logs?action=park").set("Authorization", operator);
      expect(action.body).toEqual({ ok: false, error: "action is invalid" });

      const date = await request(h.app).get("/api/logs?startDate=14-11-2023").set("Authorization", operator);
      expect(date.body).toEqual({ ok: false, error: "startDate must be YYYY-MM-DD" });
    });

    it("GET /api/logs/recent - should honor the limit", async () => {
      const res = await request(h.app).get("/api/logs/recent?limit=2").set("Authorization", operator);
      expect(res.body.logs.map((l: { logId: number }) => l.logId)).toEqual([3, 2]);
    });
  });

  describe("pricing settings", () => {
    it("GET /api/settings/pricing - should return the configured defaults", async () => {
      const res = await request(h.app).get("/api/settings/pricing").set("Authorization", `Bearer ${h.tokenFor("viewer")}`);
      expect(res.body.pricing).toEqual({ hourlyRate: 5, dailyMaxRate: 50, gracePeriodMinutes: 15 });
    });

    it("PUT /api/settings/pricing - should be admin only", async () => {
      await request(h.app)
        .put("/api/settings/pricing")
        .set("Authorization", operator)
        .send({ hourlyRate: 7 })
        .expect(403, { ok: false, error: "Forbidden" });
    });

    it("PUT /api/settings/pricing - should merge a partial update and price later exits with it", async () => {
      const res = await request(h.app).put("/api/settings/pricing").set("Authorization", admin).send({ hourlyRate: 7 });
      expect(res.body.pricing).toEqual({ hourlyRate: 7, dailyMaxRate: 50, gracePeriodMinutes: 15 });

      await device(TOPIC_ENTRY, { card_uid: "A1B2C3D4", slot_id: 3, status: "success", timestamp: T0 });
      await device(TOPIC_EXIT, { card_uid: "A1B2C3D4", slot_id: 3, status: "success", timestamp: T0 + 90 * 60 });
      expect(h.store.logs[1]).toMatchObject({ durationMinutes: 90, feeAmount: 14 });
    });

    it("PUT /api/settings/pricing - should validate values", async () => {
      const grace = await request(h.app).put("/api/settings/pricing").set("Authorization", admin).send({ gracePeriodMinutes: 2.5 });
      expect(grace.body).toEqual({ ok: false, error: "gracePeriodMinutes must be an integer" });

      const rate = await request(h.app).put("/api/settings/pricing").set("Authorization", admin).send({ hourlyRate: -1 });
      expect(rate.body).toEqual({ ok: false, error: "hourlyRate must be >= 0" });
    });
  });

  describe("commands", () => {
    it("GET /api/commands/mqtt-status - should need no token", async () => {
      const res = await request(h.app).get("/api/commands/mqtt-status");
      expect(res.body).toEqual({ ok: true, connected: true, broker: "mqtts://broker.test:8883", status: "online" });
    });

    it("POST /api/commands/open-barrier - should reject an invalid gate without publishing", async () => {
      const res = await request(h.app).post("/api/commands/open-barrier").set("Authorization", operator).send({ gate: "side" });

      expect(res.status).toBe(400);
      expect(res.body.error).toBe("Invalid gate. Use 'entrance' or 'exit'");
      expect(h.transport.published).toHaveLength(0);
    });

    it("POST /api/commands/open-barrier - should publish the command", async () => {
      const res = await request(h.app).post("/api/commands/open-barrier").set("Authorization", operator).send({ gate: "exit" });

      expect(res.body).toEqual({ ok: true, message: "Command sent to open exit barrier", gate: "exit", status: "sent" });
      expect(lastCommand(h.transport)).toEqual({ command: "open_barrier", gate: "exit" });
    });

    it("POST /api/commands/emergency - should be admin only", async () => {
      await request(h.app).post("/api/commands/emergency").set("Authorization", operator).send({ enable: true }).expect(403);

      const res = await request(h.app).post("/api/commands/emergency").set("Authorization", admin).send({ enable: true });
      expect(res.body).toEqual({ ok: true, message: "Emergency mode enabled", emergencyMode: true, status: "sent" });
      expect(lastCommand(h.transport)).toEqual({ command: "emergency", enable: true });

      const missing = await request(h.app).post("/api/commands/emergency").set("Authorization", admin).send({});
      expect(missing.body).toEqual({ ok: false, error: "enable is required" });
    });

    it("POST /api/commands/scan-mode - should default to enabling the entrance gate", async () => {
      const res = await request(h.app).post("/api/commands/scan-mode").set("Authorization", operator).send({});

      expect(res.body.message).toBe("Scan mode activated on entrance gate");
      expect(lastCommand(h.transport)).toEqual({ command: "scan_mode", enable: true, gate: "entrance" });
    });

    it("POST /api/commands/refresh-status - should return 503 when the broker is down", async () => {
      h.transport.fireDisconnect();
      const res = await request(h.app).post("/api/commands/refresh-status").set("Authorization", operator);

      expect(res.status).toBe(503);
      expect(res.body.error).toBe("Failed to send command. MQTT connection might be down.");
    });

    it("POST /api/commands/refresh-status - should return 503 when the broker rejects the message", async () => {
      h.transport.failPublish = true;
      await request(h.app).post("/api/commands/refresh-status").set("Authorization", operator).expect(503);
    });
  });
});

describe("operations API while offline", () => {
  it("GET /api/commands/mqtt-status - should report offline", async () => {
    const h = await buildHarness({ connected: false });
    const res = await request(h.app).get("/api/commands/mqtt-status");
    expect(res.body).toEqual({ ok: true, connected: false, broker: "mqtts://broker.test:8883", status: "offline" });
  });
});
