import request from "supertest";

import { TOPIC_ENTRY } from "../src/mqtt/topics.js";
import { buildHarness, lastCommand, type Harness } from "./harness.js";

const T0 = 1_700_000_000;

describe("cards API", () => {
  let h: Harness;
  let auth: string;

  beforeEach(async () => {
    h = await buildHarness();
    auth = `Bearer ${h.tokenFor("operator")}`;
  });

  const register = (body: Record<string, unknown>) =>
    request(h.app).post("/api/cards").set("Authorization", auth).send(body);

  it("GET /api/cards - should return 401 without a token", async () => {
    await request(h.app).get("/api/cards").expect(401);
  });

  it("POST /api/cards - should reject a UID that is not 8-20 hex characters", async () => {
    const res = await register({ cardUid: "XYZ12345", ownerName: "Test Owner" });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Card UID must be 8-20 hex characters (0-9, A-F)");
  });

  it("POST /api/cards - should normalize fields and push the whitelist", async () => {
    const res = await register({
      cardUid: " a1b2c3d4 ",
      ownerName: "Test Owner",
      ownerEmail: "Owner@Example.com",
      phone: "+1 (555) 123-4567",
      vehiclePlate: "ab 12  cd",
    });

    expect(res.status).toBe(201);
    expect(res.body.card).toMatchObject({
      cardUid: "A1B2C3D4",
      ownerName: "Test Owner",
      ownerEmail: "owner@example.com",
      phone: "+15551234567",
      vehiclePlate: "AB 12 CD",
      isActive: true,
      accessLevel: "regular",
    });
    expect(lastCommand(h.transport)).toEqual({
      command: "sync_whitelist",
      cards: [{ card_uid: "A1B2C3D4", owner_name: "Test Owner", access_level: "regular", is_active: true }],
    });
  });

  it("POST /api/cards - should return 409 for a duplicate UID", async () => {
    await register({ cardUid: "A1B2C3D4", ownerName: "Test Owner" }).expect(201);
    const res = await register({ cardUid: "a1b2c3d4", ownerName: "Someone Else" });

    expect(res.status).toBe(409);
    expect(res.body.error).toBe("Card already registered");
  });

  it("POST /api/cards - should reject a bad phone number", async () => {
    const res = await register({ cardUid: "A1B2C3D4", ownerName: "Test Owner", phone: "12345" });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("phone must be 10-15 digits (optional + prefix)");
  });

  it("should still register a card while the broker is down", async () => {
    h.transport.fireDisconnect();
    await register({ cardUid: "A1B2C3D4", ownerName: "Test Owner" }).expect(201);
    expect(h.transport.published).toHaveLength(0);
  });

  it("PATCH /api/cards/:uid - should update given fields only", async () => {
    await register({ cardUid: "A1B2C3D4", ownerName: "Test Owner", vehiclePlate: "AB123" });

    const res = await request(h.app)
      .patch("/api/cards/a1b2c3d4")
      .set("Authorization", auth)
      .send({ accessLevel: "temporary", vehiclePlate: null });

    expect(res.status).toBe(200);
    expect(res.body.card).toMatchObject({ ownerName: "Test Owner", accessLevel: "temporary", vehiclePlate: null });
  });

  it("PATCH /api/cards/:uid - should return 404 for an unknown card", async () => {
    await request(h.app).patch("/api/cards/DEADBEEF").set("Authorization", auth).send({ isActive: true }).expect(404);
  });

  it("DELETE /api/cards/:uid - should deactivate and resync without the card", async () => {
    await register({ cardUid: "A1B2C3D4", ownerName: "Test Owner" });

    const res = await request(h.app).delete("/api/cards/A1B2C3D4").set("Authorization", auth);

    expect(res.body).toEqual({ ok: true, message: "Card deactivated successfully" });
    expect(h.store.cards.get("A1B2C3D4")?.isActive).toBe(false);
    expect(lastCommand(h.transport)).toEqual({ command: "sync_whitelist", cards: [] });

    const active = await request(h.app).get("/api/cards?isActive=true").set("Authorization", auth);
    expect(active.body.cards).toEqual([]);
  });

  it("GET /api/cards - should reject a bad isActive filter", async () => {
    const res = await request(h.app).get("/api/cards?isActive=maybe").set("Authorization", auth);
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("isActive must be true or false");
  });

  it("POST /api/cards/sync - should return 503 while the broker is down", async () => {
    h.transport.fireDisconnect();
    const res = await request(h.app).post("/api/cards/sync").set("Authorization", auth);

    expect(res.status).toBe(503);
    expect(res.body.error).toBe("Failed to sync cards. MQTT connection might be down.");
  });

  it("GET /api/cards/recent-unknown - should list denied UIDs that are not registered", async () => {
    await register({ cardUid: "A1B2C3D4", ownerName: "Test Owner", isActive: false });
    const denied = (cardUid: string, status: string, at: number) =>
      h.ingestion.handleMessage(TOPIC_ENTRY, JSON.stringify({ card_uid: cardUid, status, timestamp: at }));
    await denied("FFFF0001", "denied_unauthorized", T0);
    await denied("FFFF0002", "denied_full", T0 + 30);
    await denied("FFFF0001", "denied_unauthorized", T0 + 60);
    await denied("A1B2C3D4", "denied_unauthorized", T0 + 90);

    const res = await request(h.app).get("/api/cards/recent-unknown").set("Authorization", auth);

    expect(res.body.cards).toEqual([
      { cardUid: "FFFF0001", lastSeen: new Date((T0 + 60) * 1000).toISOString(), attemptCount: 2 },
      { cardUid: "FFFF0002", lastSeen: new Date((T0 + 30) * 1000).toISOString(), attemptCount: 1 },
    ]);
  });

  it("GET /api/cards/:uid/history - should return the card's logs newest first", async () => {
    await register({ cardUid: "A1B2C3D4", ownerName: "Test Owner" });
    await h.ingestion.handleMessage(TOPIC_ENTRY, JSON.stringify({ card_uid: "A1B2C3D4", slot_id: 1, status: "success", timestamp: T0 }));
    await h.ingestion.handleMessage(TOPIC_ENTRY, JSON.stringify({ card_uid: "A1B2C3D4", slot_id: 2, status: "success", timestamp: T0 + 5 }));

    const res = await request(h.app).get("/api/cards/a1b2c3d4/history").set("Authorization", auth);

    expect(res.body.ownerName).toBe("Test Owner");
    expect(res.body.history.map((l: { slotId: number }) => l.slotId)).toEqual([2, 1]);
  });
});
