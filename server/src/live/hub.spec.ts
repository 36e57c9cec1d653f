import { LiveHub, envelope, type LiveSession } from "./hub.js";

function session(id: string, fail = false): LiveSession & { received: string[] } {
  const received: string[] = [];
  return {
    id,
    received,
    async send(data: string) {
      if (fail) throw new Error("socket closed");
      received.push(data);
    },
  };
}

describe("LiveHub", () => {
  it("should deliver to every healthy session and drop the failing one", async () => {
    const hub = new LiveHub();
    const a = session("a");
    const b = session("b", true);
    const c = session("c");
    [a, b, c].forEach((s) => hub.register(s));

    const result = await hub.broadcast("mqtt_message", { topic: "parking/events/entry", data: { card_uid: "A1B2C3D4" } });

    expect(result).toEqual({ delivered: 2, dropped: 1 });
    expect(a.received).toHaveLength(1);
    expect(c.received).toHaveLength(1);
    expect(hub.size).toBe(2);

    const parsed: unknown = JSON.parse(a.received[0] ?? "null");
    expect(parsed).toMatchObject({
      type: "mqtt_message",
      data: { topic: "parking/events/entry", data: { card_uid: "A1B2C3D4" } },
    });
  });

  it("should do nothing with no sessions", async () => {
    const hub = new LiveHub();
    await expect(hub.broadcast("mqtt_message", {})).resolves.toEqual({ delivered: 0, dropped: 0 });
  });

  it("should unregister by id", () => {
    const hub = new LiveHub();
    hub.register(session("a"));
    hub.unregister("a");
    hub.unregister("a");
    expect(hub.size).toBe(0);
  });
});

describe("envelope", () => {
  it("should stamp epoch seconds", () => {
    expect(envelope("pong", {}, new Date(1_700_000_000_999))).toEqual({ type: "pong", data: {}, timestamp: 1_700_000_000 });
  });
});
