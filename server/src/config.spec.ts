import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      isProd: false,
      port: 8000,
      mongoUri: undefined,
      jwtSecret: "dev-only-secret",
      accessTokenTtlMinutes: 1440,
      admin: { username: "admin", password: "admin123", email: "admin@parking.local" },
      totalParkingSlots: 10,
      pricing: { hourlyRate: 5, dailyMaxRate: 50, gracePeriodMinutes: 15 },
      corsOrigins: [],
    });
    expect(config.mqtt).toEqual({
      host: "localhost",
      port: 8883,
      username: "",
      password: "",
      clientId: "parking-backend",
      keepaliveSeconds: 60,
      useTls: true,
      caCertsPath: "",
      tlsInsecure: false,
      reconnectMs: 5000,
      queueCapacity: 1000,
    });
  });

  it("should read overrides and ignore unparsable numbers", () => {
    const config = loadConfig({
      PORT: "9100",
      HOURLY_RATE: "2.5",
      GRACE_PERIOD_MINUTES: "soon",
      MQTT_USE_TLS: "false",
      MQTT_BROKER_HOST: "broker.internal",
      CORS_ORIGIN: "http://a.test, http://b.test",
    });

    expect(config.port).toBe(9100);
    expect(config.pricing).toEqual({ hourlyRate: 2.5, dailyMaxRate: 50, gracePeriodMinutes: 15 });
    expect(config.mqtt).toMatchObject({ host: "broker.internal", useTls: false });
    expect(config.corsOrigins).toEqual(["http://a.test", "http://b.test"]);
  });

  it("should require a JWT secret in production", () => {
    expect(() => loadConfig({ NODE_ENV: "production" })).toThrow("JWT_SECRET is required");
    expect(loadConfig({ NODE_ENV: "production", JWT_SECRET: "test-secret" }).isProd).toBe(true);
  });
});
