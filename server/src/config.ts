import { logger } from "./logger.js";

export type MqttConfig = {
  host: string;
  port: number;
  username: string;
  password: string;
  clientId: string;
  keepaliveSeconds: number;
  useTls: boolean;
  caCertsPath: string;
  tlsInsecure: boolean;
  reconnectMs: number;
  queueCapacity: number;
};

export type AppConfig = {
  appName: string;
  version: string;
  isProd: boolean;
  port: number;
  mongoUri: string | undefined;
  mongoRetryMs: number;
  jwtSecret: string;
  accessTokenTtlMinutes: number;
  admin: { username: string; password: string; email: string };
  totalParkingSlots: number;
  pricing: { hourlyRate: number; dailyMaxRate: number; gracePeriodMinutes: number };
  corsOrigins: string[];
  mqtt: MqttConfig;
};

type Env = Record<string, string | undefined>;

const DEV_JWT_SECRET = "dev-only-secret";
const DEFAULT_ADMIN_PASSWORD = "admin123";

function str(env: Env, key: string, fallback: string): string {
  const v = env[key]?.trim();
  return v ? v : fallback;
}

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function bool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === "true" || raw === "1" || raw === "yes";
}

export function loadConfig(env: Env = process.env): AppConfig {
  const isProd = String(env.NODE_ENV ?? "").toLowerCase() === "production";

  const jwtSecret = env.JWT_SECRET?.trim();
  if (!jwtSecret && isProd) {
    throw new Error("JWT_SECRET is required");
  }

  const adminPassword = str(env, "ADMIN_PASSWORD", DEFAULT_ADMIN_PASSWORD);
  if (isProd && adminPassword === DEFAULT_ADMIN_PASSWORD) {
    logger.warn("default admin password in use, set ADMIN_PASSWORD");
  }

  const corsOrigin = env.CORS_ORIGIN;

  return {
    appName: "Parking Gate Backend",
    version: "1.0.0",
    isProd,
    port: num(env, "PORT", 8000),
    mongoUri: env.MONGODB_URI?.trim() || undefined,
    mongoRetryMs: num(env, "MONGODB_RETRY_MS", 5000),
    jwtSecret: jwtSecret || DEV_JWT_SECRET,
    accessTokenTtlMinutes: num(env, "ACCESS_TOKEN_EXPIRE_MINUTES", 1440),
    admin: {
      username: str(env, "ADMIN_USERNAME", "admin"),
      password: adminPassword,
      email: str(env, "ADMIN_EMAIL", "admin@parking.local"),
    },
    totalParkingSlots: Math.max(1, Math.floor(num(env, "TOTAL_PARKING_SLOTS", 10))),
    pricing: {
      hourlyRate: num(env, "HOURLY_RATE", 5.0),
      dailyMaxRate: num(env, "DAILY_MAX_RATE", 50.0),
      gracePeriodMinutes: num(env, "GRACE_PERIOD_MINUTES", 15),
    },
    corsOrigins: corsOrigin ? corsOrigin.split(",").map((s) => s.trim()).filter(Boolean) : [],
    mqtt: {
      host: str(env, "MQTT_BROKER_HOST", "localhost"),
      port: num(env, "MQTT_BROKER_PORT", 8883),
      username: str(env, "MQTT_USERNAME", ""),
      password: str(env, "MQTT_PASSWORD", ""),
      clientId: str(env, "MQTT_CLIENT_ID", "parking-backend"),
      keepaliveSeconds: num(env, "MQTT_KEEPALIVE", 60),
      useTls: bool(env, "MQTT_USE_TLS", true),
      caCertsPath: str(env, "MQTT_CA_CERTS", ""),
      tlsInsecure: bool(env, "MQTT_TLS_INSECURE", false),
      reconnectMs: num(env, "MQTT_RECONNECT_MS", 5000),
      queueCapacity: Math.max(1, Math.floor(num(env, "MQTT_QUEUE_CAPACITY", 1000))),
    },
  };
}
