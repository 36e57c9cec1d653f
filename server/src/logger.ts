export const logLevels = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof logLevels)[number];

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function threshold(): LogLevel {
  const raw = String(process.env.LOG_LEVEL ?? "info").toLowerCase();
  return logLevels.find((l) => l === raw) ?? "info";
}

export type LogFields = Record<string, unknown>;

function write(level: Exclude<LogLevel, "silent">, message: string, fields?: LogFields): void {
  if (rank[level] < rank[threshold()]) return;

  const line = JSON.stringify({ ts: new Date().toISOString(), level, message, ...fields });
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function errorFields(err: unknown): LogFields {
  return {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  };
}

export const logger = {
  debug: (message: string, fields?: LogFields) => write("debug", message, fields),
  info: (message: string, fields?: LogFields) => write("info", message, fields),
  warn: (message: string, fields?: LogFields) => write("warn", message, fields),
  error: (message: string, fields?: LogFields) => write("error", message, fields),
};
