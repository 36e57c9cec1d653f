export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: string };

function fail<T>(error: string): ValidationResult<T> {
  return { ok: false, error };
}

type StringOpts = {
  field?: string;
  required?: boolean;
  trim?: boolean;
  minLen?: number;
  maxLen?: number;
  lower?: boolean;
  upper?: boolean;
  pattern?: RegExp;
};

export function asString(raw: unknown, opts: StringOpts & { required: true }): ValidationResult<string>;
export function asString(raw: unknown, opts?: StringOpts): ValidationResult<string | undefined>;
export function asString(raw: unknown, opts?: StringOpts): ValidationResult<string | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;
  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "string") {
    return fail(`${field} must be a string`);
  }

  let s = raw;
  if (opts?.trim) s = s.trim();
  if (opts?.lower) s = s.toLowerCase();
  if (opts?.upper) s = s.toUpperCase();

  if (required && !s) return fail(`${field} is required`);
  if (opts?.minLen !== undefined && s.length < opts.minLen) return fail(`${field} is too short`);
  if (opts?.maxLen !== undefined && s.length > opts.maxLen) return fail(`${field} is too long`);
  if (opts?.pattern && !opts.pattern.test(s)) return fail(`${field} is invalid`);

  return { ok: true, value: s };
}

type NumberOpts = {
  field?: string;
  required?: boolean;
  integer?: boolean;
  min?: number;
  max?: number;
};

export function asNumber(raw: unknown, opts: NumberOpts & { required: true }): ValidationResult<number>;
export function asNumber(raw: unknown, opts?: NumberOpts): ValidationResult<number | undefined>;
export function asNumber(raw: unknown, opts?: NumberOpts): ValidationResult<number | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    return fail(`${field} must be a number`);
  }

  if (opts?.integer && !Number.isInteger(raw)) return fail(`${field} must be an integer`);
  if (opts?.min !== undefined && raw < opts.min) return fail(`${field} must be >= ${opts.min}`);
  if (opts?.max !== undefined && raw > opts.max) return fail(`${field} must be <= ${opts.max}`);

  return { ok: true, value: raw };
}

export function asBoolean(raw: unknown, opts: { field?: string; required: true }): ValidationResult<boolean>;
export function asBoolean(raw: unknown, opts?: { field?: string; required?: boolean }): ValidationResult<boolean | undefined>;
export function asBoolean(raw: unknown, opts?: { field?: string; required?: boolean }): ValidationResult<boolean | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "boolean") return fail(`${field} must be a boolean`);
  return { ok: true, value: raw };
}

export function asEnum<T extends readonly string[]>(
  raw: unknown,
  allowed: T,
  opts?: {
    field?: string;
    required?: boolean;
  }
): ValidationResult<T[number] | undefined> {
  const field = opts?.field ?? "value";
  const required = opts?.required ?? false;

  if (raw === undefined || raw === null) {
    if (required) return fail(`${field} is required`);
    return { ok: true, value: undefined };
  }

  if (typeof raw !== "string") return fail(`${field} must be a string`);
  const match = allowed.find((a): a is T[number] => a === raw);
  if (match === undefined) return fail(`${field} is invalid`);
  return { ok: true, value: match };
}

/** Query-string integer: "12" → 12. */
export function asIntParam(raw: unknown, opts?: { field?: string; min?: number }): ValidationResult<number | undefined> {
  const field = opts?.field ?? "value";
  if (raw === undefined || raw === null || raw === "") return { ok: true, value: undefined };
  if (typeof raw !== "string") return fail(`${field} must be an integer`);

  const n = Number(raw.trim());
  if (!Number.isInteger(n)) return fail(`${field} must be an integer`);
  if (opts?.min !== undefined && n < opts.min) return fail(`${field} must be >= ${opts.min}`);
  return { ok: true, value: n };
}

/** Query-string boolean: "true" / "false". */
export function asBoolParam(raw: unknown, opts?: { field?: string }): ValidationResult<boolean | undefined> {
  const field = opts?.field ?? "value";
  if (raw === undefined || raw === null || raw === "") return { ok: true, value: undefined };
  if (raw === "true") return { ok: true, value: true };
  if (raw === "false") return { ok: true, value: false };
  return fail(`${field} must be true or false`);
}

/** Calendar day in YYYY-MM-DD, interpreted as UTC midnight. */
export function asDay(raw: unknown, opts?: { field?: string }): ValidationResult<Date | undefined> {
  const field = opts?.field ?? "value";
  if (raw === undefined || raw === null || raw === "") return { ok: true, value: undefined };
  if (typeof raw !== "string" || !/^\d{4}-\d{2}-\d{2}$/.test(raw.trim())) {
    return fail(`${field} must be YYYY-MM-DD`);
  }

  const d = new Date(`${raw.trim()}T00:00:00.000Z`);
  if (Number.isNaN(d.getTime())) return fail(`${field} must be YYYY-MM-DD`);
  return { ok: true, value: d };
}

export function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

/** JSON request body as a plain object; anything else reads as empty. */
export function bodyOf(raw: unknown): Record<string, unknown> {
  return isRecord(raw) ? raw : {};
}
