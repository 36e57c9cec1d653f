import { TOPIC_ENTRY, TOPIC_EXIT, TOPIC_SCAN, TOPIC_SYSTEM, type DeviceTopic } from "./topics.js";
import { asBoolean, asNumber, asString, isRecord, type ValidationResult } from "../utils/validate.js";

/** Latest instant a JS Date can hold, in epoch seconds. */
const MAX_EPOCH_SECONDS = 8_640_000_000;

export class MalformedPayloadError extends Error {
  constructor(
    readonly topic: string,
    reason: string
  ) {
    super(`Malformed payload on ${topic}: ${reason}`);
    this.name = "MalformedPayloadError";
  }
}

export type GateEventPayload = {
  cardUid: string;
  /** 0 when no slot was assigned */
  slotId: number;
  gate: string;
  status: string;
  /** epoch seconds, absent when the device did not stamp the event */
  timestamp: number | undefined;
  availableSlots: number | undefined;
};

export type ScanPayload = {
  cardUid: string;
  gate: string;
  timestamp: number | undefined;
};

export type SystemStatusPayload = {
  totalSlots: number | undefined;
  occupiedSlots: number | undefined;
  availableSlots: number | undefined;
  authorizedCards: number | undefined;
  emergencyMode: boolean | undefined;
  uptime: number | undefined;
};

export type DeviceMessage =
  | { topic: typeof TOPIC_ENTRY; raw: Record<string, unknown>; event: GateEventPayload }
  | { topic: typeof TOPIC_EXIT; raw: Record<string, unknown>; event: GateEventPayload }
  | { topic: typeof TOPIC_SCAN; raw: Record<string, unknown>; event: ScanPayload }
  | { topic: typeof TOPIC_SYSTEM; raw: Record<string, unknown>; event: SystemStatusPayload };

function take<T>(topic: string, r: ValidationResult<T>): T {
  if (!r.ok) throw new MalformedPayloadError(topic, r.error);
  return r.value;
}

function parseGateEvent(topic: string, body: Record<string, unknown>, defaultGate: string): GateEventPayload {
  const cardUid = take(topic, asString(body.card_uid, { field: "card_uid", required: true, trim: true }));
  const status = take(topic, asString(body.status, { field: "status", required: true, trim: true }));
  const slotId = take(topic, asNumber(body.slot_id, { field: "slot_id", integer: true }));
  const gate = take(topic, asString(body.gate, { field: "gate", trim: true }));
  const timestamp = take(topic, asNumber(body.timestamp, { field: "timestamp", integer: true, min: 0, max: MAX_EPOCH_SECONDS }));
  const availableSlots = take(topic, asNumber(body.available_slots, { field: "available_slots", integer: true }));

  return {
    cardUid,
    slotId: slotId ?? 0,
    gate: gate || defaultGate,
    status,
    timestamp,
    availableSlots,
  };
}

function parseScan(topic: string, body: Record<string, unknown>): ScanPayload {
  const cardUid = take(topic, asString(body.card_uid, { field: "card_uid", required: true, trim: true }));
  const gate = take(topic, asString(body.gate, { field: "gate", trim: true }));
  const timestamp = take(topic, asNumber(body.timestamp, { field: "timestamp", integer: true, min: 0, max: MAX_EPOCH_SECONDS }));
  return { cardUid, gate: gate || "entrance", timestamp };
}

function parseSystemStatus(topic: string, body: Record<string, unknown>): SystemStatusPayload {
  const count = (key: string) => take(topic, asNumber(body[key], { field: key, integer: true }));
  return {
    totalSlots: count("total_slots"),
    occupiedSlots: count("occupied_slots"),
    availableSlots: count("available_slots"),
    authorizedCards: count("authorized_cards"),
    emergencyMode: take(topic, asBoolean(body.emergency_mode, { field: "emergency_mode" })),
    uptime: count("uptime"),
  };
}

/**
 * Parses and validates a raw broker payload for one of the device topics.
 * Throws MalformedPayloadError when the text is not a JSON object or a
 * field has the wrong type.
 */
export function parseDeviceMessage(topic: DeviceTopic, text: string): DeviceMessage {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new MalformedPayloadError(topic, "invalid JSON");
  }
  if (!isRecord(body)) {
    throw new MalformedPayloadError(topic, "expected a JSON object");
  }

  switch (topic) {
    case TOPIC_ENTRY:
      return { topic, raw: body, event: parseGateEvent(topic, body, "entrance") };
    case TOPIC_EXIT:
      return { topic, raw: body, event: parseGateEvent(topic, body, "exit") };
    case TOPIC_SCAN:
      return { topic, raw: body, event: parseScan(topic, body) };
    case TOPIC_SYSTEM:
      return { topic, raw: body, event: parseSystemStatus(topic, body) };
  }
}
