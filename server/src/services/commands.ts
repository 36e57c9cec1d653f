import type { AccessLevel } from "../models/RfidCard.js";
import { TOPIC_COMMANDS } from "../mqtt/topics.js";

export const gates = ["entrance", "exit"] as const;
export type Gate = (typeof gates)[number];

export function isGate(raw: unknown): raw is Gate {
  return gates.some((g) => g === raw);
}

export class InvalidGateError extends Error {
  constructor(readonly gate: unknown) {
    super("Invalid gate. Use 'entrance' or 'exit'");
    this.name = "InvalidGateError";
  }
}

export type WhitelistEntry = {
  card_uid: string;
  owner_name: string;
  access_level: AccessLevel;
  is_active: boolean;
};

export interface CommandPublisher {
  publish(topic: string, message: Record<string, unknown>): Promise<boolean>;
}

/**
 * Named gate-controller commands, each a single message on the commands
 * topic. Results only say whether the broker accepted the message; the
 * device does not acknowledge.
 */
export class CommandDispatcher {
  constructor(private readonly publisher: CommandPublisher) {}

  send(command: string, args: Record<string, unknown> = {}): Promise<boolean> {
    return this.publisher.publish(TOPIC_COMMANDS, { command, ...args });
  }

  openBarrier(gate: unknown): Promise<boolean> {
    if (!isGate(gate)) throw new InvalidGateError(gate);
    return this.send("open_barrier", { gate });
  }

  setEmergencyMode(enable: boolean): Promise<boolean> {
    return this.send("emergency", { enable });
  }

  requestStatus(): Promise<boolean> {
    return this.send("get_status");
  }

  setScanMode(enable: boolean, gate: unknown): Promise<boolean> {
    if (!isGate(gate)) throw new InvalidGateError(gate);
    return this.send("scan_mode", { enable, gate });
  }

  syncWhitelist(cards: WhitelistEntry[]): Promise<boolean> {
    return this.send("sync_whitelist", { cards });
  }
}
