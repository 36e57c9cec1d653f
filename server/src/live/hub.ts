import { errorFields, logger } from "../logger.js";

export interface LiveSession {
  readonly id: string;
  send(data: string): Promise<void>;
}

export type LiveEnvelope = {
  type: string;
  data: unknown;
  timestamp: number;
};

export type BroadcastResult = { delivered: number; dropped: number };

export function envelope(type: string, data: unknown, at: Date = new Date()): LiveEnvelope {
  return { type, data, timestamp: Math.floor(at.getTime() / 1000) };
}

/**
 * Connected live-feed viewers. A session whose delivery fails once is
 * treated as gone; removal happens after the whole broadcast pass.
 */
export class LiveHub {
  private readonly sessions = new Map<string, LiveSession>();

  get size(): number {
    return this.sessions.size;
  }

  register(session: LiveSession): void {
    this.sessions.set(session.id, session);
    logger.info("live client connected", { sessionId: session.id, total: this.sessions.size });
  }

  unregister(id: string): void {
    if (this.sessions.delete(id)) {
      logger.info("live client disconnected", { sessionId: id, total: this.sessions.size });
    }
  }

  async broadcast(type: string, data: unknown): Promise<BroadcastResult> {
    const text = JSON.stringify(envelope(type, data));
    const targets = [...this.sessions.values()];

    const results = await Promise.allSettled(targets.map((s) => s.send(text)));

    const failed: string[] = [];
    results.forEach((r, i) => {
      const session = targets[i];
      if (r.status === "rejected" && session) {
        logger.warn("live delivery failed, dropping client", { sessionId: session.id, ...errorFields(r.reason) });
        failed.push(session.id);
      }
    });

    for (const id of failed) {
      this.unregister(id);
    }

    const delivered = targets.length - failed.length;
    if (delivered > 0) {
      logger.debug("live event broadcast", { type, delivered });
    }
    return { delivered, dropped: failed.length };
  }
}
