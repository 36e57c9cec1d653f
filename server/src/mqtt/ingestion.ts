import crypto from "crypto";

import type { MqttConfig } from "../config.js";
import { errorFields, logger } from "../logger.js";
import { calculateParkingFee, formatDuration } from "../services/fees.js";
import type { PricingStore } from "../services/pricing.js";
import type { NewSystemEvent, ParkingStore, PricingPolicy } from "../store/types.js";
import {
  MalformedPayloadError,
  parseDeviceMessage,
  type DeviceMessage,
  type GateEventPayload,
  type ScanPayload,
  type SystemStatusPayload,
} from "./payload.js";
import { MessageQueue } from "./queue.js";
import { TOPIC_ENTRY, TOPIC_EXIT, TOPIC_SCAN, TOPIC_SYSTEM, deviceTopics, isDeviceTopic } from "./topics.js";
import { createMqttTransport, type BrokerTransport, type TransportFactory } from "./transport.js";

export type DeviceListener = (topic: string, data: Record<string, unknown>) => void | Promise<void>;

export type HandleOutcome = "accepted" | "malformed" | "ignored";

type InboundMessage = { topic: string; payload: string };

export type IngestionOptions = {
  store: ParkingStore;
  pricing: PricingStore;
  config: MqttConfig;
  transportFactory?: TransportFactory;
  now?: () => Date;
  publishTimeoutMs?: number;
};

const MS_PER_MINUTE = 60_000;

/**
 * Broker client for the gate controller. Inbound device messages are queued
 * and applied one at a time; each one runs in its own store transaction and
 * is then handed to every registered listener.
 */
export class EventIngestionClient {
  private readonly store: ParkingStore;
  private readonly pricing: PricingStore;
  private readonly config: MqttConfig;
  private readonly transportFactory: TransportFactory;
  private readonly now: () => Date;
  private readonly publishTimeoutMs: number;

  private readonly listeners = new Map<string, DeviceListener>();
  private readonly queue: MessageQueue<InboundMessage>;
  private transport: BrokerTransport | null = null;
  private connected = false;

  constructor(opts: IngestionOptions) {
    this.store = opts.store;
    this.pricing = opts.pricing;
    this.config = opts.config;
    this.transportFactory = opts.transportFactory ?? createMqttTransport;
    this.now = opts.now ?? (() => new Date());
    this.publishTimeoutMs = opts.publishTimeoutMs ?? 5_000;
    this.queue = new MessageQueue(async (msg) => {
      await this.handleMessage(msg.topic, msg.payload);
    }, opts.config.queueCapacity);
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get brokerUrl(): string | null {
    return this.transport?.brokerUrl ?? null;
  }

  connect(): void {
    if (this.transport) return;

    this.transport = this.transportFactory(this.config, {
      onConnect: () => {
        this.handleConnect().catch((err) => logger.error("mqtt connect handling failed", errorFields(err)));
      },
      onDisconnect: (reason) => this.handleDisconnect(reason),
      // connectivity follows close/offline events only
      onError: (err) => logger.error("mqtt transport error", errorFields(err)),
      onMessage: (topic, payload) => this.enqueue(topic, payload),
    });
  }

  async stop(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    this.connected = false;
    if (transport) {
      await transport.close();
      logger.info("mqtt client stopped");
    }
    await this.queue.idle();
  }

  addListener(listener: DeviceListener): string {
    const id = crypto.randomUUID();
    this.listeners.set(id, listener);
    return id;
  }

  removeListener(id: string): boolean {
    return this.listeners.delete(id);
  }

  /** Serializes and sends `message`. Resolves false when offline or the send fails. */
  async publish(topic: string, message: Record<string, unknown>): Promise<boolean> {
    const transport = this.transport;
    if (!this.connected || !transport) {
      logger.warn("mqtt not connected, cannot publish", { topic });
      return false;
    }

    const payload = JSON.stringify(message);
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        transport.publish(topic, payload),
        new Promise<never>((_resolve, reject) => {
          timer = setTimeout(() => reject(new Error("publish timed out")), this.publishTimeoutMs);
        }),
      ]);
      logger.info("mqtt message published", { topic, payload });
      return true;
    } catch (err) {
      logger.error("mqtt publish failed", { topic, ...errorFields(err) });
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  enqueue(topic: string, payload: string): void {
    if (!this.queue.push({ topic, payload })) {
      logger.warn("inbound queue full, message dropped", { topic, capacity: this.config.queueCapacity });
    }
  }

  /** Resolves once every queued inbound message has been applied. */
  async drain(): Promise<void> {
    await this.queue.idle();
  }

  async handleMessage(topic: string, text: string): Promise<HandleOutcome> {
    if (!isDeviceTopic(topic)) {
      logger.warn("message on unexpected topic", { topic });
      return "ignored";
    }

    logger.debug("mqtt message received", { topic, payload: text });

    let message: DeviceMessage;
    try {
      message = parseDeviceMessage(topic, text);
    } catch (err) {
      if (err instanceof MalformedPayloadError) {
        logger.error("dropping malformed mqtt payload", { topic, reason: err.message, payload: text });
        return "malformed";
      }
      throw err;
    }

    try {
      switch (message.topic) {
        case TOPIC_ENTRY:
          await this.applyEntry(message.event);
          break;
        case TOPIC_EXIT:
          await this.applyExit(message.event);
          break;
        case TOPIC_SCAN:
          this.noteScan(message.event);
          break;
        case TOPIC_SYSTEM:
          this.noteSystemStatus(message.event);
          break;
      }
    } catch (err) {
      logger.error("failed to apply device event, changes rolled back", { topic, ...errorFields(err) });
    }

    await this.notify(topic, message.raw);
    return "accepted";
  }

  private eventTime(epochSeconds: number | undefined): Date {
    return epochSeconds === undefined ? this.now() : new Date(epochSeconds * 1000);
  }

  private async applyEntry(event: GateEventPayload): Promise<void> {
    const at = this.eventTime(event.timestamp);
    const slotId = event.slotId > 0 ? event.slotId : null;

    await this.store.transaction(async (ledger) => {
      await ledger.insertLog({
        cardUid: event.cardUid,
        slotId,
        action: "entry",
        gate: event.gate,
        status: event.status,
        timestamp: at,
        durationMinutes: null,
        feeAmount: null,
      });

      if (event.status !== "success" || slotId === null) return;

      const slot = await ledger.findSlot(slotId);
      if (!slot) {
        logger.warn("entry for unknown slot", { slotId, cardUid: event.cardUid });
        return;
      }

      await ledger.saveSlot({ ...slot, status: "occupied", currentCardUid: event.cardUid, entryTime: at });
    });

    logger.info("entry event logged", { cardUid: event.cardUid, slotId, status: event.status });
  }

  private async applyExit(event: GateEventPayload): Promise<void> {
    const at = this.eventTime(event.timestamp);
    const slotId = event.slotId > 0 ? event.slotId : null;
    const settles = event.status === "success" && slotId !== null;
    const pricing: PricingPolicy | null = settles ? await this.pricing.get() : null;

    const charged = await this.store.transaction(async (ledger) => {
      let durationMinutes: number | null = null;
      let feeAmount: number | null = null;

      const slot = settles && slotId !== null ? await ledger.findSlot(slotId) : null;
      if (slot?.entryTime && pricing) {
        const minutes = Math.floor((at.getTime() - slot.entryTime.getTime()) / MS_PER_MINUTE);
        const fee = calculateParkingFee(minutes, pricing);

        await ledger.saveSlot({ ...slot, status: "available", currentCardUid: null, entryTime: null, exitTime: at });

        if (minutes > 0) durationMinutes = minutes;
        if (fee > 0) feeAmount = fee;
      }

      await ledger.insertLog({
        cardUid: event.cardUid,
        slotId,
        action: "exit",
        gate: event.gate,
        status: event.status,
        timestamp: at,
        durationMinutes,
        feeAmount,
      });

      return { durationMinutes, feeAmount };
    });

    logger.info("exit event logged", {
      cardUid: event.cardUid,
      slotId,
      status: event.status,
      duration: charged.durationMinutes === null ? null : formatDuration(charged.durationMinutes),
      fee: (charged.feeAmount ?? 0).toFixed(2),
    });
  }

  private noteScan(event: ScanPayload): void {
    logger.info("card scanned in scan mode", { cardUid: event.cardUid, gate: event.gate });
  }

  private noteSystemStatus(event: SystemStatusPayload): void {
    logger.info("gate controller status", {
      occupiedSlots: event.occupiedSlots,
      totalSlots: event.totalSlots,
      emergencyMode: event.emergencyMode,
    });
  }

  private async notify(topic: string, data: Record<string, unknown>): Promise<void> {
    for (const [id, listener] of [...this.listeners]) {
      try {
        await listener(topic, data);
      } catch (err) {
        logger.error("device listener failed", { listenerId: id, topic, ...errorFields(err) });
      }
    }
  }

  private async handleConnect(): Promise<void> {
    this.connected = true;
    logger.info("connected to mqtt broker", { url: this.brokerUrl });

    const transport = this.transport;
    if (transport) {
      try {
        await transport.subscribe(deviceTopics);
        logger.info("subscribed to device topics", { topics: [...deviceTopics] });
      } catch (err) {
        logger.error("mqtt subscribe failed", errorFields(err));
      }
    }

    await this.recordSystemEvent({
      eventType: "mqtt_connected",
      severity: "info",
      description: "MQTT broker connected successfully",
    });
  }

  private handleDisconnect(reason: string): void {
    if (!this.connected) return;
    this.connected = false;
    logger.warn("disconnected from mqtt broker", { reason });

    this.recordSystemEvent({
      eventType: "mqtt_disconnected",
      severity: "warning",
      description: `MQTT broker disconnected: ${reason}`,
    }).catch((err) => logger.error("failed to record system event", errorFields(err)));
  }

  private async recordSystemEvent(event: NewSystemEvent): Promise<void> {
    try {
      await this.store.recordSystemEvent(event);
    } catch (err) {
      logger.error("failed to record system event", { eventType: event.eventType, ...errorFields(err) });
    }
  }
}
