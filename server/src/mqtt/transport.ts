import fs from "fs";
import { connect, type IClientOptions } from "mqtt";

import type { MqttConfig } from "../config.js";
import { logger } from "../logger.js";

export type TransportHandlers = {
  onConnect: () => void;
  onDisconnect: (reason: string) => void;
  onError: (err: Error) => void;
  onMessage: (topic: string, payload: string) => void;
};

/** The slice of a broker client the ingestion layer depends on. */
export interface BrokerTransport {
  readonly brokerUrl: string;
  subscribe(topics: readonly string[]): Promise<void>;
  publish(topic: string, payload: string): Promise<void>;
  close(): Promise<void>;
}

export type TransportFactory = (config: MqttConfig, handlers: TransportHandlers) => BrokerTransport;

export function brokerUrl(config: MqttConfig): string {
  const scheme = config.useTls ? "mqtts" : "mqtt";
  return `${scheme}://${config.host}:${config.port}`;
}

export const createMqttTransport: TransportFactory = (config, handlers) => {
  const url = brokerUrl(config);

  const options: IClientOptions = {
    clientId: config.clientId,
    keepalive: config.keepaliveSeconds,
    reconnectPeriod: config.reconnectMs,
    connectTimeout: 10_000,
    clean: true,
  };

  if (config.username && config.password) {
    options.username = config.username;
    options.password = config.password;
  } else {
    logger.warn("mqtt credentials not set, broker may refuse the connection");
  }

  if (config.useTls) {
    options.rejectUnauthorized = !config.tlsInsecure;
    if (config.tlsInsecure) {
      logger.warn("mqtt TLS certificate verification disabled");
    }
    if (config.caCertsPath) {
      options.ca = fs.readFileSync(config.caCertsPath);
    }
  }

  logger.info("connecting to mqtt broker", { url });
  const client = connect(url, options);

  client.on("connect", () => handlers.onConnect());
  client.on("close", () => handlers.onDisconnect("connection closed"));
  client.on("offline", () => handlers.onDisconnect("client offline"));
  client.on("error", (err: Error) => handlers.onError(err));
  client.on("message", (topic: string, payload: Buffer) => handlers.onMessage(topic, payload.toString("utf8")));

  return {
    brokerUrl: url,
    async subscribe(topics) {
      await client.subscribeAsync([...topics], { qos: 1 });
    },
    async publish(topic, payload) {
      await client.publishAsync(topic, payload, { qos: 1 });
    },
    async close() {
      await client.endAsync();
    },
  };
};
