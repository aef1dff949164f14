"use strict";

import * as fs from "fs";
import { connect as mqttConnect, IClientOptions, IClientSubscribeOptions, MqttClient } from "mqtt";
import { BrokerProtocol } from "../api/config";
import { ConnectAck, QoS } from "../api/types";
import { logger } from "../utils/logger";

export interface TransportOptions {
  clientId: string;
  host: string;
  port: number;
  protocol: BrokerProtocol;
  clean: boolean;
  keepAliveSecs: number;
  connectTimeoutMs: number;
  caPath?: string;
  certPath?: string;
  keyPath?: string;
}

export interface InboundPublish {
  topic: string;
  payload: Buffer;
  dup: boolean;
  qos: number;
}

/**
 * The slice of an MQTT client the sessions and the publisher rely on. One
 * transport is reused across connect cycles; every `connect` opens a fresh
 * network connection with the same client id.
 */
export interface MqttTransport {
  readonly clientId: string;
  connect(): Promise<ConnectAck>;
  /** Resolves with the granted QoS, or 0x80 when the broker refuses the filter. */
  subscribe(filter: string, qos: QoS): Promise<number>;
  /** Resolves with the packet id once the broker acknowledges (QoS 1). */
  publish(topic: string, payload: Buffer, qos: QoS): Promise<number | undefined>;
  /** Closes the connection; `force` drops it without waiting for in-flight packets. */
  end(force?: boolean): Promise<void>;
  onMessage(listener: (message: InboundPublish) => void): void;
  /** Fires when the connection closes without `end` having been called. */
  onInterrupted(listener: (error?: Error) => void): void;
}

export type TransportFactory = (options: TransportOptions) => MqttTransport;

/** SUBACK return code for a refused subscription (MQTT 3.1.1). */
export const SUBACK_FAILURE = 0x80;

type MqttQoS = IClientSubscribeOptions["qos"];

// mqtt.js rejects subscribeAsync when the SUBACK carries a failure code.
function subackFailureCode(err: unknown): number | null {
  if (err instanceof Error && "code" in err && typeof err.code === "number" && (err.code & SUBACK_FAILURE) !== 0) {
    return err.code;
  }
  return null;
}

function toMqttQoS(qos: QoS): MqttQoS {
  switch (qos) {
    case QoS.AtMostOnce:
      return 0;
    case QoS.AtLeastOnce:
      return 1;
    case QoS.ExactlyOnce:
      return 2;
  }
}

export function buildClientOptions(
  options: TransportOptions,
  readFile: (file: string) => Buffer = (file) => fs.readFileSync(file),
): IClientOptions {
  const clientOptions: IClientOptions = {
    host: options.host,
    port: options.port,
    protocol: options.protocol,
    clientId: options.clientId,
    clean: options.clean,
    keepalive: options.keepAliveSecs,
    connectTimeout: options.connectTimeoutMs,
    // Reconnects are driven by the caller so that outages stay observable.
    reconnectPeriod: 0,
    protocolVersion: 4,
  };
  if (options.protocol === "mqtts") {
    clientOptions.rejectUnauthorized = true;
    if (options.caPath) clientOptions.ca = readFile(options.caPath);
    if (options.certPath) clientOptions.cert = readFile(options.certPath);
    if (options.keyPath) clientOptions.key = readFile(options.keyPath);
  }
  return clientOptions;
}

class MqttJsTransport implements MqttTransport {
  private client: MqttClient | null = null;
  private closing = false;
  private readonly messageListeners: Array<(message: InboundPublish) => void> = [];
  private readonly interruptListeners: Array<(error?: Error) => void> = [];

  constructor(
    private readonly options: TransportOptions,
    private readonly clientOptions: IClientOptions,
  ) {}

  get clientId(): string {
    return this.options.clientId;
  }

  connect(): Promise<ConnectAck> {
    if (this.client) {
      return Promise.reject(new Error(`Transport ${this.clientId} is already connected`));
    }
    const client = mqttConnect(this.clientOptions);
    this.client = client;
    this.closing = false;

    client.on("message", (topic, payload, packet) => {
      for (const listener of this.messageListeners) {
        listener({ topic, payload, dup: packet.dup, qos: packet.qos });
      }
    });

    return new Promise<ConnectAck>((resolve, reject) => {
      let lastError: Error | undefined;

      const fail = (err: Error) => {
        clearTimeout(timer);
        client.removeAllListeners();
        // A listener has to stay attached so a late socket error is not thrown.
        client.on("error", () => undefined);
        client.end(true);
        if (this.client === client) this.client = null;
        reject(err);
      };

      const timer = setTimeout(
        () => fail(new Error(`Connection timed out after ${this.options.connectTimeoutMs}ms`)),
        this.options.connectTimeoutMs,
      );

      client.once("connect", (connack) => {
        clearTimeout(timer);
        client.removeAllListeners("close");
        client.removeAllListeners("error");
        client.on("error", (err) => {
          logger.warn(`[${this.clientId}] transport error: ${err.message}`);
          lastError = err;
        });
        client.on("close", () => this.handleClose(client, lastError));
        resolve({ sessionPresent: connack.sessionPresent });
      });
      client.on("error", (err) => {
        lastError = err;
      });
      client.on("close", () => fail(lastError ?? new Error("Connection closed before CONNACK")));
    });
  }

  private handleClose(client: MqttClient, error?: Error): void {
    if (this.client !== client) return;
    this.client = null;
    if (this.closing) return;
    for (const listener of this.interruptListeners) {
      listener(error);
    }
  }

  async subscribe(filter: string, qos: QoS): Promise<number> {
    const client = this.requireClient();
    try {
      const grants = await client.subscribeAsync(filter, { qos: toMqttQoS(qos) });
      return grants[0]?.qos ?? SUBACK_FAILURE;
    } catch (err) {
      const code = subackFailureCode(err);
      if (code === null) throw err;
      return code;
    }
  }

  async publish(topic: string, payload: Buffer, qos: QoS): Promise<number | undefined> {
    const client = this.requireClient();
    const packet = await client.publishAsync(topic, payload, { qos: toMqttQoS(qos) });
    return packet && "messageId" in packet ? packet.messageId : undefined;
  }

  async end(force = false): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.closing = true;
    try {
      await client.endAsync(force);
    } finally {
      client.removeAllListeners();
      client.on("error", () => undefined);
      if (this.client === client) this.client = null;
    }
  }

  onMessage(listener: (message: InboundPublish) => void): void {
    this.messageListeners.push(listener);
  }

  onInterrupted(listener: (error?: Error) => void): void {
    this.interruptListeners.push(listener);
  }

  private requireClient(): MqttClient {
    if (!this.client) {
      throw new Error(`Transport ${this.clientId} is not connected`);
    }
    return this.client;
  }
}

export const createMqttTransport: TransportFactory = (options) =>
  new MqttJsTransport(options, buildClientOptions(options));
