"use strict";

import { v4 as uuidv4 } from "uuid";
import { createMqttTransport, MqttTransport, TransportFactory } from "../transport/bridge";
import { createTestMessage, encodeTestMessage } from "../utils/codec";
import { logger } from "../utils/logger";
import { realScheduler, Scheduler } from "../utils/scheduler";
import { getPublishTopic, publisherClientId, QueueCheckConfig } from "./config";
import { ErrorCode, PublishError, describeError } from "./errors";
import { ConnectAck, PublishAck, QoS } from "./types";

export interface MessagePublisherOptions {
  transportFactory?: TransportFactory;
  scheduler?: Scheduler;
}

export interface ContinuousPublishOptions {
  intervalMs?: number;
  maxMessages?: number;
  signal?: AbortSignal;
}

export interface PublishSummary {
  sent: number;
  failed: number;
}

/** Sequential QoS 1 sender of test messages. */
export class MessagePublisher {
  readonly clientId: string;
  private readonly transport: MqttTransport;
  private readonly scheduler: Scheduler;
  private isConnected = false;
  private published = 0;

  constructor(
    private readonly config: QueueCheckConfig,
    options: MessagePublisherOptions = {},
  ) {
    const { broker } = config;
    this.clientId = publisherClientId(config.clientIdPrefix);
    this.scheduler = options.scheduler ?? realScheduler;
    this.transport = (options.transportFactory ?? createMqttTransport)({
      clientId: this.clientId,
      host: broker.endpoint,
      port: broker.port,
      protocol: broker.protocol,
      clean: false,
      keepAliveSecs: broker.keepAliveSecs,
      connectTimeoutMs: broker.connectTimeoutMs,
      caPath: broker.rootCaPath,
      certPath: broker.certPath,
      keyPath: broker.privateKeyPath,
    });
    this.transport.onInterrupted((error) => {
      this.isConnected = false;
      logger.warn(`[Publisher] connection interrupted: ${error ? error.message : "closed by broker"}`);
    });
  }

  get connected(): boolean {
    return this.isConnected;
  }

  get publishCount(): number {
    return this.published;
  }

  async connect(): Promise<ConnectAck> {
    logger.info(`[Publisher] connecting to ${this.config.broker.endpoint}...`);
    const ack = await this.transport.connect();
    this.isConnected = true;
    logger.info(`[Publisher] connected: ${this.clientId}, session present: ${ack.sessionPresent}`);
    return ack;
  }

  async publish(topic: string, payload: Buffer, qos: QoS = QoS.AtLeastOnce): Promise<PublishAck> {
    if (!this.isConnected) {
      throw new PublishError("Publisher is not connected", {
        code: ErrorCode.NOT_CONNECTED,
        context: { topic },
      });
    }
    try {
      const packetId = await this.transport.publish(topic, payload, qos);
      return { topic, packetId };
    } catch (err) {
      logger.error(`[Publisher] publish to ${topic} failed: ${describeError(err)}`);
      throw new PublishError(`Publish to ${topic} failed: ${describeError(err)}`, {
        code: ErrorCode.PUBLISH_FAILED,
        context: { topic },
        cause: err,
      });
    }
  }

  async publishTestMessage(messageId: string = uuidv4()): Promise<PublishAck> {
    const sequence = this.published + 1;
    const message = createTestMessage(messageId, this.clientId, sequence, new Date(this.scheduler.now()));
    const ack = await this.publish(getPublishTopic(this.config), encodeTestMessage(message));
    this.published++;
    logger.info(`[Publisher] sent ${messageId} (packet ${ack.packetId ?? "-"}, total ${this.published})`);
    return { ...ack, messageId, sequence };
  }

  async startContinuousPublishing(options: ContinuousPublishOptions = {}): Promise<PublishSummary> {
    const {
      intervalMs = this.config.publisher.intervalMs,
      maxMessages = this.config.publisher.maxMessages,
      signal,
    } = options;
    logger.info(`[Publisher] publishing ${maxMessages} messages every ${intervalMs}ms`);

    const summary: PublishSummary = { sent: 0, failed: 0 };
    for (let i = 0; i < maxMessages && !signal?.aborted; i++) {
      if (!this.isConnected) {
        logger.warn("[Publisher] connection lost; stopping");
        break;
      }
      try {
        await this.publishTestMessage();
        summary.sent++;
        logger.info(`[Publisher] progress: ${i + 1}/${maxMessages}`);
      } catch (err) {
        summary.failed++;
        logger.error(`[Publisher] ${describeError(err)}`);
      }
      if (i < maxMessages - 1) {
        await this.scheduler.sleep(intervalMs, signal);
      }
    }

    logger.info(`[Publisher] done: ${summary.sent} sent, ${summary.failed} failed`);
    return summary;
  }

  async disconnect(): Promise<void> {
    if (!this.isConnected) {
      logger.info("[Publisher] already disconnected");
      return;
    }
    this.isConnected = false;
    try {
      await this.transport.end(false);
      logger.info("[Publisher] disconnected");
    } catch (err) {
      logger.warn(`[Publisher] error while disconnecting: ${describeError(err)}`);
    }
  }
}
