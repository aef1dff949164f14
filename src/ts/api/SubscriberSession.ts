"use strict";

import { MqttTransport } from "../transport/bridge";
import { extractMessageIdentity } from "../utils/codec";
import { logger } from "../utils/logger";
import { ConnectError, ErrorCode, SubscribeError, describeError } from "./errors";
import {
  ConnectAck,
  ConnectionState,
  InboundMessage,
  MessageHandler,
  QoS,
  StateChangeListener,
} from "./types";

function toQoS(granted: number): QoS | null {
  switch (granted) {
    case 0:
      return QoS.AtMostOnce;
    case 1:
      return QoS.AtLeastOnce;
    case 2:
      return QoS.ExactlyOnce;
    default:
      return null;
  }
}

export interface SubscriberSessionOptions {
  id: string;
  subscriptionFilter: string;
  transport: MqttTransport;
  now?: () => number;
}

/**
 * One persistent (clean: false) subscriber bound to a shared subscription.
 *
 * Only the session writes its own state. Other components drive it through
 * `connect`, `subscribe`, `disconnect` and `abandon`, and observe it through
 * `onStateChange`.
 */
export class SubscriberSession {
  readonly id: string;
  readonly clientId: string;
  readonly subscriptionFilter: string;
  readonly persistentSession = true;

  private currentState = ConnectionState.Disconnected;
  private connectGeneration = 0;
  private disconnectCount = 0;
  // Bumped whenever the connection is torn down, so a stale connect or
  // subscribe can tell it has been overtaken.
  private attempt = 0;
  private pendingDisconnect: Promise<void> | null = null;
  private readonly handlers: MessageHandler[] = [];
  private readonly stateListeners: StateChangeListener[] = [];
  private readonly interruptListeners: Array<() => void> = [];
  private readonly transport: MqttTransport;
  private readonly now: () => number;
  private readonly tag: string;

  constructor(options: SubscriberSessionOptions) {
    this.id = options.id;
    this.transport = options.transport;
    this.clientId = options.transport.clientId;
    this.subscriptionFilter = options.subscriptionFilter;
    this.now = options.now ?? Date.now;
    this.tag = `[Subscriber-${this.id}]`;

    this.transport.onMessage((publish) => {
      const identity = extractMessageIdentity(publish.payload);
      if (!identity) {
        logger.error(`${this.tag} dropping message without a message_id on ${publish.topic}`);
        return;
      }
      const message: InboundMessage = {
        sessionId: this.id,
        clientId: this.clientId,
        generation: this.connectGeneration,
        messageId: identity.messageId,
        sequence: identity.sequence,
        topic: publish.topic,
        payload: publish.payload,
        dup: publish.dup,
        receivedAt: this.now(),
      };
      logger.info(`${this.tag} received ${message.messageId} (sequence ${message.sequence ?? "?"})`);
      for (const handler of this.handlers) {
        try {
          handler(message);
        } catch (err) {
          logger.error(`${this.tag} message handler failed:`, err);
        }
      }
    });

    this.transport.onInterrupted((error) => {
      if (this.currentState === ConnectionState.Disconnected) return;
      logger.warn(`${this.tag} connection interrupted: ${error ? error.message : "closed by broker"}`);
      this.attempt++;
      this.disconnectCount++;
      this.setState(ConnectionState.Disconnected);
      for (const listener of this.interruptListeners) {
        listener();
      }
    });
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Number of successful connects so far. */
  get generation(): number {
    return this.connectGeneration;
  }

  get disconnects(): number {
    return this.disconnectCount;
  }

  onMessage(handler: MessageHandler): void {
    this.handlers.push(handler);
  }

  onStateChange(listener: StateChangeListener): void {
    this.stateListeners.push(listener);
  }

  /** Fires after the broker or the network dropped the connection. */
  onInterrupted(listener: () => void): void {
    this.interruptListeners.push(listener);
  }

  async connect(): Promise<ConnectAck> {
    if (this.currentState !== ConnectionState.Disconnected) {
      throw new ConnectError(`${this.clientId} cannot connect while ${this.currentState}`, {
        code: ErrorCode.INVALID_STATE,
        context: { sessionId: this.id, state: this.currentState },
      });
    }

    const attempt = ++this.attempt;
    this.setState(ConnectionState.Connecting);
    logger.info(`${this.tag} connecting as ${this.clientId}...`);

    let ack: ConnectAck;
    try {
      ack = await this.transport.connect();
    } catch (err) {
      if (attempt === this.attempt) {
        this.setState(ConnectionState.Disconnected);
      }
      logger.error(`${this.tag} connect failed: ${describeError(err)}`);
      throw new ConnectError(`${this.clientId} failed to connect: ${describeError(err)}`, {
        code: attempt === this.attempt ? ErrorCode.CONNECT_FAILED : ErrorCode.CONNECT_ABORTED,
        context: { sessionId: this.id },
        cause: err,
      });
    }

    if (attempt !== this.attempt) {
      await this.transport.end(true);
      throw new ConnectError(`${this.clientId} connect was abandoned`, {
        code: ErrorCode.CONNECT_ABORTED,
        context: { sessionId: this.id },
      });
    }

    this.connectGeneration++;
    this.setState(ConnectionState.Connected);
    logger.info(`${this.tag} connected: ${this.clientId}, session present: ${ack.sessionPresent}`);
    if (ack.sessionPresent) {
      logger.info(`${this.tag} resuming stored session; queued messages may follow`);
    }
    return ack;
  }

  async subscribe(filter: string = this.subscriptionFilter, qos: QoS = QoS.AtLeastOnce): Promise<QoS> {
    if (this.currentState !== ConnectionState.Connected) {
      throw new SubscribeError(`${this.clientId} cannot subscribe while ${this.currentState}`, {
        code: ErrorCode.INVALID_STATE,
        context: { sessionId: this.id, state: this.currentState },
      });
    }
    if (filter !== this.subscriptionFilter) {
      throw new SubscribeError(`${this.clientId} is bound to ${this.subscriptionFilter}, not ${filter}`, {
        code: ErrorCode.FILTER_MISMATCH,
        context: { sessionId: this.id, filter },
      });
    }

    const attempt = this.attempt;
    let granted: number;
    try {
      granted = await this.transport.subscribe(filter, qos);
    } catch (err) {
      logger.error(`${this.tag} subscribe failed: ${describeError(err)}`);
      throw new SubscribeError(`${this.clientId} failed to subscribe to ${filter}: ${describeError(err)}`, {
        code: ErrorCode.SUBSCRIBE_FAILED,
        context: { sessionId: this.id, filter },
        cause: err,
      });
    }

    if (attempt !== this.attempt || this.currentState !== ConnectionState.Connected) {
      throw new SubscribeError(`${this.clientId} lost its connection while subscribing`, {
        code: ErrorCode.SUBSCRIBE_FAILED,
        context: { sessionId: this.id, filter },
      });
    }
    const grantedQoS = toQoS(granted);
    if (grantedQoS === null) {
      logger.error(`${this.tag} broker refused ${filter} (return code ${granted})`);
      throw new SubscribeError(`Broker refused subscription ${filter} for ${this.clientId}`, {
        code: ErrorCode.SUBSCRIBE_REJECTED,
        context: { sessionId: this.id, filter, granted },
      });
    }

    this.setState(ConnectionState.Subscribed);
    logger.info(`${this.tag} subscribed to ${filter} (QoS ${grantedQoS})`);
    return grantedQoS;
  }

  /** Graceful close. A no-op when already disconnected; concurrent calls share one close. */
  disconnect(): Promise<void> {
    if (this.pendingDisconnect) return this.pendingDisconnect;
    if (this.currentState === ConnectionState.Disconnected) return Promise.resolve();

    this.attempt++;
    this.disconnectCount++;
    this.pendingDisconnect = this.transport
      .end(false)
      .catch((err: unknown) => {
        logger.warn(`${this.tag} error while disconnecting: ${describeError(err)}`);
      })
      .finally(() => {
        this.pendingDisconnect = null;
        this.setState(ConnectionState.Disconnected);
        logger.info(`${this.tag} disconnected`);
      });
    return this.pendingDisconnect;
  }

  /**
   * Forced teardown after a shutdown grace period: whatever is pending is
   * abandoned and the session is Disconnected on return.
   */
  abandon(): void {
    this.attempt++;
    if (this.currentState !== ConnectionState.Disconnected && !this.pendingDisconnect) {
      this.disconnectCount++;
    }
    this.transport.end(true).catch((err: unknown) => {
      logger.warn(`${this.tag} error while abandoning connection: ${describeError(err)}`);
    });
    this.setState(ConnectionState.Disconnected);
  }

  private setState(next: ConnectionState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    for (const listener of this.stateListeners) {
      listener(previous, next);
    }
  }
}
