"use strict";

// Core public types/enums used by consumers

export enum QoS {
  AtMostOnce = 0,
  AtLeastOnce = 1,
  ExactlyOnce = 2
}

export enum ConnectionState {
  Disconnected = "disconnected",
  Connecting = "connecting",
  Connected = "connected",
  Subscribed = "subscribed"
}

export type DuplicatePolicy = "reconnect-tolerant" | "strict";

export interface ConnectAck {
  sessionPresent: boolean;
}

export interface PublishAck {
  topic: string;
  packetId?: number;
  messageId?: string;
  sequence?: number;
}

export interface InboundMessage {
  sessionId: string;
  clientId: string;
  generation: number;
  messageId: string;
  sequence?: number;
  topic: string;
  payload: Buffer;
  dup: boolean;
  receivedAt: number;
}

export type MessageHandler = (message: InboundMessage) => void;

export type StateChangeListener = (from: ConnectionState, to: ConnectionState) => void;

// Wire format of a test message, shared by publisher and subscribers
export interface TestMessage {
  message_id: string;
  timestamp: string;
  sender: string;
  data: {
    temperature: number;
    humidity: number;
    status: string;
  };
  sequence: number;
}

export interface DisconnectInterval {
  from: number;
  to?: number;
}

export interface LedgerSnapshot {
  perSessionCount: Readonly<Record<string, number>>;
  totalCount: number;
  uniqueMessageCount: number;
  redeliveryCount: number;
  anomalyCount: number;
  connectedSessionIds: readonly string[];
  disconnectedSessionIds: readonly string[];
  disconnectIntervals: Readonly<Record<string, readonly DisconnectInterval[]>>;
}

export interface SessionStatus {
  id: string;
  clientId: string;
  state: ConnectionState;
  count: number;
  disconnects: number;
}

export interface ManagerStatus extends LedgerSnapshot {
  sessions: readonly SessionStatus[];
  allSubscribed: boolean;
}
