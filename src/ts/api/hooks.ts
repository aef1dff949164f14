"use strict";

import { QueueCheckError, SimulatorReconnectError } from "./errors";
import { DeliveryClass } from "./MessageAccountant";
import { ConnectionState, InboundMessage, ManagerStatus } from "./types";

export interface SessionStateChange {
  sessionId: string;
  clientId: string;
  from: ConnectionState;
  to: ConnectionState;
  at: number;
}

export interface SimulatorHooks {
  onDisconnectCycle?: (sessionId: string, outageMs: number) => void;
  onReconnected?: (sessionId: string, attempts: number) => void;
  onReconnectFailed?: (sessionId: string, attempt: number, error: SimulatorReconnectError) => void;
}

export interface ManagerHooks extends SimulatorHooks {
  onSessionStateChange?: (change: SessionStateChange) => void;
  onMessage?: (message: InboundMessage, kind: DeliveryClass) => void;
  onReport?: (status: ManagerStatus, final: boolean) => void;
  // Fatal errors raised while running (not from start(), which rejects instead)
  onFatalError?: (error: QueueCheckError) => void;
}
