"use strict";

// Barrel exports for the public API

// Core classes
export { SubscriberSessionManager } from "./ts/api/SubscriberSessionManager";
export { SubscriberSession } from "./ts/api/SubscriberSession";
export { DisconnectSimulator } from "./ts/api/DisconnectSimulator";
export { MessageAccountant } from "./ts/api/MessageAccountant";
export { MessagePublisher } from "./ts/api/MessagePublisher";
export type { SubscriberSessionManagerOptions } from "./ts/api/SubscriberSessionManager";
export type { SubscriberSessionOptions } from "./ts/api/SubscriberSession";
export type { DisconnectPolicy, DisconnectSimulatorOptions } from "./ts/api/DisconnectSimulator";
export type { DeliveryClass } from "./ts/api/MessageAccountant";
export type { MessagePublisherOptions, ContinuousPublishOptions, PublishSummary } from "./ts/api/MessagePublisher";

// Config
export {
  loadConfig,
  getSharedTopic,
  getPublishTopic,
  sessionIdFor,
  subscriberClientId,
  publisherClientId,
} from "./ts/api/config";
export type {
  QueueCheckConfig,
  BrokerConfig,
  BrokerProtocol,
  SimulationConfig,
  PublisherConfig,
  Range,
  Env,
} from "./ts/api/config";
export { validateConfig, verifyCertificateFiles, parseSharedFilter } from "./ts/utils/validators";

// Hooks
export type { ManagerHooks, SimulatorHooks, SessionStateChange } from "./ts/api/hooks";

// Errors
export {
  ErrorCode,
  QueueCheckError,
  ConfigError,
  ConnectError,
  SubscribeError,
  PublishError,
  StartupError,
  AccountingInvariantViolation,
  SimulatorReconnectError,
} from "./ts/api/errors";

// Transport
export { createMqttTransport, buildClientOptions } from "./ts/transport/bridge";
export type { MqttTransport, TransportFactory, TransportOptions, InboundPublish } from "./ts/transport/bridge";

// Utilities
export { formatReport } from "./ts/utils/report";
export { logger, setLogLevel, getLogLevel } from "./ts/utils/logger";
export type { LogLevel } from "./ts/utils/logger";
export { createSeededRandom, realScheduler } from "./ts/utils/scheduler";
export type { RandomSource, Scheduler } from "./ts/utils/scheduler";

// Public data types
export { QoS, ConnectionState } from "./ts/api/types";
export type {
  ConnectAck,
  PublishAck,
  InboundMessage,
  MessageHandler,
  TestMessage,
  DuplicatePolicy,
  LedgerSnapshot,
  ManagerStatus,
  SessionStatus,
  DisconnectInterval,
} from "./ts/api/types";

// Default export for CommonJS consumers
import { SubscriberSessionManager as _ManagerDefault } from "./ts/api/SubscriberSessionManager";
export default _ManagerDefault;
