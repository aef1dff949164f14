"use strict";

import * as path from "path";
import { ConfigError, ErrorCode } from "./errors";
import { DuplicatePolicy } from "./types";

export type BrokerProtocol = "mqtt" | "mqtts";

export type Range = readonly [min: number, max: number];

export interface BrokerConfig {
  endpoint: string;
  port: number;
  protocol: BrokerProtocol;
  rootCaPath: string;
  certPath: string;
  privateKeyPath: string;
  keepAliveSecs: number;
  connectTimeoutMs: number;
}

export interface SimulationConfig {
  enabled: boolean;
  /** Session ids to perturb; empty means every session. */
  targetSessionIds: string[];
  dwellRangeMs: Range;
  disconnectDurationRangeMs: Range;
  backoffBaseMs: number;
  backoffMaxMs: number;
  seed?: number;
}

export interface PublisherConfig {
  intervalMs: number;
  maxMessages: number;
}

export interface QueueCheckConfig {
  broker: BrokerConfig;
  clientIdPrefix: string;
  topicPrefix: string;
  sharedGroup: string;
  numSubscribers: number;
  startupTimeoutMs: number;
  shutdownGraceMs: number;
  reportIntervalMs: number;
  duplicatePolicy: DuplicatePolicy;
  simulation: SimulationConfig;
  publisher: PublisherConfig;
}

export type Env = Record<string, string | undefined>;

const DEFAULT_CERTS_DIR = "certs";

export function getSharedTopic(config: Pick<QueueCheckConfig, "sharedGroup" | "topicPrefix">): string {
  return `$share/${config.sharedGroup}/${getPublishTopic(config)}`;
}

export function getPublishTopic(config: Pick<QueueCheckConfig, "topicPrefix">): string {
  return `${config.topicPrefix}/messages`;
}

/** Session ids are 1-based ordinals padded to two digits: "01", "02", ... */
export function sessionIdFor(index: number): string {
  return String(index + 1).padStart(2, "0");
}

export function subscriberClientId(prefix: string, sessionId: string): string {
  return `${prefix}-subscriber-${sessionId}`;
}

export function publisherClientId(prefix: string): string {
  return `${prefix}-publisher`;
}

function getString(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined || value === "" ? defaultValue : value;
}

function getNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === "") return defaultValue;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Invalid value for ${key}: ${value}`, {
      code: ErrorCode.CONFIG_INVALID,
      context: { key, value },
    });
  }
  return parsed;
}

function getBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === "") return defaultValue;
  switch (value.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigError(`Invalid boolean for ${key}: ${value}`, {
        code: ErrorCode.CONFIG_INVALID,
        context: { key, value },
      });
  }
}

function getProtocol(env: Env): BrokerProtocol {
  const value = getString(env, "MQTT_PROTOCOL", "mqtts");
  if (value !== "mqtt" && value !== "mqtts") {
    throw new ConfigError(`MQTT_PROTOCOL must be mqtt or mqtts, got ${value}`, {
      code: ErrorCode.CONFIG_INVALID,
      context: { key: "MQTT_PROTOCOL", value },
    });
  }
  return value;
}

function getDuplicatePolicy(env: Env): DuplicatePolicy {
  const value = getString(env, "DUPLICATE_POLICY", "reconnect-tolerant");
  if (value !== "reconnect-tolerant" && value !== "strict") {
    throw new ConfigError(`DUPLICATE_POLICY must be reconnect-tolerant or strict, got ${value}`, {
      code: ErrorCode.CONFIG_INVALID,
      context: { key: "DUPLICATE_POLICY", value },
    });
  }
  return value;
}

function getList(env: Env, key: string): string[] {
  return getString(env, key, "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Reads the run configuration from environment variables. `.env` files are
 * loaded by the CLI before this is called.
 */
export function loadConfig(env: Env = process.env): QueueCheckConfig {
  const seed = env.SIMULATION_SEED;
  return {
    broker: {
      endpoint: getString(env, "MQTT_ENDPOINT", "localhost"),
      port: getNumber(env, "MQTT_PORT", 8883),
      protocol: getProtocol(env),
      rootCaPath: getString(env, "ROOT_CA_PATH", path.join(DEFAULT_CERTS_DIR, "AmazonRootCA1.pem")),
      certPath: getString(env, "CERT_PATH", path.join(DEFAULT_CERTS_DIR, "device.pem.crt")),
      privateKeyPath: getString(env, "PRIVATE_KEY_PATH", path.join(DEFAULT_CERTS_DIR, "private.pem.key")),
      keepAliveSecs: getNumber(env, "KEEP_ALIVE_SECS", 30),
      connectTimeoutMs: getNumber(env, "CONNECT_TIMEOUT_MS", 10000),
    },
    clientIdPrefix: getString(env, "CLIENT_ID_PREFIX", "message-queuing-test"),
    topicPrefix: getString(env, "TOPIC_PREFIX", "test/shared"),
    sharedGroup: getString(env, "SHARED_GROUP", "message-queuing-group"),
    numSubscribers: getNumber(env, "NUM_SUBSCRIBERS", 3),
    startupTimeoutMs: getNumber(env, "STARTUP_TIMEOUT_MS", 30000),
    shutdownGraceMs: getNumber(env, "SHUTDOWN_GRACE_MS", 5000),
    reportIntervalMs: getNumber(env, "REPORT_INTERVAL_MS", 10000),
    duplicatePolicy: getDuplicatePolicy(env),
    simulation: {
      enabled: getBoolean(env, "SIMULATE_DISCONNECTS", true),
      targetSessionIds: getList(env, "DISCONNECT_TARGETS"),
      dwellRangeMs: [getNumber(env, "DWELL_MIN_MS", 5000), getNumber(env, "DWELL_MAX_MS", 15000)],
      disconnectDurationRangeMs: [getNumber(env, "OUTAGE_MIN_MS", 8000), getNumber(env, "OUTAGE_MAX_MS", 20000)],
      backoffBaseMs: getNumber(env, "RECONNECT_BACKOFF_BASE_MS", 1000),
      backoffMaxMs: getNumber(env, "RECONNECT_BACKOFF_MAX_MS", 30000),
      seed: seed === undefined || seed === "" ? undefined : getNumber(env, "SIMULATION_SEED", 0),
    },
    publisher: {
      intervalMs: getNumber(env, "PUBLISH_INTERVAL_MS", 1000),
      maxMessages: getNumber(env, "PUBLISH_COUNT", 20),
    },
  };
}
