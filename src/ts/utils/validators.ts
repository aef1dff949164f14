"use strict";

import * as fs from "fs";
import { getPublishTopic, getSharedTopic, QueueCheckConfig, Range, sessionIdFor } from "../api/config";
import { ConfigError, ErrorCode } from "../api/errors";
import { logger } from "./logger";

export interface SharedFilter {
  group: string;
  topicFilter: string;
}

/** Splits `$share/{group}/{topicFilter}`; returns null when the syntax is wrong. */
export function parseSharedFilter(filter: string): SharedFilter | null {
  const match = /^\$share\/([^/#+]+)\/(.+)$/.exec(filter);
  if (!match) return null;
  const [, group, topicFilter] = match;
  if (!isValidTopicFilter(topicFilter)) return null;
  return { group, topicFilter };
}

export function isValidTopicFilter(filter: string): boolean {
  if (filter.length === 0) return false;
  const levels = filter.split("/");
  return levels.every((level, index) => {
    if (level === "#") return index === levels.length - 1;
    if (level === "+") return true;
    return !level.includes("#") && !level.includes("+");
  });
}

export function isValidTopicName(topic: string): boolean {
  return topic.length > 0 && !topic.includes("#") && !topic.includes("+") && !topic.startsWith("$");
}

function invalid(message: string, context: Record<string, unknown>): ConfigError {
  logger.error(`Invalid configuration: ${message}`);
  return new ConfigError(message, { code: ErrorCode.CONFIG_INVALID, context });
}

function validateRange(name: string, range: Range): void {
  const [min, max] = range;
  if (min < 0 || max < 0) {
    throw invalid(`${name} must not be negative`, { name, min, max });
  }
  if (min > max) {
    throw invalid(`${name} minimum ${min} exceeds maximum ${max}`, { name, min, max });
  }
}

export function validateConfig(config: QueueCheckConfig): void {
  if (!config || typeof config !== "object") {
    throw invalid("configuration must be an object", {});
  }

  const { broker } = config;
  if (!broker.endpoint) {
    throw invalid("broker endpoint is required", {});
  }
  if (!Number.isInteger(broker.port) || broker.port < 1 || broker.port > 65535) {
    throw invalid(`port ${broker.port} must be between 1 and 65535`, { port: broker.port });
  }
  if (broker.connectTimeoutMs <= 0) {
    throw invalid("connect timeout must be positive", { connectTimeoutMs: broker.connectTimeoutMs });
  }
  if (broker.keepAliveSecs < 0) {
    throw invalid("keep-alive must not be negative", { keepAliveSecs: broker.keepAliveSecs });
  }

  if (!config.clientIdPrefix) {
    throw invalid("client id prefix is required", {});
  }
  if (!isValidTopicName(getPublishTopic(config))) {
    throw invalid(`topic prefix "${config.topicPrefix}" is not a valid topic`, { topicPrefix: config.topicPrefix });
  }
  const shared = parseSharedFilter(getSharedTopic(config));
  if (!shared || shared.group !== config.sharedGroup) {
    throw invalid(`shared group "${config.sharedGroup}" must be a single topic level`, { sharedGroup: config.sharedGroup });
  }

  if (!Number.isInteger(config.numSubscribers) || config.numSubscribers < 1 || config.numSubscribers > 99) {
    throw invalid(`number of subscribers ${config.numSubscribers} must be between 1 and 99`, {
      numSubscribers: config.numSubscribers,
    });
  }
  if (config.startupTimeoutMs <= 0) {
    throw invalid("startup timeout must be positive", { startupTimeoutMs: config.startupTimeoutMs });
  }
  if (config.shutdownGraceMs < 0) {
    throw invalid("shutdown grace period must not be negative", { shutdownGraceMs: config.shutdownGraceMs });
  }
  if (config.reportIntervalMs < 0) {
    throw invalid("report interval must not be negative", { reportIntervalMs: config.reportIntervalMs });
  }

  const { simulation } = config;
  validateRange("dwell range", simulation.dwellRangeMs);
  validateRange("disconnect duration range", simulation.disconnectDurationRangeMs);
  if (simulation.backoffBaseMs <= 0 || simulation.backoffMaxMs < simulation.backoffBaseMs) {
    throw invalid("reconnect backoff must be positive with max >= base", {
      backoffBaseMs: simulation.backoffBaseMs,
      backoffMaxMs: simulation.backoffMaxMs,
    });
  }
  if (new Set(simulation.targetSessionIds).size !== simulation.targetSessionIds.length) {
    throw invalid("disconnect targets contain duplicates", { targetSessionIds: simulation.targetSessionIds });
  }
  const knownIds = new Set(Array.from({ length: config.numSubscribers }, (_, i) => sessionIdFor(i)));
  const unknown = simulation.targetSessionIds.filter((id) => !knownIds.has(id));
  if (unknown.length > 0) {
    throw invalid(`disconnect targets ${unknown.join(", ")} do not name a session`, { unknown });
  }

  if (config.publisher.intervalMs < 0 || config.publisher.maxMessages < 0) {
    throw invalid("publisher interval and count must not be negative", { ...config.publisher });
  }
}

export function verifyCertificateFiles(
  config: QueueCheckConfig,
  exists: (file: string) => boolean = fs.existsSync,
): void {
  if (config.broker.protocol !== "mqtts") return;
  const { rootCaPath, certPath, privateKeyPath } = config.broker;
  for (const file of [rootCaPath, certPath, privateKeyPath]) {
    if (!exists(file)) {
      logger.error(`Certificate file not found: ${file}`);
      throw new ConfigError(`Certificate file not found: ${file}`, {
        code: ErrorCode.CONFIG_MISSING_FILE,
        context: { file },
      });
    }
  }
}
