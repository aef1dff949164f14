"use strict";

export enum ErrorCode {
  CONFIG_INVALID = "CONFIG_INVALID",
  CONFIG_MISSING_FILE = "CONFIG_MISSING_FILE",
  INVALID_STATE = "INVALID_STATE",
  CONNECT_FAILED = "CONNECT_FAILED",
  CONNECT_ABORTED = "CONNECT_ABORTED",
  FILTER_MISMATCH = "FILTER_MISMATCH",
  SUBSCRIBE_REJECTED = "SUBSCRIBE_REJECTED",
  SUBSCRIBE_FAILED = "SUBSCRIBE_FAILED",
  STARTUP_FAILED = "STARTUP_FAILED",
  STARTUP_TIMEOUT = "STARTUP_TIMEOUT",
  LEDGER_INVARIANT = "LEDGER_INVARIANT",
  RECONNECT_FAILED = "RECONNECT_FAILED",
  PUBLISH_FAILED = "PUBLISH_FAILED",
  NOT_CONNECTED = "NOT_CONNECTED"
}

export interface QueueCheckErrorOptions {
  code: ErrorCode;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class QueueCheckError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown>;

  constructor(message: string, options: QueueCheckErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.context = options.context ?? {};
  }
}

export class ConfigError extends QueueCheckError {}

export class ConnectError extends QueueCheckError {}

export class SubscribeError extends QueueCheckError {}

export class PublishError extends QueueCheckError {}

export class StartupError extends QueueCheckError {
  get failedSessionIds(): string[] {
    const ids = this.context.failedSessionIds;
    return Array.isArray(ids) ? ids.filter((id): id is string => typeof id === "string") : [];
  }
}

/** The ledger no longer adds up; carries a dump of its contents. */
export class AccountingInvariantViolation extends QueueCheckError {}

export class SimulatorReconnectError extends QueueCheckError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
