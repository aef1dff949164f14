"use strict";

import { TestMessage } from "../api/types";

export interface MessageIdentity {
  messageId: string;
  sequence?: number;
}

export function createTestMessage(messageId: string, sender: string, sequence: number, now: Date = new Date()): TestMessage {
  return {
    message_id: messageId,
    timestamp: now.toISOString(),
    sender,
    data: { temperature: 25.5, humidity: 60.0, status: "normal" },
    sequence,
  };
}

export function encodeTestMessage(message: TestMessage): Buffer {
  return Buffer.from(JSON.stringify(message), "utf8");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pulls the message id (and sequence, when present) out of a JSON payload.
 * Returns null for payloads that are not JSON objects with a string or
 * numeric `message_id`.
 */
export function extractMessageIdentity(payload: Buffer): MessageIdentity | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString("utf8"));
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const id = parsed.message_id;
  if (typeof id !== "string" && typeof id !== "number") return null;
  const messageId = String(id);
  if (messageId.length === 0) return null;

  const sequence = typeof parsed.sequence === "number" ? parsed.sequence : undefined;
  return { messageId, sequence };
}
