"use strict";

import { logger } from "../utils/logger";
import { AccountingInvariantViolation, ErrorCode } from "./errors";
import { ConnectionState, DisconnectInterval, DuplicatePolicy, LedgerSnapshot } from "./types";

export type DeliveryClass = "first" | "redelivery" | "anomaly";

interface Delivery {
  sessionId: string;
  generation: number;
}

interface SessionRow {
  count: number;
  state: ConnectionState;
  intervals: DisconnectInterval[];
}

/**
 * Ledger of deliveries across every session of a run.
 *
 * Every mutation is a single synchronous method call, so no delivery
 * callback can observe the counters half-updated.
 */
export class MessageAccountant {
  private readonly rows = new Map<string, SessionRow>();
  private readonly seen = new Map<string, Delivery[]>();
  private readonly anomalies = new Set<string>();
  private total = 0;
  private redeliveries = 0;
  private anomalyCount = 0;

  constructor(
    private readonly policy: DuplicatePolicy = "reconnect-tolerant",
    private readonly now: () => number = Date.now,
  ) {}

  get duplicatePolicy(): DuplicatePolicy {
    return this.policy;
  }

  register(sessionId: string): void {
    if (this.rows.has(sessionId)) return;
    this.rows.set(sessionId, { count: 0, state: ConnectionState.Disconnected, intervals: [] });
  }

  /**
   * Counts one delivery. `generation` is the receiving session's connect
   * count, which tells a repeat inside one connection (anomaly) apart from
   * one that follows a reconnect (redelivery).
   */
  record(sessionId: string, messageId: string, generation = 0): DeliveryClass {
    const row = this.rows.get(sessionId);
    if (!row) {
      throw new Error(`Unknown session ${sessionId}`);
    }

    const previous = this.seen.get(messageId);
    let kind: DeliveryClass = "first";
    if (previous) {
      const sameConnection = previous.some((d) => d.sessionId === sessionId && d.generation === generation);
      kind = sameConnection || this.policy === "strict" ? "anomaly" : "redelivery";
      previous.push({ sessionId, generation });
    } else {
      this.seen.set(messageId, [{ sessionId, generation }]);
    }

    row.count++;
    this.total++;
    if (kind === "redelivery") {
      this.redeliveries++;
    } else if (kind === "anomaly") {
      this.anomalyCount++;
      this.anomalies.add(messageId);
      logger.warn(`[Accountant] duplicate delivery of ${messageId} to session ${sessionId} (generation ${generation})`);
    }
    return kind;
  }

  duplicateDetected(messageId: string): boolean {
    return this.anomalies.has(messageId);
  }

  /** Sessions that have received `messageId`, in delivery order. */
  deliveriesOf(messageId: string): string[] {
    return (this.seen.get(messageId) ?? []).map((d) => d.sessionId);
  }

  noteConnectionState(sessionId: string, state: ConnectionState, at: number = this.now()): void {
    const row = this.rows.get(sessionId);
    if (!row) return;
    const wasDown = row.state === ConnectionState.Disconnected || row.state === ConnectionState.Connecting;
    const isDown = state === ConnectionState.Disconnected || state === ConnectionState.Connecting;
    row.state = state;

    // An interval opens when a session that has been up goes down, and
    // closes once it is subscribed again.
    const open = row.intervals[row.intervals.length - 1];
    if (isDown && !wasDown) {
      row.intervals.push({ from: at });
    } else if (state === ConnectionState.Subscribed && open && open.to === undefined) {
      open.to = at;
    }
  }

  /** True when `at` falls inside a recorded outage of the session. */
  wasDisconnectedAt(sessionId: string, at: number): boolean {
    const row = this.rows.get(sessionId);
    if (!row) return false;
    return row.intervals.some((i) => i.from <= at && (i.to === undefined || at <= i.to));
  }

  /**
   * Snapshot of the ledger. Throws AccountingInvariantViolation when the
   * per-session counts no longer add up to the total.
   */
  report(): LedgerSnapshot {
    const snapshot = this.partialReport();
    const sum = Object.values(snapshot.perSessionCount).reduce((acc, count) => acc + count, 0);
    if (sum !== this.total) {
      const dump = { totalCount: this.total, sum, perSessionCount: { ...snapshot.perSessionCount } };
      logger.error("[Accountant] ledger invariant violated:", dump);
      throw new AccountingInvariantViolation(
        `Total count ${this.total} does not match the per-session sum ${sum}`,
        { code: ErrorCode.LEDGER_INVARIANT, context: dump },
      );
    }
    return snapshot;
  }

  /** Same as `report`, without the invariant check. */
  partialReport(): LedgerSnapshot {
    const perSessionCount: Record<string, number> = {};
    const disconnectIntervals: Record<string, readonly DisconnectInterval[]> = {};
    const connectedSessionIds: string[] = [];
    const disconnectedSessionIds: string[] = [];

    for (const [id, row] of this.rows) {
      perSessionCount[id] = row.count;
      disconnectIntervals[id] = Object.freeze(row.intervals.map((i) => Object.freeze({ ...i })));
      if (row.state === ConnectionState.Connected || row.state === ConnectionState.Subscribed) {
        connectedSessionIds.push(id);
      } else {
        disconnectedSessionIds.push(id);
      }
    }

    return Object.freeze({
      perSessionCount: Object.freeze(perSessionCount),
      totalCount: this.total,
      uniqueMessageCount: this.seen.size,
      redeliveryCount: this.redeliveries,
      anomalyCount: this.anomalyCount,
      connectedSessionIds: Object.freeze(connectedSessionIds),
      disconnectedSessionIds: Object.freeze(disconnectedSessionIds),
      disconnectIntervals: Object.freeze(disconnectIntervals),
    });
  }
}
