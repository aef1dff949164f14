"use strict";

import { logger } from "../utils/logger";
import { RandomSource, Scheduler, backoffDelay, pickInRange, realScheduler } from "../utils/scheduler";
import { Range } from "./config";
import { ErrorCode, SimulatorReconnectError, describeError } from "./errors";
import { SimulatorHooks } from "./hooks";
import { SubscriberSession } from "./SubscriberSession";
import { ConnectionState } from "./types";

export interface DisconnectPolicy {
  /** Sessions to perturb; empty means every session handed to `start`. */
  targetSessionIds: ReadonlySet<string>;
  /** Time a session stays subscribed before it is cut off. */
  dwellRangeMs: Range;
  /** Time a session stays disconnected before it reconnects. */
  disconnectDurationRangeMs: Range;
  cycleEnabled: boolean;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface DisconnectSimulatorOptions {
  random?: RandomSource;
  scheduler?: Scheduler;
  hooks?: SimulatorHooks;
}

/**
 * Drives independent disconnect/reconnect cycles, one loop per targeted
 * session, so sessions end up in different states at the same time.
 */
export class DisconnectSimulator {
  private readonly random: RandomSource;
  private readonly scheduler: Scheduler;
  private readonly hooks: SimulatorHooks;
  private controller: AbortController | null = null;
  private readonly loops = new Set<Promise<unknown>>();
  private readonly recovering = new Set<string>();
  private cycles = 0;

  constructor(
    private readonly policy: DisconnectPolicy,
    options: DisconnectSimulatorOptions = {},
  ) {
    this.random = options.random ?? Math.random;
    this.scheduler = options.scheduler ?? realScheduler;
    this.hooks = options.hooks ?? {};
  }

  get running(): boolean {
    return this.controller !== null && !this.controller.signal.aborted;
  }

  /** Disconnect cycles started so far, across all sessions. */
  get cycleCount(): number {
    return this.cycles;
  }

  start(sessions: readonly SubscriberSession[]): void {
    if (this.controller) {
      throw new Error("Disconnect simulator has already been started");
    }
    this.controller = new AbortController();
    if (!this.policy.cycleEnabled) {
      logger.info("[Simulator] disconnect simulation disabled");
      return;
    }

    const { targetSessionIds } = this.policy;
    const targets = targetSessionIds.size === 0 ? sessions : sessions.filter((s) => targetSessionIds.has(s.id));
    logger.info(`[Simulator] starting disconnect cycles for ${targets.map((s) => s.id).join(", ") || "no sessions"}`);
    for (const session of targets) {
      this.track(this.cycle(session, this.controller.signal));
    }
  }

  /**
   * Brings back a session that lost its connection outside a simulated
   * cycle. Ignored once stopped, or while that session is already being
   * recovered.
   */
  recover(session: SubscriberSession): void {
    const controller = this.controller;
    if (!controller || controller.signal.aborted || this.recovering.has(session.id)) return;
    this.recovering.add(session.id);
    this.track(
      this.reconnect(session, controller.signal).finally(() => {
        this.recovering.delete(session.id);
      }),
    );
  }

  /** Stops scheduling and waits for every loop to wind down. */
  async stop(): Promise<void> {
    if (!this.controller) {
      this.controller = new AbortController();
    }
    this.controller.abort();
    await Promise.all([...this.loops]);
  }

  private track(loop: Promise<unknown>): void {
    const guarded = loop.catch((err: unknown) => {
      logger.error("[Simulator] loop failed:", err);
    });
    this.loops.add(guarded);
    void guarded.finally(() => this.loops.delete(guarded));
  }

  private async cycle(session: SubscriberSession, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (session.state === ConnectionState.Subscribed) {
        await this.scheduler.sleep(pickInRange(this.random, this.policy.dwellRangeMs), signal);
        if (signal.aborted) break;
        if (session.state !== ConnectionState.Subscribed) continue;

        const outageMs = pickInRange(this.random, this.policy.disconnectDurationRangeMs);
        this.cycles++;
        logger.info(`[Simulator] disconnecting session ${session.id} for ${outageMs}ms`);
        await session.disconnect();
        this.hooks.onDisconnectCycle?.(session.id, outageMs);

        await this.scheduler.sleep(outageMs, signal);
        if (signal.aborted) break;
      } else if (this.recovering.has(session.id)) {
        // An interruption is being handled by recover(); wait for it.
        await this.scheduler.sleep(this.policy.backoffBaseMs, signal);
        continue;
      }
      await this.reconnect(session, signal);
    }
  }

  /** Retries until the session is subscribed again or the signal aborts. */
  private async reconnect(session: SubscriberSession, signal: AbortSignal): Promise<boolean> {
    for (let attempt = 1; !signal.aborted; attempt++) {
      try {
        if (session.state === ConnectionState.Disconnected) {
          await session.connect();
        }
        if (session.state === ConnectionState.Connected) {
          await session.subscribe();
        }
        if (session.state === ConnectionState.Subscribed) {
          if (attempt > 1) {
            logger.info(`[Simulator] session ${session.id} resubscribed after ${attempt} attempts`);
          }
          this.hooks.onReconnected?.(session.id, attempt);
          return true;
        }
      } catch (err) {
        const error = new SimulatorReconnectError(
          `Reconnect of session ${session.id} failed (attempt ${attempt}): ${describeError(err)}`,
          { code: ErrorCode.RECONNECT_FAILED, context: { sessionId: session.id, attempt }, cause: err },
        );
        logger.warn(`[Simulator] ${error.message}`);
        this.hooks.onReconnectFailed?.(session.id, attempt, error);
        // A subscribe refusal leaves the connection up; start the next attempt clean.
        if (session.state === ConnectionState.Connected) {
          await session.disconnect();
        }
      }
      await this.scheduler.sleep(
        backoffDelay(attempt, this.policy.backoffBaseMs, this.policy.backoffMaxMs),
        signal,
      );
    }
    return false;
  }
}
