"use strict";

import { createMqttTransport, TransportFactory } from "../transport/bridge";
import { logger } from "../utils/logger";
import { formatReport } from "../utils/report";
import { createSeededRandom, RandomSource, realScheduler, Scheduler, withTimeout } from "../utils/scheduler";
import { validateConfig } from "../utils/validators";
import { getSharedTopic, QueueCheckConfig, sessionIdFor, subscriberClientId } from "./config";
import { DisconnectSimulator } from "./DisconnectSimulator";
import { AccountingInvariantViolation, ErrorCode, QueueCheckError, StartupError, describeError } from "./errors";
import { ManagerHooks } from "./hooks";
import { MessageAccountant } from "./MessageAccountant";
import { SubscriberSession } from "./SubscriberSession";
import { ConnectionState, LedgerSnapshot, ManagerStatus, SessionStatus } from "./types";

export interface SubscriberSessionManagerOptions {
  transportFactory?: TransportFactory;
  scheduler?: Scheduler;
  /** Overrides the simulation seed from the config. */
  random?: RandomSource;
  hooks?: ManagerHooks;
}

export class SubscriberSessionManager {
  private readonly transportFactory: TransportFactory;
  private readonly scheduler: Scheduler;
  private readonly hooks: ManagerHooks;
  private readonly random?: RandomSource;
  private pool: SubscriberSession[] = [];
  private accountant = new MessageAccountant();
  private simulator: DisconnectSimulator | null = null;
  private reporter: NodeJS.Timeout | null = null;
  private config: QueueCheckConfig | null = null;
  private isRunning = false;
  private isStarting = false;
  private shutdownPromise: Promise<void> | null = null;
  private fatalError: QueueCheckError | null = null;

  constructor(options: SubscriberSessionManagerOptions = {}) {
    this.transportFactory = options.transportFactory ?? createMqttTransport;
    this.scheduler = options.scheduler ?? realScheduler;
    this.hooks = options.hooks ?? {};
    this.random = options.random;
  }

  get running(): boolean {
    return this.isRunning;
  }

  get sessions(): readonly SubscriberSession[] {
    return this.pool;
  }

  getSession(id: string): SubscriberSession | undefined {
    return this.pool.find((session) => session.id === id);
  }

  /**
   * Connects and subscribes every session. Rejects with StartupError if any
   * session is not subscribed within the startup timeout; the disconnect
   * simulator is only started once all of them are.
   */
  async start(config: QueueCheckConfig): Promise<void> {
    if (this.isRunning || this.isStarting) {
      logger.warn("[Manager] start requested, but the manager is already running");
      throw new Error("Manager is already running");
    }
    if (this.shutdownPromise) {
      throw new Error("Manager has been shut down");
    }
    validateConfig(config);

    this.isStarting = true;
    this.config = config;
    this.accountant = new MessageAccountant(config.duplicatePolicy, () => this.scheduler.now());
    this.pool = Array.from({ length: config.numSubscribers }, (_, i) => this.createSession(config, sessionIdFor(i)));

    logger.info(`[Manager] starting ${this.pool.length} subscribers...`);
    try {
      await this.bringUpAll(config);
    } finally {
      this.isStarting = false;
    }

    this.isRunning = true;
    logger.info(`[Manager] ${this.pool.length}/${this.pool.length} subscribers subscribed to ${getSharedTopic(config)}`);

    const { simulation } = config;
    this.simulator = new DisconnectSimulator(
      {
        targetSessionIds: new Set(simulation.targetSessionIds),
        dwellRangeMs: simulation.dwellRangeMs,
        disconnectDurationRangeMs: simulation.disconnectDurationRangeMs,
        cycleEnabled: simulation.enabled,
        backoffBaseMs: simulation.backoffBaseMs,
        backoffMaxMs: simulation.backoffMaxMs,
      },
      {
        random: this.random ?? (simulation.seed === undefined ? Math.random : createSeededRandom(simulation.seed)),
        scheduler: this.scheduler,
        hooks: this.hooks,
      },
    );
    this.simulator.start(this.pool);

    if (config.reportIntervalMs > 0) {
      this.reporter = setInterval(() => this.emitReport(false), config.reportIntervalMs);
    }
  }

  status(): ManagerStatus {
    return this.buildStatus(this.accountant.report());
  }

  private buildStatus(ledger: LedgerSnapshot): ManagerStatus {
    const sessions: SessionStatus[] = this.pool.map((session) => ({
      id: session.id,
      clientId: session.clientId,
      state: session.state,
      count: ledger.perSessionCount[session.id] ?? 0,
      disconnects: session.disconnects,
    }));
    return Object.freeze({
      ...ledger,
      sessions: Object.freeze(sessions),
      allSubscribed: sessions.length > 0 && sessions.every((s) => s.state === ConnectionState.Subscribed),
    });
  }

  duplicateDetected(messageId: string): boolean {
    return this.accountant.duplicateDetected(messageId);
  }

  /**
   * Stops the simulator, disconnects every session and emits the final
   * report. Repeated calls share the first call's work.
   */
  shutdown(): Promise<void> {
    if (this.shutdownPromise) return this.shutdownPromise;
    if (!this.isRunning) {
      logger.warn("[Manager] shutdown requested, but the manager is not running");
      return Promise.resolve();
    }
    this.shutdownPromise = this.performShutdown();
    return this.shutdownPromise;
  }

  private createSession(config: QueueCheckConfig, id: string): SubscriberSession {
    const { broker } = config;
    const transport = this.transportFactory({
      clientId: subscriberClientId(config.clientIdPrefix, id),
      host: broker.endpoint,
      port: broker.port,
      protocol: broker.protocol,
      clean: false,
      keepAliveSecs: broker.keepAliveSecs,
      connectTimeoutMs: broker.connectTimeoutMs,
      caPath: broker.rootCaPath,
      certPath: broker.certPath,
      keyPath: broker.privateKeyPath,
    });
    const session = new SubscriberSession({
      id,
      transport,
      subscriptionFilter: getSharedTopic(config),
      now: () => this.scheduler.now(),
    });
    this.accountant.register(id);

    session.onMessage((message) => {
      const kind = this.accountant.record(message.sessionId, message.messageId, message.generation);
      this.hooks.onMessage?.(message, kind);
    });
    session.onStateChange((from, to) => {
      const at = this.scheduler.now();
      this.accountant.noteConnectionState(id, to, at);
      this.hooks.onSessionStateChange?.({ sessionId: id, clientId: session.clientId, from, to, at });
    });
    session.onInterrupted(() => {
      if (this.isRunning && !this.shutdownPromise) {
        this.simulator?.recover(session);
      }
    });
    return session;
  }

  private async bringUpAll(config: QueueCheckConfig): Promise<void> {
    const attempts = Promise.allSettled(
      this.pool.map(async (session) => {
        await session.connect();
        await session.subscribe();
      }),
    );

    let results: PromiseSettledResult<void>[];
    try {
      results = await withTimeout(attempts, config.startupTimeoutMs, () =>
        new StartupError(`Not every subscriber was subscribed within ${config.startupTimeoutMs}ms`, {
          code: ErrorCode.STARTUP_TIMEOUT,
          context: {
            failedSessionIds: this.pool.filter((s) => s.state !== ConnectionState.Subscribed).map((s) => s.id),
          },
        }),
      );
    } catch (err) {
      logger.error(`[Manager] ${describeError(err)}`);
      for (const session of this.pool) {
        session.abandon();
      }
      throw err;
    }

    // A session can be dropped by the broker after it subscribed while the
    // others are still coming up; it counts as failed too.
    const failed = this.pool
      .map((session, i) => ({ session, result: results[i] }))
      .filter(({ session, result }) => result.status === "rejected" || session.state !== ConnectionState.Subscribed);
    if (failed.length === 0) return;

    const failedSessionIds = failed.map((f) => f.session.id);
    const reasons: unknown[] = [];
    const causes = failed.map(({ session, result }) => {
      if (result.status === "rejected") {
        reasons.push(result.reason);
        return describeError(result.reason);
      }
      return `session ${session.id} lost its connection during startup`;
    });
    logger.error(`[Manager] ${failedSessionIds.length}/${this.pool.length} subscribers failed to start`);
    await Promise.all(this.pool.map((session) => session.disconnect()));
    throw new StartupError(`Subscribers ${failedSessionIds.join(", ")} failed to start`, {
      code: ErrorCode.STARTUP_FAILED,
      context: { failedSessionIds, causes },
      cause: reasons[0],
    });
  }

  private async performShutdown(): Promise<void> {
    logger.info("[Manager] stopping all subscribers...");
    if (this.reporter) {
      clearInterval(this.reporter);
      this.reporter = null;
    }
    const graceMs = this.config?.shutdownGraceMs ?? 0;

    if (this.simulator && !(await this.withinGrace(this.simulator.stop(), graceMs))) {
      logger.warn(`[Manager] simulator did not stop within ${graceMs}ms`);
    }

    await Promise.all(
      this.pool.map(async (session) => {
        if (!(await this.withinGrace(session.disconnect(), graceMs))) {
          logger.warn(`[Manager] session ${session.id} did not disconnect within ${graceMs}ms; abandoning it`);
          session.abandon();
        }
      }),
    );

    this.isRunning = false;
    this.emitReport(true);
  }

  private async withinGrace(work: Promise<void>, graceMs: number): Promise<boolean> {
    try {
      await withTimeout(work, graceMs, () => new Error("grace period elapsed"));
      return true;
    } catch {
      return false;
    }
  }

  private emitReport(final: boolean): void {
    let status: ManagerStatus;
    let partial = false;
    try {
      status = this.status();
    } catch (err) {
      if (!(err instanceof AccountingInvariantViolation)) throw err;
      this.fail(err);
      if (!final) return;
      status = this.buildStatus(this.accountant.partialReport());
      partial = true;
    }
    const heading = partial ? "Final report (partial, ledger inconsistent)\n" : final ? "Final report\n" : "\n";
    logger.info(`${heading}${formatReport(status)}`);
    if (status.disconnectedSessionIds.length > 0 && !final) {
      logger.info("Queued messages are delivered when the disconnected subscribers reconnect");
    }
    this.hooks.onReport?.(status, final);
  }

  /** Reports the first fatal error and shuts down; later ones are only logged. */
  private fail(error: QueueCheckError): void {
    if (this.fatalError) {
      logger.warn(`[Manager] ${error.message}`);
      return;
    }
    this.fatalError = error;
    logger.error(`[Manager] fatal: ${error.message}`);
    this.hooks.onFatalError?.(error);
    if (this.isRunning) {
      this.shutdown().catch((err: unknown) => {
        logger.error("[Manager] shutdown after fatal error failed:", err);
      });
    }
  }
}
