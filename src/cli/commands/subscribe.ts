"use strict";

import { Command, Option } from "commander";
import { QueueCheckConfig } from "../../ts/api/config";
import { StartupError, describeError } from "../../ts/api/errors";
import { SubscriberSessionManager } from "../../ts/api/SubscriberSessionManager";
import { DuplicatePolicy } from "../../ts/api/types";
import { logger } from "../../ts/utils/logger";
import { formatReport } from "../../ts/utils/report";
import { validateConfig, verifyCertificateFiles } from "../../ts/utils/validators";
import { loadEnvironment, parseInteger } from "../options";

export interface SubscribeOptions {
  subscribers?: number;
  simulate: boolean;
  seed?: number;
  duplicatePolicy?: DuplicatePolicy;
}

export function applySubscribeOptions(config: QueueCheckConfig, options: SubscribeOptions): QueueCheckConfig {
  return {
    ...config,
    numSubscribers: options.subscribers ?? config.numSubscribers,
    duplicatePolicy: options.duplicatePolicy ?? config.duplicatePolicy,
    simulation: {
      ...config.simulation,
      enabled: config.simulation.enabled && options.simulate,
      seed: options.seed ?? config.simulation.seed,
    },
  };
}

async function runSubscribers(options: SubscribeOptions): Promise<void> {
  const config = applySubscribeOptions(loadEnvironment(), options);
  validateConfig(config);
  verifyCertificateFiles(config);

  let exitCode = 0;
  const manager = new SubscriberSessionManager({
    hooks: {
      onFatalError: () => {
        exitCode = 1;
        process.exitCode = 1;
      },
    },
  });

  const stop = () => {
    logger.info("[Main] interrupt received");
    manager
      .shutdown()
      .then(() => process.exit(exitCode))
      .catch((err: unknown) => {
        logger.error("[Main] shutdown failed:", err);
        process.exit(1);
      });
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  try {
    await manager.start(config);
  } catch (err) {
    process.removeListener("SIGINT", stop);
    process.removeListener("SIGTERM", stop);
    if (err instanceof StartupError) {
      logger.error(`[Main] startup failed: ${err.message}`);
      logger.info(`Partial report\n${formatReport(manager.status())}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  logger.info("=== Message queuing check running === (Ctrl+C to stop)");
  logger.info("Start the publisher in another terminal: mqtt-queue-check publish");
}

export function createSubscribeCommand(): Command {
  const command = new Command("subscribe");

  command
    .description("Run shared-subscription subscribers and simulate disconnects")
    .option("-n, --subscribers <count>", "number of subscriber sessions", parseInteger)
    .option("--no-simulate", "keep every subscriber connected")
    .option("--seed <seed>", "seed for the disconnect schedule", parseInteger)
    .addOption(
      new Option("--duplicate-policy <policy>", "how repeated deliveries are classified").choices([
        "reconnect-tolerant",
        "strict",
      ]),
    )
    .action(async (options: SubscribeOptions) => {
      try {
        await runSubscribers(options);
      } catch (err) {
        logger.error(`[Main] ${describeError(err)}`);
        process.exitCode = 1;
      }
    });

  return command;
}
