"use strict";

import { Command } from "commander";
import { describeError } from "../../ts/api/errors";
import { MessagePublisher } from "../../ts/api/MessagePublisher";
import { logger } from "../../ts/utils/logger";
import { validateConfig, verifyCertificateFiles } from "../../ts/utils/validators";
import { loadEnvironment, parseInteger } from "../options";

interface PublishOptions {
  count?: number;
  interval?: number;
}

async function runPublisher(options: PublishOptions): Promise<void> {
  const config = loadEnvironment();
  validateConfig(config);
  verifyCertificateFiles(config);

  const publisher = new MessagePublisher(config);
  const controller = new AbortController();
  const stop = () => {
    logger.info("[Publisher] interrupted");
    controller.abort();
  };
  process.once("SIGINT", stop);

  try {
    await publisher.connect();
    logger.info("=== Message queuing check: publishing ===");
    const summary = await publisher.startContinuousPublishing({
      intervalMs: options.interval,
      maxMessages: options.count,
      signal: controller.signal,
    });
    logger.info(`Sent ${summary.sent} messages; check the subscriber report for deliveries`);
    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    process.removeListener("SIGINT", stop);
    await publisher.disconnect();
  }
}

export function createPublishCommand(): Command {
  const command = new Command("publish");

  command
    .description("Publish QoS 1 test messages to the shared topic")
    .option("-c, --count <count>", "number of messages to publish", parseInteger)
    .option("-i, --interval <ms>", "delay between messages in milliseconds", parseInteger)
    .action(async (options: PublishOptions) => {
      try {
        await runPublisher(options);
      } catch (err) {
        logger.error(`[Publisher] ${describeError(err)}`);
        process.exitCode = 1;
      }
    });

  return command;
}
