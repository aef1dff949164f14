#!/usr/bin/env node
"use strict";

import { Command } from "commander";
import { createPublishCommand } from "./commands/publish";
import { createSubscribeCommand } from "./commands/subscribe";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("mqtt-queue-check")
    .description("Check message queuing for shared MQTT subscriptions across disconnects")
    .version("0.1.0");

  program.addCommand(createSubscribeCommand());
  program.addCommand(createPublishCommand());

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
