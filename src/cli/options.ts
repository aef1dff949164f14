"use strict";

import { InvalidArgumentError } from "commander";
import * as dotenv from "dotenv";
import { loadConfig, QueueCheckConfig } from "../ts/api/config";
import { isLogLevel, setLogLevel } from "../ts/utils/logger";

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

/** Loads `.env`, applies LOG_LEVEL, and reads the run configuration. */
export function loadEnvironment(): QueueCheckConfig {
  dotenv.config();
  const level = process.env.LOG_LEVEL;
  if (level && isLogLevel(level)) {
    setLogLevel(level);
  }
  return loadConfig();
}
