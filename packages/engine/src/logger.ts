/**
 * Diagnostics logger.
 *
 * Uses pino for JSON-structured logs on stderr, so that stdout carries
 * nothing but the account report.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

const STDERR = 2;

/**
 * Create the run logger.
 *
 * In development the pino-pretty transport renders human-readable lines,
 * still on stderr. An explicit destination overrides both modes.
 */
export function createLogger(
  config: AppConfig,
  destination?: DestinationStream,
): Logger {
  if (destination !== undefined) {
    return pino({ level: config.LOG_LEVEL }, destination);
  }

  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR } },
    });
  }

  return pino({ level: config.LOG_LEVEL }, pino.destination(STDERR));
}
