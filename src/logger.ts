/**
 * Process-wide structured logger.
 *
 * JSON lines on stdout via winston. Silent under NODE_ENV=test so test output
 * stays readable; set LOG_LEVEL to change verbosity.
 */

import winston from "winston";

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  defaultMeta: { service: "dockgate" },
  transports: [new winston.transports.Console({ silent: process.env.NODE_ENV === "test" })],
});

/** Render an unknown thrown value as a single-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
