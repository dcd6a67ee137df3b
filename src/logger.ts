/**
 * Process-wide winston logger.
 *
 * JSON lines with a timestamp, level from LOG_LEVEL. The console transport is
 * silenced under NODE_ENV=test.
 */

import winston from "winston";

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  defaultMeta: { service: "container-inventory" },
  transports: [new winston.transports.Console({ silent: process.env.NODE_ENV === "test" })],
});
