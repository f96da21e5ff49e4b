/**
 * Structured logging via pino
 */

import pino from "pino";

const logger = pino({
  name: "sprout",
  level: process.env["SPROUT_LOG_LEVEL"] ?? "error",
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
}

export { logger };
