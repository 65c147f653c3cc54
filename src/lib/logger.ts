import pino from "pino";
import type { Logger } from "pino";

export type { Logger } from "pino";

export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  // JSON to stdout, no transports
  return pino({ level });
}

export function createChildLogger(
  logger: Logger,
  context: { operation?: string; scope?: string; [key: string]: unknown },
): Logger {
  return logger.child(context);
}
