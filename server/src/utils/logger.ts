import pino from "pino";
import type { Logger } from "pino";

interface LoggerSettings {
  name: string;
  level: string;
}

/**
 * Logger settings shared by the bootstrap logger and the Fastify instance,
 * so request logs and startup logs look the same.
 */
export function loggerOptions(level: string): LoggerSettings {
  return {
    name: "tabular-insights",
    level,
  };
}

export function createLogger(level: string): Logger {
  return pino(loggerOptions(level));
}

export type { Logger };
