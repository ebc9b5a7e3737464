import pino from "pino";

export interface LoggerOptions {
  component: string;
  correlationId?: string;
}

const isPretty = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

/**
 * Base logger.
 * - Local runs: pretty-printed with colors
 * - Production and tests: JSON lines
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  transport: isPretty
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label })
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

export function createLogger(options: LoggerOptions): pino.Logger {
  return baseLogger.child({
    component: options.component,
    ...(options.correlationId && { correlationId: options.correlationId })
  });
}

/**
 * Logger scoped to one enrichment request or one bulk row
 * (`single-<ts>`, `<taskId>-row<n>`).
 */
export function createRequestLogger(component: string, requestId?: string): pino.Logger {
  return createLogger({ component, correlationId: requestId });
}

export { baseLogger as logger };

export type { Logger } from "pino";
