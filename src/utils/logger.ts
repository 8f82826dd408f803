// src/utils/logger.ts
import pino from "pino";
import type { Logger } from "pino";

// Determine environment
const isDevelopment = process.env.NODE_ENV === "development";
const LOG_LEVEL = process.env.LOG_LEVEL || (isDevelopment ? "debug" : "error");

// Base logger configuration
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,

  ...(isDevelopment ? {} : {
    timestamp: pino.stdTimeFunctions.isoTime,
  }),

  // Base context that will be included in all logs
  base: {
    pid: process.pid,
    hostname: process.env.HOSTNAME || "localhost",
    service: "freqs",
  },

  serializers: {
    err: pino.stdSerializers.err,
  },
};

// stdout belongs to the rendered table, so logs go to stderr
export const logger = pino(baseConfig, pino.destination(2));

// Create child loggers for different components
export const createLogger = (component: string, context?: Record<string, unknown>): Logger => {
  return logger.child({ component, ...context });
};

export const counterLogger = createLogger("counter");
export const sourceLogger = createLogger("source");
export const sinkLogger = createLogger("sink");
export const cliLogger = createLogger("cli");

// Helper to log performance metrics
export const logPerformance = (
  logger: Logger,
  operation: string,
  startTime: number,
  metadata?: Record<string, unknown>
) => {
  const duration = Date.now() - startTime;
  logger.info({
    operation,
    duration,
    ...metadata,
  }, `${operation} completed in ${duration}ms`);
};

// Helper for structured error logging
export const logError = (
  logger: Logger,
  error: Error | unknown,
  context?: Record<string, unknown>
) => {
  if (error instanceof Error) {
    logger.error({
      err: error,
      ...context,
    }, error.message);
  } else {
    logger.error({
      error: String(error),
      ...context,
    }, "Unknown error occurred");
  }
};

export type { Logger };
