// src/common/logger.ts
import pino from "pino";

const env = process.env.NODE_ENV;
const isTest = env === "test";
const isDev = env !== "production" && !isTest;

const baseLogger = pino(
  isTest
    ? { level: process.env.LOG_LEVEL || "silent" }
    : isDev
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "yyyy-mm-dd HH:MM:ss.l o",
            ignore: "pid,hostname",
          },
        },
        level: process.env.LOG_LEVEL || "debug",
      }
    : {
        level: process.env.LOG_LEVEL || "info",
        formatters: {
          level(label: string) {
            return { level: label };
          },
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
);

export class Logger {
  constructor(private context: string) {}

  private format(msg: string): string {
    return `[${this.context}] ${msg}`;
  }

  error(msg: string, meta?: Record<string, unknown>) {
    if (meta) baseLogger.error(meta, this.format(msg));
    else baseLogger.error(this.format(msg));
  }
  debug(msg: string, meta?: Record<string, unknown>) {
    if (meta) baseLogger.debug(meta, this.format(msg));
    else baseLogger.debug(this.format(msg));
  }
}

export const logger = baseLogger;
