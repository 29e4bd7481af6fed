import winston from "winston";
import { ENV_KEYS, PATHS, isDevelopment, isProduction } from "@camctl/config";

export type Logger = winston.Logger;

function resolveLevel(): string {
  const configured = process.env[ENV_KEYS.LOG_LEVEL];
  if (configured && configured in winston.config.npm.levels) {
    return configured;
  }
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance with consistent formatting
 */
export function createLogger(service: string): Logger {
  const format = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json(),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
      let msg = `${timestamp} [${service}] ${level}: ${message}`;
      if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
      }
      return msg;
    }),
  );

  const logger = winston.createLogger({
    level: resolveLevel(),
    format,
    defaultMeta: { service },
    silent: process.env[ENV_KEYS.LOG_SILENT] === "true",
    transports: [
      new winston.transports.Console({
        format: consoleFormat,
      }),
    ],
  });

  // Add file transports in production
  if (isProduction()) {
    logger.add(
      new winston.transports.File({
        filename: PATHS.ERROR_LOG,
        level: "error",
      }),
    );
    logger.add(
      new winston.transports.File({
        filename: PATHS.COMBINED_LOG,
      }),
    );
  }

  return logger;
}

/**
 * Default logger instance
 */
export const logger = createLogger("camctl");
