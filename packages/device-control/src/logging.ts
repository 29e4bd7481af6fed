/**
 * Process-scoped log state
 *
 * One minimum level and one optional user callback for the whole process.
 * Registering a callback replaces the previous one. Messages below the level
 * are dropped; the rest go to the callback when one is installed, otherwise
 * to the winston device logger. A throwing callback never propagates: the
 * message is re-emitted on the device logger instead.
 */

import { deviceLogger } from "./logger";

export enum LogLevel {
  Debug = 0,
  Info = 1,
  Warning = 2,
  Error = 3,
  Critical = 4,
}

export type LogCallback = (level: LogLevel, message: string) => void;

const DEFAULT_LEVEL = LogLevel.Info;

let currentLevel: LogLevel = DEFAULT_LEVEL;
let userCallback: LogCallback | null = null;

export function logLevelToString(level: LogLevel): string {
  switch (level) {
    case LogLevel.Debug:
      return "DEBUG";
    case LogLevel.Info:
      return "INFO";
    case LogLevel.Warning:
      return "WARNING";
    case LogLevel.Error:
      return "ERROR";
    case LogLevel.Critical:
      return "CRITICAL";
  }
}

export function parseLogLevel(name: string): LogLevel | null {
  switch (name.trim().toUpperCase()) {
    case "DEBUG":
      return LogLevel.Debug;
    case "INFO":
      return LogLevel.Info;
    case "WARN":
    case "WARNING":
      return LogLevel.Warning;
    case "ERROR":
      return LogLevel.Error;
    case "CRITICAL":
      return LogLevel.Critical;
    default:
      return null;
  }
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Install (or with null, remove) the process-wide log callback
 */
export function setLogCallback(callback: LogCallback | null): void {
  userCallback = callback;
}

/**
 * Restore the default level and remove any callback
 */
export function resetLogging(): void {
  currentLevel = DEFAULT_LEVEL;
  userCallback = null;
}

function emitToLogger(level: LogLevel, message: string): void {
  switch (level) {
    case LogLevel.Debug:
      deviceLogger.debug(message);
      break;
    case LogLevel.Info:
      deviceLogger.info(message);
      break;
    case LogLevel.Warning:
      deviceLogger.warn(message);
      break;
    case LogLevel.Error:
      deviceLogger.error(message);
      break;
    case LogLevel.Critical:
      deviceLogger.error(message, { critical: true });
      break;
  }
}

export function logMessage(level: LogLevel, message: string): void {
  if (level < currentLevel) {
    return;
  }

  if (!userCallback) {
    emitToLogger(level, message);
    return;
  }

  try {
    userCallback(level, message);
  } catch (error) {
    deviceLogger.error(`Exception in user log callback - ${message}`, {
      level: logLevelToString(level),
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export function logDebug(message: string): void {
  logMessage(LogLevel.Debug, message);
}

export function logInfo(message: string): void {
  logMessage(LogLevel.Info, message);
}

export function logWarning(message: string): void {
  logMessage(LogLevel.Warning, message);
}

export function logError(message: string): void {
  logMessage(LogLevel.Error, message);
}

export function logCritical(message: string): void {
  logMessage(LogLevel.Critical, message);
}

/**
 * Set the level and, when given, the callback in one call
 */
export function setupLogging(level: LogLevel = LogLevel.Info, callback?: LogCallback): void {
  setLogLevel(level);
  if (callback) {
    setLogCallback(callback);
  }
}

/**
 * Route everything, debug included, to the device logger
 */
export function enableDebugLogging(): void {
  setLogLevel(LogLevel.Debug);
  setLogCallback(null);
  deviceLogger.level = "debug";
}
