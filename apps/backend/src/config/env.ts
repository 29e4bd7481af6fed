import dotenv from "dotenv";
import { APP_CONFIG, ENV_KEYS, PORTS } from "@camctl/config";
import { isBackendType, type BackendType } from "@camctl/device-control";
import { createLogger } from "@camctl/utils";

// Load environment variables
dotenv.config();

const logger = createLogger("config");

function readInt(key: string, fallback: number): number {
  const raw = process.env[key];
  return raw === undefined || raw === "" ? fallback : Number(raw);
}

function readFlag(key: string): boolean {
  return process.env[key] === "true";
}

export const env: {
  nodeEnv: string;
  port: number;
  host: string;
  /** Raw DEVICE_BACKEND value; validateEnv() checks it */
  deviceBackend: string;
  simulatedDevices: number;
  clampValues: boolean;
  strictStep: boolean;
  logLevel: string | undefined;
  isDevelopment: boolean;
  isProduction: boolean;
} = {
  nodeEnv: process.env[ENV_KEYS.NODE_ENV] || "development",
  port: readInt(ENV_KEYS.BACKEND_PORT, PORTS.BACKEND),
  host: process.env[ENV_KEYS.BACKEND_HOST] || "0.0.0.0",

  // Device control
  deviceBackend: process.env[ENV_KEYS.DEVICE_BACKEND] || "simulated",
  simulatedDevices: readInt(ENV_KEYS.SIMULATED_DEVICES, APP_CONFIG.DEFAULT_SIMULATED_DEVICES),
  clampValues: readFlag(ENV_KEYS.CLAMP_VALUES),
  strictStep: readFlag(ENV_KEYS.STRICT_STEP),

  logLevel: process.env[ENV_KEYS.LOG_LEVEL],

  isDevelopment: process.env[ENV_KEYS.NODE_ENV] === "development",
  isProduction: process.env[ENV_KEYS.NODE_ENV] === "production",
};

/**
 * The configured device backend, or null when DEVICE_BACKEND is not a known
 * backend
 */
export function configuredBackendType(): BackendType | null {
  return isBackendType(env.deviceBackend) ? env.deviceBackend : null;
}

/**
 * Validate environment variables. Returns the problems found; an empty list
 * means the configuration is usable.
 */
export function validateEnv(): string[] {
  const problems: string[] = [];

  if (!Number.isInteger(env.port) || env.port < 0 || env.port > 65535) {
    problems.push(`${ENV_KEYS.BACKEND_PORT} must be a port number (got ${process.env[ENV_KEYS.BACKEND_PORT]})`);
  }
  if (configuredBackendType() === null) {
    problems.push(`${ENV_KEYS.DEVICE_BACKEND} must be 'simulated' or 'none' (got ${env.deviceBackend})`);
  }
  if (!Number.isInteger(env.simulatedDevices) || env.simulatedDevices < 0) {
    problems.push(
      `${ENV_KEYS.SIMULATED_DEVICES} must be a non-negative integer (got ${process.env[ENV_KEYS.SIMULATED_DEVICES]})`,
    );
  }

  // Warn if using simulated devices in production
  if (env.isProduction && env.deviceBackend === "simulated") {
    logger.warn("Using the simulated device backend in production - no real cameras will be controlled");
  }

  for (const problem of problems) {
    logger.error(`Invalid configuration: ${problem}`);
  }
  return problems;
}
