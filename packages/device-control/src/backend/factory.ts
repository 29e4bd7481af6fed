/**
 * Device Backend Factory
 * Creates the backend selected by configuration and holds the process-wide
 * active instance
 */

import { APP_CONFIG, ENV_KEYS } from "@camctl/config";
import { deviceLogger } from "../logger";
import { SimulatedBackend } from "./simulated";
import type { DeviceBackend } from "./types";
import { UnavailableBackend } from "./unavailable";

export type BackendType = "simulated" | "none";

export interface BackendOptions {
  /** Number of catalog devices for the simulated backend */
  simulatedDevices?: number;
}

export function isBackendType(value: string): value is BackendType {
  return value === "simulated" || value === "none";
}

function configuredBackendType(): BackendType {
  const configured = process.env[ENV_KEYS.DEVICE_BACKEND];
  if (configured && isBackendType(configured)) {
    return configured;
  }
  if (configured) {
    deviceLogger.warn(`Unknown device backend: ${configured}, using simulated`);
  }
  return "simulated";
}

/**
 * Create a backend instance
 */
export function createBackend(type?: BackendType, options: BackendOptions = {}): DeviceBackend {
  const backendType = type ?? configuredBackendType();

  deviceLogger.info("DeviceBackendFactory: Creating backend", {
    type: backendType,
    platform: process.platform,
  });

  switch (backendType) {
    case "simulated":
      return SimulatedBackend.fromCatalog(
        options.simulatedDevices ?? APP_CONFIG.DEFAULT_SIMULATED_DEVICES,
      );

    case "none":
      return new UnavailableBackend();
  }
}

export function getBackendDisplayName(type: BackendType): string {
  switch (type) {
    case "simulated":
      return "Simulated cameras (in-memory)";
    case "none":
      return "No device access";
  }
}

// ============================================================================
// Active Backend
// ============================================================================

let activeBackend: DeviceBackend | null = null;

/**
 * The process-wide backend, created from configuration on first use
 */
export function getBackend(): DeviceBackend {
  if (!activeBackend) {
    activeBackend = createBackend();
  }
  return activeBackend;
}

/**
 * Replace the process-wide backend. Existing connections and hotplug
 * registrations stay on the backend they were made with.
 */
export function setBackend(backend: DeviceBackend): void {
  activeBackend = backend;
}

export function resetBackend(): void {
  activeBackend = null;
}
