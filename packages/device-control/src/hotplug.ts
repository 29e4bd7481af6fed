/**
 * Device change notifications
 *
 * One process-wide callback slot. Registering replaces the previous callback
 * rather than stacking. The callback may run from the backend's own
 * notification context, so anything it throws is caught and logged.
 */

import { getBackend } from "./backend/factory";
import type { DeviceBackend, DeviceChangeCallback } from "./backend/types";
import { logDebug, logError } from "./logging";

interface Registration {
  callback: DeviceChangeCallback;
  backend: DeviceBackend;
}

let registration: Registration | null = null;

export function registerDeviceChangeCallback(
  callback: DeviceChangeCallback,
  backend: DeviceBackend = getBackend(),
): void {
  unregisterDeviceChangeCallback();

  backend.registerDeviceChangeCallback((added, devicePath) => {
    logDebug(`Device ${added ? "added" : "removed"}: ${devicePath}`);
    try {
      callback(added, devicePath);
    } catch (error) {
      logError(
        `Exception in device change callback: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  });
  registration = { callback, backend };
}

export function unregisterDeviceChangeCallback(): void {
  if (registration) {
    registration.backend.unregisterDeviceChangeCallback();
    registration = null;
  }
}

export function hasDeviceChangeCallback(): boolean {
  return registration !== null;
}
