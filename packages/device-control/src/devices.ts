/**
 * Device enumeration against the active backend
 */

import { getBackend } from "./backend/factory";
import type { DeviceBackend } from "./backend/types";
import { ErrorKind } from "./errors";
import { Result, err, ok } from "./result";
import { Device } from "./types";

export function listDevices(backend: DeviceBackend = getBackend()): Result<Device[]> {
  return backend.listDevices();
}

export function isDeviceConnected(device: Device, backend: DeviceBackend = getBackend()): Result<boolean> {
  if (!device.isValid()) {
    return err(ErrorKind.InvalidArgument, "Invalid device");
  }
  return backend.isDeviceConnected(device);
}

/**
 * Resolve a device or an enumeration index to a Device
 */
export function resolveDevice(target: Device | number, backend: DeviceBackend = getBackend()): Result<Device> {
  if (target instanceof Device) {
    return target.isValid() ? ok(target) : err(ErrorKind.InvalidArgument, "Invalid device");
  }

  const devices = backend.listDevices();
  if (devices.isErr()) {
    return err(devices.error());
  }
  const list = devices.value();
  if (!Number.isInteger(target) || target < 0 || target >= list.length) {
    return err(ErrorKind.DeviceNotFound, "Invalid device index");
  }
  return ok(list[target]);
}
