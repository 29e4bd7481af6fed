/**
 * Backend for platforms without native device access. Every call reports
 * NotImplemented.
 */

import { ErrorKind } from "../errors";
import { Result, err } from "../result";
import type { Device } from "../types";
import type { DeviceBackend, DeviceConnection } from "./types";

const MESSAGE = "No native device backend on this platform";

export class UnavailableBackend implements DeviceBackend {
  readonly kind = "none";

  listDevices(): Result<Device[]> {
    return err(ErrorKind.NotImplemented, MESSAGE);
  }

  isDeviceConnected(): Result<boolean> {
    return err(ErrorKind.NotImplemented, MESSAGE);
  }

  createConnection(): Result<DeviceConnection> {
    return err(ErrorKind.NotImplemented, MESSAGE);
  }

  registerDeviceChangeCallback(): void {}

  unregisterDeviceChangeCallback(): void {}

  readVendorProperty(): Result<Uint8Array> {
    return err(ErrorKind.NotImplemented, MESSAGE);
  }

  writeVendorProperty(): Result<void> {
    return err(ErrorKind.NotImplemented, MESSAGE);
  }

  queryVendorPropertySupport(): Result<boolean> {
    return err(ErrorKind.NotImplemented, MESSAGE);
  }
}
