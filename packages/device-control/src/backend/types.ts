/**
 * Device Backend Boundary
 *
 * The native I/O layer the control library talks to. Implementations perform
 * the actual device communication; everything above this interface is
 * platform-independent.
 */

import type { Guid } from "../guid";
import type { Result } from "../result";
import type { CamProp, Device, PropRangeInit, PropSetting, VidProp } from "../types";

/**
 * Range data as reported by a device. Not yet validated: a device may report
 * a range that violates the PropRange invariants.
 */
export type RawPropRange = Required<Omit<PropRangeInit, "stepPolicy">>;

/**
 * Invoked with added=true on arrival and added=false on removal
 */
export type DeviceChangeCallback = (added: boolean, devicePath: string) => void;

export interface DeviceConnection {
  isValid(): boolean;
  getCameraProperty(prop: CamProp): Result<PropSetting>;
  setCameraProperty(prop: CamProp, setting: PropSetting): Result<void>;
  getCameraPropertyRange(prop: CamProp): Result<RawPropRange>;
  getVideoProperty(prop: VidProp): Result<PropSetting>;
  setVideoProperty(prop: VidProp, setting: PropSetting): Result<void>;
  getVideoPropertyRange(prop: VidProp): Result<RawPropRange>;
  close(): void;
}

export interface DeviceBackend {
  /** Short identifier, e.g. "simulated" */
  readonly kind: string;

  listDevices(): Result<Device[]>;
  isDeviceConnected(device: Device): Result<boolean>;
  createConnection(device: Device): Result<DeviceConnection>;

  registerDeviceChangeCallback(callback: DeviceChangeCallback): void;
  unregisterDeviceChangeCallback(): void;

  readVendorProperty(device: Device, propertySet: Guid, propertyId: number): Result<Uint8Array>;
  writeVendorProperty(
    device: Device,
    propertySet: Guid,
    propertyId: number,
    data: Uint8Array,
  ): Result<void>;
  queryVendorPropertySupport(device: Device, propertySet: Guid, propertyId: number): Result<boolean>;
}
