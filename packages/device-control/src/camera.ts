/**
 * Camera
 *
 * Result-based access to one device over one exclusively owned backend
 * connection. Every operation returns a Result; nothing here throws for a
 * device-side failure.
 */

import { getBackend } from "./backend/factory";
import type { DeviceBackend, DeviceConnection, RawPropRange } from "./backend/types";
import { resolveDevice } from "./devices";
import { ErrorKind } from "./errors";
import { logDebug } from "./logging";
import { Result, err, ok } from "./result";
import { camPropToString, vidPropToString } from "./strings";
import {
  CamProp,
  Device,
  PropRange,
  PropSetting,
  PropertyKey,
  StepPolicy,
  VidProp,
} from "./types";

export interface CameraOptions {
  /** Backend to open on; defaults to the process-wide backend */
  backend?: DeviceBackend;
  /** Step policy attached to every range this camera reports */
  stepPolicy?: StepPolicy;
}

export function propertyKeyToString(key: PropertyKey): string {
  return key.domain === "camera" ? camPropToString(key.id) : vidPropToString(key.id);
}

/**
 * Validate raw range data from a device
 */
export function toPropRange(raw: RawPropRange, stepPolicy: StepPolicy = "lenient"): Result<PropRange> {
  const range = PropRange.tryCreate({ ...raw, stepPolicy });
  if (range.isErr()) {
    return err(ErrorKind.SystemError, `Malformed capability data: ${range.error().message}`);
  }
  return range;
}

export class Camera {
  private connection: DeviceConnection | null;

  private constructor(
    readonly device: Device,
    connection: DeviceConnection,
    readonly backend: DeviceBackend,
    readonly stepPolicy: StepPolicy,
  ) {
    this.connection = connection;
  }

  /**
   * Open a connection to a device, or to the device at an enumeration index
   */
  static open(target: Device | number, options: CameraOptions = {}): Result<Camera> {
    const backend = options.backend ?? getBackend();
    const device = resolveDevice(target, backend);
    if (device.isErr()) {
      return err(device.error());
    }

    const connection = backend.createConnection(device.value());
    if (connection.isErr()) {
      return err(connection.error());
    }

    logDebug(`Opened connection to ${device.value().name} (${device.value().path})`);
    return ok(
      new Camera(device.value(), connection.value(), backend, options.stepPolicy ?? "lenient"),
    );
  }

  isValid(): boolean {
    return this.connection !== null && this.connection.isValid();
  }

  // ==========================================================================
  // Camera domain
  // ==========================================================================

  getCameraProperty(prop: CamProp): Result<PropSetting> {
    return this.withConnection((connection) => connection.getCameraProperty(prop));
  }

  setCameraProperty(prop: CamProp, setting: PropSetting): Result<void> {
    return this.withConnection((connection) => connection.setCameraProperty(prop, setting));
  }

  getCameraPropertyRange(prop: CamProp): Result<PropRange> {
    return this.getRange({ domain: "camera", id: prop });
  }

  // ==========================================================================
  // Video domain
  // ==========================================================================

  getVideoProperty(prop: VidProp): Result<PropSetting> {
    return this.withConnection((connection) => connection.getVideoProperty(prop));
  }

  setVideoProperty(prop: VidProp, setting: PropSetting): Result<void> {
    return this.withConnection((connection) => connection.setVideoProperty(prop, setting));
  }

  getVideoPropertyRange(prop: VidProp): Result<PropRange> {
    return this.getRange({ domain: "video", id: prop });
  }

  // ==========================================================================
  // Domain-tagged access
  // ==========================================================================

  get(key: PropertyKey): Result<PropSetting> {
    return key.domain === "camera" ? this.getCameraProperty(key.id) : this.getVideoProperty(key.id);
  }

  set(key: PropertyKey, setting: PropSetting): Result<void> {
    return key.domain === "camera"
      ? this.setCameraProperty(key.id, setting)
      : this.setVideoProperty(key.id, setting);
  }

  getRange(key: PropertyKey): Result<PropRange> {
    return this.getRawRange(key).andThen((raw) => toPropRange(raw, this.stepPolicy));
  }

  /**
   * Range exactly as the device reported it, before validation
   */
  getRawRange(key: PropertyKey): Result<RawPropRange> {
    return this.withConnection((connection) =>
      key.domain === "camera"
        ? connection.getCameraPropertyRange(key.id)
        : connection.getVideoPropertyRange(key.id),
    );
  }

  close(): void {
    if (this.connection) {
      this.connection.close();
      this.connection = null;
      logDebug(`Closed connection to ${this.device.name}`);
    }
  }

  private withConnection<T>(operation: (connection: DeviceConnection) => Result<T>): Result<T> {
    if (!this.connection) {
      return err(ErrorKind.DeviceNotFound, "Camera is closed");
    }
    if (!this.connection.isValid()) {
      return err(ErrorKind.DeviceNotFound, `Device ${this.device.name} is no longer connected`);
    }
    return operation(this.connection);
  }
}

/**
 * Open a Camera on the process-wide backend
 */
export function openCamera(target: Device | number, options: CameraOptions = {}): Result<Camera> {
  return Camera.open(target, options);
}
