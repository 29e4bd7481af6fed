/**
 * Device Capability Snapshot
 *
 * Point-in-time record of which properties a device supports, with range and
 * current value for each. A property counts as supported when its range query
 * succeeds. Unsupported properties stay queryable and report an empty
 * capability.
 */

import type { CapabilitiesDTO, CapabilityDTO } from "@camctl/types";
import { getBackend } from "./backend/factory";
import type { DeviceBackend } from "./backend/types";
import { Camera, CameraOptions, propertyKeyToString, toPropRange } from "./camera";
import { resolveDevice } from "./devices";
import { ErrorKind } from "./errors";
import { logDebug } from "./logging";
import { Result, err, ok } from "./result";
import {
  ALL_CAM_PROPS,
  ALL_VID_PROPS,
  CamMode,
  CamProp,
  Device,
  PropSetting,
  PropertyCapability,
  PropertyKey,
  StepPolicy,
  VidProp,
} from "./types";

interface ScanResult {
  camera: Map<CamProp, PropertyCapability>;
  video: Map<VidProp, PropertyCapability>;
  accessible: boolean;
}

export function capabilityToDTO(capability: PropertyCapability): CapabilityDTO {
  const range = capability.range;
  return {
    supported: capability.supported,
    supportsAuto: capability.supportsAuto(),
    range: {
      min: range.min,
      max: range.max,
      step: range.step,
      default: range.defaultValue,
      defaultMode: range.defaultMode === CamMode.Auto ? "auto" : "manual",
    },
    current: {
      value: capability.current.value,
      mode: capability.current.mode === CamMode.Auto ? "auto" : "manual",
    },
  };
}

export class DeviceCapabilities implements Iterable<PropertyKey> {
  private camera = new Map<CamProp, PropertyCapability>();
  private video = new Map<VidProp, PropertyCapability>();
  private accessible = false;

  private constructor(
    readonly device: Device,
    private readonly backend: DeviceBackend,
    private readonly stepPolicy: StepPolicy,
  ) {}

  static scan(device: Device, backend: DeviceBackend, stepPolicy: StepPolicy = "lenient"): Result<DeviceCapabilities> {
    const capabilities = new DeviceCapabilities(device, backend, stepPolicy);
    return capabilities.rescan().map(() => capabilities);
  }

  /**
   * Re-query the device and replace the snapshot's contents in place.
   * On failure the previous contents are kept.
   */
  refresh(): Result<void> {
    const connected = this.backend.isDeviceConnected(this.device);
    if (connected.isErr()) {
      return err(connected.error());
    }
    if (!connected.value()) {
      this.accessible = false;
      return err(ErrorKind.DeviceNotFound, "Device not connected");
    }
    return this.rescan();
  }

  isDeviceAccessible(): boolean {
    return this.accessible;
  }

  getCameraCapability(prop: CamProp): PropertyCapability {
    return this.camera.get(prop) ?? PropertyCapability.unsupported();
  }

  getVideoCapability(prop: VidProp): PropertyCapability {
    return this.video.get(prop) ?? PropertyCapability.unsupported();
  }

  getCapability(key: PropertyKey): PropertyCapability {
    return key.domain === "camera" ? this.getCameraCapability(key.id) : this.getVideoCapability(key.id);
  }

  supportsCameraProperty(prop: CamProp): boolean {
    return this.getCameraCapability(prop).supported;
  }

  supportsVideoProperty(prop: VidProp): boolean {
    return this.getVideoCapability(prop).supported;
  }

  supports(key: PropertyKey): boolean {
    return this.getCapability(key).supported;
  }

  supportedCameraProperties(): CamProp[] {
    return ALL_CAM_PROPS.filter((prop) => this.supportsCameraProperty(prop));
  }

  supportedVideoProperties(): VidProp[] {
    return ALL_VID_PROPS.filter((prop) => this.supportsVideoProperty(prop));
  }

  /** Number of supported properties across both domains */
  get size(): number {
    return this.camera.size + this.video.size;
  }

  *[Symbol.iterator](): Iterator<PropertyKey> {
    for (const id of this.supportedCameraProperties()) {
      yield { domain: "camera", id };
    }
    for (const id of this.supportedVideoProperties()) {
      yield { domain: "video", id };
    }
  }

  toJSON(): CapabilitiesDTO {
    const camera: Record<string, CapabilityDTO> = {};
    const video: Record<string, CapabilityDTO> = {};
    for (const key of this) {
      const target = key.domain === "camera" ? camera : video;
      target[propertyKeyToString(key)] = capabilityToDTO(this.getCapability(key));
    }
    return {
      device: { name: this.device.name, path: this.device.path },
      accessible: this.accessible,
      camera,
      video,
    };
  }

  private rescan(): Result<void> {
    const scanned = this.scanDevice();
    if (scanned.isErr()) {
      return err(scanned.error());
    }
    const { camera, video, accessible } = scanned.value();
    this.camera = camera;
    this.video = video;
    this.accessible = accessible;
    logDebug(
      `Capabilities for ${this.device.name}: ${camera.size} camera, ${video.size} video properties`,
    );
    return ok();
  }

  private scanDevice(): Result<ScanResult> {
    const empty: ScanResult = { camera: new Map(), video: new Map(), accessible: false };

    const connected = this.backend.isDeviceConnected(this.device);
    if (connected.isErr()) {
      return err(connected.error());
    }
    if (!connected.value()) {
      return ok(empty);
    }

    const opened = Camera.open(this.device, { backend: this.backend, stepPolicy: this.stepPolicy });
    if (opened.isErr()) {
      logDebug(`Device ${this.device.name} not accessible: ${opened.error().description()}`);
      return ok(empty);
    }

    const camera = opened.value();
    try {
      const result: ScanResult = { camera: new Map(), video: new Map(), accessible: true };

      for (const id of ALL_CAM_PROPS) {
        const probed = this.probe(camera, { domain: "camera", id });
        if (probed.isErr()) return err(probed.error());
        const capability = probed.value();
        if (capability) result.camera.set(id, capability);
      }
      for (const id of ALL_VID_PROPS) {
        const probed = this.probe(camera, { domain: "video", id });
        if (probed.isErr()) return err(probed.error());
        const capability = probed.value();
        if (capability) result.video.set(id, capability);
      }

      return ok(result);
    } finally {
      camera.close();
    }
  }

  /**
   * Capability of one property, null when unsupported, Err when the device
   * reported a range that violates the range invariants
   */
  private probe(camera: Camera, key: PropertyKey): Result<PropertyCapability | null> {
    const raw = camera.getRawRange(key);
    if (raw.isErr()) {
      return ok(null);
    }

    const range = toPropRange(raw.value(), this.stepPolicy);
    if (range.isErr()) {
      return err(
        ErrorKind.SystemError,
        `${range.error().message} (${propertyKeyToString(key)})`,
      );
    }

    const fallback = new PropSetting(range.value().defaultValue, range.value().defaultMode);
    const current = camera.get(key).valueOr(fallback);
    return ok(new PropertyCapability(true, range.value(), current));
  }
}

/**
 * Capability snapshot for a device or an enumeration index
 */
export function getDeviceCapabilities(
  target: Device | number,
  options: CameraOptions = {},
): Result<DeviceCapabilities> {
  const backend = options.backend ?? getBackend();
  const device = resolveDevice(target, backend);
  if (device.isErr()) {
    return err(device.error());
  }
  return DeviceCapabilities.scan(device.value(), backend, options.stepPolicy);
}
