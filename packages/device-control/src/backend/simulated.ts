/**
 * Simulated Device Backend
 * In-memory devices for development and testing
 *
 * Each device carries per-property ranges and settings, optional vendor
 * property blobs, and hooks for hotplug and failure simulation. Every backend
 * and connection call is counted so tests can assert that a code path never
 * reached the device.
 */

import { ErrorInfo, ErrorKind } from "../errors";
import { Guid, GuidInput } from "../guid";
import { deviceLogger } from "../logger";
import { RELATIVE_TO_ABSOLUTE, unpackPanTilt } from "../motion";
import { Result, err, ok } from "../result";
import { parseCamMode, parseCamProp, parseVidProp } from "../strings";
import {
  ALL_CAM_PROPS,
  ALL_VID_PROPS,
  CamMode,
  CamProp,
  Device,
  PropSetting,
  PropertyKey,
  VidProp,
} from "../types";
import catalog from "../data/simulated-devices.json";
import type { DeviceBackend, DeviceChangeCallback, DeviceConnection, RawPropRange } from "./types";

// ============================================================================
// Specs
// ============================================================================

export interface SimulatedPropertySpec {
  min: number;
  max: number;
  step: number;
  defaultValue: number;
  defaultMode?: CamMode;
  /** Initial value, defaults to defaultValue */
  value?: number;
  /** Initial mode, defaults to defaultMode */
  mode?: CamMode;
}

export interface SimulatedVendorSpec {
  guid: GuidInput;
  id: number;
  data: Uint8Array | readonly number[];
}

export interface SimulatedDeviceSpec {
  name: string;
  path: string;
  camera?: Partial<Record<CamProp, SimulatedPropertySpec>>;
  video?: Partial<Record<VidProp, SimulatedPropertySpec>>;
  vendor?: SimulatedVendorSpec[];
}

interface SimulatedProperty {
  range: RawPropRange;
  setting: PropSetting;
}

interface SimulatedDevice {
  device: Device;
  camera: Map<CamProp, SimulatedProperty>;
  video: Map<VidProp, SimulatedProperty>;
  vendor: Map<string, Uint8Array>;
  busy: boolean;
  failures: Map<string, ErrorInfo>;
}

function propertyKeyId(key: PropertyKey): string {
  return `${key.domain}:${key.id}`;
}

function vendorKeyId(guid: Guid, propertyId: number): string {
  return `${guid.toString()}:${propertyId}`;
}

function toProperty(spec: SimulatedPropertySpec): SimulatedProperty {
  const defaultMode = spec.defaultMode ?? CamMode.Manual;
  return {
    range: {
      min: spec.min,
      max: spec.max,
      step: spec.step,
      defaultValue: spec.defaultValue,
      defaultMode,
    },
    setting: new PropSetting(spec.value ?? spec.defaultValue, spec.mode ?? defaultMode),
  };
}

// ============================================================================
// Connection
// ============================================================================

class SimulatedConnection implements DeviceConnection {
  private closed = false;

  constructor(
    private readonly backend: SimulatedBackend,
    private readonly path: string,
  ) {}

  isValid(): boolean {
    return !this.closed && this.backend.hasDevice(this.path);
  }

  getCameraProperty(prop: CamProp): Result<PropSetting> {
    return this.guard(() => this.backend.readProperty(this.path, { domain: "camera", id: prop }));
  }

  setCameraProperty(prop: CamProp, setting: PropSetting): Result<void> {
    return this.guard(() =>
      this.backend.writeProperty(this.path, { domain: "camera", id: prop }, setting),
    );
  }

  getCameraPropertyRange(prop: CamProp): Result<RawPropRange> {
    return this.guard(() => this.backend.readRange(this.path, { domain: "camera", id: prop }));
  }

  getVideoProperty(prop: VidProp): Result<PropSetting> {
    return this.guard(() => this.backend.readProperty(this.path, { domain: "video", id: prop }));
  }

  setVideoProperty(prop: VidProp, setting: PropSetting): Result<void> {
    return this.guard(() =>
      this.backend.writeProperty(this.path, { domain: "video", id: prop }, setting),
    );
  }

  getVideoPropertyRange(prop: VidProp): Result<RawPropRange> {
    return this.guard(() => this.backend.readRange(this.path, { domain: "video", id: prop }));
  }

  close(): void {
    this.closed = true;
  }

  private guard<T>(operation: () => Result<T>): Result<T> {
    if (this.closed) {
      return err(ErrorKind.DeviceNotFound, "Connection is closed");
    }
    return operation();
  }
}

// ============================================================================
// Backend
// ============================================================================

export class SimulatedBackend implements DeviceBackend {
  readonly kind = "simulated";

  private readonly devices = new Map<string, SimulatedDevice>();
  private changeCallback: DeviceChangeCallback | null = null;
  private calls = 0;

  constructor(specs: readonly SimulatedDeviceSpec[] = []) {
    for (const spec of specs) {
      this.devices.set(spec.path, this.buildDevice(spec));
    }
  }

  /**
   * Backend populated from the bundled device catalog, cycling through its
   * entries when more devices are requested than it lists
   */
  static fromCatalog(count: number = catalog.devices.length): SimulatedBackend {
    return new SimulatedBackend(catalogDeviceSpecs(count));
  }

  /** Number of backend and connection calls made so far */
  get callCount(): number {
    return this.calls;
  }

  resetCallCount(): void {
    this.calls = 0;
  }

  hasDevice(path: string): boolean {
    return this.devices.has(path);
  }

  // --------------------------------------------------------------------------
  // Simulation controls (not counted as device calls)
  // --------------------------------------------------------------------------

  addDevice(spec: SimulatedDeviceSpec): Device {
    const simulated = this.buildDevice(spec);
    this.devices.set(spec.path, simulated);
    deviceLogger.debug("SimulatedBackend: device added", { path: spec.path });
    this.changeCallback?.(true, spec.path);
    return simulated.device;
  }

  removeDevice(path: string): boolean {
    if (!this.devices.delete(path)) {
      return false;
    }
    deviceLogger.debug("SimulatedBackend: device removed", { path });
    this.changeCallback?.(false, path);
    return true;
  }

  setBusy(path: string, busy: boolean): void {
    const simulated = this.devices.get(path);
    if (simulated) {
      simulated.busy = busy;
    }
  }

  /**
   * Make every get, set and range call on one property fail with the given
   * error until cleared
   */
  failProperty(path: string, key: PropertyKey, error: ErrorKind | ErrorInfo): void {
    const info = error instanceof ErrorInfo ? error : new ErrorInfo(error, "Simulated failure");
    this.devices.get(path)?.failures.set(propertyKeyId(key), info);
  }

  clearFailures(path?: string): void {
    for (const [devicePath, simulated] of this.devices) {
      if (path === undefined || path === devicePath) {
        simulated.failures.clear();
      }
    }
  }

  /**
   * Current setting without going through a connection
   */
  peek(path: string, key: PropertyKey): PropSetting | undefined {
    const property = this.lookupProperty(path, key);
    return property ? new PropSetting(property.setting.value, property.setting.mode) : undefined;
  }

  // --------------------------------------------------------------------------
  // DeviceBackend
  // --------------------------------------------------------------------------

  listDevices(): Result<Device[]> {
    this.calls++;
    return ok(Array.from(this.devices.values(), (simulated) => simulated.device));
  }

  isDeviceConnected(device: Device): Result<boolean> {
    this.calls++;
    return ok(this.devices.has(device.path));
  }

  createConnection(device: Device): Result<DeviceConnection> {
    this.calls++;
    const simulated = this.devices.get(device.path);
    if (!simulated) {
      return err(ErrorKind.DeviceNotFound, `No device at '${device.path}'`);
    }
    if (simulated.busy) {
      return err(ErrorKind.DeviceBusy, `Device '${simulated.device.name}' is in use`);
    }
    return ok(new SimulatedConnection(this, device.path));
  }

  registerDeviceChangeCallback(callback: DeviceChangeCallback): void {
    this.changeCallback = callback;
  }

  unregisterDeviceChangeCallback(): void {
    this.changeCallback = null;
  }

  readVendorProperty(device: Device, propertySet: Guid, propertyId: number): Result<Uint8Array> {
    return this.withDevice(device.path, (simulated) => {
      const data = simulated.vendor.get(vendorKeyId(propertySet, propertyId));
      if (!data) {
        return err(ErrorKind.PropertyNotSupported, `Vendor property ${propertySet}:${propertyId}`);
      }
      return ok(Uint8Array.from(data));
    });
  }

  writeVendorProperty(
    device: Device,
    propertySet: Guid,
    propertyId: number,
    data: Uint8Array,
  ): Result<void> {
    return this.withDevice(device.path, (simulated) => {
      const key = vendorKeyId(propertySet, propertyId);
      if (!simulated.vendor.has(key)) {
        return err(ErrorKind.PropertyNotSupported, `Vendor property ${propertySet}:${propertyId}`);
      }
      simulated.vendor.set(key, Uint8Array.from(data));
      return ok();
    });
  }

  queryVendorPropertySupport(device: Device, propertySet: Guid, propertyId: number): Result<boolean> {
    return this.withDevice(device.path, (simulated) =>
      ok(simulated.vendor.has(vendorKeyId(propertySet, propertyId))),
    );
  }

  // --------------------------------------------------------------------------
  // Property access for connections
  // --------------------------------------------------------------------------

  /** @internal */
  readProperty(path: string, key: PropertyKey): Result<PropSetting> {
    return this.withProperty(path, key, (property) =>
      ok(new PropSetting(property.setting.value, property.setting.mode)),
    );
  }

  /** @internal */
  readRange(path: string, key: PropertyKey): Result<RawPropRange> {
    return this.withProperty(path, key, (property) => ok({ ...property.range }));
  }

  /** @internal */
  writeProperty(path: string, key: PropertyKey, setting: PropSetting): Result<void> {
    return this.withProperty(path, key, (property, simulated) => {
      if (key.domain === "camera" && (key.id === CamProp.PanTilt || key.id === CamProp.PanTiltRelative)) {
        return this.writePanTilt(simulated, key.id, setting);
      }

      const { min, max } = property.range;
      if (!Number.isInteger(setting.value) || setting.value < min || setting.value > max) {
        return err(ErrorKind.InvalidValue, `Value ${setting.value} outside [${min}, ${max}]`);
      }

      property.setting = new PropSetting(setting.value, setting.mode);

      const absolute = key.domain === "camera" ? RELATIVE_TO_ABSOLUTE.get(key.id) : undefined;
      if (absolute !== undefined) {
        this.moveBy(simulated.camera.get(absolute), setting.value);
      }
      return ok();
    });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private writePanTilt(simulated: SimulatedDevice, prop: CamProp, setting: PropSetting): Result<void> {
    const { pan, tilt } = unpackPanTilt(setting.value);
    const panProperty = simulated.camera.get(CamProp.Pan);
    const tiltProperty = simulated.camera.get(CamProp.Tilt);

    if (prop === CamProp.PanTiltRelative) {
      this.moveBy(panProperty, pan);
      this.moveBy(tiltProperty, tilt);
      return ok();
    }

    for (const [property, value] of [
      [panProperty, pan],
      [tiltProperty, tilt],
    ] as const) {
      if (property && (value < property.range.min || value > property.range.max)) {
        return err(ErrorKind.InvalidValue, `Pan/tilt component ${value} out of range`);
      }
    }
    if (panProperty) panProperty.setting = new PropSetting(pan, setting.mode);
    if (tiltProperty) tiltProperty.setting = new PropSetting(tilt, setting.mode);
    return ok();
  }

  private moveBy(property: SimulatedProperty | undefined, delta: number): void {
    if (!property) return;
    const { min, max } = property.range;
    const next = Math.min(max, Math.max(min, property.setting.value + delta));
    property.setting = new PropSetting(next, CamMode.Manual);
  }

  private withDevice<T>(path: string, operation: (simulated: SimulatedDevice) => Result<T>): Result<T> {
    this.calls++;
    const simulated = this.devices.get(path);
    if (!simulated) {
      return err(ErrorKind.DeviceNotFound, `Device '${path}' disconnected`);
    }
    if (simulated.busy) {
      return err(ErrorKind.DeviceBusy, `Device '${simulated.device.name}' is in use`);
    }
    return operation(simulated);
  }

  private withProperty<T>(
    path: string,
    key: PropertyKey,
    operation: (property: SimulatedProperty, simulated: SimulatedDevice) => Result<T>,
  ): Result<T> {
    return this.withDevice(path, (simulated) => {
      const failure = simulated.failures.get(propertyKeyId(key));
      if (failure) {
        return err(failure);
      }
      const property = this.lookupProperty(path, key);
      if (!property) {
        return err(ErrorKind.PropertyNotSupported, `Property ${propertyKeyId(key)} not supported`);
      }
      return operation(property, simulated);
    });
  }

  private lookupProperty(path: string, key: PropertyKey): SimulatedProperty | undefined {
    const simulated = this.devices.get(path);
    if (!simulated) return undefined;
    return key.domain === "camera" ? simulated.camera.get(key.id) : simulated.video.get(key.id);
  }

  private buildDevice(spec: SimulatedDeviceSpec): SimulatedDevice {
    const camera = new Map<CamProp, SimulatedProperty>();
    for (const prop of ALL_CAM_PROPS) {
      const propertySpec = spec.camera?.[prop];
      if (propertySpec) camera.set(prop, toProperty(propertySpec));
    }

    const video = new Map<VidProp, SimulatedProperty>();
    for (const prop of ALL_VID_PROPS) {
      const propertySpec = spec.video?.[prop];
      if (propertySpec) video.set(prop, toProperty(propertySpec));
    }

    const vendor = new Map<string, Uint8Array>();
    for (const entry of spec.vendor ?? []) {
      const guid = Guid.normalize(entry.guid);
      if (guid.isErr()) {
        deviceLogger.warn("SimulatedBackend: skipping vendor property with bad GUID", {
          path: spec.path,
          error: guid.error().description(),
        });
        continue;
      }
      vendor.set(vendorKeyId(guid.value(), entry.id), Uint8Array.from(entry.data));
    }

    return {
      device: new Device(spec.name, spec.path),
      camera,
      video,
      vendor,
      busy: false,
      failures: new Map(),
    };
  }
}

// ============================================================================
// Catalog
// ============================================================================

interface CatalogPropertySpec {
  min: number;
  max: number;
  step: number;
  default: number;
  defaultMode?: string;
}

interface CatalogProfile {
  camera: Record<string, CatalogPropertySpec>;
  video: Record<string, CatalogPropertySpec>;
  vendor: { guid: string; id: number; data: number[] }[];
}

function fromCatalogSpec(spec: CatalogPropertySpec): SimulatedPropertySpec {
  return {
    min: spec.min,
    max: spec.max,
    step: spec.step,
    defaultValue: spec.default,
    defaultMode: parseCamMode(spec.defaultMode ?? "manual") ?? CamMode.Manual,
  };
}

function profileToSpec(name: string, path: string, profile: CatalogProfile): SimulatedDeviceSpec {
  const camera: Partial<Record<CamProp, SimulatedPropertySpec>> = {};
  for (const [propName, spec] of Object.entries(profile.camera)) {
    const prop = parseCamProp(propName);
    if (prop !== null) camera[prop] = fromCatalogSpec(spec);
  }

  const video: Partial<Record<VidProp, SimulatedPropertySpec>> = {};
  for (const [propName, spec] of Object.entries(profile.video)) {
    const prop = parseVidProp(propName);
    if (prop !== null) video[prop] = fromCatalogSpec(spec);
  }

  return { name, path, camera, video, vendor: profile.vendor };
}

/**
 * Device specs from the bundled catalog. Entries beyond the catalog's own
 * list reuse its profiles with numbered names and paths.
 */
export function catalogDeviceSpecs(count: number): SimulatedDeviceSpec[] {
  const profiles: Record<string, CatalogProfile> = catalog.profiles;
  const specs: SimulatedDeviceSpec[] = [];

  for (let i = 0; i < count; i++) {
    const entry = catalog.devices[i % catalog.devices.length];
    const profile = profiles[entry.profile];
    if (!profile) {
      deviceLogger.warn("SimulatedBackend: unknown catalog profile", { profile: entry.profile });
      continue;
    }
    const round = Math.floor(i / catalog.devices.length);
    const name = round === 0 ? entry.name : `${entry.name} #${round + 1}`;
    const path = round === 0 ? entry.path : `${entry.path}-${round + 1}`;
    specs.push(profileToSpec(name, path, profile));
  }

  return specs;
}
