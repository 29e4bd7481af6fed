/**
 * Camera Controller
 *
 * Name-based façade over one Camera. Every operation is implemented once
 * against Results (the *Result methods); the throwing methods unwrap those
 * through the exception bridge.
 *
 * Value policy for set(): out-of-range values are rejected with
 * InvalidValueError without a device call. With clampValues enabled they are
 * saturated into the range instead.
 */

import type {
  CameraState,
  PropRangeDTO,
  PropertyStatusMap,
  PropertyValue,
  StateChange,
  SupportedProperties,
} from "@camctl/types";
import { getBackend } from "./backend/factory";
import type { DeviceBackend } from "./backend/types";
import { Camera, propertyKeyToString } from "./camera";
import { DeviceCapabilities } from "./capabilities";
import { findDeviceByName } from "./device-utils";
import { resolveDevice } from "./devices";
import { recordOperation } from "./diagnostics";
import { ErrorKind } from "./errors";
import {
  InvalidArgumentError,
  PresetNotFoundError,
  tryResult,
  unwrapOrThrow,
} from "./exceptions";
import { logDebug, logWarning } from "./logging";
import { ABSOLUTE_TO_RELATIVE, packPanTilt, unpackPanTilt } from "./motion";
import {
  BUILT_IN_PRESETS,
  Preset,
  SMART_DEFAULTS,
  resolveSmartDefault,
} from "./presets";
import { PropertyDescriptor, PropertyRegistry } from "./registry";
import { Result, err, ok } from "./result";
import {
  CamMode,
  CamProp,
  Device,
  PropRange,
  PropSetting,
  PropertyCapability,
  PropertyKey,
  StepPolicy,
} from "./types";

export type ModeArgument = CamMode | "auto" | "manual";

export interface CameraControllerOptions {
  /** Enumeration index; the default selector (0) when nothing else is given */
  deviceIndex?: number;
  /** Case-insensitive substring of the device name */
  deviceName?: string;
  device?: Device;
  backend?: DeviceBackend;
  /** Saturate out-of-range values instead of rejecting them */
  clampValues?: boolean;
  stepPolicy?: StepPolicy;
  registry?: PropertyRegistry;
}

export interface BatchOptions {
  /** Log a warning for each failed property */
  verbose?: boolean;
}

const INT16_MIN = -0x8000;
const INT16_MAX = 0x7fff;

interface AxisPair {
  pan: [name: string, prop: CamProp];
  tilt: [name: string, prop: CamProp];
}

const ABSOLUTE_AXES: AxisPair = { pan: ["pan", CamProp.Pan], tilt: ["tilt", CamProp.Tilt] };
const RELATIVE_AXES: AxisPair = {
  pan: ["pan_relative", CamProp.PanRelative],
  tilt: ["tilt_relative", CamProp.TiltRelative],
};

/**
 * Pack two checked axes into one combined value; each must fit a signed
 * 16-bit field
 */
function packAxes([pan, tilt]: [number, number]): Result<number> {
  for (const value of [pan, tilt]) {
    if (value < INT16_MIN || value > INT16_MAX) {
      return err(ErrorKind.InvalidValue, `Pan/tilt component ${value} does not fit 16 bits`);
    }
  }
  return ok(packPanTilt(pan, tilt));
}

function toMode(mode: ModeArgument | undefined): CamMode {
  return mode === CamMode.Auto || mode === "auto" ? CamMode.Auto : CamMode.Manual;
}

function isPropertyValue(value: unknown): value is PropertyValue {
  return typeof value === "number" || typeof value === "boolean" || value === "auto";
}

function selectDevice(options: CameraControllerOptions, backend: DeviceBackend): Result<Device> {
  const selectors = [options.device, options.deviceName, options.deviceIndex].filter(
    (selector) => selector !== undefined,
  );
  if (selectors.length > 1) {
    return err(ErrorKind.InvalidArgument, "Specify only one of device, deviceName or deviceIndex");
  }

  if (options.device) {
    return resolveDevice(options.device, backend);
  }
  if (options.deviceName !== undefined) {
    const found = findDeviceByName(options.deviceName, backend);
    if (found.isErr()) {
      return err(found.error());
    }
    const device = found.value();
    return device ? ok(device) : err(ErrorKind.DeviceNotFound, `No camera matching '${options.deviceName}'`);
  }
  return resolveDevice(options.deviceIndex ?? 0, backend);
}

export class CameraController {
  static readonly BUILT_IN_PRESETS = BUILT_IN_PRESETS;
  static readonly SMART_DEFAULTS = SMART_DEFAULTS;

  private camera: Camera | null;
  private snapshot: DeviceCapabilities | null = null;
  private readonly customPresets = new Map<string, Preset>();
  private readonly registry: PropertyRegistry;
  private readonly clampValues: boolean;
  private readonly stepPolicy: StepPolicy;
  private readonly backend: DeviceBackend;
  readonly device: Device;

  /**
   * Open the selected device. Throws DeviceNotFoundError when no device
   * matches, or the mapped exception of the open failure.
   */
  constructor(options: CameraControllerOptions = {}) {
    this.backend = options.backend ?? getBackend();
    this.registry = options.registry ?? PropertyRegistry.default();
    this.clampValues = options.clampValues ?? false;
    this.stepPolicy = options.stepPolicy ?? "lenient";

    const device = unwrapOrThrow(selectDevice(options, this.backend), "CameraController");
    this.camera = unwrapOrThrow(
      Camera.open(device, { backend: this.backend, stepPolicy: this.stepPolicy }),
      "CameraController",
    );
    this.device = device;
    logDebug(`CameraController opened ${device.name}`);
  }

  /**
   * Result-returning construction
   */
  static open(options: CameraControllerOptions = {}): Result<CameraController> {
    return tryResult(() => new CameraController(options));
  }

  // ==========================================================================
  // Identity and lifecycle
  // ==========================================================================

  get deviceName(): string {
    return this.device.name;
  }

  get devicePath(): string {
    return this.device.path;
  }

  get isConnected(): boolean {
    return this.camera !== null && this.camera.isValid();
  }

  /**
   * The underlying Result-based camera
   */
  get core(): Camera {
    return unwrapOrThrow(this.requireCamera(), "core");
  }

  close(): void {
    if (this.camera) {
      this.camera.close();
      this.camera = null;
      this.snapshot = null;
      logDebug(`CameraController closed ${this.device.name}`);
    }
  }

  toString(): string {
    return `CameraController(${this.device.name}, ${this.isConnected ? "connected" : "disconnected"})`;
  }

  // ==========================================================================
  // Capabilities
  // ==========================================================================

  capabilitiesResult(): Result<DeviceCapabilities> {
    if (this.snapshot) {
      return ok(this.snapshot);
    }
    return this.requireCamera().andThen(() => {
      const scanned = DeviceCapabilities.scan(this.device, this.backend, this.stepPolicy);
      if (scanned.isOk()) {
        this.snapshot = scanned.value();
      }
      return scanned;
    });
  }

  capabilities(): DeviceCapabilities {
    return unwrapOrThrow(this.capabilitiesResult(), "capabilities");
  }

  /**
   * Re-scan the device, replacing the cached snapshot
   */
  refreshCapabilities(): void {
    const snapshot = this.snapshot;
    if (!snapshot) {
      this.capabilities();
      return;
    }
    unwrapOrThrow(snapshot.refresh(), "refreshCapabilities");
  }

  getSupportedProperties(): SupportedProperties {
    const snapshot = this.capabilities();
    const result: SupportedProperties = { camera: [], video: [] };
    for (const key of snapshot) {
      const name = this.registry.describe(key)?.name ?? propertyKeyToString(key);
      result[key.domain].push(name);
    }
    return result;
  }

  getPropertyRangeResult(name: string): Result<PropRange> {
    return this.resolveSupported(name).map(({ capability }) => capability.range);
  }

  getPropertyRange(name: string): PropRangeDTO {
    const range = unwrapOrThrow(this.getPropertyRangeResult(name), `range ${name}`);
    const { min, max, step, defaultMode } = range;
    return {
      min,
      max,
      step,
      default: range.defaultValue,
      defaultMode: defaultMode === CamMode.Auto ? "auto" : "manual",
    };
  }

  listProperties(): string[] {
    return this.registry.listPropertyNames();
  }

  getPropertyAliases(): Record<string, string[]> {
    return this.registry.getPropertyAliases();
  }

  // ==========================================================================
  // Get / Set
  // ==========================================================================

  getSettingResult(name: string): Result<PropSetting> {
    return this.resolveSupported(name).andThen(({ descriptor, camera }) =>
      recordOperation(camera.get(descriptor.key)),
    );
  }

  getResult(name: string): Result<number | boolean> {
    return this.resolveSupported(name).andThen(({ descriptor, camera }) =>
      recordOperation(camera.get(descriptor.key)).map((setting) =>
        descriptor.kind === "bool" ? setting.value !== 0 : setting.value,
      ),
    );
  }

  get(name: string): number | boolean {
    return unwrapOrThrow(this.getResult(name), `get ${name}`);
  }

  /**
   * Write a property. "auto" hands control to the device and keeps the
   * current value; booleans write 1 or 0.
   */
  setResult(name: string, value: PropertyValue, mode?: ModeArgument): Result<void> {
    return this.resolveSupported(name).andThen(({ descriptor, capability, camera }) => {
      if (value === "auto") {
        return recordOperation(camera.get(descriptor.key)).andThen((current) =>
          recordOperation(camera.set(descriptor.key, new PropSetting(current.value, CamMode.Auto))),
        );
      }

      const numeric = typeof value === "boolean" ? (value ? 1 : 0) : value;
      const checked = descriptor.combined
        ? this.checkPacked(descriptor, capability.range, numeric)
        : this.checkValue(descriptor, capability.range, numeric);
      return checked.andThen((accepted) =>
        recordOperation(camera.set(descriptor.key, new PropSetting(accepted, toMode(mode)))),
      );
    });
  }

  set(name: string, value: PropertyValue, mode?: ModeArgument): boolean {
    unwrapOrThrow(this.setResult(name, value, mode), `set ${name}`);
    return true;
  }

  // ==========================================================================
  // Typed accessors
  // ==========================================================================

  get pan(): number {
    return this.getNumber("pan");
  }

  set pan(value: number | "auto") {
    this.set("pan", value);
  }

  get tilt(): number {
    return this.getNumber("tilt");
  }

  set tilt(value: number | "auto") {
    this.set("tilt", value);
  }

  get roll(): number {
    return this.getNumber("roll");
  }

  set roll(value: number | "auto") {
    this.set("roll", value);
  }

  get zoom(): number {
    return this.getNumber("zoom");
  }

  set zoom(value: number | "auto") {
    this.set("zoom", value);
  }

  get exposure(): number {
    return this.getNumber("exposure");
  }

  set exposure(value: number | "auto") {
    this.set("exposure", value);
  }

  get iris(): number {
    return this.getNumber("iris");
  }

  set iris(value: number | "auto") {
    this.set("iris", value);
  }

  get focus(): number {
    return this.getNumber("focus");
  }

  set focus(value: number | "auto") {
    this.set("focus", value);
  }

  get scanMode(): number {
    return this.getNumber("scan_mode");
  }

  set scanMode(value: number | "auto") {
    this.set("scan_mode", value);
  }

  get privacy(): boolean {
    return this.getBoolean("privacy");
  }

  set privacy(value: boolean) {
    this.set("privacy", value);
  }

  get focusSimple(): number {
    return this.getNumber("focus_simple");
  }

  set focusSimple(value: number | "auto") {
    this.set("focus_simple", value);
  }

  get digitalZoom(): number {
    return this.getNumber("digital_zoom");
  }

  set digitalZoom(value: number | "auto") {
    this.set("digital_zoom", value);
  }

  get backlightCompensation(): number {
    return this.getNumber("backlight_compensation");
  }

  set backlightCompensation(value: number | "auto") {
    this.set("backlight_compensation", value);
  }

  get lamp(): number {
    return this.getNumber("lamp");
  }

  set lamp(value: number | "auto") {
    this.set("lamp", value);
  }

  get brightness(): number {
    return this.getNumber("brightness");
  }

  set brightness(value: number | "auto") {
    this.set("brightness", value);
  }

  get contrast(): number {
    return this.getNumber("contrast");
  }

  set contrast(value: number | "auto") {
    this.set("contrast", value);
  }

  get hue(): number {
    return this.getNumber("hue");
  }

  set hue(value: number | "auto") {
    this.set("hue", value);
  }

  get saturation(): number {
    return this.getNumber("saturation");
  }

  set saturation(value: number | "auto") {
    this.set("saturation", value);
  }

  get sharpness(): number {
    return this.getNumber("sharpness");
  }

  set sharpness(value: number | "auto") {
    this.set("sharpness", value);
  }

  get gamma(): number {
    return this.getNumber("gamma");
  }

  set gamma(value: number | "auto") {
    this.set("gamma", value);
  }

  get colorEnable(): boolean {
    return this.getBoolean("color_enable");
  }

  set colorEnable(value: boolean) {
    this.set("color_enable", value);
  }

  get whiteBalance(): number {
    return this.getNumber("white_balance");
  }

  set whiteBalance(value: number | "auto") {
    this.set("white_balance", value);
  }

  get videoBacklightCompensation(): number {
    return this.getNumber("video_backlight_compensation");
  }

  set videoBacklightCompensation(value: number | "auto") {
    this.set("video_backlight_compensation", value);
  }

  get gain(): number {
    return this.getNumber("gain");
  }

  set gain(value: number | "auto") {
    this.set("gain", value);
  }

  // ==========================================================================
  // Batch
  // ==========================================================================

  /**
   * Values of every property that could be read; failures are omitted
   */
  getMultiple(names: readonly string[]): Record<string, number | boolean> {
    const values: Record<string, number | boolean> = {};
    for (const name of names) {
      const result = this.getResult(name);
      if (result.isOk()) {
        values[name] = result.value();
      } else {
        logDebug(`getMultiple: ${name} skipped (${result.error().description()})`);
      }
    }
    return values;
  }

  /**
   * Attempt every entry independently and report each outcome
   */
  setMultiple(
    values: Readonly<Record<string, PropertyValue>>,
    options: BatchOptions = {},
  ): PropertyStatusMap {
    const status: PropertyStatusMap = {};
    for (const [name, value] of Object.entries(values)) {
      const result = isPropertyValue(value)
        ? this.setResult(name, value)
        : err<void>(ErrorKind.InvalidValue, `Unsupported value for ${name}`);
      status[name] = result.isOk();
      if (result.isErr() && options.verbose) {
        logWarning(`Failed to set ${name}: ${result.error().description()}`);
      }
    }
    return status;
  }

  // ==========================================================================
  // State snapshots
  // ==========================================================================

  /**
   * Current value of every supported absolute property
   */
  getAllProperties(): Record<string, number | boolean> {
    return this.getMultiple(this.absoluteDescriptors().map((descriptor) => descriptor.name));
  }

  /**
   * Capture every readable absolute property. Properties in Auto mode are
   * saved as "auto" so a restore hands them back to the device.
   */
  saveState(): CameraState {
    const state: CameraState = {};
    for (const descriptor of this.absoluteDescriptors()) {
      const setting = this.getSettingResult(descriptor.name);
      if (setting.isErr()) {
        logDebug(`saveState: ${descriptor.name} skipped (${setting.error().description()})`);
        continue;
      }
      const { value, mode } = setting.value();
      if (mode === CamMode.Auto) {
        state[descriptor.name] = "auto";
      } else {
        state[descriptor.name] = descriptor.kind === "bool" ? value !== 0 : value;
      }
    }
    return state;
  }

  /**
   * Write a saved state back. Returns the names that could not be restored.
   */
  restoreState(state: Readonly<CameraState>): string[] {
    const status = this.setMultiple(state);
    const failures = Object.keys(status).filter((name) => !status[name]);
    if (failures.length > 0) {
      logWarning(`Could not restore ${failures.length} properties: ${failures.join(", ")}`);
    }
    return failures;
  }

  /**
   * Entries that differ between two states, keyed by property name
   */
  compareStates(before: Readonly<CameraState>, after: Readonly<CameraState>): Record<string, StateChange> {
    const changes: Record<string, StateChange> = {};
    for (const name of new Set([...Object.keys(before), ...Object.keys(after)])) {
      const from = Object.hasOwn(before, name) ? before[name] : null;
      const to = Object.hasOwn(after, name) ? after[name] : null;
      if (from !== to) {
        changes[name] = { before: from, after: to };
      }
    }
    return changes;
  }

  // ==========================================================================
  // Presets
  // ==========================================================================

  /**
   * Apply a custom preset, or a built-in one when no custom preset has the
   * name. Returns true when every entry was applied.
   */
  applyPreset(name: string): boolean {
    const preset = this.findPreset(name);
    if (!preset) {
      throw new PresetNotFoundError(name, this.getPresetNames());
    }
    const status = this.setMultiple(preset, { verbose: true });
    return Object.values(status).every(Boolean);
  }

  getPresetNames(): string[] {
    const names = Object.keys(BUILT_IN_PRESETS);
    for (const name of this.customPresets.keys()) {
      if (!names.includes(name)) names.push(name);
    }
    return names;
  }

  createCustomPreset(name: string, properties: Readonly<Record<string, PropertyValue>>): void {
    if (!name.trim()) {
      throw new InvalidArgumentError("Preset name must not be empty", "createCustomPreset");
    }
    for (const [property, value] of Object.entries(properties)) {
      if (!this.registry.has(property)) {
        throw new InvalidArgumentError(`Unknown property '${property}' in preset '${name}'`, "createCustomPreset");
      }
      if (!isPropertyValue(value)) {
        throw new InvalidArgumentError(`Unsupported value for '${property}' in preset '${name}'`, "createCustomPreset");
      }
    }
    this.customPresets.set(name, Object.freeze({ ...properties }));
  }

  getCustomPresets(): Record<string, Preset> {
    return Object.fromEntries(this.customPresets);
  }

  deleteCustomPreset(name: string): boolean {
    return this.customPresets.delete(name);
  }

  clearCustomPresets(): void {
    this.customPresets.clear();
  }

  /**
   * Apply the recommended value for one property
   */
  setSmartDefault(name: string): boolean {
    const descriptor = unwrapOrThrow(this.registry.resolve(name), "setSmartDefault");
    if (!Object.hasOwn(SMART_DEFAULTS, descriptor.name)) {
      throw new InvalidArgumentError(`No smart default for '${name}'`, "setSmartDefault");
    }
    const range = unwrapOrThrow(this.getPropertyRangeResult(descriptor.name), "setSmartDefault");
    return this.set(descriptor.name, resolveSmartDefault(SMART_DEFAULTS[descriptor.name], range));
  }

  // ==========================================================================
  // Relative motion
  // ==========================================================================

  /**
   * Move a property by delta. Uses the device's relative property when it has
   * one, otherwise reads, adds, and writes back. Both paths apply the set()
   * value policy: the delta (native) or the target (emulated) is rejected
   * when out of range, or clamped under clampValues.
   */
  moveRelativeResult(name: string, delta: number): Result<void> {
    return this.resolveSupported(name).andThen(({ descriptor, capability, camera }) => {
      if (!Number.isInteger(delta)) {
        return err(ErrorKind.InvalidValue, `Delta must be an integer (got ${delta})`);
      }

      const relative = this.nativeRelative(descriptor.key);
      if (relative) {
        return this.checkValue(descriptor, relative.capability.range, delta).andThen((accepted) =>
          recordOperation(camera.set(relative.key, new PropSetting(accepted, CamMode.Manual))),
        );
      }

      return recordOperation(camera.get(descriptor.key)).andThen((current) =>
        this.checkValue(descriptor, capability.range, current.value + delta).andThen((target) =>
          recordOperation(camera.set(descriptor.key, new PropSetting(target, CamMode.Manual))),
        ),
      );
    });
  }

  panRelative(delta: number): boolean {
    return this.moveRelative("pan", delta);
  }

  tiltRelative(delta: number): boolean {
    return this.moveRelative("tilt", delta);
  }

  rollRelative(delta: number): boolean {
    return this.moveRelative("roll", delta);
  }

  zoomRelative(delta: number): boolean {
    return this.moveRelative("zoom", delta);
  }

  focusRelative(delta: number): boolean {
    return this.moveRelative("focus", delta);
  }

  exposureRelative(delta: number): boolean {
    return this.moveRelative("exposure", delta);
  }

  irisRelative(delta: number): boolean {
    return this.moveRelative("iris", delta);
  }

  digitalZoomRelative(delta: number): boolean {
    return this.moveRelative("digital_zoom", delta);
  }

  // ==========================================================================
  // Pan / Tilt
  // ==========================================================================

  setPanTiltResult(pan: number, tilt: number): Result<void> {
    return this.capabilitiesResult().andThen((snapshot) => {
      const combined = snapshot.getCameraCapability(CamProp.PanTilt);
      if (!combined.supported) {
        return this.checkAxes(snapshot, pan, tilt, ABSOLUTE_AXES).andThen(([checkedPan, checkedTilt]) =>
          this.setResult("pan", checkedPan).andThen(() => this.setResult("tilt", checkedTilt)),
        );
      }

      return this.checkAxes(snapshot, pan, tilt, ABSOLUTE_AXES, combined.range)
        .andThen(packAxes)
        .andThen((packed) =>
          this.requireCamera().andThen((camera) =>
            recordOperation(
              camera.setCameraProperty(CamProp.PanTilt, new PropSetting(packed, CamMode.Manual)),
            ),
          ),
        );
    });
  }

  setPanTilt(pan: number, tilt: number): boolean {
    unwrapOrThrow(this.setPanTiltResult(pan, tilt), "setPanTilt");
    return true;
  }

  panTiltRelativeResult(panDelta: number, tiltDelta: number): Result<void> {
    return this.capabilitiesResult().andThen((snapshot) => {
      const combined = snapshot.getCameraCapability(CamProp.PanTiltRelative);
      if (!combined.supported) {
        return this.moveRelativeResult("pan", panDelta).andThen(() =>
          this.moveRelativeResult("tilt", tiltDelta),
        );
      }

      for (const delta of [panDelta, tiltDelta]) {
        if (!Number.isInteger(delta)) {
          return err(ErrorKind.InvalidValue, `Pan/tilt delta ${delta} must be an integer`);
        }
      }
      return this.checkAxes(snapshot, panDelta, tiltDelta, RELATIVE_AXES, combined.range)
        .andThen(packAxes)
        .andThen((packed) =>
          this.requireCamera().andThen((camera) =>
            recordOperation(
              camera.setCameraProperty(CamProp.PanTiltRelative, new PropSetting(packed, CamMode.Manual)),
            ),
          ),
        );
    });
  }

  panTiltRelative(panDelta: number, tiltDelta: number): boolean {
    unwrapOrThrow(this.panTiltRelativeResult(panDelta, tiltDelta), "panTiltRelative");
    return true;
  }

  // ==========================================================================
  // Reset / Center
  // ==========================================================================

  /**
   * Write each supported absolute property's default value and mode.
   * Returns the names that failed; a failure does not stop the rest.
   */
  resetToDefaults(): string[] {
    const snapshot = this.capabilities();
    const camera = this.core;
    const failures: string[] = [];

    for (const key of snapshot) {
      const descriptor = this.registry.describe(key);
      if (descriptor && (descriptor.relative || descriptor.combined)) {
        continue;
      }
      const range = snapshot.getCapability(key).range;
      const result = recordOperation(
        camera.set(key, new PropSetting(range.defaultValue, range.defaultMode)),
      );
      if (result.isErr()) {
        failures.push(descriptor?.name ?? propertyKeyToString(key));
      }
    }

    if (failures.length > 0) {
      logWarning(`Could not reset ${failures.length} properties: ${failures.join(", ")}`);
    }
    return failures;
  }

  /**
   * Move pan and tilt to 0, clamped into each axis's range. Returns the axes
   * that failed.
   */
  centerCamera(): string[] {
    const snapshot = this.capabilities();
    const failures: string[] = [];

    for (const name of ["pan", "tilt"]) {
      const descriptor = unwrapOrThrow(this.registry.resolve(name), "centerCamera");
      const capability = snapshot.getCapability(descriptor.key);
      if (!capability.supported) {
        continue;
      }
      const result = this.setResult(name, capability.range.clamp(0));
      if (result.isErr()) {
        failures.push(name);
      }
    }

    if (failures.length > 0) {
      logWarning(`Could not center ${failures.join(", ")}`);
    }
    return failures;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private getNumber(name: string): number {
    const value = this.get(name);
    return typeof value === "number" ? value : value ? 1 : 0;
  }

  private getBoolean(name: string): boolean {
    const value = this.get(name);
    return typeof value === "boolean" ? value : value !== 0;
  }

  private absoluteDescriptors(): PropertyDescriptor[] {
    const descriptors: PropertyDescriptor[] = [];
    for (const key of this.capabilities()) {
      const descriptor = this.registry.describe(key);
      if (descriptor && !descriptor.relative && !descriptor.combined) {
        descriptors.push(descriptor);
      }
    }
    return descriptors;
  }

  private requireCamera(): Result<Camera> {
    return this.camera ? ok(this.camera) : err(ErrorKind.DeviceNotFound, "Controller is closed");
  }

  private findPreset(name: string): Preset | undefined {
    const custom = this.customPresets.get(name);
    if (custom) {
      return custom;
    }
    return Object.hasOwn(BUILT_IN_PRESETS, name) ? BUILT_IN_PRESETS[name] : undefined;
  }

  /**
   * Resolve a name and confirm the snapshot lists it as supported, before
   * any device call
   */
  private resolveSupported(
    name: string,
  ): Result<{ descriptor: PropertyDescriptor; capability: PropertyCapability; camera: Camera }> {
    return this.registry.resolve(name).andThen((descriptor) =>
      this.requireCamera().andThen((camera) =>
        this.capabilitiesResult().andThen((snapshot) => {
          const capability = snapshot.getCapability(descriptor.key);
          if (!capability.supported) {
            return err(
              ErrorKind.PropertyNotSupported,
              `Property '${descriptor.name}' is not supported by ${this.device.name}`,
            );
          }
          return ok({ descriptor, capability, camera });
        }),
      ),
    );
  }

  /**
   * Apply the value policy: clamp when enabled, otherwise reject values the
   * range does not accept
   */
  private checkValue(descriptor: PropertyDescriptor, range: PropRange, value: number): Result<number> {
    if (!Number.isFinite(value)) {
      return err(ErrorKind.InvalidValue, `${descriptor.name}: ${value} is not a number`);
    }
    if (this.clampValues) {
      return ok(range.clamp(value));
    }
    if (!range.isValid(value)) {
      return err(
        ErrorKind.InvalidValue,
        `${descriptor.name}: ${value} outside [${range.min}, ${range.max}] step ${range.step}`,
      );
    }
    return ok(value);
  }

  /**
   * Validate a packed pan/tilt value: an integer whose axes each pass the
   * value policy
   */
  private checkPacked(descriptor: PropertyDescriptor, range: PropRange, value: number): Result<number> {
    if (!Number.isInteger(value)) {
      return err(ErrorKind.InvalidValue, `${descriptor.name}: ${value} is not an integer`);
    }
    const { pan, tilt } = unpackPanTilt(value);
    const axes = descriptor.relative ? RELATIVE_AXES : ABSOLUTE_AXES;
    return this.capabilitiesResult()
      .andThen((snapshot) => this.checkAxes(snapshot, pan, tilt, axes, range))
      .andThen(packAxes);
  }

  /**
   * Validate both axes before anything is written, against the per-axis
   * ranges when the device has them, else against the fallback range
   */
  private checkAxes(
    snapshot: DeviceCapabilities,
    pan: number,
    tilt: number,
    axes: AxisPair,
    fallback?: PropRange,
  ): Result<[number, number]> {
    const axis = ([name, prop]: [string, CamProp], value: number): Result<number> => {
      const capability = snapshot.getCameraCapability(prop);
      const descriptor = unwrapOrThrow(this.registry.resolve(name), "checkAxes");
      const range = capability.supported ? capability.range : fallback;
      if (!range) {
        return err(ErrorKind.PropertyNotSupported, `Property '${name}' is not supported by ${this.device.name}`);
      }
      return this.checkValue(descriptor, range, value);
    };

    return axis(axes.pan, pan).andThen((checkedPan) =>
      axis(axes.tilt, tilt).map((checkedTilt): [number, number] => [checkedPan, checkedTilt]),
    );
  }

  private nativeRelative(key: PropertyKey): { key: PropertyKey; capability: PropertyCapability } | null {
    if (key.domain !== "camera" || !this.snapshot) {
      return null;
    }
    const relative = ABSOLUTE_TO_RELATIVE.get(key.id);
    if (relative === undefined) {
      return null;
    }
    const capability = this.snapshot.getCameraCapability(relative);
    return capability.supported ? { key: { domain: "camera", id: relative }, capability } : null;
  }

  private moveRelative(name: string, delta: number): boolean {
    unwrapOrThrow(this.moveRelativeResult(name, delta), `${name} relative`);
    return true;
  }
}

// ============================================================================
// Module helpers
// ============================================================================

/**
 * Names of every enumerated camera
 */
export function listCameras(backend: DeviceBackend = getBackend()): string[] {
  return unwrapOrThrow(backend.listDevices(), "listCameras").map((device) => device.name);
}

/**
 * Open the first camera whose name contains the pattern (case-insensitive)
 */
export function findCamera(
  pattern: string,
  options: Omit<CameraControllerOptions, "deviceName" | "deviceIndex" | "device"> = {},
): CameraController {
  return new CameraController({ ...options, deviceName: pattern });
}
