/**
 * Property identity, range and device model
 */

import { ErrorKind } from "./errors";
import { InvalidValueError } from "./exceptions";
import { Result, err, ok } from "./result";

// ============================================================================
// Property Identifiers
// ============================================================================

/**
 * Camera-motion / optics domain
 */
export enum CamProp {
  Pan = 0,
  Tilt,
  Roll,
  Zoom,
  Exposure,
  Iris,
  Focus,
  ScanMode,
  Privacy,
  PanRelative,
  TiltRelative,
  RollRelative,
  ZoomRelative,
  ExposureRelative,
  IrisRelative,
  FocusRelative,
  PanTilt,
  PanTiltRelative,
  FocusSimple,
  DigitalZoom,
  DigitalZoomRelative,
  BacklightCompensation,
  Lamp,
}

/**
 * Video / image-processing domain
 */
export enum VidProp {
  Brightness = 0,
  Contrast,
  Hue,
  Saturation,
  Sharpness,
  Gamma,
  ColorEnable,
  WhiteBalance,
  BacklightCompensation,
  Gain,
}

export const ALL_CAM_PROPS: readonly CamProp[] = Object.values(CamProp).filter(
  (value): value is CamProp => typeof value === "number",
);

export const ALL_VID_PROPS: readonly VidProp[] = Object.values(VidProp).filter(
  (value): value is VidProp => typeof value === "number",
);

export enum CamMode {
  Auto = "auto",
  Manual = "manual",
}

export type PropertyDomain = "camera" | "video";

/**
 * A property identifier tagged with its domain
 */
export type PropertyKey =
  | { readonly domain: "camera"; readonly id: CamProp }
  | { readonly domain: "video"; readonly id: VidProp };

// ============================================================================
// PropSetting
// ============================================================================

export class PropSetting {
  constructor(
    public value: number,
    public mode: CamMode = CamMode.Manual,
  ) {}

  equals(other: PropSetting): boolean {
    return this.value === other.value && this.mode === other.mode;
  }

  toJSON(): { value: number; mode: CamMode } {
    return { value: this.value, mode: this.mode };
  }
}

// ============================================================================
// PropRange
// ============================================================================

/**
 * Whether isValid() also requires (value - min) to be a multiple of step
 */
export type StepPolicy = "lenient" | "strict";

export interface PropRangeInit {
  min: number;
  max: number;
  step: number;
  defaultValue: number;
  defaultMode?: CamMode;
  stepPolicy?: StepPolicy;
}

export interface PropRangeJSON {
  min: number;
  max: number;
  step: number;
  default: number;
  defaultMode: CamMode;
}

export class PropRange {
  readonly min: number;
  readonly max: number;
  readonly step: number;
  readonly defaultValue: number;
  readonly defaultMode: CamMode;
  readonly stepPolicy: StepPolicy;

  constructor(init: PropRangeInit) {
    const problem = PropRange.validate(init);
    if (problem) {
      throw new InvalidValueError(problem, "PropRange");
    }
    this.min = init.min;
    this.max = init.max;
    this.step = init.step;
    this.defaultValue = init.defaultValue;
    this.defaultMode = init.defaultMode ?? CamMode.Manual;
    this.stepPolicy = init.stepPolicy ?? "lenient";
    Object.freeze(this);
  }

  /**
   * Returns a description of the first violated invariant, or null
   */
  static validate(init: PropRangeInit): string | null {
    const fields: [string, number][] = [
      ["min", init.min],
      ["max", init.max],
      ["step", init.step],
      ["default", init.defaultValue],
    ];
    for (const [name, value] of fields) {
      if (!Number.isInteger(value)) {
        return `${name} must be an integer (got ${value})`;
      }
    }
    if (init.min > init.max) {
      return `min (${init.min}) exceeds max (${init.max})`;
    }
    if (init.step <= 0) {
      return `step must be positive (got ${init.step})`;
    }
    if (init.defaultValue < init.min || init.defaultValue > init.max) {
      return `default ${init.defaultValue} outside [${init.min}, ${init.max}]`;
    }
    return null;
  }

  static tryCreate(init: PropRangeInit): Result<PropRange> {
    const problem = PropRange.validate(init);
    return problem ? err(ErrorKind.InvalidValue, problem) : ok(new PropRange(init));
  }

  /**
   * Placeholder range carried by unsupported capabilities
   */
  static zero(): PropRange {
    return new PropRange({ min: 0, max: 0, step: 1, defaultValue: 0 });
  }

  isValid(value: number): boolean {
    if (!Number.isInteger(value) || value < this.min || value > this.max) {
      return false;
    }
    return this.stepPolicy === "lenient" || (value - this.min) % this.step === 0;
  }

  /**
   * Saturate into [min, max]. Under the strict policy the result is also
   * snapped to the nearest step at or below max. NaN maps to min.
   */
  clamp(value: number): number {
    if (Number.isNaN(value)) {
      return this.min;
    }
    const saturated = Math.min(this.max, Math.max(this.min, Math.round(value)));
    if (this.stepPolicy === "lenient") {
      return saturated;
    }
    const steps = Math.round((saturated - this.min) / this.step);
    const snapped = this.min + steps * this.step;
    return snapped > this.max ? snapped - this.step : snapped;
  }

  withStepPolicy(stepPolicy: StepPolicy): PropRange {
    return new PropRange({ ...this.toInit(), stepPolicy });
  }

  toInit(): PropRangeInit {
    return {
      min: this.min,
      max: this.max,
      step: this.step,
      defaultValue: this.defaultValue,
      defaultMode: this.defaultMode,
      stepPolicy: this.stepPolicy,
    };
  }

  toJSON(): PropRangeJSON {
    return {
      min: this.min,
      max: this.max,
      step: this.step,
      default: this.defaultValue,
      defaultMode: this.defaultMode,
    };
  }
}

// ============================================================================
// PropertyCapability
// ============================================================================

export class PropertyCapability {
  constructor(
    readonly supported: boolean,
    readonly range: PropRange,
    readonly current: PropSetting,
  ) {}

  static unsupported(): PropertyCapability {
    return new PropertyCapability(false, PropRange.zero(), new PropSetting(0, CamMode.Manual));
  }

  supportsAuto(): boolean {
    return this.supported && this.range.defaultMode === CamMode.Auto;
  }
}

// ============================================================================
// Device
// ============================================================================

/**
 * Identity of a physical device. Equality and hashing use the path only; the
 * display name may collide between identical models.
 */
export class Device {
  constructor(
    readonly name: string = "",
    readonly path: string = "",
  ) {
    Object.freeze(this);
  }

  isValid(): boolean {
    return this.path.length > 0;
  }

  equals(other: Device): boolean {
    return this.path === other.path;
  }

  hashKey(): string {
    return this.path;
  }

  getId(): string {
    return this.path || this.name;
  }

  toString(): string {
    return `Device(name='${this.name}', path='${this.path}')`;
  }

  toJSON(): { name: string; path: string } {
    return { name: this.name, path: this.path };
  }
}
