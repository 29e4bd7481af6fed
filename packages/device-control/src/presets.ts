/**
 * Presets and smart defaults
 *
 * Built-in presets are fixed property maps applied through the façade's
 * batch set. Smart defaults are per-property recommendations that may be
 * relative to the device's range.
 */

import type { PropertyValue } from "@camctl/types";
import type { PropRange } from "./types";
import data from "./data/presets.json";

export type Preset = Readonly<Record<string, PropertyValue>>;

/**
 * A recommended value: absolute, "auto", a range anchor, or a percentage of
 * the range
 */
export type SmartDefault =
  | { kind: "value"; value: number }
  | { kind: "auto" }
  | { kind: "min" }
  | { kind: "max" }
  | { kind: "default" }
  | { kind: "percent"; percent: number };

/**
 * Property names a preset may set
 */
export const PRESET_PROPERTIES: readonly string[] = Object.freeze([
  "brightness",
  "contrast",
  "saturation",
  "hue",
  "white_balance",
  "exposure",
  "gain",
  "pan",
  "tilt",
  "zoom",
  "sharpness",
  "gamma",
  "focus",
]);

function parsePresetValue(presetName: string, value: number | string): PropertyValue {
  if (typeof value === "number" || value === "auto") {
    return value;
  }
  throw new Error(`Preset '${presetName}' has unsupported value '${value}'`);
}

function parseSmartDefault(property: string, value: number | string): SmartDefault {
  if (typeof value === "number") {
    return { kind: "value", value };
  }
  switch (value) {
    case "auto":
    case "min":
    case "max":
    case "default":
      return { kind: value };
  }
  const percent = /^(\d+(?:\.\d+)?)%$/.exec(value);
  if (percent) {
    return { kind: "percent", percent: Number(percent[1]) };
  }
  throw new Error(`Smart default for '${property}' has unsupported value '${value}'`);
}

function loadBuiltInPresets(): Readonly<Record<string, Preset>> {
  const presets: Record<string, Record<string, number | string>> = data.builtIn;
  const result: Record<string, Preset> = {};
  for (const [name, entries] of Object.entries(presets)) {
    const preset: Record<string, PropertyValue> = {};
    for (const [property, value] of Object.entries(entries)) {
      preset[property] = parsePresetValue(name, value);
    }
    result[name] = Object.freeze(preset);
  }
  return Object.freeze(result);
}

function loadSmartDefaults(): Readonly<Record<string, SmartDefault>> {
  const defaults: Record<string, number | string> = data.smartDefaults;
  const result: Record<string, SmartDefault> = {};
  for (const [property, value] of Object.entries(defaults)) {
    result[property] = Object.freeze(parseSmartDefault(property, value));
  }
  return Object.freeze(result);
}

export const BUILT_IN_PRESETS = loadBuiltInPresets();

export const SMART_DEFAULTS = loadSmartDefaults();

/**
 * Concrete value for a smart default against a property's range
 */
export function resolveSmartDefault(smartDefault: SmartDefault, range: PropRange): number | "auto" {
  switch (smartDefault.kind) {
    case "value":
      return range.clamp(smartDefault.value);
    case "auto":
      return "auto";
    case "min":
      return range.min;
    case "max":
      return range.max;
    case "default":
      return range.defaultValue;
    case "percent":
      return range.clamp(range.min + ((range.max - range.min) * smartDefault.percent) / 100);
  }
}
