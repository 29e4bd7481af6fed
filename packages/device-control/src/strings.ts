/**
 * String conversions for enums
 */

import { ALL_CAM_PROPS, ALL_VID_PROPS, CamMode, CamProp, VidProp } from "./types";

export function camPropToString(prop: CamProp): string {
  return CamProp[prop] ?? "Unknown";
}

export function vidPropToString(prop: VidProp): string {
  return VidProp[prop] ?? "Unknown";
}

export function camModeToString(mode: CamMode): string {
  return mode === CamMode.Auto ? "AUTO" : "MANUAL";
}

/**
 * Case-insensitive lookup of a CamProp by its identifier, e.g. "pan" or "PanTilt"
 */
export function parseCamProp(name: string): CamProp | null {
  const wanted = name.trim().toLowerCase();
  return ALL_CAM_PROPS.find((prop) => camPropToString(prop).toLowerCase() === wanted) ?? null;
}

export function parseVidProp(name: string): VidProp | null {
  const wanted = name.trim().toLowerCase();
  return ALL_VID_PROPS.find((prop) => vidPropToString(prop).toLowerCase() === wanted) ?? null;
}

export function parseCamMode(mode: string): CamMode | null {
  switch (mode.trim().toLowerCase()) {
    case "auto":
      return CamMode.Auto;
    case "manual":
      return CamMode.Manual;
    default:
      return null;
  }
}
