/**
 * Relative and combined motion properties
 *
 * A relative property moves its absolute counterpart by the written delta.
 * The combined pan/tilt properties carry both axes in one integer,
 * pan * 65536 + tilt, with each axis a signed 16-bit value.
 */

import { CamProp } from "./types";

export const RELATIVE_TO_ABSOLUTE: ReadonlyMap<CamProp, CamProp> = new Map([
  [CamProp.PanRelative, CamProp.Pan],
  [CamProp.TiltRelative, CamProp.Tilt],
  [CamProp.RollRelative, CamProp.Roll],
  [CamProp.ZoomRelative, CamProp.Zoom],
  [CamProp.ExposureRelative, CamProp.Exposure],
  [CamProp.IrisRelative, CamProp.Iris],
  [CamProp.FocusRelative, CamProp.Focus],
  [CamProp.DigitalZoomRelative, CamProp.DigitalZoom],
]);

export const ABSOLUTE_TO_RELATIVE: ReadonlyMap<CamProp, CamProp> = new Map(
  Array.from(RELATIVE_TO_ABSOLUTE, ([relative, absolute]) => [absolute, relative]),
);

const AXIS_SPAN = 0x10000;

export function isCombinedPanTilt(prop: CamProp): boolean {
  return prop === CamProp.PanTilt || prop === CamProp.PanTiltRelative;
}

export function packPanTilt(pan: number, tilt: number): number {
  return pan * AXIS_SPAN + tilt;
}

export function unpackPanTilt(value: number): { pan: number; tilt: number } {
  const tilt = (value << 16) >> 16;
  return { pan: (value - tilt) / AXIS_SPAN, tilt };
}
