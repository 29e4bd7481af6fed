/**
 * Simulated devices shared by the device-control tests
 */

import type { SimulatedDeviceSpec } from "../backend/simulated";
import { CamMode, CamProp, VidProp } from "../types";

export const WEBCAM_PATH = "sim://test/webcam";
export const PTZ_PATH = "sim://test/ptz";

/**
 * Fixed-lens camera with no relative or combined properties
 */
export function webcamSpec(): SimulatedDeviceSpec {
  return {
    name: "Test Webcam",
    path: WEBCAM_PATH,
    camera: {
      [CamProp.Pan]: { min: -100, max: 100, step: 1, defaultValue: 0 },
      [CamProp.Tilt]: { min: -50, max: 50, step: 1, defaultValue: 0 },
      [CamProp.Zoom]: { min: 100, max: 400, step: 10, defaultValue: 100 },
      [CamProp.Focus]: { min: 0, max: 255, step: 1, defaultValue: 30, defaultMode: CamMode.Auto },
      [CamProp.Privacy]: { min: 0, max: 1, step: 1, defaultValue: 0 },
    },
    video: {
      [VidProp.Brightness]: { min: 0, max: 255, step: 1, defaultValue: 128 },
      [VidProp.Contrast]: { min: 0, max: 100, step: 1, defaultValue: 50 },
      [VidProp.Saturation]: { min: 0, max: 200, step: 1, defaultValue: 100 },
      [VidProp.WhiteBalance]: {
        min: 2800,
        max: 6500,
        step: 100,
        defaultValue: 4600,
        defaultMode: CamMode.Auto,
      },
      [VidProp.ColorEnable]: { min: 0, max: 1, step: 1, defaultValue: 1 },
      [VidProp.Gain]: { min: 0, max: 100, step: 1, defaultValue: 10 },
    },
    vendor: [{ guid: "82066163-7050-AB49-B8CC-B3855E8D221E", id: 1, data: [1] }],
  };
}

/**
 * Pan/tilt/zoom camera with native relative and combined properties
 */
export function ptzSpec(): SimulatedDeviceSpec {
  return {
    name: "Test PTZ",
    path: PTZ_PATH,
    camera: {
      [CamProp.Pan]: { min: -180, max: 180, step: 1, defaultValue: 0 },
      [CamProp.Tilt]: { min: -90, max: 90, step: 1, defaultValue: 0 },
      [CamProp.Zoom]: { min: 0, max: 1000, step: 1, defaultValue: 0 },
      [CamProp.PanRelative]: { min: -20, max: 20, step: 1, defaultValue: 0 },
      [CamProp.TiltRelative]: { min: -20, max: 20, step: 1, defaultValue: 0 },
      [CamProp.PanTilt]: { min: -180, max: 180, step: 1, defaultValue: 0 },
      [CamProp.PanTiltRelative]: { min: -20, max: 20, step: 1, defaultValue: 0 },
    },
    video: {
      [VidProp.Brightness]: { min: 0, max: 100, step: 1, defaultValue: 50 },
    },
  };
}
