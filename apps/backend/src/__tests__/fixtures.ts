/**
 * Simulated devices for the HTTP surface tests
 */

import { CamMode, CamProp, SimulatedBackend, VidProp } from "@camctl/device-control";

export const DESK_PATH = "sim://desk";
export const LOGITECH_SET = "82066163-7050-AB49-B8CC-B3855E8D221E";

export function deskBackend(): SimulatedBackend {
  return new SimulatedBackend([
    {
      name: "Desk Camera",
      path: DESK_PATH,
      camera: {
        [CamProp.Pan]: { min: -100, max: 100, step: 1, defaultValue: 0 },
        [CamProp.Tilt]: { min: -50, max: 50, step: 1, defaultValue: 0 },
        [CamProp.Zoom]: { min: 100, max: 400, step: 10, defaultValue: 100 },
      },
      video: {
        [VidProp.Brightness]: { min: 0, max: 255, step: 1, defaultValue: 128 },
        [VidProp.Contrast]: { min: 0, max: 100, step: 1, defaultValue: 50 },
        [VidProp.WhiteBalance]: {
          min: 2800,
          max: 6500,
          step: 100,
          defaultValue: 4600,
          defaultMode: CamMode.Auto,
        },
        [VidProp.Gain]: { min: 0, max: 100, step: 1, defaultValue: 10 },
      },
      vendor: [{ guid: LOGITECH_SET, id: 1, data: [1] }],
    },
  ]);
}
