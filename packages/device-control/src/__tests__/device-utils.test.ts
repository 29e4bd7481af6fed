/**
 * Device Utility Tests
 *
 * Critical Invariants:
 * - Name lookups are case-insensitive substring matches
 * - Safe helpers never throw and always close the connection they open
 * - Reports and reset maps use the enum names of the properties
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SimulatedBackend } from "../backend/simulated";
import {
  findDeviceByName,
  findDevicesByName,
  getDeviceInfo,
  getPropertySafe,
  getSupportedProperties,
  resetDeviceToDefaults,
  setPropertySafe,
} from "../device-utils";
import { CamMode, CamProp, Device, VidProp } from "../types";
import { PTZ_PATH, WEBCAM_PATH, ptzSpec, webcamSpec } from "./fixtures";

describe("device utilities", () => {
  let backend: SimulatedBackend;
  const webcam = new Device("Test Webcam", WEBCAM_PATH);

  beforeEach(() => {
    backend = new SimulatedBackend([webcamSpec(), ptzSpec()]);
  });

  describe("name lookup", () => {
    it("finds the first device containing the pattern", () => {
      expect(findDeviceByName("ptz", backend).value()?.path).toBe(PTZ_PATH);
      expect(findDeviceByName("TEST", backend).value()?.path).toBe(WEBCAM_PATH);
      expect(findDeviceByName("missing", backend).value()).toBeNull();
    });

    it("finds every matching device", () => {
      expect(findDevicesByName("test", backend).value()).toHaveLength(2);
      expect(findDevicesByName("webcam", backend).value()).toHaveLength(1);
    });
  });

  describe("getDeviceInfo", () => {
    it("reports each supported property with value and range", () => {
      const report = getDeviceInfo(webcam, backend);

      expect(report.connected).toBe(true);
      expect(report.error).toBeUndefined();
      expect(Object.keys(report.cameraProperties)).toEqual(["Pan", "Tilt", "Zoom", "Focus", "Privacy"]);
      expect(report.videoProperties.WhiteBalance).toEqual({
        supported: true,
        current: { value: 4600, mode: "auto" },
        range: { min: 2800, max: 6500, step: 100, default: 4600, defaultMode: "auto" },
      });
    });

    it("reports the open failure for a busy device", () => {
      backend.setBusy(WEBCAM_PATH, true);
      const report = getDeviceInfo(webcam, backend);

      expect(report.error).toBe("Device is busy or in use: Device 'Test Webcam' is in use");
      expect(report.cameraProperties).toEqual({});
    });
  });

  describe("getSupportedProperties", () => {
    it("lists enum names per domain", () => {
      expect(getSupportedProperties(new Device("Test PTZ", PTZ_PATH), backend)).toEqual({
        camera: ["Pan", "Tilt", "Zoom", "PanRelative", "TiltRelative", "PanTilt", "PanTiltRelative"],
        video: ["Brightness"],
      });
    });

    it("returns empty lists for a missing device", () => {
      expect(getSupportedProperties(new Device("Ghost", "sim://ghost"), backend)).toEqual({
        camera: [],
        video: [],
      });
    });
  });

  describe("resetDeviceToDefaults", () => {
    it("writes every default and reports per property", () => {
      setPropertySafe(webcam, "vid", "Brightness", 10, "manual", backend);
      const results = resetDeviceToDefaults(webcam, backend);

      expect(Object.keys(results)).toHaveLength(11);
      expect(results.vid_Brightness).toBe(true);
      expect(results.cam_Focus).toBe(true);
      expect(backend.peek(WEBCAM_PATH, { domain: "video", id: VidProp.Brightness })?.value).toBe(128);
    });

    it("returns an empty map when the device cannot be opened", () => {
      backend.setBusy(WEBCAM_PATH, true);

      expect(resetDeviceToDefaults(webcam, backend)).toEqual({});
    });
  });

  describe("safe property access", () => {
    it("sets and gets by domain and enum name", () => {
      expect(setPropertySafe(webcam, "VID", "contrast", 75, "manual", backend)).toEqual([true, ""]);

      const [ok, setting, message] = getPropertySafe(webcam, "vid", "Contrast", backend);
      expect(ok).toBe(true);
      expect(setting?.toJSON()).toEqual({ value: 75, mode: CamMode.Manual });
      expect(message).toBe("");
    });

    it("writes auto mode", () => {
      setPropertySafe(webcam, "cam", "Focus", 40, "AUTO", backend);

      expect(backend.peek(WEBCAM_PATH, { domain: "camera", id: CamProp.Focus })?.mode).toBe(CamMode.Auto);
    });

    it("reports unknown names and domains", () => {
      expect(setPropertySafe(webcam, "cam", "Sparkle", 1, "manual", backend)).toEqual([
        false,
        "Unknown camera property: Sparkle",
      ]);
      expect(getPropertySafe(webcam, "vid", "Sparkle", backend)).toEqual([
        false,
        null,
        "Unknown video property: Sparkle",
      ]);
      expect(getPropertySafe(webcam, "audio", "Volume", backend)).toEqual([
        false,
        null,
        "Invalid domain: audio. Use 'cam' or 'vid'",
      ]);
    });

    it("reports device errors as descriptions", () => {
      expect(setPropertySafe(webcam, "vid", "Brightness", 300, "manual", backend)).toEqual([
        false,
        "Property value out of range: Value 300 outside [0, 255]",
      ]);
      expect(getPropertySafe(webcam, "cam", "Iris", backend)[0]).toBe(false);
    });
  });
});
