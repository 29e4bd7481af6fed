/**
 * Camera and Capability Snapshot Tests
 *
 * Critical Invariants:
 * - A property is supported iff its range query succeeds
 * - Unsupported properties are queryable and report an empty capability
 * - An inaccessible device yields an empty, inaccessible snapshot, not an error
 * - A device range that violates the range invariants is a SystemError
 * - A closed or unplugged camera fails with DeviceNotFound
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SimulatedBackend } from "../backend/simulated";
import { Camera } from "../camera";
import { DeviceCapabilities, getDeviceCapabilities } from "../capabilities";
import { listDevices, isDeviceConnected, resolveDevice } from "../devices";
import { ErrorKind } from "../errors";
import { CamMode, CamProp, Device, PropSetting, VidProp } from "../types";
import { PTZ_PATH, WEBCAM_PATH, ptzSpec, webcamSpec } from "./fixtures";

describe("device enumeration", () => {
  const backend = new SimulatedBackend([webcamSpec(), ptzSpec()]);

  it("lists and resolves devices by index", () => {
    expect(listDevices(backend).value()).toHaveLength(2);
    expect(resolveDevice(1, backend).value().path).toBe(PTZ_PATH);
  });

  it("rejects an index outside the enumeration", () => {
    const result = resolveDevice(2, backend);

    expect(result.error().code).toBe(ErrorKind.DeviceNotFound);
    expect(result.error().message).toBe("Invalid device index");
  });

  it("rejects a device without a path", () => {
    expect(resolveDevice(new Device("Nameless"), backend).error().code).toBe(ErrorKind.InvalidArgument);
    expect(isDeviceConnected(new Device(), backend).error().message).toBe("Invalid device");
  });
});

describe("Camera", () => {
  let backend: SimulatedBackend;

  beforeEach(() => {
    backend = new SimulatedBackend([webcamSpec(), ptzSpec()]);
  });

  it("opens by index and reads properties in both domains", () => {
    const camera = Camera.open(0, { backend }).value();

    expect(camera.device.path).toBe(WEBCAM_PATH);
    expect(camera.getCameraProperty(CamProp.Pan).value().value).toBe(0);
    expect(camera.getVideoProperty(VidProp.Contrast).value().value).toBe(50);
  });

  it("writes through the domain-tagged API", () => {
    const camera = Camera.open(0, { backend }).value();
    const key = { domain: "video", id: VidProp.Contrast } as const;

    expect(camera.set(key, new PropSetting(70)).isOk()).toBe(true);
    expect(camera.get(key).value().value).toBe(70);
  });

  it("returns validated ranges carrying the step policy", () => {
    const camera = Camera.open(0, { backend, stepPolicy: "strict" }).value();
    const range = camera.getCameraPropertyRange(CamProp.Zoom).value();

    expect(range.toJSON()).toEqual({ min: 100, max: 400, step: 10, default: 100, defaultMode: "manual" });
    expect(range.stepPolicy).toBe("strict");
    expect(range.isValid(105)).toBe(false);
  });

  it("reports a malformed device range as a SystemError", () => {
    backend.addDevice({
      name: "Broken",
      path: "sim://broken",
      camera: { [CamProp.Zoom]: { min: 10, max: 0, step: 1, defaultValue: 5 } },
    });
    const camera = Camera.open(new Device("Broken", "sim://broken"), { backend }).value();
    const result = camera.getCameraPropertyRange(CamProp.Zoom);

    expect(result.error().code).toBe(ErrorKind.SystemError);
    expect(result.error().message).toBe("Malformed capability data: min (10) exceeds max (0)");
  });

  it("fails every call after close", () => {
    const camera = Camera.open(0, { backend }).value();
    camera.close();

    expect(camera.isValid()).toBe(false);
    const result = camera.getVideoProperty(VidProp.Brightness);
    expect(result.error().code).toBe(ErrorKind.DeviceNotFound);
    expect(result.error().message).toBe("Camera is closed");
  });

  it("fails with DeviceNotFound once the device is unplugged", () => {
    const camera = Camera.open(0, { backend }).value();
    backend.removeDevice(WEBCAM_PATH);

    const result = camera.getVideoProperty(VidProp.Brightness);
    expect(result.error().code).toBe(ErrorKind.DeviceNotFound);
    expect(result.error().message).toBe("Device Test Webcam is no longer connected");
  });

  it("surfaces DeviceBusy from open", () => {
    backend.setBusy(PTZ_PATH, true);

    expect(Camera.open(1, { backend }).error().code).toBe(ErrorKind.DeviceBusy);
  });
});

describe("DeviceCapabilities", () => {
  let backend: SimulatedBackend;
  const webcam = new Device("Test Webcam", WEBCAM_PATH);

  beforeEach(() => {
    backend = new SimulatedBackend([webcamSpec(), ptzSpec()]);
  });

  it("lists supported properties in enum order", () => {
    const capabilities = DeviceCapabilities.scan(webcam, backend).value();

    expect(capabilities.isDeviceAccessible()).toBe(true);
    expect(capabilities.supportedCameraProperties()).toEqual([
      CamProp.Pan,
      CamProp.Tilt,
      CamProp.Zoom,
      CamProp.Focus,
      CamProp.Privacy,
    ]);
    expect(capabilities.supportedVideoProperties()).toEqual([
      VidProp.Brightness,
      VidProp.Contrast,
      VidProp.Saturation,
      VidProp.ColorEnable,
      VidProp.WhiteBalance,
      VidProp.Gain,
    ]);
    expect(capabilities.size).toBe(11);
  });

  it("records range and current setting per property", () => {
    const capabilities = DeviceCapabilities.scan(webcam, backend).value();
    const whiteBalance = capabilities.getVideoCapability(VidProp.WhiteBalance);

    expect(whiteBalance.supported).toBe(true);
    expect(whiteBalance.supportsAuto()).toBe(true);
    expect(whiteBalance.range.step).toBe(100);
    expect(whiteBalance.current.toJSON()).toEqual({ value: 4600, mode: CamMode.Auto });
  });

  it("reports unsupported properties with an empty capability", () => {
    const capabilities = DeviceCapabilities.scan(webcam, backend).value();
    const iris = capabilities.getCameraCapability(CamProp.Iris);

    expect(iris.supported).toBe(false);
    expect(iris.range.max).toBe(0);
    expect(capabilities.supports({ domain: "camera", id: CamProp.Iris })).toBe(false);
  });

  it("iterates camera keys before video keys", () => {
    const capabilities = DeviceCapabilities.scan(new Device("Test PTZ", PTZ_PATH), backend).value();
    const keys = Array.from(capabilities);

    expect(keys[0]).toEqual({ domain: "camera", id: CamProp.Pan });
    expect(keys[keys.length - 1]).toEqual({ domain: "video", id: VidProp.Brightness });
    expect(keys).toHaveLength(8);
  });

  it("serializes with enum names as keys", () => {
    const json = DeviceCapabilities.scan(webcam, backend).value().toJSON();

    expect(json.device).toEqual({ name: "Test Webcam", path: WEBCAM_PATH });
    expect(json.accessible).toBe(true);
    expect(Object.keys(json.camera)).toEqual(["Pan", "Tilt", "Zoom", "Focus", "Privacy"]);
    expect(json.video.Gain).toEqual({
      supported: true,
      supportsAuto: false,
      range: { min: 0, max: 100, step: 1, default: 10, defaultMode: "manual" },
      current: { value: 10, mode: "manual" },
    });
  });

  it("yields an empty inaccessible snapshot for a busy device", () => {
    backend.setBusy(WEBCAM_PATH, true);
    const capabilities = DeviceCapabilities.scan(webcam, backend).value();

    expect(capabilities.isDeviceAccessible()).toBe(false);
    expect(capabilities.size).toBe(0);
  });

  it("yields an empty inaccessible snapshot for a missing device", () => {
    const capabilities = DeviceCapabilities.scan(new Device("Ghost", "sim://ghost"), backend).value();

    expect(capabilities.isDeviceAccessible()).toBe(false);
  });

  it("fails the scan for a malformed range", () => {
    backend.addDevice({
      name: "Broken",
      path: "sim://broken",
      camera: { [CamProp.Zoom]: { min: 10, max: 0, step: 1, defaultValue: 5 } },
    });
    const result = DeviceCapabilities.scan(new Device("Broken", "sim://broken"), backend);

    expect(result.error().code).toBe(ErrorKind.SystemError);
    expect(result.error().message).toBe("Malformed capability data: min (10) exceeds max (0) (Zoom)");
  });

  it("refresh picks up new values", () => {
    const capabilities = DeviceCapabilities.scan(webcam, backend).value();
    const camera = Camera.open(webcam, { backend }).value();
    camera.setVideoProperty(VidProp.Brightness, new PropSetting(200));

    expect(capabilities.getVideoCapability(VidProp.Brightness).current.value).toBe(128);
    expect(capabilities.refresh().isOk()).toBe(true);
    expect(capabilities.getVideoCapability(VidProp.Brightness).current.value).toBe(200);
  });

  it("refresh of an unplugged device fails and marks it inaccessible", () => {
    const capabilities = DeviceCapabilities.scan(webcam, backend).value();
    backend.removeDevice(WEBCAM_PATH);

    const result = capabilities.refresh();
    expect(result.error().code).toBe(ErrorKind.DeviceNotFound);
    expect(result.error().message).toBe("Device not connected");
    expect(capabilities.isDeviceAccessible()).toBe(false);
  });

  it("getDeviceCapabilities resolves an index", () => {
    const capabilities = getDeviceCapabilities(1, { backend }).value();

    expect(capabilities.device.path).toBe(PTZ_PATH);
    expect(capabilities.supportsCameraProperty(CamProp.PanTilt)).toBe(true);
  });
});
