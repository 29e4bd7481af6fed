/**
 * Device utilities
 *
 * Name lookups, whole-device reports and tuple-returning property helpers
 * built on the Camera and capability layers.
 */

import type {
  DeviceReport,
  PropertyReport,
  PropertyStatusMap,
  SupportedProperties,
} from "@camctl/types";
import { getBackend } from "./backend/factory";
import type { DeviceBackend } from "./backend/types";
import { Camera, propertyKeyToString } from "./camera";
import { DeviceCapabilities } from "./capabilities";
import type { Result } from "./result";
import { parseCamProp, parseVidProp } from "./strings";
import { CamMode, Device, PropSetting, PropertyKey } from "./types";

function nameMatches(device: Device, pattern: string): boolean {
  return device.name.toLowerCase().includes(pattern.toLowerCase());
}

/**
 * First device whose name contains the pattern (case-insensitive), or null
 */
export function findDeviceByName(pattern: string, backend: DeviceBackend = getBackend()): Result<Device | null> {
  return backend.listDevices().map((devices) => devices.find((device) => nameMatches(device, pattern)) ?? null);
}

export function findDevicesByName(pattern: string, backend: DeviceBackend = getBackend()): Result<Device[]> {
  return backend.listDevices().map((devices) => devices.filter((device) => nameMatches(device, pattern)));
}

/**
 * Identity, connection state, and every supported property with its
 * current value and range. A property that fails to read is reported with
 * its error instead.
 */
export function getDeviceInfo(device: Device, backend: DeviceBackend = getBackend()): DeviceReport {
  const connected = backend.isDeviceConnected(device);
  const report: DeviceReport = {
    name: device.name,
    path: device.path,
    connected: connected.isOk() && connected.value(),
    cameraProperties: {},
    videoProperties: {},
  };

  const scanned = DeviceCapabilities.scan(device, backend);
  if (scanned.isErr()) {
    report.error = scanned.error().description();
    return report;
  }

  const opened = Camera.open(device, { backend });
  if (opened.isErr()) {
    report.error = opened.error().description();
    return report;
  }

  const camera = opened.value();
  try {
    for (const key of scanned.value()) {
      const target = key.domain === "camera" ? report.cameraProperties : report.videoProperties;
      target[propertyKeyToString(key)] = describeProperty(camera, key);
    }
  } finally {
    camera.close();
  }
  return report;
}

function describeProperty(camera: Camera, key: PropertyKey): PropertyReport {
  const setting = camera.get(key);
  if (setting.isErr()) {
    return { supported: false, error: setting.error().description() };
  }
  const range = camera.getRange(key);
  if (range.isErr()) {
    return { supported: false, error: range.error().description() };
  }

  const { value, mode } = setting.value();
  const { min, max, step, defaultValue, defaultMode } = range.value();
  return {
    supported: true,
    current: { value, mode: mode === CamMode.Auto ? "auto" : "manual" },
    range: {
      min,
      max,
      step,
      default: defaultValue,
      defaultMode: defaultMode === CamMode.Auto ? "auto" : "manual",
    },
  };
}

/**
 * Write every supported property's default value and mode. Keys are
 * cam_<Property> and vid_<Property>; an empty map means the device could not
 * be scanned or opened.
 */
export function resetDeviceToDefaults(device: Device, backend: DeviceBackend = getBackend()): PropertyStatusMap {
  const results: PropertyStatusMap = {};

  const scanned = DeviceCapabilities.scan(device, backend);
  if (scanned.isErr()) {
    return results;
  }
  const opened = Camera.open(device, { backend });
  if (opened.isErr()) {
    return results;
  }

  const camera = opened.value();
  const snapshot = scanned.value();
  try {
    for (const key of snapshot) {
      const prefix = key.domain === "camera" ? "cam" : "vid";
      const range = snapshot.getCapability(key).range;
      const written = camera.set(key, new PropSetting(range.defaultValue, range.defaultMode));
      results[`${prefix}_${propertyKeyToString(key)}`] = written.isOk();
    }
  } finally {
    camera.close();
  }
  return results;
}

/**
 * Enum names of the supported properties per domain; empty lists when the
 * device cannot be scanned
 */
export function getSupportedProperties(device: Device, backend: DeviceBackend = getBackend()): SupportedProperties {
  const result: SupportedProperties = { camera: [], video: [] };
  const scanned = DeviceCapabilities.scan(device, backend);
  if (scanned.isOk()) {
    for (const key of scanned.value()) {
      result[key.domain].push(propertyKeyToString(key));
    }
  }
  return result;
}

function resolveDomainProperty(domain: string, propertyName: string): PropertyKey | null {
  switch (domain.toLowerCase()) {
    case "cam": {
      const id = parseCamProp(propertyName);
      return id === null ? null : { domain: "camera", id };
    }
    case "vid": {
      const id = parseVidProp(propertyName);
      return id === null ? null : { domain: "video", id };
    }
    default:
      return null;
  }
}

function unknownPropertyMessage(domain: string, propertyName: string): string {
  switch (domain.toLowerCase()) {
    case "cam":
      return `Unknown camera property: ${propertyName}`;
    case "vid":
      return `Unknown video property: ${propertyName}`;
    default:
      return `Invalid domain: ${domain}. Use 'cam' or 'vid'`;
  }
}

/**
 * Set a property by domain and enum name. Never throws; returns
 * [success, errorMessage].
 */
export function setPropertySafe(
  device: Device,
  /** "cam" or "vid", any case */
  domain: string,
  propertyName: string,
  value: number,
  mode = "manual",
  backend: DeviceBackend = getBackend(),
): [boolean, string] {
  const key = resolveDomainProperty(domain, propertyName);
  if (!key) {
    return [false, unknownPropertyMessage(domain, propertyName)];
  }

  const opened = Camera.open(device, { backend });
  if (opened.isErr()) {
    return [false, opened.error().description()];
  }
  const camera = opened.value();
  try {
    const setting = new PropSetting(value, mode.toLowerCase() === "auto" ? CamMode.Auto : CamMode.Manual);
    const written = camera.set(key, setting);
    return written.isOk() ? [true, ""] : [false, written.error().description()];
  } finally {
    camera.close();
  }
}

/**
 * Read a property by domain and enum name. Never throws; returns
 * [success, setting or null, errorMessage].
 */
export function getPropertySafe(
  device: Device,
  /** "cam" or "vid", any case */
  domain: string,
  propertyName: string,
  backend: DeviceBackend = getBackend(),
): [boolean, PropSetting | null, string] {
  const key = resolveDomainProperty(domain, propertyName);
  if (!key) {
    return [false, null, unknownPropertyMessage(domain, propertyName)];
  }

  const opened = Camera.open(device, { backend });
  if (opened.isErr()) {
    return [false, null, opened.error().description()];
  }
  const camera = opened.value();
  try {
    const setting = camera.get(key);
    return setting.isOk() ? [true, setting.value(), ""] : [false, null, setting.error().description()];
  } finally {
    camera.close();
  }
}
