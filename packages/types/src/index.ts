// ============================================================================
// Property Types
// ============================================================================

export type ControlMode = "auto" | "manual";

/**
 * Value accepted by the façade's set(): an integer, a boolean for on/off
 * properties, or "auto" to hand control to the device
 */
export type PropertyValue = number | boolean | "auto";

export interface PropSettingDTO {
  value: number;
  mode: ControlMode;
}

export interface PropRangeDTO {
  min: number;
  max: number;
  step: number;
  default: number;
  defaultMode: ControlMode;
}

export interface CapabilityDTO {
  supported: boolean;
  supportsAuto: boolean;
  range: PropRangeDTO;
  current: PropSettingDTO;
}

// ============================================================================
// Device Types
// ============================================================================

export interface DeviceDTO {
  index: number;
  name: string;
  path: string;
}

export interface CapabilitiesDTO {
  device: { name: string; path: string };
  accessible: boolean;
  camera: Record<string, CapabilityDTO>;
  video: Record<string, CapabilityDTO>;
}

export type PropertyReport =
  | { supported: true; current: PropSettingDTO; range: PropRangeDTO }
  | { supported: false; error: string };

/**
 * Full per-device report: identity, connection state and every supported
 * property with its current value and range
 */
export interface DeviceReport {
  name: string;
  path: string;
  connected: boolean;
  cameraProperties: Record<string, PropertyReport>;
  videoProperties: Record<string, PropertyReport>;
  error?: string;
}

export interface SupportedProperties {
  camera: string[];
  video: string[];
}

/**
 * Per-key outcome of a batch set
 */
export type PropertyStatusMap = Record<string, boolean>;

export type Preset = Record<string, PropertyValue>;

/**
 * Saved property values; properties under device control are "auto"
 */
export type CameraState = Record<string, PropertyValue>;

/**
 * One differing entry between two states; null where a state lacks the
 * property
 */
export interface StateChange {
  before: PropertyValue | null;
  after: PropertyValue | null;
}

// ============================================================================
// API Types
// ============================================================================

export interface ApiSuccess<T> {
  success: true;
  data: T;
  message?: string;
}

export interface ApiFailure {
  success: false;
  error: string;
  message: string;
  errorKind?: string;
  suggestions?: string[];
}

export type ApiResponse<T> = ApiSuccess<T> | ApiFailure;

// ============================================================================
// WebSocket Events
// ============================================================================

export type DeviceEventType = "connection" | "device:added" | "device:removed" | "device:list";

export interface DeviceEvent<T = unknown> {
  type: DeviceEventType;
  data: T;
  timestamp: string;
}

export interface HotplugEventData {
  path: string;
  name?: string;
}
