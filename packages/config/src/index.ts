/**
 * Shared configuration constants for the camctl control service
 */

export * from "./node";

// ============================================================================
// Service Ports
// ============================================================================

export const PORTS = {
  BACKEND: 4100,
} as const;

// ============================================================================
// API Endpoints
// ============================================================================

export const API_ENDPOINTS = {
  BACKEND_BASE: `http://localhost:${PORTS.BACKEND}`,

  // Device enumeration
  DEVICES: "/api/devices",
  DEVICE: "/api/devices/:index",
  DEVICE_CAPABILITIES: "/api/devices/:index/capabilities",
  DEVICE_INFO: "/api/devices/:index/info",

  // Property control
  PROPERTIES: "/api/devices/:index/properties",
  PROPERTY: "/api/devices/:index/properties/:name",
  PROPERTY_RANGE: "/api/devices/:index/properties/:name/range",
  PROPERTY_MOVE: "/api/devices/:index/properties/:name/move",
  PROPERTY_RESET: "/api/devices/:index/reset",
  PROPERTY_CENTER: "/api/devices/:index/center",

  // Presets
  PRESETS: "/api/devices/:index/presets",
  PRESET_APPLY: "/api/devices/:index/presets/:preset/apply",
  PRESET: "/api/devices/:index/presets/:preset",

  // Vendor extension properties
  VENDOR_PROPERTY: "/api/devices/:index/vendor/:guid/:propertyId",

  // Diagnostics
  DIAGNOSTICS: "/api/diagnostics",

  // WebSocket
  WS_DEVICES: "/ws/devices",
} as const;

// ============================================================================
// Application Constants
// ============================================================================

export const APP_CONFIG = {
  APP_NAME: "camctl",
  APP_VERSION: "0.1.0",

  // Simulated backend
  DEFAULT_SIMULATED_DEVICES: 2,

  // Retry settings for busy devices
  MAX_RETRY_ATTEMPTS: 3,
  RETRY_DELAY_MS: 250,
} as const;

// ============================================================================
// Environment Variable Keys
// ============================================================================

export const ENV_KEYS = {
  NODE_ENV: "NODE_ENV",
  LOG_LEVEL: "LOG_LEVEL",
  LOG_SILENT: "LOG_SILENT",

  // Backend
  BACKEND_PORT: "PORT",
  BACKEND_HOST: "HOST",

  // Device control
  DEVICE_BACKEND: "DEVICE_BACKEND",
  SIMULATED_DEVICES: "SIMULATED_DEVICES",
  CLAMP_VALUES: "CLAMP_VALUES",
  STRICT_STEP: "STRICT_STEP",
} as const;

// ============================================================================
// HTTP Status Codes
// ============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  NOT_IMPLEMENTED: 501,
  SERVICE_UNAVAILABLE: 503,
} as const;

export type HttpStatus = (typeof HTTP_STATUS)[keyof typeof HTTP_STATUS];

// ============================================================================
// Error Messages
// ============================================================================

export const ERROR_MESSAGES = {
  INTERNAL_ERROR: "An internal error occurred",
  NOT_FOUND: "Resource not found",
  VALIDATION_ERROR: "Validation failed",
  DEVICE_INDEX_INVALID: "Device index must be a non-negative integer",
  PRESET_BODY_INVALID: "Preset body must map property names to numbers, booleans or \"auto\"",
  PROPERTY_VALUE_INVALID: "Body must contain a value: a number, a boolean or \"auto\"",
  PROPERTY_MODE_INVALID: "Mode must be \"auto\" or \"manual\"",
  DELTA_INVALID: "Body must contain an integer delta",
  VENDOR_DATA_INVALID: "Vendor data must be a hex string or an array of bytes",
} as const;
