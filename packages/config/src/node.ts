/**
 * Node.js-specific configuration
 * These require Node.js environment (process.env access)
 */

// ============================================================================
// Paths Configuration
// ============================================================================

export const PATHS = {
  /** Log files */
  LOGS: "./logs",
  ERROR_LOG: "./logs/error.log",
  COMBINED_LOG: "./logs/combined.log",
} as const;

// ============================================================================
// Environment Detection
// ============================================================================

export function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

export function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}
