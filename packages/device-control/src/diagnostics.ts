/**
 * Error diagnostics
 *
 * Retry classification, resolution hints, and process-wide error statistics
 * fed by the façade.
 */

import { getBackend } from "./backend/factory";
import { ErrorKind, errorKindName } from "./errors";
import { getLogLevel, logLevelToString } from "./logging";
import type { Result } from "./result";
import suggestions from "./data/suggestions.json";

// ============================================================================
// Classification
// ============================================================================

/**
 * Failures likely to clear by themselves
 */
export function shouldRetryOperation(kind: ErrorKind): boolean {
  return kind === ErrorKind.DeviceBusy;
}

export function isTemporaryError(kind: ErrorKind): boolean {
  return kind === ErrorKind.DeviceBusy;
}

/**
 * Failures caused by how the library was called rather than by the device
 */
export function isUserError(kind: ErrorKind): boolean {
  return kind === ErrorKind.InvalidArgument || kind === ErrorKind.InvalidValue;
}

/**
 * Ordered resolution hints for an error kind, followed by general hints
 */
export function suggestErrorResolution(kind: ErrorKind): string[] {
  const table: Record<string, string[]> = suggestions;
  const specific = table[errorKindName(kind)] ?? suggestions.default;
  return [...specific, ...suggestions.general];
}

// ============================================================================
// Statistics
// ============================================================================

export interface ErrorStatistics {
  totalOperations: number;
  totalErrors: number;
  /** Error count keyed by ErrorKind name */
  byKind: Record<string, number>;
}

let totalOperations = 0;
let totalErrors = 0;
const errorCounts = new Map<ErrorKind, number>();

/**
 * Count one operation, and its error kind when it failed
 */
export function recordOperation<T>(result: Result<T>): Result<T> {
  totalOperations++;
  if (result.isErr()) {
    totalErrors++;
    const kind = result.error().code;
    errorCounts.set(kind, (errorCounts.get(kind) ?? 0) + 1);
  }
  return result;
}

export function getErrorStatistics(): ErrorStatistics {
  const byKind: Record<string, number> = {};
  for (const [kind, count] of errorCounts) {
    byKind[errorKindName(kind)] = count;
  }
  return { totalOperations, totalErrors, byKind };
}

export function resetErrorStatistics(): void {
  totalOperations = 0;
  totalErrors = 0;
  errorCounts.clear();
}

// ============================================================================
// Diagnostic Report
// ============================================================================

export function getDiagnosticInfo(): string {
  const backend = getBackend();
  const devices = backend.listDevices();
  const stats = getErrorStatistics();

  const lines = [
    "Device Control Diagnostics",
    "==========================",
    `Platform: ${process.platform} (${process.arch})`,
    `Node.js: ${process.version}`,
    `Backend: ${backend.kind}`,
    `Log level: ${logLevelToString(getLogLevel())}`,
    devices.isOk()
      ? `Devices: ${devices.value().length}`
      : `Devices: unavailable (${devices.error().description()})`,
    `Operations: ${stats.totalOperations}`,
    `Errors: ${stats.totalErrors}`,
  ];

  for (const [name, count] of Object.entries(stats.byKind)) {
    lines.push(`  ${name}: ${count}`);
  }

  return lines.join("\n");
}
