/**
 * Diagnostics Tests
 *
 * Critical Invariants:
 * - Only DeviceBusy is worth retrying
 * - Every error kind gets its own hints followed by the general hints
 * - Statistics count every recorded operation and each failure by kind
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { resetBackend, setBackend } from "../backend/factory";
import { SimulatedBackend } from "../backend/simulated";
import { CameraController } from "../controller";
import {
  getDiagnosticInfo,
  getErrorStatistics,
  isTemporaryError,
  isUserError,
  recordOperation,
  resetErrorStatistics,
  shouldRetryOperation,
  suggestErrorResolution,
} from "../diagnostics";
import { ErrorKind } from "../errors";
import { LogLevel, resetLogging, setLogLevel } from "../logging";
import { err, ok } from "../result";
import { ptzSpec, webcamSpec } from "./fixtures";

describe("classification", () => {
  it("retries only busy devices", () => {
    expect(shouldRetryOperation(ErrorKind.DeviceBusy)).toBe(true);
    expect(shouldRetryOperation(ErrorKind.DeviceNotFound)).toBe(false);
    expect(isTemporaryError(ErrorKind.DeviceBusy)).toBe(true);
    expect(isTemporaryError(ErrorKind.SystemError)).toBe(false);
  });

  it("treats bad arguments and values as caller errors", () => {
    expect(isUserError(ErrorKind.InvalidArgument)).toBe(true);
    expect(isUserError(ErrorKind.InvalidValue)).toBe(true);
    expect(isUserError(ErrorKind.PermissionDenied)).toBe(false);
  });
});

describe("suggestErrorResolution", () => {
  it("lists specific hints before the general ones", () => {
    const hints = suggestErrorResolution(ErrorKind.DeviceBusy);

    expect(hints[0]).toBe("Close other applications using the camera");
    expect(hints).toHaveLength(6);
    expect(hints[hints.length - 1]).toBe("Get diagnostic info: getDiagnosticInfo()");
  });

  it("falls back to the default hints for a kind without its own", () => {
    expect(suggestErrorResolution(ErrorKind.Success)).toEqual([
      "Check the detailed error information",
      "Enable debug logging for more information",
      "Enable debug logging: setLogLevel(LogLevel.Debug)",
      "Get diagnostic info: getDiagnosticInfo()",
    ]);
  });
});

describe("error statistics", () => {
  beforeEach(() => {
    resetErrorStatistics();
  });

  it("counts operations and failures by kind", () => {
    recordOperation(ok(1));
    recordOperation(err(ErrorKind.DeviceBusy, "busy"));
    recordOperation(err(ErrorKind.DeviceBusy, "busy"));
    recordOperation(err(ErrorKind.InvalidValue, "bad"));

    expect(getErrorStatistics()).toEqual({
      totalOperations: 4,
      totalErrors: 3,
      byKind: { DeviceBusy: 2, InvalidValue: 1 },
    });
  });

  it("passes the result through unchanged", () => {
    const result = ok("value");

    expect(recordOperation(result)).toBe(result);
  });

  it("is fed by controller device calls", () => {
    const controller = new CameraController({ backend: new SimulatedBackend([webcamSpec()]) });
    controller.get("brightness");
    controller.set("contrast", 60);

    expect(getErrorStatistics().totalOperations).toBe(2);
    expect(getErrorStatistics().totalErrors).toBe(0);
  });

  it("reset clears every counter", () => {
    recordOperation(err(ErrorKind.SystemError));
    resetErrorStatistics();

    expect(getErrorStatistics()).toEqual({ totalOperations: 0, totalErrors: 0, byKind: {} });
  });
});

describe("getDiagnosticInfo", () => {
  beforeEach(() => {
    resetErrorStatistics();
    setBackend(new SimulatedBackend([webcamSpec(), ptzSpec()]));
  });

  afterEach(() => {
    resetBackend();
    resetLogging();
  });

  it("reports backend, devices, log level and statistics", () => {
    setLogLevel(LogLevel.Debug);
    recordOperation(err(ErrorKind.PermissionDenied));
    const lines = getDiagnosticInfo().split("\n");

    expect(lines[0]).toBe("Device Control Diagnostics");
    expect(lines).toContain("Backend: simulated");
    expect(lines).toContain("Log level: DEBUG");
    expect(lines).toContain("Devices: 2");
    expect(lines).toContain("Operations: 1");
    expect(lines).toContain("Errors: 1");
    expect(lines[lines.length - 1]).toBe("  PermissionDenied: 1");
  });
});
