/**
 * Hotplug Notification Tests
 *
 * Critical Invariants:
 * - One callback slot per process: registering replaces the previous callback
 * - A throwing callback never reaches the backend; the failure is logged
 * - Unregistering stops notifications
 */

import { describe, it, expect, afterEach } from "vitest";
import { SimulatedBackend } from "../backend/simulated";
import {
  hasDeviceChangeCallback,
  registerDeviceChangeCallback,
  unregisterDeviceChangeCallback,
} from "../hotplug";
import { LogLevel, resetLogging, setLogCallback } from "../logging";
import { webcamSpec } from "./fixtures";

describe("device change callbacks", () => {
  afterEach(() => {
    unregisterDeviceChangeCallback();
    resetLogging();
  });

  it("reports arrivals and removals with the device path", () => {
    const backend = new SimulatedBackend();
    const events: string[] = [];
    registerDeviceChangeCallback((added, path) => {
      events.push(`${added ? "+" : "-"}${path}`);
    }, backend);

    backend.addDevice(webcamSpec());
    backend.removeDevice(webcamSpec().path);

    expect(events).toEqual(["+sim://test/webcam", "-sim://test/webcam"]);
    expect(hasDeviceChangeCallback()).toBe(true);
  });

  it("replaces the previous callback", () => {
    const backend = new SimulatedBackend();
    const first: string[] = [];
    const second: string[] = [];
    registerDeviceChangeCallback((_added, path) => {
      first.push(path);
    }, backend);
    registerDeviceChangeCallback((_added, path) => {
      second.push(path);
    }, backend);

    backend.addDevice(webcamSpec());

    expect(first).toEqual([]);
    expect(second).toEqual(["sim://test/webcam"]);
  });

  it("contains and logs an exception thrown by the callback", () => {
    const backend = new SimulatedBackend();
    const logged: [LogLevel, string][] = [];
    setLogCallback((level, message) => {
      logged.push([level, message]);
    });
    registerDeviceChangeCallback(() => {
      throw new Error("boom");
    }, backend);

    expect(() => backend.addDevice(webcamSpec())).not.toThrow();
    expect(logged).toEqual([[LogLevel.Error, "Exception in device change callback: boom"]]);
  });

  it("stops notifying after unregister", () => {
    const backend = new SimulatedBackend();
    const events: string[] = [];
    registerDeviceChangeCallback((_added, path) => {
      events.push(path);
    }, backend);
    unregisterDeviceChangeCallback();

    backend.addDevice(webcamSpec());

    expect(events).toEqual([]);
    expect(hasDeviceChangeCallback()).toBe(false);
  });
});
