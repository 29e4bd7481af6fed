/**
 * HTTP Surface Tests
 *
 * Critical Invariants:
 * - Every response uses the { success, data } / { success: false, error, message } envelope
 * - ErrorKind maps to a fixed HTTP status
 * - Malformed parameters and bodies are rejected before any device call
 * - Controllers, and their custom presets, persist per device across requests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { VidProp, resetBackend, setBackend, type SimulatedBackend } from "@camctl/device-control";
import { createApp } from "../app";
import { DESK_PATH, LOGITECH_SET, deskBackend } from "./fixtures";

describe("HTTP API", () => {
  let backend: SimulatedBackend;
  let app: FastifyInstance;

  beforeEach(async () => {
    backend = deskBackend();
    app = await createApp({ backend, openAttempts: 2, openRetryDelayMs: 0 });
  });

  afterEach(async () => {
    await app.close();
  });

  describe("devices", () => {
    it("lists devices with their index", async () => {
      const response = await app.inject({ method: "GET", url: "/api/devices" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        success: true,
        data: [{ index: 0, name: "Desk Camera", path: DESK_PATH }],
      });
    });

    it("rejects a non-numeric index", async () => {
      const response = await app.inject({ method: "GET", url: "/api/devices/first" });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        success: false,
        error: "InvalidArgument",
        message: "Device index must be a non-negative integer",
      });
    });

    it("maps an unknown index to 404 DeviceNotFound", async () => {
      const response = await app.inject({ method: "GET", url: "/api/devices/5" });
      const body = response.json();

      expect(response.statusCode).toBe(404);
      expect(body.error).toBe("DeviceNotFound");
      expect(body.message).toBe("Invalid device index");
      expect(body.suggestions[0]).toBe("Check that the camera is physically connected");
    });

    it("dumps capabilities keyed by enum name", async () => {
      const response = await app.inject({ method: "GET", url: "/api/devices/0/capabilities" });
      const { data } = response.json();

      expect(Object.keys(data.camera)).toEqual(["Pan", "Tilt", "Zoom"]);
      expect(data.video.WhiteBalance.supportsAuto).toBe(true);
    });

    it("maps a busy device to 409 after retrying", async () => {
      backend.setBusy(DESK_PATH, true);
      backend.resetCallCount();

      const response = await app.inject({ method: "GET", url: "/api/devices/0/properties/brightness" });

      expect(response.statusCode).toBe(409);
      expect(response.json().message).toBe("Device 'Desk Camera' is in use");
      // one listing, then one open per attempt
      expect(backend.callCount).toBe(3);
    });
  });

  describe("properties", () => {
    it("reads a property by name", async () => {
      const response = await app.inject({ method: "GET", url: "/api/devices/0/properties/brightness" });

      expect(response.json()).toEqual({ success: true, data: { name: "brightness", value: 128 } });
    });

    it("writes through an alias and returns the new value", async () => {
      const response = await app.inject({
        method: "PUT",
        url: "/api/devices/0/properties/bright",
        payload: { value: 200 },
      });

      expect(response.json()).toEqual({ success: true, data: { name: "bright", value: 200 } });
    });

    it("maps an out-of-range value to 422 InvalidValue", async () => {
      const response = await app.inject({
        method: "PUT",
        url: "/api/devices/0/properties/brightness",
        payload: { value: 300 },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json().message).toBe("brightness: 300 outside [0, 255] step 1");
    });

    it("rejects a body without a usable value", async () => {
      const response = await app.inject({
        method: "PUT",
        url: "/api/devices/0/properties/brightness",
        payload: { value: "loud" },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe('Body must contain a value: a number, a boolean or "auto"');
    });

    it("rejects an unknown mode", async () => {
      const response = await app.inject({
        method: "PUT",
        url: "/api/devices/0/properties/brightness",
        payload: { value: 10, mode: "sometimes" },
      });

      expect(response.statusCode).toBe(400);
    });

    it("maps an unsupported property to 422 and an unknown one to 400", async () => {
      const unsupported = await app.inject({ method: "GET", url: "/api/devices/0/properties/iris" });
      const unknown = await app.inject({ method: "GET", url: "/api/devices/0/properties/sparkle" });

      expect(unsupported.statusCode).toBe(422);
      expect(unsupported.json().message).toBe("Property 'iris' is not supported by Desk Camera");
      expect(unknown.statusCode).toBe(400);
      expect(unknown.json().message).toBe("Unknown property 'sparkle'");
    });

    it("lists supported names with their values", async () => {
      const response = await app.inject({ method: "GET", url: "/api/devices/0/properties" });
      const { data } = response.json();

      expect(data.supported).toEqual({
        camera: ["pan", "tilt", "zoom"],
        video: ["brightness", "contrast", "white_balance", "gain"],
      });
      expect(data.values).toEqual({
        pan: 0,
        tilt: 0,
        zoom: 100,
        brightness: 128,
        contrast: 50,
        white_balance: 4600,
        gain: 10,
      });
    });

    it("reports each entry of a batch write", async () => {
      const response = await app.inject({
        method: "PATCH",
        url: "/api/devices/0/properties",
        payload: { contrast: 60, sparkle: 1 },
      });

      expect(response.json().data).toEqual({ contrast: true, sparkle: false });
    });

    it("returns the range of a property", async () => {
      const response = await app.inject({ method: "GET", url: "/api/devices/0/properties/zoom/range" });

      expect(response.json().data).toEqual({ min: 100, max: 400, step: 10, default: 100, defaultMode: "manual" });
    });

    it("moves a property relative to its current value", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/devices/0/properties/pan/move",
        payload: { delta: 15 },
      });

      expect(response.json().data).toEqual({ name: "pan", value: 15 });
    });

    it("rejects a fractional delta", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/api/devices/0/properties/pan/move",
        payload: { delta: 1.5 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe("Body must contain an integer delta");
    });

    it("resets every property to its default", async () => {
      await app.inject({ method: "PUT", url: "/api/devices/0/properties/brightness", payload: { value: 10 } });
      const response = await app.inject({ method: "POST", url: "/api/devices/0/reset" });

      expect(response.json().data).toEqual({ failed: [] });
      expect(backend.peek(DESK_PATH, { domain: "video", id: VidProp.Brightness })?.value).toBe(128);
    });
  });

  describe("presets", () => {
    it("reports a partially applied built-in preset", async () => {
      const response = await app.inject({ method: "POST", url: "/api/devices/0/presets/daylight/apply" });

      expect(response.json().data).toEqual({ preset: "daylight", applied: false });
    });

    it("maps an unknown preset to 404", async () => {
      const response = await app.inject({ method: "POST", url: "/api/devices/0/presets/disco/apply" });

      expect(response.statusCode).toBe(404);
      expect(response.json().error).toBe("PresetNotFound");
    });

    it("saves, applies and deletes a custom preset", async () => {
      const saved = await app.inject({
        method: "PUT",
        url: "/api/devices/0/presets/meeting",
        payload: { brightness: 90 },
      });
      expect(saved.statusCode).toBe(201);

      const listed = await app.inject({ method: "GET", url: "/api/devices/0/presets" });
      expect(listed.json().data.names).toEqual(["daylight", "indoor", "night", "conference", "meeting"]);

      const applied = await app.inject({ method: "POST", url: "/api/devices/0/presets/meeting/apply" });
      expect(applied.json().data.applied).toBe(true);

      const deleted = await app.inject({ method: "DELETE", url: "/api/devices/0/presets/meeting" });
      expect(deleted.json().data).toEqual({ preset: "meeting", deleted: true });

      const again = await app.inject({ method: "DELETE", url: "/api/devices/0/presets/meeting" });
      expect(again.statusCode).toBe(404);
    });

    it("rejects a preset naming an unknown property", async () => {
      const response = await app.inject({
        method: "PUT",
        url: "/api/devices/0/presets/odd",
        payload: { sparkle: 1 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe("Unknown property 'sparkle' in preset 'odd'");
    });
  });

  describe("vendor properties", () => {
    const url = `/api/devices/0/vendor/${LOGITECH_SET}/1`;

    it("reads and writes payloads as hex", async () => {
      const read = await app.inject({ method: "GET", url });
      expect(read.json().data).toEqual({ guid: LOGITECH_SET, propertyId: 1, data: "01" });

      const written = await app.inject({ method: "PUT", url, payload: { data: [0] } });
      expect(written.json().data.data).toBe("00");

      const reread = await app.inject({ method: "GET", url });
      expect(reread.json().data.data).toBe("00");
    });

    it("rejects a payload that is not hex or bytes", async () => {
      const response = await app.inject({ method: "PUT", url, payload: { data: "zz" } });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe("Vendor data must be a hex string or an array of bytes");
    });

    it("maps a malformed GUID to 400", async () => {
      const response = await app.inject({ method: "GET", url: "/api/devices/0/vendor/xyz/1" });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe("Malformed GUID string 'xyz'");
    });
  });

  describe("service routes", () => {
    afterEach(() => {
      resetBackend();
    });

    it("reports the diagnostics of the process-wide backend", async () => {
      setBackend(backend);
      const response = await app.inject({ method: "GET", url: "/api/diagnostics" });
      const { data } = response.json();

      expect(data.report.split("\n")[0]).toBe("Device Control Diagnostics");
      expect(data.report).toContain("Devices: 1");
    });

    it("answers health checks", async () => {
      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.json().status).toBe("ok");
      expect(response.json().backend).toBe("simulated");
    });

    it("answers unknown routes with 404", async () => {
      const response = await app.inject({ method: "GET", url: "/api/nowhere" });

      expect(response.statusCode).toBe(404);
      expect(response.json().message).toBe("Route GET /api/nowhere not found");
    });
  });
});
