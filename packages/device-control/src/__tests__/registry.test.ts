/**
 * Property Registry Tests
 *
 * Critical Invariants:
 * - Every alias resolves to exactly one canonical name
 * - Names are matched after trimming, lowercasing and turning spaces or
 *   hyphens into underscores
 * - Unknown names fail with InvalidArgument
 * - Relative and combined properties are flagged
 */

import { describe, it, expect } from "vitest";
import { ErrorKind } from "../errors";
import { PropertyRegistry, resolveProperty } from "../registry";
import { CamProp, VidProp } from "../types";

describe("PropertyRegistry", () => {
  const registry = PropertyRegistry.default();

  it("is a shared instance", () => {
    expect(PropertyRegistry.default()).toBe(registry);
  });

  it("resolves canonical names to keys", () => {
    expect(registry.resolve("brightness").value().key).toEqual({
      domain: "video",
      id: VidProp.Brightness,
    });
    expect(registry.resolve("pan").value().key).toEqual({ domain: "camera", id: CamProp.Pan });
  });

  it("resolves aliases", () => {
    expect(registry.resolveName("wb").value()).toBe("white_balance");
    expect(registry.resolveName("bright").value()).toBe("brightness");
    expect(registry.resolveName("horizontal").value()).toBe("pan");
    expect(registry.resolveName("colour").value()).toBe("color_enable");
  });

  it("normalizes case, whitespace and hyphens", () => {
    expect(PropertyRegistry.normalizeName("  White-Balance ")).toBe("white_balance");
    expect(registry.resolveName("White Balance").value()).toBe("white_balance");
    expect(registry.resolveName("DIGITAL-ZOOM").value()).toBe("digital_zoom");
  });

  it("rejects unknown names with InvalidArgument", () => {
    const result = registry.resolve("sparkle");

    expect(result.error().code).toBe(ErrorKind.InvalidArgument);
    expect(result.error().message).toBe("Unknown property 'sparkle'");
    expect(registry.has("sparkle")).toBe(false);
  });

  it("keeps the two backlight compensation properties apart", () => {
    expect(registry.resolve("backlight").value().key).toEqual({
      domain: "camera",
      id: CamProp.BacklightCompensation,
    });
    expect(registry.resolve("video_backlight_compensation").value().key).toEqual({
      domain: "video",
      id: VidProp.BacklightCompensation,
    });
  });

  it("flags value kinds, relative and combined properties", () => {
    expect(registry.resolve("privacy").value().kind).toBe("bool");
    expect(registry.resolve("zoom").value().kind).toBe("int");
    expect(registry.resolve("pan_relative").value().relative).toBe(true);
    expect(registry.resolve("pan_tilt").value().combined).toBe(true);
    expect(registry.resolve("pan_tilt").value().relative).toBe(false);
  });

  it("describes a key back to its canonical name", () => {
    expect(registry.describe({ domain: "video", id: VidProp.Gain })?.name).toBe("gain");
    expect(registry.describe({ domain: "camera", id: CamProp.FocusSimple })?.name).toBe("focus_simple");
  });

  it("lists sorted canonical names and their aliases", () => {
    const names = registry.listPropertyNames();

    expect(names).toHaveLength(33);
    expect(names[0]).toBe("backlight_compensation");
    expect(names).toEqual([...names].sort());
    expect(registry.getPropertyAliases().white_balance).toEqual(["wb", "whitebalance", "white_bal"]);
    expect(registry.getPropertyAliases().gamma).toBeUndefined();
  });

  it("rejects a table whose alias points nowhere", () => {
    expect(
      () =>
        new PropertyRegistry({
          properties: [{ name: "zoom", domain: "camera", id: "Zoom" }],
          aliases: { z: "zooom" },
        }),
    ).toThrow("Alias 'z' points at unknown property 'zooom'");
  });

  it("rejects a table entry naming an unknown enum member", () => {
    expect(
      () =>
        new PropertyRegistry({
          properties: [{ name: "warp", domain: "camera", id: "Warp" }],
          aliases: {},
        }),
    ).toThrow("Property table entry 'warp' names unknown camera property Warp");
  });

  it("resolveProperty uses the default registry", () => {
    expect(resolveProperty("sat").value().name).toBe("saturation");
  });
});
