import { describe, expect, it } from "vitest";

import { DEFAULT_EDITOR_CONFIG, resolveEditorConfig } from "../config";

describe("resolveEditorConfig", () => {
  it("returns the defaults without overrides", () => {
    const c = resolveEditorConfig();
    expect(c.hitFloor).toBe(30);
    expect(c.handleDrawSize).toBe(12);
    expect(c.handleGrabRadius).toBe(30);
    expect(c.defaultStyle).toEqual({ color: { r: 17, g: 24, b: 39, a: 1 }, width: 2 });
  });

  it("keeps the three handle and hit tunables independent", () => {
    const c = resolveEditorConfig({ handleDrawSize: 20 });
    expect(c.handleDrawSize).toBe(20);
    expect(c.handleGrabRadius).toBe(30);
    expect(c.hitFloor).toBe(30);
  });

  it("falls back to the default for non-positive or non-finite numbers", () => {
    const c = resolveEditorConfig({ hitFloor: -1, minTextScale: Number.NaN, arrowMinSize: 0, handleGrabRadius: 20 });
    expect(c.hitFloor).toBe(30);
    expect(c.minTextScale).toBe(0.1);
    expect(c.arrowMinSize).toBe(10);
    expect(c.handleGrabRadius).toBe(20);
  });

  it("clamps the default stroke width", () => {
    const color = { r: 1, g: 1, b: 1, a: 1 };
    expect(resolveEditorConfig({ defaultStyle: { color, width: 0.01 } }).defaultStyle.width).toBe(0.1);
    expect(resolveEditorConfig({ defaultStyle: { color, width: Number.NaN } }).defaultStyle.width).toBe(2);
  });

  it("ignores a blank font family", () => {
    expect(resolveEditorConfig({ defaultFontFamily: "  " }).defaultFontFamily).toBe("sans-serif");
    expect(resolveEditorConfig({ defaultFontFamily: "serif" }).defaultFontFamily).toBe("serif");
  });

  it("never hands out the shared default style", () => {
    const c = resolveEditorConfig();
    c.defaultStyle.color.r = 0;
    expect(DEFAULT_EDITOR_CONFIG.defaultStyle.color.r).toBe(17);
  });
});
