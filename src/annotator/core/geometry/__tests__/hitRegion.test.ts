import { describe, expect, it } from "vitest";

import type { Annotation, StrokeStyle } from "../../model/types";
import { resolveEditorConfig } from "../../model/config";
import { triangleFromRect } from "../../model/annotation";
import { containsPoint, distToPath, widenToHitRegion } from "../hitRegion";
import { estimateTextWidth } from "../../text/textMetrics";

const config = resolveEditorConfig();

function styleOf(width: number): StrokeStyle {
  return { color: { r: 0, g: 0, b: 0, a: 1 }, width };
}

function line(width: number): Annotation {
  return { id: "line-1", kind: "line", style: styleOf(width), selected: false, p1: { x: 0, y: 0 }, p2: { x: 100, y: 0 } };
}

const hit = (a: Annotation, x: number, y: number) => containsPoint(a, { x, y }, config, estimateTextWidth);

describe("hit regions", () => {
  it("counts points on the outline for every stroke width", () => {
    for (const w of [0.1, 1, 5, 30, 40]) {
      expect(hit(line(w), 50, 0)).toBe(true);
      expect(hit(line(w), 0, 0)).toBe(true);
    }
  });

  it("widens thin strokes to the floor", () => {
    for (const w of [0.1, 2, 30]) {
      expect(hit(line(w), 50, 14.9)).toBe(true);
      expect(hit(line(w), 50, 16)).toBe(false);
    }
  });

  it("follows the stroke once it is wider than the floor", () => {
    expect(hit(line(40), 50, 19)).toBe(true);
    expect(hit(line(40), 50, 21)).toBe(false);
  });

  it("takes the floor from the config", () => {
    const narrow = resolveEditorConfig({ hitFloor: 10 });
    expect(containsPoint(line(1), { x: 50, y: 4 }, narrow, estimateTextWidth)).toBe(true);
    expect(containsPoint(line(1), { x: 50, y: 6 }, narrow, estimateTextWidth)).toBe(false);
  });

  it("leaves the interior of closed shapes out", () => {
    const rect: Annotation = {
      id: "rectangle-1",
      kind: "rectangle",
      style: styleOf(2),
      selected: false,
      rect: { x: 0, y: 0, width: 100, height: 100 },
    };
    expect(hit(rect, 50, 50)).toBe(false);
    expect(hit(rect, 0, 50)).toBe(true);
    expect(hit(rect, 50, -14)).toBe(true);
    expect(hit(rect, 50, -16)).toBe(false);

    const ellipse: Annotation = { ...rect, id: "ellipse-1", kind: "ellipse", rect: { x: 0, y: 0, width: 100, height: 50 } };
    expect(hit(ellipse, 100, 25)).toBe(true);
    expect(hit(ellipse, 50, 25)).toBe(false);

    const triRect = { x: 0, y: 0, width: 100, height: 100 };
    const tri: Annotation = {
      id: "triangle-1",
      kind: "triangle",
      style: styleOf(2),
      selected: false,
      rect: triRect,
      vertices: triangleFromRect(triRect),
    };
    expect(hit(tri, 50, 100)).toBe(true);
    expect(hit(tri, 50, 66)).toBe(false);
  });

  it("includes the whole text block", () => {
    // "abc" at 10px: 18 wide, 12 tall
    const text: Annotation = {
      id: "text-1",
      kind: "text",
      style: styleOf(2),
      selected: false,
      content: "abc",
      fontFamily: "sans-serif",
      pointSize: 10,
      anchor: { x: 0, y: 0 },
      scale: 1,
    };
    expect(hit(text, 9, 6)).toBe(true);
    expect(hit(text, 32, 6)).toBe(true);
    expect(hit(text, 34, 6)).toBe(false);
  });

  it("treats a single-point freehand stroke as a dot", () => {
    const dot: Annotation = { id: "freehand-1", kind: "freehand", style: styleOf(1), selected: false, points: [{ x: 10, y: 10 }] };
    expect(hit(dot, 20, 10)).toBe(true);
    expect(hit(dot, 30, 10)).toBe(false);
  });
});

describe("widenToHitRegion", () => {
  it("strokes half the width on each side", () => {
    const region = widenToHitRegion({ points: [{ x: 0, y: 0 }, { x: 10, y: 0 }], closed: false }, 8);
    expect(region.halfWidth).toBe(4);
    expect(region.contains({ x: 5, y: 4 })).toBe(true);
    expect(region.contains({ x: 5, y: 4.5 })).toBe(false);
  });

  it("never contains anything for an empty path", () => {
    expect(distToPath({ x: 0, y: 0 }, { points: [], closed: false })).toBe(Infinity);
  });
});
