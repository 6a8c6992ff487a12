import { describe, expect, it } from "vitest";

import type { Annotation, AnnotationSnapshot, StrokeStyle } from "../types";
import { resolveEditorConfig } from "../config";
import {
  applyStyleTo,
  boundingBox,
  cloneWithAnchor,
  createDegenerate,
  createText,
  snapshotOf,
  translateAnnotation,
  triangleFromRect,
} from "../annotation";
import { normalizeRect } from "../../geometry/rect";
import { estimateTextWidth } from "../../text/textMetrics";

const style: StrokeStyle = { color: { r: 0, g: 0, b: 0, a: 1 }, width: 2 };
const config = resolveEditorConfig();

describe("normalizeRect", () => {
  it("gives the same rect whichever corner the drag started from", () => {
    const expected = { x: 5, y: 5, width: 5, height: 5 };
    expect(normalizeRect({ x: 10, y: 10 }, { x: 5, y: 5 })).toEqual(expected);
    expect(normalizeRect({ x: 5, y: 5 }, { x: 10, y: 10 })).toEqual(expected);
    expect(normalizeRect({ x: 5, y: 10 }, { x: 10, y: 5 })).toEqual(expected);
  });
});

describe("triangleFromRect", () => {
  it("puts the apex at the top centre and the base along the bottom edge", () => {
    expect(triangleFromRect({ x: 0, y: 0, width: 10, height: 20 })).toEqual([
      { x: 5, y: 0 },
      { x: 0, y: 20 },
      { x: 10, y: 20 },
    ]);
  });
});

describe("createDegenerate", () => {
  it("starts every drawable kind as a zero-size shape at the press point", () => {
    const start = { x: 7, y: 9 };
    const line = createDegenerate("line", "line-1", start, style);
    expect(line).toMatchObject({ kind: "line", p1: start, p2: start, selected: false });

    const free = createDegenerate("freehand", "freehand-1", start, style);
    expect(free).toMatchObject({ kind: "freehand", points: [start] });

    const tri = createDegenerate("triangle", "triangle-1", start, style);
    expect(tri).toMatchObject({ kind: "triangle", rect: { x: 7, y: 9, width: 0, height: 0 } });
  });

  it("does not share the style object with the caller", () => {
    const a = createDegenerate("rectangle", "rectangle-1", { x: 0, y: 0 }, style);
    a.style.color.r = 200;
    expect(style.color.r).toBe(0);
  });
});

describe("createText", () => {
  it("derives the point size from the stroke width with a floor", () => {
    const thin = createText({ id: "t", content: "a", anchor: { x: 0, y: 0 }, style, fontFamily: "serif", config });
    expect(thin.pointSize).toBe(6);
    expect(thin.scale).toBe(1);

    const thick = createText({
      id: "t",
      content: "a",
      anchor: { x: 0, y: 0 },
      style: { ...style, width: 5 },
      fontFamily: "serif",
      config,
    });
    expect(thick.pointSize).toBe(15);
  });
});

describe("boundingBox", () => {
  it("scales the measured text block", () => {
    const text: Annotation = {
      id: "text-1",
      kind: "text",
      style,
      selected: false,
      content: "ab",
      fontFamily: "sans-serif",
      pointSize: 10,
      anchor: { x: 1, y: 2 },
      scale: 2,
    };
    // 2 chars * 10px * 0.6 = 12 wide, one line of 10 * 1.2 = 12 tall
    expect(boundingBox(text, estimateTextWidth)).toEqual({ x: 1, y: 2, width: 24, height: 24 });
  });

  it("spans every freehand point", () => {
    const free: Annotation = {
      id: "freehand-1",
      kind: "freehand",
      style,
      selected: false,
      points: [
        { x: 10, y: 20 },
        { x: 30, y: 5 },
        { x: 15, y: 12 },
      ],
    };
    expect(boundingBox(free, estimateTextWidth)).toEqual({ x: 10, y: 5, width: 20, height: 15 });
  });
});

describe("translateAnnotation", () => {
  it("re-derives triangle vertices from the moved rect", () => {
    const tri = createDegenerate("triangle", "triangle-1", { x: 0, y: 0 }, style);
    if (tri.kind !== "triangle") throw new Error("expected a triangle");
    tri.rect = { x: 0, y: 0, width: 10, height: 10 };
    tri.vertices = triangleFromRect(tri.rect);
    translateAnnotation(tri, 5, -5);
    expect(tri.rect).toEqual({ x: 5, y: -5, width: 10, height: 10 });
    expect(tri.vertices).toEqual([
      { x: 10, y: -5 },
      { x: 5, y: 5 },
      { x: 15, y: 5 },
    ]);
  });
});

describe("cloneWithAnchor", () => {
  it("places a line's first endpoint at the paste point", () => {
    const snap: AnnotationSnapshot = { kind: "line", style, p1: { x: 0, y: 0 }, p2: { x: 10, y: 0 } };
    const out = cloneWithAnchor(snap, { x: 50, y: 50 }, "line-2", estimateTextWidth);
    expect(out).toMatchObject({ id: "line-2", kind: "line", p1: { x: 50, y: 50 }, p2: { x: 60, y: 50 } });
  });

  it("places a freehand path's bounding-box corner at the paste point", () => {
    const snap: AnnotationSnapshot = {
      kind: "freehand",
      style,
      points: [
        { x: 10, y: 20 },
        { x: 30, y: 5 },
      ],
    };
    const out = cloneWithAnchor(snap, { x: 0, y: 0 }, "freehand-2", estimateTextWidth);
    expect(out).toMatchObject({
      points: [
        { x: 0, y: 15 },
        { x: 20, y: 0 },
      ],
    });
  });

  it("moves a triangle's rect origin and rebuilds its vertices", () => {
    const rect = { x: 10, y: 10, width: 20, height: 20 };
    const snap: AnnotationSnapshot = { kind: "triangle", style, rect, vertices: triangleFromRect(rect) };
    const out = cloneWithAnchor(snap, { x: 0, y: 0 }, "triangle-2", estimateTextWidth);
    expect(out).toMatchObject({
      rect: { x: 0, y: 0, width: 20, height: 20 },
      vertices: [
        { x: 10, y: 0 },
        { x: 0, y: 20 },
        { x: 20, y: 20 },
      ],
    });
  });

  it("never aliases the snapshot", () => {
    const snap: AnnotationSnapshot = { kind: "rectangle", style, rect: { x: 1, y: 1, width: 2, height: 2 } };
    const out = cloneWithAnchor(snap, { x: 1, y: 1 }, "rectangle-2", estimateTextWidth);
    if (out.kind !== "rectangle") throw new Error("expected a rectangle");
    out.rect.x = 99;
    out.style.width = 99;
    expect(snap.rect.x).toBe(1);
    expect(snap.style.width).toBe(2);
  });
});

describe("snapshotOf", () => {
  it("drops identity and selection", () => {
    const a = createDegenerate("ellipse", "ellipse-1", { x: 3, y: 4 }, style);
    a.selected = true;
    const snap = snapshotOf(a);
    expect("id" in snap).toBe(false);
    expect("selected" in snap).toBe(false);
    expect(snap.kind).toBe("ellipse");
  });
});

describe("applyStyleTo", () => {
  it("clamps the width and reports a change", () => {
    const a = createDegenerate("line", "line-1", { x: 0, y: 0 }, style);
    expect(applyStyleTo(a, { width: 0 }, config)).toBe(true);
    expect(a.style.width).toBe(0.1);
  });

  it("returns false when nothing differs", () => {
    const a = createDegenerate("line", "line-1", { x: 0, y: 0 }, style);
    expect(applyStyleTo(a, { width: 2, color: { r: 0, g: 0, b: 0, a: 1 } }, config)).toBe(false);
  });

  it("recomputes a text annotation's point size from the new width", () => {
    const t = createText({ id: "t", content: "x", anchor: { x: 0, y: 0 }, style, fontFamily: "serif", config });
    applyStyleTo(t, { width: 4 }, config);
    expect(t.pointSize).toBe(12);
    applyStyleTo(t, { width: 1 }, config);
    expect(t.pointSize).toBe(6);
  });
});
