import type {
  Annotation,
  AnnotationSnapshot,
  DrawKind,
  Point,
  Rect,
  StrokeStyle,
  TextAnnotation,
  TriangleAnnotation,
} from "./types";
import type { EditorConfig } from "./config";
import { sameColor } from "./color";
import { boundsOfPoints, normalizeRect } from "../geometry/rect";
import { measureTextBlock, type TextMeasurer } from "../text/textMetrics";

export function triangleFromRect(rect: Rect): TriangleAnnotation["vertices"] {
  const left = rect.x;
  const right = rect.x + rect.width;
  const top = rect.y;
  const bottom = rect.y + rect.height;
  return [
    { x: (left + right) / 2, y: top },
    { x: left, y: bottom },
    { x: right, y: bottom },
  ];
}

export function clampStrokeWidth(width: number, config: Pick<EditorConfig, "minStrokeWidth">) {
  return Math.max(config.minStrokeWidth, width);
}

export function textPointSize(strokeWidth: number, config: Pick<EditorConfig, "minPointSize" | "pointSizePerWidth">) {
  return Math.max(config.minPointSize, strokeWidth * config.pointSizePerWidth);
}

export function cloneStyle(style: StrokeStyle): StrokeStyle {
  return { color: { ...style.color }, width: style.width };
}

/** New annotation of a drawable kind with zero-size geometry at `start`. */
export function createDegenerate(kind: DrawKind, id: string, start: Point, style: StrokeStyle): Annotation {
  const base = { id, style: cloneStyle(style), selected: false };
  switch (kind) {
    case "line":
    case "arrow":
      return { ...base, kind, p1: { ...start }, p2: { ...start } };
    case "freehand":
      return { ...base, kind, points: [{ ...start }] };
    case "rectangle":
    case "ellipse":
      return { ...base, kind, rect: normalizeRect(start, start) };
    case "triangle": {
      const rect = normalizeRect(start, start);
      return { ...base, kind, rect, vertices: triangleFromRect(rect) };
    }
  }
}

export function createText(params: {
  id: string;
  content: string;
  anchor: Point;
  style: StrokeStyle;
  fontFamily: string;
  config: Pick<EditorConfig, "minPointSize" | "pointSizePerWidth">;
}): TextAnnotation {
  const { id, content, anchor, style, fontFamily, config } = params;
  return {
    id,
    kind: "text",
    style: cloneStyle(style),
    selected: false,
    content,
    fontFamily,
    pointSize: textPointSize(style.width, config),
    anchor: { ...anchor },
    scale: 1,
  };
}

export function textBounds(a: Pick<TextAnnotation, "content" | "pointSize" | "fontFamily" | "anchor" | "scale">, measure: TextMeasurer): Rect {
  const block = measureTextBlock({ text: a.content, pointSize: a.pointSize, fontFamily: a.fontFamily, measure });
  return { x: a.anchor.x, y: a.anchor.y, width: block.width * a.scale, height: block.height * a.scale };
}

export function boundingBox(a: Annotation | AnnotationSnapshot, measure: TextMeasurer): Rect {
  switch (a.kind) {
    case "line":
    case "arrow":
      return boundsOfPoints([a.p1, a.p2]);
    case "freehand":
      return boundsOfPoints(a.points);
    case "rectangle":
    case "ellipse":
    case "triangle":
      return { ...a.rect };
    case "text":
      return textBounds(a, measure);
  }
}

function shift(p: Point, dx: number, dy: number): Point {
  return { x: p.x + dx, y: p.y + dy };
}

/** Moves geometry in place; identity and style untouched. */
export function translateAnnotation(a: Annotation, dx: number, dy: number) {
  switch (a.kind) {
    case "line":
    case "arrow":
      a.p1 = shift(a.p1, dx, dy);
      a.p2 = shift(a.p2, dx, dy);
      return;
    case "freehand":
      a.points = a.points.map((p) => shift(p, dx, dy));
      return;
    case "rectangle":
    case "ellipse":
      a.rect = { ...a.rect, x: a.rect.x + dx, y: a.rect.y + dy };
      return;
    case "triangle":
      a.rect = { ...a.rect, x: a.rect.x + dx, y: a.rect.y + dy };
      a.vertices = triangleFromRect(a.rect);
      return;
    case "text":
      a.anchor = shift(a.anchor, dx, dy);
      return;
  }
}

/** Deep copy without identity, selection or aliasing. */
export function snapshotOf(a: Annotation): AnnotationSnapshot {
  const style = cloneStyle(a.style);
  switch (a.kind) {
    case "line":
    case "arrow":
      return { kind: a.kind, style, p1: { ...a.p1 }, p2: { ...a.p2 } };
    case "freehand":
      return { kind: a.kind, style, points: a.points.map((p) => ({ ...p })) };
    case "rectangle":
    case "ellipse":
      return { kind: a.kind, style, rect: { ...a.rect } };
    case "triangle":
      return { kind: a.kind, style, rect: { ...a.rect }, vertices: triangleFromRect(a.rect) };
    case "text":
      return {
        kind: a.kind,
        style,
        content: a.content,
        fontFamily: a.fontFamily,
        pointSize: a.pointSize,
        anchor: { ...a.anchor },
        scale: a.scale,
      };
  }
}

export function instantiate(s: AnnotationSnapshot, id: string): Annotation {
  const style = cloneStyle(s.style);
  switch (s.kind) {
    case "line":
    case "arrow":
      return { id, selected: false, kind: s.kind, style, p1: { ...s.p1 }, p2: { ...s.p2 } };
    case "freehand":
      return { id, selected: false, kind: s.kind, style, points: s.points.map((p) => ({ ...p })) };
    case "rectangle":
    case "ellipse":
      return { id, selected: false, kind: s.kind, style, rect: { ...s.rect } };
    case "triangle":
      return { id, selected: false, kind: s.kind, style, rect: { ...s.rect }, vertices: triangleFromRect(s.rect) };
    case "text":
      return {
        id,
        selected: false,
        kind: s.kind,
        style,
        content: s.content,
        fontFamily: s.fontFamily,
        pointSize: s.pointSize,
        anchor: { ...s.anchor },
        scale: s.scale,
      };
  }
}

export function cloneTranslated(a: AnnotationSnapshot, dx: number, dy: number, id: string): Annotation {
  const out = instantiate(a, id);
  translateAnnotation(out, dx, dy);
  return out;
}

function anchorOf(s: AnnotationSnapshot, measure: TextMeasurer): Point {
  switch (s.kind) {
    case "line":
    case "arrow":
      return s.p1;
    case "rectangle":
    case "ellipse":
    case "triangle":
      return { x: s.rect.x, y: s.rect.y };
    case "freehand": {
      const b = boundingBox(s, measure);
      return { x: b.x, y: b.y };
    }
    case "text":
      return s.anchor;
  }
}

/**
 * Copy re-anchored at `point`: p1 for lines and arrows, the rect origin for
 * rectangles and ellipses, the text anchor for text, and the bounding-box
 * top-left for triangles and freehand paths.
 */
export function cloneWithAnchor(s: AnnotationSnapshot, point: Point, id: string, measure: TextMeasurer): Annotation {
  const ref = anchorOf(s, measure);
  return cloneTranslated(s, point.x - ref.x, point.y - ref.y, id);
}

/** Applies a new style in place; returns whether anything changed. */
export function applyStyleTo(a: Annotation, style: Partial<StrokeStyle>, config: EditorConfig): boolean {
  let changed = false;
  if (style.color) {
    if (!sameColor(style.color, a.style.color)) {
      a.style = { ...a.style, color: { ...style.color } };
      changed = true;
    }
  }
  if (typeof style.width === "number" && Number.isFinite(style.width)) {
    const w = clampStrokeWidth(style.width, config);
    if (w !== a.style.width) {
      a.style = { ...a.style, width: w };
      changed = true;
    }
    if (a.kind === "text") {
      const size = textPointSize(a.style.width, config);
      if (size !== a.pointSize) {
        a.pointSize = size;
        changed = true;
      }
    }
  }
  return changed;
}
