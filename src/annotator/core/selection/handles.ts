import type { Annotation, Point } from "../model/types";
import type { EditorConfig } from "../model/config";
import { boundingBox, triangleFromRect } from "../model/annotation";
import { bottomRight, manhattan, normalizeRect } from "../geometry/rect";
import type { TextMeasurer } from "../text/textMetrics";

export type HandleId = "corner" | "p1" | "p2";

export type ResizeMode = "corner-resize" | "affine-scale" | "endpoint-move" | "uniform-scale";

export type Handle = {
  annotationId: string;
  id: HandleId;
  mode: ResizeMode;
  at: Point;
};

export type ResizeSession =
  | { mode: "corner-resize"; annotationId: string; anchor: Point }
  | {
      mode: "affine-scale";
      annotationId: string;
      anchor: Point;
      initialWidth: number;
      initialHeight: number;
      initialPoints: Point[];
    }
  | { mode: "endpoint-move"; annotationId: string; endpoint: "p1" | "p2" }
  | {
      mode: "uniform-scale";
      annotationId: string;
      anchor: Point;
      initialDelta: Point;
      initialScale: number;
    };

export function handlesFor(a: Annotation, measure: TextMeasurer): Handle[] {
  const annotationId = a.id;
  switch (a.kind) {
    case "line":
    case "arrow":
      return [
        { annotationId, id: "p1", mode: "endpoint-move", at: { ...a.p1 } },
        { annotationId, id: "p2", mode: "endpoint-move", at: { ...a.p2 } },
      ];
    case "rectangle":
    case "ellipse":
    case "triangle":
      return [{ annotationId, id: "corner", mode: "corner-resize", at: bottomRight(a.rect) }];
    case "freehand":
      return [{ annotationId, id: "corner", mode: "affine-scale", at: bottomRight(boundingBox(a, measure)) }];
    case "text":
      return [{ annotationId, id: "corner", mode: "uniform-scale", at: bottomRight(boundingBox(a, measure)) }];
  }
}

/** Topmost selected annotation first; the first handle within grab radius wins. */
export function findHandleAt(
  annotations: readonly Annotation[],
  p: Point,
  config: Pick<EditorConfig, "handleGrabRadius">,
  measure: TextMeasurer
): Handle | null {
  for (let i = annotations.length - 1; i >= 0; i--) {
    const a = annotations[i];
    if (!a.selected) continue;
    for (const h of handlesFor(a, measure)) {
      if (manhattan(h.at, p) <= config.handleGrabRadius) return h;
    }
  }
  return null;
}

// |d| >= 1 keeping its sign, so a grab right on the anchor cannot divide by zero
function atLeastOne(d: number) {
  if (Math.abs(d) >= 1) return d;
  return d < 0 ? -1 : 1;
}

export function beginResize(a: Annotation, handle: Handle, grab: Point, measure: TextMeasurer): ResizeSession {
  const annotationId = a.id;
  switch (a.kind) {
    case "line":
    case "arrow":
      return { mode: "endpoint-move", annotationId, endpoint: handle.id === "p1" ? "p1" : "p2" };
    case "rectangle":
    case "ellipse":
    case "triangle":
      return { mode: "corner-resize", annotationId, anchor: { x: a.rect.x, y: a.rect.y } };
    case "freehand": {
      const box = boundingBox(a, measure);
      return {
        mode: "affine-scale",
        annotationId,
        anchor: { x: box.x, y: box.y },
        initialWidth: box.width,
        initialHeight: box.height,
        initialPoints: a.points.map((p) => ({ ...p })),
      };
    }
    case "text":
      return {
        mode: "uniform-scale",
        annotationId,
        anchor: { ...a.anchor },
        initialDelta: { x: atLeastOne(grab.x - a.anchor.x), y: atLeastOne(grab.y - a.anchor.y) },
        initialScale: a.scale,
      };
  }
}

/** Mutates `a` for the pointer position; returns whether the geometry changed. */
export function applyResize(
  session: ResizeSession,
  a: Annotation,
  pointer: Point,
  config: Pick<EditorConfig, "minTextScale">
): boolean {
  switch (session.mode) {
    case "endpoint-move": {
      if (a.kind !== "line" && a.kind !== "arrow") return false;
      const cur = a[session.endpoint];
      if (cur.x === pointer.x && cur.y === pointer.y) return false;
      a[session.endpoint] = { ...pointer };
      return true;
    }
    case "corner-resize": {
      if (a.kind !== "rectangle" && a.kind !== "ellipse" && a.kind !== "triangle") return false;
      const rect = normalizeRect(session.anchor, pointer);
      a.rect = rect;
      if (a.kind === "triangle") a.vertices = triangleFromRect(rect);
      return true;
    }
    case "affine-scale": {
      if (a.kind !== "freehand") return false;
      const { anchor } = session;
      const sx = Math.max(1, pointer.x - anchor.x) / Math.max(1, session.initialWidth);
      const sy = Math.max(1, pointer.y - anchor.y) / Math.max(1, session.initialHeight);
      a.points = session.initialPoints.map((p) => ({
        x: anchor.x + (p.x - anchor.x) * sx,
        y: anchor.y + (p.y - anchor.y) * sy,
      }));
      return true;
    }
    case "uniform-scale": {
      if (a.kind !== "text") return false;
      const { anchor, initialDelta } = session;
      const factor = Math.max((pointer.x - anchor.x) / initialDelta.x, (pointer.y - anchor.y) / initialDelta.y);
      const scale = Math.max(config.minTextScale, session.initialScale * factor);
      if (scale === a.scale) return false;
      a.scale = scale;
      return true;
    }
  }
}
