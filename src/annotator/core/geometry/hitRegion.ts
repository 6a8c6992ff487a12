import type { Annotation, Point, Rect } from "../model/types";
import type { EditorConfig } from "../model/config";
import { textBounds } from "../model/annotation";
import { rectContains } from "./rect";
import type { TextMeasurer } from "../text/textMetrics";

/** Centerline or outline of a mark. A single-point path is a dot. */
export type OutlinePath = {
  points: Point[];
  closed: boolean;
  /** Interior that counts as part of the region (text blocks). */
  fill?: Rect;
};

export type HitRegion = {
  halfWidth: number;
  contains(p: Point): boolean;
};

const ELLIPSE_SEGMENTS = 96;

export function distToSegment(p: Point, a: Point, b: Point): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const lenSq = dx * dx + dy * dy;
  const t = lenSq === 0 ? 0 : Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lenSq));
  return Math.hypot(p.x - (a.x + t * dx), p.y - (a.y + t * dy));
}

export function distToPath(p: Point, path: OutlinePath): number {
  const pts = path.points;
  if (pts.length === 0) return Infinity;
  if (pts.length === 1) return Math.hypot(p.x - pts[0].x, p.y - pts[0].y);
  let best = Infinity;
  for (let i = 1; i < pts.length; i++) best = Math.min(best, distToSegment(p, pts[i - 1], pts[i]));
  if (path.closed) best = Math.min(best, distToSegment(p, pts[pts.length - 1], pts[0]));
  return best;
}

function rectOutline(r: Rect): Point[] {
  return [
    { x: r.x, y: r.y },
    { x: r.x + r.width, y: r.y },
    { x: r.x + r.width, y: r.y + r.height },
    { x: r.x, y: r.y + r.height },
  ];
}

export function ellipseOutline(r: Rect, segments = ELLIPSE_SEGMENTS): Point[] {
  const cx = r.x + r.width / 2;
  const cy = r.y + r.height / 2;
  const rx = r.width / 2;
  const ry = r.height / 2;
  const out: Point[] = [];
  for (let i = 0; i < segments; i++) {
    const t = (i / segments) * Math.PI * 2;
    out.push({ x: cx + rx * Math.cos(t), y: cy + ry * Math.sin(t) });
  }
  return out;
}

export function outlineOf(a: Annotation, measure: TextMeasurer): OutlinePath {
  switch (a.kind) {
    case "line":
    case "arrow":
      return { points: [a.p1, a.p2], closed: false };
    case "freehand":
      return { points: a.points, closed: false };
    case "rectangle":
      return { points: rectOutline(a.rect), closed: true };
    case "ellipse":
      return { points: ellipseOutline(a.rect), closed: true };
    case "triangle":
      return { points: [...a.vertices], closed: true };
    case "text": {
      const box = textBounds(a, measure);
      return { points: rectOutline(box), closed: true, fill: box };
    }
  }
}

export function hitWidth(strokeWidth: number, floor: number) {
  return Math.max(strokeWidth, floor);
}

/** The path stroked with `width` (half on each side). */
export function widenToHitRegion(path: OutlinePath, width: number): HitRegion {
  const halfWidth = width / 2;
  const fill = path.fill;
  return {
    halfWidth,
    contains(p) {
      if (fill && rectContains(fill, p)) return true;
      return distToPath(p, path) <= halfWidth;
    },
  };
}

export function hitRegionOf(a: Annotation, config: Pick<EditorConfig, "hitFloor">, measure: TextMeasurer): HitRegion {
  return widenToHitRegion(outlineOf(a, measure), hitWidth(a.style.width, config.hitFloor));
}

export function containsPoint(
  a: Annotation,
  p: Point,
  config: Pick<EditorConfig, "hitFloor">,
  measure: TextMeasurer
): boolean {
  return hitRegionOf(a, config, measure).contains(p);
}
