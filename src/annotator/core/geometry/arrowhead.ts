import type { Point } from "../model/types";
import type { EditorConfig } from "../model/config";

export function arrowSize(strokeWidth: number, config: Pick<EditorConfig, "arrowMinSize" | "arrowSizePerWidth">) {
  return Math.max(config.arrowMinSize, strokeWidth * config.arrowSizePerWidth);
}

/**
 * Wing points of an open arrowhead at `p2`, drawn as wing1 -> p2 -> wing2.
 * `null` for a zero-length shaft.
 */
export function arrowWings(
  p1: Point,
  p2: Point,
  strokeWidth: number,
  config: Pick<EditorConfig, "arrowMinSize" | "arrowSizePerWidth">
): [Point, Point] | null {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  if (dx === 0 && dy === 0) return null;
  // screen y grows downward, so the angle is taken against -dy
  const theta = Math.atan2(-dy, dx);
  const size = arrowSize(strokeWidth, config);
  const wing = (a: number): Point => ({ x: p2.x - Math.cos(a) * size, y: p2.y + Math.sin(a) * size });
  return [wing(theta + Math.PI / 3), wing(theta - Math.PI / 3)];
}
