// Shared types for the raster annotation editor

export type Point = { x: number; y: number };

export type Rect = { x: number; y: number; width: number; height: number };

/** Channels 0..255, alpha 0..1. */
export type Rgba = { r: number; g: number; b: number; a: number };

export type StrokeStyle = {
  color: Rgba;
  width: number;
};

export type DrawKind = "line" | "arrow" | "freehand" | "rectangle" | "ellipse" | "triangle";

export type ToolMode = "select" | "text" | DrawKind;

export const DRAW_KINDS: readonly DrawKind[] = ["line", "arrow", "freehand", "rectangle", "ellipse", "triangle"];

export function isDrawKind(tool: ToolMode): tool is DrawKind {
  return DRAW_KINDS.some((k) => k === tool);
}

type AnnotationBase = {
  id: string;
  style: StrokeStyle;
  selected: boolean;
};

export type LineAnnotation = AnnotationBase & { kind: "line"; p1: Point; p2: Point };
export type ArrowAnnotation = AnnotationBase & { kind: "arrow"; p1: Point; p2: Point };
export type FreehandAnnotation = AnnotationBase & { kind: "freehand"; points: Point[] };
export type RectangleAnnotation = AnnotationBase & { kind: "rectangle"; rect: Rect };
export type EllipseAnnotation = AnnotationBase & { kind: "ellipse"; rect: Rect };
export type TriangleAnnotation = AnnotationBase & {
  kind: "triangle";
  rect: Rect;
  /** apex, base-left, base-right */
  vertices: [Point, Point, Point];
};
export type TextAnnotation = AnnotationBase & {
  kind: "text";
  content: string;
  fontFamily: string;
  pointSize: number;
  /** top-left of the text block */
  anchor: Point;
  scale: number;
};

export type Annotation =
  | LineAnnotation
  | ArrowAnnotation
  | FreehandAnnotation
  | RectangleAnnotation
  | EllipseAnnotation
  | TriangleAnnotation
  | TextAnnotation;

export type AnnotationKind = Annotation["kind"];

/** Clipboard payload: everything but identity and selection state. */
export type AnnotationSnapshot = DistributiveOmit<Annotation, "id" | "selected">;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** RGBA, row-major, `data.length === width * height * 4`. */
export type RasterImage = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

export type CursorHint = "default" | "pick" | "move" | "resize" | "crosshair" | "text";
