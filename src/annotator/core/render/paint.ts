import type { Annotation, Point, Rect } from "../model/types";
import type { EditorConfig } from "../model/config";
import { boundingBox } from "../model/annotation";
import { toCssColor } from "../model/color";
import { arrowWings } from "../geometry/arrowhead";
import type { Handle } from "../selection/handles";
import { LINE_HEIGHT, cssFont, splitLines, type TextMeasurer } from "../text/textMetrics";

/** The slice of CanvasRenderingContext2D the painters use (Konva hands out the native one). */
export type PaintContext = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "closePath"
  | "stroke"
  | "fill"
  | "rect"
  | "ellipse"
  | "fillRect"
  | "strokeRect"
  | "fillText"
  | "translate"
  | "scale"
  | "setLineDash"
  | "strokeStyle"
  | "fillStyle"
  | "lineWidth"
  | "lineCap"
  | "lineJoin"
  | "font"
  | "textBaseline"
>;

const SELECTION_COLOR = "#6366f1";

function polyline(ctx: PaintContext, pts: readonly Point[], closed = false) {
  if (pts.length === 0) return;
  ctx.beginPath();
  ctx.moveTo(pts[0].x, pts[0].y);
  // a lone point still leaves a round-capped dot
  if (pts.length === 1) ctx.lineTo(pts[0].x, pts[0].y);
  for (let i = 1; i < pts.length; i++) ctx.lineTo(pts[i].x, pts[i].y);
  if (closed) ctx.closePath();
  ctx.stroke();
}

export function paintAnnotation(
  ctx: PaintContext,
  a: Annotation,
  config: Pick<EditorConfig, "arrowMinSize" | "arrowSizePerWidth">
) {
  const color = toCssColor(a.style.color);
  ctx.save();
  ctx.strokeStyle = color;
  ctx.fillStyle = color;
  ctx.lineWidth = a.style.width;
  ctx.lineCap = "round";
  ctx.lineJoin = "round";
  switch (a.kind) {
    case "line":
      polyline(ctx, [a.p1, a.p2]);
      break;
    case "arrow": {
      polyline(ctx, [a.p1, a.p2]);
      const wings = arrowWings(a.p1, a.p2, a.style.width, config);
      if (wings) polyline(ctx, [wings[0], a.p2, wings[1]]);
      break;
    }
    case "freehand":
      polyline(ctx, a.points);
      break;
    case "rectangle":
      ctx.beginPath();
      ctx.rect(a.rect.x, a.rect.y, a.rect.width, a.rect.height);
      ctx.stroke();
      break;
    case "ellipse":
      ctx.beginPath();
      ctx.ellipse(
        a.rect.x + a.rect.width / 2,
        a.rect.y + a.rect.height / 2,
        a.rect.width / 2,
        a.rect.height / 2,
        0,
        0,
        Math.PI * 2
      );
      ctx.stroke();
      break;
    case "triangle":
      polyline(ctx, a.vertices, true);
      break;
    case "text": {
      ctx.translate(a.anchor.x, a.anchor.y);
      ctx.scale(a.scale, a.scale);
      ctx.font = cssFont(a.pointSize, a.fontFamily);
      ctx.textBaseline = "top";
      const lineHeight = a.pointSize * LINE_HEIGHT;
      splitLines(a.content).forEach((line, i) => ctx.fillText(line, 0, i * lineHeight));
      break;
    }
  }
  ctx.restore();
}

/** Every annotation in paint order. Handles and selection chrome are not part of it. */
export function paintAnnotations(
  ctx: PaintContext,
  annotations: readonly Annotation[],
  config: Pick<EditorConfig, "arrowMinSize" | "arrowSizePerWidth">
) {
  for (const a of annotations) paintAnnotation(ctx, a, config);
}

export function paintOverlay(
  ctx: PaintContext,
  params: {
    annotations: readonly Annotation[];
    handles: readonly Handle[];
    marquee: Rect | null;
    config: Pick<EditorConfig, "handleDrawSize">;
    measure: TextMeasurer;
  }
) {
  const { annotations, handles, marquee, config, measure } = params;
  ctx.save();
  ctx.strokeStyle = SELECTION_COLOR;
  ctx.lineWidth = 1;

  ctx.setLineDash([4, 3]);
  for (const a of annotations) {
    if (!a.selected) continue;
    const b = boundingBox(a, measure);
    ctx.strokeRect(b.x, b.y, b.width, b.height);
  }

  ctx.setLineDash([]);
  ctx.fillStyle = "#ffffff";
  const half = config.handleDrawSize / 2;
  for (const h of handles) {
    ctx.fillRect(h.at.x - half, h.at.y - half, config.handleDrawSize, config.handleDrawSize);
    ctx.strokeRect(h.at.x - half, h.at.y - half, config.handleDrawSize, config.handleDrawSize);
  }

  if (marquee) {
    ctx.setLineDash([6, 4]);
    ctx.fillStyle = "rgba(99, 102, 241, 0.08)";
    ctx.fillRect(marquee.x, marquee.y, marquee.width, marquee.height);
    ctx.strokeRect(marquee.x, marquee.y, marquee.width, marquee.height);
  }
  ctx.restore();
}
