export type {
  Annotation,
  AnnotationKind,
  AnnotationSnapshot,
  CursorHint,
  DrawKind,
  Point,
  RasterImage,
  Rect,
  Rgba,
  StrokeStyle,
  ToolMode,
} from "./core/model/types";
export { DRAW_KINDS, isDrawKind } from "./core/model/types";
export { DEFAULT_EDITOR_CONFIG, resolveEditorConfig, type EditorConfig } from "./core/model/config";
export { parseColor, toCssColor } from "./core/model/color";
export { boundingBox, cloneTranslated, cloneWithAnchor, triangleFromRect } from "./core/model/annotation";
export { containsPoint, widenToHitRegion, outlineOf, type HitRegion, type OutlinePath } from "./core/geometry/hitRegion";
export { arrowWings } from "./core/geometry/arrowhead";
export { normalizeRect } from "./core/geometry/rect";
export { handlesFor, findHandleAt, type Handle, type ResizeMode } from "./core/selection/handles";
export { Clipboard } from "./core/clipboard/clipboard";
export {
  handleGesture,
  initialEditorState,
  type EditorState,
  type GestureEffect,
  type GestureEvent,
  type GestureView,
} from "./core/engine/gestureMachine";
export { Scene, type SceneOptions, type StyleInput } from "./core/engine/Scene";
export { paintAnnotation, paintAnnotations, paintOverlay, type PaintContext } from "./core/render/paint";
export { KonvaRenderer, type KonvaRendererOptions } from "./core/render/KonvaRenderer";
export { acceptsPointer, bindStageInput, getPointerKind } from "./core/input/pointer";
export { keyCommandFor, runKeyCommand, type KeyCommand } from "./core/input/keyboard";
export { createCanvasTextMeasurer, estimateTextWidth, type TextMeasurer } from "./core/text/textMetrics";
export { rasterFromCanvas, rasterFromImageSource, ImageUrlRasterSource, type RasterSource } from "./core/io/RasterSource";
export { PdfPageRasterSource, openPdfDocument, rasterFromPdfPage } from "./core/io/pdfPageRaster";
