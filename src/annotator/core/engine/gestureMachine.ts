import type {
  Annotation,
  AnnotationKind,
  AnnotationSnapshot,
  CursorHint,
  DrawKind,
  Point,
  StrokeStyle,
  ToolMode,
} from "../model/types";
import { isDrawKind } from "../model/types";
import type { EditorConfig } from "../model/config";
import { boundingBox, createDegenerate, createText, snapshotOf, translateAnnotation, triangleFromRect } from "../model/annotation";
import { containsPoint } from "../geometry/hitRegion";
import { boxesIntersect, normalizeRect } from "../geometry/rect";
import { applyResize, beginResize, findHandleAt, type ResizeSession } from "../selection/handles";
import type { TextMeasurer } from "../text/textMetrics";

export type GestureState =
  | { kind: "idle" }
  | { kind: "drawing"; shape: DrawKind; start: Point; annotationId: string }
  | { kind: "resizing"; session: ResizeSession; before: AnnotationSnapshot }
  | { kind: "moving"; last: Point; ids: string[]; before: Array<{ id: string; snapshot: AnnotationSnapshot }>; moved: boolean }
  | { kind: "marquee"; start: Point; current: Point; base: string[] }
  | { kind: "textEntry"; at: Point };

export type EditorState = {
  tool: ToolMode;
  gesture: GestureState;
  cursor: CursorHint;
};

export type GestureEvent =
  | { type: "down"; point: Point; shift?: boolean }
  | { type: "move"; point: Point; pressed: boolean }
  | { type: "up"; point: Point }
  | { type: "doubleClick"; point: Point }
  | { type: "textSubmitted"; text: string; confirmed: boolean }
  | { type: "cancel" }
  | { type: "setTool"; tool: ToolMode };

export type GestureEffect =
  | { type: "insert"; annotation: Annotation }
  | { type: "remove"; id: string }
  | { type: "restore"; id: string; snapshot: AnnotationSnapshot }
  | { type: "select"; ids: string[] }
  | { type: "markDirty" }
  | { type: "restoreDirty" }
  | { type: "cursor"; hint: CursorHint }
  | { type: "requestText"; at: Point }
  | { type: "requestTextEdit"; id: string };

/** What the machine may read from the scene. Geometry of live annotations is mutated in place. */
export type GestureView = {
  annotations: readonly Annotation[];
  config: EditorConfig;
  measure: TextMeasurer;
  style: StrokeStyle;
  nextId(kind: AnnotationKind): string;
};

export type GestureResult = { state: EditorState; effects: GestureEffect[] };

const IDLE: GestureState = { kind: "idle" };

export function initialEditorState(tool: ToolMode = "select"): EditorState {
  return { tool, gesture: IDLE, cursor: toolCursor(tool) };
}

export function toolCursor(tool: ToolMode): CursorHint {
  if (tool === "select") return "default";
  if (tool === "text") return "text";
  return "crosshair";
}

export function topmostAt(p: Point, view: Pick<GestureView, "annotations" | "config" | "measure">): Annotation | null {
  const list = view.annotations;
  for (let i = list.length - 1; i >= 0; i--) {
    if (containsPoint(list[i], p, view.config, view.measure)) return list[i];
  }
  return null;
}

/** Hover hint: handles first, then the topmost body under the pointer. */
export function cursorAt(tool: ToolMode, p: Point, view: Pick<GestureView, "annotations" | "config" | "measure">): CursorHint {
  if (tool !== "select") return toolCursor(tool);
  if (findHandleAt(view.annotations, p, view.config, view.measure)) return "resize";
  const hit = topmostAt(p, view);
  if (!hit) return "default";
  return hit.selected ? "move" : "pick";
}

function findById(view: GestureView, id: string) {
  return view.annotations.find((a) => a.id === id) ?? null;
}

function selectedIds(view: GestureView) {
  return view.annotations.filter((a) => a.selected).map((a) => a.id);
}

function withCursor(state: EditorState, hint: CursorHint, effects: GestureEffect[]): GestureResult {
  if (hint === state.cursor) return { state, effects };
  return { state: { ...state, cursor: hint }, effects: [...effects, { type: "cursor", hint }] };
}

function updateDrawing(a: Annotation, start: Point, current: Point) {
  switch (a.kind) {
    case "line":
    case "arrow":
      a.p1 = { ...start };
      a.p2 = { ...current };
      return;
    case "freehand":
      a.points.push({ ...current });
      return;
    case "rectangle":
    case "ellipse":
      a.rect = normalizeRect(start, current);
      return;
    case "triangle":
      a.rect = normalizeRect(start, current);
      a.vertices = triangleFromRect(a.rect);
      return;
    case "text":
      return;
  }
}

function onDown(state: EditorState, point: Point, shift: boolean, view: GestureView): GestureResult {
  // one gesture at a time
  if (state.gesture.kind !== "idle") return { state, effects: [] };
  const { tool } = state;

  if (isDrawKind(tool)) {
    const annotation = createDegenerate(tool, view.nextId(tool), point, view.style);
    return {
      state: { ...state, gesture: { kind: "drawing", shape: tool, start: { ...point }, annotationId: annotation.id } },
      effects: [{ type: "insert", annotation }],
    };
  }

  if (tool === "text") {
    return {
      state: { ...state, gesture: { kind: "textEntry", at: { ...point } } },
      effects: [{ type: "requestText", at: { ...point } }],
    };
  }

  const handle = findHandleAt(view.annotations, point, view.config, view.measure);
  if (handle) {
    const target = findById(view, handle.annotationId);
    if (target) {
      const session = beginResize(target, handle, point, view.measure);
      return { state: { ...state, gesture: { kind: "resizing", session, before: snapshotOf(target) } }, effects: [] };
    }
  }

  const hit = topmostAt(point, view);
  if (hit) {
    const current = selectedIds(view);
    if (shift) {
      const ids = hit.selected ? current.filter((id) => id !== hit.id) : [...current, hit.id];
      return withCursor(state, hit.selected ? "pick" : "move", [{ type: "select", ids }]);
    }
    const ids = hit.selected ? current : [hit.id];
    const effects: GestureEffect[] = hit.selected ? [] : [{ type: "select", ids }];
    const before = view.annotations.filter((a) => ids.includes(a.id)).map((a) => ({ id: a.id, snapshot: snapshotOf(a) }));
    return withCursor(
      { ...state, gesture: { kind: "moving", last: { ...point }, ids, before, moved: false } },
      "move",
      effects
    );
  }

  const base = shift ? selectedIds(view) : [];
  const effects: GestureEffect[] = shift ? [] : [{ type: "select", ids: [] }];
  return {
    state: { ...state, gesture: { kind: "marquee", start: { ...point }, current: { ...point }, base } },
    effects,
  };
}

function onMove(state: EditorState, point: Point, pressed: boolean, view: GestureView): GestureResult {
  const g = state.gesture;
  switch (g.kind) {
    case "idle":
    case "textEntry":
      if (pressed) return { state, effects: [] };
      return withCursor(state, cursorAt(state.tool, point, view), []);
    case "drawing": {
      const a = findById(view, g.annotationId);
      if (a) updateDrawing(a, g.start, point);
      return { state, effects: [] };
    }
    case "resizing": {
      const a = findById(view, g.session.annotationId);
      if (!a) return { state, effects: [] };
      const changed = applyResize(g.session, a, point, view.config);
      return { state, effects: changed ? [{ type: "markDirty" }] : [] };
    }
    case "moving": {
      const dx = point.x - g.last.x;
      const dy = point.y - g.last.y;
      if (dx === 0 && dy === 0) return { state, effects: [] };
      for (const a of view.annotations) {
        if (g.ids.includes(a.id)) translateAnnotation(a, dx, dy);
      }
      return {
        state: { ...state, gesture: { ...g, last: { ...point }, moved: true } },
        effects: [{ type: "markDirty" }],
      };
    }
    case "marquee":
      return { state: { ...state, gesture: { ...g, current: { ...point } } }, effects: [] };
  }
}

function marqueeSelection(g: Extract<GestureState, { kind: "marquee" }>, view: GestureView): string[] {
  const box = normalizeRect(g.start, g.current);
  const ids = new Set(g.base);
  if (box.width > 0 || box.height > 0) {
    for (const a of view.annotations) {
      if (boxesIntersect(box, boundingBox(a, view.measure))) ids.add(a.id);
    }
  }
  return view.annotations.filter((a) => ids.has(a.id)).map((a) => a.id);
}

/** Ends the in-flight gesture keeping whatever it reached. */
function commit(state: EditorState, view: GestureView): GestureResult {
  const g = state.gesture;
  const next: EditorState = { ...state, gesture: IDLE };
  switch (g.kind) {
    case "drawing":
      return { state: next, effects: [{ type: "markDirty" }] };
    case "marquee":
      return { state: next, effects: [{ type: "select", ids: marqueeSelection(g, view) }] };
    case "idle":
    case "resizing":
    case "moving":
    case "textEntry":
      return { state: next, effects: [] };
  }
}

/** Rolls the in-flight gesture back to where it was at press. */
function rollback(state: EditorState): GestureResult {
  const g = state.gesture;
  const next: EditorState = { ...state, gesture: IDLE };
  switch (g.kind) {
    case "drawing":
      return { state: next, effects: [{ type: "remove", id: g.annotationId }, { type: "restoreDirty" }] };
    case "resizing":
      return {
        state: next,
        effects: [{ type: "restore", id: g.session.annotationId, snapshot: g.before }, { type: "restoreDirty" }],
      };
    case "moving":
      return {
        state: next,
        effects: [
          ...g.before.map((b): GestureEffect => ({ type: "restore", id: b.id, snapshot: b.snapshot })),
          { type: "restoreDirty" },
        ],
      };
    case "marquee":
    case "textEntry":
      return { state: next, effects: [] };
    case "idle":
      return { state, effects: [] };
  }
}

function onTextSubmitted(state: EditorState, text: string, confirmed: boolean, view: GestureView): GestureResult {
  const g = state.gesture;
  if (g.kind !== "textEntry") return { state, effects: [] };
  const next: EditorState = { ...state, gesture: IDLE };
  if (!confirmed || text.length === 0) return { state: next, effects: [] };
  const annotation = createText({
    id: view.nextId("text"),
    content: text,
    anchor: g.at,
    style: view.style,
    fontFamily: view.config.defaultFontFamily,
    config: view.config,
  });
  return { state: next, effects: [{ type: "insert", annotation }, { type: "markDirty" }] };
}

export function handleGesture(state: EditorState, event: GestureEvent, view: GestureView): GestureResult {
  switch (event.type) {
    case "down":
      return onDown(state, event.point, !!event.shift, view);
    case "move":
      return onMove(state, event.point, event.pressed, view);
    case "up":
      // text entry ends on submission, not on release
      if (state.gesture.kind === "textEntry") return { state, effects: [] };
      return commit(state, view);
    case "doubleClick": {
      if (state.tool !== "select" || state.gesture.kind !== "idle") return { state, effects: [] };
      const hit = topmostAt(event.point, view);
      if (!hit || hit.kind !== "text") return { state, effects: [] };
      return { state, effects: [{ type: "requestTextEdit", id: hit.id }] };
    }
    case "textSubmitted":
      return onTextSubmitted(state, event.text, event.confirmed, view);
    case "cancel":
      return rollback(state);
    case "setTool": {
      const done = commit(state, view);
      const next: EditorState = { ...done.state, tool: event.tool };
      return withCursor(next, toolCursor(event.tool), done.effects);
    }
  }
}
