import type {
  Annotation,
  AnnotationKind,
  CursorHint,
  Point,
  RasterImage,
  Rect,
  StrokeStyle,
  ToolMode,
} from "../model/types";
import { resolveEditorConfig, type EditorConfig } from "../model/config";
import { applyStyleTo, cloneStyle, clampStrokeWidth, instantiate, translateAnnotation } from "../model/annotation";
import { parseColor } from "../model/color";
import { normalizeRect } from "../geometry/rect";
import { handlesFor, type Handle } from "../selection/handles";
import { Clipboard } from "../clipboard/clipboard";
import { estimateTextWidth, type TextMeasurer } from "../text/textMetrics";
import {
  cursorAt,
  handleGesture,
  initialEditorState,
  topmostAt,
  type EditorState,
  type GestureEffect,
  type GestureEvent,
  type GestureState,
  type GestureView,
} from "./gestureMachine";

type SceneEvents = {
  changed: undefined;
  cursorChanged: CursorHint;
  textRequested: { at: Point };
  textEditRequested: { id: string; current: string };
  toolChanged: ToolMode;
  selectionChanged: string[];
};

type Listener<K extends keyof SceneEvents> = (payload: SceneEvents[K]) => void;
type ListenerMap = { [K in keyof SceneEvents]?: Set<Listener<K>> };

export type SceneOptions = {
  config?: Partial<EditorConfig>;
  /** Text width measurement; the browser host passes a canvas-backed one. */
  measure?: TextMeasurer;
};

export type StyleInput = { color?: string; width?: string };

/**
 * Background raster plus the ordered annotation collection (insertion order is
 * paint order). The only object UI collaborators talk to.
 */
export class Scene {
  readonly config: EditorConfig;
  readonly measure: TextMeasurer;

  private listeners: ListenerMap = {};
  private bg: RasterImage | null = null;
  private items: Annotation[] = [];
  private isDirty = false;
  private dirtyAtGestureStart = false;
  private editor: EditorState = initialEditorState();
  private currentStyle: StrokeStyle;
  private clipboard = new Clipboard();
  private seq = 0;
  private rev = 0;

  constructor(options: SceneOptions = {}) {
    this.config = resolveEditorConfig(options.config);
    this.measure = options.measure ?? estimateTextWidth;
    this.currentStyle = cloneStyle(this.config.defaultStyle);
  }

  on<K extends keyof SceneEvents>(event: K, handler: Listener<K>): () => void {
    const listeners: { [P in K]?: Set<Listener<P>> } = this.listeners;
    const set = listeners[event] ?? new Set<Listener<K>>();
    listeners[event] = set;
    set.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof SceneEvents>(event: K, handler: Listener<K>) {
    this.listeners[event]?.delete(handler);
  }

  private emit<K extends keyof SceneEvents>(event: K, payload: SceneEvents[K]) {
    const set = this.listeners[event];
    if (!set || set.size === 0) return;
    for (const fn of Array.from(set)) {
      try {
        fn(payload);
      } catch (e) {
        console.error(`Scene "${event}" listener failed`, e);
      }
    }
  }

  // -----------------
  // read side
  // -----------------
  get background(): RasterImage | null {
    return this.bg;
  }

  get annotations(): readonly Annotation[] {
    return this.items;
  }

  get dirty() {
    return this.isDirty;
  }

  /** Goes up on every change to the background or the annotations. */
  get revision() {
    return this.rev;
  }

  get tool(): ToolMode {
    return this.editor.tool;
  }

  get cursor(): CursorHint {
    return this.editor.cursor;
  }

  get gesture(): GestureState["kind"] {
    return this.editor.gesture.kind;
  }

  /** No gesture in flight; renderers and exporters should only read an idle scene. */
  get isIdle() {
    return this.editor.gesture.kind === "idle";
  }

  get style(): StrokeStyle {
    return cloneStyle(this.currentStyle);
  }

  get selected(): Annotation[] {
    return this.items.filter((a) => a.selected);
  }

  get canPaste() {
    return !this.clipboard.isEmpty;
  }

  /** Scene extent; zero-size without a background. */
  get extent(): { width: number; height: number } {
    return this.bg ? { width: this.bg.width, height: this.bg.height } : { width: 0, height: 0 };
  }

  hitTest(p: Point): Annotation | null {
    return topmostAt(p, this.view());
  }

  cursorAt(p: Point): CursorHint {
    return cursorAt(this.editor.tool, p, this.view());
  }

  /** Handles of every selected annotation, in paint order. */
  handles(): Handle[] {
    return this.selected.flatMap((a) => handlesFor(a, this.measure));
  }

  /** Rubber-band rect while a marquee selection is in flight. */
  marqueeRect(): Rect | null {
    const g = this.editor.gesture;
    return g.kind === "marquee" ? normalizeRect(g.start, g.current) : null;
  }

  // -----------------
  // background
  // -----------------
  loadBackground(raster: RasterImage) {
    const { width, height, data } = raster;
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid raster size ${width}x${height}`);
    }
    if (data.length !== width * height * 4) {
      throw new Error(`Raster buffer holds ${data.length} bytes, expected ${width * height * 4}`);
    }
    this.bg = raster;
    this.items = [];
    this.editor = { ...this.editor, gesture: { kind: "idle" } };
    this.isDirty = false;
    this.rev += 1;
    this.emit("selectionChanged", []);
    this.emit("changed", undefined);
  }

  /**
   * Called by the exporter once the composited raster was written. Pass the
   * revision read before compositing: edits made since then keep the scene dirty.
   */
  markExported(revision = this.rev) {
    if (revision !== this.rev) return;
    this.isDirty = false;
    this.emit("changed", undefined);
  }

  // -----------------
  // gestures
  // -----------------
  setTool(tool: ToolMode) {
    const prev = this.editor.tool;
    this.dispatch({ type: "setTool", tool });
    if (prev !== tool) this.emit("toolChanged", tool);
  }

  pointerDown(point: Point, opts: { shift?: boolean } = {}) {
    this.dispatch({ type: "down", point, shift: opts.shift });
  }

  pointerMove(point: Point, pressed: boolean) {
    this.dispatch({ type: "move", point, pressed });
  }

  pointerUp(point: Point) {
    this.dispatch({ type: "up", point });
  }

  doubleClick(point: Point) {
    this.dispatch({ type: "doubleClick", point });
  }

  /** Rolls back the in-flight gesture; returns false when there was none. */
  cancelGesture(): boolean {
    if (this.isIdle) return false;
    this.dispatch({ type: "cancel" });
    return true;
  }

  submitText(text: string, confirmed: boolean) {
    this.dispatch({ type: "textSubmitted", text, confirmed });
  }

  private view(): GestureView {
    return {
      annotations: this.items,
      config: this.config,
      measure: this.measure,
      style: this.currentStyle,
      nextId: (kind: AnnotationKind) => this.newId(kind),
    };
  }

  private markChanged() {
    this.isDirty = true;
    this.rev += 1;
  }

  private newId(prefix: string) {
    this.seq += 1;
    return `${prefix}-${this.seq}`;
  }

  private dispatch(event: GestureEvent) {
    const wasIdle = this.isIdle;
    if (wasIdle) this.dirtyAtGestureStart = this.isDirty;
    const { state, effects } = handleGesture(this.editor, event, this.view());
    this.editor = state;
    this.applyEffects(effects);
    const structural = effects.some((e) => e.type !== "cursor");
    if (structural || !wasIdle) this.emit("changed", undefined);
  }

  private applyEffects(effects: GestureEffect[]) {
    for (const e of effects) {
      switch (e.type) {
        case "insert":
          this.items.push(e.annotation);
          break;
        case "remove":
          this.items = this.items.filter((a) => a.id !== e.id);
          break;
        case "restore": {
          const idx = this.items.findIndex((a) => a.id === e.id);
          if (idx >= 0) {
            const restored = instantiate(e.snapshot, e.id);
            restored.selected = this.items[idx].selected;
            this.items[idx] = restored;
          }
          break;
        }
        case "select":
          this.setSelection(e.ids);
          break;
        case "markDirty":
          this.markChanged();
          break;
        case "restoreDirty":
          this.isDirty = this.dirtyAtGestureStart;
          break;
        case "cursor":
          this.emit("cursorChanged", e.hint);
          break;
        case "requestText":
          this.emit("textRequested", { at: { ...e.at } });
          break;
        case "requestTextEdit": {
          const target = this.items.find((a) => a.id === e.id);
          if (target?.kind === "text") this.emit("textEditRequested", { id: target.id, current: target.content });
          break;
        }
      }
    }
  }

  // -----------------
  // selection
  // -----------------
  private setSelection(ids: readonly string[]) {
    const want = new Set(ids);
    let changed = false;
    for (const a of this.items) {
      const next = want.has(a.id);
      if (a.selected !== next) {
        a.selected = next;
        changed = true;
      }
    }
    if (changed) this.emit("selectionChanged", this.selected.map((a) => a.id));
  }

  select(ids: readonly string[]) {
    this.setSelection(ids);
    this.emit("changed", undefined);
  }

  selectAll() {
    this.select(this.items.map((a) => a.id));
  }

  clearSelection() {
    this.select([]);
  }

  // -----------------
  // commands
  // -----------------
  /** Keyboard nudge of every selected annotation. */
  moveSelected(dx: number, dy: number) {
    if (!this.isIdle || (dx === 0 && dy === 0)) return;
    const targets = this.selected;
    if (targets.length === 0) return;
    for (const a of targets) translateAnnotation(a, dx, dy);
    this.markChanged();
    this.emit("changed", undefined);
  }

  /** Removes every selected annotation; returns how many were removed. */
  deleteSelected(): number {
    if (!this.isIdle) return 0;
    const before = this.items.length;
    this.items = this.items.filter((a) => !a.selected);
    const removed = before - this.items.length;
    if (removed === 0) return 0;
    this.markChanged();
    this.emit("selectionChanged", []);
    this.emit("changed", undefined);
    return removed;
  }

  /** Copies the topmost selected annotation; false when nothing is selected. */
  copySelected(): boolean {
    const sel = this.selected;
    const top = sel[sel.length - 1];
    if (!top) return false;
    this.clipboard.copy(top);
    return true;
  }

  cutSelected(): boolean {
    if (!this.isIdle || !this.copySelected()) return false;
    this.deleteSelected();
    return true;
  }

  /** Pastes the clipboard at `point` as the sole selection; `null` when the clipboard is empty. */
  paste(point: Point): Annotation | null {
    if (!this.isIdle) return null;
    const snapshotKind = this.clipboard.peek()?.kind;
    if (!snapshotKind) return null;
    const created = this.clipboard.paste(point, this.newId(snapshotKind), this.measure);
    if (!created) return null;
    this.items.push(created);
    this.setSelection([created.id]);
    this.markChanged();
    this.emit("changed", undefined);
    return created;
  }

  /** Updates the default style and every selected annotation. */
  applyStyle(style: Partial<StrokeStyle>) {
    if (style.color) this.currentStyle = { ...this.currentStyle, color: { ...style.color } };
    if (typeof style.width === "number" && Number.isFinite(style.width)) {
      this.currentStyle = { ...this.currentStyle, width: clampStrokeWidth(style.width, this.config) };
    }
    let changed = false;
    for (const a of this.selected) {
      if (applyStyleTo(a, style, this.config)) changed = true;
    }
    if (changed) this.markChanged();
    this.emit("changed", undefined);
  }

  /** Raw widget values; anything unparsable rejects the whole input. */
  applyStyleInput(input: StyleInput): boolean {
    const next: Partial<StrokeStyle> = {};
    if (input.color !== undefined) {
      const color = parseColor(input.color);
      if (!color) {
        console.warn("Ignoring invalid color input", input.color);
        return false;
      }
      next.color = color;
    }
    if (input.width !== undefined) {
      const raw = input.width.trim();
      const width = raw === "" ? NaN : Number(raw);
      if (!Number.isFinite(width)) {
        console.warn("Ignoring invalid width input", input.width);
        return false;
      }
      next.width = width;
    }
    this.applyStyle(next);
    return true;
  }

  /** Replaces a text annotation's content when confirmed, non-empty and different. */
  editText(id: string, text: string, confirmed: boolean): boolean {
    if (!confirmed || text.length === 0) return false;
    const target = this.items.find((a) => a.id === id);
    if (!target || target.kind !== "text" || target.content === text) return false;
    target.content = text;
    this.markChanged();
    this.emit("changed", undefined);
    return true;
  }
}
