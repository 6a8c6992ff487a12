import Konva from "konva";
import type { CursorHint, RasterImage } from "../model/types";
import type { Scene } from "../engine/Scene";
import { paintAnnotations, paintOverlay } from "./paint";

export type KonvaRendererOptions = {
  /** Device pixel ratio of the composite canvas. Export defaults to 1 (raster extent). */
  pixelRatio?: number;
};

const CSS_CURSOR: Record<CursorHint, string> = {
  default: "default",
  pick: "pointer",
  move: "move",
  resize: "nwse-resize",
  crosshair: "crosshair",
  text: "text",
};

export function rasterToCanvas(raster: RasterImage): HTMLCanvasElement {
  const canvas = document.createElement("canvas");
  canvas.width = raster.width;
  canvas.height = raster.height;
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("2D canvas context unavailable");
  const img = ctx.createImageData(raster.width, raster.height);
  img.data.set(raster.data);
  ctx.putImageData(img, 0, 0);
  return canvas;
}

/**
 * Draws a Scene with Konva: background image + one custom shape painting the
 * annotations on the content layer, selection chrome on the UI layer.
 */
export class KonvaRenderer {
  private stage: Konva.Stage | null = null;
  private contentLayer: Konva.Layer | null = null;
  private uiLayer: Konva.Layer | null = null;
  private backgroundNode: Konva.Image | null = null;
  private shownBackground: RasterImage | null = null;
  private cleanupFns: Array<() => void> = [];

  constructor(
    private scene: Scene,
    private options: KonvaRendererOptions = {}
  ) {}

  get konvaStage(): Konva.Stage | null {
    return this.stage;
  }

  private annotationShape() {
    return new Konva.Shape({
      listening: false,
      sceneFunc: (context) => {
        paintAnnotations(context._context, this.scene.annotations, this.scene.config);
      },
    });
  }

  mount(container: HTMLDivElement) {
    this.destroy();
    const { width, height } = this.scene.extent;
    const stage = new Konva.Stage({ container, width: Math.max(1, width), height: Math.max(1, height) });
    const contentLayer = new Konva.Layer({ listening: false });
    const uiLayer = new Konva.Layer({ listening: false });
    contentLayer.add(this.annotationShape());
    uiLayer.add(
      new Konva.Shape({
        listening: false,
        sceneFunc: (context) => {
          paintOverlay(context._context, {
            annotations: this.scene.annotations,
            handles: this.scene.tool === "select" ? this.scene.handles() : [],
            marquee: this.scene.marqueeRect(),
            config: this.scene.config,
            measure: this.scene.measure,
          });
        },
      })
    );
    stage.add(contentLayer);
    stage.add(uiLayer);
    this.stage = stage;
    this.contentLayer = contentLayer;
    this.uiLayer = uiLayer;

    this.cleanupFns.push(this.scene.on("changed", () => this.refresh()));
    this.cleanupFns.push(
      this.scene.on("cursorChanged", (hint) => {
        container.style.cursor = CSS_CURSOR[hint];
      })
    );
    container.style.cursor = CSS_CURSOR[this.scene.cursor];
    container.style.touchAction = "none";
    this.refresh();
  }

  /** Syncs stage size and background with the scene, then redraws both layers. */
  refresh() {
    if (!this.stage || !this.contentLayer || !this.uiLayer) return;
    const bg = this.scene.background;
    if (bg !== this.shownBackground) {
      this.backgroundNode?.destroy();
      this.backgroundNode = null;
      if (bg) {
        this.backgroundNode = new Konva.Image({ image: rasterToCanvas(bg), x: 0, y: 0, width: bg.width, height: bg.height });
        this.contentLayer.add(this.backgroundNode);
        this.backgroundNode.moveToBottom();
      }
      this.shownBackground = bg;
      const { width, height } = this.scene.extent;
      this.stage.size({ width: Math.max(1, width), height: Math.max(1, height) });
    }
    this.contentLayer.batchDraw();
    this.uiLayer.batchDraw();
  }

  /** Background followed by every annotation, at the background's extent. */
  renderComposite(): HTMLCanvasElement {
    const bg = this.scene.background;
    if (!bg) throw new Error("Nothing to export: no background loaded");
    const stage = new Konva.Stage({ container: document.createElement("div"), width: bg.width, height: bg.height });
    try {
      const layer = new Konva.Layer({ listening: false });
      layer.add(new Konva.Image({ image: rasterToCanvas(bg), x: 0, y: 0, width: bg.width, height: bg.height }));
      layer.add(this.annotationShape());
      stage.add(layer);
      return stage.toCanvas({ pixelRatio: this.options.pixelRatio ?? 1 });
    } finally {
      stage.destroy();
    }
  }

  destroy() {
    for (const fn of this.cleanupFns.splice(0)) fn();
    this.stage?.destroy();
    this.stage = null;
    this.contentLayer = null;
    this.uiLayer = null;
    this.backgroundNode = null;
    this.shownBackground = null;
  }
}
