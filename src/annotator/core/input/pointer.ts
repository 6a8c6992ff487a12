import type Konva from "konva";
import type { Point } from "../model/types";
import type { Scene } from "../engine/Scene";

export type PointerKind = "mouse" | "touch" | "pen" | "unknown";

type PointerLike = { pointerType?: unknown } | null | undefined;

export function getPointerKind(evt: PointerLike): PointerKind {
  const pt = String(evt?.pointerType || "").toLowerCase();
  if (pt === "mouse") return "mouse";
  if (pt === "touch") return "touch";
  if (pt === "pen") return "pen";
  return "unknown";
}

export function isTouchPointer(evt: PointerLike): boolean {
  return getPointerKind(evt) === "touch";
}

/** Mouse and pen always drive the editor; of touch, only the first finger does. */
export function acceptsPointer(evt: { pointerType?: unknown; isPrimary?: unknown } | null | undefined): boolean {
  if (!isTouchPointer(evt)) return true;
  return evt?.isPrimary === true;
}

function validPoint(pos: Point | null): pos is Point {
  return !!pos && Number.isFinite(pos.x) && Number.isFinite(pos.y);
}

/**
 * Forwards stage pointer events to the scene. A second finger is ignored so
 * it cannot start a competing gesture. Returns a detach function.
 */
export function bindStageInput(stage: Konva.Stage, scene: Scene): () => void {
  let lastPos: Point = { x: 0, y: 0 };
  const pointerAt = (evt: PointerEvent | MouseEvent): Point | null => {
    stage.setPointersPositions(evt);
    const pos = stage.getPointerPosition();
    if (validPoint(pos)) lastPos = pos;
    return pos;
  };

  stage.on("pointerdown.annotator", (e: Konva.KonvaEventObject<PointerEvent>) => {
    if (!acceptsPointer(e.evt)) return;
    const pos = pointerAt(e.evt);
    if (!validPoint(pos)) return;
    scene.pointerDown(pos, { shift: e.evt.shiftKey });
  });

  stage.on("pointermove.annotator", (e: Konva.KonvaEventObject<PointerEvent>) => {
    if (!acceptsPointer(e.evt)) return;
    const pos = pointerAt(e.evt);
    if (!validPoint(pos)) return;
    scene.pointerMove(pos, e.evt.buttons !== 0);
  });

  stage.on("dblclick.annotator", (e: Konva.KonvaEventObject<MouseEvent>) => {
    const pos = pointerAt(e.evt);
    if (!validPoint(pos)) return;
    scene.doubleClick(pos);
  });

  // Release is watched on the window so a drag that leaves the stage still ends.
  const onWindowPointerUp = (evt: PointerEvent) => {
    if (!acceptsPointer(evt) || scene.isIdle) return;
    const pos = pointerAt(evt);
    scene.pointerUp(validPoint(pos) ? pos : lastPos);
  };
  window.addEventListener("pointerup", onWindowPointerUp);

  return () => {
    stage.off(".annotator");
    window.removeEventListener("pointerup", onWindowPointerUp);
  };
}
