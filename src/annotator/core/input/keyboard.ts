import type { Point } from "../model/types";
import type { Scene } from "../engine/Scene";

export type KeyCommand =
  | { type: "delete" }
  | { type: "copy" }
  | { type: "cut" }
  | { type: "paste" }
  | { type: "selectAll" }
  | { type: "escape" }
  | { type: "nudge"; dx: number; dy: number };

export type KeyLike = {
  key: string;
  ctrlKey?: boolean;
  metaKey?: boolean;
  shiftKey?: boolean;
  target?: unknown;
};

function isEditableTarget(t: unknown): boolean {
  if (!t || typeof t !== "object") return false;
  const tagName = "tagName" in t ? t.tagName : undefined;
  if (tagName === "INPUT" || tagName === "TEXTAREA" || tagName === "SELECT") return true;
  return "isContentEditable" in t && t.isContentEditable === true;
}

const NUDGE: Record<string, [number, number]> = {
  ArrowLeft: [-1, 0],
  ArrowRight: [1, 0],
  ArrowUp: [0, -1],
  ArrowDown: [0, 1],
};

/** `null` for keys the editor leaves alone, and for anything typed into a form field. */
export function keyCommandFor(e: KeyLike): KeyCommand | null {
  if (isEditableTarget(e.target)) return null;
  const isMod = !!(e.ctrlKey || e.metaKey);
  const key = e.key.length === 1 ? e.key.toLowerCase() : e.key;

  if (isMod) {
    if (key === "c") return { type: "copy" };
    if (key === "x") return { type: "cut" };
    if (key === "v") return { type: "paste" };
    if (key === "a") return { type: "selectAll" };
    return null;
  }
  if (key === "Delete" || key === "Backspace") return { type: "delete" };
  if (key === "Escape") return { type: "escape" };
  const nudge = NUDGE[key];
  if (nudge) {
    const step = e.shiftKey ? 10 : 1;
    return { type: "nudge", dx: nudge[0] * step, dy: nudge[1] * step };
  }
  return null;
}

/** Runs a command against the scene; `pasteAt` is where a paste lands (usually the last pointer position). */
export function runKeyCommand(scene: Scene, cmd: KeyCommand, pasteAt: Point) {
  switch (cmd.type) {
    case "delete":
      scene.deleteSelected();
      return;
    case "copy":
      scene.copySelected();
      return;
    case "cut":
      scene.cutSelected();
      return;
    case "paste":
      scene.paste(pasteAt);
      return;
    case "selectAll":
      scene.selectAll();
      return;
    case "escape":
      if (!scene.cancelGesture()) scene.clearSelection();
      return;
    case "nudge":
      scene.moveSelected(cmd.dx, cmd.dy);
      return;
  }
}
