import { describe, expect, it } from "vitest";

import { Scene } from "../../engine/Scene";
import { keyCommandFor, runKeyCommand } from "../keyboard";

function sceneWithLine() {
  const scene = new Scene();
  scene.setTool("line");
  scene.pointerDown({ x: 0, y: 0 });
  scene.pointerMove({ x: 100, y: 0 }, true);
  scene.pointerUp({ x: 100, y: 0 });
  scene.setTool("select");
  return scene;
}

describe("keyCommandFor", () => {
  it("maps clipboard shortcuts with either modifier", () => {
    expect(keyCommandFor({ key: "c", ctrlKey: true })).toEqual({ type: "copy" });
    expect(keyCommandFor({ key: "C", metaKey: true })).toEqual({ type: "copy" });
    expect(keyCommandFor({ key: "x", ctrlKey: true })).toEqual({ type: "cut" });
    expect(keyCommandFor({ key: "v", metaKey: true })).toEqual({ type: "paste" });
    expect(keyCommandFor({ key: "a", ctrlKey: true })).toEqual({ type: "selectAll" });
    expect(keyCommandFor({ key: "z", ctrlKey: true })).toBeNull();
  });

  it("maps delete, escape and arrow nudges", () => {
    expect(keyCommandFor({ key: "Delete" })).toEqual({ type: "delete" });
    expect(keyCommandFor({ key: "Backspace" })).toEqual({ type: "delete" });
    expect(keyCommandFor({ key: "Escape" })).toEqual({ type: "escape" });
    expect(keyCommandFor({ key: "ArrowUp" })).toEqual({ type: "nudge", dx: 0, dy: -1 });
    expect(keyCommandFor({ key: "ArrowLeft", shiftKey: true })).toEqual({ type: "nudge", dx: -10, dy: 0 });
    expect(keyCommandFor({ key: "q" })).toBeNull();
  });

  it("leaves keys typed into form fields alone", () => {
    expect(keyCommandFor({ key: "Delete", target: { tagName: "INPUT" } })).toBeNull();
    expect(keyCommandFor({ key: "c", ctrlKey: true, target: { tagName: "TEXTAREA" } })).toBeNull();
    expect(keyCommandFor({ key: "Backspace", target: { isContentEditable: true } })).toBeNull();
    expect(keyCommandFor({ key: "Delete", target: { tagName: "DIV" } })).toEqual({ type: "delete" });
  });
});

describe("runKeyCommand", () => {
  it("deletes the selection whatever tool is active", () => {
    const scene = sceneWithLine();
    scene.selectAll();
    scene.setTool("ellipse");
    runKeyCommand(scene, { type: "delete" }, { x: 0, y: 0 });
    expect(scene.annotations).toHaveLength(0);
  });

  it("cancels a gesture before it clears the selection", () => {
    const scene = sceneWithLine();
    scene.selectAll();
    scene.pointerDown({ x: 50, y: 0 });
    scene.pointerMove({ x: 50, y: 40 }, true);
    runKeyCommand(scene, { type: "escape" }, { x: 0, y: 0 });
    expect(scene.isIdle).toBe(true);
    expect(scene.annotations[0]).toMatchObject({ p1: { x: 0, y: 0 }, selected: true });
    runKeyCommand(scene, { type: "escape" }, { x: 0, y: 0 });
    expect(scene.selected).toEqual([]);
  });

  it("pastes at the given point", () => {
    const scene = sceneWithLine();
    runKeyCommand(scene, { type: "selectAll" }, { x: 0, y: 0 });
    runKeyCommand(scene, { type: "copy" }, { x: 0, y: 0 });
    runKeyCommand(scene, { type: "paste" }, { x: 20, y: 30 });
    expect(scene.annotations[1]).toMatchObject({ p1: { x: 20, y: 30 }, p2: { x: 120, y: 30 }, selected: true });
  });

  it("nudges the selection", () => {
    const scene = sceneWithLine();
    scene.selectAll();
    runKeyCommand(scene, { type: "nudge", dx: 0, dy: 10 }, { x: 0, y: 0 });
    expect(scene.annotations[0]).toMatchObject({ p1: { x: 0, y: 10 }, p2: { x: 100, y: 10 } });
  });
});
