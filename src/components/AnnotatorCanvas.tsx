import React, { useEffect, useRef, useState } from "react";
import { Scene } from "@/annotator/core/engine/Scene";
import { KonvaRenderer } from "@/annotator/core/render/KonvaRenderer";
import { bindStageInput } from "@/annotator/core/input/pointer";
import { keyCommandFor, runKeyCommand } from "@/annotator/core/input/keyboard";
import { createCanvasTextMeasurer } from "@/annotator/core/text/textMetrics";
import type { Point, RasterImage, ToolMode } from "@/annotator/core/model/types";
import type { EditorConfig } from "@/annotator/core/model/config";

export type TextPrompt = { mode: "create"; at: Point } | { mode: "edit"; current: string };
export type TextPromptResult = { text: string; confirmed: boolean };

export type AnnotatorCanvasProps = {
  background: RasterImage | null;
  tool: ToolMode;
  /** Raw widget values; invalid ones are ignored by the scene. */
  color?: string;
  width?: string;
  config?: Partial<EditorConfig>;
  /** Text dialog supplied by the host page. */
  requestText: (prompt: TextPrompt) => Promise<TextPromptResult>;
  onReady?: (scene: Scene, renderer: KonvaRenderer) => void;
  onDirtyChange?: (dirty: boolean) => void;
};

export default function AnnotatorCanvas({
  background,
  tool,
  color,
  width,
  config,
  requestText,
  onReady,
  onDirtyChange,
}: AnnotatorCanvasProps) {
  const containerRef = useRef<HTMLDivElement | null>(null);
  const lastPointerRef = useRef<Point>({ x: 0, y: 0 });
  const requestTextRef = useRef(requestText);
  requestTextRef.current = requestText;
  const onReadyRef = useRef(onReady);
  onReadyRef.current = onReady;
  const [scene] = useState(() => new Scene({ config, measure: createCanvasTextMeasurer() }));
  const [renderer] = useState(() => new KonvaRenderer(scene));

  // Konva 스테이지 마운트 + 입력 연결
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;
    renderer.mount(container);
    const stage = renderer.konvaStage;
    const cleanupFns: Array<() => void> = [];
    if (stage) {
      cleanupFns.push(bindStageInput(stage, scene));
      stage.on("pointermove.lastpos", () => {
        const pos = stage.getPointerPosition();
        if (pos) lastPointerRef.current = pos;
      });
      cleanupFns.push(() => stage.off(".lastpos"));
    }

    cleanupFns.push(
      scene.on("textRequested", ({ at }) => {
        requestTextRef
          .current({ mode: "create", at })
          .then((r) => scene.submitText(r.text, r.confirmed))
          .catch((e: unknown) => {
            console.error("Text entry failed", e);
            scene.submitText("", false);
          });
      })
    );
    cleanupFns.push(
      scene.on("textEditRequested", ({ id, current }) => {
        requestTextRef
          .current({ mode: "edit", current })
          .then((r) => {
            scene.editText(id, r.text, r.confirmed);
          })
          .catch((e: unknown) => console.error("Text edit failed", e));
      })
    );

    onReadyRef.current?.(scene, renderer);
    return () => {
      cleanupFns.forEach((fn) => fn());
      renderer.destroy();
    };
  }, [scene, renderer]);

  useEffect(() => {
    if (!onDirtyChange) return;
    let last = scene.dirty;
    onDirtyChange(last);
    return scene.on("changed", () => {
      if (scene.dirty === last) return;
      last = scene.dirty;
      onDirtyChange(last);
    });
  }, [scene, onDirtyChange]);

  useEffect(() => {
    if (!background) return;
    try {
      scene.loadBackground(background);
    } catch (e) {
      console.error("Failed to load background", e);
    }
  }, [scene, background]);

  useEffect(() => {
    scene.setTool(tool);
  }, [scene, tool]);

  useEffect(() => {
    if (color !== undefined) scene.applyStyleInput({ color });
  }, [scene, color]);

  useEffect(() => {
    if (width !== undefined) scene.applyStyleInput({ width });
  }, [scene, width]);

  // 키보드 단축키
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      const cmd = keyCommandFor(e);
      if (!cmd) return;
      e.preventDefault();
      runKeyCommand(scene, cmd, lastPointerRef.current);
    };
    window.addEventListener("keydown", handleKeyDown);
    return () => window.removeEventListener("keydown", handleKeyDown);
  }, [scene]);

  return <div ref={containerRef} className="annotator-canvas" style={{ position: "relative", touchAction: "none" }} />;
}
