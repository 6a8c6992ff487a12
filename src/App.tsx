import React, { useCallback, useRef, useState } from "react";
import AnnotatorCanvas, { type TextPrompt, type TextPromptResult } from "@/components/AnnotatorCanvas";
import {
  ImageUrlRasterSource,
  PdfPageRasterSource,
  openPdfDocument,
  type KonvaRenderer,
  type RasterImage,
  type Scene,
  type ToolMode,
} from "@/annotator/main";
import { exportAnnotatedImage } from "@/lib/exportAnnotatedImage";

const TOOLBAR_CSS = `
.annotator-toolbar{position:sticky;top:0;z-index:50;display:flex;justify-content:space-between;align-items:center;gap:12px;padding:8px 10px;background:#111827;color:#f9fafb}
.annotator-toolbar .group{display:inline-flex;align-items:center;gap:6px;flex-wrap:wrap}
.annotator-toolbar .btn{appearance:none;border:1px solid rgba(255,255,255,.18);background:rgba(255,255,255,.06);color:inherit;height:32px;min-width:32px;padding:0 10px;border-radius:8px;cursor:pointer;font-size:13px}
.annotator-toolbar .btn:disabled{opacity:.5;cursor:default}
.annotator-toolbar .btn.active{border-color:rgba(99,102,241,.9);background:rgba(99,102,241,.18)}
.annotator-toolbar .inp{width:70px;height:32px;padding:0 10px;border-radius:8px;border:1px solid rgba(255,255,255,.18);background:rgba(0,0,0,.25);color:#f9fafb}
.annotator-toolbar .sep{width:1px;height:22px;background:rgba(255,255,255,.14)}
`;

const TOOLS: Array<{ mode: ToolMode; label: string; title: string }> = [
  { mode: "select", label: "🖐", title: "Select / move (Esc)" },
  { mode: "line", label: "╱", title: "Line" },
  { mode: "arrow", label: "→", title: "Arrow" },
  { mode: "freehand", label: "✎", title: "Freehand" },
  { mode: "rectangle", label: "▭", title: "Rectangle" },
  { mode: "ellipse", label: "◯", title: "Ellipse" },
  { mode: "triangle", label: "△", title: "Triangle" },
  { mode: "text", label: "T", title: "Text" },
];

async function loadRaster(file: File): Promise<RasterImage> {
  if (file.type === "application/pdf") {
    const doc = await openPdfDocument(new Uint8Array(await file.arrayBuffer()));
    try {
      return await new PdfPageRasterSource(doc, 1).load();
    } finally {
      await doc.destroy();
    }
  }
  const url = URL.createObjectURL(file);
  try {
    return await new ImageUrlRasterSource(url).load();
  } finally {
    URL.revokeObjectURL(url);
  }
}

function downloadBlob(blob: Blob, filename: string): Promise<void> {
  const url = URL.createObjectURL(blob);
  const a = document.createElement("a");
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
  return Promise.resolve();
}

function promptForText(prompt: TextPrompt): Promise<TextPromptResult> {
  const initial = prompt.mode === "edit" ? prompt.current : "";
  const answer = window.prompt("Text", initial);
  return Promise.resolve(answer === null ? { text: "", confirmed: false } : { text: answer, confirmed: true });
}

export default function App() {
  const [background, setBackground] = useState<RasterImage | null>(null);
  const [fileName, setFileName] = useState("annotated");
  const [tool, setTool] = useState<ToolMode>("select");
  const [color, setColor] = useState("#111827");
  const [width, setWidth] = useState("2");
  const [dirty, setDirty] = useState(false);
  const [saving, setSaving] = useState(false);
  const [loadError, setLoadError] = useState<string | null>(null);
  const editorRef = useRef<{ scene: Scene; renderer: KonvaRenderer } | null>(null);

  const handleReady = useCallback((scene: Scene, renderer: KonvaRenderer) => {
    editorRef.current = { scene, renderer };
    scene.on("toolChanged", setTool);
  }, []);

  const handleOpen = async (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    e.target.value = "";
    if (!file) return;
    if (dirty && !window.confirm("Discard unsaved annotations?")) return;
    try {
      setBackground(await loadRaster(file));
      setFileName(file.name.replace(/\.[^.]+$/, "") || "annotated");
      setLoadError(null);
    } catch (err) {
      console.error("Failed to open file", err);
      setLoadError(err instanceof Error ? err.message : String(err));
    }
  };

  const handleExport = async () => {
    const editor = editorRef.current;
    if (!editor || !background) return;
    setSaving(true);
    try {
      await exportAnnotatedImage({
        scene: editor.scene,
        renderer: editor.renderer,
        write: (blob) => downloadBlob(blob, `${fileName}.png`),
      });
    } catch (err) {
      console.error("Export failed", err);
      window.alert(err instanceof Error ? err.message : "Export failed");
    } finally {
      setSaving(false);
    }
  };

  return (
    <div className="w-full relative flex flex-col" style={{ minHeight: "100%" }}>
      <style>{TOOLBAR_CSS}</style>
      <div className="annotator-toolbar">
        <div className="group">
          {TOOLS.map((t) => (
            <button
              key={t.mode}
              className={`btn ${tool === t.mode ? "active" : ""}`}
              onClick={() => setTool(t.mode)}
              title={t.title}
            >
              {t.label}
            </button>
          ))}
          <span className="sep"></span>
          <input type="color" value={color} onChange={(e) => setColor(e.target.value)} title="Color" />
          <input
            className="inp"
            type="number"
            min={0.1}
            step={0.5}
            value={width}
            onChange={(e) => setWidth(e.target.value)}
            title="Stroke width"
          />
        </div>
        <div className="group right">
          <label className="btn" title="Open image or PDF">
            Open
            <input type="file" accept="image/*,application/pdf" hidden onChange={(e) => void handleOpen(e)} />
          </label>
          <button className="btn" onClick={() => void handleExport()} disabled={!background || saving} title="Export PNG">
            {saving ? "Exporting..." : dirty ? "Export *" : "Export"}
          </button>
        </div>
      </div>
      {loadError && <span className="text-red-600">{loadError}</span>}
      <AnnotatorCanvas
        background={background}
        tool={tool}
        color={color}
        width={width}
        requestText={promptForText}
        onReady={handleReady}
        onDirtyChange={setDirty}
      />
    </div>
  );
}
