import type { Scene } from "@/annotator/core/engine/Scene";
import type { KonvaRenderer } from "@/annotator/core/render/KonvaRenderer";

export type ExportMimeType = "image/png" | "image/jpeg" | "image/webp";

function canvasToBlob(canvas: HTMLCanvasElement, mimeType: ExportMimeType, quality?: number): Promise<Blob> {
  return new Promise((resolve, reject) => {
    canvas.toBlob(
      (blob) => {
        if (blob) resolve(blob);
        else reject(new Error(`Failed to encode composite as ${mimeType}`));
      },
      mimeType,
      quality
    );
  });
}

/**
 * Flattens background + annotations and hands the encoded image to `write`
 * (download, upload, image-to-document conversion...). The scene is marked
 * clean only once `write` resolves.
 */
export async function exportAnnotatedImage(params: {
  scene: Scene;
  renderer: Pick<KonvaRenderer, "renderComposite">;
  write: (blob: Blob) => Promise<void>;
  mimeType?: ExportMimeType;
  quality?: number;
}): Promise<Blob> {
  const { scene, renderer, write, mimeType = "image/png", quality } = params;
  if (!scene.isIdle) throw new Error("Cannot export while a gesture is in progress");

  const revision = scene.revision;
  // 1) background + annotations, handles excluded
  const canvas = renderer.renderComposite();

  // 2) encode
  const blob = await canvasToBlob(canvas, mimeType, quality);

  // 3) the caller's writer decides where it goes
  await write(blob);
  scene.markExported(revision);
  return blob;
}
