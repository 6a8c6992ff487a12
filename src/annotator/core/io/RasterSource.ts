import type { RasterImage } from "../model/types";

/** Anything that can hand the editor a background raster (image decoder, document page renderer). */
export interface RasterSource {
  load(): Promise<RasterImage>;
}

export function rasterFromCanvas(canvas: HTMLCanvasElement): RasterImage {
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("2D canvas context unavailable");
  const { width, height } = canvas;
  const img = ctx.getImageData(0, 0, width, height);
  return { width, height, data: new Uint8ClampedArray(img.data) };
}

/** Rasterizes a decoded image (HTMLImageElement, ImageBitmap, video frame...). */
export function rasterFromImageSource(image: CanvasImageSource, size: { width: number; height: number }): RasterImage {
  const width = Math.round(size.width);
  const height = Math.round(size.height);
  if (width <= 0 || height <= 0) throw new Error(`Image has no pixels (${width}x${height})`);
  const canvas = document.createElement("canvas");
  canvas.width = width;
  canvas.height = height;
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("2D canvas context unavailable");
  ctx.drawImage(image, 0, 0, width, height);
  return rasterFromCanvas(canvas);
}

export class ImageUrlRasterSource implements RasterSource {
  constructor(private url: string) {}

  async load(): Promise<RasterImage> {
    const img = new Image();
    img.crossOrigin = "anonymous";
    img.src = this.url;
    await img.decode();
    return rasterFromImageSource(img, { width: img.naturalWidth, height: img.naturalHeight });
  }
}
