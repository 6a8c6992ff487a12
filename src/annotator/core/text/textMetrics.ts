export type TextMeasurer = (line: string, font: string) => number;

export const LINE_HEIGHT = 1.2;

export function cssFont(pointSize: number, fontFamily: string) {
  return `${pointSize}px ${fontFamily}`;
}

export function splitLines(text: string): string[] {
  return text.replace(/\r\n/g, "\n").split("\n");
}

/** Rough advance of 0.6em per character, used where no canvas is around (tests, workers). */
export const estimateTextWidth: TextMeasurer = (line, font) => {
  const size = parseFloat(font);
  const em = Number.isFinite(size) && size > 0 ? size : 12;
  return Array.from(line).length * em * 0.6;
};

/** Measures with a 2D canvas context, falling back to the estimate when none can be created. */
export function createCanvasTextMeasurer(): TextMeasurer {
  if (typeof document === "undefined") return estimateTextWidth;
  const canvas = document.createElement("canvas");
  const ctx = canvas.getContext("2d");
  if (!ctx) return estimateTextWidth;
  return (line, font) => {
    ctx.font = font;
    return ctx.measureText(line).width;
  };
}

/** Unscaled size of a multi-line block. */
export function measureTextBlock(params: {
  text: string;
  pointSize: number;
  fontFamily: string;
  measure: TextMeasurer;
}): { width: number; height: number; lines: string[] } {
  const { text, pointSize, fontFamily, measure } = params;
  const font = cssFont(pointSize, fontFamily);
  const lines = splitLines(text);
  let width = 0;
  for (const line of lines) width = Math.max(width, measure(line, font));
  return { width, height: lines.length * pointSize * LINE_HEIGHT, lines };
}
