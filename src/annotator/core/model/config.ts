import type { StrokeStyle } from "./types";

export type EditorConfig = {
  /** Minimum total width of the band around an outline that counts as a hit. */
  hitFloor: number;
  /** Side of the painted handle square. */
  handleDrawSize: number;
  /** Manhattan distance within which a handle is grabbed. Not derived from handleDrawSize. */
  handleGrabRadius: number;
  minStrokeWidth: number;
  minTextScale: number;
  minPointSize: number;
  pointSizePerWidth: number;
  arrowMinSize: number;
  arrowSizePerWidth: number;
  defaultStyle: StrokeStyle;
  defaultFontFamily: string;
};

type NumericKey = {
  [K in keyof EditorConfig]: EditorConfig[K] extends number ? K : never;
}[keyof EditorConfig];

export const DEFAULT_EDITOR_CONFIG: Readonly<EditorConfig> = Object.freeze({
  hitFloor: 30,
  handleDrawSize: 12,
  handleGrabRadius: 30,
  minStrokeWidth: 0.1,
  minTextScale: 0.1,
  minPointSize: 6,
  pointSizePerWidth: 3,
  arrowMinSize: 10,
  arrowSizePerWidth: 3.5,
  defaultStyle: { color: { r: 17, g: 24, b: 39, a: 1 }, width: 2 },
  defaultFontFamily: "sans-serif",
});

const NUMERIC_KEYS: NumericKey[] = [
  "hitFloor",
  "handleDrawSize",
  "handleGrabRadius",
  "minStrokeWidth",
  "minTextScale",
  "minPointSize",
  "pointSizePerWidth",
  "arrowMinSize",
  "arrowSizePerWidth",
];

// Non-finite or non-positive overrides fall back to the default for that key.
export function resolveEditorConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  const out: EditorConfig = {
    ...DEFAULT_EDITOR_CONFIG,
    defaultStyle: {
      color: { ...DEFAULT_EDITOR_CONFIG.defaultStyle.color },
      width: DEFAULT_EDITOR_CONFIG.defaultStyle.width,
    },
  };
  for (const key of NUMERIC_KEYS) {
    const v = overrides[key];
    if (typeof v === "number" && Number.isFinite(v) && v > 0) out[key] = v;
  }
  if (overrides.defaultStyle) {
    const w = overrides.defaultStyle.width;
    out.defaultStyle = {
      color: { ...overrides.defaultStyle.color },
      width: Number.isFinite(w) ? Math.max(out.minStrokeWidth, w) : out.defaultStyle.width,
    };
  }
  if (typeof overrides.defaultFontFamily === "string" && overrides.defaultFontFamily.trim()) {
    out.defaultFontFamily = overrides.defaultFontFamily;
  }
  return out;
}
