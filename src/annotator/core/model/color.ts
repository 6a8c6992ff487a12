import type { Rgba } from "./types";

const HEX_RE = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const FN_RE = /^rgba?\(\s*([^)]*)\)$/i;

function clampByte(n: number) {
  return Math.min(255, Math.max(0, Math.round(n)));
}

function clampAlpha(n: number) {
  return Math.min(1, Math.max(0, n));
}

/** Accepts `#rgb`, `#rrggbb`, `#rrggbbaa`, `rgb(r, g, b)` and `rgba(r, g, b, a)`. */
export function parseColor(input: string): Rgba | null {
  const s = input.trim();
  const hex = HEX_RE.exec(s);
  if (hex) {
    let h = hex[1];
    if (h.length === 3) h = Array.from(h, (c) => c + c).join("");
    const r = parseInt(h.slice(0, 2), 16);
    const g = parseInt(h.slice(2, 4), 16);
    const b = parseInt(h.slice(4, 6), 16);
    const a = h.length === 8 ? parseInt(h.slice(6, 8), 16) / 255 : 1;
    return { r, g, b, a };
  }

  const fn = FN_RE.exec(s);
  if (!fn) return null;
  const parts = fn[1].split(",").map((p) => p.trim());
  if (parts.length !== 3 && parts.length !== 4) return null;
  const nums = parts.map((p) => (p === "" ? NaN : Number(p)));
  if (nums.some((n) => !Number.isFinite(n))) return null;
  return {
    r: clampByte(nums[0]),
    g: clampByte(nums[1]),
    b: clampByte(nums[2]),
    a: nums.length === 4 ? clampAlpha(nums[3]) : 1,
  };
}

export function toCssColor(c: Rgba): string {
  return `rgba(${clampByte(c.r)}, ${clampByte(c.g)}, ${clampByte(c.b)}, ${clampAlpha(c.a)})`;
}

export function sameColor(a: Rgba, b: Rgba) {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}
