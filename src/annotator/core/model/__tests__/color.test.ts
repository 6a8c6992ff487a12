import { describe, expect, it } from "vitest";

import { parseColor, sameColor, toCssColor } from "../color";

describe("parseColor", () => {
  it("reads the hex forms", () => {
    expect(parseColor("#fff")).toEqual({ r: 255, g: 255, b: 255, a: 1 });
    expect(parseColor("#1a2B3c")).toEqual({ r: 26, g: 43, b: 60, a: 1 });
    expect(parseColor("#ff000000")).toEqual({ r: 255, g: 0, b: 0, a: 0 });
    expect(parseColor("#ff0000ff")).toEqual({ r: 255, g: 0, b: 0, a: 1 });
  });

  it("reads rgb() and rgba(), clamping out-of-range channels", () => {
    expect(parseColor("rgba(10, 20, 30, 0.5)")).toEqual({ r: 10, g: 20, b: 30, a: 0.5 });
    expect(parseColor(" rgb(300,-5,1.4) ")).toEqual({ r: 255, g: 0, b: 1, a: 1 });
    expect(parseColor("rgba(0,0,0,2)")).toEqual({ r: 0, g: 0, b: 0, a: 1 });
  });

  it("rejects anything else", () => {
    expect(parseColor("red")).toBeNull();
    expect(parseColor("#ff00")).toBeNull();
    expect(parseColor("rgb(1, 2)")).toBeNull();
    expect(parseColor("rgb(1,,3)")).toBeNull();
    expect(parseColor("rgb(a, b, c)")).toBeNull();
    expect(parseColor("")).toBeNull();
  });
});

describe("toCssColor", () => {
  it("formats as rgba()", () => {
    expect(toCssColor({ r: 1, g: 2, b: 3, a: 0.5 })).toBe("rgba(1, 2, 3, 0.5)");
  });
});

describe("sameColor", () => {
  it("compares every channel", () => {
    expect(sameColor({ r: 1, g: 2, b: 3, a: 1 }, { r: 1, g: 2, b: 3, a: 1 })).toBe(true);
    expect(sameColor({ r: 1, g: 2, b: 3, a: 1 }, { r: 1, g: 2, b: 3, a: 0.9 })).toBe(false);
  });
});
