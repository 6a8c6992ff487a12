import { describe, expect, it } from "vitest";

import { resolveEditorConfig } from "../../model/config";
import { arrowSize, arrowWings } from "../arrowhead";

const config = resolveEditorConfig();

describe("arrowWings", () => {
  it("skips the head of a zero-length arrow", () => {
    expect(arrowWings({ x: 5, y: 5 }, { x: 5, y: 5 }, 2, config)).toBeNull();
  });

  it("opens the wings backwards from the tip of a horizontal arrow", () => {
    const wings = arrowWings({ x: 0, y: 0 }, { x: 100, y: 0 }, 2, config);
    if (!wings) throw new Error("expected wings");
    const [w1, w2] = wings;
    expect(w1.x).toBeCloseTo(95, 6);
    expect(w1.y).toBeCloseTo(8.66, 2);
    expect(w2.x).toBeCloseTo(95, 6);
    expect(w2.y).toBeCloseTo(-8.66, 2);
  });

  it("opens the wings upwards from the tip of a downward arrow", () => {
    const wings = arrowWings({ x: 0, y: 0 }, { x: 0, y: 100 }, 2, config);
    if (!wings) throw new Error("expected wings");
    const [w1, w2] = wings;
    expect(w1.x).toBeCloseTo(-8.66, 2);
    expect(w1.y).toBeCloseTo(95, 6);
    expect(w2.x).toBeCloseTo(8.66, 2);
    expect(w2.y).toBeCloseTo(95, 6);
  });

  it("keeps each wing one head size away from the tip", () => {
    const tip = { x: 40, y: 30 };
    const wings = arrowWings({ x: 0, y: 0 }, tip, 4, config);
    if (!wings) throw new Error("expected wings");
    for (const w of wings) expect(Math.hypot(w.x - tip.x, w.y - tip.y)).toBeCloseTo(14, 6);
  });
});

describe("arrowSize", () => {
  it("grows with the stroke above a minimum", () => {
    expect(arrowSize(1, config)).toBe(10);
    expect(arrowSize(4, config)).toBe(14);
  });
});
