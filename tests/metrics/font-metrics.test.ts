import { describe, it, expect } from "vitest";
import { ApproximateFontMetrics, fallbackMeasure } from "../../src/metrics/font-metrics.js";

describe("ApproximateFontMetrics", () => {
  const metrics = new ApproximateFontMetrics();

  it("looks families up case-insensitively", () => {
    expect(metrics.hasFamily("ARIAL")).toBe(true);
    expect(metrics.hasFamily("Wingdings")).toBe(false);
  });

  it("scales the family's average width by size", () => {
    const size = metrics.measure("ab", "Arial", 10);
    expect(size?.width).toBeCloseTo(9.6, 10);
    expect(size?.height).toBeCloseTo(11.5, 10);
  });

  it("widens hangul relative to latin", () => {
    expect(metrics.measure("가", "Arial", 10)?.width).toBeCloseTo(6.72, 10);
  });

  it("returns null for an unknown family", () => {
    expect(metrics.measure("ab", "Wingdings", 10)).toBeNull();
  });

  it("accepts extra families", () => {
    const extended = new ApproximateFontMetrics({ "House Sans": { avgCharWidth: 0.5, heightFactor: 1.3 } });
    expect(extended.measure("abcd", "house sans", 10)).toEqual({ width: 20, height: 13 });
  });
});

describe("fallbackMeasure", () => {
  it("uses the per-script table and a 1.2em line", () => {
    expect(fallbackMeasure("ab", 10)).toEqual({ width: 10, height: 12 });
  });
});
