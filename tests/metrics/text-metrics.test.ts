import { describe, it, expect } from "vitest";
import { TextMetricsEngine } from "../../src/metrics/text-metrics.js";
import { EngineUsageError } from "../../src/errors.js";
import { ApproximateFontMetrics } from "../../src/metrics/font-metrics.js";
import { FixedWidthMetrics, makeMetrics, silentLogger } from "../helpers/fixtures.js";

const BULLET = "Expand partner channels in three regions";
const SEVEN_BULLETS = Array.from({ length: 7 }, () => BULLET).join("\n");

describe("TextMetricsEngine", () => {
  describe("measureLine", () => {
    it("memoizes measurements", () => {
      const provider = new FixedWidthMetrics();
      const metrics = makeMetrics(provider);
      metrics.measureLine("abc", "Arial", 10);
      const second = metrics.measureLine("abc", "Arial", 10);
      expect(second).toEqual({ width: 15, height: 12, approximate: false });
      expect(provider.measured).toBe(1);
      const stats = metrics.getStats();
      expect(stats.hits).toBe(1);
      expect(stats.misses).toBe(1);
      expect(stats.size).toBe(1);
      expect(stats.hitRate).toBe(0.5);
    });

    it("falls back to the width table for an unknown family", () => {
      const metrics = makeMetrics(new FixedWidthMetrics(["Arial"]));
      expect(metrics.measureLine("ab", "Comic Sans", 10)).toEqual({ width: 10, height: 12, approximate: true });
      expect(metrics.getStats().degradedFamilies).toEqual(["Comic Sans"]);
    });

    it("empties the cache on clearCache", () => {
      const metrics = makeMetrics();
      metrics.measureLine("abc", "Arial", 10);
      metrics.clearCache();
      expect(metrics.getStats().size).toBe(0);
    });
  });

  describe("resolveFamily", () => {
    it("picks the first family the provider knows", () => {
      expect(makeMetrics().resolveFamily(["Missing", "Arial"])).toEqual({ family: "Arial", approximate: false });
    });

    it("approximates with the first candidate when none is known", () => {
      expect(makeMetrics().resolveFamily(["Missing"])).toEqual({ family: "Missing", approximate: true });
    });

    it("requires at least one candidate", () => {
      expect(() => makeMetrics().resolveFamily([])).toThrow(EngineUsageError);
    });
  });

  describe("measure and layout", () => {
    it("measures each explicit line", () => {
      expect(makeMetrics().measure("ab\nabcd", "Arial", 10)).toEqual({ width: 20, height: 24 });
    });

    it("wraps and measures a block", () => {
      expect(makeMetrics().layout("alpha beta gamma", 50, "Arial", 10)).toEqual({
        lines: ["alpha beta", "gamma"],
        width: 50,
        height: 24,
        approximate: false,
      });
    });
  });

  describe("fitToBox", () => {
    const request = { width: 300, height: 90, family: "Arial", sizeMin: 8, sizeMax: 14 };

    it("finds the largest size that fits", () => {
      const fit = makeMetrics().fitToBox(SEVEN_BULLETS, request);
      expect(fit.size).toBe(10);
      expect(fit.fits).toBe(true);
      expect(fit.lines).toHaveLength(7);
      expect(fit.textHeight).toBe(84);
      expect(fit.textWidth).toBe(200);
      expect(fit.overflowAmount).toBe(0);
      expect(fit.iterations).toBe(3);
    });

    it("reaches the same size from an initial guess", () => {
      const fit = makeMetrics().fitToBox(SEVEN_BULLETS, { ...request, initialGuess: 10 });
      expect(fit.size).toBe(10);
      expect(fit.iterations).toBe(3);
    });

    it("reports the residual overflow at the minimum size", () => {
      const fit = makeMetrics().fitToBox(SEVEN_BULLETS, { ...request, sizeMin: 12 });
      expect(fit.fits).toBe(false);
      expect(fit.size).toBe(12);
      expect(fit.overflowAmount).toBeCloseTo(10.8, 6);
      expect(fit.overflowWidth).toBe(0);
    });

    it("rejects an empty size range", () => {
      expect(() => makeMetrics().fitToBox("x", { ...request, sizeMin: 20, sizeMax: 10 })).toThrow(EngineUsageError);
    });
  });

  describe("truncateToFit", () => {
    it("keeps the longest smart truncation that fits", () => {
      const cut = makeMetrics().truncateToFit("one two three four five six", 100, 12, "Arial", 10);
      expect(cut).toEqual({
        text: "one two three...",
        lines: ["one two three..."],
        width: 80,
        height: 12,
        fits: true,
        truncated: true,
      });
    });

    it("leaves fitting text alone", () => {
      const cut = makeMetrics().truncateToFit("one two", 100, 12, "Arial", 10);
      expect(cut.text).toBe("one two");
      expect(cut.truncated).toBe(false);
    });
  });

  describe("bulletSpacing", () => {
    it("spreads slack between lines, capped at half a line", () => {
      expect(makeMetrics().bulletSpacing(3, 60, "Arial", 10)).toBe(6);
      expect(makeMetrics().bulletSpacing(3, 44, "Arial", 10)).toBe(4);
    });

    it("adds nothing to a single line", () => {
      expect(makeMetrics().bulletSpacing(1, 60, "Arial", 10)).toBe(0);
    });
  });

  it("honours a custom line spacing", () => {
    const metrics = new TextMetricsEngine(new FixedWidthMetrics(), { lineSpacing: 1.5, logger: silentLogger() });
    expect(metrics.lineHeight("Arial", 10)).toBe(15);
  });
});

describe("fitToBox height", () => {
  const engines = {
    "fixed width": makeMetrics(),
    approximate: new TextMetricsEngine(new ApproximateFontMetrics(), { logger: silentLogger() }),
  };
  const texts = {
    latin: "Expand partner channels in three regions before the autumn review",
    bullets: SEVEN_BULLETS,
    "long word": "Internationalization-readiness-assessment",
    korean: "분기별 매출 현황과 다음 분기 채용 계획을 검토합니다",
    cjk: "季度收入概况与下季度招聘计划",
  };
  const sizes: Array<[number, number]> = [
    [8, 9],
    [10, 14],
    [12, 13],
    [9, 36],
  ];

  for (const [engineName, engine] of Object.entries(engines)) {
    for (const [textName, text] of Object.entries(texts)) {
      it(`never shrinks as the size grows (${engineName}, ${textName})`, () => {
        for (const width of [120, 300, 860]) {
          for (const [small, large] of sizes) {
            const at = (size: number) =>
              engine.fitToBox(text, { width, height: 10_000, family: "Arial", sizeMin: size, sizeMax: size }).textHeight;
            expect(at(large)).toBeGreaterThanOrEqual(at(small));
          }
        }
      });
    }
  }
});
