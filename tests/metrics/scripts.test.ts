import { describe, it, expect } from "vitest";
import {
  detectLanguageProfile,
  fallbackWidthEm,
  isParticle,
  particleSuffixLength,
  scriptOf,
} from "../../src/metrics/scripts.js";

describe("scriptOf", () => {
  it("classifies characters by script", () => {
    expect(scriptOf("a")).toBe("latin");
    expect(scriptOf("7")).toBe("latin");
    expect(scriptOf(" ")).toBe("space");
    expect(scriptOf("가")).toBe("hangul");
    expect(scriptOf("中")).toBe("cjk");
    expect(scriptOf(".")).toBe("punctuation");
    expect(scriptOf("€")).toBe("other");
  });
});

describe("fallbackWidthEm", () => {
  it("sums per-script widths", () => {
    expect(fallbackWidthEm("Hi, 가")).toBeCloseTo(0.5 + 0.5 + 0.3 + 0.25 + 0.7, 10);
  });

  it("uses a custom table", () => {
    const table = { latin: 1, punctuation: 1, space: 1, hangul: 2, cjk: 2, other: 1 };
    expect(fallbackWidthEm("ab가", table)).toBe(4);
  });
});

describe("particles", () => {
  it("recognizes standalone particles", () => {
    expect(isParticle("를")).toBe(true);
    expect(isParticle("에서")).toBe(true);
    expect(isParticle("회의")).toBe(false);
  });

  it("prefers the longest particle suffix", () => {
    expect(particleSuffixLength("회의에서")).toBe(2);
    expect(particleSuffixLength("보고서를")).toBe(1);
  });

  it("does not treat a bare particle as its own suffix", () => {
    expect(particleSuffixLength("이")).toBe(0);
    expect(particleSuffixLength("서울")).toBe(0);
  });
});

describe("detectLanguageProfile", () => {
  it("defaults to space-delimited", () => {
    expect(detectLanguageProfile("Hello world")).toBe("space");
    expect(detectLanguageProfile("")).toBe("space");
  });

  it("detects hangul-dominant text", () => {
    expect(detectLanguageProfile("안녕하세요 여러분")).toBe("agglutinative");
  });

  it("detects CJK-dominant text", () => {
    expect(detectLanguageProfile("今日は良い天気")).toBe("character");
  });

  it("keeps mostly-latin text with a few hangul syllables as space", () => {
    expect(detectLanguageProfile("Revenue 매출")).toBe("space");
  });
});
