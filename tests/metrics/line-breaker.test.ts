import { describe, it, expect } from "vitest";
import { hardBreak, wrapText } from "../../src/metrics/line-breaker.js";

/** One unit per character */
const chars = (s: string) => Array.from(s).length;

describe("wrapText", () => {
  it("fills lines greedily on spaces", () => {
    expect(wrapText("the quick brown fox", 10, chars, "space")).toEqual(["the quick", "brown fox"]);
  });

  it("returns no lines for blank text", () => {
    expect(wrapText("   ", 10, chars, "space")).toEqual([]);
  });

  it("treats newlines as paragraph breaks and keeps empty paragraphs", () => {
    expect(wrapText("alpha\n\nbeta", 10, chars, "space")).toEqual(["alpha", "", "beta"]);
  });

  it("hard-breaks a word wider than the line", () => {
    expect(wrapText("abcdefghij", 4, chars, "space")).toEqual(["abcd", "efgh", "ij"]);
  });

  it("breaks between any two characters under the character profile", () => {
    expect(wrapText("今日は良い天気です", 4, chars, "character")).toEqual(["今日は良", "い天気で", "す"]);
  });

  it("keeps latin runs whole under the character profile", () => {
    expect(wrapText("新しいAPI設計", 5, chars, "character")).toEqual(["新しい", "API設計"]);
  });

  it("keeps a detached particle with the word before it", () => {
    expect(wrapText("새로운 매출 이", 6, chars, "space")).toEqual(["새로운 매출", "이"]);
    expect(wrapText("새로운 매출 이", 6, chars, "agglutinative")).toEqual(["새로운", "매출 이"]);
  });
});

describe("hardBreak", () => {
  it("cuts at the last character that fits", () => {
    expect(hardBreak("회의실에서", 4, chars, "space")).toEqual(["회의실에", "서"]);
  });

  it("does not split a trailing particle under the agglutinative profile", () => {
    expect(hardBreak("회의실에서", 4, chars, "agglutinative")).toEqual(["회의실", "에서"]);
  });
});
