import { describe, it, expect } from "vitest";
import { checkOverlap } from "../../../src/diagnostics/checkers/overlap.js";
import { makeBox, makeGuide, makeModel } from "../../helpers/fixtures.js";

const guide = makeGuide();

function pairAt(y: number, x = 100) {
  return makeModel([
    makeBox({ id: "a", rect: { x: 100, y: 150, w: 300, h: 100 } }),
    makeBox({ id: "b", rect: { x, y, w: 300, h: 100 } }),
  ]);
}

describe("overlap checker", () => {
  it("reports identical boxes as critical", () => {
    const issues = checkOverlap(pairAt(150), guide);
    expect(issues).toHaveLength(1);
    expect(issues[0]?.key).toBe("Overlap:overlap:a+b");
    expect(issues[0]?.severity).toBe("critical");
    expect(issues[0]?.measure).toBe(30000);
    expect(issues[0]?.details).toEqual({ kind: "overlap", overlap_area_pt2: 30000, ratio: 1 });
  });

  it("scales severity with the share of the smaller box", () => {
    expect(checkOverlap(pairAt(240), guide)[0]?.severity).toBe("warning");
    expect(checkOverlap(pairAt(248), guide)[0]?.severity).toBe("suggestion");
  });

  it("ignores overlap at or below epsilon", () => {
    expect(checkOverlap(pairAt(249, 399), guide)).toEqual([]);
  });

  it("ignores touching boxes", () => {
    expect(checkOverlap(pairAt(250), guide)).toEqual([]);
  });
});
