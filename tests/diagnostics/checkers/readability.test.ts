import { describe, it, expect } from "vitest";
import { checkReadability, longestCapsRun } from "../../../src/diagnostics/checkers/readability.js";
import { makeBox, makeGuide, makeModel } from "../../helpers/fixtures.js";

const guide = makeGuide();

describe("readability checker", () => {
  it("warns on a font just below the role minimum", () => {
    const [issue] = checkReadability(makeModel([makeBox({ id: "a", fontSize: 8 })]), guide);
    expect(issue?.key).toBe("Readability:font_size:a");
    expect(issue?.severity).toBe("warning");
    expect(issue?.details).toEqual({ kind: "font_size", current: 8, limit: 10 });
  });

  it("flags a font under three quarters of the minimum as critical", () => {
    const title = makeBox({ id: "t", role: "title", fontSize: 8, rect: { x: 48, y: 37.8, w: 864, h: 70.2 } });
    const [issue] = checkReadability(makeModel([title]), guide);
    expect(issue?.severity).toBe("critical");
    expect(issue?.measure).toBe(12);
  });

  it("holds untyped text near the top to title rules", () => {
    const box = makeBox({ id: "a", role: "text", fontSize: 16, rect: { x: 48, y: 20, w: 864, h: 60 } });
    const [issue] = checkReadability(makeModel([box]), guide);
    expect(issue?.severity).toBe("warning");
    expect(issue?.details).toEqual({ kind: "font_size", current: 16, limit: 20 });
  });

  it("suggests splitting over-long lines", () => {
    const line = "x".repeat(95);
    const [issue] = checkReadability(makeModel([makeBox({ id: "a", text: line, lines: [line] })]), guide);
    expect(issue?.key).toBe("Readability:line_length:a");
    expect(issue?.severity).toBe("suggestion");
    expect(issue?.measure).toBe(5);
  });

  it("suggests softening long ALL-CAPS runs", () => {
    const text = "THIS IS A VERY LOUD HEADLINE";
    const [issue] = checkReadability(makeModel([makeBox({ id: "a", text, lines: [text] })]), guide);
    expect(issue?.details).toEqual({ kind: "all_caps", current: 28, limit: 20 });
  });

  it("skips empty boxes", () => {
    expect(checkReadability(makeModel([makeBox({ id: "a", text: "", lines: [], fontSize: 4 })]), guide)).toEqual([]);
  });
});

describe("longestCapsRun", () => {
  it("measures the longest uppercase run", () => {
    expect(longestCapsRun("Hello WORLD")).toBe(5);
    expect(longestCapsRun("NASA and IBM")).toBe(4);
    expect(longestCapsRun("quiet")).toBe(0);
  });
});
