import { describe, it, expect } from "vitest";
import { clampIntoCanvas } from "../../../src/repair/strategies/bounds.js";
import { findIssue, makeBox, makeContext, makeModel } from "../../helpers/fixtures.js";

describe("clampIntoCanvas", () => {
  it("slides a box back onto the canvas without resizing it", () => {
    const model = makeModel([makeBox({ id: "a", rect: { x: -20, y: 500, w: 300, h: 100 } })]);
    const ctx = makeContext(model);
    const outcome = clampIntoCanvas(ctx, findIssue(model, ctx.guide, "OutOfBounds:out_of_bounds:a"));

    expect(outcome).toEqual({ method: "clampToCanvas" });
    expect(model.boxes[0]?.rect).toEqual({ x: 0, y: 440, w: 300, h: 100 });
    expect(model.boxes[0]?.fontSize).toBe(14);
  });

  it("shrinks a box wider than the canvas", () => {
    const model = makeModel([makeBox({ id: "a", rect: { x: -10, y: 100, w: 1000, h: 100 } })]);
    const ctx = makeContext(model);
    clampIntoCanvas(ctx, findIssue(model, ctx.guide, "OutOfBounds:out_of_bounds:a"));

    expect(model.boxes[0]?.rect).toEqual({ x: 0, y: 100, w: 960, h: 100 });
    expect(model.boxes[0]?.lines).toEqual(["Quarterly revenue"]);
  });

  it("reports a box already inside", () => {
    const model = makeModel([makeBox({ id: "a", rect: { x: -20, y: 150, w: 300, h: 100 } })]);
    const ctx = makeContext(model);
    const issue = findIssue(model, ctx.guide, "OutOfBounds:out_of_bounds:a");
    clampIntoCanvas(ctx, issue);
    expect(clampIntoCanvas(ctx, issue)).toEqual({ method: "clampToCanvas", note: "already inside the canvas" });
  });
});
