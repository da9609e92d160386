import { describe, it, expect } from "vitest";
import { SlideEngine } from "../src/engine.js";
import { EngineUsageError } from "../src/errors.js";
import { FixedWidthMetrics, silentLogger } from "./helpers/fixtures.js";

const REVIEW = {
  headline: "Quarterly review",
  bullets: ["Hire two engineers", "Close the Berlin office", "Renew vendor contracts"],
};

function makeEngine(): SlideEngine {
  return new SlideEngine({ metrics: new FixedWidthMetrics(), logger: silentLogger() });
}

describe("SlideEngine", () => {
  it("rejects malformed content", () => {
    expect(() => makeEngine().parseBlock({ bullets: "nope" })).toThrow(EngineUsageError);
  });

  it("binds a block to the generic layout", () => {
    const model = makeEngine().selectAndBind(REVIEW);
    expect(model.templateId).toBe("single_column");
    expect(model.category).toBe("generic");

    const [headline, body] = model.boxes;
    expect(headline?.fontSize).toBe(36);
    expect(body?.text).toBe(REVIEW.bullets.join("\n"));
    expect(body?.fontSize).toBe(24);
  });

  it("validates without fixing when asked", () => {
    const outcome = makeEngine().process(REVIEW, { skipFix: true });
    expect(outcome.summary).toBeNull();
    expect(outcome.validation.issues.map((i) => i.key)).toEqual(["FontConsistency:font_size:body"]);
  });

  it("snaps the body to an approved size", () => {
    const outcome = makeEngine().process(REVIEW);
    expect(outcome.validation.isValid).toBe(true);
    expect(outcome.validation.issues).toEqual([]);
    expect(outcome.summary?.stopReason).toBe("clean");
    expect(outcome.model.boxes[1]?.fontSize).toBe(18);
  });

  it("honours a layout hint", () => {
    const outcome = makeEngine().process(REVIEW, { hint: "bullet_list", skipFix: true });
    expect(outcome.selection.usedHint).toBe(true);
    expect(outcome.model.templateId).toBe("bullet_list");
  });

  it("processes a deck slide by slide", () => {
    const outcomes = makeEngine().processDeck([REVIEW, { quote: "Ship it.", attribution: "A. Founder" }], {
      skipFix: true,
    });
    expect(outcomes.map((o) => o.model.templateId)).toEqual(["single_column", "quote_highlight"]);
  });

  it("falls back to approximate metrics without a provider", () => {
    const engine = new SlideEngine({ logger: silentLogger() });
    const model = engine.selectAndBind({ headline: "Plan", body: "Details" });
    expect(model.boxes[0]?.text).toBe("Plan");
    expect(engine.validate(model).score).toBeGreaterThan(0);
  });
});
