import type { SlideGeometryModel } from "../../schema/geometry.js";
import type { StyleGuide } from "../../schema/style-guide.js";
import type { ValidationIssue } from "../../schema/validation.js";
import { oobEdges } from "../../utils/geometry.js";
import { makeIssue, round2 } from "../issue.js";

/** Detect boxes extending past the canvas, one issue per box listing every edge */
export function checkOutOfBounds(model: SlideGeometryModel, guide: StyleGuide): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const box of model.boxes) {
    const edges = oobEdges(box.rect, guide.epsilon, model.canvas).map((e) => ({
      edge: e.edge,
      by_pt: round2(e.by_pt),
    }));
    if (edges.length === 0) continue;
    const worst = Math.max(...edges.map((e) => e.by_pt));
    issues.push(
      makeIssue(
        "OutOfBounds",
        "critical",
        [box.id],
        worst,
        `"${box.id}" extends past the canvas (${edges.map((e) => `${e.edge} ${e.by_pt}pt`).join(", ")})`,
        { kind: "out_of_bounds", edges }
      )
    );
  }
  return issues;
}
