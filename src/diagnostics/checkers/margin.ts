import type { SlideGeometryModel } from "../../schema/geometry.js";
import type { StyleGuide } from "../../schema/style-guide.js";
import type { Edge, EdgeExcess, ValidationIssue } from "../../schema/validation.js";
import { edgeDistances } from "../../utils/geometry.js";
import { makeIssue, round2 } from "../issue.js";

const EDGES: readonly Edge[] = ["left", "top", "right", "bottom"];

/**
 * Detect in-canvas edges inside the comfort margin. Edges already past the
 * canvas belong to the out-of-bounds check and are skipped here.
 */
export function checkMargin(model: SlideGeometryModel, guide: StyleGuide): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const threshold = guide.margin;
  for (const box of model.boxes) {
    const dist = edgeDistances(box.rect, model.canvas);
    const edges: EdgeExcess[] = [];
    let closest = Infinity;
    for (const edge of EDGES) {
      const d = dist[edge];
      if (d < -guide.epsilon) continue;
      if (d < threshold - guide.epsilon) {
        edges.push({ edge, by_pt: round2(threshold - d) });
        closest = Math.min(closest, d);
      }
    }
    if (edges.length === 0) continue;

    issues.push(
      makeIssue(
        "Margin",
        closest < threshold / 2 ? "warning" : "suggestion",
        [box.id],
        Math.max(...edges.map((e) => e.by_pt)),
        `"${box.id}" sits inside the ${threshold}pt margin (${edges.map((e) => e.edge).join(", ")})`,
        { kind: "margin", threshold_pt: threshold, edges }
      )
    );
  }
  return issues;
}
