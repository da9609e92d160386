import type { SlideGeometryModel } from "../../schema/geometry.js";
import type { StyleGuide } from "../../schema/style-guide.js";
import type { Severity, ValidationIssue } from "../../schema/validation.js";
import { intersectionArea, rectArea } from "../../utils/geometry.js";
import { makeIssue, round2 } from "../issue.js";

function overlapSeverity(ratio: number): Severity {
  if (ratio > 0.3) return "critical";
  if (ratio > 0.05) return "warning";
  return "suggestion";
}

/**
 * Detect overlapping box pairs. Severity scales with the overlap area
 * relative to the smaller box.
 */
export function checkOverlap(model: SlideGeometryModel, guide: StyleGuide): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const boxes = model.boxes;
  for (let i = 0; i < boxes.length; i++) {
    for (let j = i + 1; j < boxes.length; j++) {
      const a = boxes[i]!;
      const b = boxes[j]!;
      const area = intersectionArea(a.rect, b.rect);
      if (area <= guide.overlapEpsilon) continue;

      const smaller = Math.min(rectArea(a.rect), rectArea(b.rect));
      const ratio = smaller > 0 ? area / smaller : 1;
      issues.push(
        makeIssue(
          "Overlap",
          overlapSeverity(ratio),
          [a.id, b.id],
          area,
          `"${a.id}" and "${b.id}" overlap by ${round2(area)}pt² (${Math.round(ratio * 100)}% of the smaller box)`,
          { kind: "overlap", overlap_area_pt2: round2(area), ratio: round2(ratio) }
        )
      );
    }
  }
  return issues;
}
