import type { SlideGeometryModel } from "../../schema/geometry.js";
import type { StyleGuide } from "../../schema/style-guide.js";
import type { ValidationIssue } from "../../schema/validation.js";
import { makeIssue, round2 } from "../issue.js";

/** Share of the box dimension past which overflow is critical */
const CRITICAL_OVERFLOW_RATIO = 0.25;

/**
 * Detect text whose measured extent exceeds its box.
 * Relies on the textWidth/textHeight recorded when the box was last fitted.
 */
export function checkOverflow(model: SlideGeometryModel, guide: StyleGuide): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const box of model.boxes) {
    const overflowY = box.textHeight - box.rect.h;
    const overflowX = box.textWidth - box.rect.w;
    if (overflowY <= guide.epsilon && overflowX <= guide.epsilon) continue;

    const critical =
      overflowY > box.rect.h * CRITICAL_OVERFLOW_RATIO || overflowX > box.rect.w * CRITICAL_OVERFLOW_RATIO;
    issues.push(
      makeIssue(
        "Overflow",
        critical ? "critical" : "warning",
        [box.id],
        Math.max(overflowY, overflowX),
        `Text in "${box.id}" overflows its box by ${round2(Math.max(overflowY, overflowX))}pt`,
        {
          kind: "overflow",
          overflow_y_pt: round2(Math.max(0, overflowY)),
          overflow_x_pt: round2(Math.max(0, overflowX)),
        }
      )
    );
  }
  return issues;
}
