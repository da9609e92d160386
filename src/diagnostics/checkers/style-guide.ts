import type { SlideGeometryModel } from "../../schema/geometry.js";
import type { StyleGuide } from "../../schema/style-guide.js";
import type { ValidationIssue } from "../../schema/validation.js";
import { makeIssue } from "../issue.js";
import { effectiveRole, hasText, isApprovedFamily, isListBox, paragraphs } from "../roles.js";

/**
 * Composite house-style rules. These may restate findings of other
 * checkers under their own severity.
 */
export function checkStyleGuide(model: SlideGeometryModel, guide: StyleGuide): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const box of model.boxes) {
    if (!hasText(box)) continue;

    if (effectiveRole(box, guide) === "title" && box.fontSize < guide.titleSizeFloor) {
      issues.push(
        makeIssue(
          "StyleGuide",
          "warning",
          [box.id],
          guide.titleSizeFloor - box.fontSize,
          `Title "${box.id}" at ${box.fontSize}pt is below the ${guide.titleSizeFloor}pt floor`,
          { kind: "title_size", current: box.fontSize, limit: guide.titleSizeFloor }
        )
      );
    }

    if (isListBox(box)) {
      const count = paragraphs(box).length;
      if (count > guide.maxBullets) {
        issues.push(
          makeIssue(
            "StyleGuide",
            "suggestion",
            [box.id],
            count - guide.maxBullets,
            `"${box.id}" exceeds the house bullet ceiling of ${guide.maxBullets}`,
            { kind: "bullet_ceiling", current: count, limit: guide.maxBullets }
          )
        );
      }
    }

    if (!isApprovedFamily(box.fontFamily, guide)) {
      issues.push(
        makeIssue(
          "StyleGuide",
          "suggestion",
          [box.id],
          1,
          `"${box.id}" font "${box.fontFamily}" is not whitelisted`,
          { kind: "font_whitelist", current: box.fontFamily, limit: guide.approvedFonts.join(", ") }
        )
      );
    }
  }

  if (model.boxes.length > guide.maxBoxes) {
    issues.push(
      makeIssue(
        "StyleGuide",
        "warning",
        model.boxes.map((b) => b.id),
        model.boxes.length - guide.maxBoxes,
        `Slide has ${model.boxes.length} boxes (ceiling ${guide.maxBoxes})`,
        { kind: "box_ceiling", current: model.boxes.length, limit: guide.maxBoxes }
      )
    );
  }

  return issues;
}
