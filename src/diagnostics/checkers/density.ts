import type { SlideGeometryModel } from "../../schema/geometry.js";
import type { StyleGuide } from "../../schema/style-guide.js";
import type { ValidationIssue } from "../../schema/validation.js";
import { rectGap } from "../../utils/geometry.js";
import { makeIssue } from "../issue.js";
import { hasText, isListBox, paragraphs } from "../roles.js";

/** Detect too many bullets, too much text, and boxes packed too closely */
export function checkDensity(model: SlideGeometryModel, guide: StyleGuide): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const box of model.boxes) {
    if (!isListBox(box)) continue;
    const count = paragraphs(box).length;
    if (count > guide.maxBullets) {
      issues.push(
        makeIssue(
          "Density",
          "warning",
          [box.id],
          count - guide.maxBullets,
          `"${box.id}" has ${count} bullets (limit ${guide.maxBullets})`,
          { kind: "bullet_count", current: count, limit: guide.maxBullets }
        )
      );
    }
  }

  const withText = model.boxes.filter(hasText);
  const chars = withText.reduce((n, b) => n + b.text.length, 0);
  if (chars > guide.maxTotalChars) {
    issues.push(
      makeIssue(
        "Density",
        "warning",
        withText.map((b) => b.id),
        chars - guide.maxTotalChars,
        `Slide carries ${chars} characters (limit ${guide.maxTotalChars})`,
        { kind: "char_count", current: chars, limit: guide.maxTotalChars }
      )
    );
  }

  const boxes = model.boxes;
  for (let i = 0; i < boxes.length; i++) {
    for (let j = i + 1; j < boxes.length; j++) {
      const a = boxes[i]!;
      const b = boxes[j]!;
      const gap = rectGap(a.rect, b.rect);
      if (gap === null || gap >= guide.minBoxSpacing) continue;
      issues.push(
        makeIssue(
          "Density",
          "suggestion",
          [a.id, b.id],
          guide.minBoxSpacing - gap,
          `"${a.id}" and "${b.id}" are ${gap}pt apart (minimum ${guide.minBoxSpacing}pt)`,
          { kind: "spacing", current: gap, limit: guide.minBoxSpacing }
        )
      );
    }
  }

  return issues;
}
