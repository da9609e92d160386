import type { FittedBox, SlideGeometryModel } from "../../schema/geometry.js";
import type { StyleGuide } from "../../schema/style-guide.js";
import type { ValidationIssue } from "../../schema/validation.js";
import { makeIssue } from "../issue.js";
import { hasText, roleFont } from "../roles.js";

/** Uppercase runs, allowing spaces, digits and light punctuation inside */
export const CAPS_RUN_RE = /[A-Z][A-Z0-9 ,.'&-]*[A-Z0-9]/g;

/** Length of the longest ALL-CAPS run in `text` */
export function longestCapsRun(text: string): number {
  let longest = 0;
  for (const match of text.matchAll(CAPS_RUN_RE)) {
    longest = Math.max(longest, match[0].length);
  }
  return longest;
}

function longestLine(box: FittedBox): number {
  return Math.max(0, ...box.lines.map((l) => l.length));
}

/** Detect small fonts, over-long lines and long ALL-CAPS runs */
export function checkReadability(model: SlideGeometryModel, guide: StyleGuide): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const box of model.boxes) {
    if (!hasText(box)) continue;

    const min = roleFont(box, guide).min;
    if (box.fontSize < min) {
      issues.push(
        makeIssue(
          "Readability",
          box.fontSize < min * 0.75 ? "critical" : "warning",
          [box.id],
          min - box.fontSize,
          `"${box.id}" uses ${box.fontSize}pt, below the ${min}pt minimum`,
          { kind: "font_size", current: box.fontSize, limit: min }
        )
      );
    }

    const lineChars = longestLine(box);
    if (lineChars > guide.maxLineChars) {
      issues.push(
        makeIssue(
          "Readability",
          "suggestion",
          [box.id],
          lineChars - guide.maxLineChars,
          `"${box.id}" has a ${lineChars}-character line (limit ${guide.maxLineChars})`,
          { kind: "line_length", current: lineChars, limit: guide.maxLineChars }
        )
      );
    }

    const caps = longestCapsRun(box.text);
    if (caps >= guide.allCapsRun) {
      issues.push(
        makeIssue(
          "Readability",
          "suggestion",
          [box.id],
          caps,
          `"${box.id}" has a ${caps}-character ALL-CAPS run`,
          { kind: "all_caps", current: caps, limit: guide.allCapsRun }
        )
      );
    }
  }
  return issues;
}
