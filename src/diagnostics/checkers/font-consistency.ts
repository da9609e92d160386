import type { SlideGeometryModel } from "../../schema/geometry.js";
import type { StyleGuide } from "../../schema/style-guide.js";
import type { ValidationIssue } from "../../schema/validation.js";
import { makeIssue } from "../issue.js";
import { effectiveRole, hasText, isApprovedFamily } from "../roles.js";

/** Detect families off the approved list and sizes off the role's approved sizes */
export function checkFontConsistency(model: SlideGeometryModel, guide: StyleGuide): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const box of model.boxes) {
    if (!hasText(box)) continue;

    if (!isApprovedFamily(box.fontFamily, guide)) {
      issues.push(
        makeIssue(
          "FontConsistency",
          "warning",
          [box.id],
          1,
          `"${box.id}" uses unapproved font "${box.fontFamily}"`,
          { kind: "font_family", current: box.fontFamily, approved: [...guide.approvedFonts] }
        )
      );
    }

    const role = effectiveRole(box, guide);
    const sizes = guide.roles[role].sizes;
    if (!sizes.includes(box.fontSize)) {
      const nearest = Math.min(...sizes.map((s) => Math.abs(s - box.fontSize)));
      issues.push(
        makeIssue(
          "FontConsistency",
          "warning",
          [box.id],
          nearest,
          `"${box.id}" uses ${box.fontSize}pt, not an approved ${role} size (${sizes.join(", ")})`,
          { kind: "font_size", current: box.fontSize, approved: [...sizes] }
        )
      );
    }
  }
  return issues;
}
