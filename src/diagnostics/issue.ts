import type { IssueCategory, IssueDetails, Severity, ValidationIssue } from "../schema/validation.js";

export function round2(v: number): number {
  return Math.round(v * 100) / 100;
}

/** Build an issue with its stable key: category, sub-kind and boxes */
export function makeIssue(
  category: IssueCategory,
  severity: Severity,
  boxes: string[],
  measure: number,
  description: string,
  details: IssueDetails
): ValidationIssue {
  return {
    key: `${category}:${details.kind}:${boxes.join("+")}`,
    category,
    severity,
    boxes,
    measure: round2(measure),
    description,
    details,
  };
}
