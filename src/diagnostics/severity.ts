import { CATEGORY_PRIORITY } from "../constants.js";
import {
  SEVERITY_RANK,
  type IssueCategory,
  type Severity,
  type ValidationIssue,
} from "../schema/validation.js";

/** Severity first, then category priority, then key for a stable order */
export function compareIssues(a: ValidationIssue, b: ValidationIssue): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    CATEGORY_PRIORITY[b.category] - CATEGORY_PRIORITY[a.category] ||
    a.key.localeCompare(b.key)
  );
}

/** Fix order: category priority first, then severity */
export function compareForRepair(a: ValidationIssue, b: ValidationIssue): number {
  return (
    CATEGORY_PRIORITY[b.category] - CATEGORY_PRIORITY[a.category] ||
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    a.key.localeCompare(b.key)
  );
}

/** Geometric conflicts that make a slide invalid at any severity */
const HARD_CATEGORIES: ReadonlySet<IssueCategory> = new Set(["Overlap", "OutOfBounds"]);

/** Critical issues, plus any overlap or out-of-bounds issue */
export function isBlocking(issue: ValidationIssue): boolean {
  return issue.severity === "critical" || HARD_CATEGORIES.has(issue.category);
}

export function countBySeverity(issues: readonly ValidationIssue[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { critical: 0, warning: 0, suggestion: 0, info: 0 };
  for (const issue of issues) counts[issue.severity]++;
  return counts;
}

export function countByCategory(issues: readonly ValidationIssue[]): Record<IssueCategory, number> {
  const counts: Record<IssueCategory, number> = {
    Overflow: 0,
    Overlap: 0,
    OutOfBounds: 0,
    Margin: 0,
    Readability: 0,
    FontConsistency: 0,
    Density: 0,
    StyleGuide: 0,
    EmptyContent: 0,
  };
  for (const issue of issues) counts[issue.category]++;
  return counts;
}

/** 0–100 quality score */
export function qualityScore(counts: Record<Severity, number>): number {
  return Math.max(0, 100 - 25 * counts.critical - 5 * counts.warning - counts.suggestion);
}
