import { EngineUsageError } from "../errors.js";
import type { SlideGeometryModel } from "../schema/geometry.js";
import type { StyleGuide } from "../schema/style-guide.js";
import type { IssueCategory, ValidationIssue, ValidationResult } from "../schema/validation.js";
import { checkDensity } from "./checkers/density.js";
import { checkEmptyContent } from "./checkers/empty-content.js";
import { checkFontConsistency } from "./checkers/font-consistency.js";
import { checkMargin } from "./checkers/margin.js";
import { checkOutOfBounds } from "./checkers/out-of-bounds.js";
import { checkOverflow } from "./checkers/overflow.js";
import { checkOverlap } from "./checkers/overlap.js";
import { checkReadability } from "./checkers/readability.js";
import { checkStyleGuide } from "./checkers/style-guide.js";
import { compareIssues, countByCategory, countBySeverity, isBlocking, qualityScore } from "./severity.js";

export type Checker = (model: SlideGeometryModel, guide: StyleGuide) => ValidationIssue[];

export const DEFAULT_CHECKERS: readonly Checker[] = [
  checkOverflow,
  checkOverlap,
  checkOutOfBounds,
  checkMargin,
  checkReadability,
  checkFontConsistency,
  checkDensity,
  checkStyleGuide,
  checkEmptyContent,
];

/** Reject models a caller could not have produced through the engine */
export function assertModel(model: SlideGeometryModel | null | undefined): asserts model is SlideGeometryModel {
  if (!model || !Array.isArray(model.boxes) || !model.canvas) {
    throw new EngineUsageError("Expected a slide geometry model");
  }
  const ids = new Set<string>();
  for (const box of model.boxes) {
    if (ids.has(box.id)) {
      throw new EngineUsageError(`Duplicate box id "${box.id}" in model`, { boxId: box.id });
    }
    ids.add(box.id);
  }
}

/**
 * Read-only scanner. Runs every checker against a model and returns a
 * frozen, sorted snapshot; never mutates the model. A model is valid when
 * no issue blocks it (see `isBlocking`).
 */
export class SlideValidator {
  constructor(
    private readonly guide: StyleGuide,
    private readonly checkers: readonly Checker[] = DEFAULT_CHECKERS
  ) {}

  validate(model: SlideGeometryModel): ValidationResult {
    assertModel(model);
    const issues = this.checkers.flatMap((check) => check(model, this.guide)).sort(compareIssues);
    const severityCounts = countBySeverity(issues);
    return Object.freeze({
      issues: Object.freeze(issues),
      isValid: !issues.some(isBlocking),
      categoryCounts: Object.freeze(countByCategory(issues)),
      severityCounts: Object.freeze(severityCounts),
      score: qualityScore(severityCounts),
    });
  }
}

export function criticalIssues(result: ValidationResult): ValidationIssue[] {
  return result.issues.filter((i) => i.severity === "critical");
}

export function issuesByCategory(result: ValidationResult, category: IssueCategory): ValidationIssue[] {
  return result.issues.filter((i) => i.category === category);
}
