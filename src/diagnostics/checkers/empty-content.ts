import type { SlideGeometryModel } from "../../schema/geometry.js";
import type { ValidationIssue } from "../../schema/validation.js";
import { makeIssue } from "../issue.js";

/** Required slots the block had no content for */
export function checkEmptyContent(model: SlideGeometryModel): ValidationIssue[] {
  return model.boxes
    .filter((box) => box.placeholder)
    .map((box) =>
      makeIssue("EmptyContent", "warning", [box.id], 1, `"${box.id}" is an empty placeholder`, {
        kind: "placeholder",
      })
    );
}
