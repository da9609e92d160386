import type { IssueCategory } from "../../schema/validation.js";
import type { Strategy } from "../context.js";
import { clampIntoCanvas } from "./bounds.js";
import { enforceFontConsistency } from "./font-consistency.js";
import { respectMargin } from "./margin.js";
import { repairOverflow } from "./overflow.js";
import { separateBoxes } from "./overlap.js";
import { improveReadability } from "./readability.js";

/** Categories with an automatic repair. Density, StyleGuide and EmptyContent have none. */
export const STRATEGIES: Partial<Record<IssueCategory, Strategy>> = {
  OutOfBounds: clampIntoCanvas,
  Overflow: repairOverflow,
  Overlap: separateBoxes,
  Readability: improveReadability,
  Margin: respectMargin,
  FontConsistency: enforceFontConsistency,
};
