export type IssueCategory =
  | "Overflow"
  | "Overlap"
  | "OutOfBounds"
  | "Margin"
  | "Readability"
  | "FontConsistency"
  | "Density"
  | "StyleGuide"
  | "EmptyContent";

export type Severity = "critical" | "warning" | "suggestion" | "info";

/** Severity rank, higher is more severe */
export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  critical: 3,
  warning: 2,
  suggestion: 1,
  info: 0,
};

export type Edge = "left" | "right" | "top" | "bottom";

export interface EdgeExcess {
  edge: Edge;
  by_pt: number;
}

export interface OverflowDetails {
  kind: "overflow";
  overflow_y_pt: number;
  overflow_x_pt: number;
}

export interface OverlapDetails {
  kind: "overlap";
  overlap_area_pt2: number;
  /** overlap area / smaller box area */
  ratio: number;
}

export interface OutOfBoundsDetails {
  kind: "out_of_bounds";
  edges: EdgeExcess[];
}

export interface MarginDetails {
  kind: "margin";
  threshold_pt: number;
  /** how far inside the comfort margin each edge sits */
  edges: EdgeExcess[];
}

export interface ReadabilityDetails {
  kind: "font_size" | "line_length" | "all_caps";
  current: number;
  limit: number;
}

export interface FontConsistencyDetails {
  kind: "font_family" | "font_size";
  current: string | number;
  approved: Array<string | number>;
}

export interface DensityDetails {
  kind: "bullet_count" | "char_count" | "spacing";
  current: number;
  limit: number;
}

export interface StyleGuideDetails {
  kind: "title_size" | "bullet_ceiling" | "box_ceiling" | "font_whitelist";
  current: string | number;
  limit: string | number;
}

export interface EmptyContentDetails {
  kind: "placeholder";
}

export type IssueDetails =
  | OverflowDetails
  | OverlapDetails
  | OutOfBoundsDetails
  | MarginDetails
  | ReadabilityDetails
  | FontConsistencyDetails
  | DensityDetails
  | StyleGuideDetails
  | EmptyContentDetails;

/** A detected contract violation */
export interface ValidationIssue {
  /** Stable key: category, sub-kind and affected boxes */
  key: string;
  category: IssueCategory;
  severity: Severity;
  boxes: string[];
  /** Quantitative size of the violation (unit depends on the category) */
  measure: number;
  description: string;
  details: IssueDetails;
}

/** Immutable snapshot of one validation run */
export interface ValidationResult {
  readonly issues: readonly ValidationIssue[];
  /** No critical issue and no overlap or out-of-bounds issue of any severity */
  readonly isValid: boolean;
  readonly categoryCounts: Readonly<Record<IssueCategory, number>>;
  readonly severityCounts: Readonly<Record<Severity, number>>;
  /** 0–100 */
  readonly score: number;
}
