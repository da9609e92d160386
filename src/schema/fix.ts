import type { BoxStyle, Rect } from "./geometry.js";
import type { IssueCategory, ValidationIssue } from "./validation.js";

/** Why the fix loop stopped; `no_critical` means no blocking issue remains */
export type StopReason = "clean" | "no_critical" | "budget_exhausted" | "aborted";

/** The parts of a box a repair can change */
export interface BoxSnapshot {
  id: string;
  rect: Rect;
  fontFamily: string;
  fontSize: number;
  text: string;
  lineCount: number;
  textHeight: number;
  truncated: boolean;
  style: BoxStyle;
}

/** Outcome of applying one strategy to one issue */
export interface FixResult {
  issue: ValidationIssue;
  method: string;
  /** The issue no longer appears when the model is re-validated */
  success: boolean;
  changed: boolean;
  note?: string;
  before: BoxSnapshot[];
  after: BoxSnapshot[];
  durationMs: number;
  pass: number;
}

/** Per-pass record */
export interface PassTrace {
  pass: number;
  attempted: number;
  changed: number;
  issue_count: number;
  critical_count: number;
  categories: IssueCategory[];
  methods: string[];
}

export interface FixSummary {
  totalIssues: number;
  fixedIssues: number;
  failedFixes: number;
  /** fixed / total; 1 when nothing was attempted */
  successRate: number;
  /** Fix results that altered the model */
  changes: number;
  iterations: number;
  stopReason: StopReason;
  durationMs: number;
  passes: PassTrace[];
  results: FixResult[];
}
