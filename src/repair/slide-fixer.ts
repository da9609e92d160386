import { EngineUsageError } from "../errors.js";
import type { SlideGeometryModel } from "../schema/geometry.js";
import type { FixResult, FixSummary, PassTrace, StopReason } from "../schema/fix.js";
import type { StyleGuide } from "../schema/style-guide.js";
import type { IssueCategory, ValidationIssue, ValidationResult } from "../schema/validation.js";
import type { TextMetricsEngine } from "../metrics/text-metrics.js";
import { assertModel, type SlideValidator } from "../diagnostics/validator.js";
import { compareForRepair, isBlocking } from "../diagnostics/severity.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { RepairContext, Strategy } from "./context.js";
import { snapshotBox, snapshotsEqual } from "./snapshot.js";
import { STRATEGIES } from "./strategies/index.js";

export interface FixOptions {
  aggressive?: boolean;
  maxIterations?: number;
  /** Checked between passes only */
  signal?: AbortSignal;
  /** Epoch ms; checked between passes only */
  deadlineMs?: number;
  /** Called after each pass is re-validated */
  onPass?: (trace: PassTrace) => void;
}

export interface FixOutcome {
  model: SlideGeometryModel;
  summary: FixSummary;
  result: ValidationResult;
}

interface PendingFix {
  issue: ValidationIssue;
  method: string;
  note?: string;
  changed: boolean;
  before: FixResult["before"];
  after: FixResult["after"];
  durationMs: number;
}

/**
 * Bounded fix loop. Pass 1 repairs every fixable issue in priority order;
 * later passes repair only the blocking issues that remain: criticals, and
 * overlaps or out-of-bounds boxes of any severity. Every pass ends
 * with a full re-validation, so a model is never left half-checked.
 */
export class SlideFixer {
  private readonly logger: Logger;

  constructor(
    private readonly metrics: TextMetricsEngine,
    private readonly validator: SlideValidator,
    private readonly guide: StyleGuide,
    logger?: Logger,
    private readonly strategies: Partial<Record<IssueCategory, Strategy>> = STRATEGIES
  ) {
    this.logger = logger ?? createLogger("fixer");
  }

  /** Repair a copy of `model`; the input is never mutated */
  fix(model: SlideGeometryModel, result: ValidationResult, options: FixOptions = {}): FixOutcome {
    assertModel(model);
    const maxIterations = options.maxIterations ?? this.guide.fix.maxIterations;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new EngineUsageError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    const started = performance.now();
    const work = structuredClone(model);
    const ctx: RepairContext = {
      model: work,
      metrics: this.metrics,
      guide: this.guide,
      aggressive: options.aggressive ?? false,
      logger: this.logger,
    };

    let current = result;
    const results: FixResult[] = [];
    const passes: PassTrace[] = [];
    let stopReason: StopReason;

    for (let pass = 1; ; pass++) {
      const blocking = current.issues.filter(isBlocking);
      if (current.issues.length === 0) {
        stopReason = "clean";
        break;
      }
      if (pass > 1 && blocking.length === 0) {
        stopReason = "no_critical";
        break;
      }
      if (pass > maxIterations) {
        stopReason = "budget_exhausted";
        break;
      }
      if (options.signal?.aborted || (options.deadlineMs !== undefined && Date.now() >= options.deadlineMs)) {
        stopReason = "aborted";
        break;
      }

      const targets = (pass === 1 ? current.issues : blocking)
        .filter((i) => this.strategies[i.category] !== undefined)
        .sort(compareForRepair);
      if (targets.length === 0) {
        stopReason = blocking.length > 0 ? "budget_exhausted" : "no_critical";
        break;
      }

      const pending = targets.map((issue) => this.apply(ctx, issue));
      current = this.validator.validate(work);
      const remaining = new Set(current.issues.map((i) => i.key));
      for (const p of pending) {
        results.push({ ...p, success: !remaining.has(p.issue.key), pass });
      }

      const trace: PassTrace = {
        pass,
        attempted: pending.length,
        changed: pending.filter((p) => p.changed).length,
        issue_count: current.issues.length,
        critical_count: current.severityCounts.critical,
        categories: [...new Set(targets.map((t) => t.category))],
        methods: [...new Set(pending.map((p) => p.method))],
      };
      passes.push(trace);
      options.onPass?.(trace);
      this.logger.debug(
        `Pass ${pass}: ${trace.changed}/${trace.attempted} changed, ${trace.issue_count} issues (${trace.critical_count} critical)`
      );
    }

    const fixedIssues = results.filter((r) => r.success).length;
    const summary: FixSummary = {
      totalIssues: results.length,
      fixedIssues,
      failedFixes: results.length - fixedIssues,
      successRate: results.length > 0 ? fixedIssues / results.length : 1,
      changes: results.filter((r) => r.changed).length,
      iterations: passes.length,
      stopReason,
      durationMs: performance.now() - started,
      passes,
      results,
    };

    const log = stopReason === "budget_exhausted" || stopReason === "aborted" ? "warn" : "info";
    this.logger[log](
      `Fix loop stopped (${stopReason}) after ${passes.length} pass(es): ${fixedIssues}/${results.length} fixed, ${current.severityCounts.critical} critical remaining`
    );

    return { model: work, summary, result: current };
  }

  private apply(ctx: RepairContext, issue: ValidationIssue): PendingFix {
    const strategy = this.strategies[issue.category];
    const ids = issue.boxes;
    const before = ctx.model.boxes.filter((b) => ids.includes(b.id)).map(snapshotBox);
    const t0 = performance.now();
    const outcome = strategy ? strategy(ctx, issue) : { method: "none", note: "no strategy" };
    const durationMs = performance.now() - t0;
    const after = ctx.model.boxes.filter((b) => ids.includes(b.id)).map(snapshotBox);
    return {
      issue,
      method: outcome.method,
      note: outcome.note,
      changed: !snapshotsEqual(before, after),
      before,
      after,
      durationMs,
    };
  }
}
