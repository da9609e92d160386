import { EngineUsageError } from "../errors.js";
import type { FittedBox, Rect, SlideGeometryModel } from "../schema/geometry.js";
import type { StyleGuide } from "../schema/style-guide.js";
import type { ValidationIssue } from "../schema/validation.js";
import type { TextMetricsEngine } from "../metrics/text-metrics.js";
import { roleFont } from "../diagnostics/roles.js";
import { intersectionArea } from "../utils/geometry.js";
import type { Logger } from "../utils/logger.js";

/** What a strategy sees: the working model and the shared primitives */
export interface RepairContext {
  model: SlideGeometryModel;
  metrics: TextMetricsEngine;
  guide: StyleGuide;
  aggressive: boolean;
  logger: Logger;
}

export interface StrategyOutcome {
  method: string;
  note?: string;
}

/**
 * A repair for one issue. It either resolves the issue or leaves the
 * model untouched; the fixer detects changes from box snapshots.
 */
export type Strategy = (ctx: RepairContext, issue: ValidationIssue) => StrategyOutcome;

export function findBox(model: SlideGeometryModel, id: string): FittedBox {
  const box = model.boxes.find((b) => b.id === id);
  if (!box) throw new EngineUsageError(`Issue references unknown box "${id}"`, { boxId: id });
  return box;
}

/** The box an issue is about (the first one it names) */
export function primaryBox(ctx: RepairContext, issue: ValidationIssue): FittedBox {
  const id = issue.boxes[0];
  if (id === undefined) throw new EngineUsageError(`Issue ${issue.key} names no box`);
  return findBox(ctx.model, id);
}

/** Smallest size a repair may set: the slot minimum, raised to the role minimum */
export function minReadableSize(box: FittedBox, guide: StyleGuide): number {
  const roleMin = Math.ceil(roleFont(box, guide).min);
  return Math.min(box.sizeRange.max, Math.max(box.sizeRange.min, roleMin));
}

function round2(v: number): number {
  return Math.round(v * 100) / 100;
}

/** Re-wrap a box's text at its current size and width */
export function relayout(ctx: RepairContext, box: FittedBox): void {
  const l = ctx.metrics.layout(box.text, box.rect.w, box.fontFamily, box.fontSize, box.language);
  box.lines = l.lines;
  box.textWidth = round2(l.width);
  box.textHeight = round2(l.height);
}

/** Largest approved role size in [sizeMin, size], or `size` when none lies there */
export function approvedAtMost(box: FittedBox, guide: StyleGuide, size: number, sizeMin: number): number {
  const sizes = roleFont(box, guide).sizes.filter((s) => s >= sizeMin && s <= size);
  return sizes.length > 0 ? Math.max(...sizes) : size;
}

/** Lowest bottom edge the box may grow to: the margin, or the next box below it */
export function growLimit(ctx: RepairContext, box: FittedBox): number {
  const { rect } = box;
  let limit = ctx.model.canvas.h - ctx.guide.margin;
  for (const other of ctx.model.boxes) {
    if (other === box) continue;
    const o = other.rect;
    const sharesColumn = o.x < rect.x + rect.w && rect.x < o.x + o.w;
    if (sharesColumn && o.y >= rect.y + rect.h - ctx.guide.epsilon) {
      limit = Math.min(limit, o.y - ctx.guide.minBoxSpacing);
    }
  }
  return limit;
}

/**
 * Re-fit after a resize: largest approved size up to the current one that
 * fits, never below the readable minimum. Returns whether the text fits.
 */
export function refit(ctx: RepairContext, box: FittedBox): boolean {
  const sizeMin = minReadableSize(box, ctx.guide);
  const sizeMax = Math.max(sizeMin, Math.min(box.fontSize, box.sizeRange.max));
  const fit = ctx.metrics.fitToBox(box.text, {
    width: box.rect.w,
    height: box.rect.h,
    family: box.fontFamily,
    sizeMin,
    sizeMax,
    initialGuess: box.fontSize,
    language: box.language,
  });
  box.fontSize = fit.fits ? approvedAtMost(box, ctx.guide, fit.size, sizeMin) : fit.size;
  if (box.fontSize === fit.size) {
    box.lines = fit.lines;
    box.textWidth = round2(fit.textWidth);
    box.textHeight = round2(fit.textHeight);
  } else {
    relayout(ctx, box);
  }
  return fit.fits;
}

/** Whether `rect` would overlap any box other than `self` */
export function collides(ctx: RepairContext, self: FittedBox, rect: Rect): boolean {
  return ctx.model.boxes.some(
    (other) => other !== self && intersectionArea(rect, other.rect) > ctx.guide.overlapEpsilon
  );
}

export function fitsInBox(box: FittedBox, eps: number): boolean {
  return box.textHeight <= box.rect.h + eps && box.textWidth <= box.rect.w + eps;
}
