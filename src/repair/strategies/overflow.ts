import type { FittedBox } from "../../schema/geometry.js";
import type { FitResult } from "../../metrics/text-metrics.js";
import type { Strategy } from "../context.js";
import { approvedAtMost, fitsInBox, growLimit, minReadableSize, primaryBox, relayout } from "../context.js";

function round2(v: number): number {
  return Math.round(v * 100) / 100;
}

function applyFit(box: FittedBox, fit: FitResult): void {
  box.fontSize = fit.size;
  box.lines = fit.lines;
  box.textWidth = round2(fit.textWidth);
  box.textHeight = round2(fit.textHeight);
}

/** Shrink the font to an approved size where one fits; failing that grow the box into free space; in aggressive mode truncate */
export const repairOverflow: Strategy = (ctx, issue) => {
  const box = primaryBox(ctx, issue);
  if (fitsInBox(box, ctx.guide.epsilon)) return { method: "shrinkFont", note: "text already fits" };

  const sizeMin = minReadableSize(box, ctx.guide);
  const sizeMax = Math.max(sizeMin, Math.min(box.fontSize, box.sizeRange.max));
  const fit = ctx.metrics.fitToBox(box.text, {
    width: box.rect.w,
    height: box.rect.h,
    family: box.fontFamily,
    sizeMin,
    sizeMax,
    language: box.language,
  });
  if (fit.fits) {
    const snapped = approvedAtMost(box, ctx.guide, fit.size, sizeMin);
    if (snapped === fit.size) {
      applyFit(box, fit);
    } else {
      box.fontSize = snapped;
      relayout(ctx, box);
    }
    return { method: "shrinkFont" };
  }

  const needed = Math.ceil(fit.textHeight * 100) / 100;
  if (fit.textWidth <= box.rect.w + ctx.guide.epsilon && box.rect.y + needed <= growLimit(ctx, box)) {
    box.rect = { ...box.rect, h: needed };
    applyFit(box, fit);
    return { method: "growHeight" };
  }

  if (ctx.aggressive) {
    const cut = ctx.metrics.truncateToFit(
      box.text,
      box.rect.w,
      box.rect.h,
      box.fontFamily,
      sizeMin,
      box.language
    );
    box.text = cut.text;
    box.fontSize = sizeMin;
    box.lines = cut.lines;
    box.textWidth = round2(cut.width);
    box.textHeight = round2(cut.height);
    box.truncated = box.truncated || cut.truncated;
    return { method: "truncateText" };
  }

  return {
    method: "shrinkFont",
    note: `needs ${needed}pt at ${sizeMin}pt but the box is ${box.rect.h}pt with no room to grow`,
  };
};
