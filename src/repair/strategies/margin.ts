import type { Rect } from "../../schema/geometry.js";
import type { Strategy } from "../context.js";
import { collides, primaryBox, refit } from "../context.js";
import { edgeDistances } from "../../utils/geometry.js";

function clamp(v: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, v));
}

/** Move a box inside the comfort margin; shrink it from the edge when moving would collide */
export const respectMargin: Strategy = (ctx, issue) => {
  const box = primaryBox(ctx, issue);
  const { canvas } = ctx.model;
  const m = ctx.guide.margin;
  const r = box.rect;

  const dist = edgeDistances(r, canvas);
  if (Object.values(dist).every((d) => d >= m - ctx.guide.epsilon)) {
    return { method: "nudgeInward", note: "already clear of the margin" };
  }

  const fitsX = r.w <= canvas.w - 2 * m;
  const fitsY = r.h <= canvas.h - 2 * m;
  if (fitsX && fitsY) {
    const nudged: Rect = {
      ...r,
      x: clamp(r.x, m, canvas.w - m - r.w),
      y: clamp(r.y, m, canvas.h - m - r.h),
    };
    if (!collides(ctx, box, nudged)) {
      box.rect = nudged;
      return { method: "nudgeInward" };
    }
  }

  const x1 = Math.max(r.x, m);
  const y1 = Math.max(r.y, m);
  const x2 = Math.min(r.x + r.w, canvas.w - m);
  const y2 = Math.min(r.y + r.h, canvas.h - m);
  const shrunk: Rect = { x: x1, y: y1, w: x2 - x1, h: y2 - y1 };
  const min = ctx.guide.fix.minBoxSize;
  if (shrunk.w < min || shrunk.h < min) {
    return { method: "shrinkFromEdge", note: `shrinking would leave less than ${min}pt` };
  }
  box.rect = shrunk;
  refit(ctx, box);
  return { method: "shrinkFromEdge" };
};
