import type { FittedBox, Rect } from "../../schema/geometry.js";
import type { RepairContext, Strategy } from "../context.js";
import { collides, findBox, refit } from "../context.js";
import { effectiveRole } from "../../diagnostics/roles.js";
import { intersectionArea, isInBounds, rectArea } from "../../utils/geometry.js";

/** Candidate steps per direction beyond the exact clearing distance */
const MAX_GRID_STEPS = 120;

function round2(v: number): number {
  return Math.round(v * 100) / 100;
}

/** Which of two colliding boxes moves: non-title, then lower priority, then smaller, then later */
export function chooseMover(ctx: RepairContext, a: FittedBox, b: FittedBox): [FittedBox, FittedBox] {
  const aTitle = effectiveRole(a, ctx.guide) === "title";
  const bTitle = effectiveRole(b, ctx.guide) === "title";
  if (aTitle !== bTitle) return aTitle ? [b, a] : [a, b];
  if (a.priority !== b.priority) return a.priority < b.priority ? [a, b] : [b, a];
  const areaA = rectArea(a.rect);
  const areaB = rectArea(b.rect);
  if (areaA !== areaB) return areaA < areaB ? [a, b] : [b, a];
  return ctx.model.boxes.indexOf(a) > ctx.model.boxes.indexOf(b) ? [a, b] : [b, a];
}

/**
 * Smallest rightward or downward move that clears `anchor`, stays on the
 * canvas and hits no other box. Ties prefer moving right.
 */
export function findDisplacement(ctx: RepairContext, mover: FittedBox, anchor: FittedBox): Rect | null {
  const { canvas } = ctx.model;
  const { minBoxSpacing, epsilon } = ctx.guide;
  const step = ctx.guide.fix.gridStep;
  const r = mover.rect;
  const a = anchor.rect;

  const candidates: Array<{ dx: number; dy: number }> = [];
  const clearX = a.x + a.w + minBoxSpacing - r.x;
  const clearY = a.y + a.h + minBoxSpacing - r.y;
  for (let k = 0; k <= MAX_GRID_STEPS; k++) {
    const dx = clearX + k * step;
    if (r.x + dx + r.w > canvas.w + epsilon) break;
    candidates.push({ dx, dy: 0 });
  }
  for (let k = 0; k <= MAX_GRID_STEPS; k++) {
    const dy = clearY + k * step;
    if (r.y + dy + r.h > canvas.h + epsilon) break;
    candidates.push({ dx: 0, dy });
  }
  candidates.sort((p, q) => p.dx + p.dy - (q.dx + q.dy) || q.dx - p.dx);

  for (const { dx, dy } of candidates) {
    const rect = { ...r, x: round2(r.x + dx), y: round2(r.y + dy) };
    if (isInBounds(rect, epsilon, canvas) && !collides(ctx, mover, rect)) return rect;
  }
  return null;
}

/** Shrink `mover` towards the side facing away from `anchor` */
function shrinkAway(ctx: RepairContext, mover: FittedBox, anchor: FittedBox): Rect {
  const { shrinkFactor, minBoxSize } = ctx.guide.fix;
  const r = mover.rect;
  const a = anchor.rect;
  const w = round2(Math.max(minBoxSize, r.w * shrinkFactor));
  const h = round2(Math.max(minBoxSize, r.h * shrinkFactor));
  const keepRight = r.x + r.w / 2 >= a.x + a.w / 2;
  const keepBottom = r.y + r.h / 2 >= a.y + a.h / 2;
  return {
    x: keepRight ? round2(r.x + r.w - w) : r.x,
    y: keepBottom ? round2(r.y + r.h - h) : r.y,
    w,
    h,
  };
}

export const separateBoxes: Strategy = (ctx, issue) => {
  const [idA, idB] = issue.boxes;
  if (idA === undefined || idB === undefined) return { method: "moveBox", note: "overlap issue without a pair" };
  const a = findBox(ctx.model, idA);
  const b = findBox(ctx.model, idB);
  if (intersectionArea(a.rect, b.rect) <= ctx.guide.overlapEpsilon) {
    return { method: "moveBox", note: "boxes no longer overlap" };
  }

  const [mover, anchor] = chooseMover(ctx, a, b);
  const moved = findDisplacement(ctx, mover, anchor);
  if (moved) {
    mover.rect = moved;
    return { method: "moveBox" };
  }

  if (ctx.aggressive) {
    const shrunk = shrinkAway(ctx, mover, anchor);
    if (intersectionArea(shrunk, anchor.rect) <= ctx.guide.overlapEpsilon && !collides(ctx, mover, shrunk)) {
      mover.rect = shrunk;
      refit(ctx, mover);
      return { method: "shrinkBox" };
    }
  }

  if (effectiveRole(anchor, ctx.guide) !== "title") {
    const swapped = findDisplacement(ctx, anchor, mover);
    if (swapped) {
      anchor.rect = swapped;
      return { method: "moveBox", note: `moved "${anchor.id}" instead of "${mover.id}"` };
    }
  }

  return { method: "moveBox", note: "no in-canvas displacement clears the overlap" };
};
