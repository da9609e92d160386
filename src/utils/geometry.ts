import type { Canvas, Rect } from "../schema/geometry.js";
import type { Edge, EdgeExcess } from "../schema/validation.js";
import { CANVAS_W, CANVAS_H } from "../constants.js";

const DEFAULT_CANVAS: Canvas = { w: CANVAS_W, h: CANVAS_H };

/** Compute the intersection of two rects, or null if they don't intersect */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.w, b.x + b.w);
  const bottom = Math.min(a.y + a.h, b.y + b.h);
  const w = right - x;
  const h = bottom - y;
  if (w <= 0 || h <= 0) return null;
  return { x, y, w, h };
}

/** Compute the area of intersection between two rects */
export function intersectionArea(a: Rect, b: Rect): number {
  const inter = intersectRects(a, b);
  if (!inter) return 0;
  return inter.w * inter.h;
}

/** Clamp a rect into the canvas. Shrinks to the canvas first, then moves; never below minSize. */
export function clampToCanvas(r: Rect, canvas: Canvas = DEFAULT_CANVAS, minSize = 0): Rect {
  const w = Math.max(Math.min(r.w, canvas.w), Math.min(minSize, canvas.w));
  const h = Math.max(Math.min(r.h, canvas.h), Math.min(minSize, canvas.h));
  const x = Math.max(0, Math.min(r.x, canvas.w - w));
  const y = Math.max(0, Math.min(r.y, canvas.h - h));
  return { x, y, w, h };
}

/** Edges of a rect that exceed the canvas beyond eps tolerance */
export function oobEdges(r: Rect, eps: number, canvas: Canvas = DEFAULT_CANVAS): EdgeExcess[] {
  const edges: EdgeExcess[] = [];
  if (r.x < -eps) {
    edges.push({ edge: "left", by_pt: Math.abs(r.x) });
  }
  if (r.y < -eps) {
    edges.push({ edge: "top", by_pt: Math.abs(r.y) });
  }
  if (r.x + r.w > canvas.w + eps) {
    edges.push({ edge: "right", by_pt: r.x + r.w - canvas.w });
  }
  if (r.y + r.h > canvas.h + eps) {
    edges.push({ edge: "bottom", by_pt: r.y + r.h - canvas.h });
  }
  return edges;
}

/** Check if a rect is within the canvas (with tolerance) */
export function isInBounds(r: Rect, eps = 0, canvas: Canvas = DEFAULT_CANVAS): boolean {
  return oobEdges(r, eps, canvas).length === 0;
}

/** Distance from each rect edge to the matching canvas edge (negative when outside) */
export function edgeDistances(r: Rect, canvas: Canvas = DEFAULT_CANVAS): Record<Edge, number> {
  return {
    left: r.x,
    top: r.y,
    right: canvas.w - (r.x + r.w),
    bottom: canvas.h - (r.y + r.h),
  };
}

/**
 * Gap between two rects that face each other along one axis (their
 * projections on the other axis overlap). Null when they sit diagonally
 * or intersect.
 */
export function rectGap(a: Rect, b: Rect): number | null {
  const overlapX = Math.min(a.x + a.w, b.x + b.w) - Math.max(a.x, b.x);
  const overlapY = Math.min(a.y + a.h, b.y + b.h) - Math.max(a.y, b.y);
  if (overlapX > 0 && overlapY > 0) return null;
  if (overlapY > 0) return -overlapX;
  if (overlapX > 0) return -overlapY;
  return null;
}

/** Compute the area of a rect */
export function rectArea(r: Rect): number {
  return r.w * r.h;
}

export function rectsEqual(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.w === b.w && a.h === b.h;
}

/** Scale a normalized rect to canvas coordinates, rounded to 0.01pt */
export function denormalize(r: Rect, canvas: Canvas): Rect {
  const round = (v: number) => Math.round(v * 100) / 100;
  return {
    x: round(r.x * canvas.w),
    y: round(r.y * canvas.h),
    w: round(r.w * canvas.w),
    h: round(r.h * canvas.h),
  };
}
