import type { Strategy } from "../context.js";
import { primaryBox, refit } from "../context.js";
import { clampToCanvas, rectsEqual } from "../../utils/geometry.js";

/** Pull a box back inside the canvas, shrinking it if it is larger than the canvas */
export const clampIntoCanvas: Strategy = (ctx, issue) => {
  const method = "clampToCanvas";
  const box = primaryBox(ctx, issue);
  const next = clampToCanvas(box.rect, ctx.model.canvas, ctx.guide.fix.minBoxSize);
  if (rectsEqual(next, box.rect)) return { method, note: "already inside the canvas" };

  const resized = next.w !== box.rect.w || next.h !== box.rect.h;
  box.rect = next;
  if (resized) refit(ctx, box);
  return { method };
};
