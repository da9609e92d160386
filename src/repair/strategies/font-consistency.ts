import type { FittedBox } from "../../schema/geometry.js";
import type { RepairContext, StrategyOutcome, Strategy } from "../context.js";
import { fitsInBox, primaryBox, refit, relayout } from "../context.js";
import { effectiveRole, isApprovedFamily, roleFont } from "../../diagnostics/roles.js";

function snapFamily(ctx: RepairContext, box: FittedBox): StrategyOutcome {
  const method = "snapFamily";
  const roleFamily = roleFont(box, ctx.guide).family;
  const target = isApprovedFamily(roleFamily, ctx.guide) ? roleFamily : ctx.guide.approvedFonts[0];
  if (target === undefined || target === box.fontFamily) return { method, note: "no approved family to snap to" };
  box.fontFamily = target;
  relayout(ctx, box);
  if (!fitsInBox(box, ctx.guide.epsilon)) refit(ctx, box);
  return { method };
}

/** Nearest approved role size within the slot range that still fits; ties go to the smaller */
function snapFontSize(ctx: RepairContext, box: FittedBox): StrategyOutcome {
  const method = "snapFontSize";
  const current = box.fontSize;
  const candidates = roleFont(box, ctx.guide)
    .sizes.filter((s) => s >= box.sizeRange.min && s <= box.sizeRange.max)
    .sort((p, q) => Math.abs(p - current) - Math.abs(q - current) || p - q);

  for (const size of candidates) {
    const l = ctx.metrics.layout(box.text, box.rect.w, box.fontFamily, size, box.language);
    if (l.height <= box.rect.h + ctx.guide.epsilon && l.width <= box.rect.w + ctx.guide.epsilon) {
      if (size === current) return { method, note: "size already approved" };
      box.fontSize = size;
      relayout(ctx, box);
      return { method };
    }
  }
  return { method, note: "no approved size fits the box" };
}

/** Strip doubled emphasis on non-title text and standardize colour */
function standardizeStyle(ctx: RepairContext, box: FittedBox): boolean {
  let changed = false;
  if (effectiveRole(box, ctx.guide) !== "title" && box.style.bold && box.style.italic) {
    box.style.italic = false;
    changed = true;
  }
  if (box.style.color !== ctx.guide.textColor) {
    box.style.color = ctx.guide.textColor;
    changed = true;
  }
  return changed;
}

export const enforceFontConsistency: Strategy = (ctx, issue) => {
  const box = primaryBox(ctx, issue);
  const outcome =
    issue.details.kind === "font_family"
      ? snapFamily(ctx, box)
      : issue.details.kind === "font_size"
        ? snapFontSize(ctx, box)
        : { method: "none", note: `no font repair for ${issue.details.kind}` };

  if (ctx.aggressive && standardizeStyle(ctx, box)) {
    return { method: `${outcome.method}+standardizeStyle`, note: outcome.note };
  }
  return outcome;
};
