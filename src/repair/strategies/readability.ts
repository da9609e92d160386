import type { FittedBox } from "../../schema/geometry.js";
import type { RepairContext, Strategy, StrategyOutcome } from "../context.js";
import { growLimit, minReadableSize, primaryBox, relayout } from "../context.js";
import { isListBox, roleFont } from "../../diagnostics/roles.js";
import { CAPS_RUN_RE } from "../../diagnostics/checkers/readability.js";

function round2(v: number): number {
  return Math.round(v * 100) / 100;
}

function fitsAt(ctx: RepairContext, box: FittedBox, size: number, height = box.rect.h): boolean {
  const l = ctx.metrics.layout(box.text, box.rect.w, box.fontFamily, size, box.language);
  return l.height <= height + ctx.guide.epsilon && l.width <= box.rect.w + ctx.guide.epsilon;
}

/**
 * Smallest approved size at or above the readable minimum that fits; else
 * grow the box for it; else the largest readable size that fits as is.
 */
function raiseFontSize(ctx: RepairContext, box: FittedBox): StrategyOutcome {
  const method = "raiseFontSize";
  const sizeMin = minReadableSize(box, ctx.guide);
  if (sizeMin <= box.fontSize) return { method, note: `slot range caps the size at ${box.sizeRange.max}pt` };

  const approved = [...roleFont(box, ctx.guide).sizes]
    .filter((s) => s >= sizeMin && s <= box.sizeRange.max)
    .sort((p, q) => p - q);

  const fitting = approved.find((s) => fitsAt(ctx, box, s));
  if (fitting !== undefined) {
    box.fontSize = fitting;
    relayout(ctx, box);
    return { method };
  }

  const smallest = approved[0];
  if (smallest !== undefined) {
    const l = ctx.metrics.layout(box.text, box.rect.w, box.fontFamily, smallest, box.language);
    const needed = Math.ceil(l.height * 100) / 100;
    if (l.width <= box.rect.w + ctx.guide.epsilon && box.rect.y + needed <= growLimit(ctx, box)) {
      box.rect = { ...box.rect, h: Math.max(box.rect.h, needed) };
      box.fontSize = smallest;
      relayout(ctx, box);
      return { method: `${method}+growHeight` };
    }
  }

  const fit = ctx.metrics.fitToBox(box.text, {
    width: box.rect.w,
    height: box.rect.h,
    family: box.fontFamily,
    sizeMin,
    sizeMax: box.sizeRange.max,
    language: box.language,
  });
  if (!fit.fits) return { method, note: `text does not fit at ${sizeMin}pt or above` };
  box.fontSize = fit.size;
  box.lines = fit.lines;
  box.textWidth = round2(fit.textWidth);
  box.textHeight = round2(fit.textHeight);
  return { method };
}

function longestLine(lines: readonly string[]): number {
  return Math.max(0, ...lines.map((l) => l.length));
}

/** Narrow the wrap width until no line runs past the limit; paragraphs stay as they are */
function narrowLines(ctx: RepairContext, box: FittedBox): StrategyOutcome {
  const method = "narrowLines";
  const limit = ctx.guide.maxLineChars;
  const { gridStep, minBoxSize } = ctx.guide.fix;

  for (let w = box.rect.w - gridStep; w >= minBoxSize; w -= gridStep) {
    const l = ctx.metrics.layout(box.text, w, box.fontFamily, box.fontSize, box.language);
    if (longestLine(l.lines) > limit) continue;
    if (l.height > box.rect.h + ctx.guide.epsilon) {
      return { method, note: `lines of ${limit} characters need more than ${box.rect.h}pt` };
    }
    box.rect = { ...box.rect, w: round2(w) };
    relayout(ctx, box);
    return { method };
  }
  return { method, note: `no width keeps lines within ${limit} characters` };
}

function normalizeCase(ctx: RepairContext, box: FittedBox): StrategyOutcome {
  const method = "normalizeCase";
  if (!ctx.aggressive) return { method, note: "case changes need aggressive mode" };
  const minRun = ctx.guide.allCapsRun;
  box.text = box.text.replace(CAPS_RUN_RE, (run) =>
    run.length >= minRun ? run.charAt(0) + run.slice(1).toLowerCase() : run
  );
  relayout(ctx, box);
  return { method };
}

/** Reset line spacing to the guide and paragraph spacing to the slack between bullets */
export function standardizeSpacing(ctx: RepairContext, box: FittedBox): boolean {
  const paragraphSpacing = isListBox(box)
    ? ctx.metrics.bulletSpacing(box.lines.length, box.rect.h, box.fontFamily, box.fontSize)
    : 0;
  if (box.style.lineSpacing === ctx.guide.lineSpacing && box.style.paragraphSpacing === paragraphSpacing) {
    return false;
  }
  box.style.lineSpacing = ctx.guide.lineSpacing;
  box.style.paragraphSpacing = paragraphSpacing;
  return true;
}

export const improveReadability: Strategy = (ctx, issue) => {
  const box = primaryBox(ctx, issue);
  let outcome: StrategyOutcome;
  switch (issue.details.kind) {
    case "font_size":
      outcome = raiseFontSize(ctx, box);
      break;
    case "line_length":
      outcome = narrowLines(ctx, box);
      break;
    case "all_caps":
      outcome = normalizeCase(ctx, box);
      break;
    default:
      outcome = { method: "none", note: `no readability repair for ${issue.details.kind}` };
  }

  if (ctx.aggressive && standardizeSpacing(ctx, box)) {
    return { method: `${outcome.method}+standardizeSpacing`, note: outcome.note };
  }
  return outcome;
};
