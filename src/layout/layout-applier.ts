import { APPROXIMATE_METRICS_CONFIDENCE, INITIAL_GUESS_ELEMENTS, ROLE_PRIORITY } from "../constants.js";
import { ContentBindingError } from "../errors.js";
import type { Classification } from "../schema/category.js";
import type { ContentBlock } from "../schema/content.js";
import type { FittedBox, SlideGeometryModel } from "../schema/geometry.js";
import type { StyleGuide } from "../schema/style-guide.js";
import type { ElementSlot, LayoutTemplate } from "../schema/template.js";
import { detectLanguageProfile } from "../metrics/scripts.js";
import type { TextMetricsEngine } from "../metrics/text-metrics.js";
import { isListBox } from "../diagnostics/roles.js";
import { denormalize } from "../utils/geometry.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { resolveSlotText, type BoundText } from "./binding.js";

/** Initial font guess, shrinking as more slots compete for the slide */
export function initialGuess(sizeMax: number, elementCount: number): number {
  const ratio = elementCount > 0 ? Math.min(1, INITIAL_GUESS_ELEMENTS / elementCount) : 1;
  return Math.round(sizeMax * ratio);
}

/**
 * Binds a content block to a template, producing one fitted box per slot.
 * Boxes are fitted independently, so they may still collide.
 */
export class LayoutApplier {
  private readonly logger: Logger;

  constructor(
    private readonly metrics: TextMetricsEngine,
    private readonly guide: StyleGuide,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("applier");
  }

  bind(
    block: ContentBlock,
    template: LayoutTemplate,
    classification: Pick<Classification, "category" | "complexity">
  ): SlideGeometryModel {
    const bound = template.slots.map((slot) => ({ slot, text: resolveSlotText(block, slot) }));
    const elementCount = bound.filter((b) => b.text !== null).length;

    const boxes = bound.map(({ slot, text }) => this.fitSlot(block, template, slot, text, elementCount));

    return {
      templateId: template.id,
      category: classification.category,
      complexity: classification.complexity,
      canvas: { ...this.guide.canvas },
      boxes,
    };
  }

  private fitSlot(
    block: ContentBlock,
    template: LayoutTemplate,
    slot: ElementSlot,
    bound: BoundText | null,
    elementCount: number
  ): FittedBox {
    const rect = denormalize(slot.geometry, this.guide.canvas);
    const { family, approximate: unresolved } = this.metrics.resolveFamily(slot.fontFamilies);

    let text = bound?.text ?? slot.defaultText ?? "";
    const placeholder = bound === null && slot.defaultText === undefined && !slot.optional;
    if (placeholder) {
      const err = new ContentBindingError(
        `Slot "${slot.name}" of template "${template.id}" has no content (sources: ${slot.sources.join(", ")})`,
        template.id,
        slot.name
      );
      this.logger.warn(`${err.message}; using an empty placeholder`);
    }

    let truncated = false;
    if (text.length > slot.maxLength) {
      text = this.metrics.truncate(text, slot.maxLength);
      truncated = true;
    }

    const language = block.language === "auto" ? detectLanguageProfile(text) : block.language;
    const fit = this.metrics.fitToBox(text, {
      width: rect.w,
      height: rect.h,
      family,
      sizeMin: slot.fontSize.min,
      sizeMax: slot.fontSize.max,
      initialGuess: initialGuess(slot.fontSize.max, elementCount),
      language,
    });

    let lines = fit.lines;
    let textWidth = fit.textWidth;
    let textHeight = fit.textHeight;
    let fits = fit.fits;
    if (!fit.fits) {
      const cut = this.metrics.truncateToFit(text, rect.w, rect.h, family, fit.size, language);
      this.logger.debug(`Truncated "${slot.name}" to fit at ${fit.size}pt (${text.length} -> ${cut.text.length} chars)`);
      text = cut.text;
      lines = cut.lines;
      textWidth = cut.width;
      textHeight = cut.height;
      fits = cut.fits;
      truncated = truncated || cut.truncated;
    }

    const paragraphSpacing = isListBox(slot)
      ? this.metrics.bulletSpacing(lines.length, rect.h, family, fit.size)
      : 0;

    const approximate = unresolved || fit.approximate;
    const confidence =
      (truncated ? 0.5 : 1) * (approximate ? APPROXIMATE_METRICS_CONFIDENCE : 1) * (fits ? 1 : 0.5);

    return {
      id: slot.name,
      role: slot.role,
      priority: ROLE_PRIORITY[slot.role],
      text,
      lines,
      fontFamily: family,
      fontSize: fit.size,
      sizeRange: { ...slot.fontSize },
      rect,
      textWidth: round2(textWidth),
      textHeight: round2(textHeight),
      truncated,
      placeholder,
      fitConfidence: Math.round(confidence * 100) / 100,
      language,
      style: { ...slot.style, lineSpacing: this.guide.lineSpacing, paragraphSpacing },
    };
  }
}

function round2(v: number): number {
  return Math.round(v * 100) / 100;
}
