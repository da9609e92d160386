import {
  COMPATIBILITY_THRESHOLD,
  COMPLEXITY_MISMATCH,
  COMPLEXITY_PENALTY,
  DROPPED_ITEMS_PENALTY,
  OVERLENGTH_FACTOR,
  OVERLENGTH_PENALTY,
} from "../constants.js";
import { EngineUsageError } from "../errors.js";
import { isCategory, type Category, type Classification } from "../schema/category.js";
import type { ContentBlock } from "../schema/content.js";
import type { LayoutTemplate, TemplateCatalog } from "../schema/template.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { itemCapacity, itemCount, resolveSlotText } from "./binding.js";
import { loadDefaultCatalog, validateCatalog, type LoadedCatalog } from "./catalog.js";

export type LayoutDensity = "compact" | "standard" | "spacious";

export interface CompatibilityScore {
  templateId: string;
  score: number;
  matchedSlots: number;
  requiredSlots: number;
  matchedOptional: number;
  droppedItems: boolean;
  overlength: boolean;
  complexityMismatch: boolean;
}

export interface LayoutSelection {
  template: LayoutTemplate;
  score: number;
  /** Every candidate scored, in the order tried */
  tried: CompatibilityScore[];
  usedHint: boolean;
  fellBack: boolean;
}

export interface LayoutLibraryOptions {
  threshold?: number;
  logger?: Logger;
}

/**
 * Immutable template catalog with compatibility scoring and fallback
 * selection. Selection is total: every chain ends in the generic template.
 */
export class LayoutLibrary {
  private readonly catalog: LoadedCatalog;
  private readonly threshold: number;
  private readonly logger: Logger;

  constructor(catalog: TemplateCatalog = loadDefaultCatalog(), options: LayoutLibraryOptions = {}) {
    this.catalog = validateCatalog(catalog);
    this.threshold = options.threshold ?? COMPATIBILITY_THRESHOLD;
    this.logger = options.logger ?? createLogger("layout");
  }

  has(id: string): boolean {
    return this.catalog.templates.has(id);
  }

  getTemplate(id: string): LayoutTemplate {
    const t = this.catalog.templates.get(id);
    if (!t) throw new EngineUsageError(`Unknown template "${id}"`, { templateId: id });
    return t;
  }

  listTemplates(): LayoutTemplate[] {
    return [...this.catalog.templates.values()];
  }

  get genericTemplate(): LayoutTemplate {
    return this.getTemplate(this.catalog.genericId);
  }

  templateForCategory(category: Category): LayoutTemplate {
    if (!isCategory(category)) {
      throw new EngineUsageError(`Unknown category "${String(category)}"`);
    }
    const id = this.catalog.categories.get(category) ?? this.catalog.genericId;
    return this.getTemplate(id);
  }

  /** Fallbacks of a template, ending in the generic template */
  fallbackChain(id: string): string[] {
    return [...this.getTemplate(id).fallbacks];
  }

  scoreCompatibility(block: ContentBlock, template: LayoutTemplate, complexity: number): CompatibilityScore {
    let requiredSlots = 0;
    let matchedSlots = 0;
    let matchedOptional = 0;
    let overlength = false;

    for (const slot of template.slots) {
      const bound = resolveSlotText(block, slot);
      if (!slot.optional) requiredSlots++;
      if (!bound) continue;
      matchedSlots++;
      if (slot.optional) matchedOptional++;
      if (bound.text.length > slot.maxLength * OVERLENGTH_FACTOR) overlength = true;
    }

    let droppedItems = false;
    for (const [field, capacity] of itemCapacity(template)) {
      if (itemCount(block, field) > capacity) droppedItems = true;
    }

    const complexityMismatch = Math.abs(template.complexity - complexity) > COMPLEXITY_MISMATCH;
    const denominator = requiredSlots + matchedOptional;
    let score = denominator > 0 ? matchedSlots / denominator : 0;
    if (droppedItems) score -= DROPPED_ITEMS_PENALTY;
    if (overlength) score -= OVERLENGTH_PENALTY;
    if (complexityMismatch) score -= COMPLEXITY_PENALTY;

    return {
      templateId: template.id,
      score: Math.round(score * 100) / 100,
      matchedSlots,
      requiredSlots,
      matchedOptional,
      droppedItems,
      overlength,
      complexityMismatch,
    };
  }

  isCompatible(score: CompatibilityScore): boolean {
    return score.templateId === this.catalog.genericId || score.score >= this.threshold;
  }

  /**
   * Pick a template: a known hint wins outright; otherwise the category's
   * template, then its fallback chain, stopping at the first compatible one.
   */
  select(
    block: ContentBlock,
    classification: Pick<Classification, "category" | "complexity">,
    hint?: string
  ): LayoutSelection {
    const { category, complexity } = classification;
    const requested = hint ?? block.layoutHint;
    if (requested !== undefined) {
      if (this.has(requested)) {
        const template = this.getTemplate(requested);
        const score = this.scoreCompatibility(block, template, complexity);
        return { template, score: score.score, tried: [score], usedHint: true, fellBack: false };
      }
      this.logger.warn(`Ignoring unknown layout hint "${requested}"`);
    }

    const primary = this.templateForCategory(category);
    const chain = [primary.id, ...primary.fallbacks];
    const tried: CompatibilityScore[] = [];

    for (const id of chain) {
      const template = this.getTemplate(id);
      const score = this.scoreCompatibility(block, template, complexity);
      tried.push(score);
      if (this.isCompatible(score)) {
        const fellBack = id !== primary.id;
        if (fellBack) {
          this.logger.info(
            `Fell back from "${primary.id}" to "${id}" (${tried.map((t) => `${t.templateId}=${t.score}`).join(", ")})`
          );
        }
        return { template, score: score.score, tried, usedHint: false, fellBack };
      }
    }

    // Unreachable with a validated catalog; kept total regardless
    const generic = this.genericTemplate;
    return { template: generic, score: 0, tried, usedHint: false, fellBack: true };
  }

  /** A denser or airier copy of a template, same slots and sources */
  variant(id: string, density: LayoutDensity): LayoutTemplate {
    const base = this.getTemplate(id);
    if (density === "standard") return base;

    const fontScale = density === "compact" ? 0.9 : 1.1;
    const yScale = density === "compact" ? 0.95 : 1.05;
    return {
      ...base,
      id: `${base.id}:${density}`,
      name: `${base.name} (${density})`,
      slots: base.slots.map((slot) => {
        const { min, max } = slot.fontSize;
        const fontSize =
          density === "compact"
            ? { min, max: Math.max(min, Math.round(max * fontScale)) }
            : { min: Math.min(max, Math.round(min * fontScale)), max };
        const y = Math.min(slot.geometry.y * yScale, 1 - slot.geometry.h);
        return { ...slot, fontSize, geometry: { ...slot.geometry, y } };
      }),
    };
  }
}
