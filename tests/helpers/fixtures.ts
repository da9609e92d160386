import type { FontMetricsProvider, TextSize } from "../../src/metrics/font-metrics.js";
import { TextMetricsEngine } from "../../src/metrics/text-metrics.js";
import type { FittedBox, SlideGeometryModel } from "../../src/schema/geometry.js";
import { parseStyleGuide, type StyleGuide, type StyleGuideInput } from "../../src/schema/style-guide.js";
import type { ElementSlot, LayoutTemplate, TemplateCatalog } from "../../src/schema/template.js";
import { CATEGORIES } from "../../src/schema/category.js";
import type { ValidationIssue } from "../../src/schema/validation.js";
import type { RepairContext } from "../../src/repair/context.js";
import { SlideValidator } from "../../src/diagnostics/validator.js";
import { Logger, LogLevel } from "../../src/utils/logger.js";

/** Every character is half an em wide; every line is 1.2em tall */
export class FixedWidthMetrics implements FontMetricsProvider {
  measured = 0;

  constructor(private readonly families: readonly string[] = ["Arial", "Helvetica", "Georgia"]) {}

  hasFamily(family: string): boolean {
    return this.families.includes(family);
  }

  measure(text: string, family: string, size: number): TextSize | null {
    if (!this.hasFamily(family)) return null;
    this.measured++;
    return { width: Array.from(text).length * size * 0.5, height: size * 1.2 };
  }
}

export function silentLogger(): Logger {
  const logger = new Logger("test");
  logger.setLevel(LogLevel.SILENT);
  return logger;
}

export function makeMetrics(provider: FontMetricsProvider = new FixedWidthMetrics()): TextMetricsEngine {
  return new TextMetricsEngine(provider, { logger: silentLogger() });
}

export function makeGuide(overrides: StyleGuideInput = {}): StyleGuide {
  return parseStyleGuide(overrides);
}

export function makeBox(overrides: Partial<FittedBox> & { id: string }): FittedBox {
  return {
    role: "body",
    priority: 60,
    text: "Quarterly revenue",
    lines: ["Quarterly revenue"],
    fontFamily: "Arial",
    fontSize: 14,
    sizeRange: { min: 10, max: 24 },
    rect: { x: 100, y: 150, w: 300, h: 100 },
    textWidth: 119,
    textHeight: 16.8,
    truncated: false,
    placeholder: false,
    fitConfidence: 1,
    language: "space",
    style: { bold: false, italic: false, align: "left", lineSpacing: 1.2, paragraphSpacing: 0 },
    ...overrides,
  };
}

export function makeModel(boxes: FittedBox[], overrides: Partial<SlideGeometryModel> = {}): SlideGeometryModel {
  return {
    templateId: "test_layout",
    category: "generic",
    complexity: 0.2,
    canvas: { w: 960, h: 540 },
    boxes,
    ...overrides,
  };
}

export function makeContext(
  model: SlideGeometryModel,
  overrides: Partial<Omit<RepairContext, "model">> = {}
): RepairContext {
  return {
    model,
    metrics: makeMetrics(),
    guide: makeGuide(),
    aggressive: false,
    logger: silentLogger(),
    ...overrides,
  };
}

export function makeSlot(overrides: Partial<ElementSlot> & { name: string }): ElementSlot {
  return {
    role: "body",
    sources: ["body"],
    combine: "first",
    geometry: { x: 0.05, y: 0.23, w: 0.9, h: 0.69 },
    maxLength: 500,
    fontFamilies: ["Arial"],
    fontSize: { min: 10, max: 24 },
    style: { bold: false, italic: false, align: "left" },
    optional: false,
    ...overrides,
  };
}

export function makeTemplate(overrides: Partial<LayoutTemplate> & { id: string }): LayoutTemplate {
  return {
    name: overrides.id,
    complexity: 0.5,
    useCases: [],
    slots: [makeSlot({ name: "headline", role: "title", sources: ["headline", "title"] })],
    fallbacks: [],
    ...overrides,
  };
}

/** A catalog whose every category maps to the generic template unless overridden */
export function makeCatalog(
  templates: LayoutTemplate[],
  categories: Record<string, string> = {}
): TemplateCatalog {
  const mapped: Record<string, string> = {};
  for (const c of CATEGORIES) mapped[c] = "single_column";
  return { templates, categories: { ...mapped, ...categories } };
}

/** The issue with `key` in a fresh validation of `model` */
export function findIssue(model: SlideGeometryModel, guide: StyleGuide, key: string): ValidationIssue {
  const issue = new SlideValidator(guide).validate(model).issues.find((i) => i.key === key);
  if (!issue) throw new Error(`Expected issue ${key}`);
  return issue;
}
