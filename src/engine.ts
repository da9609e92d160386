import { ZodError } from "zod";
import { EngineUsageError } from "./errors.js";
import { ContentAnalyzer, type Analysis } from "./analysis/content-analyzer.js";
import { LayoutApplier } from "./layout/layout-applier.js";
import { LayoutLibrary, type LayoutSelection } from "./layout/layout-library.js";
import { ApproximateFontMetrics, type FontMetricsProvider } from "./metrics/font-metrics.js";
import { TextMetricsEngine } from "./metrics/text-metrics.js";
import type { FallbackWidthTable } from "./metrics/scripts.js";
import { SlideValidator } from "./diagnostics/validator.js";
import { SlideFixer, type FixOptions, type FixOutcome } from "./repair/slide-fixer.js";
import { parseContentBlock, type ContentBlock, type ContentBlockInput } from "./schema/content.js";
import type { SlideGeometryModel } from "./schema/geometry.js";
import type { KeywordTable } from "./schema/keywords.js";
import { parseStyleGuide, type StyleGuide, type StyleGuideInput } from "./schema/style-guide.js";
import type { FixSummary } from "./schema/fix.js";
import type { TemplateCatalog } from "./schema/template.js";
import type { ValidationResult } from "./schema/validation.js";
import { createLogger, type Logger } from "./utils/logger.js";

export interface SlideEngineOptions {
  metrics?: FontMetricsProvider;
  fallbackWidths?: FallbackWidthTable;
  styleGuide?: StyleGuideInput;
  catalog?: TemplateCatalog;
  keywords?: KeywordTable;
  cacheSize?: number;
  logger?: Logger;
}

export interface ProcessOptions extends FixOptions {
  hint?: string;
  /** Stop after validation */
  skipFix?: boolean;
}

export interface SlideOutcome {
  analysis: Analysis;
  selection: LayoutSelection;
  model: SlideGeometryModel;
  validation: ValidationResult;
  summary: FixSummary | null;
}

/**
 * Facade over the fitting pipeline. Every collaborator is owned by the
 * instance; slides processed by one engine share only the metrics cache.
 */
export class SlideEngine {
  readonly guide: StyleGuide;
  readonly metrics: TextMetricsEngine;
  readonly analyzer: ContentAnalyzer;
  readonly library: LayoutLibrary;
  readonly applier: LayoutApplier;
  readonly validator: SlideValidator;
  readonly fixer: SlideFixer;
  private readonly logger: Logger;

  constructor(options: SlideEngineOptions = {}) {
    this.logger = options.logger ?? createLogger("engine");
    this.guide = parseStyleGuide(options.styleGuide ?? {});
    this.metrics = new TextMetricsEngine(options.metrics ?? new ApproximateFontMetrics(), {
      cacheSize: options.cacheSize,
      lineSpacing: this.guide.lineSpacing,
      fallbackWidths: options.fallbackWidths,
      logger: this.logger.child("metrics"),
    });
    this.analyzer = new ContentAnalyzer(options.keywords);
    this.library = new LayoutLibrary(options.catalog, { logger: this.logger.child("layout") });
    this.applier = new LayoutApplier(this.metrics, this.guide, this.logger.child("applier"));
    this.validator = new SlideValidator(this.guide);
    this.fixer = new SlideFixer(this.metrics, this.validator, this.guide, this.logger.child("fixer"));
  }

  /** Validate raw input into a content block */
  parseBlock(input: unknown): ContentBlock {
    try {
      return parseContentBlock(input);
    } catch (err) {
      if (err instanceof ZodError) {
        throw new EngineUsageError(`Invalid content block: ${err.message}`, { issues: err.issues });
      }
      throw err;
    }
  }

  analyze(input: ContentBlockInput): Analysis {
    return this.analyzer.analyze(this.parseBlock(input));
  }

  /** Classify, choose a template and bind the block into a geometry model */
  selectAndBind(input: ContentBlockInput, hint?: string): SlideGeometryModel {
    return this.plan(this.parseBlock(input), hint).model;
  }

  validate(model: SlideGeometryModel): ValidationResult {
    return this.validator.validate(model);
  }

  fix(model: SlideGeometryModel, result: ValidationResult, options: FixOptions = {}): FixOutcome {
    return this.fixer.fix(model, result, options);
  }

  /** Full pipeline for one slide */
  process(input: ContentBlockInput, options: ProcessOptions = {}): SlideOutcome {
    const { analysis, selection, model } = this.plan(this.parseBlock(input), options.hint);
    const validation = this.validator.validate(model);
    if (options.skipFix) {
      return { analysis, selection, model, validation, summary: null };
    }
    const fixed = this.fixer.fix(model, validation, options);
    return { analysis, selection, model: fixed.model, validation: fixed.result, summary: fixed.summary };
  }

  /** Process slides independently */
  processDeck(inputs: readonly ContentBlockInput[], options: Omit<ProcessOptions, "hint"> = {}): SlideOutcome[] {
    const outcomes = inputs.map((input) => this.process(input, options));
    const stats = this.metrics.getStats();
    this.logger.info(
      `Processed ${outcomes.length} slide(s): ${outcomes.filter((o) => o.validation.isValid).length} valid, cache hit rate ${(stats.hitRate * 100).toFixed(1)}%`
    );
    return outcomes;
  }

  private plan(block: ContentBlock, hint?: string): Pick<SlideOutcome, "analysis" | "selection" | "model"> {
    const analysis = this.analyzer.analyze(block);
    const selection = this.library.select(block, analysis, hint);
    const model = this.applier.bind(block, selection.template, analysis);
    this.logger.debug(
      `Bound "${block.id ?? "slide"}" as ${analysis.category} (${analysis.complexity}) to ${selection.template.id}`
    );
    return { analysis, selection, model };
  }
}
