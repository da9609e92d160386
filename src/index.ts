// Constants
export {
  CANVAS_W,
  CANVAS_H,
  LINE_SPACING,
  ELLIPSIS,
  MAX_ITER,
  COMPATIBILITY_THRESHOLD,
  GENERIC_TEMPLATE_ID,
  CATEGORY_PRIORITY,
  ROLE_PRIORITY,
} from "./constants.js";

// Errors
export {
  DeckfitError,
  ConfigurationError,
  ContentBindingError,
  MetricsUnavailableError,
  EngineUsageError,
} from "./errors.js";

// Schema types
export type { ContentBlock, ContentBlockInput, Kpi, Column, ChartSpec } from "./schema/content.js";
export { parseContentBlock, ContentBlockSchema, LanguageProfile } from "./schema/content.js";

export type {
  SlotRole,
  ElementSlot,
  LayoutTemplate,
  TemplateCatalog,
  FontRange,
  SlotStyle,
} from "./schema/template.js";
export { parseTemplateCatalog, TemplateCatalogSchema } from "./schema/template.js";

export type { Category, Classification } from "./schema/category.js";
export { CATEGORIES, isCategory } from "./schema/category.js";

export type { KeywordTable, KeywordRule } from "./schema/keywords.js";
export { parseKeywordTable } from "./schema/keywords.js";

export type { StyleGuide, StyleGuideInput, RoleFont } from "./schema/style-guide.js";
export { parseStyleGuide, StyleGuideSchema } from "./schema/style-guide.js";

export type { Rect, Canvas, FittedBox, SlideGeometryModel, BoxStyle } from "./schema/geometry.js";

export type {
  IssueCategory,
  Severity,
  Edge,
  EdgeExcess,
  IssueDetails,
  ValidationIssue,
  ValidationResult,
} from "./schema/validation.js";

export type { StopReason, BoxSnapshot, FixResult, PassTrace, FixSummary } from "./schema/fix.js";

// Engine
export { SlideEngine } from "./engine.js";
export type { SlideEngineOptions, ProcessOptions, SlideOutcome } from "./engine.js";

// Components (for advanced usage)
export { TextMetricsEngine } from "./metrics/text-metrics.js";
export type { FitRequest, FitResult, TextLayout, MetricsStats } from "./metrics/text-metrics.js";
export { ApproximateFontMetrics, fallbackMeasure } from "./metrics/font-metrics.js";
export type { FontMetricsProvider, TextSize } from "./metrics/font-metrics.js";
export { DEFAULT_FALLBACK_WIDTHS, detectLanguageProfile } from "./metrics/scripts.js";
export type { FallbackWidthTable, Script } from "./metrics/scripts.js";
export { truncateText } from "./metrics/truncate.js";
export { ContentAnalyzer } from "./analysis/content-analyzer.js";
export type { Analysis, ContentSignals } from "./analysis/content-analyzer.js";
export { LayoutLibrary } from "./layout/layout-library.js";
export type { CompatibilityScore, LayoutSelection, LayoutDensity } from "./layout/layout-library.js";
export { LayoutApplier } from "./layout/layout-applier.js";
export { SlideValidator, criticalIssues, issuesByCategory } from "./diagnostics/validator.js";
export type { Checker } from "./diagnostics/validator.js";
export { SlideFixer } from "./repair/slide-fixer.js";
export type { FixOptions, FixOutcome } from "./repair/slide-fixer.js";

// Utilities
export { createLogger, Logger, LogLevel } from "./utils/logger.js";
export { readJSON, writeJSON, appendTrace } from "./utils/fs-helpers.js";
