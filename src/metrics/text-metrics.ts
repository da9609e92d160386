import { LINE_SPACING, MEASURE_CACHE_SIZE } from "../constants.js";
import { EngineUsageError, MetricsUnavailableError } from "../errors.js";
import type { LanguageProfile } from "../schema/content.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { fallbackMeasure, type FontMetricsProvider, type TextSize } from "./font-metrics.js";
import { wrapText } from "./line-breaker.js";
import { MeasureCache } from "./measure-cache.js";
import { DEFAULT_FALLBACK_WIDTHS, detectLanguageProfile, type FallbackWidthTable } from "./scripts.js";
import { truncateText } from "./truncate.js";

/** Fit tolerance for float noise in height sums */
const FIT_EPS = 1e-6;

export interface LineMetrics extends TextSize {
  /** Measured with the fallback width table */
  approximate: boolean;
}

export interface TextLayout {
  lines: string[];
  /** Widest line */
  width: number;
  height: number;
  approximate: boolean;
}

export interface FitRequest {
  width: number;
  height: number;
  family: string;
  sizeMin: number;
  sizeMax: number;
  initialGuess?: number;
  language?: LanguageProfile | "auto";
}

export interface FitResult {
  size: number;
  lines: string[];
  fits: boolean;
  /** Residual height past the box at sizeMin when nothing fits (pt) */
  overflowAmount: number;
  overflowWidth: number;
  textWidth: number;
  textHeight: number;
  iterations: number;
  approximate: boolean;
}

export interface TruncateFitResult {
  text: string;
  lines: string[];
  width: number;
  height: number;
  fits: boolean;
  truncated: boolean;
}

export interface TextMetricsOptions {
  cacheSize?: number;
  lineSpacing?: number;
  fallbackWidths?: FallbackWidthTable;
  logger?: Logger;
}

export interface MetricsStats {
  hits: number;
  misses: number;
  size: number;
  hitRate: number;
  degradedFamilies: string[];
}

/**
 * Measures, wraps, fits and truncates text against a font-metrics provider.
 * Single-line measurements are memoized per engine.
 */
export class TextMetricsEngine {
  private readonly cache: MeasureCache<LineMetrics>;
  private readonly degraded = new Set<string>();
  private readonly lineSpacing: number;
  private readonly fallbackWidths: FallbackWidthTable;
  private readonly logger: Logger;

  constructor(
    private readonly provider: FontMetricsProvider,
    options: TextMetricsOptions = {}
  ) {
    this.cache = new MeasureCache(options.cacheSize ?? MEASURE_CACHE_SIZE);
    this.lineSpacing = options.lineSpacing ?? LINE_SPACING;
    this.fallbackWidths = options.fallbackWidths ?? DEFAULT_FALLBACK_WIDTHS;
    this.logger = options.logger ?? createLogger("metrics");
  }

  /** First candidate the provider knows; otherwise the first candidate, approximated */
  resolveFamily(candidates: readonly string[]): { family: string; approximate: boolean } {
    const known = candidates.find((f) => this.provider.hasFamily(f));
    if (known !== undefined) return { family: known, approximate: false };
    const first = candidates[0];
    if (first === undefined) {
      throw new EngineUsageError("resolveFamily needs at least one font family");
    }
    this.noteDegraded(new MetricsUnavailableError(first));
    return { family: first, approximate: true };
  }

  /** Extent of a single line */
  measureLine(text: string, family: string, size: number): LineMetrics {
    const key = `${family}\u0001${size}\u0001${text}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const measured = this.provider.measure(text, family, size);
    let result: LineMetrics;
    if (measured) {
      result = { width: measured.width, height: measured.height, approximate: false };
    } else {
      this.noteDegraded(new MetricsUnavailableError(family));
      const approx = fallbackMeasure(text, size, this.fallbackWidths);
      result = { width: approx.width, height: approx.height, approximate: true };
    }
    this.cache.set(key, result);
    return result;
  }

  lineHeight(family: string, size: number): number {
    return Math.max(size * this.lineSpacing, this.measureLine("Hg", family, size).height);
  }

  /** Extent of `text` without wrapping; newlines start new lines */
  measure(text: string, family: string, size: number): TextSize {
    const lines = text.split(/\r?\n/);
    const width = Math.max(0, ...lines.map((l) => this.measureLine(l, family, size).width));
    return { width, height: lines.length * this.lineHeight(family, size) };
  }

  wrap(
    text: string,
    maxWidth: number,
    family: string,
    size: number,
    language: LanguageProfile | "auto" = "auto"
  ): string[] {
    const profile = language === "auto" ? detectLanguageProfile(text) : language;
    return wrapText(text, maxWidth, (s) => this.measureLine(s, family, size).width, profile);
  }

  /** Wrap and measure the resulting block */
  layout(
    text: string,
    maxWidth: number,
    family: string,
    size: number,
    language: LanguageProfile | "auto" = "auto"
  ): TextLayout {
    const lines = this.wrap(text, maxWidth, family, size, language);
    let width = 0;
    let approximate = false;
    for (const line of lines) {
      const m = this.measureLine(line, family, size);
      width = Math.max(width, m.width);
      approximate = approximate || m.approximate;
    }
    return {
      lines,
      width,
      height: lines.length * this.lineHeight(family, size),
      approximate,
    };
  }

  /**
   * Largest integer size in [sizeMin, sizeMax] whose wrapped text fits the
   * box. Relies on the provider being monotone in size.
   */
  fitToBox(text: string, req: FitRequest): FitResult {
    const lo = Math.ceil(req.sizeMin);
    const hi = Math.floor(req.sizeMax);
    if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo < 1 || lo > hi) {
      throw new EngineUsageError(`Invalid font size range [${req.sizeMin}, ${req.sizeMax}]`, {
        sizeMin: req.sizeMin,
        sizeMax: req.sizeMax,
      });
    }
    const language = req.language ?? "auto";

    const layouts = new Map<number, TextLayout>();
    const layoutAt = (size: number): TextLayout => {
      let l = layouts.get(size);
      if (!l) {
        l = this.layout(text, req.width, req.family, size, language);
        layouts.set(size, l);
      }
      return l;
    };
    const fitsAt = (size: number): boolean => {
      const l = layoutAt(size);
      return l.height <= req.height + FIT_EPS && l.width <= req.width + FIT_EPS;
    };

    let iterations = 0;
    let best: number | null = null;
    let low = lo;
    let high = hi;

    if (req.initialGuess !== undefined) {
      const guess = Math.min(hi, Math.max(lo, Math.round(req.initialGuess)));
      iterations++;
      if (fitsAt(guess)) {
        best = guess;
        low = guess + 1;
      } else {
        high = guess - 1;
      }
    }

    while (low <= high) {
      const mid = Math.floor((low + high) / 2);
      iterations++;
      if (fitsAt(mid)) {
        best = mid;
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }

    const size = best ?? lo;
    const l = layoutAt(size);
    return {
      size,
      lines: l.lines,
      fits: best !== null,
      overflowAmount: best !== null ? 0 : Math.max(0, l.height - req.height),
      overflowWidth: best !== null ? 0 : Math.max(0, l.width - req.width),
      textWidth: l.width,
      textHeight: l.height,
      iterations,
      approximate: l.approximate,
    };
  }

  truncate(text: string, maxLen: number, smart = true): string {
    return truncateText(text, maxLen, smart);
  }

  /** Longest smart truncation of `text` that fits the box at `size` */
  truncateToFit(
    text: string,
    width: number,
    height: number,
    family: string,
    size: number,
    language: LanguageProfile | "auto" = "auto"
  ): TruncateFitResult {
    const fits = (l: TextLayout) => l.height <= height + FIT_EPS && l.width <= width + FIT_EPS;

    const full = this.layout(text, width, family, size, language);
    if (fits(full)) {
      return { text, lines: full.lines, width: full.width, height: full.height, fits: true, truncated: false };
    }

    let best: { text: string; layout: TextLayout } | null = null;
    let low = 0;
    let high = text.length - 1;
    while (low <= high) {
      const mid = Math.floor((low + high) / 2);
      const candidate = truncateText(text, mid);
      const l = this.layout(candidate, width, family, size, language);
      if (fits(l)) {
        best = { text: candidate, layout: l };
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }

    if (!best) {
      const l = this.layout(truncateText(text, 0), width, family, size, language);
      return { text: truncateText(text, 0), lines: l.lines, width: l.width, height: l.height, fits: fits(l), truncated: true };
    }
    const l = best.layout;
    return { text: best.text, lines: l.lines, width: l.width, height: l.height, fits: true, truncated: true };
  }

  /** Paragraph spacing that spreads vertical slack between lines, capped at half a line */
  bulletSpacing(lineCount: number, boxHeight: number, family: string, size: number): number {
    const lh = this.lineHeight(family, size);
    const slack = boxHeight - lineCount * lh;
    if (lineCount < 2 || slack <= 0) return 0;
    return Math.round(Math.min(slack / (lineCount - 1), lh / 2) * 100) / 100;
  }

  getStats(): MetricsStats {
    const { hits, misses, size, hitRate } = this.cache.getStats();
    return { hits, misses, size, hitRate, degradedFamilies: [...this.degraded] };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private noteDegraded(err: MetricsUnavailableError): void {
    if (this.degraded.has(err.family)) return;
    this.degraded.add(err.family);
    this.logger.warn(`${err.message}; using fallback widths (degraded accuracy)`);
  }
}
