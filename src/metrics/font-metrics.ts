import {
  DEFAULT_FALLBACK_WIDTHS,
  FALLBACK_LINE_HEIGHT_EM,
  scriptOf,
  type FallbackWidthTable,
} from "./scripts.js";

/** Extent of a single line of text (pt) */
export interface TextSize {
  width: number;
  height: number;
}

/**
 * Narrow interface to a host text-rendering stack.
 * `measure` must be monotone in `size`: a larger size never yields a
 * smaller width or height for the same text. Returns null when the
 * family cannot be resolved.
 */
export interface FontMetricsProvider {
  measure(text: string, family: string, size: number): TextSize | null;
  hasFamily(family: string): boolean;
}

interface FamilyMetrics {
  /** Average latin advance width, in em */
  avgCharWidth: number;
  /** Line height, in em */
  heightFactor: number;
}

const FAMILY_METRICS: Record<string, FamilyMetrics> = {
  arial: { avgCharWidth: 0.48, heightFactor: 1.15 },
  helvetica: { avgCharWidth: 0.48, heightFactor: 1.15 },
  calibri: { avgCharWidth: 0.46, heightFactor: 1.22 },
  georgia: { avgCharWidth: 0.53, heightFactor: 1.14 },
  inter: { avgCharWidth: 0.52, heightFactor: 1.2 },
  roboto: { avgCharWidth: 0.5, heightFactor: 1.2 },
  "open sans": { avgCharWidth: 0.51, heightFactor: 1.2 },
  lato: { avgCharWidth: 0.5, heightFactor: 1.2 },
  montserrat: { avgCharWidth: 0.55, heightFactor: 1.25 },
  "segoe ui": { avgCharWidth: 0.5, heightFactor: 1.2 },
  "malgun gothic": { avgCharWidth: 0.5, heightFactor: 1.25 },
  "noto sans kr": { avgCharWidth: 0.5, heightFactor: 1.25 },
  "noto sans cjk": { avgCharWidth: 0.5, heightFactor: 1.25 },
};

/**
 * Default provider: per-family average advance widths for common
 * presentation fonts, scaled per script relative to latin.
 */
export class ApproximateFontMetrics implements FontMetricsProvider {
  private readonly families: Map<string, FamilyMetrics>;

  constructor(
    extraFamilies: Record<string, FamilyMetrics> = {},
    private readonly scriptWidths: FallbackWidthTable = DEFAULT_FALLBACK_WIDTHS
  ) {
    this.families = new Map(Object.entries(FAMILY_METRICS));
    for (const [name, metrics] of Object.entries(extraFamilies)) {
      this.families.set(name.toLowerCase(), metrics);
    }
  }

  hasFamily(family: string): boolean {
    return this.families.has(family.toLowerCase());
  }

  measure(text: string, family: string, size: number): TextSize | null {
    const metrics = this.families.get(family.toLowerCase());
    if (!metrics) return null;

    const latin = this.scriptWidths.latin;
    let em = 0;
    for (const ch of text) {
      em += metrics.avgCharWidth * (this.scriptWidths[scriptOf(ch)] / latin);
    }
    return { width: em * size, height: metrics.heightFactor * size };
  }
}

/** Measure with the per-script fixed-width table */
export function fallbackMeasure(
  text: string,
  size: number,
  table: FallbackWidthTable = DEFAULT_FALLBACK_WIDTHS
): TextSize {
  let em = 0;
  for (const ch of text) {
    em += table[scriptOf(ch)];
  }
  return { width: em * size, height: FALLBACK_LINE_HEIGHT_EM * size };
}
