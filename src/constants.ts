/** Canvas dimensions (pt): 13.333in × 7.5in at 72pt/in */
export const CANVAS_W = 960;
export const CANVAS_H = 540;

/** Line height multiplier applied to the font size */
export const LINE_SPACING = 1.2;

/** Ellipsis appended by every truncation */
export const ELLIPSIS = "...";

/** Smart truncation keeps a sentence boundary only if it retains this share of max length */
export const SENTENCE_KEEP_RATIO = 0.6;

/** Smart truncation keeps a word boundary only if it retains this share of max length */
export const WORD_KEEP_RATIO = 0.5;

/** Default capacity of the measurement cache */
export const MEASURE_CACHE_SIZE = 2000;

/** A field shorter than this is "trivial" and loses to a longer fallback */
export const MIN_NONTRIVIAL_CHARS = 3;

/** Elements per slide at which the initial font guess stops shrinking */
export const INITIAL_GUESS_ELEMENTS = 4;

/** Confidence multiplier when a box was measured with the fallback width table */
export const APPROXIMATE_METRICS_CONFIDENCE = 0.8;

/** Compatibility threshold below which the fallback chain is walked */
export const COMPATIBILITY_THRESHOLD = 0.6;

/** Penalty when a template would drop list items */
export const DROPPED_ITEMS_PENALTY = 0.5;

/** Penalty when bound text exceeds its slot max length by more than OVERLENGTH_FACTOR */
export const OVERLENGTH_PENALTY = 0.2;
export const OVERLENGTH_FACTOR = 1.5;

/** Penalty when template and content complexity differ by more than COMPLEXITY_MISMATCH */
export const COMPLEXITY_PENALTY = 0.1;
export const COMPLEXITY_MISMATCH = 0.4;

/** Id of the generic template that terminates every fallback chain */
export const GENERIC_TEMPLATE_ID = "single_column";

/** Maximum fix passes */
export const MAX_ITER = 3;

/** Fix priority by issue category (higher is fixed first) */
export const CATEGORY_PRIORITY = {
  OutOfBounds: 10,
  Overflow: 9,
  Overlap: 8,
  Readability: 7,
  Margin: 6,
  FontConsistency: 5,
  Density: 4,
  StyleGuide: 3,
  EmptyContent: 2,
} as const;

/** Box priority by role, used to pick which of two colliding boxes moves */
export const ROLE_PRIORITY = {
  title: 100,
  subtitle: 80,
  kpi: 70,
  quote: 70,
  body: 60,
  bullets: 60,
  text: 60,
  label: 50,
  caption: 40,
} as const;
