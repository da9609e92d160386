/** Closed set of template categories, in declaration order */
export const CATEGORIES = [
  "timeline",
  "process",
  "dashboard",
  "quote",
  "split",
  "pyramid",
  "agenda",
  "generic",
] as const;

export type Category = (typeof CATEGORIES)[number];

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

/** Result of classifying a content block */
export interface Classification {
  category: Category;
  complexity: number;
  confidence: number;
  /** Which rule produced the category */
  signal: "structure" | "keyword" | "default";
}
