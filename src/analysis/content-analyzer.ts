import { ZodError } from "zod";
import type { ContentBlock } from "../schema/content.js";
import type { Category, Classification } from "../schema/category.js";
import { parseKeywordTable, type KeywordRule, type KeywordTable } from "../schema/keywords.js";
import { ConfigurationError } from "../errors.js";
import { configPath, readJSONSync } from "../utils/fs-helpers.js";

export type Density = "low" | "normal" | "high";

/** Measurable properties of a block that drive classification */
export interface ContentSignals {
  itemCount: number;
  wordCount: number;
  density: Density;
  hasChart: boolean;
  hasTable: boolean;
}

export interface Analysis extends Classification {
  signals: ContentSignals;
}

const BASE_COMPLEXITY: Record<Category, number> = {
  timeline: 0.7,
  process: 0.8,
  dashboard: 0.9,
  quote: 0.3,
  split: 0.5,
  pyramid: 0.8,
  agenda: 0.5,
  generic: 0.2,
};

const HIGH_DENSITY_WORDS = 150;
const LOW_DENSITY_WORDS = 50;

const NUMBERED_ITEM_RE = /^\s*\d+[.)]\s/;
const HANGUL_SYLLABLE_RE = /[가-힯]/g;
const ASCII_RE = /^[\x00-\x7f]+$/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

interface CompiledRule {
  category: Category;
  priority: number;
  matchers: Array<(text: string) => boolean>;
}

function compileRule(rule: KeywordRule): CompiledRule {
  const matchers = rule.keywords.map((kw) => {
    const lower = kw.toLowerCase();
    if (ASCII_RE.test(lower)) {
      const re = new RegExp(`\\b${escapeRegExp(lower)}\\b`);
      return (text: string) => re.test(text);
    }
    return (text: string) => text.includes(lower);
  });
  return { category: rule.category, priority: rule.priority, matchers };
}

/** Every text-bearing field of a block, flattened */
export function collectText(block: ContentBlock): string[] {
  const parts: string[] = [];
  const push = (s: string | undefined) => {
    if (s !== undefined && s.trim() !== "") parts.push(s);
  };
  push(block.headline);
  push(block.title);
  push(block.subtitle);
  push(block.body);
  push(block.summary);
  push(block.quote);
  push(block.attribution);
  push(block.takeaway);
  for (const list of [block.bullets, block.milestones, block.steps, block.levels]) {
    for (const item of list ?? []) push(item);
  }
  for (const kpi of block.kpis ?? []) push(`${kpi.label} ${kpi.value}`);
  for (const col of block.columns ?? []) {
    push(col.header);
    for (const item of col.items) push(item);
  }
  push(block.chart?.title);
  return parts;
}

export function countItems(block: ContentBlock): number {
  let n =
    (block.bullets?.length ?? 0) +
    (block.milestones?.length ?? 0) +
    (block.steps?.length ?? 0) +
    (block.levels?.length ?? 0) +
    (block.kpis?.length ?? 0);
  for (const col of block.columns ?? []) n += col.items.length;
  return n;
}

/** Whitespace words, or a third of the hangul syllables when that is larger */
export function countWords(text: string): number {
  const words = text.split(/\s+/).filter((w) => w.length > 0).length;
  const syllables = text.match(HANGUL_SYLLABLE_RE)?.length ?? 0;
  return Math.max(words, Math.floor(syllables / 3));
}

/**
 * Classifies content blocks into a template category and complexity.
 * Structural signals win over keywords; keywords win over the generic default.
 */
export class ContentAnalyzer {
  private readonly rules: CompiledRule[];

  constructor(table: KeywordTable = ContentAnalyzer.loadDefaultKeywords()) {
    const seen = new Set<Category>();
    for (const rule of table.rules) {
      if (seen.has(rule.category)) {
        throw new ConfigurationError(`Keyword table lists category "${rule.category}" twice`);
      }
      seen.add(rule.category);
    }
    this.rules = table.rules.map((rule) => compileRule(rule));
  }

  static loadDefaultKeywords(): KeywordTable {
    const file = configPath("category-keywords.json");
    try {
      return parseKeywordTable(readJSONSync(file));
    } catch (err) {
      if (err instanceof ZodError) {
        throw new ConfigurationError(`Invalid keyword table ${file}: ${err.message}`, undefined, { cause: err });
      }
      throw err;
    }
  }

  classify(block: ContentBlock): Classification {
    const { category, complexity, confidence, signal } = this.analyze(block);
    return { category, complexity, confidence, signal };
  }

  analyze(block: ContentBlock): Analysis {
    const text = collectText(block).join("\n");
    const itemCount = countItems(block);
    const wordCount = countWords(text);
    const density: Density =
      wordCount >= HIGH_DENSITY_WORDS ? "high" : wordCount < LOW_DENSITY_WORDS ? "low" : "normal";
    const signals: ContentSignals = {
      itemCount,
      wordCount,
      density,
      hasChart: block.chart !== undefined,
      hasTable: (block.kpis?.length ?? 0) > 0 || (block.columns?.length ?? 0) >= 2,
    };

    const { category, confidence, signal } =
      this.structuralCategory(block) ?? this.keywordCategory(block) ?? {
        category: "generic" as const,
        confidence: 0.3,
        signal: "default" as const,
      };

    return {
      category,
      confidence,
      signal,
      complexity: this.complexity(category, signals),
      signals,
    };
  }

  /** Category base score plus item-count and density adjustments, in [0,1] */
  complexity(category: Category, signals: Pick<ContentSignals, "itemCount" | "density">): number {
    let score = BASE_COMPLEXITY[category];
    if (signals.itemCount > 8) score += 0.2;
    else if (signals.itemCount > 5) score += 0.1;
    if (signals.density === "high") score += 0.1;
    else if (signals.density === "low") score -= 0.1;
    const clamped = Math.min(1, Math.max(0, score));
    return Math.round(clamped * 100) / 100;
  }

  private structuralCategory(block: ContentBlock): Omit<Classification, "complexity"> | null {
    const structural = (category: Category) => ({ category, confidence: 0.9, signal: "structure" as const });
    if ((block.milestones?.length ?? 0) >= 2) return structural("timeline");
    if ((block.steps?.length ?? 0) >= 2) return structural("process");
    if ((block.kpis?.length ?? 0) > 0 || block.chart !== undefined) return structural("dashboard");
    if (block.quote !== undefined && block.quote.trim() !== "") return structural("quote");
    if ((block.columns?.length ?? 0) >= 2) return structural("split");
    if ((block.levels?.length ?? 0) >= 2) return structural("pyramid");
    return null;
  }

  private keywordCategory(block: ContentBlock): Omit<Classification, "complexity"> | null {
    const haystack = [block.headline, block.title, block.body, block.summary, ...(block.bullets ?? [])]
      .filter((s): s is string => s !== undefined)
      .join("\n")
      .toLowerCase();

    const bullets = block.bullets ?? [];
    const numberedList =
      bullets.length >= 3 && bullets.length <= 6 && bullets.every((b) => NUMBERED_ITEM_RE.test(b));

    let best: { rule: CompiledRule; hits: number } | null = null;
    for (const rule of this.rules) {
      let hits = rule.matchers.filter((m) => m(haystack)).length;
      if (rule.category === "agenda" && numberedList) hits++;
      if (hits === 0) continue;
      // Rules are in declaration order, so only a strictly higher priority displaces
      if (!best || rule.priority > best.rule.priority) {
        best = { rule, hits };
      }
    }
    if (!best) return null;
    return {
      category: best.rule.category,
      confidence: Math.min(0.8, Math.round((0.6 + 0.05 * (best.hits - 1)) * 100) / 100),
      signal: "keyword",
    };
  }
}
