import type { Column, ContentBlock, Kpi } from "../schema/content.js";
import type { ElementSlot, LayoutTemplate } from "../schema/template.js";
import { MIN_NONTRIVIAL_CHARS } from "../constants.js";

const STRING_FIELDS = [
  "headline",
  "title",
  "subtitle",
  "body",
  "summary",
  "quote",
  "attribution",
  "takeaway",
] as const;
type StringField = (typeof STRING_FIELDS)[number];

const LIST_FIELDS = ["bullets", "milestones", "steps", "levels"] as const;
type ListField = (typeof LIST_FIELDS)[number];

/** Block fields whose items can be bound one slot at a time */
export type ItemField = ListField | "kpis" | "columns";

/** A parsed binding path such as `milestones[2]` or `columns[0].items` */
export type SourcePath =
  | { kind: "string"; field: StringField }
  | { kind: "list"; field: ListField; index?: number }
  | { kind: "kpis"; index?: number }
  | { kind: "columns"; index?: number; part?: "header" | "items" }
  | { kind: "chart"; part: "title" | "kind" };

const PATH_RE = /^([a-z]+)(?:\[(\d+)\])?(?:\.([a-z]+))?$/;

function isStringField(f: string): f is StringField {
  return (STRING_FIELDS as readonly string[]).includes(f);
}

function isListField(f: string): f is ListField {
  return (LIST_FIELDS as readonly string[]).includes(f);
}

/** Parse a binding path; null when the path is not understood */
export function parseSourcePath(path: string): SourcePath | null {
  const m = PATH_RE.exec(path);
  if (!m) return null;
  const field = m[1] ?? "";
  const index = m[2] !== undefined ? Number(m[2]) : undefined;
  const part = m[3];

  if (isStringField(field)) {
    return index === undefined && part === undefined ? { kind: "string", field } : null;
  }
  if (isListField(field)) {
    return part === undefined ? { kind: "list", field, index } : null;
  }
  if (field === "kpis") {
    return part === undefined ? { kind: "kpis", index } : null;
  }
  if (field === "columns") {
    if (part === undefined) return { kind: "columns", index };
    if (part === "header" || part === "items") return { kind: "columns", index, part };
    return null;
  }
  if (field === "chart" && index === undefined && (part === "title" || part === "kind")) {
    return { kind: "chart", part };
  }
  return null;
}

export function renderKpi(kpi: Kpi): string {
  const delta = kpi.delta !== undefined && kpi.delta.trim() !== "" ? ` (${kpi.delta.trim()})` : "";
  return `${kpi.label.trim()}: ${String(kpi.value).trim()}${delta}`;
}

function clean(items: readonly string[]): string[] {
  return items.map((s) => s.trim()).filter((s) => s.length > 0);
}

function renderColumn(col: Column, part?: "header" | "items"): string {
  if (part === "header") return col.header?.trim() ?? "";
  const items = clean(col.items);
  if (part === "items") return items.join("\n");
  return clean([col.header ?? "", ...items]).join("\n");
}

function pick<T>(items: readonly T[] | undefined, index: number | undefined, render: (item: T) => string): string {
  if (!items) return "";
  if (index === undefined) return clean(items.map(render)).join("\n");
  const item = items[index];
  return item === undefined ? "" : render(item).trim();
}

/** Text a path yields for a block; "" when the block lacks it */
export function resolvePath(block: ContentBlock, path: SourcePath): string {
  switch (path.kind) {
    case "string":
      return block[path.field]?.trim() ?? "";
    case "list":
      return pick(block[path.field], path.index, (s) => s);
    case "kpis":
      return pick(block.kpis, path.index, renderKpi);
    case "columns":
      return pick(block.columns, path.index, (c) => renderColumn(c, path.part));
    case "chart":
      return (path.part === "title" ? block.chart?.title : block.chart?.kind)?.trim() ?? "";
  }
}

export interface BoundText {
  text: string;
  /** Binding paths that contributed */
  sources: string[];
}

/**
 * Resolve a slot's text. Under `first`, the earliest non-trivial source wins
 * over later, shorter fallbacks; under `all`, every non-empty source is
 * joined by newlines. Null when no source yields text.
 */
export function resolveSlotText(block: ContentBlock, slot: ElementSlot): BoundText | null {
  const found: Array<{ source: string; text: string }> = [];
  for (const source of slot.sources) {
    const path = parseSourcePath(source);
    if (!path) continue;
    const text = resolvePath(block, path);
    if (text !== "") found.push({ source, text });
  }
  if (found.length === 0) return null;

  if (slot.combine === "all") {
    const seen = new Set<string>();
    const parts = found.filter((f) => {
      if (seen.has(f.text)) return false;
      seen.add(f.text);
      return true;
    });
    return { text: parts.map((p) => p.text).join("\n"), sources: parts.map((p) => p.source) };
  }

  const chosen = found.find((f) => f.text.length >= MIN_NONTRIVIAL_CHARS) ?? found[0];
  return chosen ? { text: chosen.text, sources: [chosen.source] } : null;
}

/** Number of items the block carries for a field */
export function itemCount(block: ContentBlock, field: ItemField): number {
  switch (field) {
    case "kpis":
      return block.kpis?.length ?? 0;
    case "columns":
      return block.columns?.length ?? 0;
    default:
      return block[field]?.length ?? 0;
  }
}

/**
 * How many items of each field a template can show. A field bound without
 * an index is unbounded; fields the template never references are absent.
 */
export function itemCapacity(template: LayoutTemplate): Map<ItemField, number> {
  const capacity = new Map<ItemField, number>();
  const indices = new Map<ItemField, Set<number>>();
  for (const slot of template.slots) {
    for (const source of slot.sources) {
      const path = parseSourcePath(source);
      if (!path || path.kind === "string" || path.kind === "chart") continue;
      const field: ItemField = path.kind === "list" ? path.field : path.kind;
      if (path.index === undefined) {
        capacity.set(field, Infinity);
        continue;
      }
      const set = indices.get(field) ?? new Set<number>();
      set.add(path.index);
      indices.set(field, set);
    }
  }
  for (const [field, set] of indices) {
    if (capacity.get(field) !== Infinity) capacity.set(field, set.size);
  }
  return capacity;
}
