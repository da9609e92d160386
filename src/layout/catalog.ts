import { ZodError } from "zod";
import { GENERIC_TEMPLATE_ID } from "../constants.js";
import { ConfigurationError } from "../errors.js";
import { CATEGORIES, isCategory, type Category } from "../schema/category.js";
import { parseTemplateCatalog, type LayoutTemplate, type TemplateCatalog } from "../schema/template.js";
import { configPath, readJSONSync } from "../utils/fs-helpers.js";
import { parseSourcePath } from "./binding.js";

/** A validated catalog with normalized fallback chains */
export interface LoadedCatalog {
  templates: ReadonlyMap<string, LayoutTemplate>;
  categories: ReadonlyMap<Category, string>;
  genericId: string;
}

export function loadDefaultCatalog(): TemplateCatalog {
  const file = configPath("templates.json");
  try {
    return parseTemplateCatalog(readJSONSync(file));
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigurationError(`Invalid template catalog ${file}: ${err.message}`, undefined, { cause: err });
    }
    throw err;
  }
}

function checkTemplate(t: LayoutTemplate): void {
  const names = new Set<string>();
  for (const slot of t.slots) {
    if (names.has(slot.name)) {
      throw new ConfigurationError(`Template "${t.id}" has two slots named "${slot.name}"`, { templateId: t.id });
    }
    names.add(slot.name);
    if (slot.fontSize.min > slot.fontSize.max) {
      throw new ConfigurationError(
        `Template "${t.id}" slot "${slot.name}": min font ${slot.fontSize.min} exceeds max font ${slot.fontSize.max}`,
        { templateId: t.id, slot: slot.name }
      );
    }
    if (slot.geometry.x + slot.geometry.w > 1 + 1e-9 || slot.geometry.y + slot.geometry.h > 1 + 1e-9) {
      throw new ConfigurationError(`Template "${t.id}" slot "${slot.name}" extends past the canvas`, {
        templateId: t.id,
        slot: slot.name,
      });
    }
    for (const source of slot.sources) {
      if (!parseSourcePath(source)) {
        throw new ConfigurationError(`Template "${t.id}" slot "${slot.name}": unknown source "${source}"`, {
          templateId: t.id,
          slot: slot.name,
        });
      }
    }
  }
}

/** Depth-first search for a cycle in the fallback graph */
function findCycle(templates: ReadonlyMap<string, LayoutTemplate>): string[] | null {
  const state = new Map<string, "visiting" | "done">();
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    const s = state.get(id);
    if (s === "done") return null;
    if (s === "visiting") return [...stack.slice(stack.indexOf(id)), id];
    state.set(id, "visiting");
    stack.push(id);
    for (const next of templates.get(id)?.fallbacks ?? []) {
      const cycle = visit(next);
      if (cycle) return cycle;
    }
    stack.pop();
    state.set(id, "done");
    return null;
  };

  for (const id of templates.keys()) {
    const cycle = visit(id);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Validate a catalog and make every fallback chain end in the generic
 * template. Throws ConfigurationError on duplicate ids, dangling or cyclic
 * chains, unmapped categories or a missing generic template.
 */
export function validateCatalog(catalog: TemplateCatalog, genericId = GENERIC_TEMPLATE_ID): LoadedCatalog {
  const templates = new Map<string, LayoutTemplate>();
  for (const t of catalog.templates) {
    if (templates.has(t.id)) {
      throw new ConfigurationError(`Duplicate template id "${t.id}"`, { templateId: t.id });
    }
    checkTemplate(t);
    templates.set(t.id, t);
  }

  if (!templates.has(genericId)) {
    throw new ConfigurationError(`Generic template "${genericId}" is missing from the catalog`);
  }

  for (const t of templates.values()) {
    for (const next of t.fallbacks) {
      if (next === t.id) {
        throw new ConfigurationError(`Template "${t.id}" lists itself as a fallback`, { templateId: t.id });
      }
      if (!templates.has(next)) {
        throw new ConfigurationError(`Template "${t.id}" falls back to unknown template "${next}"`, {
          templateId: t.id,
        });
      }
    }
  }

  const cycle = findCycle(templates);
  if (cycle) {
    throw new ConfigurationError(`Fallback chain cycle: ${cycle.join(" -> ")}`, { cycle });
  }

  const categories = new Map<Category, string>();
  for (const [category, id] of Object.entries(catalog.categories)) {
    if (!isCategory(category)) {
      throw new ConfigurationError(`Unknown category "${category}" in template catalog`);
    }
    if (!templates.has(id)) {
      throw new ConfigurationError(`Category "${category}" maps to unknown template "${id}"`);
    }
    categories.set(category, id);
  }
  const unmapped = CATEGORIES.filter((c) => !categories.has(c));
  if (unmapped.length > 0) {
    throw new ConfigurationError(`Categories without a template: ${unmapped.join(", ")}`);
  }

  const normalized = new Map<string, LayoutTemplate>();
  for (const t of templates.values()) {
    const fallbacks = t.id === genericId ? [] : [...t.fallbacks.filter((id) => id !== genericId), genericId];
    normalized.set(t.id, { ...t, fallbacks });
  }

  return { templates: normalized, categories, genericId };
}
