import { describe, it, expect } from "vitest";
import { loadDefaultCatalog, validateCatalog } from "../../src/layout/catalog.js";
import { ConfigurationError } from "../../src/errors.js";
import { makeCatalog, makeSlot, makeTemplate } from "../helpers/fixtures.js";

const generic = makeTemplate({ id: "single_column" });

describe("validateCatalog", () => {
  it("accepts the bundled catalog", () => {
    const loaded = validateCatalog(loadDefaultCatalog());
    expect(loaded.templates.size).toBe(11);
    expect(loaded.categories.get("timeline")).toBe("timeline");
    expect(loaded.genericId).toBe("single_column");
  });

  it("ends every chain in the generic template", () => {
    const loaded = validateCatalog(
      makeCatalog([generic, makeTemplate({ id: "a" }), makeTemplate({ id: "b", fallbacks: ["single_column", "a"] })])
    );
    expect(loaded.templates.get("a")?.fallbacks).toEqual(["single_column"]);
    expect(loaded.templates.get("b")?.fallbacks).toEqual(["a", "single_column"]);
    expect(loaded.templates.get("single_column")?.fallbacks).toEqual([]);
  });

  it("rejects duplicate template ids", () => {
    expect(() => validateCatalog(makeCatalog([generic, makeTemplate({ id: "a" }), makeTemplate({ id: "a" })]))).toThrow(
      'Duplicate template id "a"'
    );
  });

  it("requires the generic template", () => {
    expect(() => validateCatalog(makeCatalog([makeTemplate({ id: "a" })]))).toThrow(
      'Generic template "single_column" is missing from the catalog'
    );
  });

  it("rejects a template falling back to itself", () => {
    expect(() => validateCatalog(makeCatalog([generic, makeTemplate({ id: "a", fallbacks: ["a"] })]))).toThrow(
      'Template "a" lists itself as a fallback'
    );
  });

  it("rejects a dangling fallback", () => {
    expect(() => validateCatalog(makeCatalog([generic, makeTemplate({ id: "a", fallbacks: ["nowhere"] })]))).toThrow(
      'Template "a" falls back to unknown template "nowhere"'
    );
  });

  it("rejects a fallback cycle", () => {
    const catalog = makeCatalog([
      generic,
      makeTemplate({ id: "a", fallbacks: ["b"] }),
      makeTemplate({ id: "b", fallbacks: ["a"] }),
    ]);
    expect(() => validateCatalog(catalog)).toThrow("Fallback chain cycle: a -> b -> a");
  });

  it("requires every category to be mapped", () => {
    const catalog = makeCatalog([generic]);
    const { quote: _quote, ...categories } = catalog.categories;
    expect(() => validateCatalog({ ...catalog, categories })).toThrow("Categories without a template: quote");
  });

  it("rejects unknown categories and unknown targets", () => {
    expect(() => validateCatalog(makeCatalog([generic], { chart: "single_column" }))).toThrow(
      'Unknown category "chart" in template catalog'
    );
    expect(() => validateCatalog(makeCatalog([generic], { quote: "missing" }))).toThrow(
      'Category "quote" maps to unknown template "missing"'
    );
  });

  it("rejects malformed slots", () => {
    const slot = (overrides: Parameters<typeof makeSlot>[0]) =>
      makeCatalog([generic, makeTemplate({ id: "a", slots: [makeSlot(overrides)] })]);

    expect(() => validateCatalog(slot({ name: "s", sources: ["footer"] }))).toThrow('unknown source "footer"');
    expect(() => validateCatalog(slot({ name: "s", geometry: { x: 0.6, y: 0, w: 0.5, h: 0.1 } }))).toThrow(
      "extends past the canvas"
    );
    expect(() => validateCatalog(slot({ name: "s", fontSize: { min: 20, max: 10 } }))).toThrow(ConfigurationError);
  });

  it("rejects two slots with one name", () => {
    const template = makeTemplate({ id: "a", slots: [makeSlot({ name: "s" }), makeSlot({ name: "s" })] });
    expect(() => validateCatalog(makeCatalog([generic, template]))).toThrow('Template "a" has two slots named "s"');
  });
});
