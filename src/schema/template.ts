import { z } from "zod";

export const SlotRole = z.enum([
  "title",
  "subtitle",
  "body",
  "bullets",
  "kpi",
  "quote",
  "label",
  "caption",
  "text",
]);
export type SlotRole = z.infer<typeof SlotRole>;

/** Normalized geometry: every coordinate is a fraction of the canvas */
export const NormalizedRectSchema = z.object({
  x: z.number().min(0).max(1),
  y: z.number().min(0).max(1),
  w: z.number().positive().max(1),
  h: z.number().positive().max(1),
});

export const FontRangeSchema = z.object({
  min: z.number().int().positive(),
  max: z.number().int().positive(),
});
export type FontRange = z.infer<typeof FontRangeSchema>;

export const SlotStyleSchema = z.object({
  bold: z.boolean().default(false),
  italic: z.boolean().default(false),
  align: z.enum(["left", "center", "right"]).default("left"),
  color: z.string().optional(),
});
export type SlotStyle = z.infer<typeof SlotStyleSchema>;

export const ElementSlotSchema = z.object({
  name: z.string().min(1),
  role: SlotRole,
  sources: z.array(z.string().min(1)).min(1),
  combine: z.enum(["first", "all"]).default("first"),
  geometry: NormalizedRectSchema,
  maxLength: z.number().int().positive(),
  fontFamilies: z.array(z.string().min(1)).min(1),
  fontSize: FontRangeSchema,
  style: SlotStyleSchema.default({}),
  optional: z.boolean().default(false),
  defaultText: z.string().optional(),
});
export type ElementSlot = z.infer<typeof ElementSlotSchema>;

export const LayoutTemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  complexity: z.number().min(0).max(1),
  useCases: z.array(z.string()).default([]),
  slots: z.array(ElementSlotSchema).min(1),
  fallbacks: z.array(z.string()).default([]),
});
export type LayoutTemplate = z.infer<typeof LayoutTemplateSchema>;

export const TemplateCatalogSchema = z.object({
  templates: z.array(LayoutTemplateSchema).min(1),
  categories: z.record(z.string(), z.string()),
});
export type TemplateCatalog = z.infer<typeof TemplateCatalogSchema>;

/** Parse and validate a template catalog. Throws ZodError on invalid input. */
export function parseTemplateCatalog(data: unknown): TemplateCatalog {
  return TemplateCatalogSchema.parse(data);
}
