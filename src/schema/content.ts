import { z } from "zod";

export const LanguageProfile = z.enum(["space", "agglutinative", "character"]);
export type LanguageProfile = z.infer<typeof LanguageProfile>;

export const KpiSchema = z.object({
  label: z.string(),
  value: z.union([z.string(), z.number()]),
  delta: z.string().optional(),
});
export type Kpi = z.infer<typeof KpiSchema>;

export const ColumnSchema = z.object({
  header: z.string().optional(),
  items: z.array(z.string()).default([]),
});
export type Column = z.infer<typeof ColumnSchema>;

export const ChartSchema = z
  .object({
    kind: z.string().min(1),
    title: z.string().optional(),
    series: z
      .array(
        z.object({
          name: z.string(),
          values: z.array(z.number()),
        })
      )
      .optional(),
  })
  .passthrough();
export type ChartSpec = z.infer<typeof ChartSchema>;

export const ContentBlockSchema = z.object({
  id: z.string().optional(),
  headline: z.string().optional(),
  title: z.string().optional(),
  subtitle: z.string().optional(),
  body: z.string().optional(),
  summary: z.string().optional(),
  bullets: z.array(z.string()).optional(),
  milestones: z.array(z.string()).optional(),
  steps: z.array(z.string()).optional(),
  levels: z.array(z.string()).optional(),
  kpis: z.array(KpiSchema).optional(),
  columns: z.array(ColumnSchema).optional(),
  quote: z.string().optional(),
  attribution: z.string().optional(),
  takeaway: z.string().optional(),
  chart: ChartSchema.optional(),
  layoutHint: z.string().optional(),
  language: z.union([z.literal("auto"), LanguageProfile]).default("auto"),
});
export type ContentBlock = z.infer<typeof ContentBlockSchema>;
export type ContentBlockInput = z.input<typeof ContentBlockSchema>;

/** Parse and validate a content block. Throws ZodError on invalid input. */
export function parseContentBlock(data: unknown): ContentBlock {
  return ContentBlockSchema.parse(data);
}
