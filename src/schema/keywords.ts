import { z } from "zod";
import { CATEGORIES } from "./category.js";

export const KeywordRuleSchema = z.object({
  category: z.enum(CATEGORIES).refine((c) => c !== "generic", {
    message: "generic is the default category and takes no keywords",
  }),
  priority: z.number().int().nonnegative(),
  keywords: z.array(z.string().min(1)).min(1),
});
export type KeywordRule = z.infer<typeof KeywordRuleSchema>;

export const KeywordTableSchema = z.object({
  rules: z.array(KeywordRuleSchema).min(1),
});
export type KeywordTable = z.infer<typeof KeywordTableSchema>;

/** Parse and validate a keyword table. Throws ZodError on invalid input. */
export function parseKeywordTable(data: unknown): KeywordTable {
  return KeywordTableSchema.parse(data);
}
