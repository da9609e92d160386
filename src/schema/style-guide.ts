import { z } from "zod";
import { CANVAS_H, CANVAS_W, LINE_SPACING, MAX_ITER } from "../constants.js";
import { ConfigurationError } from "../errors.js";
import type { SlotRole } from "./template.js";

const RoleFontSchema = z.object({
  family: z.string().min(1),
  min: z.number().positive(),
  max: z.number().positive(),
  sizes: z.array(z.number().int().positive()).min(1),
});
export type RoleFont = z.infer<typeof RoleFontSchema>;

const DEFAULT_ROLES: Record<SlotRole, RoleFont> = {
  title: { family: "Arial", min: 20, max: 44, sizes: [24, 28, 32, 36] },
  subtitle: { family: "Arial", min: 16, max: 28, sizes: [18, 20, 24] },
  body: { family: "Arial", min: 10, max: 24, sizes: [10, 11, 12, 14, 16, 18] },
  bullets: { family: "Arial", min: 10, max: 24, sizes: [10, 11, 12, 14, 16, 18] },
  kpi: { family: "Arial", min: 12, max: 40, sizes: [20, 24, 28, 32] },
  quote: { family: "Georgia", min: 14, max: 32, sizes: [18, 20, 24] },
  label: { family: "Arial", min: 9, max: 18, sizes: [10, 11, 12, 14] },
  caption: { family: "Arial", min: 9, max: 14, sizes: [9, 10, 11, 12] },
  text: { family: "Arial", min: 9, max: 28, sizes: [10, 11, 12, 14, 16, 18, 20, 24] },
};

export const StyleGuideSchema = z.object({
  canvas: z
    .object({
      w: z.number().positive(),
      h: z.number().positive(),
    })
    .default({ w: CANVAS_W, h: CANVAS_H }),
  lineSpacing: z.number().positive().default(LINE_SPACING),
  /** Intersection area below which two boxes are not considered overlapping (pt²) */
  overlapEpsilon: z.number().nonnegative().default(1),
  /** Overflow / bounds tolerance (pt) */
  epsilon: z.number().nonnegative().default(0.5),
  /** Comfort clearance from the canvas edges (pt) */
  margin: z.number().nonnegative().default(36),
  maxLineChars: z.number().int().positive().default(90),
  allCapsRun: z.number().int().positive().default(20),
  roles: z
    .object({
      title: RoleFontSchema.default(DEFAULT_ROLES.title),
      subtitle: RoleFontSchema.default(DEFAULT_ROLES.subtitle),
      body: RoleFontSchema.default(DEFAULT_ROLES.body),
      bullets: RoleFontSchema.default(DEFAULT_ROLES.bullets),
      kpi: RoleFontSchema.default(DEFAULT_ROLES.kpi),
      quote: RoleFontSchema.default(DEFAULT_ROLES.quote),
      label: RoleFontSchema.default(DEFAULT_ROLES.label),
      caption: RoleFontSchema.default(DEFAULT_ROLES.caption),
      text: RoleFontSchema.default(DEFAULT_ROLES.text),
    })
    .default({}),
  approvedFonts: z.array(z.string().min(1)).min(1).default(["Arial", "Calibri", "Helvetica", "Georgia"]),
  textColor: z.string().default("#1F1F1F"),
  maxBullets: z.number().int().positive().default(6),
  maxTotalChars: z.number().int().positive().default(900),
  minBoxSpacing: z.number().nonnegative().default(6),
  maxBoxes: z.number().int().positive().default(12),
  titleSizeFloor: z.number().positive().default(24),
  /** Boxes whose vertical centre lies in this top fraction of the canvas read as titles */
  titleRegion: z.number().min(0).max(1).default(0.2),
  fix: z
    .object({
      maxIterations: z.number().int().positive().default(MAX_ITER),
      minBoxSize: z.number().positive().default(18),
      shrinkFactor: z.number().gt(0).lt(1).default(0.7),
      gridStep: z.number().positive().default(6),
    })
    .default({}),
});
export type StyleGuide = z.infer<typeof StyleGuideSchema>;
export type StyleGuideInput = z.input<typeof StyleGuideSchema>;

/**
 * Parse a style guide, filling defaults. Throws ConfigurationError on
 * malformed input or inconsistent thresholds.
 */
export function parseStyleGuide(data: unknown = {}): StyleGuide {
  const parsed = StyleGuideSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid style guide: ${parsed.error.message}`, {
      issues: parsed.error.issues,
    });
  }
  const guide = parsed.data;

  for (const [role, font] of Object.entries(guide.roles)) {
    if (font.min > font.max) {
      throw new ConfigurationError(
        `Style guide role "${role}": min font ${font.min} exceeds max font ${font.max}`,
        { role }
      );
    }
    const outside = font.sizes.filter((s) => s < font.min || s > font.max);
    if (outside.length > 0) {
      throw new ConfigurationError(
        `Style guide role "${role}": approved sizes ${outside.join(", ")} lie outside [${font.min}, ${font.max}]`,
        { role }
      );
    }
  }

  if (2 * guide.margin >= Math.min(guide.canvas.w, guide.canvas.h)) {
    throw new ConfigurationError(
      `Margin ${guide.margin} leaves no usable area on a ${guide.canvas.w}x${guide.canvas.h} canvas`
    );
  }
  if (guide.fix.minBoxSize > Math.min(guide.canvas.w, guide.canvas.h)) {
    throw new ConfigurationError(`Minimum box size ${guide.fix.minBoxSize} exceeds the canvas`);
  }

  return guide;
}
