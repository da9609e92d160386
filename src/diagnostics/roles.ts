import type { FittedBox } from "../schema/geometry.js";
import type { RoleFont, StyleGuide } from "../schema/style-guide.js";
import type { SlotRole } from "../schema/template.js";

/**
 * Role used for style checks. Untyped text boxes whose vertical centre
 * sits in the title region are held to title rules.
 */
export function effectiveRole(box: FittedBox, guide: StyleGuide): SlotRole {
  if (box.role !== "text") return box.role;
  const centre = box.rect.y + box.rect.h / 2;
  return centre < guide.canvas.h * guide.titleRegion ? "title" : "text";
}

export function roleFont(box: FittedBox, guide: StyleGuide): RoleFont {
  return guide.roles[effectiveRole(box, guide)];
}

export function hasText(box: FittedBox): boolean {
  return box.text.trim() !== "";
}

/** Non-empty paragraphs of a box; each is one bullet in list boxes */
export function paragraphs(box: FittedBox): string[] {
  return box.text.split(/\r?\n/).filter((p) => p.trim() !== "");
}

export function isListBox(box: Pick<FittedBox, "role">): boolean {
  return box.role === "bullets" || box.role === "body";
}

export function isApprovedFamily(family: string, guide: StyleGuide): boolean {
  const lower = family.toLowerCase();
  return guide.approvedFonts.some((f) => f.toLowerCase() === lower);
}
