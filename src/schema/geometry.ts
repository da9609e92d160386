import type { LanguageProfile } from "./content.js";
import type { FontRange, SlotRole, SlotStyle } from "./template.js";
import type { Category } from "./category.js";

/** A rectangle in canvas coordinates (pt) */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

/** Canvas dimensions (pt) */
export interface Canvas {
  w: number;
  h: number;
}

export interface BoxStyle extends SlotStyle {
  lineSpacing: number;
  /** Extra space between paragraphs (pt) */
  paragraphSpacing: number;
}

/** One slot of a template instantiated for one slide */
export interface FittedBox {
  id: string;
  role: SlotRole;
  priority: number;
  text: string;
  lines: string[];
  fontFamily: string;
  fontSize: number;
  sizeRange: FontRange;
  rect: Rect;
  /** Measured extent of the wrapped text */
  textWidth: number;
  textHeight: number;
  truncated: boolean;
  placeholder: boolean;
  /** 0–1: how much the measurement and fit can be trusted */
  fitConfidence: number;
  language: LanguageProfile;
  style: BoxStyle;
}

/** Full per-slide geometric state passed between engine stages */
export interface SlideGeometryModel {
  templateId: string;
  category: Category;
  complexity: number;
  canvas: Canvas;
  boxes: FittedBox[];
}
