import type { LanguageProfile } from "../schema/content.js";
import { isParticle, particleSuffixLength } from "./scripts.js";

export type WidthFn = (text: string) => number;

const CHARACTER_UNIT_RE = /[A-Za-z0-9À-ɏ]+|\s+|./gsu;
const WHITESPACE_RE = /^\s+$/;

/** Split one paragraph into break units for the profile */
function tokenize(paragraph: string, profile: LanguageProfile): string[] {
  if (profile === "character") {
    return paragraph.match(CHARACTER_UNIT_RE) ?? [];
  }
  const words = paragraph.split(/\s+/).filter((w) => w.length > 0);
  if (profile !== "agglutinative") return words;

  // A detached particle stays glued to the word before it
  const merged: string[] = [];
  for (const word of words) {
    const last = merged.length - 1;
    if (last >= 0 && isParticle(word)) {
      merged[last] = `${merged[last]} ${word}`;
    } else {
      merged.push(word);
    }
  }
  return merged;
}

/**
 * Break a token wider than `maxWidth` at the last character that fits.
 * Under the agglutinative profile a trailing particle is never left split
 * from its stem's last piece.
 */
export function hardBreak(
  token: string,
  maxWidth: number,
  measure: WidthFn,
  profile: LanguageProfile
): string[] {
  const chars = Array.from(token);
  const pieces: string[][] = [];
  let start = 0;
  while (start < chars.length) {
    let end = start + 1;
    while (end < chars.length && measure(chars.slice(start, end + 1).join("")) <= maxWidth) {
      end++;
    }
    pieces.push(chars.slice(start, end));
    start = end;
  }

  const suffix = profile === "agglutinative" ? particleSuffixLength(token) : 0;
  if (suffix > 0 && pieces.length > 1) {
    const last = pieces[pieces.length - 1] ?? [];
    const prev = pieces[pieces.length - 2] ?? [];
    const missing = suffix - last.length;
    if (missing > 0 && prev.length > missing) {
      last.unshift(...prev.splice(prev.length - missing, missing));
    }
  }
  return pieces.map((p) => p.join(""));
}

/**
 * Greedy line filling. Newlines in `text` are hard paragraph breaks.
 * Returns [] for blank text.
 */
export function wrapText(
  text: string,
  maxWidth: number,
  measure: WidthFn,
  profile: LanguageProfile
): string[] {
  if (text.trim() === "") return [];

  const joiner = profile === "character" ? "" : " ";
  const lines: string[] = [];

  for (const paragraph of text.split(/\r?\n/)) {
    const units = tokenize(paragraph.trim(), profile);
    if (units.length === 0) {
      lines.push("");
      continue;
    }

    let current = "";
    for (const unit of units) {
      const blank = WHITESPACE_RE.test(unit);
      if (blank && current === "") continue;

      const candidate = current === "" ? unit : current + joiner + unit;
      if (measure(candidate) <= maxWidth) {
        current = candidate;
        continue;
      }

      if (current !== "") {
        lines.push(current.trimEnd());
        current = "";
      }
      if (blank) continue;

      if (measure(unit) <= maxWidth) {
        current = unit;
        continue;
      }

      const pieces = hardBreak(unit, maxWidth, measure, profile);
      lines.push(...pieces.slice(0, -1).map((p) => p.trimEnd()));
      current = pieces[pieces.length - 1] ?? "";
    }
    if (current.trim() !== "") lines.push(current.trimEnd());
  }

  return lines;
}
