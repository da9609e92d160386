import type { LanguageProfile } from "../schema/content.js";

export type Script = "latin" | "punctuation" | "space" | "hangul" | "cjk" | "other";

/** Advance width per character in em, by script */
export type FallbackWidthTable = Readonly<Record<Script, number>>;

/**
 * Fixed-width approximation used when a font family cannot be resolved.
 * Linear in font size, so measured width never decreases as size grows.
 */
export const DEFAULT_FALLBACK_WIDTHS: FallbackWidthTable = {
  latin: 0.5,
  punctuation: 0.3,
  space: 0.25,
  hangul: 0.7,
  cjk: 0.65,
  other: 0.55,
};

/** Line height of the fallback model, in em */
export const FALLBACK_LINE_HEIGHT_EM = 1.2;

const HANGUL_RE = /[ᄀ-ᇿ㄰-㆏가-힯]/;
const CJK_RE = /[　-ヿ㐀-䶿一-鿿豈-﫿＀-￯]/;
const LATIN_RE = /[A-Za-z0-9À-ɏ]/;
const SPACE_RE = /\s/;
const PUNCT_RE = /[.,;:!?'"()[\]{}\-–—…·/&%*+=<>@#$^_|~`]/;

export function scriptOf(ch: string): Script {
  if (SPACE_RE.test(ch)) return "space";
  if (LATIN_RE.test(ch)) return "latin";
  if (HANGUL_RE.test(ch)) return "hangul";
  if (CJK_RE.test(ch)) return "cjk";
  if (PUNCT_RE.test(ch)) return "punctuation";
  return "other";
}

/** Width of `text` under the fallback table, in em */
export function fallbackWidthEm(text: string, table: FallbackWidthTable = DEFAULT_FALLBACK_WIDTHS): number {
  let total = 0;
  for (const ch of text) {
    total += table[scriptOf(ch)];
  }
  return total;
}

/**
 * Grammatical particles that attach to the preceding word in agglutinative
 * scripts. Longest first so suffix matching prefers 에서 over 에.
 */
export const PARTICLES: readonly string[] = [
  "에서",
  "으로",
  "부터",
  "까지",
  "에게",
  "께서",
  "을",
  "를",
  "이",
  "가",
  "은",
  "는",
  "의",
  "에",
  "로",
  "와",
  "과",
  "도",
  "만",
];

const PARTICLE_SET = new Set(PARTICLES);

export function isParticle(token: string): boolean {
  return PARTICLE_SET.has(token);
}

/** Length (code points) of a particle ending `token`, or 0 */
export function particleSuffixLength(token: string): number {
  for (const p of PARTICLES) {
    if (token.length > p.length && token.endsWith(p)) {
      return Array.from(p).length;
    }
  }
  return 0;
}

/** Pick the line-breaking profile from the dominant script of `text` */
export function detectLanguageProfile(text: string): LanguageProfile {
  let letters = 0;
  let hangul = 0;
  let cjk = 0;
  for (const ch of text) {
    const script = scriptOf(ch);
    if (script === "latin") letters++;
    else if (script === "hangul") {
      letters++;
      hangul++;
    } else if (script === "cjk") {
      letters++;
      cjk++;
    }
  }
  if (letters === 0) return "space";
  if (hangul / letters > 0.3) return "agglutinative";
  if (cjk / letters > 0.3) return "character";
  return "space";
}
