import { ELLIPSIS, SENTENCE_KEEP_RATIO, WORD_KEEP_RATIO } from "../constants.js";

const SENTENCE_END_RE = /[.!?。！？]/;
const FULLWIDTH_END_RE = /[。！？]/;
const SPACE_RE = /\s/;

/** Cut to at most `n` UTF-16 units without splitting a surrogate pair */
function safeSlice(text: string, n: number): string {
  if (n <= 0) return "";
  const code = text.charCodeAt(n - 1);
  const cut = code >= 0xd800 && code <= 0xdbff ? n - 1 : n;
  return text.slice(0, cut);
}

function lastSpace(prefix: string): number {
  for (let i = prefix.length - 1; i >= 0; i--) {
    if (SPACE_RE.test(prefix[i] ?? "")) return i;
  }
  return -1;
}

function lastSentenceEnd(prefix: string, full: string): number {
  for (let i = prefix.length - 1; i >= 0; i--) {
    const ch = prefix[i] ?? "";
    if (!SENTENCE_END_RE.test(ch)) continue;
    if (FULLWIDTH_END_RE.test(ch)) return i + 1;
    const next = full[i + 1];
    if (next === undefined || SPACE_RE.test(next)) return i + 1;
  }
  return -1;
}

/**
 * Shorten `text` to at most `maxLen` characters plus the ellipsis.
 * Text within the limit is returned unchanged. Smart mode prefers a
 * sentence boundary, then a word boundary, then a hard cut.
 */
export function truncateText(text: string, maxLen: number, smart = true): string {
  const limit = Math.max(0, Math.floor(maxLen));
  if (text.length <= limit) return text;

  const prefix = safeSlice(text, limit);
  if (prefix.trim() === "") return ELLIPSIS;
  if (!smart) return prefix + ELLIPSIS;

  const sentenceEnd = lastSentenceEnd(prefix, text);
  if (sentenceEnd > 0 && sentenceEnd >= limit * SENTENCE_KEEP_RATIO) {
    return prefix.slice(0, sentenceEnd) + ELLIPSIS;
  }

  const nextChar = text[prefix.length];
  const wordCut =
    nextChar !== undefined && SPACE_RE.test(nextChar)
      ? prefix.trimEnd()
      : prefix.slice(0, Math.max(lastSpace(prefix), 0)).trimEnd();
  if (wordCut.length > 0 && wordCut.length >= limit * WORD_KEEP_RATIO) {
    return wordCut + ELLIPSIS;
  }

  return prefix.trimEnd() + ELLIPSIS;
}
