/**
 * Character classification shared by the normalizer and the tokenizer.
 *
 * ASCII is answered from 128-entry tables; everything else falls back to
 * Unicode property regexes.
 */

/** Copy the byte through unchanged. */
export const ASCII_KEEP = 0;
/** Punctuation or whitespace: collapses into a single space. */
export const ASCII_SPACE = 1;
/** Uppercase letter: add 0x20. */
export const ASCII_LOWER = 2;

const PUNCT_OR_SPACE = /^[\p{P}\p{White_Space}]$/u;
const LETTER_OR_NUMBER = /^[\p{L}\p{N}]$/u;

function buildNormalizeTable(): Uint8Array {
  const table = new Uint8Array(128);
  for (let i = 0; i < 128; i++) {
    const ch = String.fromCharCode(i);
    if (PUNCT_OR_SPACE.test(ch)) {
      table[i] = ASCII_SPACE;
    } else if (ch !== ch.toLowerCase()) {
      table[i] = ASCII_LOWER;
    } else {
      table[i] = ASCII_KEEP;
    }
  }
  return table;
}

function buildWordTable(): Uint8Array {
  const table = new Uint8Array(128);
  for (let i = 0; i < 128; i++) {
    const ch = String.fromCharCode(i);
    if (/[A-Za-z0-9_'-]/.test(ch)) table[i] = 1;
  }
  return table;
}

/** Normalization action per ASCII byte. */
export const ASCII_NORMALIZE_TABLE: Uint8Array = buildNormalizeTable();

/** 1 for ASCII bytes that belong to a word token. */
export const ASCII_WORD_TABLE: Uint8Array = buildWordTable();

export function isPunctOrSpace(cp: number): boolean {
  if (cp < 0x80) return ASCII_NORMALIZE_TABLE[cp] === ASCII_SPACE;
  return PUNCT_OR_SPACE.test(String.fromCodePoint(cp));
}

/**
 * Word characters: ASCII letters and digits, `_`, `-`, `'`, and any other
 * Unicode letter or number.
 */
export function isWordCodePoint(cp: number): boolean {
  if (cp < 0x80) return ASCII_WORD_TABLE[cp] === 1;
  return LETTER_OR_NUMBER.test(String.fromCodePoint(cp));
}

/**
 * One-to-one lowercase mapping. Where the full mapping expands (U+0130 becomes
 * `i` plus a combining dot), only its first code point is kept, so
 * lowercasing never changes the code point count.
 */
export function lowerCodePoint(cp: number): number {
  return String.fromCodePoint(cp).toLowerCase().codePointAt(0) ?? cp;
}
