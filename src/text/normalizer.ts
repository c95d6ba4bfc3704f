import {
  ASCII_LOWER,
  ASCII_NORMALIZE_TABLE,
  ASCII_SPACE,
  isPunctOrSpace,
  lowerCodePoint,
} from './char-classes.js';
import {
  REPLACEMENT_CHAR,
  createDecoded,
  decodeAt,
  encodeInto,
  isAsciiRange,
} from './utf8.js';

// =============================================================================
// String form
// =============================================================================

export function isAscii(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) >= 0x80) return false;
  }
  return true;
}

/**
 * Canonical form used for counting: every run of punctuation and whitespace
 * becomes one space, every other character is lowercased.
 *
 * Leading and trailing spaces are kept, so `normalize(normalize(x))` equals
 * `normalize(x)`.
 */
export function normalize(text: string): string {
  if (text.length === 0) return '';
  return isAscii(text) ? normalizeAscii(text) : normalizeUnicode(text);
}

/** Table-driven path. Only valid for input that is entirely ASCII. */
export function normalizeAscii(text: string): string {
  let out = '';
  let lastWasSpace = false;
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    const action = ASCII_NORMALIZE_TABLE[c];
    if (action === ASCII_SPACE) {
      if (!lastWasSpace) {
        out += ' ';
        lastWasSpace = true;
      }
      continue;
    }
    out += action === ASCII_LOWER ? String.fromCharCode(c + 0x20) : text[i];
    lastWasSpace = false;
  }
  return out;
}

/** Code-point path, correct for any input. */
export function normalizeUnicode(text: string): string {
  let out = '';
  let lastWasSpace = false;
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? REPLACEMENT_CHAR;
    if (isPunctOrSpace(cp)) {
      if (!lastWasSpace) {
        out += ' ';
        lastWasSpace = true;
      }
      continue;
    }
    out += String.fromCodePoint(lowerCodePoint(cp));
    lastWasSpace = false;
  }
  return out;
}

export function codePointLength(text: string): number {
  let n = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text.charCodeAt(i);
    // count the high half of a surrogate pair only
    if (c < 0xdc00 || c > 0xdfff) n++;
  }
  return n;
}

// =============================================================================
// Byte form
// =============================================================================

/** Upper bound on the bytes `normalizeInto` can write for `byteLength` input bytes. */
export function normalizedCapacity(byteLength: number): number {
  return byteLength * 3;
}

/**
 * Byte-level normalizer with the collapse state exposed, so a stream cut into
 * pieces normalizes exactly as if it were one buffer.
 *
 * Callers must hand it ranges that end on a code point boundary; a truncated
 * sequence at the end of a range is treated as invalid.
 */
export class ByteNormalizer {
  lastWasSpace = false;
  /** Code points emitted by the last `run`. */
  codePoints = 0;

  private readonly decoded = createDecoded();

  reset(): void {
    this.lastWasSpace = false;
    this.codePoints = 0;
  }

  /**
   * Normalizes `src[start, end)`. Writes into `dst` from `pos` when `dst` is
   * given, otherwise only counts. Returns the write position after the output.
   */
  run(src: Uint8Array, start: number, end: number, dst: Uint8Array | null, pos: number): number {
    let count = 0;
    let last = this.lastWasSpace;

    if (isAsciiRange(src, start, end)) {
      for (let i = start; i < end; i++) {
        const b = src[i];
        const action = ASCII_NORMALIZE_TABLE[b];
        if (action === ASCII_SPACE) {
          if (!last) {
            if (dst) dst[pos++] = 0x20;
            count++;
            last = true;
          }
        } else {
          if (dst) dst[pos++] = action === ASCII_LOWER ? b + 0x20 : b;
          count++;
          last = false;
        }
      }
      this.lastWasSpace = last;
      this.codePoints = count;
      return pos;
    }

    const d = this.decoded;
    let i = start;
    while (i < end) {
      decodeAt(src, i, end, true, d);
      i += d.size;
      const cp = d.codePoint;

      if (cp < 0x80) {
        const action = ASCII_NORMALIZE_TABLE[cp];
        if (action === ASCII_SPACE) {
          if (!last) {
            if (dst) dst[pos++] = 0x20;
            count++;
            last = true;
          }
        } else {
          if (dst) dst[pos++] = action === ASCII_LOWER ? cp + 0x20 : cp;
          count++;
          last = false;
        }
        continue;
      }

      if (isPunctOrSpace(cp)) {
        if (!last) {
          if (dst) dst[pos++] = 0x20;
          count++;
          last = true;
        }
        continue;
      }

      if (dst) pos = encodeInto(dst, pos, lowerCodePoint(cp));
      count++;
      last = false;
    }

    this.lastWasSpace = last;
    this.codePoints = count;
    return pos;
  }
}

/**
 * Normalizes UTF-8 `src[start, end)` into `dst` at `pos`, starting from a
 * fresh collapse state. Returns the write position after the output.
 */
export function normalizeRangeInto(
  src: Uint8Array,
  start: number,
  end: number,
  dst: Uint8Array,
  pos: number,
): number {
  return new ByteNormalizer().run(src, start, end, dst, pos);
}

/**
 * Normalizes all of `src` into `dst` and returns the number of bytes written.
 * `dst` needs `normalizedCapacity(src.length)` bytes.
 */
export function normalizeInto(src: Uint8Array, dst: Uint8Array): number {
  if (dst.length < normalizedCapacity(src.length)) {
    throw new RangeError(
      `destination holds ${dst.length} bytes, need ${normalizedCapacity(src.length)}`,
    );
  }
  return normalizeRangeInto(src, 0, src.length, dst, 0);
}

/** Code points in the normalized form of `src[start, end)`. */
export function normalizedLength(src: Uint8Array, start: number, end: number): number {
  const n = new ByteNormalizer();
  n.run(src, start, end, null, 0);
  return n.codePoints;
}
