/**
 * UTF-8 decoding helpers for the byte-level scanners.
 *
 * Recovery policy: an invalid lead byte, a lead byte followed by a byte outside
 * its allowed range, a truncated sequence at end of input, an overlong form, a
 * surrogate or a code point above U+10FFFF all decode to U+FFFD and consume
 * exactly one byte.
 * Any continuation bytes that follow are then decoded one at a time and become
 * U+FFFD as well.
 */

export const REPLACEMENT_CHAR = 0xfffd;

/** Mutable decode target, reused by scanners so decoding never allocates. */
export interface DecodedCodePoint {
  codePoint: number;
  size: number;
}

export function createDecoded(): DecodedCodePoint {
  return { codePoint: 0, size: 0 };
}

/**
 * Length of the sequence announced by `lead`, or 0 when `lead` cannot start one.
 * C0 and C1 only start overlong forms; F5..FF would encode past U+10FFFF.
 */
export function sequenceLength(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead < 0xc2) return 0;
  if (lead < 0xe0) return 2;
  if (lead < 0xf0) return 3;
  if (lead < 0xf5) return 4;
  return 0;
}

export function isContinuation(b: number): boolean {
  return (b & 0xc0) === 0x80;
}

/**
 * Whether `b` may follow `lead` at position `index` of its sequence. The second
 * byte is narrowed for E0, ED, F0 and F4 so overlong forms, surrogates and code
 * points above U+10FFFF never decode.
 */
export function acceptsNext(lead: number, index: number, b: number): boolean {
  if (index !== 1) return isContinuation(b);
  switch (lead) {
    case 0xe0:
      return b >= 0xa0 && b <= 0xbf;
    case 0xed:
      return b >= 0x80 && b <= 0x9f;
    case 0xf0:
      return b >= 0x90 && b <= 0xbf;
    case 0xf4:
      return b >= 0x80 && b <= 0x8f;
    default:
      return isContinuation(b);
  }
}

function replacement(out: DecodedCodePoint): true {
  out.codePoint = REPLACEMENT_CHAR;
  out.size = 1;
  return true;
}

/**
 * Decodes the code point starting at `pos` into `out`.
 *
 * Returns false only when `final` is false and the bytes before `end` are a
 * valid but incomplete prefix -- the caller has to wait for the next chunk.
 */
export function decodeAt(
  buf: Uint8Array,
  pos: number,
  end: number,
  final: boolean,
  out: DecodedCodePoint,
): boolean {
  const lead = buf[pos];
  if (lead < 0x80) {
    out.codePoint = lead;
    out.size = 1;
    return true;
  }

  const len = sequenceLength(lead);
  if (len === 0) return replacement(out);

  const available = end - pos;
  const check = available < len ? available : len;
  for (let k = 1; k < check; k++) {
    if (!acceptsNext(lead, k, buf[pos + k])) return replacement(out);
  }
  if (available < len) {
    return final ? replacement(out) : false;
  }

  let cp: number;
  if (len === 2) {
    cp = ((lead & 0x1f) << 6) | (buf[pos + 1] & 0x3f);
  } else if (len === 3) {
    cp = ((lead & 0x0f) << 12) | ((buf[pos + 1] & 0x3f) << 6) | (buf[pos + 2] & 0x3f);
  } else {
    cp =
      ((lead & 0x07) << 18) |
      ((buf[pos + 1] & 0x3f) << 12) |
      ((buf[pos + 2] & 0x3f) << 6) |
      (buf[pos + 3] & 0x3f);
  }

  out.codePoint = cp;
  out.size = len;
  return true;
}

/**
 * Writes `cp` as UTF-8 into `dst` at `pos` and returns the position after it.
 */
export function encodeInto(dst: Uint8Array, pos: number, cp: number): number {
  if (cp < 0x80) {
    dst[pos] = cp;
    return pos + 1;
  }
  if (cp < 0x800) {
    dst[pos] = 0xc0 | (cp >> 6);
    dst[pos + 1] = 0x80 | (cp & 0x3f);
    return pos + 2;
  }
  if (cp < 0x10000) {
    dst[pos] = 0xe0 | (cp >> 12);
    dst[pos + 1] = 0x80 | ((cp >> 6) & 0x3f);
    dst[pos + 2] = 0x80 | (cp & 0x3f);
    return pos + 3;
  }
  dst[pos] = 0xf0 | (cp >> 18);
  dst[pos + 1] = 0x80 | ((cp >> 12) & 0x3f);
  dst[pos + 2] = 0x80 | ((cp >> 6) & 0x3f);
  dst[pos + 3] = 0x80 | (cp & 0x3f);
  return pos + 4;
}

export function isAsciiRange(buf: Uint8Array, start: number, end: number): boolean {
  for (let i = start; i < end; i++) {
    if (buf[i] >= 0x80) return false;
  }
  return true;
}

/**
 * Start of a trailing sequence in `buf[start, end)` that is a valid prefix but
 * still misses bytes, or `end` when the range ends on a complete sequence.
 */
export function incompleteTailStart(buf: Uint8Array, start: number, end: number): number {
  for (let k = 1; k <= 3 && end - k >= start; k++) {
    const lead = buf[end - k];
    if (isContinuation(lead)) continue;
    if (sequenceLength(lead) <= k) return end;
    for (let j = 1; j < k; j++) {
      if (!acceptsNext(lead, j, buf[end - k + j])) return end;
    }
    return end - k;
  }
  return end;
}

/**
 * Last code point of a range that contains only complete sequences.
 * Returns -1 for an empty range.
 */
export function lastCodePoint(buf: Uint8Array, start: number, end: number): number {
  if (end <= start) return -1;
  for (let k = 1; k <= 4 && end - k >= start; k++) {
    const p = end - k;
    if (isContinuation(buf[p])) continue;
    const out = createDecoded();
    decodeAt(buf, p, end, true, out);
    return out.size === k ? out.codePoint : REPLACEMENT_CHAR;
  }
  return REPLACEMENT_CHAR;
}

/**
 * Holds the first bytes of a code point whose lead byte arrived at the end of
 * a chunk, until the next chunk supplies the rest.
 */
export class PendingSequence {
  readonly bytes = new Uint8Array(4);
  length = 0;

  get isEmpty(): boolean {
    return this.length === 0;
  }

  /** True once every byte announced by the lead byte has arrived. */
  get isComplete(): boolean {
    return this.length > 0 && this.length === sequenceLength(this.bytes[0]);
  }

  hold(src: Uint8Array, start: number, end: number): void {
    this.length = 0;
    for (let i = start; i < end; i++) {
      this.bytes[this.length++] = src[i];
    }
  }

  /**
   * Pulls continuation bytes from the next chunk.
   *
   * Returns the number of bytes taken. When the result leaves the sequence
   * incomplete while bytes remain in the chunk, the sequence is broken.
   */
  fill(src: Uint8Array, start: number, end: number): number {
    const need = sequenceLength(this.bytes[0]);
    let i = start;
    while (this.length < need && i < end && acceptsNext(this.bytes[0], this.length, src[i])) {
      this.bytes[this.length++] = src[i++];
    }
    return i - start;
  }

  clear(): void {
    this.length = 0;
  }
}
