import { describe, it, expect } from 'vitest';

import {
  PendingSequence,
  REPLACEMENT_CHAR,
  createDecoded,
  decodeAt,
  encodeInto,
  incompleteTailStart,
  lastCodePoint,
  sequenceLength,
} from '../utf8.js';

const bytes = (...values: number[]) => Uint8Array.from(values);

describe('decodeAt', () => {
  it('decodes ASCII and multi-byte sequences', () => {
    const out = createDecoded();
    const buf = new TextEncoder().encode('aé€😀');

    expect(decodeAt(buf, 0, buf.length, false, out)).toBe(true);
    expect(out).toEqual({ codePoint: 0x61, size: 1 });

    decodeAt(buf, 1, buf.length, false, out);
    expect(out).toEqual({ codePoint: 0xe9, size: 2 });

    decodeAt(buf, 3, buf.length, false, out);
    expect(out).toEqual({ codePoint: 0x20ac, size: 3 });

    decodeAt(buf, 6, buf.length, false, out);
    expect(out).toEqual({ codePoint: 0x1f600, size: 4 });
  });

  it('reports a truncated sequence as incomplete unless final', () => {
    const out = createDecoded();
    const buf = bytes(0xe2, 0x82);

    expect(decodeAt(buf, 0, 2, false, out)).toBe(false);
    expect(decodeAt(buf, 0, 2, true, out)).toBe(true);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });
  });

  it('consumes one byte for invalid leads and broken sequences', () => {
    const out = createDecoded();

    decodeAt(bytes(0xff, 0x41), 0, 2, false, out);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });

    decodeAt(bytes(0xc3, 0x41), 0, 2, false, out);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });

    decodeAt(bytes(0x80), 0, 1, false, out);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });
  });

  it('rejects encoded surrogates and out-of-range code points', () => {
    const out = createDecoded();

    decodeAt(bytes(0xed, 0xa0, 0x80), 0, 3, true, out);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });

    decodeAt(bytes(0xf4, 0x90, 0x80, 0x80), 0, 4, true, out);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });
  });
});

describe('overlong and out-of-range forms', () => {
  it('rejects C0, C1 and F5..FF as lead bytes', () => {
    const out = createDecoded();
    for (const lead of [0xc0, 0xc1, 0xf5, 0xf8, 0xff]) {
      expect(sequenceLength(lead)).toBe(0);
      decodeAt(bytes(lead, 0x81, 0x81, 0x81), 0, 4, true, out);
      expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });
    }
  });

  it('rejects overlong three- and four-byte forms at the second byte', () => {
    const out = createDecoded();

    decodeAt(bytes(0xe0, 0x80, 0x80), 0, 3, true, out);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });

    decodeAt(bytes(0xe0, 0x9f, 0xbf), 0, 3, true, out);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });

    decodeAt(bytes(0xf0, 0x8f, 0xbf, 0xbf), 0, 4, true, out);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });
  });

  it('reports a broken prefix right away instead of waiting for more bytes', () => {
    const out = createDecoded();
    expect(decodeAt(bytes(0xe0, 0x80), 0, 2, false, out)).toBe(true);
    expect(out).toEqual({ codePoint: REPLACEMENT_CHAR, size: 1 });
  });

  it('still decodes the smallest valid forms', () => {
    const out = createDecoded();

    decodeAt(bytes(0xc2, 0x80), 0, 2, true, out);
    expect(out).toEqual({ codePoint: 0x80, size: 2 });

    decodeAt(bytes(0xe0, 0xa0, 0x80), 0, 3, true, out);
    expect(out).toEqual({ codePoint: 0x800, size: 3 });

    decodeAt(bytes(0xf0, 0x90, 0x80, 0x80), 0, 4, true, out);
    expect(out).toEqual({ codePoint: 0x10000, size: 4 });

    decodeAt(bytes(0xf4, 0x8f, 0xbf, 0xbf), 0, 4, true, out);
    expect(out).toEqual({ codePoint: 0x10ffff, size: 4 });
  });
});

describe('encodeInto', () => {
  it('matches TextEncoder output', () => {
    const dst = new Uint8Array(16);
    let pos = 0;
    for (const cp of [0x61, 0xe9, 0x20ac, 0x1f600]) {
      pos = encodeInto(dst, pos, cp);
    }
    expect(Array.from(dst.subarray(0, pos))).toEqual(Array.from(new TextEncoder().encode('aé€😀')));
  });
});

describe('incompleteTailStart', () => {
  it('finds a trailing prefix that still misses bytes', () => {
    expect(incompleteTailStart(bytes(0x61, 0xe2, 0x82), 0, 3)).toBe(1);
    expect(incompleteTailStart(bytes(0x61, 0xf0), 0, 2)).toBe(1);
  });

  it('returns the end for complete or invalid tails', () => {
    expect(incompleteTailStart(bytes(0x61, 0xc3, 0xa9), 0, 3)).toBe(3);
    expect(incompleteTailStart(bytes(0x61, 0x62), 0, 2)).toBe(2);
    expect(incompleteTailStart(bytes(0x80, 0x80, 0x80), 0, 3)).toBe(3);
    expect(incompleteTailStart(bytes(), 0, 0)).toBe(0);
  });

  it('does not hold back a prefix that can never complete', () => {
    expect(incompleteTailStart(bytes(0x61, 0xe0, 0x80), 0, 3)).toBe(3);
    expect(incompleteTailStart(bytes(0x61, 0xf4, 0x90), 0, 3)).toBe(3);
    expect(incompleteTailStart(bytes(0x61, 0xc1), 0, 2)).toBe(2);
    expect(incompleteTailStart(bytes(0x61, 0xe0, 0xa0), 0, 3)).toBe(1);
  });
});

describe('lastCodePoint', () => {
  it('returns the final code point of a range', () => {
    const buf = new TextEncoder().encode('aé');
    expect(lastCodePoint(buf, 0, buf.length)).toBe(0xe9);
    expect(lastCodePoint(buf, 0, 1)).toBe(0x61);
  });

  it('returns U+FFFD when the range ends in a stray continuation byte', () => {
    expect(lastCodePoint(bytes(0x61, 0xc3, 0xa9, 0xa9), 0, 4)).toBe(REPLACEMENT_CHAR);
  });

  it('returns -1 for an empty range', () => {
    expect(lastCodePoint(bytes(), 0, 0)).toBe(-1);
  });
});

describe('PendingSequence', () => {
  it('completes a sequence from the next chunk', () => {
    const pending = new PendingSequence();
    pending.hold(bytes(0x61, 0xe2), 1, 2);

    expect(pending.isEmpty).toBe(false);
    expect(pending.isComplete).toBe(false);

    const taken = pending.fill(bytes(0x82, 0xac, 0x20), 0, 3);
    expect(taken).toBe(2);
    expect(pending.isComplete).toBe(true);
    expect(Array.from(pending.bytes.subarray(0, pending.length))).toEqual([0xe2, 0x82, 0xac]);
  });

  it('stops at a non-continuation byte', () => {
    const pending = new PendingSequence();
    pending.hold(bytes(0xe2), 0, 1);

    expect(pending.fill(bytes(0x82, 0x41), 0, 2)).toBe(1);
    expect(pending.isComplete).toBe(false);
  });

  it('refuses a second byte outside the range its lead allows', () => {
    const pending = new PendingSequence();
    pending.hold(bytes(0xe0), 0, 1);

    expect(pending.fill(bytes(0x80, 0x80), 0, 2)).toBe(0);
    expect(pending.length).toBe(1);
  });
});
