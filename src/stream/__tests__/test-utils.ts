import type { ByteSource } from '../byte-source.js';

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/** Source that hands out `bytes` in pieces of at most `size` bytes. */
export function slicedSource(bytes: Uint8Array, size: number): ByteSource & { readonly reads: number } {
  let offset = 0;
  let reads = 0;
  return {
    get reads() {
      return reads;
    },
    async read(target: Uint8Array) {
      reads++;
      const n = Math.min(size, target.length, bytes.length - offset);
      target.set(bytes.subarray(offset, offset + n));
      offset += n;
      return { bytesRead: n, done: offset >= bytes.length };
    },
  };
}

/** Source that delivers `chunks` reads of `piece` and then fails. */
export function failingSource(piece: string, chunks: number, message = 'disk on fire'): ByteSource {
  const bytes = encoder.encode(piece);
  let calls = 0;
  return {
    async read(target: Uint8Array) {
      if (calls++ >= chunks) throw new Error(message);
      target.set(bytes);
      return { bytesRead: bytes.length, done: false };
    },
  };
}

/** Never-ending source of `piece`; aborts `controller` once `abortAfter` reads have happened. */
export function endlessSource(
  piece: string,
  controller: AbortController,
  abortAfter: number,
): ByteSource & { readonly reads: number } {
  const bytes = encoder.encode(piece);
  let reads = 0;
  return {
    get reads() {
      return reads;
    },
    async read(target: Uint8Array) {
      reads++;
      if (reads === abortAfter) controller.abort();
      const n = Math.min(bytes.length, target.length);
      target.set(bytes.subarray(0, n));
      return { bytesRead: n, done: false };
    },
  };
}

export const CORPUS: Array<string | Uint8Array> = [
  '',
  'The quick brown fox jumps over the lazy dog.',
  "it's a well-known_fact, isn't it?",
  'naïve café «quoted» 日本語のテキスト、句読点。 😀 emoji!\n',
  'l1\r\nl2\r\r\nl3\n\rl4\n\n\nend',
  'trailing line without newline',
  '\r\n\r\n\r',
  Uint8Array.from([0x61, 0xff, 0x62, 0x20, 0xe2, 0x82, 0x41, 0x0a, 0xc3, 0xa9, 0x0d, 0xf0, 0x9f]),
  // overlong forms and a surrogate between word characters
  Uint8Array.from([0x78, 0xc1, 0x81, 0x79, 0x20, 0x61, 0xe0, 0x80, 0x80, 0x62, 0xf0, 0x8f, 0xbf, 0xbf, 0x63]),
  Uint8Array.from([0x71, 0xed, 0xa0, 0x80, 0x0a, 0x72, 0xc0, 0xaf, 0xf4, 0x90, 0x80, 0x80, 0x73, 0xe0]),
  'Ünïcödé\tWÖRDS with odd spaces and CAPS',
];

export function toBytes(input: string | Uint8Array): Uint8Array {
  return typeof input === 'string' ? encoder.encode(input) : input;
}
