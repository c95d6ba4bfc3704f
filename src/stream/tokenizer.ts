import { ASCII_WORD_TABLE, isWordCodePoint } from '../text/char-classes.js';
import { PendingSequence, createDecoded, decodeAt } from '../text/utf8.js';
import { GrowableBuffer } from './byte-buffer.js';

/**
 * Receives one token as `buf[start, end)`. The bytes are only valid for the
 * duration of the call.
 */
export type TokenSink = (buf: Uint8Array, start: number, end: number) => void;

/**
 * - scanning: between tokens
 * - in-token: inside a token during a push
 * - carry-pending: a token (or a CR) is waiting for the next chunk
 */
export type TokenizerState = 'scanning' | 'in-token' | 'carry-pending';

export type TokenizerMode = 'line' | 'word';

/**
 * Chunk-boundary-aware tokenizer. Feeding a byte stream through `push` in any
 * chunking and then calling `finish` emits exactly the tokens a single push of
 * the whole stream would.
 */
export interface Tokenizer {
  readonly state: TokenizerState;
  push(chunk: Uint8Array, end: number, emit: TokenSink): void;
  finish(emit: TokenSink): void;
  reset(): void;
}

const LF = 0x0a;
const CR = 0x0d;

/**
 * Splits on LF, CR and CRLF. Empty lines are tokens; a final line without a
 * terminator is a token when it is non-empty.
 */
export class LineTokenizer implements Tokenizer {
  private readonly carry = new GrowableBuffer(256);
  private pendingCR = false;

  get state(): TokenizerState {
    return this.carry.length > 0 || this.pendingCR ? 'carry-pending' : 'scanning';
  }

  push(chunk: Uint8Array, end: number, emit: TokenSink): void {
    if (end === 0) return;

    let i = 0;
    if (this.pendingCR) {
      this.pendingCR = false;
      if (chunk[0] === LF) i = 1;
    }

    let lineStart = i;
    for (; i < end; i++) {
      const b = chunk[i];
      if (b !== LF && b !== CR) continue;

      this.endLine(chunk, lineStart, i, emit);
      if (b === CR) {
        if (i + 1 < end) {
          if (chunk[i + 1] === LF) i++;
        } else {
          this.pendingCR = true;
        }
      }
      lineStart = i + 1;
    }

    if (lineStart < end) {
      this.carry.append(chunk, lineStart, end);
    }
  }

  finish(emit: TokenSink): void {
    if (this.carry.length > 0) {
      emit(this.carry.bytes, 0, this.carry.length);
    }
    this.reset();
  }

  reset(): void {
    this.carry.clear();
    this.pendingCR = false;
  }

  private endLine(chunk: Uint8Array, start: number, end: number, emit: TokenSink): void {
    if (this.carry.length === 0) {
      emit(chunk, start, end);
      return;
    }
    this.carry.append(chunk, start, end);
    emit(this.carry.bytes, 0, this.carry.length);
    this.carry.clear();
  }
}

/**
 * Splits into maximal runs of word characters (letters, digits, `_`, `-`, `'`).
 * Everything else, U+FFFD from invalid bytes included, separates words.
 */
export class WordTokenizer implements Tokenizer {
  private readonly carry = new GrowableBuffer(64);
  private readonly pending = new PendingSequence();
  private readonly decoded = createDecoded();
  private inToken = false;

  get state(): TokenizerState {
    if (this.inToken || !this.pending.isEmpty) return 'carry-pending';
    return 'scanning';
  }

  push(chunk: Uint8Array, end: number, emit: TokenSink): void {
    let i = 0;
    let tokenStart = 0;

    if (!this.pending.isEmpty) {
      i = this.pending.fill(chunk, 0, end);
      if (!this.pending.isComplete && i === end) return;
      this.scanPending(emit);
      tokenStart = i;
    }

    const d = this.decoded;
    while (i < end) {
      const b = chunk[i];
      let isWord: boolean;
      let size = 1;
      if (b < 0x80) {
        isWord = ASCII_WORD_TABLE[b] === 1;
      } else {
        if (!decodeAt(chunk, i, end, false, d)) break;
        isWord = isWordCodePoint(d.codePoint);
        size = d.size;
      }

      if (isWord) {
        if (!this.inToken) {
          this.inToken = true;
          tokenStart = i;
        }
      } else if (this.inToken) {
        this.endToken(chunk, tokenStart, i, emit);
      }
      i += size;
    }

    if (this.inToken) {
      this.carry.append(chunk, tokenStart, i);
    }
    if (i < end) {
      this.pending.hold(chunk, i, end);
    }
  }

  finish(emit: TokenSink): void {
    if (!this.pending.isEmpty) {
      this.scanPending(emit);
    }
    if (this.inToken) {
      emit(this.carry.bytes, 0, this.carry.length);
    }
    this.reset();
  }

  reset(): void {
    this.carry.clear();
    this.pending.clear();
    this.inToken = false;
  }

  /** Classifies the held bytes, which are complete or can no longer be completed. */
  private scanPending(emit: TokenSink): void {
    const p = this.pending;
    const d = this.decoded;
    let j = 0;
    while (j < p.length) {
      decodeAt(p.bytes, j, p.length, true, d);
      if (isWordCodePoint(d.codePoint)) {
        this.inToken = true;
        this.carry.append(p.bytes, j, j + d.size);
      } else if (this.inToken) {
        emit(this.carry.bytes, 0, this.carry.length);
        this.carry.clear();
        this.inToken = false;
      }
      j += d.size;
    }
    p.clear();
  }

  private endToken(chunk: Uint8Array, start: number, end: number, emit: TokenSink): void {
    this.inToken = false;
    if (this.carry.length === 0) {
      emit(chunk, start, end);
      return;
    }
    this.carry.append(chunk, start, end);
    emit(this.carry.bytes, 0, this.carry.length);
    this.carry.clear();
  }
}

export function createTokenizer(mode: TokenizerMode): Tokenizer {
  return mode === 'line' ? new LineTokenizer() : new WordTokenizer();
}

/**
 * Tokenizes a whole buffer in one push and returns the tokens as strings.
 * Reference for the streaming path.
 */
export function tokenize(input: Uint8Array | string, mode: TokenizerMode): string[] {
  const bytes = typeof input === 'string' ? new TextEncoder().encode(input) : input;
  const decoder = new TextDecoder();
  const tokens: string[] = [];
  const emit: TokenSink = (buf, start, end) => {
    tokens.push(decoder.decode(buf.subarray(start, end)));
  };
  const tokenizer = createTokenizer(mode);
  tokenizer.push(bytes, bytes.length, emit);
  tokenizer.finish(emit);
  return tokens;
}
