import type { TextRange } from "./types.js";

/** UTF-8 length of one code point (lone surrogates encode as U+FFFD, 3 bytes). */
export function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

export function byteLength(text: string): number {
  let total = 0;
  for (const ch of text) total += utf8Length(ch.codePointAt(0) ?? 0);
  return total;
}

/**
 * Maps UTF-16 code-unit indices (what regexes, Intl.Segmenter and
 * web-tree-sitter report) to UTF-8 byte offsets of the same text.
 *
 * The low half of a surrogate pair maps to the byte offset of the pair, so
 * only indices on code-point boundaries are meaningful.
 */
export class Utf8OffsetMap {
  private readonly offsets: Uint32Array;

  constructor(text: string) {
    this.offsets = new Uint32Array(text.length + 1);
    let bytes = 0;
    let index = 0;
    for (const ch of text) {
      const codePoint = ch.codePointAt(0) ?? 0;
      this.offsets[index] = bytes;
      if (ch.length === 2) this.offsets[index + 1] = bytes;
      bytes += utf8Length(codePoint);
      index += ch.length;
    }
    this.offsets[index] = bytes;
  }

  public get byteLength(): number {
    return this.offsets[this.offsets.length - 1];
  }

  public toByte(codeUnitIndex: number): number {
    const clamped = Math.max(0, Math.min(this.offsets.length - 1, codeUnitIndex));
    return this.offsets[clamped];
  }
}

export interface LinePosition {
  /** 0-based line. */
  line: number;
  /** 0-based column in UTF-16 code units (the unit editor protocols use). */
  character: number;
}

/**
 * Convert a byte range back to line/column positions. Front ends use this to
 * report findings; the core itself only deals in bytes.
 */
export function byteRangeToPosition(text: string, range: TextRange): { start: LinePosition; end: LinePosition } {
  let line = 0;
  let character = 0;
  let bytes = 0;
  let start: LinePosition | null = null;
  let end: LinePosition | null = null;

  for (const ch of text) {
    if (start === null && bytes >= range.startByte) start = { line, character };
    if (end === null && bytes >= range.endByte) end = { line, character };
    if (start !== null && end !== null) break;

    bytes += utf8Length(ch.codePointAt(0) ?? 0);
    if (ch === "\n") {
      line += 1;
      character = 0;
    } else {
      character += ch.length;
    }
  }

  const tail = { line, character };
  return { start: start ?? tail, end: end ?? tail };
}
