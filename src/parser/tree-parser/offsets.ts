/**
 * Maps tree-sitter string indices back to byte offsets in the file.
 *
 * The JS bindings parse a JavaScript string and report UTF-16 code-unit
 * indices. Files are read as bytes: valid UTF-8 is decoded as UTF-8, anything
 * else as Latin-1 so every byte maps to exactly one code unit.
 */

import { isUtf8 } from 'buffer';
import type { SourcePosition } from './types.js';

export type SourceEncoding = 'utf-8' | 'latin1';

export interface DecodedSource {
  readonly text: string;
  readonly encoding: SourceEncoding;
}

export function decodeSource(bytes: Buffer): DecodedSource {
  if (isUtf8(bytes)) {
    return { text: bytes.toString('utf-8'), encoding: 'utf-8' };
  }
  return { text: bytes.toString('latin1'), encoding: 'latin1' };
}

export class OffsetTranslator {
  /** byteAt[i] = byte offset of code unit i; absent when the mapping is identity */
  private readonly byteAt: Uint32Array | null;
  private readonly lineStarts: number[];
  private readonly byteLength: number;

  constructor(bytes: Buffer, source: DecodedSource) {
    this.byteLength = bytes.length;
    this.lineStarts = computeLineStarts(bytes);
    this.byteAt = source.text.length === bytes.length ? null : buildByteMap(source.text);
  }

  /** Byte offset of a code-unit index, clamped to the file. */
  toByteOffset(index: number): number {
    if (index <= 0) return 0;
    if (this.byteAt === null) return Math.min(index, this.byteLength);
    if (index >= this.byteAt.length) return this.byteLength;
    return this.byteAt[index];
  }

  /** Row and byte column of a byte offset. */
  toPosition(offset: number): SourcePosition {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return { row: lo, column: offset - this.lineStarts[lo] };
  }
}

function computeLineStarts(bytes: Buffer): number[] {
  const starts = [0];
  let index = bytes.indexOf(0x0a);
  while (index !== -1) {
    starts.push(index + 1);
    index = bytes.indexOf(0x0a, index + 1);
  }
  return starts;
}

function buildByteMap(text: string): Uint32Array {
  const map = new Uint32Array(text.length + 1);
  let offset = 0;
  for (let i = 0; i < text.length; i++) {
    map[i] = offset;
    const unit = text.charCodeAt(i);
    if (unit < 0x80) {
      offset += 1;
    } else if (unit < 0x800) {
      offset += 2;
    } else if (unit >= 0xd800 && unit <= 0xdbff && i + 1 < text.length) {
      // Surrogate pair: four bytes, attributed to the high surrogate.
      map[i + 1] = offset + 4;
      offset += 4;
      i++;
    } else {
      offset += 3;
    }
  }
  map[text.length] = offset;
  return map;
}
