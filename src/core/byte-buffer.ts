import { SizeMismatchError } from '../errors.js';

/**
 * A byte-range substitution: `removeLength` bytes at `position` are replaced
 * by `bytes`. Content after the range shifts when the lengths differ.
 */
export interface ByteReplacement {
  position: number;
  removeLength: number;
  bytes: Uint8Array;
}

/**
 * Growable byte buffer supporting in-place splices.
 *
 * Offsets obtained before an edit are only valid up to the edit position;
 * anything after it must be recomputed from the post-edit buffer.
 */
export class PatchableBuffer {
  private data: Uint8Array;
  private size: number;

  constructor(initial: Uint8Array) {
    this.data = new Uint8Array(initial);
    this.size = initial.length;
  }

  /**
   * Current content length in bytes.
   */
  get length(): number {
    return this.size;
  }

  /**
   * Live view over the current content. Invalidated by the next edit.
   */
  view(): Uint8Array {
    return this.data.subarray(0, this.size);
  }

  /**
   * Apply a replacement and return the length delta it caused.
   */
  replace(replacement: ByteReplacement): number {
    const { position, removeLength, bytes } = replacement;
    this.checkRange(position, removeLength);

    const delta = bytes.length - removeLength;
    const newSize = this.size + delta;
    this.ensureCapacity(newSize);

    // Shift the tail first, then drop the new bytes into the gap
    this.data.copyWithin(position + bytes.length, position + removeLength, this.size);
    this.data.set(bytes, position);
    this.size = newSize;

    return delta;
  }

  /**
   * Remove `length` bytes at `position`.
   */
  remove(position: number, length: number): void {
    this.replace({ position, removeLength: length, bytes: new Uint8Array(0) });
  }

  /**
   * Overwrite `length` bytes at `position` with `value`. Size is unchanged.
   */
  fill(position: number, length: number, value: number): void {
    this.checkRange(position, length);
    this.data.fill(value, position, position + length);
  }

  /**
   * Check whether `pattern` occurs at `position`.
   */
  matchesAt(pattern: Uint8Array, position: number): boolean {
    if (position < 0 || position + pattern.length > this.size) {
      return false;
    }
    for (let i = 0; i < pattern.length; i++) {
      if (this.data[position + i] !== pattern[i]) {
        return false;
      }
    }
    return true;
  }

  /**
   * Find the first occurrence of `pattern` lying entirely inside [from, to).
   * Returns -1 when absent.
   */
  indexOf(pattern: Uint8Array, from: number = 0, to: number = this.size): number {
    return indexOfBytes(this.view(), pattern, from, to);
  }

  readUint8(position: number): number {
    this.checkRange(position, 1);
    return this.data[position];
  }

  readUint16(position: number): number {
    this.checkRange(position, 2);
    return this.data[position] | (this.data[position + 1] << 8);
  }

  readUint32(position: number): number {
    this.checkRange(position, 4);
    return this.dataView().getUint32(position, true);
  }

  writeUint32(position: number, value: number): void {
    this.checkRange(position, 4);
    this.dataView().setUint32(position, value, true);
  }

  /**
   * Copy of the bytes in [start, end).
   */
  slice(start: number, end: number = this.size): Uint8Array {
    return this.data.slice(start, Math.min(end, this.size));
  }

  /**
   * Copy of the whole content.
   */
  toUint8Array(): Uint8Array {
    return this.data.slice(0, this.size);
  }

  private dataView(): DataView {
    return new DataView(this.data.buffer, this.data.byteOffset, this.size);
  }

  private checkRange(position: number, length: number): void {
    if (position < 0 || length < 0 || position + length > this.size) {
      throw new SizeMismatchError(
        `range at offset ${position}`,
        position + length,
        this.size
      );
    }
  }

  private ensureCapacity(required: number): void {
    if (required <= this.data.length) return;

    const grown = new Uint8Array(Math.max(required, this.data.length * 2));
    grown.set(this.data.subarray(0, this.size));
    this.data = grown;
  }
}

/**
 * Find the first occurrence of `pattern` lying entirely inside [from, to)
 * of `data`. Returns -1 when absent.
 */
export function indexOfBytes(
  data: Uint8Array,
  pattern: Uint8Array,
  from: number = 0,
  to: number = data.length
): number {
  const end = Math.min(to, data.length) - pattern.length;
  outer: for (let i = Math.max(0, from); i <= end; i++) {
    for (let j = 0; j < pattern.length; j++) {
      if (data[i + j] !== pattern[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * Apply non-overlapping replacements to a copy of `data`.
 *
 * Replacements are applied back to front so every position refers to the
 * original, unedited offsets.
 */
export function applyReplacements(
  data: Uint8Array,
  replacements: ByteReplacement[]
): Uint8Array {
  const ordered = [...replacements].sort((a, b) => a.position - b.position);

  for (let i = 1; i < ordered.length; i++) {
    const previous = ordered[i - 1];
    if (previous.position + previous.removeLength > ordered[i].position) {
      throw new Error(
        `Overlapping replacements at offsets ${previous.position} and ${ordered[i].position}`
      );
    }
  }

  const buffer = new PatchableBuffer(data);
  for (let i = ordered.length - 1; i >= 0; i--) {
    buffer.replace(ordered[i]);
  }
  return buffer.toUint8Array();
}

/**
 * Encode a little-endian u16 length prefix followed by `bytes`.
 */
export function lengthPrefixed(length: number, bytes: Uint8Array): Uint8Array {
  const result = new Uint8Array(2 + bytes.length);
  result[0] = length & 0xff;
  result[1] = (length >>> 8) & 0xff;
  result.set(bytes, 2);
  return result;
}
