/**
 * Record file container (the outer envelope).
 *
 * Format:
 * [Header length: 4 bytes] (compressed header size + 8)
 * [Checksum: 4 bytes] (opaque, copied through)
 * [Header: header length - 8 bytes] (raw deflate stream)
 * [Log version: 4 bytes]
 * [Meta: 28 bytes] (opaque, copied through)
 * [Operations: variable] (rest of file)
 *
 * All integers are little-endian.
 */

import { SizeMismatchError } from '../errors.js';
import {
  type Header,
  parseHeader,
  packHeader,
  DEFAULT_COMPRESSION_LEVEL,
} from './header.js';

/**
 * Bytes counted by the header length field besides the header itself.
 */
export const HEADER_LENGTH_OVERHEAD = 8;

/**
 * Size of the meta block: five u32 fields and two booleans padded to 4 bytes.
 */
export const META_SIZE = 5 * 4 + 2 * (1 + 3);

/**
 * Parsed record file.
 */
export interface Container {
  /** Compressed header length + 8. Recomputed on every write */
  headerLength: number;

  /** Opaque, never interpreted */
  checksum: number;

  header: Header;

  logVersion: number;

  /** Opaque meta block, copied through byte for byte */
  meta: Uint8Array;

  /** Raw operations stream */
  operations: Uint8Array;
}

/**
 * Decoded view of the meta block.
 */
export interface Meta {
  checksumInterval: number;
  multiplayer: boolean;
  recOwner: number;
  revealMap: boolean;
  useSequenceNumbers: number;
  numberOfChapters: number;
  aokOrDe: number;
}

/**
 * Sequential little-endian reader that fails on short input.
 */
class EnvelopeReader {
  private offset = 0;
  private view: DataView;

  constructor(private data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  uint32(what: string): number {
    this.require(what, 4);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  bytes(what: string, length: number): Uint8Array {
    this.require(what, length);
    const value = this.data.slice(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  rest(): Uint8Array {
    const value = this.data.slice(this.offset);
    this.offset = this.data.length;
    return value;
  }

  private require(what: string, length: number): void {
    const remaining = this.data.length - this.offset;
    if (length < 0 || remaining < length) {
      throw new SizeMismatchError(what, length, remaining);
    }
  }
}

/**
 * Parse a record file.
 */
export function parseContainer(data: Uint8Array): Container {
  const reader = new EnvelopeReader(data);

  const headerLength = reader.uint32('header length');
  const checksum = reader.uint32('checksum');
  const header = parseHeader(
    reader.bytes('header', headerLength - HEADER_LENGTH_OVERHEAD),
    true
  );
  const logVersion = reader.uint32('log version');
  const meta = reader.bytes('meta block', META_SIZE);
  const operations = reader.rest();

  return { headerLength, checksum, header, logVersion, meta, operations };
}

/**
 * Serialize a record file.
 *
 * The header is deflated again and `container.headerLength` is updated to
 * match the new compressed size.
 */
export function writeContainer(
  container: Container,
  compressionLevel: number = DEFAULT_COMPRESSION_LEVEL
): Uint8Array {
  const headerBytes = packHeader(container.header, compressionLevel);
  container.headerLength = headerBytes.length + HEADER_LENGTH_OVERHEAD;

  const total =
    HEADER_LENGTH_OVERHEAD +
    headerBytes.length +
    4 +
    container.meta.length +
    container.operations.length;
  const result = new Uint8Array(total);
  const view = new DataView(result.buffer);
  let offset = 0;

  view.setUint32(offset, container.headerLength, true);
  offset += 4;
  view.setUint32(offset, container.checksum, true);
  offset += 4;
  result.set(headerBytes, offset);
  offset += headerBytes.length;
  view.setUint32(offset, container.logVersion, true);
  offset += 4;
  result.set(container.meta, offset);
  offset += container.meta.length;
  result.set(container.operations, offset);

  return result;
}

/**
 * Decode the meta block. The container keeps the raw bytes; this is a
 * read-only view.
 */
export function readMeta(meta: Uint8Array): Meta {
  if (meta.length < META_SIZE) {
    throw new SizeMismatchError('meta block', META_SIZE, meta.length);
  }

  const view = new DataView(meta.buffer, meta.byteOffset, META_SIZE);

  return {
    checksumInterval: view.getUint32(0, true),
    multiplayer: view.getUint8(4) !== 0,
    recOwner: view.getUint32(8, true),
    revealMap: view.getUint8(12) !== 0,
    useSequenceNumbers: view.getUint32(16, true),
    numberOfChapters: view.getUint32(20, true),
    aokOrDe: view.getUint32(24, true),
  };
}
