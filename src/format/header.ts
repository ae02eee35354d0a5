/**
 * Record file header.
 *
 * The header is stored as a raw deflate stream (no zlib wrapper, no Adler-32
 * trailer). Once inflated it holds:
 * - A null-terminated version signature
 * - A fixed 28-byte scalar prefix
 * - The payload: lobby settings, AI config, replay info, map info and the
 *   per-player init data
 *
 * Only the scalar prefix is decoded. The payload stays an opaque blob that
 * the scanners patch in place.
 */

import * as pako from 'pako';
import { SizeMismatchError } from '../errors.js';

/**
 * Size of the scalar prefix following the signature.
 */
export const HEADER_SCALARS_SIZE = 28;

/**
 * Default deflate level used when packing.
 */
export const DEFAULT_COMPRESSION_LEVEL = 6;

/**
 * Decoded record file header.
 */
export interface Header {
  /** Version string including its null terminator */
  signature: Uint8Array;

  checker: number;
  versionMinor: number;
  versionMajor: number;
  gameVersion: number;
  build: number;
  timestamp: number;
  version: [number, number];
  internalVersion: [number, number];

  /** Everything after the scalar prefix */
  payload: Uint8Array;
}

/**
 * Inflate a raw deflate stream.
 */
export function inflateHeader(data: Uint8Array): Uint8Array {
  try {
    const inflated = pako.inflateRaw(data);
    // pako yields no result for a stream that ends early
    if (!inflated) {
      throw new Error('unexpected end of stream');
    }
    return inflated;
  } catch (error) {
    throw new SizeMismatchError(
      `compressed header (${String(error)})`,
      data.length,
      0
    );
  }
}

/**
 * Deflate bytes into a raw stream, the form the game stores its header in.
 */
export function deflateHeader(
  data: Uint8Array,
  level: number = DEFAULT_COMPRESSION_LEVEL
): Uint8Array {
  if (!isDeflateLevel(level)) {
    throw new Error(`Invalid compression level: ${level} (expected -1 to 9)`);
  }
  return pako.deflateRaw(data, { level });
}

type DeflateLevel = NonNullable<pako.DeflateFunctionOptions['level']>;

function isDeflateLevel(level: number): level is DeflateLevel {
  return Number.isInteger(level) && level >= -1 && level <= 9;
}

/**
 * Parse a header from bytes.
 *
 * @param data - Header bytes as stored in the container, or already inflated
 * @param compressed - Whether `data` is still a raw deflate stream
 */
export function parseHeader(data: Uint8Array, compressed: boolean): Header {
  const raw = compressed ? inflateHeader(data) : data;

  const nullPos = raw.indexOf(0);
  if (nullPos < 0) {
    throw new SizeMismatchError('header signature (no null terminator)', raw.length + 1, raw.length);
  }

  const offset = nullPos + 1;
  if (raw.length < offset + HEADER_SCALARS_SIZE) {
    throw new SizeMismatchError('header', offset + HEADER_SCALARS_SIZE, raw.length);
  }

  const view = new DataView(raw.buffer, raw.byteOffset + offset, HEADER_SCALARS_SIZE);

  return {
    signature: raw.slice(0, offset),
    checker: view.getFloat32(0, true),
    versionMinor: view.getUint16(4, true),
    versionMajor: view.getUint16(6, true),
    gameVersion: view.getFloat32(8, true),
    build: view.getUint32(12, true),
    timestamp: view.getInt32(16, true),
    version: [view.getUint16(20, true), view.getUint16(22, true)],
    internalVersion: [view.getUint16(24, true), view.getUint16(26, true)],
    payload: raw.slice(offset + HEADER_SCALARS_SIZE),
  };
}

/**
 * Serialize a header to its uncompressed byte form.
 */
export function serializeHeader(header: Header): Uint8Array {
  const scalarsStart = header.signature.length;
  const payloadStart = scalarsStart + HEADER_SCALARS_SIZE;
  const bytes = new Uint8Array(payloadStart + header.payload.length);
  const view = new DataView(bytes.buffer, scalarsStart, HEADER_SCALARS_SIZE);

  bytes.set(header.signature, 0);

  view.setFloat32(0, header.checker, true);
  view.setUint16(4, header.versionMinor, true);
  view.setUint16(6, header.versionMajor, true);
  view.setFloat32(8, header.gameVersion, true);
  view.setUint32(12, header.build, true);
  view.setInt32(16, header.timestamp, true);
  view.setUint16(20, header.version[0], true);
  view.setUint16(22, header.version[1], true);
  view.setUint16(24, header.internalVersion[0], true);
  view.setUint16(26, header.internalVersion[1], true);

  bytes.set(header.payload, payloadStart);

  return bytes;
}

/**
 * Serialize and deflate a header for storage in the container.
 */
export function packHeader(
  header: Header,
  level: number = DEFAULT_COMPRESSION_LEVEL
): Uint8Array {
  return deflateHeader(serializeHeader(header), level);
}
