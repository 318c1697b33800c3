/**
 * Encoded buffer header.
 *
 * Format (multi-byte integers little-endian):
 * [Magic: 4 bytes "ENTC"]
 * [Version: 1 byte]
 * [Method: 1 byte] (0 Huffman, 1 static range, 2 adaptive range)
 * [Alphabet size: 4 bytes]
 * [Symbol count: 4 bytes]
 * [Metadata: variable]
 *   Huffman: 1 byte code length per symbol (0 = absent from the code)
 *   Static range: 4 byte frequency per symbol
 *   Adaptive range: nothing
 * [Payload: MSB-first bitstream, zero-padded final byte]
 *
 * Any change to this layout or to the payload bit order is a
 * compatibility break and needs a new FORMAT_VERSION.
 */

import { CorruptStreamError } from '../errors.js';
import { MAX_ALPHABET_SIZE } from '../model/frequency-model.js';

/**
 * Magic bytes identifying an encoded buffer.
 * "ENTC" in ASCII.
 */
export const MAGIC_BYTES = new Uint8Array([0x45, 0x4e, 0x54, 0x43]);

/**
 * Current format version.
 */
export const FORMAT_VERSION = 1;

/**
 * Size of the fixed fields before the metadata.
 */
export const FIXED_HEADER_SIZE = 14;

/**
 * Largest symbol count a header may declare. Decoding is linear in the
 * declared count, and a one-symbol model codes any count in 32 bits, so the
 * payload alone cannot bound it.
 */
export const MAX_SYMBOL_COUNT = 1 << 24;

export type CodingMethod = 'huffman' | 'range' | 'adaptive-range';

const METHOD_IDS: Record<CodingMethod, number> = {
  huffman: 0,
  range: 1,
  'adaptive-range': 2,
};

const METHODS: CodingMethod[] = ['huffman', 'range', 'adaptive-range'];

export interface CodecHeader {
  /** Magic bytes: "ENTC" */
  magic: Uint8Array;

  /** Format version */
  version: number;

  /** Coder that produced the payload */
  method: CodingMethod;

  /** Number of symbols in the alphabet */
  alphabetSize: number;

  /** Number of symbols to decode */
  symbolCount: number;

  /**
   * Per-symbol metadata: code lengths (Huffman), frequencies (static
   * range), or empty (adaptive range).
   */
  metadata: number[];
}

/**
 * Bytes of metadata a header carries for the given method.
 */
export function metadataSize(method: CodingMethod, alphabetSize: number): number {
  switch (method) {
    case 'huffman':
      return alphabetSize;
    case 'range':
      return alphabetSize * 4;
    case 'adaptive-range':
      return 0;
  }
}

export function headerSize(header: CodecHeader): number {
  return FIXED_HEADER_SIZE + metadataSize(header.method, header.alphabetSize);
}

export function createHeader(
  method: CodingMethod,
  alphabetSize: number,
  symbolCount: number,
  metadata: number[] = []
): CodecHeader {
  return {
    magic: new Uint8Array(MAGIC_BYTES),
    version: FORMAT_VERSION,
    method,
    alphabetSize,
    symbolCount,
    metadata,
  };
}

/**
 * Serialize a header to bytes.
 */
export function serializeHeader(header: CodecHeader): Uint8Array {
  const { method, alphabetSize, symbolCount, metadata } = header;

  if (!Number.isInteger(alphabetSize) || alphabetSize < 1 || alphabetSize > MAX_ALPHABET_SIZE) {
    throw new RangeError(`Alphabet size out of range: ${alphabetSize}`);
  }
  if (!Number.isInteger(symbolCount) || symbolCount < 0 || symbolCount > MAX_SYMBOL_COUNT) {
    throw new RangeError(
      `Symbol count must be an integer in [0, ${MAX_SYMBOL_COUNT}], got ${symbolCount}`
    );
  }
  const expectedEntries = method === 'adaptive-range' ? 0 : alphabetSize;
  if (metadata.length !== expectedEntries) {
    throw new RangeError(
      `Expected ${expectedEntries} metadata entries for ${method}, got ${metadata.length}`
    );
  }

  const buffer = new ArrayBuffer(headerSize(header));
  const view = new DataView(buffer);
  const bytes = new Uint8Array(buffer);

  // Magic (4 bytes)
  bytes.set(header.magic, 0);

  // Version (1 byte)
  view.setUint8(4, header.version);

  // Method (1 byte)
  view.setUint8(5, METHOD_IDS[method]);

  // Alphabet size (4 bytes, little-endian)
  view.setUint32(6, alphabetSize, true);

  // Symbol count (4 bytes, little-endian)
  view.setUint32(10, symbolCount, true);

  let offset = FIXED_HEADER_SIZE;
  if (method === 'huffman') {
    for (const length of metadata) {
      if (!Number.isInteger(length) || length < 0 || length > 0xff) {
        throw new RangeError(`Code length out of range: ${length}`);
      }
      view.setUint8(offset, length);
      offset += 1;
    }
  } else if (method === 'range') {
    for (const frequency of metadata) {
      if (!Number.isInteger(frequency) || frequency < 0 || frequency > 0xffffffff) {
        throw new RangeError(`Frequency out of range: ${frequency}`);
      }
      view.setUint32(offset, frequency, true);
      offset += 4;
    }
  }

  return bytes;
}

/**
 * Deserialize a header from the start of `data`.
 *
 * Only the layout is checked here; whether the metadata forms a valid code
 * or model is up to the caller.
 */
export function deserializeHeader(data: Uint8Array): CodecHeader {
  if (data.length < FIXED_HEADER_SIZE) {
    throw new CorruptStreamError(
      `Invalid header: expected at least ${FIXED_HEADER_SIZE} bytes, got ${data.length}`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, data.length);

  // Validate magic bytes
  const magic = data.slice(0, 4);
  if (
    magic[0] !== MAGIC_BYTES[0] ||
    magic[1] !== MAGIC_BYTES[1] ||
    magic[2] !== MAGIC_BYTES[2] ||
    magic[3] !== MAGIC_BYTES[3]
  ) {
    throw new CorruptStreamError('Invalid file format: magic bytes mismatch');
  }

  const version = view.getUint8(4);
  if (version > FORMAT_VERSION) {
    throw new CorruptStreamError(
      `Unsupported format version: ${version} (max supported: ${FORMAT_VERSION})`
    );
  }

  const methodId = view.getUint8(5);
  const method: CodingMethod | undefined = METHODS[methodId];
  if (method === undefined) {
    throw new CorruptStreamError(`Unknown coding method: ${methodId}`);
  }

  const alphabetSize = view.getUint32(6, true);
  if (alphabetSize < 1 || alphabetSize > MAX_ALPHABET_SIZE) {
    throw new CorruptStreamError(`Invalid alphabet size: ${alphabetSize}`);
  }

  const symbolCount = view.getUint32(10, true);
  if (symbolCount > MAX_SYMBOL_COUNT) {
    throw new CorruptStreamError(
      `Symbol count ${symbolCount} exceeds ${MAX_SYMBOL_COUNT}`
    );
  }

  const size = FIXED_HEADER_SIZE + metadataSize(method, alphabetSize);
  if (data.length < size) {
    throw new CorruptStreamError(
      `Invalid header: expected ${size} bytes, got ${data.length}`
    );
  }

  const metadata: number[] = [];
  if (method === 'huffman') {
    for (let i = 0; i < alphabetSize; i++) {
      metadata.push(view.getUint8(FIXED_HEADER_SIZE + i));
    }
  } else if (method === 'range') {
    for (let i = 0; i < alphabetSize; i++) {
      metadata.push(view.getUint32(FIXED_HEADER_SIZE + i * 4, true));
    }
  }

  return { magic, version, method, alphabetSize, symbolCount, metadata };
}

/**
 * Combine header and payload into a single buffer.
 */
export function combineHeaderAndPayload(
  header: Uint8Array,
  payload: Uint8Array
): Uint8Array {
  const result = new Uint8Array(header.length + payload.length);
  result.set(header, 0);
  result.set(payload, header.length);
  return result;
}

/**
 * Split data into header and payload.
 */
export function splitHeaderAndPayload(
  data: Uint8Array
): { header: CodecHeader; payload: Uint8Array } {
  const header = deserializeHeader(data);
  const payload = data.slice(headerSize(header));
  return { header, payload };
}
