import { BitReader, type Bitstream } from './core/bit-stream.js';
import { RangeCoder } from './core/range-coder.js';
import { QUARTER } from './core/range-encoder.js';
import { CorruptStreamError } from './errors.js';
import { CodeTable } from './huffman/code-table.js';
import { HuffmanCoder } from './huffman/huffman-coder.js';
import {
  FrequencyModel,
  MAX_ALPHABET_SIZE,
  MAX_TOTAL_FREQUENCY,
  inferAlphabetSize,
} from './model/frequency-model.js';
import {
  type CodecHeader,
  type CodingMethod,
  MAX_SYMBOL_COUNT,
  createHeader,
  deserializeHeader,
  serializeHeader,
  splitHeaderAndPayload,
  combineHeaderAndPayload,
} from './format/header.js';

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'modeling' | 'encoding' | 'decoding';
  current: number;
  total: number;
}

/**
 * Options for EntropyCodec.
 */
export interface CodecOptions {
  /** Coding method (default: 'huffman') */
  method: CodingMethod;

  /** Alphabet size (default: largest symbol + 1) */
  alphabetSize?: number;

  /**
   * Fixed frequency table, indexed by symbol, used instead of counting the
   * input. Huffman and static range coding only.
   */
  frequencies?: ArrayLike<number>;

  /** Progress callback */
  onProgress?: (progress: ProgressInfo) => void;
}

/**
 * Default codec configuration.
 */
export const DEFAULT_CODEC_OPTIONS: CodecOptions = {
  method: 'huffman',
};

/**
 * Text is coded as UTF-8 bytes.
 */
const TEXT_ALPHABET_SIZE = 256;

/**
 * Most symbols a static range payload of `payloadBits` can hold.
 *
 * Renormalization keeps the interval wider than QUARTER, so each symbol
 * scales it by at most fmax / total + 1 / QUARTER, and the decoder reads one
 * bit per halving of it. A model with a single
 * positive symbol costs nothing per symbol and has no bound.
 */
function maxRangeSymbols(model: FrequencyModel, payloadBits: number): number {
  let largest = 0;
  for (const count of model.toArray()) {
    largest = Math.max(largest, count);
  }
  const ratio = largest / model.totalCount() + 1 / QUARTER;
  if (ratio >= 1) return Infinity;
  return Math.floor((payloadBits + 2) / -Math.log2(ratio)) + 1;
}

/**
 * Result of an encode operation.
 */
export interface CompressionResult {
  /** Encoded data (header + payload) */
  data: Uint8Array;

  /** Number of symbols encoded */
  symbolCount: number;

  /** Alphabet size written to the header */
  alphabetSize: number;

  /** Header size in bytes */
  headerSize: number;

  /** Payload size in bits, excluding padding */
  payloadBits: number;

  /** Total encoded size in bytes */
  compressedSize: number;

  /** Payload bits per symbol (0 for empty input) */
  bitsPerSymbol: number;
}

/**
 * Entropy codec: frames a Huffman or range-coded payload with the header
 * needed to decode it.
 *
 * Usage:
 * ```typescript
 * const codec = new EntropyCodec({ method: 'range' });
 *
 * const data = codec.encode([0, 0, 1, 0, 2, 3]);
 * const symbols = codec.decode(data); // [0, 0, 1, 0, 2, 3]
 * ```
 *
 * decode() reads the method from the header, so any codec instance can
 * decode any encoded buffer.
 */
export class EntropyCodec {
  private options: CodecOptions;
  private huffman: HuffmanCoder = new HuffmanCoder();

  constructor(options: Partial<CodecOptions> = {}) {
    this.options = { ...DEFAULT_CODEC_OPTIONS, ...options };

    const { method, alphabetSize, frequencies } = this.options;
    if (
      alphabetSize !== undefined &&
      (!Number.isInteger(alphabetSize) ||
        alphabetSize < 1 ||
        alphabetSize > MAX_ALPHABET_SIZE)
    ) {
      throw new RangeError(
        `Alphabet size must be an integer in [1, ${MAX_ALPHABET_SIZE}], got ${alphabetSize}`
      );
    }
    if (frequencies !== undefined) {
      if (method === 'adaptive-range') {
        throw new RangeError('Adaptive range coding does not take a frequency table');
      }
      if (alphabetSize !== undefined && alphabetSize !== frequencies.length) {
        throw new RangeError(
          `Frequency table has ${frequencies.length} entries for an alphabet of ${alphabetSize}`
        );
      }
    }
  }

  get method(): CodingMethod {
    return this.options.method;
  }

  /**
   * Encode symbols to bytes.
   */
  encode(symbols: ArrayLike<number>): Uint8Array {
    return this.compress(symbols).data;
  }

  /**
   * Encode symbols and report sizes.
   */
  compress(symbols: ArrayLike<number>): CompressionResult {
    const alphabetSize =
      this.options.alphabetSize ??
      this.options.frequencies?.length ??
      inferAlphabetSize(symbols);
    return this.encodeSymbols(symbols, alphabetSize);
  }

  /**
   * Decode bytes produced by encode() or compress().
   */
  decode(data: Uint8Array): number[] {
    const { header, payload } = splitHeaderAndPayload(data);
    const { symbolCount } = header;

    if (symbolCount === 0) {
      if (payload.length > 0) {
        throw new CorruptStreamError(
          `Unexpected ${payload.length} payload bytes for an empty sequence`
        );
      }
      return [];
    }

    this.reportProgress('decoding', 0, symbolCount);

    const reader = new BitReader(payload);
    let symbols: number[];
    switch (header.method) {
      case 'huffman': {
        const table = CodeTable.fromLengths(this.checkMetadata(header));
        // every code is at least one bit
        this.checkSymbolCount(symbolCount, reader.size);
        symbols = this.huffman.decode(reader, table, symbolCount);
        break;
      }
      case 'range': {
        const model = FrequencyModel.fromTable(this.checkMetadata(header));
        if (model.totalCount() > MAX_TOTAL_FREQUENCY) {
          throw new CorruptStreamError(
            `Header frequency total ${model.totalCount()} exceeds ${MAX_TOTAL_FREQUENCY}`
          );
        }
        this.checkSymbolCount(symbolCount, maxRangeSymbols(model, reader.size));
        symbols = new RangeCoder().decode(reader, model, symbolCount);
        break;
      }
      case 'adaptive-range': {
        const model = FrequencyModel.uniform(header.alphabetSize);
        symbols = new RangeCoder({ adaptive: true }).decode(
          reader,
          model,
          symbolCount
        );
        break;
      }
    }

    this.checkPadding(reader);
    this.reportProgress('decoding', symbolCount, symbolCount);

    return symbols;
  }

  /**
   * Encode text as its UTF-8 bytes.
   */
  encodeText(text: string): Uint8Array {
    const { alphabetSize, frequencies } = this.options;
    if (
      (alphabetSize !== undefined && alphabetSize !== TEXT_ALPHABET_SIZE) ||
      (frequencies !== undefined && frequencies.length !== TEXT_ALPHABET_SIZE)
    ) {
      throw new RangeError(
        `Text is coded over ${TEXT_ALPHABET_SIZE} byte values`
      );
    }
    return this.encodeSymbols(new TextEncoder().encode(text), TEXT_ALPHABET_SIZE)
      .data;
  }

  /**
   * Decode bytes produced by encodeText().
   */
  decodeText(data: Uint8Array): string {
    const { alphabetSize } = deserializeHeader(data);
    if (alphabetSize !== TEXT_ALPHABET_SIZE) {
      throw new CorruptStreamError(
        `Text is coded over ${TEXT_ALPHABET_SIZE} byte values, header declares ${alphabetSize}`
      );
    }
    const symbols = this.decode(data);
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(
        Uint8Array.from(symbols)
      );
    } catch (error) {
      throw new CorruptStreamError('Decoded bytes are not valid UTF-8', {
        cause: error,
      });
    }
  }

  private encodeSymbols(
    symbols: ArrayLike<number>,
    alphabetSize: number
  ): CompressionResult {
    const { method } = this.options;
    const symbolCount = symbols.length;
    if (symbolCount > MAX_SYMBOL_COUNT) {
      throw new RangeError(
        `Cannot encode ${symbolCount} symbols; the limit is ${MAX_SYMBOL_COUNT}`
      );
    }

    let metadata: number[];
    let bits: Bitstream;

    if (symbolCount === 0) {
      metadata = method === 'adaptive-range' ? [] : new Array(alphabetSize).fill(0);
      bits = { bytes: new Uint8Array(0), bitLength: 0 };
    } else {
      this.reportProgress('modeling', 0, 1);

      switch (method) {
        case 'huffman': {
          const table = this.huffman.build(this.buildModel(symbols, alphabetSize));
          metadata = Array.from(table.lengths);
          this.reportProgress('modeling', 1, 1);
          this.reportProgress('encoding', 0, symbolCount);
          bits = this.huffman.encode(symbols, table);
          break;
        }
        case 'range': {
          const model = this.buildModel(symbols, alphabetSize);
          if (model.totalCount() > MAX_TOTAL_FREQUENCY) {
            console.warn(
              `Frequency total ${model.totalCount()} exceeds ${MAX_TOTAL_FREQUENCY}; ` +
                'rescaling the model, compression may suffer.'
            );
            model.rescale(MAX_TOTAL_FREQUENCY);
          }
          metadata = model.toArray();
          this.reportProgress('modeling', 1, 1);
          this.reportProgress('encoding', 0, symbolCount);
          bits = new RangeCoder().encode(symbols, model);
          break;
        }
        case 'adaptive-range': {
          const model = FrequencyModel.uniform(alphabetSize);
          metadata = [];
          this.reportProgress('modeling', 1, 1);
          this.reportProgress('encoding', 0, symbolCount);
          bits = new RangeCoder({ adaptive: true }).encode(symbols, model);
          break;
        }
      }

      this.reportProgress('encoding', symbolCount, symbolCount);
    }

    const headerBytes = serializeHeader(
      createHeader(method, alphabetSize, symbolCount, metadata)
    );
    const data = combineHeaderAndPayload(headerBytes, bits.bytes);

    return {
      data,
      symbolCount,
      alphabetSize,
      headerSize: headerBytes.length,
      payloadBits: bits.bitLength,
      compressedSize: data.length,
      bitsPerSymbol: symbolCount === 0 ? 0 : bits.bitLength / symbolCount,
    };
  }

  private buildModel(
    symbols: ArrayLike<number>,
    alphabetSize: number
  ): FrequencyModel {
    const { frequencies } = this.options;
    return frequencies !== undefined
      ? FrequencyModel.fromTable(frequencies)
      : FrequencyModel.fromSymbols(symbols, alphabetSize);
  }

  /**
   * A non-empty sequence needs at least one coded symbol in the header.
   */
  private checkMetadata(header: CodecHeader): number[] {
    if (header.metadata.every((value) => value === 0)) {
      throw new CorruptStreamError(
        `Header assigns no symbols but declares ${header.symbolCount}`
      );
    }
    return header.metadata;
  }

  private checkSymbolCount(symbolCount: number, max: number): void {
    if (symbolCount > max) {
      throw new CorruptStreamError(
        `Header declares ${symbolCount} symbols but the payload holds at most ${max}`
      );
    }
  }

  /**
   * Only the zero padding of the final byte may follow the payload.
   */
  private checkPadding(reader: BitReader): void {
    const remaining = reader.remainingBits;
    if (remaining >= 8) {
      throw new CorruptStreamError(
        `${Math.floor(remaining / 8)} trailing bytes after the payload`
      );
    }
    if (reader.readBits(remaining) !== 0) {
      throw new CorruptStreamError('Non-zero padding after the payload');
    }
  }

  /**
   * Report progress to the callback if provided.
   */
  private reportProgress(
    stage: ProgressInfo['stage'],
    current: number,
    total: number
  ): void {
    this.options.onProgress?.({ stage, current, total });
  }
}
