import { BitReader, BitWriter, type Bitstream } from './bit-stream.js';
import { RangeEncoder } from './range-encoder.js';
import { RangeDecoder } from './range-decoder.js';
import { checkTerminated } from './end-symbol.js';
import {
  CorruptStreamError,
  OutOfDataError,
  UnknownSymbolError,
} from '../errors.js';
import {
  MAX_TOTAL_FREQUENCY,
  type FrequencyModel,
} from '../model/frequency-model.js';

/**
 * Count added to a symbol after it is coded in adaptive mode.
 */
export const ADAPTIVE_INCREMENT = 32;

/**
 * Adaptive models are halved once their total passes this.
 */
export const ADAPTIVE_LIMIT = 1 << 16;

export interface RangeCoderOptions {
  /** Update the model after every symbol (default: false) */
  adaptive?: boolean;

  /** Adaptive increment (default: ADAPTIVE_INCREMENT) */
  increment?: number;

  /** Adaptive rescale threshold (default: ADAPTIVE_LIMIT) */
  limit?: number;
}

/**
 * Sequence-level range coder, static or adaptive.
 *
 * In adaptive mode the model passed to encode() and decode() is mutated
 * after every symbol. Encoder and decoder must each start from an equal
 * model (usually `FrequencyModel.uniform(alphabetSize)`) and must not share
 * one instance:
 *
 * ```typescript
 * const coder = new RangeCoder({ adaptive: true });
 * const { bytes } = coder.encode(symbols, FrequencyModel.uniform(256));
 * const decoded = coder.decode(bytes, FrequencyModel.uniform(256), symbols.length);
 * ```
 */
export class RangeCoder {
  readonly adaptive: boolean;
  private readonly increment: number;
  private readonly limit: number;

  constructor(options: RangeCoderOptions = {}) {
    this.adaptive = options.adaptive ?? false;
    this.increment = options.increment ?? ADAPTIVE_INCREMENT;
    this.limit = options.limit ?? ADAPTIVE_LIMIT;

    if (!Number.isInteger(this.increment) || this.increment < 1) {
      throw new RangeError(`Adaptive increment must be a positive integer`);
    }
    if (
      !Number.isInteger(this.limit) ||
      this.limit < 1 ||
      this.limit > MAX_TOTAL_FREQUENCY
    ) {
      throw new RangeError(
        `Adaptive limit must be an integer in [1, ${MAX_TOTAL_FREQUENCY}]`
      );
    }
  }

  /**
   * Encode a sequence. An empty sequence yields an empty payload.
   */
  encode(symbols: ArrayLike<number>, model: FrequencyModel): Bitstream {
    if (symbols.length === 0) {
      return { bytes: new Uint8Array(0), bitLength: 0 };
    }

    const writer = new BitWriter();
    const encoder = new RangeEncoder(writer);
    for (let i = 0; i < symbols.length; i++) {
      encoder.encode(symbols[i], model);
      this.update(model, symbols[i]);
    }
    encoder.finish();

    const bitLength = writer.bitCount;
    return { bytes: writer.flush(), bitLength };
  }

  /**
   * Decode exactly `symbolCount` symbols.
   *
   * @throws CorruptStreamError if the input runs out first
   */
  decode(
    input: Uint8Array | BitReader,
    model: FrequencyModel,
    symbolCount: number
  ): number[] {
    const symbols: number[] = [];
    if (symbolCount === 0) {
      return symbols;
    }

    const reader = input instanceof BitReader ? input : new BitReader(input);
    try {
      const decoder = new RangeDecoder(reader);
      while (symbols.length < symbolCount) {
        const symbol = decoder.decode(model);
        symbols.push(symbol);
        this.update(model, symbol);
      }
    } catch (error) {
      if (error instanceof OutOfDataError) {
        throw new CorruptStreamError(
          `Range-coded stream ended after ${symbols.length} of ${symbolCount} symbols`,
          { cause: error }
        );
      }
      throw error;
    }

    return symbols;
  }

  /**
   * Encode a sequence whose last symbol, and only that one, is `endSymbol`.
   * The decoder needs no symbol count; see decodeUntil().
   */
  encodeUntil(
    symbols: ArrayLike<number>,
    model: FrequencyModel,
    endSymbol: number
  ): Bitstream {
    checkTerminated(symbols, endSymbol);
    return this.encode(symbols, model);
  }

  /**
   * Decode up to and including the first `endSymbol`.
   *
   * @throws UnknownSymbolError if the model gives `endSymbol` no frequency
   * @throws CorruptStreamError if the input runs out first
   */
  decodeUntil(
    input: Uint8Array | BitReader,
    model: FrequencyModel,
    endSymbol: number
  ): number[] {
    if (model.frequencyOf(endSymbol) === 0) {
      throw new UnknownSymbolError(endSymbol);
    }

    const symbols: number[] = [];
    const reader = input instanceof BitReader ? input : new BitReader(input);
    try {
      const decoder = new RangeDecoder(reader);
      let symbol: number;
      do {
        symbol = decoder.decode(model);
        symbols.push(symbol);
        this.update(model, symbol);
      } while (symbol !== endSymbol);
    } catch (error) {
      if (error instanceof OutOfDataError) {
        throw new CorruptStreamError(
          `Range-coded stream ended after ${symbols.length} symbols without end symbol ${endSymbol}`,
          { cause: error }
        );
      }
      throw error;
    }

    return symbols;
  }

  private update(model: FrequencyModel, symbol: number): void {
    if (!this.adaptive) return;
    model.increment(symbol, this.increment);
    if (model.totalCount() > this.limit) {
      model.rescale(this.limit);
    }
  }
}
