import type { BitReader } from './bit-stream.js';
import { CorruptStreamError } from '../errors.js';
import type { FrequencyModel } from '../model/frequency-model.js';
import {
  HALF,
  MASK,
  QUARTER,
  STATE_BITS,
  THREE_QUARTERS,
  checkModelPrecision,
} from './range-encoder.js';

/**
 * Range decoder using 32-bit precision with renormalization.
 * Every step mirrors RangeEncoder exactly.
 */
export class RangeDecoder {
  private low: number = 0;
  private high: number = MASK;
  private code: number = 0;
  private input: BitReader;

  constructor(input: BitReader) {
    this.input = input;
    // Initialize code with first 32 bits
    this.code = this.input.readBits(STATE_BITS);
  }

  /**
   * Decode one symbol against the model.
   */
  decode(model: FrequencyModel): number {
    checkModelPrecision(model);
    const total = model.totalCount();

    if (this.code < this.low || this.code > this.high) {
      throw new CorruptStreamError('Range decoder left its interval');
    }

    const range = BigInt(this.high - this.low + 1);

    // Find the symbol
    // offset = code - low
    // scaled = floor(((offset + 1) * total - 1) / range)
    const offset = BigInt(this.code - this.low);
    const scaled = Number(((offset + 1n) * BigInt(total) - 1n) / range);

    const symbol = model.symbolAtCumulative(scaled);

    // Update interval (same as encoder)
    const { low: symLow, high: symHigh } = model.symbolRange(symbol);
    const newLow = this.low + Number((range * BigInt(symLow)) / BigInt(total));
    const newHigh =
      this.low + Number((range * BigInt(symHigh)) / BigInt(total)) - 1;

    this.low = newLow >>> 0;
    this.high = newHigh >>> 0;

    // Renormalization (must match encoder exactly)
    while (true) {
      if (this.high < HALF) {
        // MSB of both is 0 - do nothing special
      } else if (this.low >= HALF) {
        // MSB of both is 1
        this.code = (this.code - HALF) >>> 0;
        this.low = (this.low - HALF) >>> 0;
        this.high = (this.high - HALF) >>> 0;
      } else if (this.low >= QUARTER && this.high < THREE_QUARTERS) {
        // Second MSB differs
        this.code = (this.code - QUARTER) >>> 0;
        this.low = (this.low - QUARTER) >>> 0;
        this.high = (this.high - QUARTER) >>> 0;
      } else {
        break;
      }

      // Double the range and read next bit
      this.low = (this.low << 1) >>> 0;
      this.high = ((this.high << 1) | 1) >>> 0;
      this.code = ((this.code << 1) | this.input.readBit()) >>> 0;
    }

    return symbol;
  }
}
