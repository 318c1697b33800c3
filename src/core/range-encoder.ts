import type { BitWriter } from './bit-stream.js';
import {
  EmptyAlphabetError,
  PrecisionOverflowError,
  UnknownSymbolError,
} from '../errors.js';
import {
  MAX_TOTAL_FREQUENCY,
  type FrequencyModel,
} from '../model/frequency-model.js';

/**
 * Constants for range coding.
 * Using 32 bits total for state precision.
 */
export const STATE_BITS = 32;
export const HALF = 0x80000000; // 2^31
export const QUARTER = 0x40000000; // 2^30
export const THREE_QUARTERS = 0xc0000000; // 3 * 2^30
export const MASK = 0xffffffff;

/**
 * Reject models the 32-bit interval cannot represent exactly.
 */
export function checkModelPrecision(model: FrequencyModel): void {
  const total = model.totalCount();
  if (total === 0) {
    throw new EmptyAlphabetError();
  }
  if (total > MAX_TOTAL_FREQUENCY) {
    throw new PrecisionOverflowError(
      `Frequency total ${total} exceeds ${MAX_TOTAL_FREQUENCY}; rescale the model first`
    );
  }
}

/**
 * Range encoder using 32-bit precision with renormalization.
 *
 * When the interval straddles the midpoint without settling its top bit
 * (E3), the decision is deferred: a pending bit is counted and emitted,
 * inverted, after the next settled bit.
 */
export class RangeEncoder {
  private low: number = 0;
  private high: number = MASK; // 0xFFFFFFFF
  private pendingBits: number = 0;
  private output: BitWriter;

  constructor(output: BitWriter) {
    this.output = output;
  }

  /**
   * Narrow the interval to the symbol's share of the model.
   */
  encode(symbol: number, model: FrequencyModel): void {
    checkModelPrecision(model);
    if (model.frequencyOf(symbol) === 0) {
      throw new UnknownSymbolError(symbol);
    }
    const { low: symLow, high: symHigh, total } = model.symbolRange(symbol);

    // Compute new interval using BigInt for intermediate calculations
    const range = BigInt(this.high - this.low + 1);
    const newLow = this.low + Number((range * BigInt(symLow)) / BigInt(total));
    const newHigh =
      this.low + Number((range * BigInt(symHigh)) / BigInt(total)) - 1;

    this.low = newLow >>> 0;
    this.high = newHigh >>> 0;

    // Renormalization
    while (true) {
      if (this.high < HALF) {
        // MSB of both is 0
        this.writeBitPlusPending(0);
      } else if (this.low >= HALF) {
        // MSB of both is 1
        this.writeBitPlusPending(1);
        this.low = (this.low - HALF) >>> 0;
        this.high = (this.high - HALF) >>> 0;
      } else if (this.low >= QUARTER && this.high < THREE_QUARTERS) {
        // Second MSB differs, center the range
        this.pendingBits++;
        this.low = (this.low - QUARTER) >>> 0;
        this.high = (this.high - QUARTER) >>> 0;
      } else {
        break;
      }

      // Double the range
      this.low = (this.low << 1) >>> 0;
      this.high = ((this.high << 1) | 1) >>> 0;
    }
  }

  private writeBitPlusPending(bit: number): void {
    this.output.writeBit(bit);
    while (this.pendingBits > 0) {
      this.output.writeBit(bit ^ 1);
      this.pendingBits--;
    }
  }

  /**
   * Settle the final interval.
   *
   * Emits QUARTER (`01`) or HALF (`10`) in current coordinates, whichever
   * lies inside [low, high], followed by the 30 zero bits that complete the
   * decoder's 32-bit window. The decoder therefore never reads past the
   * emitted bits. The writer is left unflushed.
   */
  finish(): void {
    this.pendingBits++;
    if (this.low < QUARTER) {
      this.writeBitPlusPending(0);
    } else {
      this.writeBitPlusPending(1);
    }
    this.output.writeBits(0, STATE_BITS - 2);
  }
}
