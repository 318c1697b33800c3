/**
 * Symbol frequency model.
 *
 * Holds exact integer counts for a fixed alphabet and derives the
 * probability and cumulative-frequency views both coders need.
 * Cumulative sums live in a Fenwick tree, so an adaptive update and a
 * lookup each cost O(log alphabetSize).
 */

import {
  EmptyAlphabetError,
  PrecisionOverflowError,
  UnknownSymbolError,
} from '../errors.js';

/**
 * Largest supported alphabet.
 */
export const MAX_ALPHABET_SIZE = 1 << 16;

/**
 * Largest frequency total the range coder accepts.
 * Keeps every positive-frequency symbol at least 64 units wide in an
 * interval that never shrinks below 2^30.
 */
export const MAX_TOTAL_FREQUENCY = 1 << 24;

/**
 * Cumulative range of one symbol: [low, high) out of total.
 */
export interface SymbolRange {
  low: number;
  high: number;
  total: number;
}

export function isSymbol(value: number, alphabetSize: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < alphabetSize;
}

/**
 * Smallest alphabet that contains every symbol of the sequence.
 */
export function inferAlphabetSize(symbols: ArrayLike<number>): number {
  let max = -1;
  for (let i = 0; i < symbols.length; i++) {
    const symbol = symbols[i];
    if (!isSymbol(symbol, MAX_ALPHABET_SIZE)) {
      throw new UnknownSymbolError(
        symbol,
        `Symbol ${symbol} is not an index below ${MAX_ALPHABET_SIZE}`
      );
    }
    if (symbol > max) max = symbol;
  }
  return Math.max(1, max + 1);
}

function validateAlphabetSize(size: number): void {
  if (!Number.isInteger(size) || size < 1 || size > MAX_ALPHABET_SIZE) {
    throw new RangeError(
      `Alphabet size must be an integer in [1, ${MAX_ALPHABET_SIZE}], got ${size}`
    );
  }
}

export class FrequencyModel {
  private readonly counts: Float64Array;

  /** Fenwick tree over counts, 1-based */
  private readonly tree: Float64Array;

  /** Largest power of two not above the alphabet size */
  private readonly topStep: number;

  private total: number = 0;

  private constructor(counts: Float64Array) {
    this.counts = counts;
    this.tree = new Float64Array(counts.length + 1);
    this.topStep = 2 ** Math.floor(Math.log2(counts.length));
    this.rebuildTree();
  }

  /**
   * Count every symbol of a sequence.
   *
   * @param alphabetSize - defaults to the largest symbol + 1
   */
  static fromSymbols(
    symbols: ArrayLike<number>,
    alphabetSize?: number
  ): FrequencyModel {
    if (symbols.length === 0) {
      throw new EmptyAlphabetError('Cannot build a model from an empty sequence');
    }
    const size = alphabetSize ?? inferAlphabetSize(symbols);
    validateAlphabetSize(size);

    const counts = new Float64Array(size);
    for (let i = 0; i < symbols.length; i++) {
      const symbol = symbols[i];
      if (!isSymbol(symbol, size)) {
        throw new UnknownSymbolError(
          symbol,
          `Symbol ${symbol} outside alphabet of size ${size}`
        );
      }
      counts[symbol]++;
    }
    return new FrequencyModel(counts);
  }

  /**
   * Accept externally supplied counts, indexed by symbol.
   */
  static fromTable(table: ArrayLike<number>): FrequencyModel {
    validateAlphabetSize(table.length);

    const counts = new Float64Array(table.length);
    let total = 0;
    for (let i = 0; i < table.length; i++) {
      const count = table[i];
      if (!Number.isSafeInteger(count) || count < 0) {
        throw new RangeError(
          `Frequency of symbol ${i} must be a non-negative integer, got ${count}`
        );
      }
      counts[i] = count;
      total += count;
    }

    if (total === 0) {
      throw new EmptyAlphabetError();
    }
    if (!Number.isSafeInteger(total)) {
      throw new PrecisionOverflowError(
        `Frequency total exceeds ${Number.MAX_SAFE_INTEGER}`
      );
    }
    return new FrequencyModel(counts);
  }

  /**
   * Every symbol at count 1. Starting state for adaptive coding.
   */
  static uniform(alphabetSize: number): FrequencyModel {
    validateAlphabetSize(alphabetSize);
    return new FrequencyModel(new Float64Array(alphabetSize).fill(1));
  }

  get alphabetSize(): number {
    return this.counts.length;
  }

  totalCount(): number {
    return this.total;
  }

  /**
   * Count of a symbol; 0 for symbols outside the alphabet.
   */
  frequencyOf(symbol: number): number {
    return isSymbol(symbol, this.counts.length) ? this.counts[symbol] : 0;
  }

  probabilityOf(symbol: number): number {
    return this.total === 0 ? 0 : this.frequencyOf(symbol) / this.total;
  }

  /**
   * Sum of the counts of every symbol below `symbol`.
   * Accepts `alphabetSize`, which yields the total.
   */
  cumulativeBefore(symbol: number): number {
    if (!isSymbol(symbol, this.counts.length + 1)) {
      throw new RangeError(`Symbol out of range: ${symbol}`);
    }
    return this.prefixSum(symbol);
  }

  /**
   * Symbol whose cumulative range contains `value`.
   * Zero-count symbols own an empty range and are never returned.
   */
  symbolAtCumulative(value: number): number {
    if (!Number.isInteger(value) || value < 0 || value >= this.total) {
      throw new RangeError(
        `Cumulative value ${value} outside [0, ${this.total})`
      );
    }

    // Descend the tree for the largest position whose prefix sum is <= value
    const n = this.counts.length;
    let position = 0;
    let remaining = value;
    for (let step = this.topStep; step > 0; step >>= 1) {
      const next = position + step;
      if (next <= n && this.tree[next] <= remaining) {
        position = next;
        remaining -= this.tree[next];
      }
    }

    return position;
  }

  symbolRange(symbol: number): SymbolRange {
    if (!isSymbol(symbol, this.counts.length)) {
      throw new RangeError(`Symbol out of range: ${symbol}`);
    }
    const low = this.prefixSum(symbol);
    return {
      low,
      high: low + this.counts[symbol],
      total: this.total,
    };
  }

  /**
   * Adaptive update.
   */
  increment(symbol: number, amount: number = 1): void {
    if (!isSymbol(symbol, this.counts.length)) {
      throw new UnknownSymbolError(symbol);
    }
    this.counts[symbol] += amount;
    this.total += amount;
    for (let i = symbol + 1; i < this.tree.length; i += i & -i) {
      this.tree[i] += amount;
    }
  }

  /**
   * Halve every count until the total fits `maxTotal`.
   * Positive counts stay at least 1, so no symbol drops out of the model.
   */
  rescale(maxTotal: number): this {
    const positives = this.positiveSymbols().length;
    if (maxTotal < positives) {
      throw new PrecisionOverflowError(
        `Cannot fit ${positives} symbols into a total of ${maxTotal}`
      );
    }

    if (this.total <= maxTotal) return this;

    while (this.total > maxTotal) {
      let total = 0;
      for (let i = 0; i < this.counts.length; i++) {
        const count = this.counts[i];
        if (count > 0) {
          this.counts[i] = Math.max(1, Math.floor(count / 2));
          total += this.counts[i];
        }
      }
      this.total = total;
    }
    this.rebuildTree();
    return this;
  }

  /**
   * Information content of the counted data in bits:
   * sum over symbols of count * log2(total / count).
   */
  entropyBits(): number {
    let bits = 0;
    for (let i = 0; i < this.counts.length; i++) {
      const count = this.counts[i];
      if (count > 0) bits += count * Math.log2(this.total / count);
    }
    return bits;
  }

  positiveSymbols(): number[] {
    const symbols: number[] = [];
    for (let i = 0; i < this.counts.length; i++) {
      if (this.counts[i] > 0) symbols.push(i);
    }
    return symbols;
  }

  toArray(): number[] {
    return Array.from(this.counts);
  }

  clone(): FrequencyModel {
    return new FrequencyModel(new Float64Array(this.counts));
  }

  /**
   * Sum of counts[0..end).
   */
  private prefixSum(end: number): number {
    let sum = 0;
    for (let i = end; i > 0; i -= i & -i) {
      sum += this.tree[i];
    }
    return sum;
  }

  /**
   * Linear-time construction from counts; also resets the total.
   */
  private rebuildTree(): void {
    const tree = this.tree;
    let total = 0;
    for (let i = 1; i < tree.length; i++) {
      tree[i] = this.counts[i - 1];
      total += this.counts[i - 1];
    }
    for (let i = 1; i < tree.length; i++) {
      const parent = i + (i & -i);
      if (parent < tree.length) tree[parent] += tree[i];
    }
    this.total = total;
  }
}
