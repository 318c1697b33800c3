/**
 * Canonical Huffman code table.
 *
 * Codes are a pure function of the code lengths: symbols sorted by
 * (length, symbol) take consecutive values, shifting left whenever the
 * length grows. Only the lengths ever need to be transmitted.
 */

import type { BitReader, BitWriter } from '../core/bit-stream.js';
import {
  CorruptStreamError,
  EmptyAlphabetError,
  UnknownSymbolError,
} from '../errors.js';
import { MAX_ALPHABET_SIZE, isSymbol } from '../model/frequency-model.js';
import { MAX_CODE_LENGTH } from './huffman-tree.js';

/**
 * One assigned code. `code` holds the low `length` bits, MSB first.
 */
export interface CodeEntry {
  symbol: number;
  length: number;
  code: number;
}

export class CodeTable {
  /** Code length per symbol, 0 for symbols without a code */
  readonly lengths: Uint8Array;

  /** Longest code in the table */
  readonly maxLength: number;

  private readonly codes: Uint32Array;

  /** Number of codes of each length (index 0 unused) */
  private readonly lengthCounts: number[];

  /** Symbols in canonical (length, symbol) order */
  private readonly canonicalSymbols: number[];

  private constructor(
    lengths: Uint8Array,
    codes: Uint32Array,
    lengthCounts: number[],
    canonicalSymbols: number[]
  ) {
    this.lengths = lengths;
    this.codes = codes;
    this.lengthCounts = lengthCounts;
    this.canonicalSymbols = canonicalSymbols;
    this.maxLength = lengthCounts.length - 1;
  }

  /**
   * Rebuild a table from code lengths alone.
   *
   * @throws CorruptStreamError for lengths above 32 or an over-subscribed set
   * @throws EmptyAlphabetError when every length is 0
   */
  static fromLengths(lengths: ArrayLike<number>): CodeTable {
    if (lengths.length < 1 || lengths.length > MAX_ALPHABET_SIZE) {
      throw new CorruptStreamError(
        `Code length table size out of range: ${lengths.length}`
      );
    }

    const table = new Uint8Array(lengths.length);
    let maxLength = 0;
    for (let symbol = 0; symbol < lengths.length; symbol++) {
      const length = lengths[symbol];
      if (!Number.isInteger(length) || length < 0 || length > MAX_CODE_LENGTH) {
        throw new CorruptStreamError(
          `Invalid code length ${length} for symbol ${symbol}`
        );
      }
      table[symbol] = length;
      maxLength = Math.max(maxLength, length);
    }
    if (maxLength === 0) {
      throw new EmptyAlphabetError('Code length table assigns no codes');
    }

    const lengthCounts: number[] = new Array(maxLength + 1).fill(0);
    for (const length of table) {
      if (length > 0) lengthCounts[length]++;
    }

    // Kraft: sum of 2^(maxLength - length) must not exceed 2^maxLength
    let kraft = 0;
    for (let length = 1; length <= maxLength; length++) {
      kraft += lengthCounts[length] * 2 ** (maxLength - length);
    }
    if (kraft > 2 ** maxLength) {
      throw new CorruptStreamError('Code lengths are over-subscribed');
    }

    const canonicalSymbols: number[] = [];
    for (let symbol = 0; symbol < table.length; symbol++) {
      if (table[symbol] > 0) canonicalSymbols.push(symbol);
    }
    // Array.prototype.sort is stable, so equal lengths keep symbol order
    canonicalSymbols.sort((a, b) => table[a] - table[b]);

    const codes = new Uint32Array(table.length);
    let code = 0;
    let prevLength = table[canonicalSymbols[0]];
    for (let i = 0; i < canonicalSymbols.length; i++) {
      const symbol = canonicalSymbols[i];
      const length = table[symbol];
      if (i > 0) {
        code = (code + 1) * 2 ** (length - prevLength);
      }
      codes[symbol] = code;
      prevLength = length;
    }

    return new CodeTable(table, codes, lengthCounts, canonicalSymbols);
  }

  get alphabetSize(): number {
    return this.lengths.length;
  }

  has(symbol: number): boolean {
    return isSymbol(symbol, this.lengths.length) && this.lengths[symbol] > 0;
  }

  get(symbol: number): CodeEntry | undefined {
    if (!this.has(symbol)) return undefined;
    return { symbol, length: this.lengths[symbol], code: this.codes[symbol] };
  }

  /**
   * All codes in canonical order.
   */
  entries(): CodeEntry[] {
    return this.canonicalSymbols.map((symbol) => ({
      symbol,
      length: this.lengths[symbol],
      code: this.codes[symbol],
    }));
  }

  /**
   * Sum of 2^-length over every code. 1 for a complete code.
   */
  kraftSum(): number {
    let sum = 0;
    for (let length = 1; length <= this.maxLength; length++) {
      sum += this.lengthCounts[length] / 2 ** length;
    }
    return sum;
  }

  isComplete(): boolean {
    let kraft = 0;
    for (let length = 1; length <= this.maxLength; length++) {
      kraft += this.lengthCounts[length] * 2 ** (this.maxLength - length);
    }
    return kraft === 2 ** this.maxLength;
  }

  /**
   * Bits needed for the code stream of a sequence (no padding).
   */
  encodedBitLength(symbols: ArrayLike<number>): number {
    let total = 0;
    for (let i = 0; i < symbols.length; i++) {
      const symbol = symbols[i];
      if (!this.has(symbol)) throw new UnknownSymbolError(symbol);
      total += this.lengths[symbol];
    }
    return total;
  }

  writeSymbol(writer: BitWriter, symbol: number): void {
    if (!this.has(symbol)) {
      throw new UnknownSymbolError(symbol);
    }
    writer.writeBits(this.codes[symbol], this.lengths[symbol]);
  }

  /**
   * Decode one symbol, one bit at a time, against the first code and code
   * count of each length.
   *
   * @throws CorruptStreamError when the bits match no code
   */
  readSymbol(reader: BitReader): number {
    let code = 0;
    let first = 0;
    let index = 0;

    for (let length = 1; length <= this.maxLength; length++) {
      code += reader.readBit();
      const count = this.lengthCounts[length];
      if (code - first < count) {
        return this.canonicalSymbols[index + code - first];
      }
      index += count;
      first = (first + count) * 2;
      code *= 2;
    }

    throw new CorruptStreamError(
      `No code matches a ${this.maxLength}-bit prefix`
    );
  }
}
