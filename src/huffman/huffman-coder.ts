import { BitReader, BitWriter, type Bitstream } from '../core/bit-stream.js';
import { checkTerminated } from '../core/end-symbol.js';
import {
  CorruptStreamError,
  OutOfDataError,
  UnknownSymbolError,
} from '../errors.js';
import type { FrequencyModel } from '../model/frequency-model.js';
import { CodeTable } from './code-table.js';
import { buildCodeLengths } from './huffman-tree.js';

/**
 * Canonical Huffman coder.
 *
 * Usage:
 * ```typescript
 * const coder = new HuffmanCoder();
 * const table = coder.build(FrequencyModel.fromSymbols(symbols));
 * const { bytes } = coder.encode(symbols, table);
 *
 * // The decoder only needs table.lengths
 * const decoded = coder.decode(bytes, CodeTable.fromLengths(table.lengths), symbols.length);
 * ```
 */
export class HuffmanCoder {
  /**
   * Build a canonical code table from a frequency model.
   */
  build(model: FrequencyModel): CodeTable {
    return CodeTable.fromLengths(buildCodeLengths(model.toArray()));
  }

  encode(symbols: ArrayLike<number>, table: CodeTable): Bitstream {
    const writer = new BitWriter();
    this.encodeTo(writer, symbols, table);
    const bitLength = writer.bitCount;
    return { bytes: writer.flush(), bitLength };
  }

  /**
   * Append the codes of `symbols` to an existing writer.
   */
  encodeTo(writer: BitWriter, symbols: ArrayLike<number>, table: CodeTable): void {
    for (let i = 0; i < symbols.length; i++) {
      table.writeSymbol(writer, symbols[i]);
    }
  }

  /**
   * Decode exactly `symbolCount` symbols.
   *
   * @throws CorruptStreamError if the bits run out first or match no code
   */
  decode(
    input: Uint8Array | BitReader,
    table: CodeTable,
    symbolCount: number
  ): number[] {
    const reader = input instanceof BitReader ? input : new BitReader(input);
    const symbols: number[] = [];

    try {
      while (symbols.length < symbolCount) {
        symbols.push(table.readSymbol(reader));
      }
    } catch (error) {
      if (error instanceof OutOfDataError) {
        throw new CorruptStreamError(
          `Huffman stream ended after ${symbols.length} of ${symbolCount} symbols`,
          { cause: error }
        );
      }
      throw error;
    }

    return symbols;
  }

  /**
   * Encode a sequence whose last symbol, and only that one, is `endSymbol`.
   */
  encodeUntil(
    symbols: ArrayLike<number>,
    table: CodeTable,
    endSymbol: number
  ): Bitstream {
    checkTerminated(symbols, endSymbol);
    return this.encode(symbols, table);
  }

  /**
   * Decode up to and including the first `endSymbol`.
   */
  decodeUntil(
    input: Uint8Array | BitReader,
    table: CodeTable,
    endSymbol: number
  ): number[] {
    if (!table.has(endSymbol)) {
      throw new UnknownSymbolError(endSymbol);
    }

    const reader = input instanceof BitReader ? input : new BitReader(input);
    const symbols: number[] = [];
    try {
      let symbol: number;
      do {
        symbol = table.readSymbol(reader);
        symbols.push(symbol);
      } while (symbol !== endSymbol);
    } catch (error) {
      if (error instanceof OutOfDataError) {
        throw new CorruptStreamError(
          `Huffman stream ended after ${symbols.length} symbols without end symbol ${endSymbol}`,
          { cause: error }
        );
      }
      throw error;
    }

    return symbols;
  }
}
