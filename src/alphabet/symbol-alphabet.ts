import { UnknownSymbolError } from '../errors.js';
import { MAX_ALPHABET_SIZE } from '../model/frequency-model.js';

/**
 * Bijection between arbitrary symbol values and dense integer indices.
 *
 * The coders work on indices in [0, size); an alphabet lets callers code
 * strings, tokens or any other value usable as a Map key.
 *
 * ```typescript
 * const alphabet = SymbolAlphabet.fromSequence('AABACD');
 * alphabet.encode('AABACD'); // [0, 0, 1, 0, 2, 3]
 * ```
 */
export class SymbolAlphabet<T> {
  private readonly symbols: T[];
  private readonly indices: Map<T, number>;

  private constructor(symbols: T[]) {
    if (symbols.length > MAX_ALPHABET_SIZE) {
      throw new RangeError(
        `Alphabet of ${symbols.length} symbols exceeds ${MAX_ALPHABET_SIZE}`
      );
    }
    this.symbols = symbols;
    this.indices = new Map(symbols.map((symbol, index) => [symbol, index]));
  }

  /**
   * Distinct values of a sequence, indexed in order of first occurrence.
   */
  static fromSequence<T>(sequence: Iterable<T>): SymbolAlphabet<T> {
    const seen = new Set<T>();
    for (const symbol of sequence) {
      seen.add(symbol);
    }
    return new SymbolAlphabet([...seen]);
  }

  /**
   * Explicit alphabet; index i is symbols[i].
   */
  static of<T>(symbols: Iterable<T>): SymbolAlphabet<T> {
    const list = [...symbols];
    if (new Set(list).size !== list.length) {
      throw new RangeError('Alphabet contains duplicate symbols');
    }
    return new SymbolAlphabet(list);
  }

  get size(): number {
    return this.symbols.length;
  }

  has(symbol: T): boolean {
    return this.indices.has(symbol);
  }

  indexOf(symbol: T): number {
    const index = this.indices.get(symbol);
    if (index === undefined) {
      throw new UnknownSymbolError(symbol, `Symbol not in alphabet: ${String(symbol)}`);
    }
    return index;
  }

  symbolAt(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this.symbols.length) {
      throw new UnknownSymbolError(index, `No symbol at index ${index}`);
    }
    return this.symbols[index];
  }

  encode(sequence: Iterable<T>): number[] {
    const indices: number[] = [];
    for (const symbol of sequence) {
      indices.push(this.indexOf(symbol));
    }
    return indices;
  }

  decode(indices: ArrayLike<number>): T[] {
    return Array.from(indices, (index) => this.symbolAt(index));
  }

  toArray(): T[] {
    return [...this.symbols];
  }
}
