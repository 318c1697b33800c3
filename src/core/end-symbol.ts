/**
 * Sequences terminated by an end symbol carry no length: the decoder stops
 * at the first occurrence, so the end symbol must appear exactly once, last.
 */
export function checkTerminated(
  symbols: ArrayLike<number>,
  endSymbol: number
): void {
  const last = symbols.length - 1;
  if (last < 0 || symbols[last] !== endSymbol) {
    throw new RangeError(`Sequence must end with end symbol ${endSymbol}`);
  }
  for (let i = 0; i < last; i++) {
    if (symbols[i] === endSymbol) {
      throw new RangeError(
        `End symbol ${endSymbol} at position ${i} before the end of the sequence`
      );
    }
  }
}
