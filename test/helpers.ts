/**
 * Deterministic pseudo-random source (mulberry32) so generated inputs are
 * the same on every run.
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw `count` symbols from a discrete distribution.
 */
export function sampleSymbols(
  rng: () => number,
  probabilities: number[],
  count: number
): number[] {
  const symbols: number[] = [];
  for (let i = 0; i < count; i++) {
    const r = rng();
    let acc = 0;
    let symbol = probabilities.length - 1;
    for (let s = 0; s < probabilities.length; s++) {
      acc += probabilities[s];
      if (r < acc) {
        symbol = s;
        break;
      }
    }
    symbols.push(symbol);
  }
  return symbols;
}

export function uniformSymbols(
  rng: () => number,
  alphabetSize: number,
  count: number
): number[] {
  return Array.from({ length: count }, () => Math.floor(rng() * alphabetSize));
}
