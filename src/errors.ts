/**
 * Error taxonomy shared by every coder.
 *
 * All failures are deterministic: the same input fails the same way every
 * time, so nothing here is retried or recovered internally.
 */

export type EntropyErrorKind =
  | 'EmptyAlphabet'
  | 'UnknownSymbol'
  | 'CorruptStream'
  | 'OutOfData'
  | 'PrecisionOverflow';

export class EntropyCodingError extends Error {
  readonly kind: EntropyErrorKind;

  constructor(kind: EntropyErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EntropyCodingError';
    this.kind = kind;
  }
}

/**
 * No symbol has a positive frequency, so there is nothing to code.
 */
export class EmptyAlphabetError extends EntropyCodingError {
  constructor(message = 'Alphabet has no symbol with a positive frequency') {
    super('EmptyAlphabet', message);
    this.name = 'EmptyAlphabetError';
  }
}

/**
 * A symbol has no entry in the active code table or model.
 */
export class UnknownSymbolError extends EntropyCodingError {
  readonly symbol: unknown;

  constructor(symbol: unknown, message = `Symbol not in table: ${String(symbol)}`) {
    super('UnknownSymbol', message);
    this.name = 'UnknownSymbolError';
    this.symbol = symbol;
  }
}

/**
 * Malformed or truncated input.
 */
export class CorruptStreamError extends EntropyCodingError {
  constructor(message: string, options?: ErrorOptions) {
    super('CorruptStream', message, options);
    this.name = 'CorruptStreamError';
  }
}

export class OutOfDataError extends EntropyCodingError {
  constructor(message = 'Bit reader exhausted') {
    super('OutOfData', message);
    this.name = 'OutOfDataError';
  }
}

/**
 * Frequency total too large for the range coder's 32-bit interval.
 */
export class PrecisionOverflowError extends EntropyCodingError {
  constructor(message: string) {
    super('PrecisionOverflow', message);
    this.name = 'PrecisionOverflowError';
  }
}

export function isEntropyCodingError(
  error: unknown,
  kind?: EntropyErrorKind
): error is EntropyCodingError {
  return (
    error instanceof EntropyCodingError &&
    (kind === undefined || error.kind === kind)
  );
}
