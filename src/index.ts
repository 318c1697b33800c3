/**
 * entropy-coders
 *
 * Lossless entropy coding: canonical Huffman and a 32-bit range coder over
 * an MSB-first bitstream.
 *
 * @example
 * ```typescript
 * import { EntropyCodec } from 'entropy-coders';
 *
 * const codec = new EntropyCodec({ method: 'adaptive-range' });
 *
 * const data = codec.encodeText('abracadabra');
 * console.log(codec.decodeText(data)); // 'abracadabra'
 * ```
 */

// Facade
export {
  EntropyCodec,
  DEFAULT_CODEC_OPTIONS,
  type CodecOptions,
  type CompressionResult,
  type ProgressInfo,
} from './codec.js';

// Bit I/O and range coding (for advanced usage)
export {
  BitWriter,
  BitReader,
  type Bitstream,
  RangeEncoder,
  RangeDecoder,
  RangeCoder,
  type RangeCoderOptions,
  ADAPTIVE_INCREMENT,
  ADAPTIVE_LIMIT,
  checkTerminated,
} from './core/index.js';

// Huffman coding (for advanced usage)
export {
  HuffmanCoder,
  CodeTable,
  type CodeEntry,
  type HuffmanNode,
  buildHuffmanTree,
  buildCodeLengths,
  MAX_CODE_LENGTH,
} from './huffman/index.js';

// Frequency model
export {
  FrequencyModel,
  type SymbolRange,
  MAX_ALPHABET_SIZE,
  MAX_TOTAL_FREQUENCY,
} from './model/index.js';

// Symbol alphabets
export { SymbolAlphabet } from './alphabet/index.js';

// Wire format (for advanced usage)
export {
  type CodecHeader,
  type CodingMethod,
  MAGIC_BYTES,
  FORMAT_VERSION,
  FIXED_HEADER_SIZE,
  MAX_SYMBOL_COUNT,
  createHeader,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
} from './format/index.js';

// Errors
export {
  EntropyCodingError,
  EmptyAlphabetError,
  UnknownSymbolError,
  CorruptStreamError,
  OutOfDataError,
  PrecisionOverflowError,
  isEntropyCodingError,
  type EntropyErrorKind,
} from './errors.js';
