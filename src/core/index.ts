export { BitWriter, BitReader, type Bitstream } from './bit-stream.js';
export { checkTerminated } from './end-symbol.js';
export {
  RangeEncoder,
  checkModelPrecision,
  STATE_BITS,
  HALF,
  QUARTER,
  THREE_QUARTERS,
  MASK,
} from './range-encoder.js';
export { RangeDecoder } from './range-decoder.js';
export {
  RangeCoder,
  type RangeCoderOptions,
  ADAPTIVE_INCREMENT,
  ADAPTIVE_LIMIT,
} from './range-coder.js';
