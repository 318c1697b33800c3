export {
  type CodecHeader,
  type CodingMethod,
  MAGIC_BYTES,
  FORMAT_VERSION,
  FIXED_HEADER_SIZE,
  MAX_SYMBOL_COUNT,
  metadataSize,
  headerSize,
  createHeader,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
} from './header.js';
