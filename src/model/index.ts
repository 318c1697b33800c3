export {
  FrequencyModel,
  type SymbolRange,
  MAX_ALPHABET_SIZE,
  MAX_TOTAL_FREQUENCY,
  inferAlphabetSize,
  isSymbol,
} from './frequency-model.js';
