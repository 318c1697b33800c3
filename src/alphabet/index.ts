export { SymbolAlphabet } from './symbol-alphabet.js';
