export { HuffmanCoder } from './huffman-coder.js';
export { CodeTable, type CodeEntry } from './code-table.js';
export {
  buildHuffmanTree,
  buildCodeLengths,
  MAX_CODE_LENGTH,
  type HuffmanNode,
} from './huffman-tree.js';
