/**
 * Huffman code-length construction.
 *
 * The tree lives in an index-addressed arena: leaves occupy the first
 * slots in ascending symbol order, internal nodes are appended as they are
 * created. A parent is always created after its children, so walking the
 * arena from the end assigns every depth in a single pass.
 *
 * Ties on weight go to the lower arena index. That means leaves beat
 * internal nodes of equal weight, lower symbols beat higher ones, and
 * older internal nodes beat newer ones.
 */

import { EmptyAlphabetError } from '../errors.js';

/**
 * Longest code the coders can emit (one BitWriter.writeBits call).
 */
export const MAX_CODE_LENGTH = 32;

/**
 * Arena entry. `left`/`right` are arena indices, -1 on leaves;
 * `symbol` is -1 on internal nodes.
 */
export interface HuffmanNode {
  weight: number;
  left: number;
  right: number;
  symbol: number;
}

/**
 * Binary min-heap of arena indices ordered by (weight, index).
 */
class NodeHeap {
  private readonly items: number[] = [];
  private readonly nodes: HuffmanNode[];

  constructor(nodes: HuffmanNode[]) {
    this.nodes = nodes;
  }

  get size(): number {
    return this.items.length;
  }

  push(index: number): void {
    const items = this.items;
    items.push(index);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >>> 1;
      if (!this.less(items[i], items[parent])) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  pop(): number {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (last === undefined) {
      throw new Error('pop() on an empty heap');
    }
    if (items.length > 0) {
      items[0] = last;
      let i = 0;
      while (true) {
        const left = 2 * i + 1;
        const right = left + 1;
        let smallest = i;
        if (left < items.length && this.less(items[left], items[smallest])) {
          smallest = left;
        }
        if (right < items.length && this.less(items[right], items[smallest])) {
          smallest = right;
        }
        if (smallest === i) break;
        [items[i], items[smallest]] = [items[smallest], items[i]];
        i = smallest;
      }
    }
    return top;
  }

  private less(a: number, b: number): boolean {
    const wa = this.nodes[a].weight;
    const wb = this.nodes[b].weight;
    return wa < wb || (wa === wb && a < b);
  }
}

/**
 * Build the arena for the positive-weight symbols.
 * Returns the nodes; the root is the last entry.
 */
export function buildHuffmanTree(weights: ArrayLike<number>): HuffmanNode[] {
  const nodes: HuffmanNode[] = [];
  for (let symbol = 0; symbol < weights.length; symbol++) {
    if (weights[symbol] > 0) {
      nodes.push({ weight: weights[symbol], left: -1, right: -1, symbol });
    }
  }
  if (nodes.length === 0) {
    throw new EmptyAlphabetError();
  }

  const heap = new NodeHeap(nodes);
  for (let i = 0; i < nodes.length; i++) {
    heap.push(i);
  }

  while (heap.size > 1) {
    const left = heap.pop();
    const right = heap.pop();
    nodes.push({
      weight: nodes[left].weight + nodes[right].weight,
      left,
      right,
      symbol: -1,
    });
    heap.push(nodes.length - 1);
  }

  return nodes;
}

/**
 * Depth of every leaf, indexed by symbol. Zero-weight symbols get 0.
 * A lone symbol gets depth 1 rather than an unreadable zero-length code.
 */
function leafDepths(weights: ArrayLike<number>): {
  lengths: Uint32Array;
  maxLength: number;
} {
  const nodes = buildHuffmanTree(weights);
  const lengths = new Uint32Array(weights.length);

  if (nodes.length === 1) {
    lengths[nodes[0].symbol] = 1;
    return { lengths, maxLength: 1 };
  }

  const depth = new Uint32Array(nodes.length);
  let maxLength = 0;
  for (let i = nodes.length - 1; i >= 0; i--) {
    const node = nodes[i];
    if (node.symbol >= 0) {
      lengths[node.symbol] = depth[i];
      maxLength = Math.max(maxLength, depth[i]);
    } else {
      depth[node.left] = depth[i] + 1;
      depth[node.right] = depth[i] + 1;
    }
  }
  return { lengths, maxLength };
}

/**
 * Optimal code lengths for a weight table, capped at MAX_CODE_LENGTH.
 *
 * When the unconstrained tree is too deep, weights are halved (positive
 * weights stay at least 1) and the tree is rebuilt.
 */
export function buildCodeLengths(weights: ArrayLike<number>): Uint8Array {
  let current: ArrayLike<number> = weights;

  while (true) {
    const { lengths, maxLength } = leafDepths(current);
    if (maxLength <= MAX_CODE_LENGTH) {
      return Uint8Array.from(lengths);
    }

    const halved = new Float64Array(current.length);
    for (let i = 0; i < current.length; i++) {
      halved[i] = current[i] > 0 ? Math.max(1, Math.floor(current[i] / 2)) : 0;
    }
    current = halved;
  }
}
