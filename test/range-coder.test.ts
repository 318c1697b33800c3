import { describe, it, expect } from 'vitest';
import { BitReader, BitWriter } from '../src/core/bit-stream.js';
import { RangeEncoder } from '../src/core/range-encoder.js';
import { RangeDecoder } from '../src/core/range-decoder.js';
import { RangeCoder } from '../src/core/range-coder.js';
import { HuffmanCoder } from '../src/huffman/huffman-coder.js';
import { FrequencyModel } from '../src/model/frequency-model.js';
import {
  CorruptStreamError,
  OutOfDataError,
  PrecisionOverflowError,
  UnknownSymbolError,
} from '../src/errors.js';
import { createRng, sampleSymbols, uniformSymbols } from './helpers.js';

describe('RangeEncoder/RangeDecoder', () => {
  it('should encode and decode with a uniform model', () => {
    const model = FrequencyModel.uniform(256);
    const symbols = uniformSymbols(createRng(1), 256, 2000);

    const writer = new BitWriter();
    const encoder = new RangeEncoder(writer);
    for (const symbol of symbols) {
      encoder.encode(symbol, model);
    }
    encoder.finish();

    const decoder = new RangeDecoder(new BitReader(writer.flush()));
    const decoded = symbols.map(() => decoder.decode(model));

    expect(decoded).toEqual(symbols);
  });

  it('should encode and decode with a skewed model', () => {
    const model = FrequencyModel.fromTable([9000, 500, 400, 99, 1]);
    const symbols = sampleSymbols(
      createRng(2),
      [0.9, 0.05, 0.04, 0.0099, 0.0001],
      5000
    );
    for (const symbol of symbols) {
      expect(model.frequencyOf(symbol)).toBeGreaterThan(0);
    }

    const writer = new BitWriter();
    const encoder = new RangeEncoder(writer);
    for (const symbol of symbols) {
      encoder.encode(symbol, model);
    }
    encoder.finish();

    const decoder = new RangeDecoder(new BitReader(writer.flush()));
    expect(symbols.map(() => decoder.decode(model))).toEqual(symbols);
  });

  it('should follow a different model at every position', () => {
    const models = [
      FrequencyModel.fromTable([1, 1, 1, 1]),
      FrequencyModel.fromTable([10, 1, 0, 5]),
      FrequencyModel.fromTable([0, 0, 7, 1]),
    ];
    const rng = createRng(3);
    const symbols: number[] = [];
    for (let i = 0; i < 3000; i++) {
      const choices = models[i % models.length].positiveSymbols();
      symbols.push(choices[Math.floor(rng() * choices.length)]);
    }

    const writer = new BitWriter();
    const encoder = new RangeEncoder(writer);
    symbols.forEach((symbol, i) => encoder.encode(symbol, models[i % models.length]));
    encoder.finish();

    const decoder = new RangeDecoder(new BitReader(writer.flush()));
    const decoded = symbols.map((_, i) => decoder.decode(models[i % models.length]));

    expect(decoded).toEqual(symbols);
  });

  it('should emit the settling bits and a zero tail on finish', () => {
    // [0] under {1, 1}: one settled 0, then 01 and 30 zeros
    const writer = new BitWriter();
    const encoder = new RangeEncoder(writer);
    encoder.encode(0, FrequencyModel.fromTable([1, 1]));
    encoder.finish();

    expect(writer.bitCount).toBe(33);
    expect(writer.flush()).toEqual(new Uint8Array([0x20, 0, 0, 0, 0]));
  });

  it('should spend no bits on a certain symbol', () => {
    const writer = new BitWriter();
    const encoder = new RangeEncoder(writer);
    const model = FrequencyModel.fromTable([5]);
    for (let i = 0; i < 100; i++) {
      encoder.encode(0, model);
    }
    encoder.finish();

    expect(writer.flush()).toEqual(new Uint8Array([0x40, 0, 0, 0]));
  });

  it('should reject zero-frequency symbols', () => {
    const encoder = new RangeEncoder(new BitWriter());
    const model = FrequencyModel.fromTable([3, 0, 2]);

    expect(() => encoder.encode(1, model)).toThrow(UnknownSymbolError);
    expect(() => encoder.encode(5, model)).toThrow(UnknownSymbolError);
  });

  it('should reject totals above the precision limit', () => {
    const encoder = new RangeEncoder(new BitWriter());
    const model = FrequencyModel.fromTable([2 ** 24, 1]);

    expect(() => encoder.encode(0, model)).toThrow(PrecisionOverflowError);
  });

  it('should fail with OutOfData when the decoder window cannot be filled', () => {
    expect(() => new RangeDecoder(new BitReader(new Uint8Array(3)))).toThrow(
      OutOfDataError
    );
  });
});

describe('RangeCoder static', () => {
  const coder = new RangeCoder();

  it('should roundtrip a large Zipf-distributed alphabet', () => {
    const size = 1000;
    const weights = Array.from({ length: size }, (_, i) => 1 / (i + 1));
    const sum = weights.reduce((a, b) => a + b, 0);
    const symbols = sampleSymbols(
      createRng(4),
      weights.map((w) => w / sum),
      20000
    );
    const model = FrequencyModel.fromSymbols(symbols, size);

    const { bytes, bitLength } = coder.encode(symbols, model);

    expect(coder.decode(bytes, model, symbols.length)).toEqual(symbols);
    expect(bitLength).toBeLessThan(model.entropyBits() + 64);
  });

  it('should stay within a few bytes of the entropy on skewed input', () => {
    const symbols = sampleSymbols(createRng(5), [0.99, 0.01], 10000);
    const model = FrequencyModel.fromSymbols(symbols, 2);
    const entropy = model.entropyBits();

    const { bitLength } = coder.encode(symbols, model);

    expect(bitLength).toBeGreaterThan(entropy);
    expect(bitLength).toBeLessThan(entropy + 40);

    // Huffman cannot go below one bit per symbol
    const huffman = new HuffmanCoder();
    const table = huffman.build(model);
    expect(huffman.encode(symbols, table).bitLength).toBe(10000);
    expect(bitLength).toBeLessThan(10000 / 5);
  });

  it('should roundtrip models at the precision boundary', () => {
    const tables = [
      [1, 2 ** 24 - 1],
      [2 ** 24 - 1, 1],
      [2 ** 23, 1, 2 ** 23 - 1],
    ];
    const symbols = [1, 0, 1, 1, 0, 0, 1, 0, 1, 1, 1, 0];

    for (const table of tables) {
      const model = FrequencyModel.fromTable(table);
      const { bytes } = coder.encode(symbols, model);
      expect(coder.decode(bytes, model, symbols.length)).toEqual(symbols);
    }

    const three = FrequencyModel.fromTable([2 ** 23, 1, 2 ** 23 - 1]);
    const mixed = [1, 2, 0, 1, 1, 2, 0, 0, 1];
    const { bytes } = coder.encode(mixed, three);
    expect(coder.decode(bytes, three, mixed.length)).toEqual(mixed);
  });

  it('should reject totals above the precision limit', () => {
    expect(() =>
      coder.encode([0, 1], FrequencyModel.fromTable([2 ** 24, 1]))
    ).toThrow(PrecisionOverflowError);
  });

  it('should reject symbols outside the model', () => {
    expect(() => coder.encode([0, 2], FrequencyModel.fromTable([1, 1]))).toThrow(
      UnknownSymbolError
    );
  });

  it('should produce nothing for an empty sequence', () => {
    const model = FrequencyModel.uniform(4);
    const result = coder.encode([], model);

    expect(result).toEqual({ bytes: new Uint8Array(0), bitLength: 0 });
    expect(coder.decode(result.bytes, model, 0)).toEqual([]);
  });

  it('should fail with CorruptStream on a truncated payload', () => {
    const model = FrequencyModel.uniform(16);
    const symbols = uniformSymbols(createRng(6), 16, 500);
    const { bytes } = coder.encode(symbols, model);

    let caught: unknown;
    try {
      coder.decode(bytes.slice(0, -1), model, symbols.length);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CorruptStreamError);
    expect(caught instanceof Error && caught.cause).toBeInstanceOf(OutOfDataError);
  });
});

describe('RangeCoder adaptive', () => {
  it('should roundtrip and leave both models in lock step', () => {
    const coder = new RangeCoder({ adaptive: true });
    const symbols = sampleSymbols(createRng(7), [0.5, 0.25, 0.125, 0.125], 5000);

    const encoderModel = FrequencyModel.uniform(4);
    const decoderModel = FrequencyModel.uniform(4);
    const { bytes } = coder.encode(symbols, encoderModel);

    expect(coder.decode(bytes, decoderModel, symbols.length)).toEqual(symbols);
    expect(decoderModel.toArray()).toEqual(encoderModel.toArray());
    expect(encoderModel.totalCount()).toBeLessThanOrEqual(1 << 16);
  });

  it('should learn a repetitive stream', () => {
    const coder = new RangeCoder({ adaptive: true });
    const symbols = new Array<number>(4000).fill(65);

    const { bytes, bitLength } = coder.encode(symbols, FrequencyModel.uniform(256));

    expect(bitLength).toBeLessThan(symbols.length);
    expect(coder.decode(bytes, FrequencyModel.uniform(256), symbols.length)).toEqual(
      symbols
    );
  });

  it('should rescale often with a small limit', () => {
    const coder = new RangeCoder({ adaptive: true, increment: 4, limit: 64 });
    const symbols = sampleSymbols(createRng(8), [0.7, 0.1, 0.1, 0.05, 0.05], 2000);

    const encoderModel = FrequencyModel.uniform(8);
    const { bytes } = coder.encode(symbols, encoderModel);
    const decoderModel = FrequencyModel.uniform(8);

    expect(coder.decode(bytes, decoderModel, symbols.length)).toEqual(symbols);
    expect(encoderModel.totalCount()).toBeLessThanOrEqual(64);
    expect(decoderModel.toArray()).toEqual(encoderModel.toArray());
  });

  it('should validate its options', () => {
    expect(() => new RangeCoder({ increment: 0 })).toThrow(RangeError);
    expect(() => new RangeCoder({ increment: 1.5 })).toThrow(RangeError);
    expect(() => new RangeCoder({ limit: 0 })).toThrow(RangeError);
    expect(() => new RangeCoder({ limit: 2 ** 24 + 1 })).toThrow(RangeError);
    expect(new RangeCoder().adaptive).toBe(false);
  });
});

describe('RangeCoder with an end symbol', () => {
  const END = 3;
  const body = uniformSymbols(createRng(9), 3, 600);
  const symbols = [...body, END];

  it('should decode up to and including the end symbol', () => {
    const coder = new RangeCoder();
    const model = FrequencyModel.fromSymbols(symbols, 4);
    const { bytes } = coder.encodeUntil(symbols, model, END);

    expect(coder.decodeUntil(bytes, model, END)).toEqual(symbols);
  });

  it('should work with adaptive models', () => {
    const coder = new RangeCoder({ adaptive: true });
    const { bytes } = coder.encodeUntil(symbols, FrequencyModel.uniform(4), END);

    expect(coder.decodeUntil(bytes, FrequencyModel.uniform(4), END)).toEqual(symbols);
  });

  it('should ignore bytes after the end symbol', () => {
    const coder = new RangeCoder();
    const model = FrequencyModel.fromTable([1, 1, 1, 1]);
    const { bytes } = coder.encodeUntil([2, 0, 3], model, END);
    const extended = new Uint8Array([...bytes, 0xff, 0xff]);

    expect(coder.decodeUntil(extended, model, END)).toEqual([2, 0, 3]);
  });

  it('should reject sequences not terminated exactly once', () => {
    const coder = new RangeCoder();
    const model = FrequencyModel.uniform(4);

    expect(() => coder.encodeUntil([0, 1], model, END)).toThrow(RangeError);
    expect(() => coder.encodeUntil([0, 3, 1, 3], model, END)).toThrow(
      'End symbol 3 at position 1 before the end of the sequence'
    );
    expect(() => coder.encodeUntil([], model, END)).toThrow(RangeError);
  });

  it('should require the end symbol in the model', () => {
    const coder = new RangeCoder();

    expect(() =>
      coder.decodeUntil(new Uint8Array(8), FrequencyModel.fromTable([1, 1, 1, 0]), END)
    ).toThrow(UnknownSymbolError);
  });

  it('should fail with CorruptStream when the end symbol never arrives', () => {
    const coder = new RangeCoder();
    const model = FrequencyModel.fromSymbols(symbols, 4);
    const { bytes } = coder.encodeUntil(symbols, model, END);

    let caught: unknown;
    try {
      coder.decodeUntil(bytes.slice(0, -1), model, END);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CorruptStreamError);
    expect(caught instanceof Error && caught.cause).toBeInstanceOf(OutOfDataError);
  });
});
