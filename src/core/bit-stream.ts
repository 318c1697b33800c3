import { OutOfDataError } from '../errors.js';

/**
 * A packed run of bits as produced by a coder.
 * `bitLength` excludes the zero padding of the final byte.
 */
export interface Bitstream {
  bytes: Uint8Array;
  bitLength: number;
}

/**
 * Bit-level writer.
 * Bits are packed MSB-first: the first bit written lands in bit 7 of byte 0.
 */
export class BitWriter {
  private buffer: number[] = [];
  private currentByte: number = 0;
  private bitPosition: number = 0;

  /**
   * Write a single bit to the stream.
   * @param bit - 0 or 1
   */
  writeBit(bit: number): void {
    this.currentByte = (this.currentByte << 1) | (bit & 1);
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Write the low `count` bits of `value`, MSB first.
   * @param count - Number of bits to write (0-32)
   */
  writeBits(value: number, count: number): void {
    if (!Number.isInteger(count) || count < 0 || count > 32) {
      throw new RangeError(`Bit count out of range: ${count}`);
    }
    for (let i = count - 1; i >= 0; i--) {
      this.writeBit((value >>> i) & 1);
    }
  }

  /**
   * Pad the final partial byte with zeros and return everything written.
   */
  flush(): Uint8Array {
    if (this.bitPosition > 0) {
      this.currentByte <<= 8 - this.bitPosition;
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
    return this.toUint8Array();
  }

  /**
   * Completed bytes (a pending partial byte is not counted).
   */
  get byteCount(): number {
    return this.buffer.length;
  }

  get bitCount(): number {
    return this.buffer.length * 8 + this.bitPosition;
  }

  /**
   * Completed bytes only. Call flush() first to include a partial byte.
   */
  toUint8Array(): Uint8Array {
    return new Uint8Array(this.buffer);
  }
}

/**
 * Bit-level reader, consuming in the order BitWriter produces.
 */
export class BitReader {
  private data: Uint8Array;
  private bytePosition: number = 0;
  private bitPosition: number = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  /**
   * Read a single bit.
   * @throws OutOfDataError past the end of the data
   */
  readBit(): number {
    if (this.bytePosition >= this.data.length) {
      throw new OutOfDataError(
        `Bit reader exhausted after ${this.data.length * 8} bits`
      );
    }

    const bit = (this.data[this.bytePosition] >>> (7 - this.bitPosition)) & 1;
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.bytePosition++;
      this.bitPosition = 0;
    }

    return bit;
  }

  /**
   * Read `count` bits as an unsigned number (MSB first).
   * @param count - Number of bits to read (0-32)
   */
  readBits(count: number): number {
    if (!Number.isInteger(count) || count < 0 || count > 32) {
      throw new RangeError(`Bit count out of range: ${count}`);
    }
    if (count > this.remainingBits) {
      throw new OutOfDataError(
        `Requested ${count} bits with ${this.remainingBits} remaining`
      );
    }
    let value = 0;
    for (let i = 0; i < count; i++) {
      value = ((value << 1) | this.readBit()) >>> 0;
    }
    return value;
  }

  get isAtEnd(): boolean {
    return this.bytePosition >= this.data.length;
  }

  /**
   * Current position in bits.
   */
  get position(): number {
    return this.bytePosition * 8 + this.bitPosition;
  }

  /**
   * Total size in bits.
   */
  get size(): number {
    return this.data.length * 8;
  }

  get remainingBits(): number {
    return this.size - this.position;
  }
}
