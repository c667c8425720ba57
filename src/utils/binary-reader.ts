/**
 * Bounds-checked little-endian reader over an in-memory buffer.
 */
import { GffParseError } from '../errors.js';

export class BinaryReader {
  private readonly buffer: Buffer;
  private offset: number;
  private readonly context: string;

  /**
   * @param buffer - Bytes to read
   * @param offset - Starting position
   * @param context - Name of the region, used in truncation errors
   */
  constructor(buffer: Buffer, offset: number = 0, context: string = 'GFF data') {
    this.buffer = buffer;
    this.offset = offset;
    this.context = context;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return Math.max(0, this.buffer.length - this.offset);
  }

  seek(offset: number): void {
    if (offset < 0 || offset > this.buffer.length) {
      throw new GffParseError(`Offset ${offset} lies outside ${this.context} (${this.buffer.length} bytes)`);
    }
    this.offset = offset;
  }

  readUint8(): number {
    this.ensureAvailable(1);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readUint32(): number {
    this.ensureAvailable(4);
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readUint64(): bigint {
    this.ensureAvailable(8);
    const value = this.buffer.readBigUInt64LE(this.offset);
    this.offset += 8;
    return value;
  }

  readInt64(): bigint {
    this.ensureAvailable(8);
    const value = this.buffer.readBigInt64LE(this.offset);
    this.offset += 8;
    return value;
  }

  readDouble(): number {
    this.ensureAvailable(8);
    const value = this.buffer.readDoubleLE(this.offset);
    this.offset += 8;
    return value;
  }

  /** Returns a view into the underlying buffer, not a copy. */
  readBytes(length: number): Buffer {
    this.ensureAvailable(length);
    const bytes = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  private ensureAvailable(length: number): void {
    if (this.offset + length > this.buffer.length) {
      throw new GffParseError(
        `Unexpected end of ${this.context}: needed ${length} bytes at offset ${this.offset}, ${this.remaining} available`
      );
    }
  }
}
