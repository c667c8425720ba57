/**
 * Growable little-endian byte buffer.
 */
export class BinaryWriter {
  private buffer: Buffer;
  private offset: number;

  constructor(initialSize: number = 1024) {
    this.buffer = Buffer.alloc(initialSize);
    this.offset = 0;
  }

  get length(): number {
    return this.offset;
  }

  writeUint8(value: number): void {
    this.ensureCapacity(1);
    this.buffer.writeUInt8(value, this.offset);
    this.offset += 1;
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.buffer.writeUInt32LE(value, this.offset);
    this.offset += 4;
  }

  writeUint64(value: bigint): void {
    this.ensureCapacity(8);
    this.buffer.writeBigUInt64LE(value, this.offset);
    this.offset += 8;
  }

  writeInt64(value: bigint): void {
    this.ensureCapacity(8);
    this.buffer.writeBigInt64LE(value, this.offset);
    this.offset += 8;
  }

  writeDouble(value: number): void {
    this.ensureCapacity(8);
    this.buffer.writeDoubleLE(value, this.offset);
    this.offset += 8;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
  }

  /** Copy of the bytes written so far. */
  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer);
      this.buffer = newBuffer;
    }
  }
}
