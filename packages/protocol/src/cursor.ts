import { IncompleteFrameError } from "./errors.js";

/**
 * Read position over a byte buffer.
 *
 * Every read checks the remaining length first and throws
 * IncompleteFrameError on underrun, leaving the offset untouched.
 * All numeric fields are Big Endian.
 */
export class ByteCursor {
  private readonly buffer: Buffer;
  private offset: number;

  constructor(buffer: Buffer, offset: number = 0) {
    this.buffer = buffer;
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  private require(size: number): void {
    if (this.remaining < size) {
      throw new IncompleteFrameError(size, this.remaining);
    }
  }

  readInt8(): number {
    this.require(1);
    const value = this.buffer.readInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readUInt8(): number {
    this.require(1);
    const value = this.buffer.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  readInt32(): number {
    this.require(4);
    const value = this.buffer.readInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  readUInt32(): number {
    this.require(4);
    const value = this.buffer.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  /**
   * Read raw bytes (a view into the underlying buffer)
   */
  readBytes(length: number): Buffer {
    this.require(length);
    const bytes = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  readAscii(length: number): string {
    return this.readBytes(length).toString("latin1");
  }
}
