import { CurrencyDataError, CurrencyDataErrorCodes } from '../errors.js';

import { encodeModifiedUtf8 } from './modified-utf8.js';

const MAX_UTF_LENGTH = 0xffff;

/**
 * Growable big-endian byte buffer with the writers the currency data
 * format needs: 32/64-bit integers and length-prefixed strings.
 */
export class DataOutput {
  private buffer: ArrayBuffer;
  private view: DataView;
  private length = 0;

  constructor(initialCapacity = 4096) {
    this.buffer = new ArrayBuffer(initialCapacity);
    this.view = new DataView(this.buffer);
  }

  get size(): number {
    return this.length;
  }

  writeInt(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.length, value);
    this.length += 4;
  }

  writeLong(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.length, value);
    this.length += 8;
  }

  /**
   * Unsigned 16-bit byte length followed by the modified UTF-8 bytes.
   * @throws CurrencyDataError when the encoded form exceeds 65535 bytes
   */
  writeUtf(value: string): void {
    const bytes = encodeModifiedUtf8(value);
    if (bytes.length > MAX_UTF_LENGTH) {
      throw new CurrencyDataError(
        CurrencyDataErrorCodes.EncodedStringTooLong,
        `encoded string too long: ${bytes.length} bytes`,
        { length: bytes.length }
      );
    }
    this.ensureCapacity(2 + bytes.length);
    this.view.setUint16(this.length, bytes.length);
    new Uint8Array(this.buffer, this.length + 2, bytes.length).set(bytes);
    this.length += 2 + bytes.length;
  }

  writeIntArray(values: readonly number[]): void {
    for (const value of values) {
      this.writeInt(value);
    }
  }

  /** Copy of the bytes written so far. */
  toUint8Array(): Uint8Array {
    return new Uint8Array(this.buffer.slice(0, this.length));
  }

  private ensureCapacity(extra: number): void {
    const required = this.length + extra;
    if (required <= this.buffer.byteLength) {
      return;
    }
    let capacity = Math.max(this.buffer.byteLength, 16);
    while (capacity < required) {
      capacity *= 2;
    }
    const next = new ArrayBuffer(capacity);
    new Uint8Array(next).set(new Uint8Array(this.buffer, 0, this.length));
    this.buffer = next;
    this.view = new DataView(next);
  }
}
