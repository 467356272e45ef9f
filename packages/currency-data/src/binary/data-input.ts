import { CurrencyDataError, CurrencyDataErrorCodes } from '../errors.js';

import { decodeModifiedUtf8 } from './modified-utf8.js';

/**
 * Big-endian reader mirroring DataOutput. Reads past the end throw a
 * MalformedBinaryImage error.
 */
export class DataInput {
  private readonly view: DataView;
  private pos = 0;

  constructor(bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.view.byteLength - this.pos;
  }

  readInt(): number {
    this.require(4);
    const value = this.view.getInt32(this.pos);
    this.pos += 4;
    return value;
  }

  readLong(): bigint {
    this.require(8);
    const value = this.view.getBigInt64(this.pos);
    this.pos += 8;
    return value;
  }

  readUtf(): string {
    this.require(2);
    const length = this.view.getUint16(this.pos);
    this.pos += 2;
    this.require(length);
    const value = decodeModifiedUtf8(this.view, this.pos, length);
    if (value === undefined) {
      throw new CurrencyDataError(CurrencyDataErrorCodes.MalformedBinaryImage, 'malformed modified UTF-8 string', {
        offset: this.pos,
      });
    }
    this.pos += length;
    return value;
  }

  readIntArray(count: number): number[] {
    const values: number[] = [];
    for (let i = 0; i < count; i++) {
      values.push(this.readInt());
    }
    return values;
  }

  private require(bytes: number): void {
    if (this.remaining < bytes) {
      throw new CurrencyDataError(
        CurrencyDataErrorCodes.MalformedBinaryImage,
        `unexpected end of data at offset ${this.pos}: need ${bytes} bytes, ${this.remaining} left`,
        { offset: this.pos }
      );
    }
  }
}
