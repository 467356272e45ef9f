import { describe, expect, it } from 'vitest';

import { DataOutput } from '../binary/data-output.js';
import { MAIN_TABLE_SIZE } from '../constants.js';
import { decodeCurrencyData } from '../decoder.js';
import { encodeCurrencyDataImage } from '../encoder.js';
import { CurrencyDataErrorCodes } from '../errors.js';
import type { CurrencyDataImage } from '../image.js';

function emptyImage(): CurrencyDataImage {
  return {
    formatVersion: 1,
    dataVersion: 2,
    mainTable: new Array<number>(MAIN_TABLE_SIZE).fill(0x7f),
    specialCases: [],
    otherCurrencies: { codes: '', fractionDigits: [], numericCodes: [] },
  };
}

describe('decodeCurrencyData', () => {
  it('reads back an encoded image exactly', () => {
    const image: CurrencyDataImage = {
      ...emptyImage(),
      specialCases: [
        {
          cutOverTime: 1199145600000n,
          oldCurrency: 'CYP',
          newCurrency: 'EUR',
          oldFractionDigits: 2,
          newFractionDigits: 2,
          oldNumericCode: 196,
          newNumericCode: 978,
        },
      ],
      otherCurrencies: { codes: 'XAU-XB5', fractionDigits: [-1, -1], numericCodes: [959, 955] },
    };

    const bytes = encodeCurrencyDataImage(image)._unsafeUnwrap();

    expect(decodeCurrencyData(bytes)._unsafeUnwrap()).toEqual(image);
  });

  it('rejects a wrong magic number', () => {
    const bytes = encodeCurrencyDataImage(emptyImage())._unsafeUnwrap();
    bytes[0] = 0;

    const error = decodeCurrencyData(bytes)._unsafeUnwrapErr();

    expect(error.code).toBe(CurrencyDataErrorCodes.MalformedBinaryImage);
    expect(error.message).toBe('bad magic number 0x757244');
  });

  it('rejects truncated data', () => {
    const bytes = encodeCurrencyDataImage(emptyImage())._unsafeUnwrap();

    expect(decodeCurrencyData(bytes.slice(0, 100))._unsafeUnwrapErr().code).toBe(
      CurrencyDataErrorCodes.MalformedBinaryImage
    );
  });

  it('rejects trailing bytes', () => {
    const bytes = encodeCurrencyDataImage(emptyImage())._unsafeUnwrap();
    const padded = new Uint8Array(bytes.length + 1);
    padded.set(bytes);

    expect(decodeCurrencyData(padded)._unsafeUnwrapErr().message).toBe(
      '1 trailing bytes after other currencies table'
    );
  });

  it('rejects a negative count', () => {
    const out = new DataOutput();
    out.writeInt(0x43757244);
    out.writeInt(1);
    out.writeInt(1);
    out.writeIntArray(new Array<number>(MAIN_TABLE_SIZE).fill(0));
    out.writeInt(-1);

    expect(decodeCurrencyData(out.toUint8Array())._unsafeUnwrapErr().message).toBe('negative special case count: -1');
  });
});

describe('encodeCurrencyDataImage', () => {
  it('reports an oversized string as an encoding failure', () => {
    const image = { ...emptyImage(), otherCurrencies: { codes: 'X'.repeat(70000), fractionDigits: [], numericCodes: [] } };

    expect(encodeCurrencyDataImage(image)._unsafeUnwrapErr().code).toBe(CurrencyDataErrorCodes.EncodedStringTooLong);
  });
});
