import { Result } from 'neverthrow';

import { DataOutput } from './binary/data-output.js';
import { MAGIC_NUMBER } from './constants.js';
import { CurrencyDataError, CurrencyDataErrorCodes, isCurrencyDataError } from './errors.js';
import { type CurrencyDataImage, type CurrencyDataTables, toCurrencyDataImage } from './image.js';

/**
 * Serialize an image in file order:
 *
 * - magic number (int): 0x43757244 ('CurD')
 * - formatVersion, dataVersion (int)
 * - mainTable (int[26*26])
 * - specialCaseCount (int)
 * - cut-over times (long[]), old currencies (UTF[]), new currencies (UTF[])
 * - old/new default fraction digits (int[] each), old/new numeric codes (int[] each)
 * - otherCurrenciesCount (int)
 * - otherCurrencies (UTF, '-'-joined)
 * - other currencies' default fraction digits and numeric codes (int[] each)
 */
function writeImage(image: CurrencyDataImage): Uint8Array {
  const out = new DataOutput();
  const special = image.specialCases;

  out.writeInt(MAGIC_NUMBER);
  out.writeInt(image.formatVersion);
  out.writeInt(image.dataVersion);
  out.writeIntArray(image.mainTable);

  out.writeInt(special.length);
  for (const row of special) out.writeLong(row.cutOverTime);
  for (const row of special) out.writeUtf(row.oldCurrency);
  for (const row of special) out.writeUtf(row.newCurrency);
  out.writeIntArray(special.map((row) => row.oldFractionDigits));
  out.writeIntArray(special.map((row) => row.newFractionDigits));
  out.writeIntArray(special.map((row) => row.oldNumericCode));
  out.writeIntArray(special.map((row) => row.newNumericCode));

  out.writeInt(image.otherCurrencies.numericCodes.length);
  out.writeUtf(image.otherCurrencies.codes);
  out.writeIntArray(image.otherCurrencies.fractionDigits);
  out.writeIntArray(image.otherCurrencies.numericCodes);

  return out.toUint8Array();
}

function toEncodeError(error: unknown): CurrencyDataError {
  if (isCurrencyDataError(error)) {
    return error;
  }
  return new CurrencyDataError(
    CurrencyDataErrorCodes.OutputWriteFailure,
    `failed to encode currency data: ${error instanceof Error ? error.message : String(error)}`,
    undefined,
    error
  );
}

export function encodeCurrencyDataImage(image: CurrencyDataImage): Result<Uint8Array, CurrencyDataError> {
  return Result.fromThrowable(writeImage, toEncodeError)(image);
}

export function encodeCurrencyData(tables: CurrencyDataTables): Result<Uint8Array, CurrencyDataError> {
  return encodeCurrencyDataImage(toCurrencyDataImage(tables));
}
