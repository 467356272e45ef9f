import { Result } from 'neverthrow';

import { DataInput } from './binary/data-input.js';
import { MAGIC_NUMBER, MAIN_TABLE_SIZE } from './constants.js';
import { CurrencyDataError, CurrencyDataErrorCodes, isCurrencyDataError } from './errors.js';
import type { CurrencyDataImage, SpecialCaseRow } from './image.js';

function malformed(message: string, context?: Record<string, unknown>): CurrencyDataError {
  return new CurrencyDataError(CurrencyDataErrorCodes.MalformedBinaryImage, message, context);
}

function readCount(input: DataInput, what: string): number {
  const count = input.readInt();
  if (count < 0) {
    throw malformed(`negative ${what} count: ${count}`, { count });
  }
  return count;
}

function readImage(bytes: Uint8Array): CurrencyDataImage {
  const input = new DataInput(bytes);

  const magic = input.readInt();
  if (magic !== MAGIC_NUMBER) {
    throw malformed(`bad magic number 0x${(magic >>> 0).toString(16)}`, { magic });
  }
  const formatVersion = input.readInt();
  const dataVersion = input.readInt();
  const mainTable = input.readIntArray(MAIN_TABLE_SIZE);

  const specialCaseCount = readCount(input, 'special case');
  const cutOverTimes: bigint[] = [];
  for (let i = 0; i < specialCaseCount; i++) cutOverTimes.push(input.readLong());
  const oldCurrencies: string[] = [];
  for (let i = 0; i < specialCaseCount; i++) oldCurrencies.push(input.readUtf());
  const newCurrencies: string[] = [];
  for (let i = 0; i < specialCaseCount; i++) newCurrencies.push(input.readUtf());
  const oldDigits = input.readIntArray(specialCaseCount);
  const newDigits = input.readIntArray(specialCaseCount);
  const oldNumeric = input.readIntArray(specialCaseCount);
  const newNumeric = input.readIntArray(specialCaseCount);

  const specialCases: SpecialCaseRow[] = cutOverTimes.map((cutOverTime, i) => ({
    cutOverTime,
    oldCurrency: oldCurrencies[i] ?? '',
    newCurrency: newCurrencies[i] ?? '',
    oldFractionDigits: oldDigits[i] ?? 0,
    newFractionDigits: newDigits[i] ?? 0,
    oldNumericCode: oldNumeric[i] ?? 0,
    newNumericCode: newNumeric[i] ?? 0,
  }));

  const otherCount = readCount(input, 'other currency');
  const codes = input.readUtf();
  const fractionDigits = input.readIntArray(otherCount);
  const numericCodes = input.readIntArray(otherCount);

  if (input.remaining !== 0) {
    throw malformed(`${input.remaining} trailing bytes after other currencies table`, { offset: input.offset });
  }

  return {
    formatVersion,
    dataVersion,
    mainTable,
    specialCases,
    otherCurrencies: { codes, fractionDigits, numericCodes },
  };
}

function toDecodeError(error: unknown): CurrencyDataError {
  if (isCurrencyDataError(error)) {
    return error;
  }
  return malformed(`failed to decode currency data: ${error instanceof Error ? error.message : String(error)}`);
}

/** Read a generated file back into its flat image. */
export function decodeCurrencyData(bytes: Uint8Array): Result<CurrencyDataImage, CurrencyDataError> {
  return Result.fromThrowable(readImage, toDecodeError)(bytes);
}
