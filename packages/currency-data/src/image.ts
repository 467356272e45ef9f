import type { MainTable } from './main-table.js';
import { packMainTableEntry } from './main-table.js';
import type { OtherCurrencyTable } from './other-currencies.js';
import type { SpecialCaseRecord } from './special-cases.js';

/** Everything the generator builds, before flattening. */
export interface CurrencyDataTables {
  formatVersion: number;
  dataVersion: number;
  mainTable: MainTable;
  specialCases: readonly SpecialCaseRecord[];
  otherCurrencies: OtherCurrencyTable;
}

/** One row of the special-case tables as it appears on disk. */
export interface SpecialCaseRow {
  cutOverTime: bigint;
  oldCurrency: string;
  /** Empty when the special case has no successor currency. */
  newCurrency: string;
  oldFractionDigits: number;
  newFractionDigits: number;
  oldNumericCode: number;
  newNumericCode: number;
}

/**
 * Flat, integer-level view of the binary file. Encoding and decoding are
 * exact inverses over this shape.
 */
export interface CurrencyDataImage {
  formatVersion: number;
  dataVersion: number;
  mainTable: number[];
  specialCases: SpecialCaseRow[];
  otherCurrencies: {
    codes: string;
    fractionDigits: number[];
    numericCodes: number[];
  };
}

export function toCurrencyDataImage(tables: CurrencyDataTables): CurrencyDataImage {
  return {
    formatVersion: tables.formatVersion,
    dataVersion: tables.dataVersion,
    mainTable: tables.mainTable.map(packMainTableEntry),
    specialCases: tables.specialCases.map((record) => ({
      cutOverTime: record.cutOverTime,
      oldCurrency: record.oldCurrency,
      newCurrency: record.newCurrency ?? '',
      oldFractionDigits: record.oldFractionDigits,
      newFractionDigits: record.newFractionDigits,
      oldNumericCode: record.oldNumericCode,
      newNumericCode: record.newNumericCode,
    })),
    otherCurrencies: {
      codes: tables.otherCurrencies.codes,
      fractionDigits: tables.otherCurrencies.records.map((record) => record.fractionDigits),
      numericCodes: tables.otherCurrencies.records.map((record) => record.numericCode),
    },
  };
}
