import { getLogger } from '@curdata/logger';
import { err, ok, type Result } from 'neverthrow';

import {
  A_TO_Z,
  COUNTRY_WITHOUT_CURRENCY_ENTRY,
  INVALID_COUNTRY_ENTRY,
  LETTER_OFFSET_BASE,
  MAIN_TABLE_SIZE,
  NUMERIC_CODE_MASK,
  NUMERIC_CODE_SHIFT,
  SIMPLE_CASE_COUNTRY_DEFAULT_DIGITS_MASK,
  SIMPLE_CASE_COUNTRY_DEFAULT_DIGITS_SHIFT,
  SIMPLE_CASE_COUNTRY_FINAL_CHAR_MASK,
  SIMPLE_CASE_COUNTRY_MASK,
  SPECIAL_CASE_COUNTRY_INDEX_DELTA,
  SPECIAL_CASE_COUNTRY_INDEX_MASK,
  SPECIAL_CASE_COUNTRY_MASK,
} from './constants.js';
import { validateCurrencyCode } from './currency-code.js';
import { CurrencyDataError, CurrencyDataErrorCodes } from './errors.js';
import { resolveFractionDigits } from './fraction-digits.js';
import { resolveNumericCode } from './numeric-code.js';
import type { CurrencyRegistry } from './registry.js';
import type { SpecialCaseRegistry } from './special-cases.js';
import type { CurrencyCode, FractionDigits, PackableFractionDigits } from './types.js';

const logger = getLogger('MainTable');

/**
 * One decision per two-letter country code. Only flattened to an integer by
 * packMainTableEntry() when the table is written.
 */
export type MainTableEntry =
  | { kind: 'invalid' }
  | { kind: 'no-currency' }
  | {
      kind: 'simple';
      /** Offset of the currency code's third letter from 'A' (0..25). */
      finalChar: number;
      fractionDigits: PackableFractionDigits;
      numericCode: number;
    }
  | {
      kind: 'special-case';
      /** 0-based index into the special-case tables. */
      index: number;
    };

export type MainTableEntryKind = MainTableEntry['kind'];

export type MainTable = readonly MainTableEntry[];

export function countryCodeAt(index: number): string {
  const first = Math.floor(index / A_TO_Z);
  const second = index % A_TO_Z;
  return String.fromCharCode(LETTER_OFFSET_BASE + first, LETTER_OFFSET_BASE + second);
}

/**
 * Position of a country code in the main table, or undefined when either of
 * the first two characters is not an uppercase ASCII letter.
 */
export function mainTableIndexOf(code: string): number | undefined {
  const first = code.charCodeAt(0) - LETTER_OFFSET_BASE;
  const second = code.charCodeAt(1) - LETTER_OFFSET_BASE;
  if (!(first >= 0 && first < A_TO_Z && second >= 0 && second < A_TO_Z)) {
    return undefined;
  }
  return first * A_TO_Z + second;
}

export function packMainTableEntry(entry: MainTableEntry): number {
  switch (entry.kind) {
    case 'invalid':
      return INVALID_COUNTRY_ENTRY;
    case 'no-currency':
      return COUNTRY_WITHOUT_CURRENCY_ENTRY;
    case 'simple':
      return (
        SIMPLE_CASE_COUNTRY_MASK |
        entry.finalChar |
        (entry.fractionDigits << SIMPLE_CASE_COUNTRY_DEFAULT_DIGITS_SHIFT) |
        (entry.numericCode << NUMERIC_CODE_SHIFT)
      );
    case 'special-case':
      return SPECIAL_CASE_COUNTRY_MASK | (entry.index + SPECIAL_CASE_COUNTRY_INDEX_DELTA);
  }
}

/**
 * Recover the variant of a packed entry. The special-case flag with index 0
 * is the no-currency entry.
 */
export function unpackMainTableEntry(packed: number): MainTableEntry {
  if (packed === INVALID_COUNTRY_ENTRY) {
    return { kind: 'invalid' };
  }
  if ((packed & SPECIAL_CASE_COUNTRY_MASK) !== 0) {
    const stored = packed & SPECIAL_CASE_COUNTRY_INDEX_MASK;
    return stored === 0
      ? { kind: 'no-currency' }
      : { kind: 'special-case', index: stored - SPECIAL_CASE_COUNTRY_INDEX_DELTA };
  }
  return {
    kind: 'simple',
    finalChar: packed & SIMPLE_CASE_COUNTRY_FINAL_CHAR_MASK,
    fractionDigits: toPackableDigits(
      (packed & SIMPLE_CASE_COUNTRY_DEFAULT_DIGITS_MASK) >> SIMPLE_CASE_COUNTRY_DEFAULT_DIGITS_SHIFT
    ),
    numericCode: (packed & NUMERIC_CODE_MASK) >> NUMERIC_CODE_SHIFT,
  };
}

function toPackableDigits(value: number): PackableFractionDigits {
  switch (value) {
    case 0:
    case 1:
    case 2:
    case 3:
      return value;
    default:
      throw new RangeError(`two-bit field out of range: ${value}`);
  }
}

function isPackable(digits: FractionDigits): digits is PackableFractionDigits {
  return digits >= 0 && digits <= 3;
}

function buildSimpleEntry(
  currency: CurrencyCode,
  registry: CurrencyRegistry
): Result<MainTableEntry, CurrencyDataError> {
  const digits = resolveFractionDigits(currency, registry.minorUnits);
  if (!isPackable(digits)) {
    return err(
      new CurrencyDataError(
        CurrencyDataErrorCodes.FractionDigitsOutOfRange,
        `fraction digits out of range for ${currency}`,
        { currency, digits }
      )
    );
  }

  return resolveNumericCode(currency, registry).andThen((numericCode) => {
    if (numericCode < 0 || numericCode >= 1000) {
      return err(
        new CurrencyDataError(
          CurrencyDataErrorCodes.NumericCodeOutOfRange,
          `numeric code out of range for ${currency}`,
          { currency, numericCode }
        )
      );
    }
    return ok<MainTableEntry, CurrencyDataError>({
      kind: 'simple',
      finalChar: currency.charCodeAt(2) - LETTER_OFFSET_BASE,
      fractionDigits: digits,
      numericCode,
    });
  });
}

/**
 * Classify one country. Values that share the country's first two letters
 * are packed directly; everything else goes through the special-case registry.
 */
export function buildMainTableEntry(
  countryCode: string,
  currencyInfo: string | undefined,
  registry: CurrencyRegistry,
  specialCases: SpecialCaseRegistry
): Result<MainTableEntry, CurrencyDataError> {
  if (currencyInfo === undefined) {
    return ok<MainTableEntry, CurrencyDataError>({ kind: 'invalid' });
  }
  if (currencyInfo.length === 0) {
    return ok<MainTableEntry, CurrencyDataError>({ kind: 'no-currency' });
  }
  if (currencyInfo.length === 3 && currencyInfo.startsWith(countryCode)) {
    return validateCurrencyCode(currencyInfo, registry).andThen((currency) => buildSimpleEntry(currency, registry));
  }
  return specialCases.intern(currencyInfo).map((index): MainTableEntry => ({ kind: 'special-case', index }));
}

/**
 * Build all 676 entries in row-major order (AA, AB, ..., ZZ). Stops at the
 * first failing country.
 */
export function buildMainTable(
  countries: ReadonlyMap<string, string>,
  registry: CurrencyRegistry,
  specialCases: SpecialCaseRegistry
): Result<MainTable, CurrencyDataError> {
  const entries: MainTableEntry[] = [];
  for (let index = 0; index < MAIN_TABLE_SIZE; index++) {
    const countryCode = countryCodeAt(index);
    const entry = buildMainTableEntry(countryCode, countries.get(countryCode), registry, specialCases);
    if (entry.isErr()) {
      return err(entry.error);
    }
    entries.push(entry.value);
  }

  logger.debug(
    {
      simple: entries.filter((e) => e.kind === 'simple').length,
      specialCases: specialCases.size,
      noCurrency: entries.filter((e) => e.kind === 'no-currency').length,
    },
    'Built main table'
  );
  return ok(entries);
}
