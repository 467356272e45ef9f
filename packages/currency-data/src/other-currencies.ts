import { getLogger } from '@curdata/logger';
import { err, ok, type Result } from 'neverthrow';

import { LETTER_OFFSET_BASE, MAX_OTHER_CURRENCIES, OTHER_CURRENCIES_SEPARATOR } from './constants.js';
import { validateCurrencyCode } from './currency-code.js';
import { CurrencyDataError, CurrencyDataErrorCodes } from './errors.js';
import { resolveFractionDigits } from './fraction-digits.js';
import { type MainTable, mainTableIndexOf } from './main-table.js';
import { resolveNumericCode } from './numeric-code.js';
import type { CurrencyRegistry } from './registry.js';
import type { CurrencyCode, FractionDigits } from './types.js';

const logger = getLogger('OtherCurrencies');

export interface OtherCurrencyRecord {
  code: CurrencyCode;
  fractionDigits: FractionDigits;
  numericCode: number;
}

export interface OtherCurrencyTable {
  /** Codes joined with '-', in registry order. */
  codes: string;
  records: readonly OtherCurrencyRecord[];
}

export interface OtherCurrencyTableOptions {
  capacity?: number | undefined;
}

/**
 * True when the main table already yields `code` as the simple-case currency
 * of the country named by its first two letters.
 */
export function isReachableFromMainTable(code: string, mainTable: MainTable): boolean {
  const index = mainTableIndexOf(code);
  const entry = index === undefined ? undefined : mainTable[index];
  return entry?.kind === 'simple' && entry.finalChar === code.charCodeAt(2) - LETTER_OFFSET_BASE;
}

/**
 * Collect every registry currency the main table cannot produce: codes whose
 * prefix is not a country, is a special case or has no currency, or whose
 * country's simple entry names a different third letter.
 */
export function buildOtherCurrencyTable(
  registry: CurrencyRegistry,
  mainTable: MainTable,
  options: OtherCurrencyTableOptions = {}
): Result<OtherCurrencyTable, CurrencyDataError> {
  const capacity = options.capacity ?? MAX_OTHER_CURRENCIES;
  const records: OtherCurrencyRecord[] = [];

  for (const { code: rawCode } of registry.records) {
    const validated = validateCurrencyCode(rawCode, registry);
    if (validated.isErr()) {
      return err(validated.error);
    }
    const code = validated.value;
    if (isReachableFromMainTable(code, mainTable)) {
      continue;
    }

    if (records.length >= capacity) {
      return err(
        new CurrencyDataError(CurrencyDataErrorCodes.TooManyOtherCurrencies, 'too many other currencies', {
          capacity,
          code,
        })
      );
    }

    const numericCode = resolveNumericCode(code, registry);
    if (numericCode.isErr()) {
      return err(numericCode.error);
    }
    records.push({
      code,
      fractionDigits: resolveFractionDigits(code, registry.minorUnits),
      numericCode: numericCode.value,
    });
  }

  logger.debug({ count: records.length }, 'Built other currencies table');
  return ok({
    codes: records.map((record) => record.code).join(OTHER_CURRENCIES_SEPARATOR),
    records,
  });
}
