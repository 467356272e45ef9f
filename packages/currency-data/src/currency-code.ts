import { err, ok, type Result } from 'neverthrow';

import { CurrencyDataError, CurrencyDataErrorCodes } from './errors.js';
import type { CurrencyRegistry } from './registry.js';
import type { CurrencyCode } from './types.js';

/**
 * The one listed code that is not three letters (a historical bond-market
 * unit). Allowed by name only.
 */
export const LEGACY_CURRENCY_CODES: ReadonlySet<string> = new Set(['XB5']);

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

/** Syntax check only: three uppercase ASCII letters, or an allow-listed legacy code. */
export function isWellFormedCurrencyCode(code: string): boolean {
  return CURRENCY_CODE_PATTERN.test(code) || LEGACY_CURRENCY_CODES.has(code);
}

export function validateCurrencyCode(code: string, registry: CurrencyRegistry): Result<CurrencyCode, CurrencyDataError> {
  if (code.length !== 3) {
    return err(
      new CurrencyDataError(
        CurrencyDataErrorCodes.InvalidCurrencyCodeFormat,
        `illegal length for currency code: ${code}`,
        { code }
      )
    );
  }
  if (!isWellFormedCurrencyCode(code)) {
    return err(
      new CurrencyDataError(
        CurrencyDataErrorCodes.InvalidCurrencyCodeFormat,
        `currency code contains illegal character: ${code}`,
        { code }
      )
    );
  }
  if (!registry.has(code)) {
    return err(
      new CurrencyDataError(CurrencyDataErrorCodes.UnknownCurrencyCode, `currency code not listed as valid: ${code}`, {
        code,
      })
    );
  }
  return ok(code as CurrencyCode);
}
