import { err, ok, type Result } from 'neverthrow';

import { CurrencyDataError, CurrencyDataErrorCodes } from './errors.js';
import type { CurrencyRegistry } from './registry.js';
import type { CurrencyCode } from './types.js';

/** ISO 4217 numeric code of a validated currency, 0..999. */
export function resolveNumericCode(code: CurrencyCode, registry: CurrencyRegistry): Result<number, CurrencyDataError> {
  const numericCode = registry.numericCodeOf(code);
  if (numericCode === undefined) {
    return err(
      new CurrencyDataError(CurrencyDataErrorCodes.UnknownCurrencyCode, `currency code not listed as valid: ${code}`, {
        code,
      })
    );
  }
  return ok(numericCode);
}
