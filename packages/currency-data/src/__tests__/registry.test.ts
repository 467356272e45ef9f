import { describe, expect, it } from 'vitest';

import { validateCurrencyCode } from '../currency-code.js';
import { CurrencyDataErrorCodes } from '../errors.js';
import { resolveFractionDigits } from '../fraction-digits.js';
import { resolveNumericCode } from '../numeric-code.js';
import { CurrencyRegistry, parseRegistryRecords } from '../registry.js';

import { TEST_REGISTRY, testRegistry } from './test-utils.js';

describe('parseRegistryRecords', () => {
  it('splits fixed-width records in order', () => {
    const result = parseRegistryRecords('USD840-XB5955-EUR978');

    expect(result._unsafeUnwrap()).toEqual([
      { code: 'USD', numericCode: 840 },
      { code: 'XB5', numericCode: 955 },
      { code: 'EUR', numericCode: 978 },
    ]);
  });

  it('parses leading zeros in numeric codes', () => {
    expect(parseRegistryRecords('ALL008')._unsafeUnwrap()).toEqual([{ code: 'ALL', numericCode: 8 }]);
  });

  it.each(['', 'USD84', 'USD840-', 'USD840-EUR9788'])('rejects %j with a size error', (all) => {
    const error = parseRegistryRecords(all)._unsafeUnwrapErr();

    expect(error.code).toBe(CurrencyDataErrorCodes.MalformedRegistryString);
    expect(error.message).toBe('"all" entry has incorrect size');
  });

  it('rejects a wrong separator', () => {
    const error = parseRegistryRecords('USD840+EUR978')._unsafeUnwrapErr();

    expect(error.code).toBe(CurrencyDataErrorCodes.MalformedRegistryString);
    expect(error.message).toBe('incorrect separator in "all" entry');
    expect(error.context).toEqual({ offset: 6, found: '+' });
  });

  it('rejects a non-numeric numeric field', () => {
    const error = parseRegistryRecords('USD8A0')._unsafeUnwrapErr();

    expect(error.code).toBe(CurrencyDataErrorCodes.MalformedRegistryString);
  });
});

describe('CurrencyRegistry', () => {
  it('keeps the first numeric code of a duplicated listing', () => {
    const registry = CurrencyRegistry.fromInput({ ...TEST_REGISTRY, all: 'USD840-USD999' })._unsafeUnwrap();

    expect(registry.records).toHaveLength(2);
    expect(registry.numericCodeOf('USD')).toBe(840);
  });
});

describe('validateCurrencyCode', () => {
  const registry = testRegistry();

  it('accepts a listed three-letter code', () => {
    expect(validateCurrencyCode('USD', registry)._unsafeUnwrap()).toBe('USD');
  });

  it('accepts the legacy code with a digit', () => {
    expect(validateCurrencyCode('XB5', registry).isOk()).toBe(true);
  });

  it.each(['US', 'USDX', ''])('rejects %j for its length', (code) => {
    const error = validateCurrencyCode(code, registry)._unsafeUnwrapErr();

    expect(error.code).toBe(CurrencyDataErrorCodes.InvalidCurrencyCodeFormat);
    expect(error.message).toBe(`illegal length for currency code: ${code}`);
  });

  it.each(['usd', 'U5D', 'XB6', 'US-'])('rejects %j for its characters', (code) => {
    const error = validateCurrencyCode(code, registry)._unsafeUnwrapErr();

    expect(error.code).toBe(CurrencyDataErrorCodes.InvalidCurrencyCodeFormat);
  });

  it('rejects a well-formed code missing from the registry', () => {
    const error = validateCurrencyCode('GBP', registry)._unsafeUnwrapErr();

    expect(error.code).toBe(CurrencyDataErrorCodes.UnknownCurrencyCode);
    expect(error.message).toBe('currency code not listed as valid: GBP');
  });

  it('does not treat a code spanning two records as listed', () => {
    // "SD8" occurs inside "USD840" but is not a listed code
    expect(validateCurrencyCode('SD8', registry).isErr()).toBe(true);
    expect(validateCurrencyCode('DEU', registry)._unsafeUnwrapErr().code).toBe(
      CurrencyDataErrorCodes.UnknownCurrencyCode
    );
  });
});

describe('resolveFractionDigits', () => {
  const minorUnits = {
    minor0: 'JPYKRW',
    minor1: 'MGA',
    minor3: 'KWDBHD',
    minorUndefined: 'XAUXB5',
  };

  it.each([
    ['KRW', 0],
    ['MGA', 1],
    ['BHD', 3],
    ['XB5', -1],
    ['USD', 2],
  ])('resolves %s to %i', (code, digits) => {
    expect(resolveFractionDigits(code, minorUnits)).toBe(digits);
  });

  it('consults the partitions in priority order', () => {
    expect(resolveFractionDigits('AAA', { minor0: 'AAA', minor1: 'AAA', minor3: 'AAA', minorUndefined: 'AAA' })).toBe(
      0
    );
    expect(resolveFractionDigits('AAA', { minor0: '', minor1: '', minor3: 'AAA', minorUndefined: 'AAA' })).toBe(3);
  });
});

describe('resolveNumericCode', () => {
  const registry = testRegistry();

  it('reads the numeric code of a validated currency', () => {
    const code = validateCurrencyCode('KWD', registry)._unsafeUnwrap();

    expect(resolveNumericCode(code, registry)._unsafeUnwrap()).toBe(414);
  });
});
