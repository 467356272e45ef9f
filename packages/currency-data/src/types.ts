/**
 * Three-character ISO 4217 currency code that passed validation.
 * Produced by validateCurrencyCode().
 */
export type CurrencyCode = string & { readonly _brand: 'CurrencyCode' };

/** Default minor-unit digits; -1 marks currencies whose minor unit is undefined. */
export type FractionDigits = -1 | 0 | 1 | 2 | 3;

/** Fraction digits that can be packed into a simple main-table entry. */
export type PackableFractionDigits = 0 | 1 | 2 | 3;
