/**
 * Failure kinds raised while turning currency properties into the binary
 * lookup table. Every kind is fatal: the pipeline stops at the first one.
 */
export const CurrencyDataErrorCodes = {
  InputReadFailure: 'INPUT_READ_FAILURE',
  MissingInputKey: 'MISSING_INPUT_KEY',
  InvalidVersionNumber: 'INVALID_VERSION_NUMBER',
  InvalidCurrencyCodeFormat: 'INVALID_CURRENCY_CODE_FORMAT',
  UnknownCurrencyCode: 'UNKNOWN_CURRENCY_CODE',
  FractionDigitsOutOfRange: 'FRACTION_DIGITS_OUT_OF_RANGE',
  NumericCodeOutOfRange: 'NUMERIC_CODE_OUT_OF_RANGE',
  MalformedSpecialCaseString: 'MALFORMED_SPECIAL_CASE_STRING',
  CutOverTimeOutOfSanityWindow: 'CUT_OVER_TIME_OUT_OF_SANITY_WINDOW',
  TooManySpecialCases: 'TOO_MANY_SPECIAL_CASES',
  TooManyOtherCurrencies: 'TOO_MANY_OTHER_CURRENCIES',
  MalformedRegistryString: 'MALFORMED_REGISTRY_STRING',
  EncodedStringTooLong: 'ENCODED_STRING_TOO_LONG',
  MalformedBinaryImage: 'MALFORMED_BINARY_IMAGE',
  OutputWriteFailure: 'OUTPUT_WRITE_FAILURE',
  UsageError: 'USAGE_ERROR',
} as const;

export type CurrencyDataErrorCode = (typeof CurrencyDataErrorCodes)[keyof typeof CurrencyDataErrorCodes];

export class CurrencyDataError extends Error {
  readonly code: CurrencyDataErrorCode;
  readonly context: Record<string, unknown> | undefined;

  constructor(code: CurrencyDataErrorCode, message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'CurrencyDataError';
    this.code = code;
    this.context = context;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

export function isCurrencyDataError(error: unknown): error is CurrencyDataError {
  return error instanceof CurrencyDataError;
}
