import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { CurrencyDataError, CurrencyDataErrorCodes } from './errors.js';

/**
 * Required keys of the currency properties input. Key order is the order in
 * which a missing key is reported.
 */
export const CurrencyDataPropertiesSchema = z
  .object({
    formatVersion: z.string(),
    dataVersion: z.string(),
    all: z.string(),
    minor0: z.string(),
    minor1: z.string(),
    minor3: z.string(),
    minorUndefined: z.string(),
  })
  .passthrough();

export interface CurrencyDataInput {
  formatVersion: number;
  dataVersion: number;
  /** Registry records, `AAA000-BBB111-...` */
  all: string;
  minor0: string;
  minor1: string;
  minor3: string;
  minorUndefined: string;
  /** Two-letter country code → raw currency value (empty, `AAA`, or `OLD;time;NEW`). */
  countries: ReadonlyMap<string, string>;
}

const COUNTRY_KEY_PATTERN = /^[A-Z]{2}$/;
const INT32_PATTERN = /^[+-]?\d+$/;
const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * Parse a decimal 32-bit signed integer the way version numbers are written
 * in the properties file (optional sign, digits only).
 */
export function parseInt32(value: string): number | undefined {
  if (!INT32_PATTERN.test(value)) {
    return undefined;
  }
  const parsed = Number(value);
  return parsed >= INT32_MIN && parsed <= INT32_MAX ? parsed : undefined;
}

function parseVersion(key: 'formatVersion' | 'dataVersion', value: string): Result<number, CurrencyDataError> {
  const parsed = parseInt32(value);
  if (parsed === undefined) {
    return err(
      new CurrencyDataError(CurrencyDataErrorCodes.InvalidVersionNumber, `${key} is not a 32-bit integer: "${value}"`, {
        key,
        value,
      })
    );
  }
  return ok(parsed);
}

/**
 * Validate the raw key/value mapping read from the properties file and pull
 * out the required keys and the country entries.
 */
export function readCurrencyDataInput(properties: Readonly<Record<string, unknown>>): Result<CurrencyDataInput, CurrencyDataError> {
  const parsed = CurrencyDataPropertiesSchema.safeParse(properties);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join('.') ?? 'unknown';
    return err(
      new CurrencyDataError(CurrencyDataErrorCodes.MissingInputKey, `not all required data is defined in input: ${key}`, {
        key,
      })
    );
  }

  const data = parsed.data;
  const countries = new Map<string, string>();
  for (const [key, value] of Object.entries(properties)) {
    if (COUNTRY_KEY_PATTERN.test(key) && typeof value === 'string') {
      countries.set(key, value);
    }
  }

  return parseVersion('formatVersion', data.formatVersion).andThen((formatVersion) =>
    parseVersion('dataVersion', data.dataVersion).map((dataVersion) => ({
      formatVersion,
      dataVersion,
      all: data.all,
      minor0: data.minor0,
      minor1: data.minor1,
      minor3: data.minor3,
      minorUndefined: data.minorUndefined,
      countries,
    }))
  );
}
