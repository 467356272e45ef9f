import { err, ok, type Result } from 'neverthrow';

import { CUT_OVER_SANITY_WINDOW_MS } from './constants.js';
import { CurrencyDataError, CurrencyDataErrorCodes } from './errors.js';

const CUT_OVER_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})-(\d{1,2})-(\d{1,2})-(\d{1,2})$/;

/**
 * Parse a `yyyy-MM-dd-HH-mm-ss` UTC timestamp into epoch milliseconds.
 * Fields after the year may drop their leading zero (`2023-1-1-0-0-0`).
 * Fields must be in range for the calendar date they name (no rollover of
 * 2023-02-30 into March).
 */
export function parseCutOverTime(text: string): Result<number, CurrencyDataError> {
  const malformed = (): CurrencyDataError =>
    new CurrencyDataError(
      CurrencyDataErrorCodes.MalformedSpecialCaseString,
      `invalid cut-over time, expected yyyy-MM-dd-HH-mm-ss: ${text}`,
      { cutOver: text }
    );

  const match = CUT_OVER_PATTERN.exec(text);
  if (!match) {
    return err(malformed());
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map((field) => Number.parseInt(field, 10));
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return err(malformed());
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return err(malformed());
  }
  return ok(date.getTime());
}

export function checkCutOverSanity(time: number, now: number): Result<number, CurrencyDataError> {
  if (Math.abs(time - now) > CUT_OVER_SANITY_WINDOW_MS) {
    return err(
      new CurrencyDataError(
        CurrencyDataErrorCodes.CutOverTimeOutOfSanityWindow,
        `cut-over time is more than 100 years from present: ${new Date(time).toISOString()}`,
        { time, now }
      )
    );
  }
  return ok(time);
}
