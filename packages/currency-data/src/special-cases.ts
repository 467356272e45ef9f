import { getLogger } from '@curdata/logger';
import { err, ok, type Result } from 'neverthrow';

import { MAX_SPECIAL_CASES, NEVER_CUT_OVER } from './constants.js';
import { validateCurrencyCode } from './currency-code.js';
import { checkCutOverSanity, parseCutOverTime } from './cut-over-time.js';
import { CurrencyDataError, CurrencyDataErrorCodes } from './errors.js';
import { resolveFractionDigits } from './fraction-digits.js';
import { resolveNumericCode } from './numeric-code.js';
import type { CurrencyRegistry } from './registry.js';
import type { CurrencyCode, FractionDigits } from './types.js';

const logger = getLogger('SpecialCases');

/**
 * Side-table record for a country whose currency cannot be packed into its
 * main-table entry.
 *
 * A record without a successor has `cutOverTime === NEVER_CUT_OVER`, no
 * `newCurrency`, and zero for the new digits and numeric code.
 */
export interface SpecialCaseRecord {
  /** Raw property value the record was built from. */
  source: string;
  /** Epoch milliseconds, or NEVER_CUT_OVER. */
  cutOverTime: bigint;
  oldCurrency: CurrencyCode;
  newCurrency: CurrencyCode | undefined;
  oldFractionDigits: FractionDigits;
  newFractionDigits: FractionDigits;
  oldNumericCode: number;
  newNumericCode: number;
}

export interface SpecialCaseRegistryOptions {
  /** Clock for the cut-over sanity window. */
  now?: (() => number) | undefined;
  capacity?: number | undefined;
}

interface ResolvedCurrency {
  code: CurrencyCode;
  fractionDigits: FractionDigits;
  numericCode: number;
}

const TRANSITION_DELIMITER = ';';

/**
 * Interns special-case descriptions. Identical raw strings share one record,
 * so indices are stable for a given input order.
 */
export class SpecialCaseRegistry {
  private readonly entries: SpecialCaseRecord[] = [];
  private readonly indexBySource = new Map<string, number>();
  private readonly now: () => number;
  private readonly capacity: number;

  constructor(
    private readonly registry: CurrencyRegistry,
    options: SpecialCaseRegistryOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.capacity = options.capacity ?? MAX_SPECIAL_CASES;
  }

  get size(): number {
    return this.entries.length;
  }

  get records(): readonly SpecialCaseRecord[] {
    return this.entries;
  }

  /**
   * Return the 0-based index of the record for `rawSpec`, creating it on
   * first sight.
   *
   * Accepts a bare currency code (`AAA`) or a transition `OLD;yyyy-MM-dd-HH-mm-ss;NEW`.
   */
  intern(rawSpec: string): Result<number, CurrencyDataError> {
    const existing = this.indexBySource.get(rawSpec);
    if (existing !== undefined) {
      return ok(existing);
    }

    if (this.entries.length >= this.capacity) {
      return err(
        new CurrencyDataError(CurrencyDataErrorCodes.TooManySpecialCases, 'too many special cases', {
          capacity: this.capacity,
          source: rawSpec,
        })
      );
    }

    const record = rawSpec.length === 3 ? this.buildFixed(rawSpec) : this.buildTransition(rawSpec);
    return record.map((value) => {
      const index = this.entries.length;
      this.entries.push(value);
      this.indexBySource.set(rawSpec, index);
      logger.debug({ index, source: rawSpec }, 'Registered special case');
      return index;
    });
  }

  private buildFixed(rawSpec: string): Result<SpecialCaseRecord, CurrencyDataError> {
    return this.resolve(rawSpec).map((currency) => ({
      source: rawSpec,
      cutOverTime: NEVER_CUT_OVER,
      oldCurrency: currency.code,
      newCurrency: undefined,
      oldFractionDigits: currency.fractionDigits,
      newFractionDigits: 0,
      oldNumericCode: currency.numericCode,
      newNumericCode: 0,
    }));
  }

  private buildTransition(rawSpec: string): Result<SpecialCaseRecord, CurrencyDataError> {
    const length = rawSpec.length;
    if (length < 8 || rawSpec.charAt(3) !== TRANSITION_DELIMITER || rawSpec.charAt(length - 4) !== TRANSITION_DELIMITER) {
      return err(
        new CurrencyDataError(
          CurrencyDataErrorCodes.MalformedSpecialCaseString,
          `invalid currency info: ${rawSpec}`,
          { source: rawSpec }
        )
      );
    }

    const oldCode = rawSpec.substring(0, 3);
    const newCode = rawSpec.substring(length - 3);
    const timeText = rawSpec.substring(4, length - 4);

    return this.resolve(oldCode).andThen((oldCurrency) =>
      this.resolve(newCode).andThen((newCurrency) =>
        parseCutOverTime(timeText)
          .andThen((time) => checkCutOverSanity(time, this.now()))
          .map((time) => ({
            source: rawSpec,
            cutOverTime: BigInt(time),
            oldCurrency: oldCurrency.code,
            newCurrency: newCurrency.code,
            oldFractionDigits: oldCurrency.fractionDigits,
            newFractionDigits: newCurrency.fractionDigits,
            oldNumericCode: oldCurrency.numericCode,
            newNumericCode: newCurrency.numericCode,
          }))
      )
    );
  }

  private resolve(rawCode: string): Result<ResolvedCurrency, CurrencyDataError> {
    return validateCurrencyCode(rawCode, this.registry).andThen((code) =>
      resolveNumericCode(code, this.registry).map((numericCode) => ({
        code,
        fractionDigits: resolveFractionDigits(code, this.registry.minorUnits),
        numericCode,
      }))
    );
  }
}
