import { err, ok, type Result } from 'neverthrow';

import { REGISTRY_RECORD_WIDTH, REGISTRY_SEPARATOR } from './constants.js';
import { CurrencyDataError, CurrencyDataErrorCodes } from './errors.js';
import type { CurrencyDataInput } from './input.js';

export interface RegistryRecord {
  /** Code exactly as listed; format is checked by validateCurrencyCode(). */
  code: string;
  numericCode: number;
}

/**
 * Minor-unit partitions. Each is a concatenation of 3-letter codes with no
 * delimiter, matched by substring containment.
 */
export interface MinorUnitSets {
  minor0: string;
  minor1: string;
  minor3: string;
  minorUndefined: string;
}

const NUMERIC_FIELD_PATTERN = /^\d{3}$/;

function malformed(message: string, context: Record<string, unknown>): CurrencyDataError {
  return new CurrencyDataError(CurrencyDataErrorCodes.MalformedRegistryString, message, context);
}

/**
 * Authoritative list of valid currency codes with their numeric codes, plus
 * the minor-unit partitions. Read-only once parsed.
 */
export class CurrencyRegistry {
  private readonly numericCodes: ReadonlyMap<string, number>;

  private constructor(
    readonly records: readonly RegistryRecord[],
    readonly minorUnits: MinorUnitSets
  ) {
    const numericCodes = new Map<string, number>();
    for (const record of records) {
      // first listing wins
      if (!numericCodes.has(record.code)) {
        numericCodes.set(record.code, record.numericCode);
      }
    }
    this.numericCodes = numericCodes;
  }

  static fromInput(input: Pick<CurrencyDataInput, 'all' | keyof MinorUnitSets>): Result<CurrencyRegistry, CurrencyDataError> {
    return parseRegistryRecords(input.all).map(
      (records) =>
        new CurrencyRegistry(records, {
          minor0: input.minor0,
          minor1: input.minor1,
          minor3: input.minor3,
          minorUndefined: input.minorUndefined,
        })
    );
  }

  has(code: string): boolean {
    return this.numericCodes.has(code);
  }

  numericCodeOf(code: string): number | undefined {
    return this.numericCodes.get(code);
  }
}

/**
 * Split the `all` string into fixed-width records.
 *
 * The string is `CCCNNN` records joined by '-', so its length is 7n - 1.
 */
export function parseRegistryRecords(all: string): Result<RegistryRecord[], CurrencyDataError> {
  if (all.length % REGISTRY_RECORD_WIDTH !== REGISTRY_RECORD_WIDTH - 1) {
    return err(malformed('"all" entry has incorrect size', { length: all.length }));
  }

  const records: RegistryRecord[] = [];
  const count = (all.length + 1) / REGISTRY_RECORD_WIDTH;
  for (let i = 0; i < count; i++) {
    const start = i * REGISTRY_RECORD_WIDTH;
    if (i > 0 && all.charAt(start - 1) !== REGISTRY_SEPARATOR) {
      return err(malformed('incorrect separator in "all" entry', { offset: start - 1, found: all.charAt(start - 1) }));
    }

    const code = all.substring(start, start + 3);
    const numericField = all.substring(start + 3, start + 6);
    if (!NUMERIC_FIELD_PATTERN.test(numericField)) {
      return err(malformed(`numeric code of ${code} is not three digits: "${numericField}"`, { code, numericField }));
    }
    records.push({ code, numericCode: Number.parseInt(numericField, 10) });
  }
  return ok(records);
}
