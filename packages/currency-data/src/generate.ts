import { getLogger } from '@curdata/logger';
import type { Result } from 'neverthrow';

import { encodeCurrencyData } from './encoder.js';
import type { CurrencyDataError } from './errors.js';
import type { CurrencyDataTables } from './image.js';
import { readCurrencyDataInput } from './input.js';
import { buildMainTable } from './main-table.js';
import { buildOtherCurrencyTable } from './other-currencies.js';
import { CurrencyRegistry } from './registry.js';
import { SpecialCaseRegistry } from './special-cases.js';

const logger = getLogger('CurrencyData');

export interface GenerateOptions {
  /** Clock for the cut-over sanity window; defaults to Date.now. */
  now?: (() => number) | undefined;
}

export interface GeneratedCurrencyData {
  tables: CurrencyDataTables;
  bytes: Uint8Array;
}

/**
 * Validate the properties and build every table, without serializing.
 */
export function buildCurrencyDataTables(
  properties: Readonly<Record<string, unknown>>,
  options: GenerateOptions = {}
): Result<CurrencyDataTables, CurrencyDataError> {
  return readCurrencyDataInput(properties).andThen((input) =>
    CurrencyRegistry.fromInput(input).andThen((registry) => {
      logger.debug({ currencies: registry.records.length, countries: input.countries.size }, 'Read currency input');

      const specialCases = new SpecialCaseRegistry(registry, { now: options.now });
      return buildMainTable(input.countries, registry, specialCases).andThen((mainTable) =>
        buildOtherCurrencyTable(registry, mainTable).map(
          (otherCurrencies): CurrencyDataTables => ({
            formatVersion: input.formatVersion,
            dataVersion: input.dataVersion,
            mainTable,
            specialCases: [...specialCases.records],
            otherCurrencies,
          })
        )
      );
    })
  );
}

/**
 * Full pipeline: properties → tables → bytes. Deterministic for a given
 * input and clock.
 */
export function generateCurrencyData(
  properties: Readonly<Record<string, unknown>>,
  options: GenerateOptions = {}
): Result<GeneratedCurrencyData, CurrencyDataError> {
  return buildCurrencyDataTables(properties, options).andThen((tables) =>
    encodeCurrencyData(tables).map((bytes) => {
      logger.debug(
        {
          specialCases: tables.specialCases.length,
          otherCurrencies: tables.otherCurrencies.records.length,
          bytes: bytes.length,
        },
        'Encoded currency data'
      );
      return { tables, bytes };
    })
  );
}
