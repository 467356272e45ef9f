import { CurrencyRegistry } from '../registry.js';

/** 2024-01-01T00:00:00Z; keeps the cut-over sanity window deterministic. */
export const FIXED_NOW = Date.UTC(2024, 0, 1);
export const fixedClock = (): number => FIXED_NOW;

export const TEST_REGISTRY = {
  all: 'ABC111-CHF756-CHW948-EUR978-JPY392-KWD414-USD840-USN997-XAU959-XB5955-XYZ222-ZWL932',
  minor0: 'JPY',
  minor1: '',
  minor3: 'KWD',
  minorUndefined: 'XAUXB5',
};

/**
 * Small but complete properties mapping:
 * simple (CH, JP, KW, US), no currency (EA), shared special case (DE, FR)
 * and a currency transition (XX).
 */
export function buildProperties(overrides: Record<string, string | undefined> = {}): Record<string, string> {
  const base: Record<string, string | undefined> = {
    formatVersion: '3',
    dataVersion: '170',
    ...TEST_REGISTRY,
    CH: 'CHF',
    DE: 'EUR',
    EA: '',
    FR: 'EUR',
    JP: 'JPY',
    KW: 'KWD',
    US: 'USD',
    XX: 'ABC;2020-01-01-00-00-00;XYZ',
    ...overrides,
  };

  const properties: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      properties[key] = value;
    }
  }
  return properties;
}

export function testRegistry(overrides: Partial<typeof TEST_REGISTRY> = {}): CurrencyRegistry {
  return CurrencyRegistry.fromInput({ ...TEST_REGISTRY, ...overrides })._unsafeUnwrap();
}
