import type { MinorUnitSets } from './registry.js';
import type { FractionDigits } from './types.js';

/**
 * Default number of minor-unit digits for a currency.
 *
 * Partitions are consulted in a fixed order (0, 1, 3, undefined); a code in
 * none of them has 2 digits.
 */
export function resolveFractionDigits(code: string, minorUnits: MinorUnitSets): FractionDigits {
  if (minorUnits.minor0.includes(code)) {
    return 0;
  }
  if (minorUnits.minor1.includes(code)) {
    return 1;
  }
  if (minorUnits.minor3.includes(code)) {
    return 3;
  }
  if (minorUnits.minorUndefined.includes(code)) {
    return -1;
  }
  return 2;
}
