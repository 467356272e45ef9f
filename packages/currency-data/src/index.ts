export * from './constants.js';
export * from './errors.js';
export type { CurrencyCode, FractionDigits, PackableFractionDigits } from './types.js';
export { CurrencyDataPropertiesSchema, readCurrencyDataInput, type CurrencyDataInput } from './input.js';
export { CurrencyRegistry, parseRegistryRecords, type MinorUnitSets, type RegistryRecord } from './registry.js';
export { LEGACY_CURRENCY_CODES, isWellFormedCurrencyCode, validateCurrencyCode } from './currency-code.js';
export { resolveFractionDigits } from './fraction-digits.js';
export { resolveNumericCode } from './numeric-code.js';
export { checkCutOverSanity, parseCutOverTime } from './cut-over-time.js';
export { SpecialCaseRegistry, type SpecialCaseRecord, type SpecialCaseRegistryOptions } from './special-cases.js';
export {
  buildMainTable,
  buildMainTableEntry,
  countryCodeAt,
  mainTableIndexOf,
  packMainTableEntry,
  unpackMainTableEntry,
  type MainTable,
  type MainTableEntry,
  type MainTableEntryKind,
} from './main-table.js';
export {
  buildOtherCurrencyTable,
  isReachableFromMainTable,
  type OtherCurrencyRecord,
  type OtherCurrencyTable,
  type OtherCurrencyTableOptions,
} from './other-currencies.js';
export {
  toCurrencyDataImage,
  type CurrencyDataImage,
  type CurrencyDataTables,
  type SpecialCaseRow,
} from './image.js';
export { encodeCurrencyData, encodeCurrencyDataImage } from './encoder.js';
export { decodeCurrencyData } from './decoder.js';
export {
  buildCurrencyDataTables,
  generateCurrencyData,
  type GenerateOptions,
  type GeneratedCurrencyData,
} from './generate.js';
