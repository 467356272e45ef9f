// Layout constants shared with the runtime reader of the generated file.

export const MAGIC_NUMBER = 0x43757244; // 'CurD'

/** Number of letters A..Z; the main table is A_TO_Z × A_TO_Z entries. */
export const A_TO_Z = 26;
export const MAIN_TABLE_SIZE = A_TO_Z * A_TO_Z;
/** Letter offsets in entries are relative to 'A'. */
export const LETTER_OFFSET_BASE = 0x41;

export const INVALID_COUNTRY_ENTRY = 0x007f;
export const COUNTRY_WITHOUT_CURRENCY_ENTRY = 0x0080;

export const SIMPLE_CASE_COUNTRY_MASK = 0x0000;
export const SIMPLE_CASE_COUNTRY_FINAL_CHAR_MASK = 0x001f;
export const SIMPLE_CASE_COUNTRY_DEFAULT_DIGITS_MASK = 0x0060;
export const SIMPLE_CASE_COUNTRY_DEFAULT_DIGITS_SHIFT = 5;

export const SPECIAL_CASE_COUNTRY_MASK = 0x0080;
export const SPECIAL_CASE_COUNTRY_INDEX_MASK = 0x001f;
/** Index 0 in an entry means "no special case", so stored indices are offset by one. */
export const SPECIAL_CASE_COUNTRY_INDEX_DELTA = 1;

export const NUMERIC_CODE_MASK = 0x0003ff00;
export const NUMERIC_CODE_SHIFT = 8;

export const MAX_SPECIAL_CASES = 30;
export const MAX_OTHER_CURRENCIES = 70;

/** Cut-over time of a special case that never changes currency: 2^63 - 1, the largest int64. */
export const NEVER_CUT_OVER = 0x7fffffffffffffffn;

export const CUT_OVER_SANITY_WINDOW_MS = 100 * 365 * 24 * 60 * 60 * 1000;

/** Fixed width of one `all` record: 3-letter code + 3-digit numeric code + separator. */
export const REGISTRY_RECORD_WIDTH = 7;
export const REGISTRY_SEPARATOR = '-';

export const OTHER_CURRENCIES_SEPARATOR = '-';
