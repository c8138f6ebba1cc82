/**
 * Constants for compact dates.
 */

/**
 * Seconds in one UTC day. Leap seconds are not modelled.
 */
export const SECONDS_PER_DAY = 60 * 60 * 24;

/**
 * Milliseconds in one UTC day.
 */
export const MS_PER_DAY = SECONDS_PER_DAY * 1000;

/**
 * Number of distinct day counts a 16-bit date can hold.
 */
export const DAY_COUNT = 1 << 16;

/**
 * Largest day count (2149-06-06).
 */
export const MAX_DAY = DAY_COUNT - 1;

/**
 * Last representable Unix second (2149-06-06T23:59:59Z).
 */
export const MAX_UNIX_SECONDS = DAY_COUNT * SECONDS_PER_DAY - 1;

/**
 * Named layouts understood by formatInstant / parseInstant.
 * Token reference lives in the core layout module.
 */
export const LAYOUTS = {
    ISO_DATE: 'YYYY-MM-DD',
    AMERICAN_SHORT: 'M-D-YY',
    RFC3339: 'YYYY-MM-DDTHH:mm:ssZ',
} as const;

/**
 * Defaults for today().
 * 'zero' substitutes 1970-01-01 once the clock passes the representable range.
 */
export const TODAY_CONFIG = {
    ON_OUT_OF_RANGE: 'zero',
} as const;
