/**
 * Compact calendar dates: whole days since 1970-01-01, 16 bits wide.
 * Range is 1970-01-01 (0) through 2149-06-06 (65535).
 *
 * Converting from an instant keeps the date as observed in the instant's
 * own zone; converting back yields midnight in the requested zone.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Clock and local zone are injectable.
 */

import {
    DAY_COUNT,
    LAYOUTS,
    MAX_UNIX_SECONDS,
    MS_PER_DAY,
    OutOfRangeError,
    SECONDS_PER_DAY,
    type CalendarParts,
} from '../types/index.js';
import { UTC, systemLocalZone, type Zone } from '../zone/zone.js';
import { instantIn, unixSeconds, utcMs, wallClock, type ZonedInstant } from '../zone/instant.js';
import { formatInstant, parseInstant } from '../layout/layout.js';

export type EpochDate = number & { readonly __brand: 'EpochDate' };

/**
 * Direct construction from a day count, wrapping like an unsigned 16-bit
 * integer (-1 => 65535, 65536 => 0). Non-finite input becomes 0.
 */
export function epochDate(days: number): EpochDate {
    const n = Number.isFinite(days) ? Math.trunc(days) : 0;
    return (((n % DAY_COUNT) + DAY_COUNT) % DAY_COUNT) as EpochDate;
}

/**
 * 1970-01-01.
 */
export const EPOCH_DATE_ZERO = epochDate(0);

// ============================================================================
// Range validation
// ============================================================================

/**
 * True iff `seconds` can be turned into a date: 0 <= seconds <= MAX_UNIX_SECONDS.
 */
export function isRepresentableSeconds(seconds: number): boolean {
    return Number.isFinite(seconds) && seconds >= 0 && seconds <= MAX_UNIX_SECONDS;
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Date containing the given Unix second, UTC-day semantics.
 * The caller is responsible for any zone normalization.
 *
 * @throws OutOfRangeError unless isRepresentableSeconds(seconds)
 */
export function fromUnixSeconds(seconds: number): EpochDate {
    if (!isRepresentableSeconds(seconds)) {
        throw new OutOfRangeError(seconds);
    }
    return epochDate(Math.floor(seconds / SECONDS_PER_DAY));
}

/**
 * Date for a Gregorian year/month/day (month is 1-based).
 * Overflowing months and days roll over (2026-02-30 => 2026-03-02).
 *
 * @throws OutOfRangeError outside 1970-01-01..2149-06-06
 */
export function fromCalendarDate(year: number, month: number, day: number): EpochDate {
    return fromUnixSeconds(utcMs({ year, month, day }) / 1000);
}

/**
 * Calendar date of the instant as seen on its own zone's wall clock.
 *
 * Local midnight 2149-06-06 at UTC-12 and at UTC+14 are 26 hours apart
 * but both yield 2149-06-06.
 *
 * @throws OutOfRangeError if that wall-clock date is not representable
 */
export function fromInstant(instant: ZonedInstant): EpochDate {
    const offset = instant.zone.offsetAt(instant.epochMs);
    return fromUnixSeconds(unixSeconds(instant) + offset);
}

/**
 * Parse text with a layout and take its date.
 *
 * Time-of-day fields are validated but do not move the date: the offset
 * normalization in fromInstant cancels the zone back out.
 *
 * @throws DateParseError if the text does not match the layout
 * @throws OutOfRangeError if the date is not representable
 */
export function parse(layout: string, text: string, zone: Zone = UTC): EpochDate {
    return fromInstant(parseInstant(layout, text, zone));
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * UTC midnight of the date.
 */
export function toUtcInstant(date: EpochDate): ZonedInstant {
    return instantIn(date * MS_PER_DAY, UTC);
}

/**
 * Midnight of the date on `zone`'s wall clock (not UTC midnight re-read
 * in `zone`).
 */
export function toInstantIn(date: EpochDate, zone: Zone): ZonedInstant {
    const utcMidnight = date * MS_PER_DAY;
    const offset = zone.offsetAt(utcMidnight);
    return instantIn(utcMidnight - offset * 1000, zone);
}

/**
 * Midnight of the date in the local zone.
 */
export function toLocalInstant(date: EpochDate, zone: Zone = systemLocalZone()): ZonedInstant {
    return toInstantIn(date, zone);
}

export function calendarParts(date: EpochDate): CalendarParts {
    const { year, month, day } = wallClock(toUtcInstant(date));
    return { year, month, day };
}

export function toUnixSeconds(date: EpochDate): number {
    return date * SECONDS_PER_DAY;
}

/**
 * Nanoseconds since epoch. A bigint: 65535 days in ns exceeds 2^53.
 */
export function toUnixNanos(date: EpochDate): bigint {
    return BigInt(date) * BigInt(SECONDS_PER_DAY) * 1_000_000_000n;
}

/**
 * Format UTC midnight of the date. Time fields render as 00, Z as 'Z'.
 */
export function format(date: EpochDate, layout: string): string {
    return formatInstant(toUtcInstant(date), layout);
}

/**
 * Canonical YYYY-MM-DD.
 */
export function toText(date: EpochDate): string {
    return format(date, LAYOUTS.ISO_DATE);
}

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * Shift by whole days. Wraps at the 16-bit boundary, like epochDate().
 */
export function addDays(date: EpochDate, days: number): EpochDate {
    return epochDate(date + days);
}

/**
 * Negative if a is earlier, 0 if equal, positive if later.
 */
export function compareDates(a: EpochDate, b: EpochDate): number {
    return a - b;
}
