/**
 * Zone-aware instants: an absolute point in time plus the zone it is read in.
 */

import type { Zone } from './zone.js';

export interface ZonedInstant {
    /** Milliseconds since 1970-01-01T00:00:00Z. */
    readonly epochMs: number;
    readonly zone: Zone;
}

/**
 * Wall-clock reading of an instant in its zone. Month is 1-based.
 */
export interface WallClock {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    millisecond: number;
    /** Offset in seconds east of UTC. */
    offsetSeconds: number;
}

export type WallClockFields = Pick<WallClock, 'year' | 'month' | 'day'> &
    Partial<Pick<WallClock, 'hour' | 'minute' | 'second' | 'millisecond'>>;

export function instantIn(epochMs: number, zone: Zone): ZonedInstant {
    return { epochMs, zone };
}

/**
 * Read the instant's wall clock in its own zone.
 */
export function wallClock(instant: ZonedInstant): WallClock {
    const offsetSeconds = instant.zone.offsetAt(instant.epochMs);
    const shifted = new Date(instant.epochMs + offsetSeconds * 1000);
    return {
        year: shifted.getUTCFullYear(),
        month: shifted.getUTCMonth() + 1,
        day: shifted.getUTCDate(),
        hour: shifted.getUTCHours(),
        minute: shifted.getUTCMinutes(),
        second: shifted.getUTCSeconds(),
        millisecond: shifted.getUTCMilliseconds(),
        offsetSeconds,
    };
}

/**
 * Instant at which the zone's wall clock reads the given fields.
 * Overflowing fields roll over (Feb 30 -> Mar 2), as Date.UTC does.
 *
 * A wall time skipped by a forward transition (e.g. midnight in
 * America/Santiago on DST start) resolves past the gap, to 01:00 rather
 * than 23:00 the day before.
 */
export function fromWallClock(fields: WallClockFields, zone: Zone): ZonedInstant {
    const local = utcMs(fields);
    // Second pass picks up an offset change between the guess and the answer.
    const guess = local - zone.offsetAt(local) * 1000;
    const offset = zone.offsetAt(guess);
    const result = local - offset * 1000;

    if (result + zone.offsetAt(result) * 1000 === local) {
        return instantIn(result, zone);
    }

    // Gap: apply the offset in effect just before the transition.
    const before = zone.offsetAt(result - 1);
    return instantIn(local - before * 1000, zone);
}

/**
 * Whole seconds since epoch (floor), ignoring the zone.
 */
export function unixSeconds(instant: ZonedInstant): number {
    return Math.floor(instant.epochMs / 1000);
}

/**
 * Date.UTC without the 0-99 => 1900-1999 year mapping.
 */
export function utcMs(fields: WallClockFields): number {
    const d = new Date(0);
    d.setUTCFullYear(fields.year, fields.month - 1, fields.day);
    d.setUTCHours(fields.hour ?? 0, fields.minute ?? 0, fields.second ?? 0, fields.millisecond ?? 0);
    return d.getTime();
}
