/**
 * Time zones as offset functions.
 *
 * ARCHITECTURAL NOTE: No tz database bundled. IANA zones go through
 * Intl.DateTimeFormat, the local zone through Date#getTimezoneOffset.
 */

import { InvalidZoneError } from '../types/index.js';
import { utcMs } from './instant.js';

/**
 * A zone maps an absolute instant to its UTC offset.
 */
export interface Zone {
    readonly name: string;
    /** Offset in seconds east of UTC in effect at epochMs. */
    offsetAt(epochMs: number): number;
}

/**
 * Zone with a constant offset.
 */
export function fixedZone(name: string, offsetSeconds: number): Zone {
    return {
        name,
        offsetAt: () => offsetSeconds,
    };
}

export const UTC: Zone = fixedZone('UTC', 0);

/**
 * IANA zone backed by the runtime's ICU data.
 *
 * @throws InvalidZoneError if the runtime does not know the name
 */
export function ianaZone(name: string): Zone {
    let formatter: Intl.DateTimeFormat;
    try {
        formatter = new Intl.DateTimeFormat('en-US', {
            timeZone: name,
            hourCycle: 'h23',
            year: 'numeric',
            month: 'numeric',
            day: 'numeric',
            hour: 'numeric',
            minute: 'numeric',
            second: 'numeric',
        });
    } catch (err) {
        if (err instanceof RangeError) {
            throw new InvalidZoneError(name);
        }
        throw err;
    }

    return {
        name,
        offsetAt: (epochMs) => offsetFromParts(formatter, epochMs),
    };
}

/**
 * The process's local zone.
 */
export function systemLocalZone(): Zone {
    return {
        name: Intl.DateTimeFormat().resolvedOptions().timeZone,
        // getTimezoneOffset is minutes west of UTC
        offsetAt: (epochMs) => (0 - new Date(epochMs).getTimezoneOffset()) * 60,
    };
}

function offsetFromParts(formatter: Intl.DateTimeFormat, epochMs: number): number {
    const fields: Record<string, number> = {};
    for (const part of formatter.formatToParts(new Date(epochMs))) {
        if (part.type !== 'literal') {
            fields[part.type] = parseInt(part.value, 10);
        }
    }

    const wall = utcMs({
        year: fields.year,
        month: fields.month,
        day: fields.day,
        hour: fields.hour,
        minute: fields.minute,
        second: fields.second,
    });

    // Compare at whole-second precision; formatToParts drops milliseconds.
    const wholeSecondMs = Math.floor(epochMs / 1000) * 1000;
    return Math.round((wall - wholeSecondMs) / 1000);
}
