/**
 * Layout-driven formatting and parsing of zone-aware instants.
 *
 * Tokens (longest match wins; anything else is literal, [text] is escaped):
 *   YYYY  4-digit year          YY   2-digit year (69-99 => 19xx, else 20xx)
 *   MMM   Jan..Dec             MM   2-digit month    M  month, 1-2 digits
 *   DD    2-digit day          D    day, 1-2 digits
 *   HH    hour 00-23           mm   minute           ss second
 *   SSS   millisecond          Z    'Z' or +hh:mm
 */

import { DateParseError } from '../types/index.js';
import { UTC, fixedZone, type Zone } from '../zone/zone.js';
import {
    fromWallClock,
    utcMs,
    wallClock,
    type WallClock,
    type ZonedInstant,
} from '../zone/instant.js';

export type LayoutToken = 'YYYY' | 'YY' | 'MMM' | 'MM' | 'M' | 'DD' | 'D' | 'HH' | 'mm' | 'ss' | 'SSS' | 'Z';

export type LayoutPart =
    | { kind: 'token'; token: LayoutToken }
    | { kind: 'literal'; text: string };

// Longest first so 'YYYY' wins over 'YY', 'MMM' over 'MM' over 'M'.
const TOKENS: readonly LayoutToken[] = ['YYYY', 'SSS', 'MMM', 'YY', 'MM', 'DD', 'HH', 'mm', 'ss', 'M', 'D', 'Z'];

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

/**
 * Split a layout into tokens and literal runs.
 */
export function tokenizeLayout(layout: string): LayoutPart[] {
    const parts: LayoutPart[] = [];
    let literal = '';
    let i = 0;

    const flush = () => {
        if (literal) {
            parts.push({ kind: 'literal', text: literal });
            literal = '';
        }
    };

    while (i < layout.length) {
        if (layout[i] === '[') {
            const close = layout.indexOf(']', i + 1);
            if (close !== -1) {
                literal += layout.slice(i + 1, close);
                i = close + 1;
                continue;
            }
        }

        const token = TOKENS.find(t => layout.startsWith(t, i));
        if (token) {
            flush();
            parts.push({ kind: 'token', token });
            i += token.length;
        } else {
            literal += layout[i];
            i += 1;
        }
    }

    flush();
    return parts;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Render an instant's wall clock (in its own zone) with the given layout.
 */
export function formatInstant(instant: ZonedInstant, layout: string): string {
    const clock = wallClock(instant);
    return tokenizeLayout(layout)
        .map(part => (part.kind === 'literal' ? part.text : formatToken(part.token, clock)))
        .join('');
}

function formatToken(token: LayoutToken, clock: WallClock): string {
    switch (token) {
        case 'YYYY':
            return pad(clock.year, 4);
        case 'YY':
            return pad(clock.year % 100, 2);
        case 'MMM':
            return MONTH_NAMES[clock.month - 1];
        case 'MM':
            return pad(clock.month, 2);
        case 'M':
            return String(clock.month);
        case 'DD':
            return pad(clock.day, 2);
        case 'D':
            return String(clock.day);
        case 'HH':
            return pad(clock.hour, 2);
        case 'mm':
            return pad(clock.minute, 2);
        case 'ss':
            return pad(clock.second, 2);
        case 'SSS':
            return pad(clock.millisecond, 3);
        case 'Z':
            return formatOffset(clock.offsetSeconds);
    }
}

function formatOffset(offsetSeconds: number): string {
    if (offsetSeconds === 0) return 'Z';
    const sign = offsetSeconds < 0 ? '-' : '+';
    const minutes = Math.floor(Math.abs(offsetSeconds) / 60);
    return `${sign}${pad(Math.floor(minutes / 60), 2)}:${pad(minutes % 60, 2)}`;
}

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

// ============================================================================
// Parsing
// ============================================================================

interface ParsedFields {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    millisecond: number;
    offsetSeconds: number | null;
}

/**
 * Parse text into a zone-aware instant.
 *
 * Fields missing from the layout default to year 0, January 1, midnight.
 * A Z field fixes the zone; otherwise the wall clock is read in `zone`.
 *
 * @throws DateParseError on mismatch, trailing text or out-of-range fields
 */
export function parseInstant(layout: string, text: string, zone: Zone = UTC): ZonedInstant {
    const fail = (reason: string): never => {
        throw new DateParseError(layout, text, reason);
    };

    const fields: ParsedFields = {
        year: 0,
        month: 1,
        day: 1,
        hour: 0,
        minute: 0,
        second: 0,
        millisecond: 0,
        offsetSeconds: null,
    };
    let pos = 0;

    const digits = (min: number, max: number, what: string): number => {
        let end = pos;
        while (end < text.length && end - pos < max && isDigit(text[end])) end++;
        if (end - pos < min) fail(`expected ${what} at position ${pos}`);
        const value = parseInt(text.slice(pos, end), 10);
        pos = end;
        return value;
    };

    const parseOffset = (): number => {
        if (text[pos] === 'Z') {
            pos += 1;
            return 0;
        }
        const match = /^([+-])(\d{2}):?(\d{2})/.exec(text.slice(pos));
        if (!match) return fail(`expected zone offset at position ${pos}`);
        pos += match[0].length;
        const hours = parseInt(match[2], 10);
        const minutes = parseInt(match[3], 10);
        if (hours > 23 || minutes > 59) fail('zone offset out of range');
        const seconds = (hours * 60 + minutes) * 60;
        return match[1] === '-' ? -seconds : seconds;
    };

    for (const part of tokenizeLayout(layout)) {
        if (part.kind === 'literal') {
            if (!text.startsWith(part.text, pos)) {
                fail(`expected "${part.text}" at position ${pos}`);
            }
            pos += part.text.length;
            continue;
        }

        switch (part.token) {
            case 'YYYY':
                fields.year = digits(4, 4, '4-digit year');
                break;
            case 'YY': {
                const yy = digits(2, 2, '2-digit year');
                fields.year = yy >= 69 ? 1900 + yy : 2000 + yy;
                break;
            }
            case 'MMM': {
                const name = text.slice(pos, pos + 3).toLowerCase();
                const index = MONTH_NAMES.findIndex(m => m.toLowerCase() === name);
                if (index === -1) fail(`expected month name at position ${pos}`);
                fields.month = index + 1;
                pos += 3;
                break;
            }
            case 'MM':
                fields.month = digits(2, 2, '2-digit month');
                break;
            case 'M':
                fields.month = digits(1, 2, 'month');
                break;
            case 'DD':
                fields.day = digits(2, 2, '2-digit day');
                break;
            case 'D':
                fields.day = digits(1, 2, 'day');
                break;
            case 'HH':
                fields.hour = digits(2, 2, '2-digit hour');
                break;
            case 'mm':
                fields.minute = digits(2, 2, '2-digit minute');
                break;
            case 'ss':
                fields.second = digits(2, 2, '2-digit second');
                break;
            case 'SSS':
                fields.millisecond = digits(3, 3, '3-digit millisecond');
                break;
            case 'Z':
                fields.offsetSeconds = parseOffset();
                break;
        }
    }

    if (pos !== text.length) {
        fail(`unexpected trailing text "${text.slice(pos)}"`);
    }

    validateFields(fields, fail);

    const targetZone = fields.offsetSeconds === null
        ? zone
        : fields.offsetSeconds === 0
            ? UTC
            : fixedZone(formatOffset(fields.offsetSeconds), fields.offsetSeconds);

    return fromWallClock(fields, targetZone);
}

function validateFields(fields: ParsedFields, fail: (reason: string) => never): void {
    if (fields.month < 1 || fields.month > 12) fail('month out of range');
    if (fields.day < 1 || fields.day > daysInMonth(fields.year, fields.month)) fail('day out of range');
    if (fields.hour > 23) fail('hour out of range');
    if (fields.minute > 59) fail('minute out of range');
    if (fields.second > 59) fail('second out of range');
}

/**
 * Days in a Gregorian month (month is 1-based).
 */
export function daysInMonth(year: number, month: number): number {
    // Day 0 of the following month is the last day of this one.
    return new Date(utcMs({ year, month: month + 1, day: 0 })).getUTCDate();
}

function isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
}
