import { describe, it, expect } from 'vitest';
import { daysInMonth, formatInstant, parseInstant, tokenizeLayout } from '../../src/layout/layout.js';
import { UTC, fixedZone } from '../../src/zone/zone.js';
import { instantIn, wallClock } from '../../src/zone/instant.js';
import { DateParseError, LAYOUTS } from '../../src/types/index.js';

describe('tokenizeLayout', () => {
    it('splits tokens from literals', () => {
        expect(tokenizeLayout('YYYY-MM-DD')).toEqual([
            { kind: 'token', token: 'YYYY' },
            { kind: 'literal', text: '-' },
            { kind: 'token', token: 'MM' },
            { kind: 'literal', text: '-' },
            { kind: 'token', token: 'DD' },
        ]);
    });

    it('treats bracketed text as literal', () => {
        expect(tokenizeLayout('[Day] D')).toEqual([
            { kind: 'literal', text: 'Day ' },
            { kind: 'token', token: 'D' },
        ]);
    });

    it('prefers the longest token', () => {
        expect(tokenizeLayout('MMM')).toEqual([{ kind: 'token', token: 'MMM' }]);
    });
});

describe('formatInstant', () => {
    it('renders every numeric field', () => {
        const instant = instantIn(Date.UTC(2026, 0, 5, 7, 8, 9, 45), UTC);
        expect(formatInstant(instant, 'YYYY-MM-DDTHH:mm:ss.SSSZ')).toBe('2026-01-05T07:08:09.045Z');
    });

    it('renders non-zero offsets as +hh:mm', () => {
        const instant = instantIn(Date.UTC(2026, 0, 5, 12), fixedZone('x', -(5 * 3600 + 30 * 60)));
        expect(formatInstant(instant, LAYOUTS.RFC3339)).toBe('2026-01-05T06:30:00-05:30');
    });

    it('renders short and named forms', () => {
        const instant = instantIn(Date.UTC(2005, 2, 7), UTC);
        expect(formatInstant(instant, LAYOUTS.AMERICAN_SHORT)).toBe('3-7-05');
        expect(formatInstant(instant, 'MMM D, YYYY')).toBe('Mar 7, 2005');
    });
});

describe('parseInstant', () => {
    it('parses an ISO date at UTC midnight', () => {
        const instant = parseInstant(LAYOUTS.ISO_DATE, '2026-01-15');
        expect(instant.epochMs).toBe(Date.UTC(2026, 0, 15));
        expect(instant.zone).toBe(UTC);
    });

    it('reads the wall clock in the given zone when the text has no offset', () => {
        const instant = parseInstant('YYYY-MM-DD HH:mm', '2026-01-15 09:00', fixedZone('cet', 3600));
        expect(instant.epochMs).toBe(Date.UTC(2026, 0, 15, 8));
    });

    it('takes the zone from an explicit offset', () => {
        const instant = parseInstant(LAYOUTS.RFC3339, '2026-01-15T10:00:00+02:00');
        expect(instant.epochMs).toBe(Date.UTC(2026, 0, 15, 8));
        expect(instant.zone.name).toBe('+02:00');
        expect(instant.zone.offsetAt(0)).toBe(7200);
    });

    it('accepts offsets without a colon', () => {
        const instant = parseInstant(LAYOUTS.RFC3339, '2026-01-15T10:00:00-0130');
        expect(instant.zone.offsetAt(0)).toBe(-5400);
    });

    it('maps Z to UTC', () => {
        expect(parseInstant(LAYOUTS.RFC3339, '2026-01-15T10:00:00Z').zone).toBe(UTC);
    });

    it('pivots two-digit years at 69', () => {
        expect(parseInstant(LAYOUTS.AMERICAN_SHORT, '12-25-99').epochMs).toBe(Date.UTC(1999, 11, 25));
        expect(parseInstant(LAYOUTS.AMERICAN_SHORT, '1-2-68').epochMs).toBe(Date.UTC(2068, 0, 2));
    });

    it('matches month names case-insensitively', () => {
        expect(parseInstant('MMM D, YYYY', 'jan 2, 1971').epochMs).toBe(Date.UTC(1971, 0, 2));
    });

    it('defaults missing fields to year 0, January 1', () => {
        const clock = wallClock(parseInstant('MM-DD', '03-04'));
        expect([clock.year, clock.month, clock.day]).toEqual([0, 3, 4]);
    });

    it('reports the position of a short field', () => {
        expect(() => parseInstant(LAYOUTS.ISO_DATE, '2026-1-15')).toThrow(
            'Cannot parse "2026-1-15" as "YYYY-MM-DD": expected 2-digit month at position 5'
        );
    });

    it('rejects trailing text', () => {
        expect(() => parseInstant(LAYOUTS.ISO_DATE, '2026-01-15x')).toThrow(
            'Cannot parse "2026-01-15x" as "YYYY-MM-DD": unexpected trailing text "x"'
        );
    });

    it('rejects out-of-range fields', () => {
        expect(() => parseInstant(LAYOUTS.ISO_DATE, '2026-13-01')).toThrow(DateParseError);
        expect(() => parseInstant(LAYOUTS.ISO_DATE, '2026-02-29')).toThrow(DateParseError);
        expect(() => parseInstant('YYYY-MM-DD HH:mm', '2026-01-01 24:00')).toThrow(DateParseError);
    });

    it('accepts leap days', () => {
        expect(parseInstant(LAYOUTS.ISO_DATE, '2024-02-29').epochMs).toBe(Date.UTC(2024, 1, 29));
    });

    it('attaches layout and text to the error', () => {
        try {
            parseInstant(LAYOUTS.ISO_DATE, 'soon');
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(DateParseError);
            if (err instanceof DateParseError) {
                expect(err.layout).toBe('YYYY-MM-DD');
                expect(err.text).toBe('soon');
            }
        }
    });
});

describe('daysInMonth', () => {
    it('knows leap years', () => {
        expect(daysInMonth(2024, 2)).toBe(29);
        expect(daysInMonth(2025, 2)).toBe(28);
        expect(daysInMonth(2000, 2)).toBe(29);
        expect(daysInMonth(2100, 2)).toBe(28);
    });

    it('handles December', () => {
        expect(daysInMonth(2026, 12)).toBe(31);
    });
});
