import { describe, it, expect } from 'vitest';
import { OutOfRangeError, DateParseError, InvalidZoneError } from '../src/errors.js';

describe('OutOfRangeError', () => {
    it('carries the offending seconds', () => {
        const err = new OutOfRangeError(-1);
        expect(err).toBeInstanceOf(Error);
        expect(err.name).toBe('OutOfRangeError');
        expect(err.seconds).toBe(-1);
        expect(err.message).toBe('The given date is out of range: -1s since epoch');
    });
});

describe('DateParseError', () => {
    it('carries layout and text', () => {
        const err = new DateParseError('YYYY-MM-DD', 'nope', 'expected 4-digit year');
        expect(err.name).toBe('DateParseError');
        expect(err.layout).toBe('YYYY-MM-DD');
        expect(err.text).toBe('nope');
        expect(err.message).toBe('Cannot parse "nope" as "YYYY-MM-DD": expected 4-digit year');
    });
});

describe('InvalidZoneError', () => {
    it('carries the zone name', () => {
        const err = new InvalidZoneError('Mars/Olympus');
        expect(err.zone).toBe('Mars/Olympus');
        expect(err.message).toBe('Unknown time zone: Mars/Olympus');
    });
});
