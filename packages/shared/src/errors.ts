/**
 * Error types thrown by the core package.
 */

/**
 * A timestamp (or the date derived from it) falls outside
 * [0, MAX_UNIX_SECONDS].
 */
export class OutOfRangeError extends Error {
    readonly seconds: number;

    constructor(seconds: number) {
        super(`The given date is out of range: ${seconds}s since epoch`);
        this.name = 'OutOfRangeError';
        this.seconds = seconds;
    }
}

/**
 * Text did not match its layout.
 */
export class DateParseError extends Error {
    readonly layout: string;
    readonly text: string;

    constructor(layout: string, text: string, reason: string) {
        super(`Cannot parse "${text}" as "${layout}": ${reason}`);
        this.name = 'DateParseError';
        this.layout = layout;
        this.text = text;
    }
}

/**
 * Unknown IANA time zone name.
 */
export class InvalidZoneError extends Error {
    readonly zone: string;

    constructor(zone: string) {
        super(`Unknown time zone: ${zone}`);
        this.name = 'InvalidZoneError';
        this.zone = zone;
    }
}
