/**
 * Text and JSON encodings of EpochDate.
 *
 * Two narrow capabilities rather than one serializer: canonical text
 * (YYYY-MM-DD) and a JSON scalar (the quoted canonical text).
 */

import { z } from 'zod';
import { DateParseError, IsoDateStringSchema, LAYOUTS, OutOfRangeError } from '../types/index.js';
import { format, parse, toText, type EpochDate } from './epoch-date.js';

export interface TextCodec<T> {
    encode(value: T): string;
    decode(text: string): T;
}

export interface JsonCodec<T> {
    encode(value: T): string;
    /** `current` is returned unchanged when json is null. */
    decode(json: string, current: T): T;
}

const QUOTED_ISO_DATE = `"${LAYOUTS.ISO_DATE}"`;

export const epochDateText: TextCodec<EpochDate> = {
    encode: toText,
    decode: (text) => parse(LAYOUTS.ISO_DATE, text),
};

export const epochDateJson: JsonCodec<EpochDate> = {
    encode: (value) => format(value, QUOTED_ISO_DATE),
    decode: (json, current) => {
        const trimmed = json.trim();
        if (trimmed === 'null') {
            return current;
        }
        return parse(QUOTED_ISO_DATE, trimmed);
    },
};

/**
 * Canonical YYYY-MM-DD string => EpochDate, for validating structured payloads.
 */
export const EpochDateSchema = IsoDateStringSchema.transform((value, ctx): EpochDate => {
    try {
        return epochDateText.decode(value);
    } catch (err) {
        if (err instanceof DateParseError || err instanceof OutOfRangeError) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
            return z.NEVER;
        }
        throw err;
    }
});
