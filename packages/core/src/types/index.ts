/**
 * Re-export shared types and constants.
 * Core uses these but doesn't define them.
 */
export type {
    OutOfRangePolicy,
    TodayConfig,
    CalendarParts,
} from '@compact-date/shared';

export {
    IsoDateStringSchema,
    OutOfRangePolicySchema,
    TodayConfigSchema,
    SECONDS_PER_DAY,
    MS_PER_DAY,
    DAY_COUNT,
    MAX_DAY,
    MAX_UNIX_SECONDS,
    LAYOUTS,
    TODAY_CONFIG,
    OutOfRangeError,
    DateParseError,
    InvalidZoneError,
} from '@compact-date/shared';
