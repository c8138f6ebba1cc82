// Types (re-exported from shared)
export type {
    OutOfRangePolicy,
    TodayConfig,
    CalendarParts,
} from './types/index.js';

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
} from './types/index.js';

// Zones and instants
export { UTC, fixedZone, ianaZone, systemLocalZone } from './zone/index.js';
export { instantIn, wallClock, fromWallClock, unixSeconds } from './zone/index.js';
export type { Zone, ZonedInstant, WallClock, WallClockFields } from './zone/index.js';

// Layouts
export { formatInstant, parseInstant, tokenizeLayout, daysInMonth } from './layout/index.js';
export type { LayoutToken, LayoutPart } from './layout/index.js';

// Dates
export {
    epochDate,
    EPOCH_DATE_ZERO,
    isRepresentableSeconds,
    fromUnixSeconds,
    fromCalendarDate,
    fromInstant,
    parse,
    toUtcInstant,
    toInstantIn,
    toLocalInstant,
    calendarParts,
    toUnixSeconds,
    toUnixNanos,
    format,
    toText,
    addDays,
    compareDates,
    today,
    todayUtc,
    resolveToday,
    resolveTodayConfig,
    epochDateText,
    epochDateJson,
    EpochDateSchema,
} from './date/index.js';
export type { EpochDate, TodayOptions, TodayResult, TextCodec, JsonCodec } from './date/index.js';
