// Schemas
export {
    IsoDateStringSchema,
    OutOfRangePolicySchema,
    TodayConfigSchema,
} from './schemas.js';

// Types
export type {
    OutOfRangePolicy,
    TodayConfig,
} from './schemas.js';
export type { CalendarParts } from './types.js';

// Constants
export {
    SECONDS_PER_DAY,
    MS_PER_DAY,
    DAY_COUNT,
    MAX_DAY,
    MAX_UNIX_SECONDS,
    LAYOUTS,
    TODAY_CONFIG,
} from './constants.js';

// Errors
export { OutOfRangeError, DateParseError, InvalidZoneError } from './errors.js';
