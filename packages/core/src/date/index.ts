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
} from './epoch-date.js';
export type { EpochDate } from './epoch-date.js';

export { today, todayUtc, resolveToday, resolveTodayConfig } from './today.js';
export type { TodayOptions, TodayResult } from './today.js';

export { epochDateText, epochDateJson, EpochDateSchema } from './codec.js';
export type { TextCodec, JsonCodec } from './codec.js';
