/**
 * Current date from an injectable clock and zone.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Warnings returned in result.
 */

import {
    OutOfRangeError,
    TODAY_CONFIG,
    TodayConfigSchema,
    type TodayConfig,
} from '../types/index.js';
import { UTC, systemLocalZone, type Zone } from '../zone/zone.js';
import { instantIn } from '../zone/instant.js';
import { EPOCH_DATE_ZERO, fromInstant, type EpochDate } from './epoch-date.js';

export interface TodayOptions {
    config?: Partial<TodayConfig>;
    /** Milliseconds since epoch. Defaults to Date.now. */
    clock?: () => number;
    /** Defaults to systemLocalZone(). */
    zone?: Zone;
}

export interface TodayResult {
    date: EpochDate;
    warnings: string[];
}

/**
 * Validate untrusted configuration (e.g. from a config file) and fill defaults.
 */
export function resolveTodayConfig(input: unknown): TodayConfig {
    return TodayConfigSchema.parse(input ?? {});
}

/**
 * Today's date in the configured zone.
 *
 * With onOutOfRange 'zero' (default) a clock past 2149-06-06 yields
 * 1970-01-01 plus a warning; with 'throw' the OutOfRangeError propagates.
 */
export function resolveToday(options: TodayOptions = {}): TodayResult {
    const config: TodayConfig = {
        onOutOfRange: options.config?.onOutOfRange ?? TODAY_CONFIG.ON_OUT_OF_RANGE,
    };
    const clock = options.clock ?? Date.now;
    const zone = options.zone ?? systemLocalZone();

    try {
        return { date: fromInstant(instantIn(clock(), zone)), warnings: [] };
    } catch (err) {
        if (err instanceof OutOfRangeError && config.onOutOfRange === 'zero') {
            return {
                date: EPOCH_DATE_ZERO,
                warnings: [`${err.message}; substituted 1970-01-01`],
            };
        }
        throw err;
    }
}

export function today(options: TodayOptions = {}): EpochDate {
    return resolveToday(options).date;
}

/**
 * today() read on the UTC calendar.
 */
export function todayUtc(options: Omit<TodayOptions, 'zone'> = {}): EpochDate {
    return resolveToday({ ...options, zone: UTC }).date;
}
