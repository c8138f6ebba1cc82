/**
 * Zod schemas for compact-date inputs and configuration.
 *
 * Schemas here validate shape only. Conversions that need the core
 * (text -> EpochDate) live in @compact-date/core.
 */

import { z } from 'zod';
import { TODAY_CONFIG } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
export const IsoDateStringSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

// ============================================================================
// Configuration
// ============================================================================

/**
 * What today() does once the clock has passed 2149-06-06.
 */
export const OutOfRangePolicySchema = z.enum(['zero', 'throw']);

export type OutOfRangePolicy = z.infer<typeof OutOfRangePolicySchema>;

export const TodayConfigSchema = z.object({
    onOutOfRange: OutOfRangePolicySchema.default(TODAY_CONFIG.ON_OUT_OF_RANGE),
});

export type TodayConfig = z.infer<typeof TodayConfigSchema>;
