export { UTC, fixedZone, ianaZone, systemLocalZone } from './zone.js';
export type { Zone } from './zone.js';
export { instantIn, wallClock, fromWallClock, unixSeconds, utcMs } from './instant.js';
export type { ZonedInstant, WallClock, WallClockFields } from './instant.js';
