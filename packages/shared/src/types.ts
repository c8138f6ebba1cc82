/**
 * Year/month/day triple. Month is 1-based.
 */
export interface CalendarParts {
    year: number;
    month: number;
    day: number;
}
