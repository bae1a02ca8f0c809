import type { TimeWindow } from "../types";
import { parseISO, isValid, getISODay } from "date-fns";
import { ValidationError } from "./errors";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Check that a string is a real calendar date in YYYY-MM-DD format
 *
 * Rejects impossible dates such as 2025-02-30.
 */
export const isCalendarDate = (value: string): boolean => {
    return DATE_PATTERN.test(value) && isValid(parseISO(value));
}

/**
 * Parse a YYYY-MM-DD string into a local-midnight Date
 *
 * @throws {ValidationError} when the string is not a real calendar date
 */
export const parseCalendarDate = (value: string): Date => {
    if (!isCalendarDate(value)) {
        throw new ValidationError(`Invalid date: ${value}`, [{ field: 'date', message: 'Expected YYYY-MM-DD' }]);
    }
    return parseISO(value);
}

/**
 * Weekday index used by the weekly hours table: 0 = Monday ... 6 = Sunday
 */
export const dayOfWeek = (date: string): number => {
    return getISODay(parseCalendarDate(date)) - 1;
}

export const isClockTime = (value: string): boolean => CLOCK_PATTERN.test(value);

/**
 * Convert an HH:mm wall-clock string into minutes since midnight
 *
 * @throws {ValidationError} when the string is not a valid HH:mm time
 */
export const parseClock = (value: string): number => {
    const match = CLOCK_PATTERN.exec(value);
    if (!match) {
        throw new ValidationError(`Invalid time: ${value}`, [{ field: 'time', message: 'Expected HH:mm' }]);
    }
    return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * Convert minutes since midnight back into HH:mm
 */
export const formatClock = (minutes: number): string => {
    const hours = Math.floor(minutes / 60);
    const rest = minutes % 60;
    return `${String(hours).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
}

/**
 * Occupancy window of a reservation: [start, start + duration)
 *
 * The end may run past 24:00; such windows never fit an operating window.
 */
export const occupancyWindow = (startTime: string | number, durationMinutes: number): TimeWindow => {
    const start = typeof startTime === 'number' ? startTime : parseClock(startTime);
    return { start, end: start + durationMinutes };
}

/**
 * Half-open overlap test: [s1, e1) and [s2, e2) overlap iff s1 < e2 and s2 < e1
 *
 * A window ending at 19:30 does not overlap one starting at 19:30.
 */
export const windowsOverlap = (a: TimeWindow, b: TimeWindow): boolean => {
    return a.start < b.end && b.start < a.end;
}
