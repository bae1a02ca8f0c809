import { describe, it, expect } from 'vitest';
import {
    dayOfWeek,
    formatClock,
    isCalendarDate,
    occupancyWindow,
    parseCalendarDate,
    parseClock,
    windowsOverlap
} from '../domain/clock';
import { ValidationError } from '../domain/errors';

describe('Clock helpers', () => {
    it('should accept only real calendar dates', () => {
        expect(isCalendarDate('2025-02-28')).toBe(true);
        expect(isCalendarDate('2024-02-29')).toBe(true);
        expect(isCalendarDate('2025-02-30')).toBe(false);
        expect(isCalendarDate('2025-2-3')).toBe(false);
        expect(isCalendarDate('tomorrow')).toBe(false);
    });

    it('should throw ValidationError for a malformed date', () => {
        expect(() => parseCalendarDate('2025-13-01')).toThrow(ValidationError);
    });

    it('should number weekdays from Monday = 0 to Sunday = 6', () => {
        expect(dayOfWeek('2025-10-20')).toBe(0); // Monday
        expect(dayOfWeek('2025-10-22')).toBe(2); // Wednesday
        expect(dayOfWeek('2025-10-26')).toBe(6); // Sunday
    });

    it('should convert HH:mm to minutes and back', () => {
        expect(parseClock('00:00')).toBe(0);
        expect(parseClock('19:30')).toBe(1170);
        expect(parseClock('23:59')).toBe(1439);
        expect(formatClock(1170)).toBe('19:30');
        expect(formatClock(5)).toBe('00:05');
    });

    it('should reject times that are not HH:mm', () => {
        expect(() => parseClock('24:00')).toThrow(ValidationError);
        expect(() => parseClock('7:30')).toThrow(ValidationError);
        expect(() => parseClock('19:60')).toThrow(ValidationError);
    });

    it('should build the half-open occupancy window', () => {
        expect(occupancyWindow('18:00', 90)).toEqual({ start: 1080, end: 1170 });
        expect(occupancyWindow(1080, 30)).toEqual({ start: 1080, end: 1110 });
    });

    describe('windowsOverlap', () => {
        const first = { start: 1080, end: 1170 }; // 18:00-19:30

        it('should not treat touching windows as overlapping', () => {
            expect(windowsOverlap(first, { start: 1170, end: 1260 })).toBe(false);
            expect(windowsOverlap({ start: 1020, end: 1080 }, first)).toBe(false);
        });

        it('should detect partial and full overlap', () => {
            expect(windowsOverlap(first, { start: 1140, end: 1200 })).toBe(true); // 19:00-20:00
            expect(windowsOverlap(first, { start: 1090, end: 1100 })).toBe(true);
            expect(windowsOverlap({ start: 1000, end: 1300 }, first)).toBe(true);
        });
    });
});
