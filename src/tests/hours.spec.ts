import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MemoryStore } from '../store/db';
import { HoursResolver, ensureWithinHours, fitsOperatingWindow } from '../domain/hours';
import { occupancyWindow } from '../domain/clock';
import { ClosedError, ValidationError } from '../domain/errors';

describe('HoursResolver', () => {
    let store: MemoryStore;
    let resolver: HoursResolver;

    beforeEach(async () => {
        store = new MemoryStore();
        resolver = new HoursResolver(store);
        // Wednesday only
        await store.setWeeklyHours({ dayOfWeek: 2, openTime: '12:00', closeTime: '23:00', lastReservationTime: '21:30' });
    });

    afterEach(() => {
        store.dispose();
    });

    it('should use the weekly pattern of the weekday', async () => {
        expect(await resolver.resolve('2025-10-22')).toEqual({
            closed: false,
            open: 720,
            close: 1380,
            lastReservation: 1290
        });
    });

    it('should treat a weekday without weekly hours as closed', async () => {
        expect(await resolver.resolve('2025-10-20')).toEqual({ closed: true });
    });

    it('should let a closed override win over the weekly pattern', async () => {
        await store.setSpecialHours({ date: '2025-10-22', name: 'Private event', isClosed: true });
        expect(await resolver.resolve('2025-10-22')).toEqual({ closed: true });
        // the next Wednesday is untouched
        expect((await resolver.resolve('2025-10-29')).closed).toBe(false);
    });

    it('should use the override window even when it is open', async () => {
        await store.setSpecialHours({
            date: '2025-10-22',
            name: 'Short day',
            isClosed: false,
            openTime: '18:00',
            closeTime: '22:00',
            lastReservationTime: '20:00'
        });
        expect(await resolver.resolve('2025-10-22')).toEqual({
            closed: false,
            open: 1080,
            close: 1320,
            lastReservation: 1200
        });
    });

    it('should open a date the weekly pattern keeps closed', async () => {
        await store.setSpecialHours({
            date: '2025-10-20',
            name: 'Holiday opening',
            isClosed: false,
            openTime: '12:00',
            closeTime: '16:00',
            lastReservationTime: '14:30'
        });
        expect(await resolver.resolve('2025-10-20')).toEqual({
            closed: false,
            open: 720,
            close: 960,
            lastReservation: 870
        });
    });

    it('should reject a malformed date', async () => {
        await expect(resolver.resolve('2025-10-32')).rejects.toThrow(ValidationError);
    });
});

describe('Operating window bounds', () => {
    const hours = { closed: false as const, open: 1020, close: 1320, lastReservation: 1260 }; // 17:00-22:00, last 21:00

    it('should accept windows starting at open and ending at close', () => {
        expect(fitsOperatingWindow(hours, occupancyWindow('17:00', 60))).toBe(true);
        expect(fitsOperatingWindow(hours, occupancyWindow('21:00', 60))).toBe(true);
    });

    it('should reject a start before open or after last reservation', () => {
        expect(fitsOperatingWindow(hours, occupancyWindow('16:45', 60))).toBe(false);
        expect(fitsOperatingWindow(hours, occupancyWindow('21:15', 30))).toBe(false);
    });

    it('should reject a window running past close', () => {
        expect(fitsOperatingWindow(hours, occupancyWindow('21:00', 90))).toBe(false);
    });

    it('should raise ClosedError with the bounds in the message', () => {
        expect(() => ensureWithinHours('2025-10-22', hours, occupancyWindow('21:00', 90))).toThrow(
            'Requested 21:00 for 90 minutes is outside operating hours on 2025-10-22 (open 17:00-22:00, last reservation 21:00)'
        );
        expect(() => ensureWithinHours('2025-10-22', { closed: true }, occupancyWindow('18:00', 60))).toThrow(ClosedError);
    });
});
