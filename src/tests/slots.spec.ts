import { describe, it, expect, vi, afterEach } from 'vitest';
import { setupFloor, table, TEST_DATE, type TestFloor } from './helpers';
import { ValidationError } from '../domain/errors';

describe('Availability slots', () => {
    let floor: TestFloor;

    afterEach(() => {
        floor.store.dispose();
    });

    it('should step from open to last reservation, keeping windows that end by close', async () => {
        floor = await setupFloor([table('A', 2, 4)]);
        // 17:00-22:00, last 21:00, 120 minutes: the last start that ends by 22:00 is 20:00
        expect(await floor.engine.checkAvailability(TEST_DATE, 2, 120, 60)).toEqual(['17:00', '18:00', '19:00', '20:00']);
        expect(await floor.engine.checkAvailability(TEST_DATE, 2, 60, 60)).toEqual(['17:00', '18:00', '19:00', '20:00', '21:00']);
    });

    it('should leave out starts whose window overlaps a booking', async () => {
        floor = await setupFloor([table('A', 2, 4)]);
        await floor.engine.allocator.assign({
            customerId: floor.customerId,
            partySize: 2,
            date: TEST_DATE,
            startTime: '18:00',
            durationMinutes: 90
        });

        // [18:00, 19:30) is taken; 60 minute windows from 17:00 and 19:30 still fit
        expect(await floor.engine.checkAvailability(TEST_DATE, 2, 60, 30)).toEqual([
            '17:00', '19:30', '20:00', '20:30', '21:00'
        ]);
    });

    it('should count a free combination as availability', async () => {
        floor = await setupFloor([table('1', 2, 2, true), table('2', 2, 2, true)]);
        expect(await floor.engine.checkAvailability(TEST_DATE, 4, 60, 60)).toEqual(['17:00', '18:00', '19:00', '20:00', '21:00']);
        expect(await floor.engine.checkAvailability(TEST_DATE, 5, 60, 60)).toEqual([]);
    });

    it('should yield nothing on a closed date', async () => {
        floor = await setupFloor([table('A', 2, 4)]);
        await floor.store.setSpecialHours({ date: TEST_DATE, name: 'Closed for renovation', isClosed: true });
        expect(await floor.engine.checkAvailability(TEST_DATE, 2)).toEqual([]);
    });

    it('should use the configured duration and granularity by default', async () => {
        floor = await setupFloor([table('A', 2, 4)], { defaultDurationMinutes: 240, slotGranularityMinutes: 30 });
        // 240 minutes from 17:00 ends 21:00, from 18:00 ends 22:00
        expect(await floor.engine.checkAvailability(TEST_DATE, 2)).toEqual(['17:00', '17:30', '18:00']);
    });

    it('should stop early when the consumer stops', async () => {
        floor = await setupFloor([table('A', 2, 4)]);
        const seen: string[] = [];
        for await (const slot of floor.engine.slotGenerator.slots(TEST_DATE, 2, { granularity: 15, durationMinutes: 60 })) {
            seen.push(slot);
            if (seen.length === 2) break;
        }
        expect(seen).toEqual(['17:00', '17:15']);
    });

    it('should take no locks and write nothing', async () => {
        floor = await setupFloor([table('A', 2, 4)]);
        const acquire = vi.spyOn(floor.engine.locks, 'acquire');
        const transaction = vi.spyOn(floor.store, 'transaction');

        await floor.engine.checkAvailability(TEST_DATE, 2);

        expect(acquire).not.toHaveBeenCalled();
        expect(transaction).not.toHaveBeenCalled();
    });

    it('should reject invalid parameters', async () => {
        floor = await setupFloor([table('A', 2, 4)]);
        await expect(floor.engine.checkAvailability(TEST_DATE, 0)).rejects.toBeInstanceOf(ValidationError);
        await expect(floor.engine.checkAvailability(TEST_DATE, 2, 60, 0)).rejects.toBeInstanceOf(ValidationError);
        await expect(floor.engine.checkAvailability('22-10-2025', 2)).rejects.toBeInstanceOf(ValidationError);
    });
});
