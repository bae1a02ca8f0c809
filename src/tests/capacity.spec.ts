import { describe, it, expect, afterEach } from 'vitest';
import {
    CapacityMatcher,
    compareTableNumbers,
    getComboCapacity,
    rankCandidates,
    toSeatable,
    type CapacityPolicy
} from '../domain/capacity';
import { MemoryStore } from '../store/db';
import type { Chair, SeatableTable, SeatingCandidate } from '../types';

const seatable = (number: string, minCapacity: number, maxCapacity: number, isShared = false): SeatableTable => ({
    id: `t${number}`,
    number,
    minCapacity,
    maxCapacity,
    effectiveMaxCapacity: maxCapacity,
    isShared,
    createdAt: '',
    updatedAt: ''
});

const numbers = (candidates: Iterable<SeatingCandidate>): string[][] => Array.from(candidates, c => c.tableNumbers);

describe('Capacity matching', () => {
    // 1, 2 and 5 can be pushed together
    const floor = [
        seatable('1', 2, 2, true),
        seatable('2', 2, 4, true),
        seatable('3', 2, 4),
        seatable('4', 4, 6),
        seatable('5', 2, 2, true)
    ];
    const policy: CapacityPolicy = { maxCombinationSize: 3, capacitySource: 'static' };

    it('should calculate combo capacity as the sum of capacities', () => {
        const cap = getComboCapacity([seatable('1', 2, 4), seatable('2', 4, 6)]);
        expect(cap.min).toBe(6);
        expect(cap.max).toBe(10);
    });

    it('should rank single tables by excess, then table number', () => {
        // no combination admits 2 (smallest pair minimum is 4)
        expect(numbers(rankCandidates(floor, 2, policy))).toEqual([['1'], ['5'], ['2'], ['3']]);
    });

    it('should fall back to a combination when no single table fits', () => {
        const candidates = Array.from(rankCandidates(floor, 7, policy));
        expect(candidates).toHaveLength(1);
        expect(candidates[0]).toEqual({
            kind: 'combo',
            tableIds: ['t1', 't2', 't5'],
            tableNumbers: ['1', '2', '5'],
            minCapacity: 6,
            maxCapacity: 8,
            excess: 1
        });
    });

    it('should offer singles first, then combinations by size', () => {
        expect(numbers(rankCandidates(floor, 6, policy))).toEqual([
            ['4'],
            ['1', '2'],
            ['2', '5'],
            ['1', '2', '5']
        ]);
    });

    it('should respect the configured combination size', () => {
        expect(numbers(rankCandidates(floor, 6, { ...policy, maxCombinationSize: 2 }))).toEqual([
            ['4'],
            ['1', '2'],
            ['2', '5']
        ]);
        expect(numbers(rankCandidates(floor, 7, { ...policy, maxCombinationSize: 1 }))).toEqual([]);
    });

    it('should drop candidates over the excess tolerance', () => {
        expect(numbers(rankCandidates(floor, 6, { ...policy, maxExcessSeats: 0 }))).toEqual([
            ['4'],
            ['1', '2'],
            ['2', '5']
        ]);
        expect(numbers(rankCandidates(floor, 2, { ...policy, maxExcessSeats: 1 }))).toEqual([['1'], ['5']]);
    });

    it('should never combine tables that are not shared', () => {
        const fixed = [seatable('3', 2, 4), seatable('4', 4, 6)];
        expect(numbers(rankCandidates(fixed, 9, policy))).toEqual([]);
    });

    it('should read the exclude set lazily while iterating', () => {
        const exclude = new Set<string>();
        const seen: string[][] = [];
        for (const candidate of rankCandidates(floor, 2, policy, exclude)) {
            seen.push(candidate.tableNumbers);
            // table 5 gets taken after the first candidate is produced
            exclude.add('t5');
        }
        expect(seen).toEqual([['1'], ['2'], ['3']]);
    });

    it('should skip every combination that contains an excluded table', () => {
        expect(numbers(rankCandidates(floor, 6, policy, new Set(['t2'])))).toEqual([['4']]);
    });

    it('should order table numbers numerically', () => {
        expect(['10', 'P1', '2', '1'].sort(compareTableNumbers)).toEqual(['1', '2', '10', 'P1']);
    });
});

describe('Capacity source', () => {
    const chair = (tableId: string, isAssigned: boolean, n: number): Chair => ({
        id: `${tableId}-c${n}`,
        tableId,
        isAssigned,
        createdAt: '',
        updatedAt: ''
    });

    const base = [seatable('2', 2, 4), seatable('4', 4, 6)];
    const chairs = [
        chair('t2', true, 1), chair('t2', true, 2), chair('t2', true, 3), chair('t2', false, 4),
        chair('t4', true, 1), chair('t4', true, 2)
    ];

    it('should use maxCapacity with the static source', () => {
        expect(toSeatable(base, chairs, 'static').map(t => t.effectiveMaxCapacity)).toEqual([4, 6]);
    });

    it('should count assigned chairs with the chairs source', () => {
        const result = toSeatable(base, chairs, 'chairs');
        // table 4 has two chairs left, below its minimum of four
        expect(result.map(t => [t.number, t.effectiveMaxCapacity])).toEqual([['2', 3]]);
    });

    describe('CapacityMatcher', () => {
        let store: MemoryStore;

        afterEach(() => {
            store.dispose();
        });

        it('should follow chair assignment changes when configured for chairs', async () => {
            store = new MemoryStore();
            const two = await store.createTable({ number: '2', minCapacity: 2, maxCapacity: 4, isShared: false });
            await store.createTable({ number: '4', minCapacity: 4, maxCapacity: 6, isShared: false });

            const byStatic = new CapacityMatcher(store, { maxCombinationSize: 3, capacitySource: 'static' });
            const byChairs = new CapacityMatcher(store, { maxCombinationSize: 3, capacitySource: 'chairs' });

            const [firstChair] = await store.listChairs(two.id);
            if (!firstChair) throw new Error('table 2 has no chairs');
            await store.setChairAssigned(firstChair.id, false);

            const collect = async (matcher: CapacityMatcher) => {
                const result: string[][] = [];
                for await (const candidate of matcher.candidates(4)) result.push(candidate.tableNumbers);
                return result;
            };

            expect(await collect(byStatic)).toEqual([['2'], ['4']]);
            expect(await collect(byChairs)).toEqual([['4']]);
        });
    });
});
