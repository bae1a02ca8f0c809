import type * as types from "../types";
import type { SeatingReader } from "../store/repository";
import type { CapacitySource } from "../config";

export interface CapacityPolicy {
    /** Largest number of shared tables combined for one party */
    maxCombinationSize: number;
    /** Most unused seats a candidate may leave; undefined means no bound */
    maxExcessSeats?: number;
    capacitySource: CapacitySource;
}

/**
 * Order table numbers the way a host reads them: "2" before "10", "P1" after "9"
 */
export const compareTableNumbers = (a: string, b: string): number => {
    return a.localeCompare(b, 'en', { numeric: true });
}

/**
 * Calculate combined capacity for a table combination
 *
 * Uses the Sum of Capacities heuristic:
 * - Combo min = Sum of all table minCapacity values
 * - Combo max = Sum of all table effective max values
 *
 * Example: T1(2-2) + T2(2-4) = Combo(4-6)
 */
export const getComboCapacity = (tables: types.SeatableTable[]): { min: number; max: number; } => {
    const min = tables.reduce((sum, t) => sum + t.minCapacity, 0);
    const max = tables.reduce((sum, t) => sum + t.effectiveMaxCapacity, 0);
    return { min, max };
}

/**
 * Attach the capacity used for matching to each table
 *
 * With the "chairs" source the maximum is the number of assigned chairs,
 * never more than maxCapacity. Tables left unable to seat their own minimum
 * are dropped.
 */
export const toSeatable = (
    tables: types.Table[],
    chairs: types.Chair[],
    source: CapacitySource
): types.SeatableTable[] => {
    const assignedChairs = new Map<string, number>();
    for (const chair of chairs) {
        if (chair.isAssigned) {
            assignedChairs.set(chair.tableId, (assignedChairs.get(chair.tableId) ?? 0) + 1);
        }
    }

    return tables
        .map(table => ({
            ...table,
            effectiveMaxCapacity: source === 'chairs'
                ? Math.min(table.maxCapacity, assignedChairs.get(table.id) ?? 0)
                : table.maxCapacity
        }))
        .filter(table => table.effectiveMaxCapacity >= table.minCapacity);
}

/**
 * Generate every combination of exactly `size` items, preserving input order
 *
 * Example: ([A, B, C], 2) => [A,B], [A,C], [B,C]
 */
function* combinationsOfSize<T>(items: readonly T[], size: number, start: number = 0, prefix: T[] = []): Generator<T[]> {
    if (prefix.length === size) {
        yield prefix;
        return;
    }
    for (let i = start; i <= items.length - (size - prefix.length); i++) {
        const item = items[i];
        if (item === undefined) continue;
        yield* combinationsOfSize(items, size, i + 1, [...prefix, item]);
    }
}

const toCandidate = (kind: types.SeatingCandidate['kind'], tables: types.SeatableTable[], partySize: number): types.SeatingCandidate => {
    const { min, max } = getComboCapacity(tables);
    return {
        kind,
        tableIds: tables.map(t => t.id),
        tableNumbers: tables.map(t => t.number),
        minCapacity: min,
        maxCapacity: max,
        excess: max - partySize
    };
}

/**
 * Ranking within one group: less excess first, then table numbers
 */
const byRank = (a: types.SeatingCandidate, b: types.SeatingCandidate): number => {
    if (a.excess !== b.excess) return a.excess - b.excess;
    for (let i = 0; i < Math.min(a.tableNumbers.length, b.tableNumbers.length); i++) {
        const order = compareTableNumbers(a.tableNumbers[i] ?? '', b.tableNumbers[i] ?? '');
        if (order !== 0) return order;
    }
    return a.tableNumbers.length - b.tableNumbers.length;
}

/**
 * Produce seating candidates for a party, best first
 *
 * Two-phase algorithm:
 * 1. Single Table Phase: every table with minCapacity <= partySize <= max,
 *    least excess first
 * 2. Combo Phase: shared tables only, by size 2..maxCombinationSize; a
 *    combination fits when sum(min) <= partySize <= sum(max); within a size,
 *    least excess first
 *
 * Ties break on table number. Candidates over the excess bound are skipped.
 * The sequence is lazy: combinations of a size are only built once every
 * earlier candidate has been consumed. `exclude` is consulted right before
 * each candidate is produced, so ids added by the consumer mid-iteration
 * take effect immediately.
 */
export function* rankCandidates(
    floor: types.SeatableTable[],
    partySize: number,
    policy: CapacityPolicy,
    exclude: ReadonlySet<string> = new Set()
): Generator<types.SeatingCandidate> {
    const withinExcess = (c: types.SeatingCandidate) =>
        policy.maxExcessSeats === undefined || c.excess <= policy.maxExcessSeats;
    const isExcluded = (c: types.SeatingCandidate) => c.tableIds.some(id => exclude.has(id));

    const singles = floor
        .filter(t => t.minCapacity <= partySize && partySize <= t.effectiveMaxCapacity)
        .map(t => toCandidate('single', [t], partySize))
        .filter(withinExcess)
        .sort(byRank);

    for (const candidate of singles) {
        if (!isExcluded(candidate)) yield candidate;
    }

    const shared = floor
        .filter(t => t.isShared)
        .sort((a, b) => compareTableNumbers(a.number, b.number));
    const largest = Math.min(policy.maxCombinationSize, shared.length);

    for (let size = 2; size <= largest; size++) {
        const combos: types.SeatingCandidate[] = [];
        for (const group of combinationsOfSize(shared, size)) {
            if (group.some(t => exclude.has(t.id))) continue;

            const { min, max } = getComboCapacity(group);
            if (min <= partySize && partySize <= max) {
                const candidate = toCandidate('combo', group, partySize);
                if (withinExcess(candidate)) combos.push(candidate);
            }
        }

        for (const candidate of combos.sort(byRank)) {
            if (!isExcluded(candidate)) yield candidate;
        }
    }
}

/**
 * Capacity matching against the live floor plan
 */
export class CapacityMatcher {
    constructor(private store: SeatingReader, private policy: CapacityPolicy) { }

    async floor(): Promise<types.SeatableTable[]> {
        const [tables, chairs] = await Promise.all([
            this.store.listTables(),
            this.policy.capacitySource === 'chairs' ? this.store.listChairs() : Promise.resolve([])
        ]);
        return toSeatable(tables, chairs, this.policy.capacitySource);
    }

    async *candidates(partySize: number, exclude: ReadonlySet<string> = new Set()): AsyncGenerator<types.SeatingCandidate> {
        yield* this.rank(await this.floor(), partySize, exclude);
    }

    /**
     * Rank against a floor snapshot the caller already holds
     */
    rank(floor: types.SeatableTable[], partySize: number, exclude: ReadonlySet<string> = new Set()): Generator<types.SeatingCandidate> {
        return rankCandidates(floor, partySize, this.policy, exclude);
    }
}
