import type { CapacityMatcher } from "./capacity";
import type { ConflictChecker, OccupancySnapshot } from "./conflicts";
import type { SeatableTable, TimeWindow } from "../types";
import { fitsOperatingWindow, type HoursResolver } from "./hours";
import { formatClock, occupancyWindow } from "./clock";
import { ValidationError } from "./errors";

export interface SlotQuery {
    /** Minutes between candidate start times */
    granularity: number;
    durationMinutes: number;
}

export interface SlotGeneratorDeps {
    hours: HoursResolver;
    matcher: CapacityMatcher;
    conflicts: ConflictChecker;
}

/**
 * Enumerates start times a party could book on a date
 *
 * Algorithm:
 * 1. Resolve the operating window; a closed date yields nothing
 * 2. Walk starts from open to lastReservation in `granularity` steps
 * 3. Keep a start when its occupancy window fits the hours and at least
 *    one ranked candidate has no conflicting table
 *
 * Read-only: takes no locks and writes nothing. Occupancies are read once
 * per call, so a slot reported here can still be taken before it is booked.
 */
export class AvailabilitySlotGenerator {
    constructor(private deps: SlotGeneratorDeps) { }

    async *slots(date: string, partySize: number, query: SlotQuery): AsyncGenerator<string> {
        if (!Number.isInteger(partySize) || partySize <= 0) {
            throw new ValidationError('partySize must be a positive integer');
        }
        if (!Number.isInteger(query.granularity) || query.granularity <= 0) {
            throw new ValidationError('granularity must be a positive integer');
        }
        if (!Number.isInteger(query.durationMinutes) || query.durationMinutes <= 0) {
            throw new ValidationError('durationMinutes must be a positive integer');
        }

        const hours = await this.deps.hours.resolve(date);
        if (hours.closed) return;

        const floor = await this.deps.matcher.floor();
        const snapshot = await this.deps.conflicts.snapshot(floor.map(t => t.id), date);

        for (let start = hours.open; start <= hours.lastReservation; start += query.granularity) {
            const window = occupancyWindow(start, query.durationMinutes);
            if (!fitsOperatingWindow(hours, window)) continue;

            if (this.hasFreeCandidate(floor, snapshot, partySize, window)) {
                yield formatClock(start);
            }
        }
    }

    private hasFreeCandidate(floor: SeatableTable[], snapshot: OccupancySnapshot, partySize: number, window: TimeWindow): boolean {
        const exclude = new Set<string>();
        for (const candidate of this.deps.matcher.rank(floor, partySize, exclude)) {
            const conflicting = snapshot.conflictingTables(candidate.tableIds, window);
            if (conflicting.length === 0) return true;
            conflicting.forEach(id => exclude.add(id));
        }
        return false;
    }
}
