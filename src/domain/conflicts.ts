import type { Occupancy, TimeWindow } from "../types";
import type { SeatingReader } from "../store/repository";
import { windowsOverlap } from "./clock";

/**
 * First occupancy that overlaps the window, ignoring one reservation
 */
export const findOverlap = (
    occupancies: Occupancy[],
    window: TimeWindow,
    excludingReservationId?: string
): Occupancy | undefined => {
    return occupancies.find(o => o.reservationId !== excludingReservationId && windowsOverlap(o.window, window));
}

/**
 * Decides whether a table is already held for part of a window
 *
 * Only pending, confirmed and seated reservations occupy a table; the
 * repository query filters out everything else. Inside an allocation this
 * must run under the table's lock, together with the write that follows.
 */
export class ConflictChecker {
    constructor(private store: Pick<SeatingReader, 'findOccupancies'>) { }

    async hasConflict(tableId: string, date: string, window: TimeWindow, excludingReservationId?: string): Promise<boolean> {
        const occupancies = await this.store.findOccupancies(tableId, date);
        return findOverlap(occupancies, window, excludingReservationId) !== undefined;
    }

    /**
     * Subset of tableIds that conflict, in input order
     */
    async conflictingTables(tableIds: readonly string[], date: string, window: TimeWindow, excludingReservationId?: string): Promise<string[]> {
        const conflicting: string[] = [];
        for (const tableId of tableIds) {
            if (await this.hasConflict(tableId, date, window, excludingReservationId)) {
                conflicting.push(tableId);
            }
        }
        return conflicting;
    }

    /**
     * Read the occupancies of several tables once and answer repeated
     * window queries from memory. For read-only scans; allocations must
     * check live under lock.
     */
    async snapshot(tableIds: readonly string[], date: string): Promise<OccupancySnapshot> {
        const byTable = new Map<string, Occupancy[]>();
        for (const tableId of tableIds) {
            byTable.set(tableId, await this.store.findOccupancies(tableId, date));
        }
        return new OccupancySnapshot(byTable);
    }
}

export class OccupancySnapshot {
    constructor(private byTable: Map<string, Occupancy[]>) { }

    conflictingTables(tableIds: readonly string[], window: TimeWindow): string[] {
        return tableIds.filter(id => findOverlap(this.byTable.get(id) ?? [], window) !== undefined);
    }
}
