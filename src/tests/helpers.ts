import type { Table } from '../types';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config';
import { MemoryStore, type TableInput } from '../store/db';
import { ReservationEngine } from '../domain/engine';
import { silentLogger } from '../logger';

export interface TestFloor {
    store: MemoryStore;
    engine: ReservationEngine;
    customerId: string;
    /** Id of the table with this display number */
    id: (number: string) => string;
    table: (number: string) => Table;
}

/** Wednesday */
export const TEST_DATE = '2025-10-22';

export const table = (number: string, minCapacity: number, maxCapacity: number, isShared = false): TableInput => ({
    number,
    minCapacity,
    maxCapacity,
    isShared
});

/**
 * Store and engine over the given tables, open every day 17:00-22:00
 * with last reservation at 21:00, and one customer
 */
export const setupFloor = async (tables: TableInput[], config: Partial<EngineConfig> = {}): Promise<TestFloor> => {
    const store = new MemoryStore();
    const created: Table[] = [];
    for (const input of tables) {
        created.push(await store.createTable(input));
    }
    for (let dayOfWeek = 0; dayOfWeek <= 6; dayOfWeek++) {
        await store.setWeeklyHours({ dayOfWeek, openTime: '17:00', closeTime: '22:00', lastReservationTime: '21:00' });
    }
    const customer = await store.findOrCreateCustomer({ name: 'Test Guest', email: 'guest@example.com' });

    const lookup = (number: string): Table => {
        const found = created.find(t => t.number === number);
        if (!found) throw new Error(`No table ${number} in test floor`);
        return found;
    };

    return {
        store,
        engine: new ReservationEngine({
            store,
            config: { ...DEFAULT_ENGINE_CONFIG, ...config },
            logger: silentLogger()
        }),
        customerId: customer.id,
        id: number => lookup(number).id,
        table: lookup
    };
}

/** Display numbers of the tables a reservation holds */
export const numbersOf = (floor: TestFloor, tableIds: string[]): string[] => {
    return tableIds.map(id => floor.store.tables.get(id)?.number ?? id);
}
