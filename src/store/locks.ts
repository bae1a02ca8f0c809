import { LockTimeoutError } from "../domain/errors";

interface Waiter {
    grant: () => void;
    timer: NodeJS.Timeout;
    onAbort?: () => void;
}

/**
 * Exclusive per-table locks
 *
 * Concurrency Strategy:
 * - One lock per table id, held across the conflict check and the write
 * - Multi-table sets are locked in ascending id order so two allocations
 *   wanting overlapping combinations cannot deadlock
 * - Waiters are granted in FIFO order; a wait longer than timeoutMs rejects
 *   with LockTimeoutError, and an aborted signal rejects with its reason
 *
 * In-process only. A deployment with several engine processes needs the
 * equivalent from its database (row locks or serializable transactions).
 */
export class TableLocks {
    private held: Set<string> = new Set();
    private queues: Map<string, Waiter[]> = new Map();

    constructor(private timeoutMs: number = 5000) { }

    acquire(tableId: string, signal?: AbortSignal): Promise<void> {
        if (signal?.aborted) {
            return Promise.reject(signal.reason);
        }
        if (!this.held.has(tableId)) {
            this.held.add(tableId);
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            const queue = this.queues.get(tableId) ?? [];
            const waiter: Waiter = {
                grant: () => {
                    clearTimeout(waiter.timer);
                    if (waiter.onAbort) signal?.removeEventListener('abort', waiter.onAbort);
                    resolve();
                },
                timer: setTimeout(() => {
                    this.dropWaiter(tableId, waiter);
                    if (waiter.onAbort) signal?.removeEventListener('abort', waiter.onAbort);
                    reject(new LockTimeoutError(tableId, this.timeoutMs));
                }, this.timeoutMs)
            };
            if (signal) {
                waiter.onAbort = () => {
                    clearTimeout(waiter.timer);
                    this.dropWaiter(tableId, waiter);
                    reject(signal.reason);
                };
                signal.addEventListener('abort', waiter.onAbort, { once: true });
            }
            queue.push(waiter);
            this.queues.set(tableId, queue);
        });
    }

    /**
     * Hand the lock to the next waiter, or free it
     */
    release(tableId: string) {
        const queue = this.queues.get(tableId);
        const next = queue?.shift();
        if (queue && queue.length === 0) {
            this.queues.delete(tableId);
        }

        if (next) {
            next.grant();
        } else {
            this.held.delete(tableId);
        }
    }

    /**
     * Run work while holding every lock of the set
     *
     * Locks are taken in ascending id order and released in reverse. If one
     * acquisition times out or the signal aborts, the locks already taken are
     * released before the error propagates.
     */
    async withTables<T>(tableIds: readonly string[], work: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const ordered = Array.from(new Set(tableIds)).sort();
        const acquired: string[] = [];

        try {
            for (const tableId of ordered) {
                await this.acquire(tableId, signal);
                acquired.push(tableId);
            }
            return await work();
        } finally {
            for (const tableId of acquired.reverse()) {
                this.release(tableId);
            }
        }
    }

    isLocked(tableId: string): boolean {
        return this.held.has(tableId);
    }

    waiting(tableId: string): number {
        return this.queues.get(tableId)?.length ?? 0;
    }

    private dropWaiter(tableId: string, waiter: Waiter) {
        const queue = this.queues.get(tableId);
        if (!queue) return;

        const index = queue.indexOf(waiter);
        if (index >= 0) queue.splice(index, 1);
        if (queue.length === 0) this.queues.delete(tableId);
    }
}
