/**
 * Batched Repository
 *
 * Buffers records in memory and persists them through a store in one
 * all-or-nothing insert. A single mutex guards the pending batch and is
 * held for the whole flush, so records are written in the order they were
 * accepted and a failed flush leaves the batch untouched for the next
 * attempt.
 *
 * Flushes happen when the batch reaches batchSize, on a background timer,
 * on explicit flush() and once more on close().
 */

import { Mutex } from '../concurrency/Mutex.js';
import type { Logger } from '../logging/logger.js';
import type { BatchStore } from './stores/types.js';

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_FLUSH_INTERVAL_MS = 5_000;

export interface BatchingOptions {
    readonly batchSize?: number;
    readonly flushIntervalMs?: number;
}

export class RepositoryClosedError extends Error {
    constructor(repository: string) {
        super(`${repository} is closed`);
        this.name = 'RepositoryClosedError';
    }
}

export abstract class BatchedRepository<T, S extends BatchStore<T>> {
    private batch: T[] = [];
    private readonly mutex = new Mutex();
    private readonly batchSize: number;
    private flushTimer: NodeJS.Timeout | null = null;
    private timedFlush: Promise<void> | null = null;
    private closed = false;
    private closing: Promise<void> | null = null;

    protected constructor(
        protected readonly store: S,
        protected readonly logger: Logger,
        private readonly repositoryName: string,
        options: BatchingOptions = {}
    ) {
        const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
        const flushIntervalMs = options.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
        if (!Number.isInteger(batchSize) || batchSize < 1) {
            throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
        }
        if (!(flushIntervalMs > 0)) {
            throw new RangeError(`flushIntervalMs must be positive, got ${flushIntervalMs}`);
        }
        this.batchSize = batchSize;

        this.flushTimer = setInterval(() => this.triggerTimedFlush(), flushIntervalMs);
        this.flushTimer.unref();
    }

    /**
     * Appends a record. When the batch reaches batchSize it is flushed
     * before this resolves; if that flush fails the record stays buffered
     * and the storage error is rethrown.
     */
    protected async write(record: T): Promise<void> {
        if (this.closed) {
            throw new RepositoryClosedError(this.repositoryName);
        }

        await this.mutex.runExclusive(async () => {
            this.batch.push(record);
            if (this.batch.length >= this.batchSize) {
                await this.flushLocked();
            }
        });
    }

    /**
     * Persists every pending record in one transaction.
     * Returns the number of records written.
     */
    async flush(): Promise<number> {
        return this.mutex.runExclusive(() => this.flushLocked());
    }

    /** Records accepted but not yet persisted */
    pendingCount(): number {
        return this.batch.length;
    }

    isClosed(): boolean {
        return this.closed;
    }

    /**
     * Stops the timer, waits for an in-flight timed flush, flushes what is
     * left and releases the store. Safe to call more than once.
     */
    async close(): Promise<void> {
        if (!this.closing) {
            this.closing = this.shutdown();
        }
        return this.closing;
    }

    private async shutdown(): Promise<void> {
        this.closed = true;

        if (this.flushTimer) {
            clearInterval(this.flushTimer);
            this.flushTimer = null;
        }
        if (this.timedFlush) {
            await this.timedFlush;
        }

        try {
            const written = await this.flush();
            this.logger.info({ written }, `${this.repositoryName} closed`);
        } catch (error) {
            this.logger.error(
                { error, dropped: this.batch.length },
                `${this.repositoryName} final flush failed; pending records dropped`
            );
            throw error;
        } finally {
            await this.store.close();
        }
    }

    private async flushLocked(): Promise<number> {
        if (this.batch.length === 0) return 0;

        const pending = this.batch;
        await this.store.insertBatch(pending);
        this.batch = [];

        this.logger.debug({ count: pending.length }, `${this.repositoryName} flushed batch`);
        return pending.length;
    }

    private triggerTimedFlush(): void {
        if (this.closed || this.timedFlush) return;

        this.timedFlush = this.runTimedFlush().finally(() => {
            this.timedFlush = null;
        });
    }

    private async runTimedFlush(): Promise<void> {
        try {
            await this.flush();
        } catch (error) {
            this.logger.error({ error, pending: this.batch.length }, `${this.repositoryName} timed flush failed`);
        }
    }
}
