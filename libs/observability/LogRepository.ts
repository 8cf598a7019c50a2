import { getComponentLogger, type Logger } from '../logging/logger.js';
import { BatchedRepository, type BatchingOptions } from './BatchedRepository.js';
import type { LogRecord } from './logRecord.js';
import type { ActivityLatencyStats, ErrorFrequency, LogStore } from './stores/types.js';

export const DEFAULT_QUERY_LIMIT = 1000;
export const DEFAULT_WINDOW_MS = 60 * 60 * 1000;
export const DEFAULT_STATS_LIMIT = 10;

/** Write side of the log repository, as seen by the activity pipeline */
export interface LogSink {
    log(record: LogRecord): Promise<void>;
}

export interface LatencyWindowOptions {
    readonly thresholdMs: number;
    readonly windowMs?: number;
    readonly limit?: number;
    readonly now?: Date;
}

export function windowStart(options: { windowMs?: number; now?: Date }): Date {
    const now = options.now ?? new Date();
    return new Date(now.getTime() - (options.windowMs ?? DEFAULT_WINDOW_MS));
}

/**
 * Batched persistence and queries for activity log records.
 */
export class LogRepository extends BatchedRepository<LogRecord, LogStore> implements LogSink {
    constructor(store: LogStore, logger: Logger, options: BatchingOptions = {}) {
        super(store, getComponentLogger(logger, 'LogRepository'), 'LogRepository', options);
    }

    async log(record: LogRecord): Promise<void> {
        await this.write(record);
    }

    /** Records of one trace, in append order */
    async getLogsByTraceId(traceId: string): Promise<LogRecord[]> {
        return this.store.findByTraceId(traceId);
    }

    async getLogsByOrchestrationId(orchestrationId: string): Promise<LogRecord[]> {
        return this.store.findByOrchestrationId(orchestrationId);
    }

    /** Newest first */
    async getLogsByErrorHash(errorHash: string, limit = DEFAULT_QUERY_LIMIT): Promise<LogRecord[]> {
        return this.store.findByErrorHash(errorHash, limit);
    }

    async getSlowActivities(options: LatencyWindowOptions): Promise<ActivityLatencyStats[]> {
        return this.store.slowActivities({
            thresholdMs: options.thresholdMs,
            since: windowStart(options),
            limit: options.limit ?? DEFAULT_STATS_LIMIT
        });
    }

    async getErrorFrequency(limit = DEFAULT_STATS_LIMIT): Promise<ErrorFrequency[]> {
        return this.store.errorFrequency(limit);
    }

    /**
     * Deletes records with a timestamp strictly before now - olderThanMs.
     */
    async pruneOlderThan(olderThanMs: number, now: Date = new Date()): Promise<number> {
        const deleted = await this.store.deleteOlderThan(new Date(now.getTime() - olderThanMs));
        this.logger.info({ deleted, olderThanMs }, 'Pruned activity logs');
        return deleted;
    }
}
