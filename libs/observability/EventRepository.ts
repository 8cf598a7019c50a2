import { getComponentLogger, type Logger } from '../logging/logger.js';
import { BatchedRepository, type BatchingOptions } from './BatchedRepository.js';
import { DEFAULT_QUERY_LIMIT, windowStart, type LatencyWindowOptions } from './LogRepository.js';
import type { EventType, TelemetryEvent } from './telemetryEvent.js';
import type { ActivityLatencyStats, EventStore } from './stores/types.js';

const DEFAULT_PERFORMANCE_LIMIT = 100;
const DEFAULT_ERROR_EVENT_LIMIT = 100;

export interface EventSink {
    writeEvent(event: TelemetryEvent): Promise<void>;
}

/**
 * Batched persistence and queries for telemetry events (logs, metrics,
 * spans) in one table.
 */
export class EventRepository extends BatchedRepository<TelemetryEvent, EventStore> implements EventSink {
    constructor(store: EventStore, logger: Logger, options: BatchingOptions = {}) {
        super(store, getComponentLogger(logger, 'EventRepository'), 'EventRepository', options);
    }

    async writeEvent(event: TelemetryEvent): Promise<void> {
        await this.write(event);
    }

    async getEventsByTraceId(traceId: string): Promise<TelemetryEvent[]> {
        return this.store.findByTraceId(traceId);
    }

    /** Orchestration timeline in append order */
    async getEventsByOrchestrationId(orchestrationId: string): Promise<TelemetryEvent[]> {
        return this.store.findByOrchestrationId(orchestrationId);
    }

    async getEventsByType(eventType: EventType, limit = DEFAULT_QUERY_LIMIT): Promise<TelemetryEvent[]> {
        return this.store.findByEventType(eventType, limit);
    }

    /**
     * Latency of trace events per activity over the trailing window.
     */
    async getActivityPerformance(options: LatencyWindowOptions): Promise<ActivityLatencyStats[]> {
        return this.store.activityPerformance({
            thresholdMs: options.thresholdMs,
            since: windowStart(options),
            limit: options.limit ?? DEFAULT_PERFORMANCE_LIMIT
        });
    }

    async getErrorEvents(limit = DEFAULT_ERROR_EVENT_LIMIT): Promise<TelemetryEvent[]> {
        return this.store.errorEvents(limit);
    }

    async pruneOlderThan(olderThanMs: number, now: Date = new Date()): Promise<number> {
        const deleted = await this.store.deleteOlderThan(new Date(now.getTime() - olderThanMs));
        this.logger.info({ deleted, olderThanMs }, 'Pruned telemetry events');
        return deleted;
    }
}
