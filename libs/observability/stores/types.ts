import type { LogRecord } from '../logRecord.js';
import type { EventType, TelemetryEvent } from '../telemetryEvent.js';

/**
 * Storage contract behind a batched repository.
 *
 * insertBatch is all-or-nothing: either every record becomes visible or
 * none does.
 */
export interface BatchStore<T> {
    insertBatch(records: readonly T[]): Promise<void>;
    /** Deletes rows with a timestamp strictly before the cutoff */
    deleteOlderThan(cutoff: Date): Promise<number>;
    /** Releases the underlying storage resources */
    close(): Promise<void>;
}

/**
 * Per-activity latency aggregate over a trailing window.
 */
export interface ActivityLatencyStats {
    readonly activity: string;
    readonly count: number;
    readonly avgMs: number;
    readonly maxMs: number;
    readonly minMs: number;
}

export interface ErrorFrequency {
    readonly errorHash: string;
    readonly errorMessage: string;
    readonly frequency: number;
}

export interface LatencyQuery {
    /** Only activities whose maximum exceeds this value are returned */
    readonly thresholdMs: number;
    /** Start of the trailing window (exclusive) */
    readonly since: Date;
    readonly limit: number;
}

export interface LogStore extends BatchStore<LogRecord> {
    findByTraceId(traceId: string): Promise<LogRecord[]>;
    findByOrchestrationId(orchestrationId: string): Promise<LogRecord[]>;
    findByErrorHash(errorHash: string, limit: number): Promise<LogRecord[]>;
    slowActivities(query: LatencyQuery): Promise<ActivityLatencyStats[]>;
    errorFrequency(limit: number): Promise<ErrorFrequency[]>;
}

export interface EventStore extends BatchStore<TelemetryEvent> {
    findByTraceId(traceId: string): Promise<TelemetryEvent[]>;
    findByOrchestrationId(orchestrationId: string): Promise<TelemetryEvent[]>;
    findByEventType(eventType: EventType, limit: number): Promise<TelemetryEvent[]>;
    activityPerformance(query: LatencyQuery): Promise<ActivityLatencyStats[]>;
    errorEvents(limit: number): Promise<TelemetryEvent[]>;
}
