import { isErrorEvent, isEventType, type EventType, type TelemetryEvent } from '../telemetryEvent.js';
import { aggregateLatency, newestFirst } from './aggregates.js';
import type { ActivityLatencyStats, EventStore, LatencyQuery } from './types.js';

/**
 * In-memory telemetry event store, same contract as PgEventStore.
 */
export class MemoryEventStore implements EventStore {
    private rows: TelemetryEvent[] = [];
    private nextId = 1;
    private closed = false;

    async insertBatch(events: readonly TelemetryEvent[]): Promise<void> {
        this.assertOpen();
        for (const event of events) {
            if (event.traceId === '') {
                throw new Error('Telemetry event is missing a trace id');
            }
            if (!isEventType(event.eventType)) {
                throw new Error(`Invalid event type: ${event.eventType}`);
            }
        }
        for (const event of events) {
            this.rows.push(Object.freeze({ ...event, id: this.nextId++ }));
        }
    }

    async findByTraceId(traceId: string): Promise<TelemetryEvent[]> {
        return this.rows.filter(row => row.traceId === traceId);
    }

    async findByOrchestrationId(orchestrationId: string): Promise<TelemetryEvent[]> {
        return this.rows.filter(row => row.orchestrationId === orchestrationId);
    }

    async findByEventType(eventType: EventType, limit: number): Promise<TelemetryEvent[]> {
        return this.rows
            .filter(row => row.eventType === eventType)
            .sort(newestFirst)
            .slice(0, limit);
    }

    async activityPerformance(query: LatencyQuery): Promise<ActivityLatencyStats[]> {
        const samples = this.rows.flatMap(row =>
            row.eventType === 'trace'
                ? [{ activity: row.activity ?? '', timestamp: row.timestamp, valueMs: row.payload.latency_ms }]
                : []
        );
        return aggregateLatency(samples, query);
    }

    async errorEvents(limit: number): Promise<TelemetryEvent[]> {
        return this.rows
            .filter(isErrorEvent)
            .sort(newestFirst)
            .slice(0, limit);
    }

    async deleteOlderThan(cutoff: Date): Promise<number> {
        this.assertOpen();
        const before = this.rows.length;
        this.rows = this.rows.filter(row => row.timestamp.getTime() >= cutoff.getTime());
        return before - this.rows.length;
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    isClosed(): boolean {
        return this.closed;
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new Error('Event store is closed');
        }
    }
}
