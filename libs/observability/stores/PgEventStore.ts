import type { Database } from '../../db/index.js';
import { getComponentLogger, type Logger } from '../../logging/logger.js';
import { eventFromStored, isEventType, type EventType, type TelemetryEvent } from '../telemetryEvent.js';
import { applySchema, EVENT_SCHEMA_STATEMENTS } from './schema.js';
import type { ActivityLatencyStats, EventStore, LatencyQuery } from './types.js';

interface EventRow {
    id: string;
    timestamp: Date;
    trace_id: string;
    span_id: string | null;
    orchestration_id: string | null;
    event_type: string;
    activity: string | null;
    payload: unknown;
}

interface LatencyRow {
    activity: string;
    count: number;
    avg_ms: number;
    max_ms: number;
    min_ms: number;
}

const EVENT_COLUMNS = 'id, timestamp, trace_id, span_id, orchestration_id, event_type, activity, payload';

const INSERT_EVENT = `INSERT INTO task_events (
    timestamp, trace_id, span_id, orchestration_id, event_type, activity, payload
) VALUES ($1, $2, $3, $4, $5, $6, $7)`;

export function mapEventRow(row: EventRow): TelemetryEvent {
    if (!isEventType(row.event_type)) {
        throw new Error(`Unknown event type in task_events row ${row.id}: ${row.event_type}`);
    }
    return eventFromStored({
        id: Number(row.id),
        timestamp: row.timestamp,
        traceId: row.trace_id,
        eventType: row.event_type,
        payload: row.payload,
        ...(row.span_id ? { spanId: row.span_id } : {}),
        ...(row.orchestration_id ? { orchestrationId: row.orchestration_id } : {}),
        ...(row.activity ? { activity: row.activity } : {})
    });
}

/**
 * PostgreSQL-backed telemetry event store (`task_events`). Payloads are
 * stored as JSONB and validated against their event type on read; a row
 * that fails validation is logged and left out of the result.
 */
export class PgEventStore implements EventStore {
    private readonly logger: Logger;

    constructor(private readonly db: Database, logger: Logger) {
        this.logger = getComponentLogger(logger, 'PgEventStore');
    }

    async migrate(): Promise<void> {
        await applySchema(this.db, EVENT_SCHEMA_STATEMENTS);
    }

    async insertBatch(events: readonly TelemetryEvent[]): Promise<void> {
        if (events.length === 0) return;

        await this.db.transaction(async (tx) => {
            for (const event of events) {
                await tx.query(INSERT_EVENT, [
                    event.timestamp,
                    event.traceId,
                    event.spanId ?? null,
                    event.orchestrationId ?? null,
                    event.eventType,
                    event.activity ?? null,
                    JSON.stringify(event.payload)
                ]);
            }
        });
    }

    async findByTraceId(traceId: string): Promise<TelemetryEvent[]> {
        const result = await this.db.query<EventRow>(
            `SELECT ${EVENT_COLUMNS} FROM task_events WHERE trace_id = $1 ORDER BY id ASC`,
            [traceId]
        );
        return this.readRows(result.rows);
    }

    async findByOrchestrationId(orchestrationId: string): Promise<TelemetryEvent[]> {
        const result = await this.db.query<EventRow>(
            `SELECT ${EVENT_COLUMNS} FROM task_events WHERE orchestration_id = $1 ORDER BY id ASC`,
            [orchestrationId]
        );
        return this.readRows(result.rows);
    }

    async findByEventType(eventType: EventType, limit: number): Promise<TelemetryEvent[]> {
        const result = await this.db.query<EventRow>(
            `SELECT ${EVENT_COLUMNS} FROM task_events WHERE event_type = $1
             ORDER BY timestamp DESC, id DESC LIMIT $2`,
            [eventType, limit]
        );
        return this.readRows(result.rows);
    }

    async activityPerformance(query: LatencyQuery): Promise<ActivityLatencyStats[]> {
        const result = await this.db.query<LatencyRow>(
            `SELECT COALESCE(activity, '') AS activity,
                    COUNT(*)::int AS count,
                    AVG((payload->>'latency_ms')::float8)::float8 AS avg_ms,
                    MAX((payload->>'latency_ms')::float8)::float8 AS max_ms,
                    MIN((payload->>'latency_ms')::float8)::float8 AS min_ms
             FROM task_events
             WHERE event_type = 'trace' AND timestamp > $1
             GROUP BY activity
             HAVING MAX((payload->>'latency_ms')::float8) > $2
             ORDER BY avg_ms DESC
             LIMIT $3`,
            [query.since, query.thresholdMs, query.limit]
        );
        return result.rows.map(row => ({
            activity: row.activity,
            count: row.count,
            avgMs: row.avg_ms,
            maxMs: row.max_ms,
            minMs: row.min_ms
        }));
    }

    async errorEvents(limit: number): Promise<TelemetryEvent[]> {
        const result = await this.db.query<EventRow>(
            `SELECT ${EVENT_COLUMNS} FROM task_events
             WHERE payload->>'error' IS NOT NULL
                OR payload->>'span_status' IN ('ERROR', 'STATUS_CODE_ERROR')
             ORDER BY timestamp DESC, id DESC
             LIMIT $1`,
            [limit]
        );
        return this.readRows(result.rows);
    }

    private readRows(rows: readonly EventRow[]): TelemetryEvent[] {
        const events: TelemetryEvent[] = [];
        for (const row of rows) {
            try {
                events.push(mapEventRow(row));
            } catch (error) {
                this.logger.warn({ error, eventId: row.id, eventType: row.event_type }, 'Skipped unreadable task_events row');
            }
        }
        return events;
    }

    async deleteOlderThan(cutoff: Date): Promise<number> {
        const result = await this.db.query('DELETE FROM task_events WHERE timestamp < $1', [cutoff]);
        return result.rowCount ?? 0;
    }

    async close(): Promise<void> {
        await this.db.end();
    }
}
