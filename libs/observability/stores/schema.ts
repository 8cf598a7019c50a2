import type { Queryable } from '../../db/index.js';

/**
 * Telemetry schema: one table for activity log records, one for generalized
 * telemetry events. Every statement is idempotent.
 */
export const LOG_SCHEMA_STATEMENTS: readonly string[] = [
    `CREATE TABLE IF NOT EXISTS activity_logs (
        id BIGSERIAL PRIMARY KEY,
        timestamp TIMESTAMPTZ NOT NULL DEFAULT now(),
        level TEXT NOT NULL,
        trace_id TEXT NOT NULL,
        span_id TEXT,
        orchestration_id TEXT,
        activity TEXT,
        message TEXT NOT NULL,
        duration_ms BIGINT,
        input_hash TEXT,
        output_hash TEXT,
        error_message TEXT,
        error_hash TEXT,
        raw_json JSONB
    )`,
    // Trace correlation
    'CREATE INDEX IF NOT EXISTS idx_activity_logs_trace_id ON activity_logs (trace_id)',
    'CREATE INDEX IF NOT EXISTS idx_activity_logs_orchestration_id ON activity_logs (orchestration_id)',
    'CREATE INDEX IF NOT EXISTS idx_activity_logs_trace_activity ON activity_logs (trace_id, activity, timestamp)',
    // Error grouping
    'CREATE INDEX IF NOT EXISTS idx_activity_logs_error_hash ON activity_logs (error_hash)',
    // Retention and trailing-window aggregates
    'CREATE INDEX IF NOT EXISTS idx_activity_logs_timestamp ON activity_logs (timestamp)',
    'CREATE INDEX IF NOT EXISTS idx_activity_logs_activity_timestamp ON activity_logs (activity, timestamp DESC)'
];

export const EVENT_SCHEMA_STATEMENTS: readonly string[] = [
    `CREATE TABLE IF NOT EXISTS task_events (
        id BIGSERIAL PRIMARY KEY,
        timestamp TIMESTAMPTZ NOT NULL DEFAULT now(),
        trace_id TEXT NOT NULL,
        span_id TEXT,
        orchestration_id TEXT,
        event_type TEXT NOT NULL CHECK (event_type IN ('log', 'metric', 'trace')),
        activity TEXT,
        payload JSONB NOT NULL
    )`,
    'CREATE INDEX IF NOT EXISTS idx_task_events_trace_id ON task_events (trace_id)',
    'CREATE INDEX IF NOT EXISTS idx_task_events_orchestration_id ON task_events (orchestration_id)',
    'CREATE INDEX IF NOT EXISTS idx_task_events_trace_activity ON task_events (trace_id, activity, timestamp)',
    'CREATE INDEX IF NOT EXISTS idx_task_events_timestamp ON task_events (timestamp)',
    'CREATE INDEX IF NOT EXISTS idx_task_events_event_type ON task_events (event_type)',
    // Orchestration timeline
    'CREATE INDEX IF NOT EXISTS idx_task_events_orchestration_timestamp ON task_events (orchestration_id, timestamp)'
];

export async function applySchema(db: Queryable, statements: readonly string[]): Promise<void> {
    for (const statement of statements) {
        await db.query(statement);
    }
}
