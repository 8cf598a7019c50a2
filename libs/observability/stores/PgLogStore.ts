import type { Database } from '../../db/index.js';
import { isLogRecordLevel, serializeLogRecord, type LogRecord } from '../logRecord.js';
import { applySchema, LOG_SCHEMA_STATEMENTS } from './schema.js';
import type { ActivityLatencyStats, ErrorFrequency, LatencyQuery, LogStore } from './types.js';

interface LogRow {
    id: string;
    timestamp: Date;
    level: string;
    trace_id: string;
    span_id: string | null;
    orchestration_id: string | null;
    activity: string | null;
    message: string;
    duration_ms: string | null;
    input_hash: string | null;
    output_hash: string | null;
    error_message: string | null;
    error_hash: string | null;
}

interface LatencyRow {
    activity: string;
    count: number;
    avg_ms: number;
    max_ms: number;
    min_ms: number;
}

interface ErrorFrequencyRow {
    error_hash: string;
    error_message: string;
    frequency: number;
}

const LOG_COLUMNS = `id, timestamp, level, trace_id, span_id, orchestration_id, activity, message,
    duration_ms, input_hash, output_hash, error_message, error_hash`;

const INSERT_LOG = `INSERT INTO activity_logs (
    timestamp, level, trace_id, span_id, orchestration_id, activity, message,
    duration_ms, input_hash, output_hash, error_message, error_hash, raw_json
) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`;

export function mapLogRow(row: LogRow): LogRecord {
    // Unknown levels read back as info rather than failing the query.
    const level = isLogRecordLevel(row.level) ? row.level : 'info';
    return {
        id: Number(row.id),
        timestamp: row.timestamp,
        level,
        traceId: row.trace_id,
        message: row.message,
        ...(row.span_id ? { spanId: row.span_id } : {}),
        ...(row.orchestration_id ? { orchestrationId: row.orchestration_id } : {}),
        ...(row.activity ? { activity: row.activity } : {}),
        ...(row.duration_ms !== null ? { durationMs: Number(row.duration_ms) } : {}),
        ...(row.input_hash ? { inputHash: row.input_hash } : {}),
        ...(row.output_hash ? { outputHash: row.output_hash } : {}),
        ...(row.error_message ? { errorMessage: row.error_message } : {}),
        ...(row.error_hash ? { errorHash: row.error_hash } : {})
    };
}

function mapLatencyRow(row: LatencyRow): ActivityLatencyStats {
    return {
        activity: row.activity,
        count: row.count,
        avgMs: row.avg_ms,
        maxMs: row.max_ms,
        minMs: row.min_ms
    };
}

/**
 * PostgreSQL-backed activity log store (`activity_logs`).
 */
export class PgLogStore implements LogStore {
    constructor(private readonly db: Database) { }

    async migrate(): Promise<void> {
        await applySchema(this.db, LOG_SCHEMA_STATEMENTS);
    }

    async insertBatch(records: readonly LogRecord[]): Promise<void> {
        if (records.length === 0) return;

        await this.db.transaction(async (tx) => {
            for (const record of records) {
                await tx.query(INSERT_LOG, [
                    record.timestamp,
                    record.level,
                    record.traceId,
                    record.spanId ?? null,
                    record.orchestrationId ?? null,
                    record.activity ?? null,
                    record.message,
                    record.durationMs ?? null,
                    record.inputHash ?? null,
                    record.outputHash ?? null,
                    record.errorMessage ?? null,
                    record.errorHash ?? null,
                    serializeLogRecord(record)
                ]);
            }
        });
    }

    async findByTraceId(traceId: string): Promise<LogRecord[]> {
        const result = await this.db.query<LogRow>(
            `SELECT ${LOG_COLUMNS} FROM activity_logs WHERE trace_id = $1 ORDER BY id ASC`,
            [traceId]
        );
        return result.rows.map(mapLogRow);
    }

    async findByOrchestrationId(orchestrationId: string): Promise<LogRecord[]> {
        const result = await this.db.query<LogRow>(
            `SELECT ${LOG_COLUMNS} FROM activity_logs WHERE orchestration_id = $1 ORDER BY id ASC`,
            [orchestrationId]
        );
        return result.rows.map(mapLogRow);
    }

    async findByErrorHash(errorHash: string, limit: number): Promise<LogRecord[]> {
        const result = await this.db.query<LogRow>(
            `SELECT ${LOG_COLUMNS} FROM activity_logs WHERE error_hash = $1
             ORDER BY timestamp DESC, id DESC LIMIT $2`,
            [errorHash, limit]
        );
        return result.rows.map(mapLogRow);
    }

    async slowActivities(query: LatencyQuery): Promise<ActivityLatencyStats[]> {
        const result = await this.db.query<LatencyRow>(
            `SELECT COALESCE(activity, '') AS activity,
                    COUNT(*)::int AS count,
                    AVG(duration_ms)::float8 AS avg_ms,
                    MAX(duration_ms)::float8 AS max_ms,
                    MIN(duration_ms)::float8 AS min_ms
             FROM activity_logs
             WHERE duration_ms > 0 AND timestamp > $1
             GROUP BY activity
             HAVING MAX(duration_ms) > $2
             ORDER BY avg_ms DESC
             LIMIT $3`,
            [query.since, query.thresholdMs, query.limit]
        );
        return result.rows.map(mapLatencyRow);
    }

    async errorFrequency(limit: number): Promise<ErrorFrequency[]> {
        const result = await this.db.query<ErrorFrequencyRow>(
            `SELECT error_hash, MIN(error_message) AS error_message, COUNT(*)::int AS frequency
             FROM activity_logs
             WHERE error_hash IS NOT NULL AND error_message IS NOT NULL
             GROUP BY error_hash
             ORDER BY frequency DESC, error_hash ASC
             LIMIT $1`,
            [limit]
        );
        return result.rows.map(row => ({
            errorHash: row.error_hash,
            errorMessage: row.error_message,
            frequency: row.frequency
        }));
    }

    async deleteOlderThan(cutoff: Date): Promise<number> {
        const result = await this.db.query('DELETE FROM activity_logs WHERE timestamp < $1', [cutoff]);
        return result.rowCount ?? 0;
    }

    async close(): Promise<void> {
        await this.db.end();
    }
}
