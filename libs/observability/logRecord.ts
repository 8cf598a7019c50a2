/**
 * Activity Log Record
 *
 * One structured log entry per activity lifecycle step. Payloads are
 * reduced to content fingerprints before the record is built; records are
 * frozen and never mutated afterwards.
 */

import { hashData, hashError } from './hashing.js';

export type LogRecordLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_RECORD_LEVELS: readonly LogRecordLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogRecord {
    /** Storage id, assigned on persistence (append order) */
    readonly id?: number;
    readonly timestamp: Date;
    readonly level: LogRecordLevel;
    readonly traceId: string;
    readonly spanId?: string;
    readonly orchestrationId?: string;
    readonly activity?: string;
    readonly message: string;
    readonly durationMs?: number;
    readonly inputHash?: string;
    readonly outputHash?: string;
    readonly errorMessage?: string;
    readonly errorHash?: string;
}

export interface CreateLogRecordInput {
    readonly level: LogRecordLevel;
    readonly traceId: string;
    readonly message: string;
    readonly timestamp?: Date;
    readonly spanId?: string;
    readonly orchestrationId?: string;
    readonly activity?: string;
    readonly durationMs?: number;
    readonly input?: Uint8Array;
    readonly output?: Uint8Array;
    readonly errorMessage?: string;
}

export function createLogRecord(input: CreateLogRecordInput): LogRecord {
    const record: LogRecord = {
        timestamp: input.timestamp ?? new Date(),
        level: input.level,
        traceId: input.traceId,
        message: input.message,
        ...(input.spanId ? { spanId: input.spanId } : {}),
        ...(input.orchestrationId ? { orchestrationId: input.orchestrationId } : {}),
        ...(input.activity ? { activity: input.activity } : {}),
        ...(input.durationMs !== undefined ? { durationMs: Math.round(input.durationMs) } : {}),
        ...(input.input && input.input.length > 0 ? { inputHash: hashData(input.input) } : {}),
        ...(input.output && input.output.length > 0 ? { outputHash: hashData(input.output) } : {}),
        ...(input.errorMessage
            ? { errorMessage: input.errorMessage, errorHash: hashError(input.errorMessage) }
            : {})
    };

    return Object.freeze(record);
}

/**
 * JSON form stored alongside the indexed columns.
 */
export function serializeLogRecord(record: LogRecord): string {
    return JSON.stringify({
        timestamp: record.timestamp.toISOString(),
        level: record.level,
        trace_id: record.traceId,
        span_id: record.spanId,
        orchestration_id: record.orchestrationId,
        activity: record.activity,
        message: record.message,
        duration_ms: record.durationMs,
        input_hash: record.inputHash,
        output_hash: record.outputHash,
        error: record.errorMessage,
        error_hash: record.errorHash
    });
}

export function isLogRecordLevel(value: string): value is LogRecordLevel {
    return LOG_RECORD_LEVELS.some(level => level === value);
}
