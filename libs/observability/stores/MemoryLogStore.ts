import { isLogRecordLevel, type LogRecord } from '../logRecord.js';
import { aggregateLatency, newestFirst } from './aggregates.js';
import type { ActivityLatencyStats, ErrorFrequency, LatencyQuery, LogStore } from './types.js';

/**
 * In-memory log store for tests and local runs. Mirrors the PostgreSQL
 * store's contract: ids in append order, all-or-nothing batch inserts.
 */
export class MemoryLogStore implements LogStore {
    private rows: LogRecord[] = [];
    private nextId = 1;
    private closed = false;

    async insertBatch(records: readonly LogRecord[]): Promise<void> {
        this.assertOpen();
        // Validate the whole batch before anything becomes visible.
        for (const record of records) {
            if (record.traceId === '') {
                throw new Error('Log record is missing a trace id');
            }
            if (!isLogRecordLevel(record.level)) {
                throw new Error(`Invalid log level: ${record.level}`);
            }
        }
        for (const record of records) {
            this.rows.push(Object.freeze({ ...record, id: this.nextId++ }));
        }
    }

    async findByTraceId(traceId: string): Promise<LogRecord[]> {
        return this.rows.filter(row => row.traceId === traceId);
    }

    async findByOrchestrationId(orchestrationId: string): Promise<LogRecord[]> {
        return this.rows.filter(row => row.orchestrationId === orchestrationId);
    }

    async findByErrorHash(errorHash: string, limit: number): Promise<LogRecord[]> {
        return this.rows
            .filter(row => row.errorHash === errorHash)
            .sort(newestFirst)
            .slice(0, limit);
    }

    async slowActivities(query: LatencyQuery): Promise<ActivityLatencyStats[]> {
        const samples = this.rows.flatMap(row =>
            row.durationMs !== undefined && row.durationMs > 0
                ? [{ activity: row.activity ?? '', timestamp: row.timestamp, valueMs: row.durationMs }]
                : []
        );
        return aggregateLatency(samples, query);
    }

    async errorFrequency(limit: number): Promise<ErrorFrequency[]> {
        const groups = new Map<string, { errorMessage: string; frequency: number }>();
        for (const row of this.rows) {
            if (!row.errorHash || !row.errorMessage) continue;
            const group = groups.get(row.errorHash);
            if (group) {
                group.frequency++;
                if (row.errorMessage < group.errorMessage) group.errorMessage = row.errorMessage;
            } else {
                groups.set(row.errorHash, { errorMessage: row.errorMessage, frequency: 1 });
            }
        }

        return [...groups.entries()]
            .map(([errorHash, group]) => ({ errorHash, ...group }))
            .sort((a, b) => b.frequency - a.frequency || (a.errorHash < b.errorHash ? -1 : 1))
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
            throw new Error('Log store is closed');
        }
    }
}
