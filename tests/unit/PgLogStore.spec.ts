/**
 * Unit Tests: PostgreSQL log store
 *
 * Statements and row mapping against a recording database double.
 *
 * @see libs/observability/stores/PgLogStore.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { hashError } from '../../libs/observability/hashing.js';
import { createLogRecord, serializeLogRecord } from '../../libs/observability/logRecord.js';
import { mapLogRow, PgLogStore } from '../../libs/observability/stores/PgLogStore.js';
import { LOG_SCHEMA_STATEMENTS } from '../../libs/observability/stores/schema.js';
import { createFakeDatabase } from '../helpers/fakeDatabase.js';

const TS = new Date('2024-05-01T12:00:00.000Z');

const row = {
    id: '42',
    timestamp: TS,
    level: 'error',
    trace_id: 'trace-1',
    span_id: null,
    orchestration_id: 'orch-1',
    activity: 'charge',
    message: 'Activity failed',
    duration_ms: '1500',
    input_hash: 'abc',
    output_hash: null,
    error_message: 'PAYMENT_FAILED: timeout',
    error_hash: 'def'
};

describe('PgLogStore', () => {
    it('applies the schema statements in order', async () => {
        const fake = createFakeDatabase();
        await new PgLogStore(fake.db).migrate();

        assert.deepStrictEqual(fake.queries.map(query => query.text), LOG_SCHEMA_STATEMENTS);
    });

    it('writes nothing for an empty batch', async () => {
        const fake = createFakeDatabase();
        await new PgLogStore(fake.db).insertBatch([]);

        assert.strictEqual(fake.queries.length, 0);
    });

    it('inserts a batch inside one transaction', async () => {
        const fake = createFakeDatabase();
        const failed = createLogRecord({
            level: 'error',
            traceId: 'trace-1',
            message: 'Activity failed',
            timestamp: TS,
            activity: 'charge',
            durationMs: 12.4,
            errorMessage: 'PAYMENT_FAILED: timeout'
        });
        const started = createLogRecord({ level: 'info', traceId: 'trace-1', message: 'Activity started', timestamp: TS });

        await new PgLogStore(fake.db).insertBatch([failed, started]);

        assert.strictEqual(fake.queries.length, 2);
        assert.ok(fake.queries.every(query => query.inTransaction));
        assert.deepStrictEqual(fake.queries[0]?.params, [
            TS, 'error', 'trace-1', null, null, 'charge', 'Activity failed',
            12, null, null, 'PAYMENT_FAILED: timeout', hashError('PAYMENT_FAILED: timeout'),
            serializeLogRecord(failed)
        ]);
        assert.deepStrictEqual(fake.queries[1]?.params?.slice(0, 8), [TS, 'info', 'trace-1', null, null, null, 'Activity started', null]);
    });

    it('reads a trace in id order', async () => {
        const fake = createFakeDatabase(() => ({ rows: [row] }));
        const records = await new PgLogStore(fake.db).findByTraceId('trace-1');

        assert.match(fake.queries[0]?.text ?? '', /WHERE trace_id = \$1 ORDER BY id ASC$/);
        assert.deepStrictEqual(fake.queries[0]?.params, ['trace-1']);
        assert.strictEqual(records[0]?.id, 42);
    });

    it('limits error hash lookups', async () => {
        const fake = createFakeDatabase();
        await new PgLogStore(fake.db).findByErrorHash('def', 25);

        assert.deepStrictEqual(fake.queries[0]?.params, ['def', 25]);
    });

    it('passes the window, threshold and limit to the latency aggregate', async () => {
        const fake = createFakeDatabase(() => ({
            rows: [{ activity: 'charge', count: 2, avg_ms: 250, max_ms: 400, min_ms: 100 }]
        }));
        const since = new Date('2024-05-01T11:00:00.000Z');

        const stats = await new PgLogStore(fake.db).slowActivities({ since, thresholdMs: 100, limit: 5 });

        assert.deepStrictEqual(fake.queries[0]?.params, [since, 100, 5]);
        assert.deepStrictEqual(stats, [{ activity: 'charge', count: 2, avgMs: 250, maxMs: 400, minMs: 100 }]);
    });

    it('maps error frequency rows', async () => {
        const fake = createFakeDatabase(() => ({
            rows: [{ error_hash: 'def', error_message: 'PAYMENT_FAILED: network', frequency: 3 }]
        }));

        const frequencies = await new PgLogStore(fake.db).errorFrequency(3);

        assert.deepStrictEqual(fake.queries[0]?.params, [3]);
        assert.deepStrictEqual(frequencies, [{ errorHash: 'def', errorMessage: 'PAYMENT_FAILED: network', frequency: 3 }]);
    });

    it('reports the deleted row count', async () => {
        const cutoff = new Date('2024-04-01T00:00:00.000Z');
        const deleting = createFakeDatabase(() => ({ rowCount: 4 }));
        assert.strictEqual(await new PgLogStore(deleting.db).deleteOlderThan(cutoff), 4);
        assert.deepStrictEqual(deleting.queries[0]?.params, [cutoff]);

        const unknown = createFakeDatabase(() => ({ rowCount: null }));
        assert.strictEqual(await new PgLogStore(unknown.db).deleteOlderThan(cutoff), 0);
    });

    it('ends the database on close', async () => {
        const fake = createFakeDatabase();
        await new PgLogStore(fake.db).close();

        assert.strictEqual(fake.endCalls(), 1);
    });
});

describe('mapLogRow', () => {
    it('converts columns and omits nulls', () => {
        assert.deepStrictEqual(mapLogRow(row), {
            id: 42,
            timestamp: TS,
            level: 'error',
            traceId: 'trace-1',
            message: 'Activity failed',
            orchestrationId: 'orch-1',
            activity: 'charge',
            durationMs: 1500,
            inputHash: 'abc',
            errorMessage: 'PAYMENT_FAILED: timeout',
            errorHash: 'def'
        });
    });

    it('reads an unknown level back as info', () => {
        assert.strictEqual(mapLogRow({ ...row, level: 'fatal' }).level, 'info');
    });
});
