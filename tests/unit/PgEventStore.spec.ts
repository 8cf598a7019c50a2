/**
 * Unit Tests: PostgreSQL event store
 *
 * @see libs/observability/stores/PgEventStore.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ZodError } from 'zod';
import { createSilentLogger } from '../../libs/logging/logger.js';
import { mapEventRow, PgEventStore } from '../../libs/observability/stores/PgEventStore.js';
import { EVENT_SCHEMA_STATEMENTS } from '../../libs/observability/stores/schema.js';
import { newMetricEvent, newTraceEvent } from '../../libs/observability/telemetryEvent.js';
import { createCapturingLogger } from '../helpers/captureLogger.js';
import { createFakeDatabase } from '../helpers/fakeDatabase.js';

const TS = new Date('2024-05-01T12:00:00.000Z');

const traceRow = {
    id: '7',
    timestamp: TS,
    trace_id: 'trace-1',
    span_id: null,
    orchestration_id: 'orch-1',
    event_type: 'trace',
    activity: 'charge',
    payload: { span_name: 'charge', span_status: 'OK', latency_ms: 12 }
};

describe('PgEventStore', () => {
    it('applies the schema statements in order', async () => {
        const fake = createFakeDatabase();
        await new PgEventStore(fake.db, createSilentLogger()).migrate();

        assert.deepStrictEqual(fake.queries.map(query => query.text), EVENT_SCHEMA_STATEMENTS);
    });

    it('inserts events inside one transaction with a JSON payload', async () => {
        const fake = createFakeDatabase();
        const span = newTraceEvent({
            traceId: 'trace-1',
            spanId: 'span-1',
            spanName: 'charge',
            timestamp: TS,
            latencyMs: 12,
            status: 'OK',
            attributes: { activity: 'charge', orchestration_id: 'orch-1' }
        });
        const gauge = newMetricEvent({ traceId: 'trace-2', timestamp: TS, metricName: 'queue_depth', value: 3, unit: '1', attributes: {} });

        await new PgEventStore(fake.db, createSilentLogger()).insertBatch([span, gauge]);

        assert.ok(fake.queries.every(query => query.inTransaction));
        assert.deepStrictEqual(fake.queries[0]?.params, [
            TS, 'trace-1', 'span-1', 'orch-1', 'trace', 'charge',
            JSON.stringify(span.payload)
        ]);
        assert.deepStrictEqual(fake.queries[1]?.params, [
            TS, 'trace-2', null, null, 'metric', null,
            '{"metric_name":"queue_depth","metric_value":3,"metric_unit":"1","attributes":{}}'
        ]);
    });

    it('writes nothing for an empty batch', async () => {
        const fake = createFakeDatabase();
        await new PgEventStore(fake.db, createSilentLogger()).insertBatch([]);

        assert.strictEqual(fake.queries.length, 0);
    });

    it('queries one event type newest first with a limit', async () => {
        const fake = createFakeDatabase(() => ({ rows: [traceRow] }));
        const events = await new PgEventStore(fake.db, createSilentLogger()).findByEventType('trace', 5);

        assert.match(fake.queries[0]?.text ?? '', /ORDER BY timestamp DESC, id DESC LIMIT \$2$/);
        assert.deepStrictEqual(fake.queries[0]?.params, ['trace', 5]);
        assert.strictEqual(events[0]?.id, 7);
    });

    it('leaves unreadable rows out of query results', async () => {
        const corruptMetric = {
            ...traceRow,
            id: '8',
            event_type: 'metric',
            payload: { metric_name: 'queue_depth', metric_value: null, metric_unit: '1', attributes: {} }
        };
        const fake = createFakeDatabase(() => ({ rows: [corruptMetric, traceRow] }));
        const capture = createCapturingLogger();

        const events = await new PgEventStore(fake.db, capture.logger).findByTraceId('trace-1');

        assert.deepStrictEqual(events.map(event => event.id), [7]);
        const [line] = capture.withMessage('Skipped unreadable task_events row');
        assert.strictEqual(line?.['eventId'], '8');
        assert.strictEqual(line?.['eventType'], 'metric');
        assert.strictEqual(line?.['component'], 'PgEventStore');
    });

    it('matches both span error statuses', async () => {
        const fake = createFakeDatabase();
        await new PgEventStore(fake.db, createSilentLogger()).errorEvents(20);

        assert.ok(fake.queries[0]?.text.includes(`IN ('ERROR', 'STATUS_CODE_ERROR')`));
        assert.deepStrictEqual(fake.queries[0]?.params, [20]);
    });

    it('aggregates span latency from the payload', async () => {
        const fake = createFakeDatabase(() => ({
            rows: [{ activity: 'charge', count: 1, avg_ms: 12, max_ms: 12, min_ms: 12 }]
        }));
        const since = new Date('2024-05-01T11:00:00.000Z');

        const stats = await new PgEventStore(fake.db, createSilentLogger()).activityPerformance({ since, thresholdMs: 0, limit: 100 });

        assert.deepStrictEqual(fake.queries[0]?.params, [since, 0, 100]);
        assert.deepStrictEqual(stats, [{ activity: 'charge', count: 1, avgMs: 12, maxMs: 12, minMs: 12 }]);
    });

    it('reports the deleted row count and ends the database on close', async () => {
        const fake = createFakeDatabase(() => ({ rowCount: 2 }));
        const store = new PgEventStore(fake.db, createSilentLogger());

        assert.strictEqual(await store.deleteOlderThan(TS), 2);
        await store.close();
        assert.strictEqual(fake.endCalls(), 1);
    });
});

describe('mapEventRow', () => {
    it('rebuilds a typed event with defaulted attributes', () => {
        assert.deepStrictEqual(mapEventRow(traceRow), {
            id: 7,
            timestamp: TS,
            traceId: 'trace-1',
            orchestrationId: 'orch-1',
            activity: 'charge',
            eventType: 'trace',
            payload: { span_name: 'charge', span_status: 'OK', latency_ms: 12, attributes: {} }
        });
    });

    it('rejects an unknown event type', () => {
        assert.throws(
            () => mapEventRow({ ...traceRow, event_type: 'profile' }),
            { message: 'Unknown event type in task_events row 7: profile' }
        );
    });

    it('rejects a payload that does not fit its event type', () => {
        assert.throws(() => mapEventRow({ ...traceRow, payload: { span_name: 'charge' } }), ZodError);
    });
});
