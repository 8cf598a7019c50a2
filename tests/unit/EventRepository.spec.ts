/**
 * Unit Tests: Event repository
 *
 * Runs against the in-memory event store.
 *
 * @see libs/observability/EventRepository.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { createSilentLogger } from '../../libs/logging/logger.js';
import { EventRepository } from '../../libs/observability/EventRepository.js';
import {
    newLogEvent,
    newMetricEvent,
    newTraceEvent,
    type TelemetryEvent
} from '../../libs/observability/telemetryEvent.js';
import { MemoryEventStore } from '../../libs/observability/stores/MemoryEventStore.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');
const minutesAgo = (minutes: number) => new Date(NOW.getTime() - minutes * 60_000);

function span(activity: string, latencyMs: number, minutes: number, status = 'OK', traceId = 'trace-1') {
    return newTraceEvent({
        traceId,
        spanName: activity,
        timestamp: minutesAgo(minutes),
        latencyMs,
        status,
        attributes: { activity, orchestration_id: 'orch-1' }
    });
}

function log(message: string, minutes: number, error?: string) {
    return newLogEvent({
        traceId: 'trace-1',
        timestamp: minutesAgo(minutes),
        message,
        severity: error ? 'ERROR' : 'INFO',
        ...(error ? { error } : {}),
        attributes: {}
    });
}

function metric(name: string, minutes: number) {
    return newMetricEvent({ traceId: 'trace-2', timestamp: minutesAgo(minutes), metricName: name, value: 1, unit: '1', attributes: {} });
}

function names(events: TelemetryEvent[]): string[] {
    return events.map(event => {
        switch (event.eventType) {
            case 'log':
                return event.payload.msg;
            case 'metric':
                return event.payload.metric_name;
            case 'trace':
                return `${event.payload.span_name}:${event.payload.span_status}`;
        }
    });
}

describe('EventRepository', () => {
    let store: MemoryEventStore;
    let repository: EventRepository;

    beforeEach(() => {
        store = new MemoryEventStore();
        repository = new EventRepository(store, createSilentLogger(), { batchSize: 50, flushIntervalMs: 60_000 });
    });

    afterEach(async () => {
        await repository.close();
    });

    async function writeAll(events: TelemetryEvent[]): Promise<void> {
        for (const event of events) {
            await repository.writeEvent(event);
        }
        await repository.flush();
    }

    it('returns a trace in append order', async () => {
        await writeAll([span('charge', 10, 1), log('charged', 5), metric('queue_depth', 1), span('reserve', 20, 1)]);

        const events = await repository.getEventsByTraceId('trace-1');
        assert.deepStrictEqual(names(events), ['charge:OK', 'charged', 'reserve:OK']);
        assert.deepStrictEqual(events.map(event => event.id), [1, 2, 4]);
    });

    it('returns an orchestration timeline in append order', async () => {
        await writeAll([span('charge', 10, 1), log('unrelated', 1), span('reserve', 20, 2)]);

        const events = await repository.getEventsByOrchestrationId('orch-1');
        assert.deepStrictEqual(names(events), ['charge:OK', 'reserve:OK']);
        assert.strictEqual(events[0]?.activity, 'charge');
    });

    it('returns events of one type newest first', async () => {
        await writeAll([metric('a', 3), metric('b', 1), span('charge', 10, 0), metric('c', 2)]);

        assert.deepStrictEqual(names(await repository.getEventsByType('metric')), ['b', 'c', 'a']);
        assert.deepStrictEqual(names(await repository.getEventsByType('metric', 1)), ['b']);
    });

    it('aggregates span latency per activity', async () => {
        await writeAll([
            span('charge', 100, 10),
            span('charge', 400, 5),
            span('reserve', 30, 5),
            span('notify', 2000, 120),
            log('not a span', 1)
        ]);

        const stats = await repository.getActivityPerformance({ thresholdMs: 50, now: NOW });
        assert.deepStrictEqual(stats, [{ activity: 'charge', count: 2, avgMs: 250, maxMs: 400, minMs: 100 }]);

        const all = await repository.getActivityPerformance({ thresholdMs: 0, windowMs: 3 * 60 * 60_000, now: NOW });
        assert.deepStrictEqual(all.map(stat => stat.activity), ['notify', 'charge', 'reserve']);
    });

    it('returns error events newest first', async () => {
        await writeAll([
            log('fine', 4),
            log('failed', 3, 'PAYMENT_FAILED: timeout'),
            span('charge', 10, 2, 'ERROR'),
            span('reserve', 10, 1, 'STATUS_CODE_ERROR'),
            span('notify', 10, 0, 'OK'),
            metric('errors_total', 0)
        ]);

        assert.deepStrictEqual(names(await repository.getErrorEvents()), ['reserve:STATUS_CODE_ERROR', 'charge:ERROR', 'failed']);
        assert.deepStrictEqual(names(await repository.getErrorEvents(1)), ['reserve:STATUS_CODE_ERROR']);
    });

    it('prunes events strictly older than the cutoff', async () => {
        await writeAll([log('stale', 10), log('fresh', 0)]);

        assert.strictEqual(await repository.pruneOlderThan(5 * 60_000, NOW), 1);
        assert.deepStrictEqual(names(await repository.getEventsByTraceId('trace-1')), ['fresh']);
    });

    it('releases the store on close', async () => {
        await repository.writeEvent(log('pending', 0));
        await repository.close();

        assert.strictEqual(store.isClosed(), true);
        assert.deepStrictEqual(names(await store.findByTraceId('trace-1')), ['pending']);
    });
});

describe('MemoryEventStore', () => {
    it('rejects a whole batch containing an event without a trace id', async () => {
        const store = new MemoryEventStore();
        const bad = newLogEvent({ traceId: '', timestamp: NOW, message: 'm', severity: 'INFO', attributes: {} });

        await assert.rejects(store.insertBatch([log('good', 0), bad]), { message: 'Telemetry event is missing a trace id' });
        assert.deepStrictEqual(await store.findByTraceId('trace-1'), []);
    });

    it('refuses writes once closed', async () => {
        const store = new MemoryEventStore();
        await store.close();
        await assert.rejects(store.insertBatch([log('late', 0)]), { message: 'Event store is closed' });
    });
});
