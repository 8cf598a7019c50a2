/**
 * Integration: HTTP server
 *
 * The express app from createApp listening on a loopback ephemeral port,
 * so routing, body parsing and the error middleware run as deployed.
 *
 * @see services/telemetry-collector/src/app.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import type { Server } from 'node:http';
import { createSilentLogger } from '../../libs/logging/logger.js';
import { EventRepository } from '../../libs/observability/EventRepository.js';
import { LogRepository } from '../../libs/observability/LogRepository.js';
import { MetricsCollector } from '../../libs/observability/MetricsCollector.js';
import { OtlpReceiver } from '../../libs/observability/otlp/OtlpReceiver.js';
import { loadOtlpServices } from '../../libs/observability/otlp/protoLoader.js';
import { MemoryEventStore } from '../../libs/observability/stores/MemoryEventStore.js';
import { MemoryLogStore } from '../../libs/observability/stores/MemoryLogStore.js';
import { createApp } from '../../services/telemetry-collector/src/app.js';

const PROTOBUF = 'application/x-protobuf';

const spanRequest = (span: Record<string, unknown>) => ({ resourceSpans: [{ scopeSpans: [{ spans: [span] }] }] });

describe('HTTP server', () => {
    const logger = createSilentLogger();
    let logRepository: LogRepository;
    let eventRepository: EventRepository;
    let server: Server;
    let baseUrl: string;

    before(async () => {
        logRepository = new LogRepository(new MemoryLogStore(), logger, { batchSize: 1 });
        eventRepository = new EventRepository(new MemoryEventStore(), logger, { batchSize: 1 });
        const otlp = new OtlpReceiver(eventRepository, logger);
        const app = createApp(
            { logRepository, eventRepository, otlp, metrics: new MetricsCollector(), logger },
            { bodyLimit: '1kb' }
        );

        server = await new Promise<Server>((resolve, reject) => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
            listening.once('error', reject);
        });
        const address = server.address();
        assert.ok(address !== null && typeof address === 'object');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    after(async () => {
        await new Promise<void>((resolve, reject) => {
            server.close(error => (error ? reject(error) : resolve()));
        });
        await logRepository.close();
        await eventRepository.close();
    });

    const postJson = (path: string, body: string) => fetch(`${baseUrl}${path}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body
    });

    const tracePayloads = async (traceId: string): Promise<unknown> => {
        const events = await eventRepository.getEventsByTraceId(traceId);
        return events.map(event => event.payload);
    };

    it('answers the health check', async () => {
        const res = await fetch(`${baseUrl}/healthz`);

        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(await res.json(), { status: 'ok' });
    });

    it('ingests OTLP/HTTP JSON spans', async () => {
        const res = await postJson('/v1/traces', JSON.stringify(spanRequest({
            traceId: 'AA01',
            name: 'charge',
            startTimeUnixNano: '1000000000',
            endTimeUnixNano: '1250000000'
        })));

        assert.strictEqual(res.status, 200);
        assert.deepStrictEqual(await res.json(), {});
        assert.deepStrictEqual(await tracePayloads('aa01'), [
            { span_name: 'charge', span_status: 'OK', latency_ms: 250, attributes: {} }
        ]);
    });

    it('decodes OTLP/HTTP protobuf spans', async () => {
        const method = loadOtlpServices().traces['Export'];
        assert.ok(method);
        const wire = method.requestSerialize(spanRequest({
            traceId: Buffer.from('bb02', 'hex'),
            name: 'refund',
            startTimeUnixNano: '1000000000',
            endTimeUnixNano: '2450000000'
        }));

        const res = await fetch(`${baseUrl}/v1/traces`, {
            method: 'POST',
            headers: { 'content-type': PROTOBUF },
            body: new Uint8Array(wire)
        });

        assert.strictEqual(res.status, 200);
        assert.strictEqual(res.headers.get('content-type'), PROTOBUF);
        assert.strictEqual((await res.arrayBuffer()).byteLength, 0);
        assert.deepStrictEqual(await tracePayloads('bb02'), [
            { span_name: 'refund', span_status: 'OK', latency_ms: 1450, attributes: {} }
        ]);
    });

    it('rejects a protobuf body that does not decode', async () => {
        const res = await fetch(`${baseUrl}/v1/logs`, {
            method: 'POST',
            headers: { 'content-type': PROTOBUF },
            body: new Uint8Array([0xff, 0xff, 0xff])
        });

        assert.strictEqual(res.status, 400);
        assert.deepStrictEqual(await res.json(), { error: 'INVALID_PROTOBUF' });
    });

    it('refuses OTLP bodies of another media type', async () => {
        const res = await fetch(`${baseUrl}/v1/logs`, {
            method: 'POST',
            headers: { 'content-type': 'text/plain' },
            body: 'charge failed'
        });

        assert.strictEqual(res.status, 415);
        assert.deepStrictEqual(await res.json(), {
            error: 'UNSUPPORTED_MEDIA_TYPE',
            accepted: ['application/json', PROTOBUF]
        });
        assert.deepStrictEqual(await eventRepository.getEventsByType('log'), []);
    });

    it('maps malformed JSON to 400', async () => {
        const res = await postJson('/v1/traces', '{"resourceSpans":');

        assert.strictEqual(res.status, 400);
        assert.deepStrictEqual(await res.json(), { error: 'INVALID_JSON' });
    });

    it('maps a body over the limit to 413', async () => {
        const res = await postJson('/api/retention/prune', JSON.stringify({ olderThanMs: 1, padding: 'x'.repeat(2048) }));

        assert.strictEqual(res.status, 413);
        assert.deepStrictEqual(await res.json(), { error: 'PAYLOAD_TOO_LARGE' });
    });

    it('validates query parameters', async () => {
        const res = await fetch(`${baseUrl}/api/events?type=profile`);

        assert.strictEqual(res.status, 400);
        assert.deepStrictEqual(await res.json(), {
            error: 'INVALID_REQUEST',
            issues: [{ path: 'type', message: 'type must be one of log, metric, trace' }]
        });
    });
});
