/**
 * Unit Tests: MetricsCollector
 *
 * @see libs/observability/MetricsCollector.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { MetricsCollector } from '../../libs/observability/MetricsCollector.js';

async function exposition(metrics: MetricsCollector): Promise<string[]> {
    return (await metrics.render()).split('\n');
}

describe('MetricsCollector', () => {
    it('counts activity executions and observes durations in seconds', async () => {
        const metrics = new MetricsCollector();
        metrics.recordActivityExecution(2000);
        metrics.recordActivityExecution(500);

        const lines = await exposition(metrics);
        assert.ok(lines.includes('activity_executions_total 2'));
        assert.ok(lines.includes('activity_duration_seconds_bucket{le="0.1"} 0'));
        assert.ok(lines.includes('activity_duration_seconds_bucket{le="0.5"} 1'));
        assert.ok(lines.includes('activity_duration_seconds_bucket{le="5"} 2'));
        assert.ok(lines.includes('activity_duration_seconds_sum 2.5'));
        assert.ok(lines.includes('activity_duration_seconds_count 2'));
    });

    it('counts activity errors separately from executions', async () => {
        const metrics = new MetricsCollector();
        metrics.recordActivityError();

        const lines = await exposition(metrics);
        assert.ok(lines.includes('activity_errors_total 1'));
        assert.ok(lines.includes('activity_executions_total 0'));
    });

    it('observes both completed and failed orchestrations', async () => {
        const metrics = new MetricsCollector();
        metrics.recordOrchestrationStart();
        metrics.recordOrchestrationStart();
        metrics.recordOrchestrationCompleted(1000);
        metrics.recordOrchestrationFailed(45_000);

        const lines = await exposition(metrics);
        assert.ok(lines.includes('orchestration_started_total 2'));
        assert.ok(lines.includes('orchestration_completed_total 1'));
        assert.ok(lines.includes('orchestration_failed_total 1'));
        assert.ok(lines.includes('orchestration_duration_seconds_bucket{le="30"} 1'));
        assert.ok(lines.includes('orchestration_duration_seconds_bucket{le="60"} 2'));
        assert.ok(lines.includes('orchestration_duration_seconds_sum 46'));
    });

    it('tracks compensations', async () => {
        const metrics = new MetricsCollector();
        metrics.recordCompensationExecution(250);
        metrics.recordCompensationError();

        const lines = await exposition(metrics);
        assert.ok(lines.includes('compensation_executions_total 1'));
        assert.ok(lines.includes('compensation_errors_total 1'));
        assert.ok(lines.includes('compensation_duration_seconds_bucket{le="0.5"} 1'));
    });

    it('keeps a separate registry per instance', async () => {
        const first = new MetricsCollector();
        const second = new MetricsCollector();
        first.recordActivityError();

        assert.ok((await exposition(first)).includes('activity_errors_total 1'));
        assert.ok((await exposition(second)).includes('activity_errors_total 0'));
    });

    it('serves the Prometheus text format', () => {
        assert.match(new MetricsCollector().contentType, /^text\/plain/);
    });

    it('adds process metrics on request', async () => {
        const lines = await exposition(new MetricsCollector({ collectDefaults: true }));
        assert.ok(lines.includes('# TYPE process_cpu_user_seconds_total counter'));
    });
});
