import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface MetricsCollectorOptions {
    /** Also register the process/runtime default metrics */
    readonly collectDefaults?: boolean;
}

/**
 * Prometheus metrics for orchestrations, activities and compensations.
 * Each instance owns its registry.
 */
export class MetricsCollector {
    readonly registry: Registry;

    private readonly orchestrationStarted: Counter;
    private readonly orchestrationCompleted: Counter;
    private readonly orchestrationFailed: Counter;
    private readonly orchestrationDuration: Histogram;
    private readonly activityExecutions: Counter;
    private readonly activityDuration: Histogram;
    private readonly activityErrors: Counter;
    private readonly compensationExecutions: Counter;
    private readonly compensationDuration: Histogram;
    private readonly compensationErrors: Counter;

    constructor(options: MetricsCollectorOptions = {}) {
        this.registry = new Registry();
        const registers = [this.registry];

        if (options.collectDefaults) {
            collectDefaultMetrics({ register: this.registry });
        }

        this.orchestrationStarted = new Counter({
            name: 'orchestration_started_total',
            help: 'Total number of orchestrations started',
            registers
        });
        this.orchestrationCompleted = new Counter({
            name: 'orchestration_completed_total',
            help: 'Total number of orchestrations completed successfully',
            registers
        });
        this.orchestrationFailed = new Counter({
            name: 'orchestration_failed_total',
            help: 'Total number of orchestrations failed',
            registers
        });
        this.orchestrationDuration = new Histogram({
            name: 'orchestration_duration_seconds',
            help: 'Orchestration execution duration in seconds',
            buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60],
            registers
        });
        this.activityExecutions = new Counter({
            name: 'activity_executions_total',
            help: 'Total number of activity executions',
            registers
        });
        this.activityDuration = new Histogram({
            name: 'activity_duration_seconds',
            help: 'Activity execution duration in seconds',
            buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10],
            registers
        });
        this.activityErrors = new Counter({
            name: 'activity_errors_total',
            help: 'Total number of activity errors',
            registers
        });
        this.compensationExecutions = new Counter({
            name: 'compensation_executions_total',
            help: 'Total number of compensation executions',
            registers
        });
        this.compensationDuration = new Histogram({
            name: 'compensation_duration_seconds',
            help: 'Compensation execution duration in seconds',
            buckets: [0.01, 0.05, 0.1, 0.5, 1, 5],
            registers
        });
        this.compensationErrors = new Counter({
            name: 'compensation_errors_total',
            help: 'Total number of compensation errors',
            registers
        });
    }

    recordOrchestrationStart(): void {
        this.orchestrationStarted.inc();
    }

    recordOrchestrationCompleted(durationMs: number): void {
        this.orchestrationCompleted.inc();
        this.orchestrationDuration.observe(durationMs / 1000);
    }

    recordOrchestrationFailed(durationMs: number): void {
        this.orchestrationFailed.inc();
        this.orchestrationDuration.observe(durationMs / 1000);
    }

    recordActivityExecution(durationMs: number): void {
        this.activityExecutions.inc();
        this.activityDuration.observe(durationMs / 1000);
    }

    recordActivityError(): void {
        this.activityErrors.inc();
    }

    recordCompensationExecution(durationMs: number): void {
        this.compensationExecutions.inc();
        this.compensationDuration.observe(durationMs / 1000);
    }

    recordCompensationError(): void {
        this.compensationErrors.inc();
    }

    /** Prometheus text exposition */
    async render(): Promise<string> {
        return this.registry.metrics();
    }

    get contentType(): string {
        return this.registry.contentType;
    }
}
