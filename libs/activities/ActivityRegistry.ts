/**
 * Activity Registry
 *
 * Named activities, each wrapped once at registration in the execution
 * pipeline (outermost first):
 *
 *   logging → metrics → timeout → gRPC classification → retry → circuit breaker → activity
 *
 * Metrics and the circuit breaker are optional.
 */

import { permanentError } from '../errors/classifiedError.js';
import { getComponentLogger, type Logger } from '../logging/logger.js';
import { CircuitBreaker, withCircuitBreaker } from '../middleware/CircuitBreaker.js';
import { withGrpcErrorClassification } from '../middleware/grpcError.js';
import { withLogging } from '../middleware/logging.js';
import { withMetrics } from '../middleware/metrics.js';
import {
    applyMiddleware,
    type ActivityContext,
    type ActivityFunc,
    type ActivityMiddleware
} from '../middleware/pipeline.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../middleware/retry.js';
import { withTimeout } from '../middleware/timeout.js';
import type { EventSink } from '../observability/EventRepository.js';
import type { LogSink } from '../observability/LogRepository.js';
import type { MetricsCollector } from '../observability/MetricsCollector.js';

export const ACTIVITY_NOT_FOUND_CODE = 'ACTIVITY_NOT_FOUND';
export const DEFAULT_ACTIVITY_TIMEOUT_MS = 30_000;

export interface CircuitBreakerSettings {
    readonly failureThreshold: number;
    readonly cooldownMs: number;
}

export interface ActivityRegistryDependencies {
    readonly logger: Logger;
    readonly logSink?: LogSink;
    readonly eventSink?: EventSink;
    readonly metrics?: MetricsCollector;
    readonly retryPolicy?: RetryPolicy;
    readonly timeoutMs?: number;
    /** Applied to activities registered with `circuitBreaker: true` */
    readonly circuitBreaker?: CircuitBreakerSettings;
    readonly now?: () => number;
}

export interface RegisterOptions {
    readonly retryPolicy?: RetryPolicy;
    readonly timeoutMs?: number;
    /** true uses the registry defaults; an object overrides them */
    readonly circuitBreaker?: boolean | CircuitBreakerSettings;
}

interface RegisteredActivity {
    readonly invoke: ActivityFunc;
    readonly breaker?: CircuitBreaker;
}

export class ActivityRegistry {
    private readonly activities = new Map<string, RegisteredActivity>();
    private readonly logger: Logger;

    constructor(private readonly deps: ActivityRegistryDependencies) {
        this.logger = getComponentLogger(deps.logger, 'ActivityRegistry');
    }

    register(name: string, activity: ActivityFunc, options: RegisterOptions = {}): void {
        if (this.activities.has(name)) {
            throw new Error(`Activity already registered: ${name}`);
        }

        const breaker = this.createBreaker(name, options.circuitBreaker);
        const stages: ActivityMiddleware[] = [
            withLogging(name, {
                logger: this.deps.logger,
                logSink: this.deps.logSink,
                eventSink: this.deps.eventSink,
                now: this.deps.now
            })
        ];
        if (this.deps.metrics) {
            stages.push(withMetrics(this.deps.metrics, this.deps.now));
        }
        stages.push(
            withTimeout(options.timeoutMs ?? this.deps.timeoutMs ?? DEFAULT_ACTIVITY_TIMEOUT_MS, this.logger),
            withGrpcErrorClassification(),
            withRetry(options.retryPolicy ?? this.deps.retryPolicy ?? DEFAULT_RETRY_POLICY, {
                logger: this.logger.child({ activity: name })
            })
        );
        if (breaker) {
            stages.push(withCircuitBreaker(breaker));
        }

        this.activities.set(name, {
            invoke: applyMiddleware(activity, ...stages),
            ...(breaker ? { breaker } : {})
        });
        this.logger.debug({ activity: name, circuitBreaker: breaker !== undefined }, 'Activity registered');
    }

    has(name: string): boolean {
        return this.activities.has(name);
    }

    names(): string[] {
        return [...this.activities.keys()];
    }

    circuitBreaker(name: string): CircuitBreaker | undefined {
        return this.activities.get(name)?.breaker;
    }

    async invoke(name: string, ctx: ActivityContext, input: Uint8Array): Promise<Uint8Array> {
        const registered = this.activities.get(name);
        if (!registered) {
            throw permanentError(ACTIVITY_NOT_FOUND_CODE, `activity not registered: ${name}`);
        }
        return registered.invoke({ ...ctx, activityName: name }, input);
    }

    private createBreaker(
        name: string,
        setting: boolean | CircuitBreakerSettings | undefined
    ): CircuitBreaker | undefined {
        if (!setting) return undefined;

        const settings = setting === true ? this.deps.circuitBreaker : setting;
        if (!settings) {
            throw new Error(`Activity ${name} requests a circuit breaker but no defaults are configured`);
        }
        return new CircuitBreaker({
            name,
            failureThreshold: settings.failureThreshold,
            cooldownMs: settings.cooldownMs,
            logger: this.logger,
            now: this.deps.now
        });
    }
}
