/**
 * Circuit Breaker
 *
 * Closed: requests pass; request and failure counts roll over every
 * intervalMs. The breaker trips once at least minimumRequests were seen and
 * the failure ratio reaches the threshold.
 * Open: requests fail fast until cooldownMs elapses.
 * Half-open: a single probe is let through; success closes the breaker,
 * failure reopens it.
 *
 * Counts belong to a generation. A request that finishes after the state
 * changed does not affect the new generation's counts.
 */

import { transientError } from '../errors/classifiedError.js';
import type { Logger } from '../logging/logger.js';
import type { ActivityMiddleware } from './pipeline.js';

export const CIRCUIT_BREAKER_OPEN_CODE = 'CIRCUIT_BREAKER_OPEN';

export type CircuitState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
    readonly name: string;
    /** Failure ratio in (0, 1] that trips the breaker */
    readonly failureThreshold: number;
    readonly cooldownMs: number;
    /** Rolling window for closed-state counts; defaults to cooldownMs */
    readonly intervalMs?: number;
    readonly minimumRequests?: number;
    /** Probes allowed while half-open */
    readonly halfOpenMaxRequests?: number;
    readonly logger: Logger;
    readonly now?: () => number;
}

interface Counts {
    requests: number;
    failures: number;
    consecutiveSuccesses: number;
}

function emptyCounts(): Counts {
    return { requests: 0, failures: 0, consecutiveSuccesses: 0 };
}

export class CircuitBreaker {
    readonly name: string;

    private state: CircuitState = 'closed';
    private counts: Counts = emptyCounts();
    private generation = 0;
    private expiry = 0;

    private readonly failureThreshold: number;
    private readonly cooldownMs: number;
    private readonly intervalMs: number;
    private readonly minimumRequests: number;
    private readonly halfOpenMaxRequests: number;
    private readonly logger: Logger;
    private readonly now: () => number;

    constructor(options: CircuitBreakerOptions) {
        if (!(options.failureThreshold > 0 && options.failureThreshold <= 1)) {
            throw new RangeError(`failureThreshold must be in (0, 1], got ${options.failureThreshold}`);
        }
        if (!(options.cooldownMs > 0)) {
            throw new RangeError(`cooldownMs must be positive, got ${options.cooldownMs}`);
        }

        this.name = options.name;
        this.failureThreshold = options.failureThreshold;
        this.cooldownMs = options.cooldownMs;
        this.intervalMs = options.intervalMs ?? options.cooldownMs;
        this.minimumRequests = options.minimumRequests ?? 3;
        this.halfOpenMaxRequests = options.halfOpenMaxRequests ?? 1;
        this.logger = options.logger.child({ circuitBreaker: options.name });
        this.now = options.now ?? Date.now;

        this.startGeneration(this.now());
    }

    getState(): CircuitState {
        return this.currentState(this.now());
    }

    async execute<T>(operation: () => Promise<T>): Promise<T> {
        const generation = this.beforeRequest();
        try {
            const result = await operation();
            this.afterRequest(generation, true);
            return result;
        } catch (error) {
            this.afterRequest(generation, false);
            throw error;
        }
    }

    private beforeRequest(): number {
        const state = this.currentState(this.now());

        if (state === 'open' || (state === 'half-open' && this.counts.requests >= this.halfOpenMaxRequests)) {
            throw transientError(CIRCUIT_BREAKER_OPEN_CODE, `circuit breaker open for activity: ${this.name}`);
        }

        this.counts.requests++;
        return this.generation;
    }

    private afterRequest(generation: number, success: boolean): void {
        const now = this.now();
        const state = this.currentState(now);
        if (generation !== this.generation) return;

        if (success) {
            this.counts.consecutiveSuccesses++;
            if (state === 'half-open' && this.counts.consecutiveSuccesses >= this.halfOpenMaxRequests) {
                this.transition('closed', now);
            }
            return;
        }

        this.counts.failures++;
        this.counts.consecutiveSuccesses = 0;
        if (state === 'half-open') {
            this.transition('open', now);
        } else if (state === 'closed' && this.readyToTrip()) {
            this.transition('open', now);
        }
    }

    private readyToTrip(): boolean {
        return this.counts.requests >= this.minimumRequests
            && this.counts.failures / this.counts.requests >= this.failureThreshold;
    }

    private currentState(now: number): CircuitState {
        if (this.state === 'closed' && this.expiry <= now) {
            this.startGeneration(now);
        } else if (this.state === 'open' && this.expiry <= now) {
            this.transition('half-open', now);
        }
        return this.state;
    }

    private transition(to: CircuitState, now: number): void {
        const from = this.state;
        if (from === to) return;

        this.state = to;
        this.startGeneration(now);
        this.logger.warn({ from, to }, 'Circuit breaker state changed');
    }

    private startGeneration(now: number): void {
        this.generation++;
        this.counts = emptyCounts();
        switch (this.state) {
            case 'closed':
                this.expiry = now + this.intervalMs;
                break;
            case 'open':
                this.expiry = now + this.cooldownMs;
                break;
            case 'half-open':
                this.expiry = Number.POSITIVE_INFINITY;
                break;
        }
    }
}

export function withCircuitBreaker(breaker: CircuitBreaker): ActivityMiddleware {
    return (next) => (ctx, input) => breaker.execute(() => next(ctx, input));
}
