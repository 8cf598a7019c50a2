import { describeError } from '../errors/classifiedError.js';
import { isRetryableKind, type ErrorKind } from '../errors/errorKinds.js';
import type { Logger } from '../logging/logger.js';
import { activityErrorKind } from './grpcError.js';
import type { ActivityMiddleware } from './pipeline.js';

export interface RetryPolicy {
    readonly maxAttempts: number;
    readonly initialBackoffMs: number;
    readonly maxBackoffMs: number;
    readonly backoffMultiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
    maxAttempts: 3,
    initialBackoffMs: 100,
    maxBackoffMs: 30_000,
    backoffMultiplier: 2
});

export function validateRetryPolicy(policy: RetryPolicy): RetryPolicy {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
        throw new RangeError(`maxAttempts must be an integer >= 1, got ${policy.maxAttempts}`);
    }
    if (policy.initialBackoffMs < 0 || policy.maxBackoffMs < 0) {
        throw new RangeError('Backoff durations must not be negative');
    }
    if (policy.backoffMultiplier < 1) {
        throw new RangeError(`backoffMultiplier must be >= 1, got ${policy.backoffMultiplier}`);
    }
    return Object.freeze({ ...policy });
}

/**
 * Wait before the retry that follows failed attempt `attempt` (0-indexed).
 */
export function computeBackoff(policy: RetryPolicy, attempt: number): number {
    return Math.min(policy.initialBackoffMs * policy.backoffMultiplier ** attempt, policy.maxBackoffMs);
}

/**
 * Resolves after ms, or rejects with the signal's reason as soon as it aborts.
 */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal.reason);
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

export interface RetryOptions {
    readonly logger: Logger;
    /** Decides the kind of each failure; defaults to activityErrorKind */
    readonly classify?: (error: unknown) => ErrorKind;
}

/**
 * Re-invokes the wrapped function while failures are retryable, waiting an
 * exponentially growing, capped backoff between attempts. Permanent
 * failures surface at once; on exhaustion the last error is rethrown
 * unchanged.
 */
export function withRetry(policy: RetryPolicy, options: RetryOptions): ActivityMiddleware {
    const validated = validateRetryPolicy(policy);
    const classify = options.classify ?? activityErrorKind;

    return (next) => async (ctx, input) => {
        let lastError: unknown;

        for (let attempt = 0; attempt < validated.maxAttempts; attempt++) {
            try {
                return await next(ctx, input);
            } catch (error) {
                lastError = error;

                const kind = classify(error);
                if (!isRetryableKind(kind)) {
                    options.logger.debug({ attempt: attempt + 1, kind }, 'Activity failure is not retryable');
                    throw error;
                }
                if (attempt + 1 >= validated.maxAttempts) {
                    break;
                }

                const delayMs = computeBackoff(validated, attempt);
                options.logger.warn({
                    attempt: attempt + 1,
                    maxAttempts: validated.maxAttempts,
                    delayMs,
                    kind,
                    error: describeError(error)
                }, 'Activity attempt failed; retrying');

                await sleep(delayMs, ctx.signal);
            }
        }

        options.logger.warn({ maxAttempts: validated.maxAttempts }, 'Activity retries exhausted');
        throw lastError;
    };
}
