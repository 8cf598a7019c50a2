import type { MetricsCollector } from '../observability/MetricsCollector.js';
import type { ActivityMiddleware } from './pipeline.js';

/**
 * Records one execution (with duration) per call, plus an error on failure.
 */
export function withMetrics(metrics: MetricsCollector, now: () => number = Date.now): ActivityMiddleware {
    return (next) => async (ctx, input) => {
        const started = now();
        try {
            return await next(ctx, input);
        } catch (error) {
            metrics.recordActivityError();
            throw error;
        } finally {
            metrics.recordActivityExecution(now() - started);
        }
    };
}
