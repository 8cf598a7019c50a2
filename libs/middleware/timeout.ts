import { timeoutError } from '../errors/classifiedError.js';
import type { Logger } from '../logging/logger.js';
import type { ActivityMiddleware } from './pipeline.js';

export const ACTIVITY_TIMEOUT_CODE = 'ACTIVITY_TIMEOUT';

/**
 * Races the wrapped function against a deadline.
 *
 * The inner function receives a derived signal that aborts on the deadline
 * or when the caller's signal aborts. The race does not wait for the
 * abandoned work; its late failure is only logged.
 */
export function withTimeout(timeoutMs: number, logger: Logger): ActivityMiddleware {
    if (!(timeoutMs > 0)) {
        throw new RangeError(`timeoutMs must be positive, got ${timeoutMs}`);
    }

    return (next) => async (ctx, input) => {
        if (ctx.signal.aborted) {
            throw ctx.signal.reason;
        }

        const controller = new AbortController();
        const onParentAbort = (): void => controller.abort(ctx.signal.reason);
        ctx.signal.addEventListener('abort', onParentAbort, { once: true });

        const timer = setTimeout(() => {
            controller.abort(timeoutError(ACTIVITY_TIMEOUT_CODE, `activity exceeded timeout of ${timeoutMs}ms`));
        }, timeoutMs);

        const aborted = new Promise<never>((_, reject) => {
            controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
        });

        try {
            // A synchronous throw still reaches the finally below.
            const work = next({ ...ctx, signal: controller.signal }, input);
            void work.then(undefined, (error: unknown) => {
                // The race already settled with the abort reason.
                if (controller.signal.aborted) {
                    logger.debug({ error }, 'Abandoned activity attempt failed after timeout');
                }
            });
            return await Promise.race([work, aborted]);
        } finally {
            clearTimeout(timer);
            ctx.signal.removeEventListener('abort', onParentAbort);
        }
    };
}
