/**
 * Activity Pipeline
 *
 * An activity is a function from input bytes to output bytes. Middleware
 * stages wrap it; the first stage given to applyMiddleware is the
 * outermost.
 */

import { generateSpanId, generateTraceId } from '../observability/traceIds.js';

/**
 * Per-invocation context. The signal is the cancellation token handed to
 * the unit of work; cancellation is cooperative.
 */
export interface ActivityContext {
    readonly signal: AbortSignal;
    readonly traceId: string;
    readonly spanId?: string;
    readonly orchestrationId?: string;
    readonly activityName?: string;
}

export type ActivityFunc = (ctx: ActivityContext, input: Uint8Array) => Promise<Uint8Array>;

export type ActivityMiddleware = (next: ActivityFunc) => ActivityFunc;

export function applyMiddleware(activity: ActivityFunc, ...middlewares: ActivityMiddleware[]): ActivityFunc {
    return middlewares.reduceRight<ActivityFunc>((wrapped, middleware) => middleware(wrapped), activity);
}

export interface ActivityContextInit {
    readonly signal?: AbortSignal;
    readonly traceId?: string;
    readonly spanId?: string;
    readonly orchestrationId?: string;
    readonly activityName?: string;
}

/**
 * Builds a context, generating trace and span ids when absent.
 */
export function createActivityContext(init: ActivityContextInit = {}): ActivityContext {
    return {
        signal: init.signal ?? new AbortController().signal,
        traceId: init.traceId ?? generateTraceId(),
        spanId: init.spanId ?? generateSpanId(),
        ...(init.orchestrationId ? { orchestrationId: init.orchestrationId } : {}),
        ...(init.activityName ? { activityName: init.activityName } : {})
    };
}
