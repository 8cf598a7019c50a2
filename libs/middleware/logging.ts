import { describeError, isClassifiedError } from '../errors/classifiedError.js';
import { sanitizeErrorMessage } from '../errors/sanitizer.js';
import { getActivityLogger, type Logger } from '../logging/logger.js';
import type { EventSink } from '../observability/EventRepository.js';
import type { LogSink } from '../observability/LogRepository.js';
import { createLogRecord } from '../observability/logRecord.js';
import {
    ACTIVITY_KEY,
    ORCHESTRATION_ID_KEY,
    newTraceEvent,
    type Attributes
} from '../observability/telemetryEvent.js';
import type { ActivityContext, ActivityMiddleware } from './pipeline.js';

export interface LoggingDependencies {
    readonly logger: Logger;
    readonly logSink?: LogSink;
    readonly eventSink?: EventSink;
    readonly now?: () => number;
}

function spanAttributes(activityName: string, ctx: ActivityContext, errorCode?: string): Attributes {
    return {
        [ACTIVITY_KEY]: activityName,
        ...(ctx.orchestrationId ? { [ORCHESTRATION_ID_KEY]: ctx.orchestrationId } : {}),
        ...(errorCode ? { error_code: errorCode } : {})
    };
}

/**
 * Outermost stage: logs start and outcome, measures total latency and
 * persists a start record, an outcome record and a span event.
 *
 * Persistence is best effort. A failing sink is reported on the process
 * logger and never changes what the caller sees.
 */
export function withLogging(activityName: string, deps: LoggingDependencies): ActivityMiddleware {
    const now = deps.now ?? Date.now;

    return (next) => async (ctx, input) => {
        const log = getActivityLogger(deps.logger, {
            activityName,
            traceId: ctx.traceId,
            orchestrationId: ctx.orchestrationId
        });
        const correlation = {
            traceId: ctx.traceId,
            spanId: ctx.spanId,
            orchestrationId: ctx.orchestrationId,
            activity: activityName
        };

        const persist = async (what: string, write: () => Promise<void>): Promise<void> => {
            try {
                await write();
            } catch (error) {
                log.warn({ error }, `Failed to persist activity ${what}`);
            }
        };

        const started = now();
        log.info('Activity started');
        if (deps.logSink) {
            const sink = deps.logSink;
            await persist('start record', () => sink.log(createLogRecord({
                ...correlation,
                level: 'info',
                message: 'activity started',
                input
            })));
        }

        try {
            const output = await next(ctx, input);
            const durationMs = now() - started;
            log.info({ durationMs }, 'Activity completed');

            if (deps.logSink) {
                const sink = deps.logSink;
                await persist('completion record', () => sink.log(createLogRecord({
                    ...correlation,
                    level: 'info',
                    message: 'activity completed',
                    durationMs,
                    output
                })));
            }
            if (deps.eventSink) {
                const sink = deps.eventSink;
                await persist('span event', () => sink.writeEvent(newTraceEvent({
                    traceId: ctx.traceId,
                    spanId: ctx.spanId,
                    spanName: activityName,
                    timestamp: new Date(),
                    latencyMs: durationMs,
                    status: 'OK',
                    attributes: spanAttributes(activityName, ctx)
                })));
            }
            return output;
        } catch (error) {
            const durationMs = now() - started;
            const errorMessage = sanitizeErrorMessage(describeError(error));
            const errorCode = isClassifiedError(error) ? error.code : undefined;
            log.error({ durationMs, errorCode, error: errorMessage }, 'Activity failed');

            if (deps.logSink) {
                const sink = deps.logSink;
                await persist('failure record', () => sink.log(createLogRecord({
                    ...correlation,
                    level: 'error',
                    message: 'activity failed',
                    durationMs,
                    errorMessage
                })));
            }
            if (deps.eventSink) {
                const sink = deps.eventSink;
                await persist('span event', () => sink.writeEvent(newTraceEvent({
                    traceId: ctx.traceId,
                    spanId: ctx.spanId,
                    spanName: activityName,
                    timestamp: new Date(),
                    latencyMs: durationMs,
                    status: 'ERROR',
                    attributes: spanAttributes(activityName, ctx, errorCode)
                })));
            }
            throw error;
        }
    };
}
