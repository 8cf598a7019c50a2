/**
 * HTTP surface of the telemetry collector:
 * - GET  /healthz, GET /metrics
 * - POST /v1/logs, /v1/metrics, /v1/traces   (OTLP/HTTP, JSON or protobuf)
 * - GET/POST /api/...                         (telemetry queries, retention)
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ZodError, z } from 'zod';
import { TelemetryStoreError } from '../../../libs/errors/sanitizer.js';
import { getComponentLogger, type Logger } from '../../../libs/logging/logger.js';
import type { EventRepository } from '../../../libs/observability/EventRepository.js';
import type { LogRepository } from '../../../libs/observability/LogRepository.js';
import type { MetricsCollector } from '../../../libs/observability/MetricsCollector.js';
import { OtlpDecodeError, type ExportSummary, type OtlpSignal } from '../../../libs/observability/otlp/OtlpReceiver.js';
import { EVENT_TYPES, type EventType } from '../../../libs/observability/telemetryEvent.js';
import { ValidationError, validate } from '../../../libs/validation/zod-middleware.js';

export interface OtlpExporter {
    decodeRequest(signal: OtlpSignal, payload: Buffer): unknown;
    exportLogs(request: unknown): Promise<ExportSummary>;
    exportMetrics(request: unknown): Promise<ExportSummary>;
    exportTraces(request: unknown): Promise<ExportSummary>;
}

export interface AppDependencies {
    readonly logRepository: LogRepository;
    readonly eventRepository: EventRepository;
    readonly otlp: OtlpExporter;
    readonly metrics: MetricsCollector;
    readonly logger: Logger;
}

export interface AppOptions {
    /** Largest accepted request body, in body-parser notation */
    readonly bodyLimit?: string;
}

export const DEFAULT_BODY_LIMIT = '5mb';

const OTLP_PROTOBUF = 'application/x-protobuf';
const OTLP_MEDIA_TYPES = ['application/json', OTLP_PROTOBUF];
// An empty ExportServiceResponse encodes to zero bytes.
const EMPTY_PROTOBUF_RESPONSE = Buffer.alloc(0);

const idParam = z.string().min(1).max(128);

const traceParamsSchema = z.object({ traceId: idParam });
const orchestrationParamsSchema = z.object({ id: idParam });
const errorHashParamsSchema = z.object({ hash: z.string().regex(/^[0-9a-f]{1,64}$/) });

const limitField = (fallback: number) => z.coerce.number().int().min(1).max(1000).default(fallback);

const latencyQuerySchema = (defaultLimit: number) => z.object({
    thresholdMs: z.coerce.number().nonnegative().default(0),
    windowMs: z.coerce.number().int().positive().default(60 * 60 * 1000),
    limit: limitField(defaultLimit)
});

const eventTypeSchema = z.custom<EventType>(
    value => typeof value === 'string' && EVENT_TYPES.some(type => type === value),
    { message: `type must be one of ${EVENT_TYPES.join(', ')}` }
);

const eventsQuerySchema = z.object({ type: eventTypeSchema, limit: limitField(1000) });
const limitQuerySchema = z.object({ limit: limitField(100) });
const errorFrequencyQuerySchema = z.object({ limit: limitField(10) });
const pruneBodySchema = z.object({ olderThanMs: z.number().int().positive() });

export type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncRoute) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

export interface RouteHandlers {
    readonly metrics: AsyncRoute;
    readonly exportLogs: AsyncRoute;
    readonly exportMetrics: AsyncRoute;
    readonly exportTraces: AsyncRoute;
    readonly traceLogs: AsyncRoute;
    readonly traceEvents: AsyncRoute;
    readonly orchestrationEvents: AsyncRoute;
    readonly orchestrationLogs: AsyncRoute;
    readonly errorFrequency: AsyncRoute;
    readonly errorLogs: AsyncRoute;
    readonly eventsByType: AsyncRoute;
    readonly errorEvents: AsyncRoute;
    readonly slowActivities: AsyncRoute;
    readonly activityPerformance: AsyncRoute;
    readonly prune: AsyncRoute;
}

export function createRouteHandlers(deps: AppDependencies, logger: Logger): RouteHandlers {
    // express.raw leaves protobuf bodies as a Buffer; JSON arrives parsed.
    const otlpExport = (
        signal: OtlpSignal,
        exporter: (request: unknown) => Promise<ExportSummary>
    ): AsyncRoute => async (req, res) => {
        if (Buffer.isBuffer(req.body)) {
            await exporter(deps.otlp.decodeRequest(signal, req.body));
            res.set('Content-Type', OTLP_PROTOBUF);
            res.send(EMPTY_PROTOBUF_RESPONSE);
            return;
        }
        await exporter(req.body);
        res.json({});
    };

    return {
        metrics: async (_req, res) => {
            res.set('Content-Type', deps.metrics.contentType);
            res.send(await deps.metrics.render());
        },

        exportLogs: otlpExport('logs', request => deps.otlp.exportLogs(request)),
        exportMetrics: otlpExport('metrics', request => deps.otlp.exportMetrics(request)),
        exportTraces: otlpExport('traces', request => deps.otlp.exportTraces(request)),

        traceLogs: async (req, res) => {
            const { traceId } = validate(traceParamsSchema, req.params, 'TraceLogs', logger);
            res.json({ logs: await deps.logRepository.getLogsByTraceId(traceId) });
        },
        traceEvents: async (req, res) => {
            const { traceId } = validate(traceParamsSchema, req.params, 'TraceEvents', logger);
            res.json({ events: await deps.eventRepository.getEventsByTraceId(traceId) });
        },
        orchestrationEvents: async (req, res) => {
            const { id } = validate(orchestrationParamsSchema, req.params, 'OrchestrationEvents', logger);
            res.json({ events: await deps.eventRepository.getEventsByOrchestrationId(id) });
        },
        orchestrationLogs: async (req, res) => {
            const { id } = validate(orchestrationParamsSchema, req.params, 'OrchestrationLogs', logger);
            res.json({ logs: await deps.logRepository.getLogsByOrchestrationId(id) });
        },
        errorFrequency: async (req, res) => {
            const { limit } = validate(errorFrequencyQuerySchema, req.query, 'ErrorFrequency', logger);
            res.json({ errors: await deps.logRepository.getErrorFrequency(limit) });
        },
        errorLogs: async (req, res) => {
            const { hash } = validate(errorHashParamsSchema, req.params, 'ErrorLogs', logger);
            res.json({ logs: await deps.logRepository.getLogsByErrorHash(hash) });
        },
        eventsByType: async (req, res) => {
            const { type, limit } = validate(eventsQuerySchema, req.query, 'EventsByType', logger);
            res.json({ events: await deps.eventRepository.getEventsByType(type, limit) });
        },
        errorEvents: async (req, res) => {
            const { limit } = validate(limitQuerySchema, req.query, 'ErrorEvents', logger);
            res.json({ events: await deps.eventRepository.getErrorEvents(limit) });
        },
        slowActivities: async (req, res) => {
            const query = validate(latencyQuerySchema(10), req.query, 'SlowActivities', logger);
            res.json({ activities: await deps.logRepository.getSlowActivities(query) });
        },
        activityPerformance: async (req, res) => {
            const query = validate(latencyQuerySchema(100), req.query, 'ActivityPerformance', logger);
            res.json({ activities: await deps.eventRepository.getActivityPerformance(query) });
        },
        prune: async (req, res) => {
            const { olderThanMs } = validate(pruneBodySchema, req.body, 'RetentionPrune', logger);
            const logsDeleted = await deps.logRepository.pruneOlderThan(olderThanMs);
            const eventsDeleted = await deps.eventRepository.pruneOlderThan(olderThanMs);
            res.json({ logsDeleted, eventsDeleted });
        }
    };
}

const CLIENT_ERROR_CODES: Readonly<Record<number, string>> = {
    413: 'PAYLOAD_TOO_LARGE',
    415: 'UNSUPPORTED_MEDIA_TYPE'
};

// body-parser failures carry their HTTP status.
function clientErrorStatus(error: unknown): number | undefined {
    if (!(error instanceof Error)) return undefined;
    const status: unknown = Reflect.get(error, 'status');
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/**
 * Rejects OTLP/HTTP requests whose body is neither JSON nor protobuf.
 */
export function requireOtlpMediaType(req: Request, res: Response, next: NextFunction): void {
    if (req.is(OTLP_MEDIA_TYPES)) {
        next();
        return;
    }
    res.status(415).json({ error: 'UNSUPPORTED_MEDIA_TYPE', accepted: OTLP_MEDIA_TYPES });
}

/**
 * Maps failures to responses: 4xx for bad input, 500 with an incident id
 * for storage failures, a bare 500 otherwise.
 */
export function createErrorHandler(logger: Logger) {
    return (error: unknown, _req: Request, res: Response, _next: NextFunction): void => {
        if (error instanceof ValidationError) {
            res.status(400).json({ error: 'INVALID_REQUEST', issues: error.issues });
            return;
        }
        if (error instanceof ZodError) {
            res.status(400).json({
                error: 'INVALID_REQUEST',
                issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
            });
            return;
        }
        if (error instanceof SyntaxError) {
            // Malformed JSON body
            res.status(400).json({ error: 'INVALID_JSON' });
            return;
        }
        if (error instanceof OtlpDecodeError) {
            res.status(400).json({ error: 'INVALID_PROTOBUF' });
            return;
        }
        const status = clientErrorStatus(error);
        if (status !== undefined) {
            res.status(status).json({ error: CLIENT_ERROR_CODES[status] ?? 'BAD_REQUEST' });
            return;
        }
        if (error instanceof TelemetryStoreError) {
            res.status(500).json({ error: error.publicMessage, incidentId: error.incidentId });
            return;
        }
        logger.error({ error }, 'Unhandled request failure');
        res.status(500).json({ error: 'Internal error' });
    };
}

export function createApp(deps: AppDependencies, options: AppOptions = {}): Express {
    const logger = getComponentLogger(deps.logger, 'HttpApp');
    const handlers = createRouteHandlers(deps, logger);
    const limit = options.bodyLimit ?? DEFAULT_BODY_LIMIT;
    const protobufBody = express.raw({ type: OTLP_PROTOBUF, limit });
    const app = express();

    app.disable('x-powered-by');
    app.use(express.json({ limit }));

    app.get('/healthz', (_req, res) => {
        res.json({ status: 'ok' });
    });
    app.get('/metrics', route(handlers.metrics));

    app.post('/v1/logs', requireOtlpMediaType, protobufBody, route(handlers.exportLogs));
    app.post('/v1/metrics', requireOtlpMediaType, protobufBody, route(handlers.exportMetrics));
    app.post('/v1/traces', requireOtlpMediaType, protobufBody, route(handlers.exportTraces));

    app.get('/api/traces/:traceId/logs', route(handlers.traceLogs));
    app.get('/api/traces/:traceId/events', route(handlers.traceEvents));
    app.get('/api/orchestrations/:id/events', route(handlers.orchestrationEvents));
    app.get('/api/orchestrations/:id/logs', route(handlers.orchestrationLogs));
    app.get('/api/errors', route(handlers.errorFrequency));
    app.get('/api/errors/:hash/logs', route(handlers.errorLogs));
    app.get('/api/events', route(handlers.eventsByType));
    app.get('/api/events/errors', route(handlers.errorEvents));
    app.get('/api/activities/slow', route(handlers.slowActivities));
    app.get('/api/activities/performance', route(handlers.activityPerformance));
    app.post('/api/retention/prune', route(handlers.prune));

    app.use(createErrorHandler(logger));

    return app;
}
