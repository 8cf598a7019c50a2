/**
 * Telemetry Events
 *
 * Generalization of the activity log record: a log line, a metric data
 * point or a finished span, each with its own payload, sharing the
 * correlation fields used by the event table indexes.
 */

import { z } from 'zod';

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export type Attributes = Record<string, JsonValue>;

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(jsonValueSchema),
        z.record(jsonValueSchema)
    ])
);

export const attributesSchema = z.record(jsonValueSchema);

export const logPayloadSchema = z.object({
    msg: z.string(),
    severity: z.string(),
    error: z.string().optional(),
    attributes: attributesSchema.default({})
});

export const metricPayloadSchema = z.object({
    metric_name: z.string(),
    metric_value: z.number(),
    metric_unit: z.string(),
    attributes: attributesSchema.default({})
});

export const tracePayloadSchema = z.object({
    span_name: z.string(),
    span_kind: z.string().optional(),
    span_status: z.string(),
    latency_ms: z.number(),
    attributes: attributesSchema.default({})
});

export type LogEventPayload = z.infer<typeof logPayloadSchema>;
export type MetricEventPayload = z.infer<typeof metricPayloadSchema>;
export type TraceEventPayload = z.infer<typeof tracePayloadSchema>;

export type EventType = 'log' | 'metric' | 'trace';

export const EVENT_TYPES: readonly EventType[] = ['log', 'metric', 'trace'];

interface EventCorrelation {
    /** Storage id, assigned on persistence (append order) */
    readonly id?: number;
    readonly timestamp: Date;
    readonly traceId: string;
    readonly spanId?: string;
    readonly orchestrationId?: string;
    readonly activity?: string;
}

export interface LogEvent extends EventCorrelation {
    readonly eventType: 'log';
    readonly payload: LogEventPayload;
}

export interface MetricEvent extends EventCorrelation {
    readonly eventType: 'metric';
    readonly payload: MetricEventPayload;
}

export interface TraceEvent extends EventCorrelation {
    readonly eventType: 'trace';
    readonly payload: TraceEventPayload;
}

export type TelemetryEvent = LogEvent | MetricEvent | TraceEvent;

/** Attribute keys carrying orchestration correlation */
export const ORCHESTRATION_ID_KEY = 'orchestration_id';
export const ACTIVITY_KEY = 'activity';

function correlationFromAttributes(attributes: Attributes): { orchestrationId?: string; activity?: string } {
    const orchestrationId = attributes[ORCHESTRATION_ID_KEY];
    const activity = attributes[ACTIVITY_KEY];
    return {
        ...(typeof orchestrationId === 'string' && orchestrationId !== '' ? { orchestrationId } : {}),
        ...(typeof activity === 'string' && activity !== '' ? { activity } : {})
    };
}

function optionalSpan(spanId: string | undefined): { spanId?: string } {
    return spanId ? { spanId } : {};
}

export function newLogEvent(input: {
    traceId: string;
    spanId?: string;
    timestamp: Date;
    message: string;
    severity: string;
    error?: string;
    attributes: Attributes;
}): LogEvent {
    const event: LogEvent = {
        eventType: 'log',
        timestamp: input.timestamp,
        traceId: input.traceId,
        ...optionalSpan(input.spanId),
        ...correlationFromAttributes(input.attributes),
        payload: {
            msg: input.message,
            severity: input.severity,
            ...(input.error ? { error: input.error } : {}),
            attributes: input.attributes
        }
    };
    return Object.freeze(event);
}

export function newMetricEvent(input: {
    traceId: string;
    timestamp: Date;
    metricName: string;
    value: number;
    unit: string;
    attributes: Attributes;
}): MetricEvent {
    const event: MetricEvent = {
        eventType: 'metric',
        timestamp: input.timestamp,
        traceId: input.traceId,
        ...correlationFromAttributes(input.attributes),
        payload: {
            metric_name: input.metricName,
            metric_value: input.value,
            metric_unit: input.unit,
            attributes: input.attributes
        }
    };
    return Object.freeze(event);
}

export function newTraceEvent(input: {
    traceId: string;
    spanId?: string;
    spanName: string;
    spanKind?: string;
    timestamp: Date;
    latencyMs: number;
    status: string;
    attributes: Attributes;
}): TraceEvent {
    const event: TraceEvent = {
        eventType: 'trace',
        timestamp: input.timestamp,
        traceId: input.traceId,
        ...optionalSpan(input.spanId),
        ...correlationFromAttributes(input.attributes),
        payload: {
            span_name: input.spanName,
            ...(input.spanKind ? { span_kind: input.spanKind } : {}),
            span_status: input.status,
            latency_ms: input.latencyMs,
            attributes: input.attributes
        }
    };
    return Object.freeze(event);
}

export function isEventType(value: string): value is EventType {
    return EVENT_TYPES.some(type => type === value);
}

/**
 * Rebuilds a typed event from stored columns, validating the payload
 * against the schema of its event type.
 */
export function eventFromStored(row: {
    id: number;
    timestamp: Date;
    traceId: string;
    spanId?: string;
    orchestrationId?: string;
    activity?: string;
    eventType: EventType;
    payload: unknown;
}): TelemetryEvent {
    const correlation = {
        id: row.id,
        timestamp: row.timestamp,
        traceId: row.traceId,
        ...optionalSpan(row.spanId),
        ...(row.orchestrationId ? { orchestrationId: row.orchestrationId } : {}),
        ...(row.activity ? { activity: row.activity } : {})
    };

    switch (row.eventType) {
        case 'log':
            return { ...correlation, eventType: 'log', payload: logPayloadSchema.parse(row.payload) };
        case 'metric':
            return { ...correlation, eventType: 'metric', payload: metricPayloadSchema.parse(row.payload) };
        case 'trace':
            return { ...correlation, eventType: 'trace', payload: tracePayloadSchema.parse(row.payload) };
    }
}

/** Span statuses counted as failures */
export const ERROR_SPAN_STATUSES: readonly string[] = ['ERROR', 'STATUS_CODE_ERROR'];

/**
 * Whether an event records a failure: a log carrying an error, or a span
 * whose status is ERROR.
 */
export function isErrorEvent(event: TelemetryEvent): boolean {
    switch (event.eventType) {
        case 'log':
            return event.payload.error !== undefined;
        case 'trace':
            return ERROR_SPAN_STATUSES.includes(event.payload.span_status);
        case 'metric':
            return false;
    }
}
