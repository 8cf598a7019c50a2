/**
 * OTLP → Telemetry Event conversion
 *
 * Accepts both shapes an export request arrives in: messages decoded by
 * @grpc/proto-loader (camelCase keys, 64-bit integers as decimal strings,
 * enums as names, bytes as Buffer) and OTLP/HTTP JSON (hex ids, enums as
 * numbers, base64 bytes). The envelope is validated once; every record is
 * validated on its own, so one bad record does not sink the request.
 */

import { z } from 'zod';
import {
    newLogEvent,
    newMetricEvent,
    newTraceEvent,
    type Attributes,
    type JsonValue,
    type LogEvent,
    type MetricEvent,
    type TraceEvent
} from '../telemetryEvent.js';

export const UNKNOWN_TRACE_ID = 'unknown';
export const TRACE_ID_ATTRIBUTE = 'trace_id';

// ---------------------------------------------------------------------------
// Wire schemas
// ---------------------------------------------------------------------------

const longSchema = z
    .union([z.string().regex(/^-?\d+$/), z.number().int()])
    .transform(value => BigInt(value));

const bytesSchema = z.union([z.instanceof(Uint8Array), z.string()]);

const enumSchema = z.union([z.string(), z.number().int()]);

interface RawKeyValue {
    key: string;
    value?: RawAnyValue | null;
}

interface RawAnyValue {
    stringValue?: string;
    boolValue?: boolean;
    intValue?: bigint;
    doubleValue?: number;
    arrayValue?: { values?: RawAnyValue[] | null } | null;
    kvlistValue?: { values?: RawKeyValue[] | null } | null;
    bytesValue?: Uint8Array | string;
}

const anyValueSchema: z.ZodType<RawAnyValue, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
        stringValue: z.string().optional(),
        boolValue: z.boolean().optional(),
        intValue: longSchema.optional(),
        doubleValue: z.number().optional(),
        arrayValue: z.object({ values: z.array(anyValueSchema).nullish() }).nullish(),
        kvlistValue: z.object({ values: z.array(keyValueSchema).nullish() }).nullish(),
        bytesValue: bytesSchema.optional()
    })
);

const keyValueSchema: z.ZodType<RawKeyValue, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
        key: z.string(),
        value: anyValueSchema.nullish()
    })
);

const attributesField = z.array(keyValueSchema).nullish();

export const otlpLogRecordSchema = z.object({
    timeUnixNano: longSchema.nullish(),
    severityNumber: enumSchema.nullish(),
    severityText: z.string().nullish(),
    body: anyValueSchema.nullish(),
    attributes: attributesField,
    traceId: bytesSchema.nullish(),
    spanId: bytesSchema.nullish()
});

const numberDataPointSchema = z.object({
    attributes: attributesField,
    timeUnixNano: longSchema.nullish(),
    asDouble: z.number().nullish(),
    asInt: longSchema.nullish()
});

const histogramDataPointSchema = z.object({
    attributes: attributesField,
    timeUnixNano: longSchema.nullish(),
    count: longSchema.nullish()
});

export const otlpMetricSchema = z.object({
    name: z.string().nullish(),
    unit: z.string().nullish(),
    gauge: z.object({ dataPoints: z.array(numberDataPointSchema).nullish() }).nullish(),
    sum: z.object({ dataPoints: z.array(numberDataPointSchema).nullish() }).nullish(),
    histogram: z.object({ dataPoints: z.array(histogramDataPointSchema).nullish() }).nullish()
});

export const otlpSpanSchema = z.object({
    traceId: bytesSchema.nullish(),
    spanId: bytesSchema.nullish(),
    name: z.string().nullish(),
    kind: enumSchema.nullish(),
    startTimeUnixNano: longSchema.nullish(),
    endTimeUnixNano: longSchema.nullish(),
    attributes: attributesField,
    status: z.object({
        message: z.string().nullish(),
        code: enumSchema.nullish()
    }).nullish()
});

export type OtlpLogRecord = z.infer<typeof otlpLogRecordSchema>;
export type OtlpMetric = z.infer<typeof otlpMetricSchema>;
export type OtlpSpan = z.infer<typeof otlpSpanSchema>;

const recordList = z.array(z.unknown()).nullish();

const exportLogsEnvelope = z.object({
    resourceLogs: z.array(z.object({
        scopeLogs: z.array(z.object({ logRecords: recordList })).nullish()
    })).nullish()
});

const exportMetricsEnvelope = z.object({
    resourceMetrics: z.array(z.object({
        scopeMetrics: z.array(z.object({ metrics: recordList })).nullish()
    })).nullish()
});

const exportTraceEnvelope = z.object({
    resourceSpans: z.array(z.object({
        scopeSpans: z.array(z.object({ spans: recordList })).nullish()
    })).nullish()
});

// ---------------------------------------------------------------------------
// Attribute values
// ---------------------------------------------------------------------------

export type AttributeValue =
    | { readonly kind: 'string'; readonly value: string }
    | { readonly kind: 'bool'; readonly value: boolean }
    | { readonly kind: 'int'; readonly value: bigint }
    | { readonly kind: 'double'; readonly value: number }
    | { readonly kind: 'bytes'; readonly value: Uint8Array }
    | { readonly kind: 'array'; readonly values: readonly AttributeValue[] }
    | { readonly kind: 'kvlist'; readonly entries: ReadonlyArray<readonly [string, AttributeValue]> }
    | { readonly kind: 'empty' };

export function decodeAnyValue(raw: RawAnyValue | null | undefined): AttributeValue {
    if (!raw) return { kind: 'empty' };
    if (raw.stringValue !== undefined) return { kind: 'string', value: raw.stringValue };
    if (raw.boolValue !== undefined) return { kind: 'bool', value: raw.boolValue };
    if (raw.intValue !== undefined) return { kind: 'int', value: raw.intValue };
    if (raw.doubleValue !== undefined) return { kind: 'double', value: raw.doubleValue };
    if (raw.arrayValue) {
        return { kind: 'array', values: (raw.arrayValue.values ?? []).map(decodeAnyValue) };
    }
    if (raw.kvlistValue) {
        return {
            kind: 'kvlist',
            entries: (raw.kvlistValue.values ?? []).map(kv => [kv.key, decodeAnyValue(kv.value)] as const)
        };
    }
    if (raw.bytesValue !== undefined) {
        const value = typeof raw.bytesValue === 'string'
            ? Buffer.from(raw.bytesValue, 'base64')
            : raw.bytesValue;
        return { kind: 'bytes', value };
    }
    return { kind: 'empty' };
}

export function attributeToJson(value: AttributeValue): JsonValue {
    switch (value.kind) {
        case 'string':
            return value.value;
        case 'bool':
            return value.value;
        case 'int': {
            const asNumber = Number(value.value);
            return Number.isSafeInteger(asNumber) ? asNumber : value.value.toString();
        }
        case 'double':
            return Number.isFinite(value.value) ? value.value : String(value.value);
        case 'bytes':
            return Buffer.from(value.value).toString('base64');
        case 'array':
            return value.values.map(attributeToJson);
        case 'kvlist':
            return Object.fromEntries(value.entries.map(([key, entry]) => [key, attributeToJson(entry)]));
        case 'empty':
            return null;
    }
}

export function attributesToJson(raw: readonly RawKeyValue[] | null | undefined): Attributes {
    const attributes: Attributes = {};
    for (const kv of raw ?? []) {
        attributes[kv.key] = attributeToJson(decodeAnyValue(kv.value));
    }
    return attributes;
}

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

/** Hex form of a binary or hex-encoded id; undefined when empty */
export function idToHex(raw: Uint8Array | string | null | undefined): string | undefined {
    if (raw === null || raw === undefined) return undefined;
    const hex = typeof raw === 'string' ? raw.toLowerCase() : Buffer.from(raw).toString('hex');
    return hex === '' ? undefined : hex;
}

export function nanosToMillis(nanos: bigint): bigint {
    return nanos / 1_000_000n;
}

export function nanosToDate(nanos: bigint): Date {
    return new Date(Number(nanosToMillis(nanos)));
}

const SEVERITY_NAMES: readonly string[] = [
    'UNSPECIFIED',
    'TRACE', 'TRACE2', 'TRACE3', 'TRACE4',
    'DEBUG', 'DEBUG2', 'DEBUG3', 'DEBUG4',
    'INFO', 'INFO2', 'INFO3', 'INFO4',
    'WARN', 'WARN2', 'WARN3', 'WARN4',
    'ERROR', 'ERROR2', 'ERROR3', 'ERROR4',
    'FATAL', 'FATAL2', 'FATAL3', 'FATAL4'
];

const SPAN_KIND_NAMES: readonly string[] = [
    'SPAN_KIND_UNSPECIFIED',
    'SPAN_KIND_INTERNAL',
    'SPAN_KIND_SERVER',
    'SPAN_KIND_CLIENT',
    'SPAN_KIND_PRODUCER',
    'SPAN_KIND_CONSUMER'
];

const STATUS_CODE_NAMES: readonly string[] = ['STATUS_CODE_UNSET', 'STATUS_CODE_OK', 'STATUS_CODE_ERROR'];

function enumName(
    value: string | number | null | undefined,
    names: readonly string[],
    prefix = ''
): string {
    if (typeof value === 'string') return value;
    const index = value ?? 0;
    const name = names[index];
    return name !== undefined ? `${prefix}${name}` : `${prefix}${index}`;
}

export function severityName(value: string | number | null | undefined): string {
    return enumName(value, SEVERITY_NAMES, 'SEVERITY_NUMBER_');
}

export function spanStatusCodeName(value: string | number | null | undefined): string {
    return enumName(value, STATUS_CODE_NAMES);
}

export function spanKindName(value: string | number | null | undefined): string {
    return enumName(value, SPAN_KIND_NAMES);
}

function stringAttribute(raw: readonly RawKeyValue[] | null | undefined, key: string): string | undefined {
    const value = raw?.find(kv => kv.key === key)?.value;
    return value?.stringValue;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export function logRecordToEvent(record: OtlpLogRecord, now: Date = new Date()): LogEvent {
    const attributes = attributesToJson(record.attributes);
    const body = decodeAnyValue(record.body);
    const exceptionMessage = attributes['exception.message'];

    return newLogEvent({
        traceId: idToHex(record.traceId) ?? UNKNOWN_TRACE_ID,
        spanId: idToHex(record.spanId),
        timestamp: record.timeUnixNano && record.timeUnixNano > 0n ? nanosToDate(record.timeUnixNano) : now,
        message: body.kind === 'string' ? body.value : body.kind === 'empty' ? '' : JSON.stringify(attributeToJson(body)),
        severity: record.severityText || severityName(record.severityNumber),
        ...(typeof exceptionMessage === 'string' ? { error: exceptionMessage } : {}),
        attributes
    });
}

export function metricToEvents(metric: OtlpMetric, now: Date = new Date()): MetricEvent[] {
    const name = metric.name ?? '';
    const unit = metric.unit ?? '';
    const timestampOf = (nanos: bigint | null | undefined): Date =>
        nanos && nanos > 0n ? nanosToDate(nanos) : now;

    const numberPoints = metric.sum?.dataPoints ?? metric.gauge?.dataPoints;
    if (numberPoints) {
        return numberPoints.map((point, index) => {
            const value = point.asInt !== null && point.asInt !== undefined ? Number(point.asInt) : point.asDouble ?? 0;
            // JSON has no NaN or Infinity; such a payload could not be read back.
            if (!Number.isFinite(value)) {
                throw new Error(`metric ${name} data point ${index} has non-finite value ${value}`);
            }
            return newMetricEvent({
                traceId: stringAttribute(point.attributes, TRACE_ID_ATTRIBUTE) ?? UNKNOWN_TRACE_ID,
                timestamp: timestampOf(point.timeUnixNano),
                metricName: name,
                value,
                unit,
                attributes: attributesToJson(point.attributes)
            });
        });
    }

    return (metric.histogram?.dataPoints ?? []).map(point => newMetricEvent({
        traceId: stringAttribute(point.attributes, TRACE_ID_ATTRIBUTE) ?? UNKNOWN_TRACE_ID,
        timestamp: timestampOf(point.timeUnixNano),
        metricName: `${name}_count`,
        value: Number(point.count ?? 0n),
        unit,
        attributes: attributesToJson(point.attributes)
    }));
}

export function spanToEvent(span: OtlpSpan): TraceEvent {
    const startMs = nanosToMillis(span.startTimeUnixNano ?? 0n);
    const endMs = nanosToMillis(span.endTimeUnixNano ?? 0n);

    let status = 'OK';
    if (span.status) {
        status = span.status.message || spanStatusCodeName(span.status.code);
    }

    return newTraceEvent({
        traceId: idToHex(span.traceId) ?? UNKNOWN_TRACE_ID,
        spanId: idToHex(span.spanId),
        spanName: span.name ?? '',
        ...(span.kind !== null && span.kind !== undefined ? { spanKind: spanKindName(span.kind) } : {}),
        timestamp: new Date(Number(endMs)),
        latencyMs: Number(endMs - startMs),
        status,
        attributes: attributesToJson(span.attributes)
    });
}

// ---------------------------------------------------------------------------
// Export requests
// ---------------------------------------------------------------------------

export interface ConversionFailure {
    readonly index: number;
    readonly reason: string;
}

export interface ConversionResult<T> {
    readonly events: T[];
    readonly failures: ConversionFailure[];
}

function convertEach<S extends z.ZodTypeAny, T>(
    records: readonly unknown[],
    schema: S,
    convert: (record: z.output<S>) => T[]
): ConversionResult<T> {
    const events: T[] = [];
    const failures: ConversionFailure[] = [];

    records.forEach((candidate, index) => {
        const parsed = schema.safeParse(candidate);
        if (!parsed.success) {
            const reason = parsed.error.issues
                .map(issue => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ');
            failures.push({ index, reason });
            return;
        }
        try {
            events.push(...convert(parsed.data));
        } catch (error) {
            failures.push({ index, reason: error instanceof Error ? error.message : String(error) });
        }
    });

    return { events, failures };
}

/**
 * Throws a ZodError when the envelope itself is malformed.
 */
export function convertExportLogsRequest(request: unknown, now: Date = new Date()): ConversionResult<LogEvent> {
    const envelope = exportLogsEnvelope.parse(request);
    const records = (envelope.resourceLogs ?? [])
        .flatMap(resource => resource.scopeLogs ?? [])
        .flatMap(scope => scope.logRecords ?? []);
    return convertEach(records, otlpLogRecordSchema, record => [logRecordToEvent(record, now)]);
}

export function convertExportMetricsRequest(request: unknown, now: Date = new Date()): ConversionResult<MetricEvent> {
    const envelope = exportMetricsEnvelope.parse(request);
    const metrics = (envelope.resourceMetrics ?? [])
        .flatMap(resource => resource.scopeMetrics ?? [])
        .flatMap(scope => scope.metrics ?? []);
    return convertEach(metrics, otlpMetricSchema, metric => metricToEvents(metric, now));
}

export function convertExportTraceRequest(request: unknown): ConversionResult<TraceEvent> {
    const envelope = exportTraceEnvelope.parse(request);
    const spans = (envelope.resourceSpans ?? [])
        .flatMap(resource => resource.scopeSpans ?? [])
        .flatMap(scope => scope.spans ?? []);
    return convertEach(spans, otlpSpanSchema, span => [spanToEvent(span)]);
}
