import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { fileURLToPath } from 'node:url';

/** Shipped .proto tree; copied next to the compiled output by the build. */
export const DEFAULT_PROTO_ROOT = fileURLToPath(new URL('../../../proto', import.meta.url));

const SERVICE_FILES = [
    'opentelemetry/proto/collector/logs/v1/logs_service.proto',
    'opentelemetry/proto/collector/metrics/v1/metrics_service.proto',
    'opentelemetry/proto/collector/trace/v1/trace_service.proto'
];

export const LOGS_SERVICE = 'opentelemetry.proto.collector.logs.v1.LogsService';
export const METRICS_SERVICE = 'opentelemetry.proto.collector.metrics.v1.MetricsService';
export const TRACE_SERVICE = 'opentelemetry.proto.collector.trace.v1.TraceService';

// Decoded shape expected by otlpConversion.
const LOADER_OPTIONS: protoLoader.Options = {
    keepCase: false,
    longs: String,
    enums: String,
    defaults: false,
    oneofs: true
};

export interface OtlpServiceDefinitions {
    readonly logs: grpc.ServiceDefinition;
    readonly metrics: grpc.ServiceDefinition;
    readonly traces: grpc.ServiceDefinition;
}

type GrpcNode = grpc.GrpcObject[string];

function lookupService(root: grpc.GrpcObject, fullName: string): grpc.ServiceDefinition {
    let node: GrpcNode | undefined = root;
    for (const segment of fullName.split('.')) {
        if (node === undefined || typeof node === 'function' || 'format' in node) {
            break;
        }
        node = node[segment];
    }
    if (typeof node !== 'function') {
        throw new Error(`OTLP service ${fullName} not found in loaded protos`);
    }
    return node.service;
}

/**
 * Loads the OTLP collector services from .proto files at run time.
 */
export function loadOtlpServices(protoRoot: string = DEFAULT_PROTO_ROOT): OtlpServiceDefinitions {
    const packageDefinition = protoLoader.loadSync(SERVICE_FILES, {
        ...LOADER_OPTIONS,
        includeDirs: [protoRoot]
    });
    const root = grpc.loadPackageDefinition(packageDefinition);

    return {
        logs: lookupService(root, LOGS_SERVICE),
        metrics: lookupService(root, METRICS_SERVICE),
        traces: lookupService(root, TRACE_SERVICE)
    };
}
