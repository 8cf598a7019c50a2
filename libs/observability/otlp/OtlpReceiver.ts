/**
 * OTLP Receiver
 *
 * Serves the OTLP Logs, Metrics and Trace `Export` RPCs over gRPC and turns
 * every record into a telemetry event written to the event sink. Ingestion
 * is best effort: records that fail conversion or persistence are logged
 * and skipped, and the RPC still answers with an empty success response.
 *
 * The same export methods back the OTLP/HTTP routes; protobuf bodies are
 * decoded with the request deserializer of the loaded service.
 */

import * as grpc from '@grpc/grpc-js';
import { getComponentLogger, type Logger } from '../../logging/logger.js';
import type { EventSink } from '../EventRepository.js';
import type { TelemetryEvent } from '../telemetryEvent.js';
import {
    convertExportLogsRequest,
    convertExportMetricsRequest,
    convertExportTraceRequest,
    type ConversionResult
} from './otlpConversion.js';
import { loadOtlpServices, type OtlpServiceDefinitions } from './protoLoader.js';

export const DEFAULT_OTLP_ADDRESS = 'localhost:4317';

export type OtlpSignal = 'logs' | 'metrics' | 'traces';

export interface ExportSummary {
    readonly accepted: number;
    readonly rejected: number;
}

export interface OtlpReceiverOptions {
    readonly address?: string;
    readonly protoRoot?: string;
    readonly credentials?: grpc.ServerCredentials;
}

type ExportResponse = Record<string, never>;

/** A binary export request that does not decode as its OTLP message */
export class OtlpDecodeError extends Error {
    constructor(readonly signal: OtlpSignal, options: { cause: unknown }) {
        super(`Malformed OTLP ${signal} protobuf payload`, options);
        this.name = 'OtlpDecodeError';
    }
}

export class OtlpReceiver {
    private server: grpc.Server | null = null;
    private services: OtlpServiceDefinitions | null = null;
    private readonly logger: Logger;

    constructor(
        private readonly sink: EventSink,
        logger: Logger,
        private readonly options: OtlpReceiverOptions = {}
    ) {
        this.logger = getComponentLogger(logger, 'OtlpReceiver');
    }

    /**
     * Binds the gRPC server and starts serving. Resolves with the bound port.
     */
    async start(): Promise<number> {
        if (this.server) {
            throw new Error('OTLP receiver already started');
        }

        const services = this.serviceDefinitions();
        const server = new grpc.Server();
        server.addService(services.logs, { Export: this.unaryHandler('logs', request => this.exportLogs(request)) });
        server.addService(services.metrics, { Export: this.unaryHandler('metrics', request => this.exportMetrics(request)) });
        server.addService(services.traces, { Export: this.unaryHandler('traces', request => this.exportTraces(request)) });

        const address = this.options.address ?? DEFAULT_OTLP_ADDRESS;
        const credentials = this.options.credentials ?? grpc.ServerCredentials.createInsecure();
        const port = await new Promise<number>((resolve, reject) => {
            server.bindAsync(address, credentials, (error, boundPort) => {
                if (error) {
                    reject(error);
                } else {
                    resolve(boundPort);
                }
            });
        });

        this.server = server;
        this.logger.info({ address, port }, 'OTLP receiver started');
        return port;
    }

    /**
     * Stops accepting calls and lets in-flight exports finish.
     */
    async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = null;

        await new Promise<void>(resolve => {
            server.tryShutdown(error => {
                if (error) {
                    this.logger.warn({ error }, 'Graceful OTLP shutdown failed; forcing');
                    server.forceShutdown();
                }
                resolve();
            });
        });
        this.logger.info('OTLP receiver stopped');
    }

    /**
     * Decodes a binary OTLP/HTTP body into the same message shape the gRPC
     * server hands to the export methods.
     */
    decodeRequest(signal: OtlpSignal, payload: Buffer): unknown {
        const method = this.serviceDefinitions()[signal]['Export'];
        if (!method) {
            throw new Error(`OTLP ${signal} service has no Export method`);
        }
        try {
            const decoded: unknown = method.requestDeserialize(payload);
            return decoded;
        } catch (error) {
            throw new OtlpDecodeError(signal, { cause: error });
        }
    }

    async exportLogs(request: unknown): Promise<ExportSummary> {
        return this.ingest('logs', convertExportLogsRequest(request));
    }

    async exportMetrics(request: unknown): Promise<ExportSummary> {
        return this.ingest('metrics', convertExportMetricsRequest(request));
    }

    async exportTraces(request: unknown): Promise<ExportSummary> {
        return this.ingest('traces', convertExportTraceRequest(request));
    }

    private async ingest(signal: OtlpSignal, result: ConversionResult<TelemetryEvent>): Promise<ExportSummary> {
        for (const failure of result.failures) {
            this.logger.warn({ signal, index: failure.index, reason: failure.reason }, 'Skipped unconvertible OTLP record');
        }

        let accepted = 0;
        let rejected = result.failures.length;
        for (const event of result.events) {
            try {
                await this.sink.writeEvent(event);
                accepted++;
            } catch (error) {
                rejected++;
                this.logger.error({ error, signal, traceId: event.traceId }, 'Failed to write telemetry event');
            }
        }

        this.logger.debug({ signal, accepted, rejected }, 'OTLP export processed');
        return { accepted, rejected };
    }

    private serviceDefinitions(): OtlpServiceDefinitions {
        if (!this.services) {
            this.services = loadOtlpServices(this.options.protoRoot);
        }
        return this.services;
    }

    private unaryHandler(
        signal: OtlpSignal,
        exporter: (request: unknown) => Promise<ExportSummary>
    ): grpc.handleUnaryCall<unknown, ExportResponse> {
        return (call, callback) => {
            void exporter(call.request).then(
                () => callback(null, {}),
                (error: unknown) => {
                    this.logger.error({ error, signal }, 'Malformed OTLP export request');
                    callback(null, {});
                }
            );
        };
    }
}
