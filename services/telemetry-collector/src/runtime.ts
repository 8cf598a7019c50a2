import type { Server } from 'node:http';
import type { Express } from 'express';
import { ActivityRegistry } from '../../../libs/activities/ActivityRegistry.js';
import type { AppConfig } from '../../../libs/bootstrap/appConfig.js';
import { createDatabase, createPool } from '../../../libs/db/index.js';
import type { Logger } from '../../../libs/logging/logger.js';
import { EventRepository } from '../../../libs/observability/EventRepository.js';
import { LogRepository } from '../../../libs/observability/LogRepository.js';
import { MetricsCollector } from '../../../libs/observability/MetricsCollector.js';
import { OtlpReceiver } from '../../../libs/observability/otlp/OtlpReceiver.js';
import { MemoryEventStore } from '../../../libs/observability/stores/MemoryEventStore.js';
import { MemoryLogStore } from '../../../libs/observability/stores/MemoryLogStore.js';
import { PgEventStore } from '../../../libs/observability/stores/PgEventStore.js';
import { PgLogStore } from '../../../libs/observability/stores/PgLogStore.js';
import type { EventStore, LogStore } from '../../../libs/observability/stores/types.js';
import { createApp } from './app.js';

export interface RuntimeOptions {
    /** Register process/runtime metrics on the collector's registry */
    readonly collectDefaultMetrics?: boolean;
}

interface Stores {
    readonly logStore: LogStore;
    readonly eventStore: EventStore;
}

/**
 * Each repository owns its own pool: closing a repository ends its pool
 * without affecting the other.
 */
async function createStores(config: AppConfig, logger: Logger): Promise<Stores> {
    if (config.storage.backend === 'memory') {
        logger.warn('Using in-memory telemetry storage; records are lost on restart');
        return { logStore: new MemoryLogStore(), eventStore: new MemoryEventStore() };
    }

    const database = config.storage.database;
    const logStore = new PgLogStore(createDatabase(createPool(database), logger));
    const eventStore = new PgEventStore(createDatabase(createPool(database), logger), logger);
    await logStore.migrate();
    await eventStore.migrate();
    return { logStore, eventStore };
}

/**
 * Wired collector: repositories, metrics, activity registry, OTLP receiver
 * and HTTP app. Nothing listens until start().
 */
export class CollectorRuntime {
    private httpServer: Server | null = null;
    private stopping: Promise<void> | null = null;

    private constructor(
        readonly config: AppConfig,
        readonly logger: Logger,
        readonly logRepository: LogRepository,
        readonly eventRepository: EventRepository,
        readonly metrics: MetricsCollector,
        readonly registry: ActivityRegistry,
        readonly receiver: OtlpReceiver,
        readonly app: Express
    ) { }

    static async create(config: AppConfig, logger: Logger, options: RuntimeOptions = {}): Promise<CollectorRuntime> {
        const { logStore, eventStore } = await createStores(config, logger);
        const batching = {
            batchSize: config.telemetry.batchSize,
            flushIntervalMs: config.telemetry.flushIntervalMs
        };

        const logRepository = new LogRepository(logStore, logger, batching);
        const eventRepository = new EventRepository(eventStore, logger, batching);
        const metrics = new MetricsCollector({ collectDefaults: options.collectDefaultMetrics ?? false });

        const registry = new ActivityRegistry({
            logger,
            logSink: logRepository,
            eventSink: eventRepository,
            metrics,
            retryPolicy: config.activity.retryPolicy,
            timeoutMs: config.activity.timeoutMs,
            circuitBreaker: config.activity.circuitBreaker
        });

        const receiver = new OtlpReceiver(eventRepository, logger, { address: config.otlp.grpcAddress });
        const app = createApp(
            { logRepository, eventRepository, otlp: receiver, metrics, logger },
            { bodyLimit: config.http.bodyLimit }
        );

        return new CollectorRuntime(config, logger, logRepository, eventRepository, metrics, registry, receiver, app);
    }

    async start(): Promise<void> {
        await this.receiver.start();

        const port = this.config.http.port;
        this.httpServer = await new Promise<Server>((resolve, reject) => {
            const server = this.app.listen(port, () => resolve(server));
            server.once('error', reject);
        });
        this.logger.info({ port }, 'HTTP server listening');
    }

    /**
     * Ingress stops first, then repositories flush and release storage.
     */
    shutdown(): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.stop();
        }
        return this.stopping;
    }

    private async stop(): Promise<void> {
        const failures: unknown[] = [];
        const server = this.httpServer;
        this.httpServer = null;
        if (server) {
            try {
                await new Promise<void>((resolve, reject) => {
                    server.close(error => (error ? reject(error) : resolve()));
                });
            } catch (error) {
                this.logger.error({ error }, 'HTTP server failed to close');
                failures.push(error);
            }
        }

        try {
            await this.receiver.stop();
        } finally {
            const results = await Promise.allSettled([
                this.logRepository.close(),
                this.eventRepository.close()
            ]);
            failures.push(...results.flatMap(result => (result.status === 'rejected' ? [result.reason] : [])));
        }

        if (failures.length > 0) {
            throw new AggregateError(failures, 'Collector did not stop cleanly');
        }
        this.logger.info('Collector stopped');
    }
}
