/**
 * Service configuration, read once from the environment and validated
 * with zod. Guards run first; schema violations raise ConfigurationError.
 */

import { z } from 'zod';
import type { DatabaseConfig } from '../db/index.js';
import type { LogLevel } from '../logging/logger.js';
import type { RetryPolicy } from '../middleware/retry.js';
import { ConfigGuard, type Env } from './config-guard.js';
import { storageGuards } from './config/db-config.js';

export class ConfigurationError extends Error {
    constructor(public readonly errors: readonly string[]) {
        super(`Invalid configuration: ${errors.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const flag = (fallback: boolean) =>
    z.enum(['true', 'false']).default(fallback ? 'true' : 'false').transform(value => value === 'true');

export const envSchema = z.object({
    NODE_ENV: z.string().default('development'),
    SERVICE_NAME: z.string().min(1).default('activity-telemetry'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    STORAGE_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),
    DB_HOST: z.string().optional(),
    DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().optional(),
    DB_POOL_MAX: positiveInt(10),
    DB_SSL: flag(false),
    DB_CA_CERT: z.string().optional(),

    TELEMETRY_BATCH_SIZE: positiveInt(100),
    TELEMETRY_FLUSH_INTERVAL_MS: positiveInt(5000),
    OTLP_GRPC_ADDRESS: z.string().min(1).default('localhost:4317'),
    HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(9090),
    HTTP_BODY_LIMIT: z.string().regex(/^\d+(b|kb|mb)$/i, 'must be a size such as 512kb or 5mb').default('5mb'),

    ACTIVITY_RETRY_MAX_ATTEMPTS: positiveInt(3),
    ACTIVITY_RETRY_INITIAL_BACKOFF_MS: nonNegativeInt(100),
    ACTIVITY_RETRY_MAX_BACKOFF_MS: nonNegativeInt(30000),
    ACTIVITY_RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
    ACTIVITY_TIMEOUT_MS: positiveInt(30000),
    CIRCUIT_BREAKER_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.5),
    CIRCUIT_BREAKER_COOLDOWN_MS: positiveInt(10000)
});

export type StorageConfig =
    | { readonly backend: 'memory' }
    | { readonly backend: 'postgres'; readonly database: DatabaseConfig };

export interface AppConfig {
    readonly environment: string;
    readonly serviceName: string;
    readonly logLevel: LogLevel;
    readonly storage: StorageConfig;
    readonly telemetry: {
        readonly batchSize: number;
        readonly flushIntervalMs: number;
    };
    readonly otlp: {
        readonly grpcAddress: string;
    };
    readonly http: {
        readonly port: number;
        /** Largest accepted request body, in body-parser notation */
        readonly bodyLimit: string;
    };
    readonly activity: {
        readonly retryPolicy: RetryPolicy;
        readonly timeoutMs: number;
        readonly circuitBreaker: {
            readonly failureThreshold: number;
            readonly cooldownMs: number;
        };
    };
}

export function loadConfig(env: Env = process.env): AppConfig {
    const guardErrors = ConfigGuard.check(storageGuards(env), env);
    if (guardErrors.length > 0) {
        throw new ConfigurationError(guardErrors);
    }

    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(
            parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    const vars = parsed.data;

    let storage: StorageConfig = { backend: 'memory' };
    if (vars.STORAGE_BACKEND === 'postgres') {
        // Presence is guaranteed by the storage guards above.
        storage = {
            backend: 'postgres',
            database: {
                host: vars.DB_HOST ?? '',
                port: vars.DB_PORT,
                user: vars.DB_USER ?? '',
                password: vars.DB_PASSWORD ?? '',
                database: vars.DB_NAME ?? '',
                poolMax: vars.DB_POOL_MAX,
                ssl: vars.DB_SSL || vars.DB_CA_CERT !== undefined,
                ...(vars.DB_CA_CERT ? { caCert: vars.DB_CA_CERT } : {})
            }
        };
    }

    return {
        environment: vars.NODE_ENV,
        serviceName: vars.SERVICE_NAME,
        logLevel: vars.LOG_LEVEL,
        storage,
        telemetry: {
            batchSize: vars.TELEMETRY_BATCH_SIZE,
            flushIntervalMs: vars.TELEMETRY_FLUSH_INTERVAL_MS
        },
        otlp: {
            grpcAddress: vars.OTLP_GRPC_ADDRESS
        },
        http: {
            port: vars.HTTP_PORT,
            bodyLimit: vars.HTTP_BODY_LIMIT
        },
        activity: {
            retryPolicy: {
                maxAttempts: vars.ACTIVITY_RETRY_MAX_ATTEMPTS,
                initialBackoffMs: vars.ACTIVITY_RETRY_INITIAL_BACKOFF_MS,
                maxBackoffMs: vars.ACTIVITY_RETRY_MAX_BACKOFF_MS,
                backoffMultiplier: vars.ACTIVITY_RETRY_MULTIPLIER
            },
            timeoutMs: vars.ACTIVITY_TIMEOUT_MS,
            circuitBreaker: {
                failureThreshold: vars.CIRCUIT_BREAKER_THRESHOLD,
                cooldownMs: vars.CIRCUIT_BREAKER_COOLDOWN_MS
            }
        }
    };
}
