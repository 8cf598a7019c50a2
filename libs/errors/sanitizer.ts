import crypto from 'node:crypto';
import type { Logger } from '../logging/logger.js';

/**
 * Storage and infrastructure failures are wrapped in a TelemetryStoreError:
 * a generic public message plus an incident id. The raw details go to
 * the log under the same id.
 */
export class TelemetryStoreError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel: string;
    public readonly sqlState?: string;

    constructor(
        public readonly publicMessage: string,
        options: { cause?: unknown; contextLabel: string; sqlState?: string }
    ) {
        super(publicMessage, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'TelemetryStoreError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options.contextLabel;
        this.sqlState = options.sqlState;
    }
}

interface ErrorDetails {
    message?: string;
    stack?: string;
    code?: string;
}

function stringField(value: object, key: string): string | undefined {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : undefined;
}

function extractDetails(err: unknown): ErrorDetails {
    if (typeof err === 'string') {
        return { message: err };
    }
    if (err && typeof err === 'object') {
        return {
            message: stringField(err, 'message'),
            stack: stringField(err, 'stack'),
            code: stringField(err, 'code')
        };
    }
    return { message: String(err) };
}

export const ErrorSanitizer = {
    /**
     * Wraps any error into a TelemetryStoreError and logs the original
     * details against its incident id.
     */
    sanitize: (err: unknown, contextLabel: string, logger: Logger): TelemetryStoreError => {
        if (err instanceof TelemetryStoreError) return err;

        const details = extractDetails(err);
        const wrapped = new TelemetryStoreError(
            `Telemetry storage failure (${contextLabel})`,
            { cause: err, contextLabel, sqlState: details.code }
        );

        logger.error({
            incidentId: wrapped.incidentId,
            contextLabel,
            originalError: details.message,
            sqlState: details.code,
            stack: details.stack
        }, wrapped.publicMessage);

        return wrapped;
    }
};

/**
 * Sanitize error text before it is persisted or returned: credential-like
 * key/value pairs are masked and the length is bounded.
 */
export function sanitizeErrorMessage(message: string): string {
    return message
        .replace(/\b(password|token|secret)\s*[=:]\s*\S+/gi, '$1=[REDACTED]')
        .substring(0, 500);
}
