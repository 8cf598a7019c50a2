/**
 * gRPC status classification.
 *
 * Downstream services answer with gRPC status errors. Availability and
 * contention codes are transient, every other code is permanent. The
 * stage rewrites them into ClassifiedErrors with code GRPC_<STATUS>;
 * other errors pass through unchanged.
 */

import { status } from '@grpc/grpc-js';
import { ClassifiedError, isClassifiedError } from '../errors/classifiedError.js';
import type { ErrorKind } from '../errors/errorKinds.js';
import type { ActivityMiddleware } from './pipeline.js';

const TRANSIENT_GRPC_CODES: ReadonlySet<number> = new Set<number>([
    status.UNAVAILABLE,
    status.RESOURCE_EXHAUSTED,
    status.FAILED_PRECONDITION, // resource conflicts
    status.ABORTED,
    status.DEADLINE_EXCEEDED,
    status.INTERNAL,
    status.UNKNOWN
]);

export interface GrpcStatusError extends Error {
    readonly code: number;
    readonly details: string;
}

export function isGrpcStatusError(error: unknown): error is GrpcStatusError {
    return error instanceof Error
        && 'code' in error
        && typeof error.code === 'number'
        && status[error.code] !== undefined
        && 'details' in error
        && typeof error.details === 'string';
}

export function getGrpcStatusCode(error: unknown): number | undefined {
    return isGrpcStatusError(error) ? error.code : undefined;
}

export function isTransientGrpcError(error: unknown): boolean {
    return isGrpcStatusError(error) && TRANSIENT_GRPC_CODES.has(error.code);
}

export function grpcStatusName(code: number): string {
    return status[code] ?? 'UNKNOWN';
}

/**
 * Converts a gRPC status error into a ClassifiedError. Anything else is
 * returned as is.
 */
export function classifyGrpcError(error: unknown): unknown {
    if (isClassifiedError(error) || !isGrpcStatusError(error)) {
        return error;
    }

    const code = `GRPC_${grpcStatusName(error.code)}`;
    const detail = error.details || error.message;
    return TRANSIENT_GRPC_CODES.has(error.code)
        ? new ClassifiedError('transient', code, `gRPC error (transient): ${detail}`, error)
        : new ClassifiedError('permanent', code, `gRPC error (permanent): ${detail}`, error);
}

/**
 * Failure kind used for retry decisions: a ClassifiedError keeps its kind,
 * gRPC status errors are judged by code, everything else is permanent.
 */
export function activityErrorKind(error: unknown): ErrorKind {
    if (isClassifiedError(error)) {
        return error.kind;
    }
    if (isGrpcStatusError(error)) {
        return TRANSIENT_GRPC_CODES.has(error.code) ? 'transient' : 'permanent';
    }
    return 'permanent';
}

export function withGrpcErrorClassification(): ActivityMiddleware {
    return (next) => async (ctx, input) => {
        try {
            return await next(ctx, input);
        } catch (error) {
            throw classifyGrpcError(error);
        }
    };
}
