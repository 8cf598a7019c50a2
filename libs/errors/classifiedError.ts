import { ErrorKind, isRetryableKind } from './errorKinds.js';

/**
 * Error carrying a failure kind, a stable code and an optional cause.
 * The kind is fixed at construction.
 */
export class ClassifiedError extends Error {
    public readonly kind: ErrorKind;
    public readonly code: string;

    constructor(kind: ErrorKind, code: string, message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'ClassifiedError';
        this.kind = kind;
        this.code = code;
    }

    get retryable(): boolean {
        return isRetryableKind(this.kind);
    }

    /**
     * Text used for persisted error messages: `CODE: message`.
     * The code leads so grouping by error hash keys on it.
     */
    describe(): string {
        return `${this.code}: ${this.message}`;
    }

    override toString(): string {
        const base = `[${this.code}] ${this.message}`;
        if (this.cause === undefined) {
            return base;
        }
        const causeText = this.cause instanceof Error ? this.cause.message : String(this.cause);
        return `${base}: ${causeText}`;
    }
}

export function transientError(code: string, message: string, cause?: unknown): ClassifiedError {
    return new ClassifiedError('transient', code, message, cause);
}

export function permanentError(code: string, message: string, cause?: unknown): ClassifiedError {
    return new ClassifiedError('permanent', code, message, cause);
}

export function timeoutError(code: string, message: string): ClassifiedError {
    return new ClassifiedError('timeout', code, message);
}

export function isClassifiedError(error: unknown): error is ClassifiedError {
    return error instanceof ClassifiedError;
}

/**
 * Kind of an arbitrary error: a ClassifiedError keeps its own kind,
 * anything else is permanent.
 */
export function classifyError(error: unknown): ErrorKind {
    if (isClassifiedError(error)) {
        return error.kind;
    }
    return 'permanent';
}

/**
 * Message text suitable for persistence and grouping.
 */
export function describeError(error: unknown): string {
    if (isClassifiedError(error)) {
        return error.describe();
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
