import type { ZodType, ZodTypeDef } from 'zod';
import type { Logger } from '../logging/logger.js';

export interface ValidationIssue {
    readonly path: string;
    readonly message: string;
}

export class ValidationError extends Error {
    constructor(public readonly context: string, public readonly issues: readonly ValidationIssue[]) {
        super(`Validation failed in ${context}: ${JSON.stringify(issues)}`);
        this.name = 'ValidationError';
    }
}

/**
 * Parses untrusted input, throwing a ValidationError listing every issue.
 * Input values are never logged, only the failing paths.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string, logger: Logger): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const issues = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: issues }, 'Input validation failure');

        throw new ValidationError(context, issues);
    }

    return result.data;
}
