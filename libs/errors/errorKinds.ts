/**
 * Activity Failure Kinds
 *
 * Every activity failure is assigned exactly one kind. The kind alone
 * decides whether the retry stage may re-invoke the unit of work.
 */

/**
 * Failure kind enumeration.
 */
export type ErrorKind =
    | 'transient'   // Network / availability / resource conflict → Retry allowed
    | 'permanent'   // Invalid input, not found, business rule → No retry
    | 'timeout';    // Deadline overrun → Retry allowed

/**
 * Retry eligibility for a failure kind.
 */
export interface RetryEligibility {
    /** Whether retry is allowed for this kind */
    readonly retryAllowed: boolean;
    /** Human-readable reason */
    readonly reason: string;
}

export const ERROR_KIND_METADATA: Record<ErrorKind, RetryEligibility> = {
    transient: {
        retryAllowed: true,
        reason: 'Temporary failure; a later attempt may succeed'
    },
    permanent: {
        retryAllowed: false,
        reason: 'Deterministic failure; retry would produce the same result'
    },
    timeout: {
        retryAllowed: true,
        reason: 'Deadline exceeded; treated as transient for retry purposes'
    }
};

export function isRetryableKind(kind: ErrorKind): boolean {
    return ERROR_KIND_METADATA[kind].retryAllowed;
}
